// src/dsl/types.ts
// Instruction model for the line-oriented object DSL

import type { Diagnostic } from "../outcome/diagnostic";

export interface CurvePoint {
  x: number;
  y: number;
}

/**
 * One parsed DSL line. Names are kept exactly as written between quotes.
 */
export type Instruction =
  | { kind: "CREATE"; type: string; name: string; parent: string }
  | { kind: "SET_PROP"; object: string; property: string; value: string }
  | { kind: "LINK"; object: string; target: string; slot: string }
  | { kind: "ASSIGN"; child: string; target: string }
  | { kind: "ADD_ACTION"; event: string; action: string; target: string; value?: string }
  | { kind: "CREATE_EVENT"; event: string; parent?: string; target: string }
  | { kind: "IMPORT_AUDIO"; file: string; parent: string; name?: string }
  | { kind: "SET_RTPC_CURVE"; object: string; gameParameter: string; property: string; points: CurvePoint[] }
  | { kind: "DELETE"; object: string }
  | { kind: "COPY"; source: string; parent: string; newName: string }
  | { kind: "MOVE"; object: string; parent: string }
  | { kind: "RENAME"; object: string; newName: string };

export type InstructionKind = Instruction["kind"];

export const INSTRUCTION_KINDS: readonly InstructionKind[] = [
  "CREATE",
  "SET_PROP",
  "LINK",
  "ASSIGN",
  "ADD_ACTION",
  "CREATE_EVENT",
  "IMPORT_AUDIO",
  "SET_RTPC_CURVE",
  "DELETE",
  "COPY",
  "MOVE",
  "RENAME",
];

export function isInstructionKind(value: string): value is InstructionKind {
  return INSTRUCTION_KINDS.some(k => k === value);
}

/**
 * Outcome of reading one line.
 * - instruction: parsed, possibly with warnings (trailing text)
 * - skip: blank, comment or markup noise
 * - malformed: known keyword, bad arguments
 * - unrecognized: unknown keyword
 */
export type LineResult =
  | { tag: "instruction"; instruction: Instruction; line: number; warnings: Diagnostic[] }
  | { tag: "skip" }
  | { tag: "malformed"; kind: InstructionKind; diagnostic: Diagnostic }
  | { tag: "unrecognized"; diagnostic: Diagnostic };

/** A coerced property value. */
export type TaggedValue =
  | { tag: "boolean"; value: boolean }
  | { tag: "number"; value: number }
  | { tag: "text"; value: string };
