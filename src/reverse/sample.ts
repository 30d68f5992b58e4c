// src/reverse/sample.ts
// Sample records: the JSON-lines boundary format between pipeline stages

import type { Instruction } from "../dsl/types";
import { COMPLEXITY_TIERS, type Complexity, type SampleCommands } from "./complexity";

/** One extracted subtree, before serialization. */
export interface ExtractedSample {
  instructions: Instruction[];
  lines: string[];
  rootKind: string;
  rootName: string;
  depth: number;
  commands: SampleCommands;
  complexity: Complexity;
  source: string;
}

export interface SampleMeta {
  source: string;
  root_type: string;
  root_name: string;
  line_count: number;
  depth: number;
  complexity: Complexity;
  commands: SampleCommands;
  /** Fields appended by later stages. */
  [extra: string]: unknown;
}

export interface SampleRecord {
  instruction: string;
  input: string;
  output: string;
  meta: SampleMeta;
}

/**
 * A later pipeline stage (augmentation, instruction writing, ...). Stages may
 * fill `instruction`/`input` and append meta fields; `output` is not theirs to change.
 */
export interface SampleStage {
  readonly name: string;
  apply(record: SampleRecord): SampleRecord | SampleRecord[];
}

export function toSampleRecord(sample: ExtractedSample): SampleRecord {
  return {
    instruction: "",
    input: "",
    output: sample.lines.join("\n"),
    meta: {
      source: sample.source,
      root_type: sample.rootKind,
      root_name: sample.rootName,
      line_count: sample.lines.length,
      depth: sample.depth,
      complexity: sample.complexity,
      commands: { ...sample.commands },
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isComplexity(value: unknown): value is Complexity {
  return typeof value === "string" && COMPLEXITY_TIERS.some(t => t === value);
}

const str = (v: unknown) => (typeof v === "string" ? v : "");
const num = (v: unknown) => (typeof v === "number" ? v : 0);

function readCommands(value: unknown): SampleCommands {
  const raw: Record<string, unknown> = isRecord(value) ? value : {};
  return {
    CREATE: num(raw.CREATE),
    SET_PROP: num(raw.SET_PROP),
    LINK: num(raw.LINK),
    ASSIGN: num(raw.ASSIGN),
    ADD_ACTION: num(raw.ADD_ACTION),
  };
}

function readMeta(value: unknown): SampleMeta {
  const raw: Record<string, unknown> = isRecord(value) ? value : {};
  return {
    ...raw,
    source: str(raw.source),
    root_type: str(raw.root_type),
    root_name: str(raw.root_name),
    line_count: num(raw.line_count),
    depth: num(raw.depth),
    complexity: isComplexity(raw.complexity) ? raw.complexity : "simple",
    commands: readCommands(raw.commands),
  };
}

/**
 * Coerce a parsed JSON value into a record. Only `output` is required;
 * missing text fields become "" and missing meta fields their zero value.
 */
export function toRecord(value: unknown): SampleRecord | undefined {
  if (!isRecord(value) || typeof value.output !== "string") return undefined;
  return {
    instruction: str(value.instruction),
    input: str(value.input),
    output: value.output,
    meta: readMeta(value.meta),
  };
}
