// src/dsl/reader.ts
// Line reader: one DSL line → tagged instruction
//
// Dispatch happens once, on the leading keyword. Each keyword has a single
// argument reader built on LineScanner; a scanner mismatch turns into a
// "malformed" result for that keyword instead of falling through to others.

import { makeDiagnostic } from "../outcome/codes";
import type { Diagnostic } from "../outcome/diagnostic";
import { isInstructionKind, type CurvePoint, type Instruction, type InstructionKind, type LineResult } from "./types";

/** Raised inside argument readers; never escapes readLine. */
export class SyntaxMismatch extends Error {
  constructor(readonly detail: string) {
    super(detail);
    this.name = "SyntaxMismatch";
  }
}

class InvalidPoint extends Error {
  constructor(readonly point: string) {
    super(`invalid point ${point}`);
    this.name = "InvalidPoint";
  }
}

const isWS = (c: string | undefined) => c === " " || c === "\t";
const isWordChar = (c: string | undefined) => c !== undefined && /\w/.test(c);

/**
 * Cursor over a single line.
 */
export class LineScanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  skipSpace(): void {
    while (isWS(this.text[this.pos])) this.pos++;
  }

  atEnd(): boolean {
    this.skipSpace();
    return this.pos >= this.text.length;
  }

  peek(): string | undefined {
    this.skipSpace();
    return this.text[this.pos];
  }

  /** Case-insensitive keyword followed by a non-word character. */
  tryKeyword(word: string): boolean {
    this.skipSpace();
    const candidate = this.text.slice(this.pos, this.pos + word.length);
    if (candidate.toUpperCase() !== word.toUpperCase()) return false;
    if (isWordChar(this.text[this.pos + word.length])) return false;
    this.pos += word.length;
    return true;
  }

  keyword(word: string): void {
    if (!this.tryKeyword(word)) throw new SyntaxMismatch(`expected ${word}`);
  }

  /** Double-quoted literal. No escapes: paths carry raw backslashes. */
  tryQuoted(): string | undefined {
    if (this.peek() !== "\"") return undefined;
    const close = this.text.indexOf("\"", this.pos + 1);
    if (close < 0) throw new SyntaxMismatch("unterminated string");
    const value = this.text.slice(this.pos + 1, close);
    if (value.length === 0) throw new SyntaxMismatch("empty string");
    this.pos = close + 1;
    return value;
  }

  quoted(label: string): string {
    const value = this.tryQuoted();
    if (value === undefined) throw new SyntaxMismatch(`expected quoted ${label}`);
    return value;
  }

  word(label: string): string {
    this.skipSpace();
    const m = /^\w+/.exec(this.text.slice(this.pos));
    if (!m) throw new SyntaxMismatch(`expected ${label}`);
    this.pos += m[0].length;
    return m[0];
  }

  /** Free text up to the next double quote; used for multi-word type names. */
  typeToken(): string {
    this.skipSpace();
    const close = this.text.indexOf("\"", this.pos);
    if (close < 0) throw new SyntaxMismatch("expected quoted name");
    const token = this.text.slice(this.pos, close).trim();
    if (!/^\w[\w\-\s]*$/.test(token)) throw new SyntaxMismatch("expected object type");
    this.pos = close;
    return token;
  }

  expect(char: string): void {
    if (this.peek() !== char) throw new SyntaxMismatch(`expected '${char}'`);
    this.pos++;
  }

  /** Remaining text, trimmed. Consumes it. */
  rest(): string {
    const out = this.text.slice(this.pos).trim();
    this.pos = this.text.length;
    return out;
  }

  /** Text up to the last occurrence of `char`. Consumes through it. */
  untilLast(char: string): string {
    const close = this.text.lastIndexOf(char);
    if (close < this.pos) throw new SyntaxMismatch(`expected '${char}'`);
    const out = this.text.slice(this.pos, close);
    this.pos = close + 1;
    return out;
  }
}

// ─────────────────────────────────────────────────────────────────
// Argument readers
// ─────────────────────────────────────────────────────────────────

const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseCurvePoints(text: string): CurvePoint[] {
  const points: CurvePoint[] = [];
  const re = /\(([^,]+),\s*([^)]+)\)/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const x = m[1].trim();
    const y = m[2].trim();
    if (!NUMBER.test(x) || !NUMBER.test(y)) {
      throw new InvalidPoint(`(${x}, ${y})`);
    }
    points.push({ x: Number(x), y: Number(y) });
  }
  return points;
}

type ArgReader = (s: LineScanner) => Instruction;

const READERS: Record<InstructionKind, ArgReader> = {
  CREATE: s => {
    const type = s.typeToken();
    const name = s.quoted("name");
    s.keyword("UNDER");
    return { kind: "CREATE", type, name, parent: s.quoted("parent") };
  },

  SET_PROP: s => {
    const object = s.quoted("object");
    const property = s.quoted("property");
    s.expect("=");
    const value = s.rest();
    if (value.length === 0) throw new SyntaxMismatch("missing value");
    return { kind: "SET_PROP", object, property, value };
  },

  LINK: s => {
    const object = s.quoted("object");
    s.keyword("TO");
    const target = s.quoted("target");
    s.keyword("AS");
    return { kind: "LINK", object, target, slot: s.quoted("reference type") };
  },

  ASSIGN: s => {
    const child = s.quoted("child");
    s.keyword("TO");
    return { kind: "ASSIGN", child, target: s.quoted("switch or state") };
  },

  ADD_ACTION: s => {
    const event = s.quoted("event");
    const action = s.word("action type");
    const target = s.quoted("target");
    const value = s.tryQuoted();
    return value === undefined
      ? { kind: "ADD_ACTION", event, action, target }
      : { kind: "ADD_ACTION", event, action, target, value };
  },

  CREATE_EVENT: s => {
    const event = s.quoted("event");
    const parent = s.tryKeyword("UNDER") ? s.quoted("parent") : undefined;
    s.keyword("PLAY");
    const target = s.quoted("target");
    return parent === undefined
      ? { kind: "CREATE_EVENT", event, target }
      : { kind: "CREATE_EVENT", event, parent, target };
  },

  IMPORT_AUDIO: s => {
    const file = s.quoted("file");
    s.keyword("INTO");
    const parent = s.quoted("parent");
    const name = s.tryKeyword("AS") ? s.quoted("sound name") : undefined;
    return name === undefined
      ? { kind: "IMPORT_AUDIO", file, parent }
      : { kind: "IMPORT_AUDIO", file, parent, name };
  },

  SET_RTPC_CURVE: s => {
    const object = s.quoted("object");
    const gameParameter = s.quoted("game parameter");
    const property = s.quoted("property");
    s.keyword("POINTS");
    s.expect("[");
    const inner = s.untilLast("]");
    if (inner.trim().length === 0) throw new SyntaxMismatch("missing points");
    return { kind: "SET_RTPC_CURVE", object, gameParameter, property, points: parseCurvePoints(inner) };
  },

  DELETE: s => ({ kind: "DELETE", object: s.quoted("object") }),

  COPY: s => {
    const source = s.quoted("source");
    s.keyword("TO");
    const parent = s.quoted("parent");
    s.keyword("AS");
    return { kind: "COPY", source, parent, newName: s.quoted("new name") };
  },

  MOVE: s => {
    const object = s.quoted("object");
    s.keyword("TO");
    return { kind: "MOVE", object, parent: s.quoted("parent") };
  },

  RENAME: s => {
    const object = s.quoted("object");
    s.keyword("TO");
    return { kind: "RENAME", object, newName: s.quoted("new name") };
  },
};

// ─────────────────────────────────────────────────────────────────
// Line entry point
// ─────────────────────────────────────────────────────────────────

const NOISE_PREFIXES = ["<", ">", "```", "---", "==="];

/** Leading enumeration such as "3. " in model-written listings. */
export function stripEnumeration(line: string): string {
  return line.replace(/^\d+\.\s*/, "");
}

export function isCommentLine(line: string): boolean {
  return line.length === 0 || line.startsWith("#") || line.startsWith("//");
}

/**
 * Read one raw line. `line` is the 1-based line number used in diagnostics.
 */
export function readLine(raw: string, line: number): LineResult {
  const trimmed = raw.trim();
  if (isCommentLine(trimmed)) return { tag: "skip" };

  const text = stripEnumeration(trimmed);
  const span = { line };
  const head = /^[A-Za-z_]+/.exec(text);
  const keyword = head ? head[0].toUpperCase() : "";

  if (!isInstructionKind(keyword)) {
    if (NOISE_PREFIXES.some(p => text.startsWith(p))) return { tag: "skip" };
    return { tag: "unrecognized", diagnostic: makeDiagnostic("W0101", { text: text.slice(0, 50) }, span) };
  }

  const scanner = new LineScanner(text);
  try {
    scanner.keyword(keyword);
    const instruction = READERS[keyword](scanner);
    const warnings: Diagnostic[] = [];
    if (!scanner.atEnd()) {
      warnings.push(makeDiagnostic("W0105", { text: scanner.rest() }, span));
    }
    return { tag: "instruction", instruction, line, warnings };
  } catch (e) {
    if (e instanceof SyntaxMismatch) {
      return { tag: "malformed", kind: keyword, diagnostic: makeDiagnostic("E0101", { kind: keyword, detail: e.detail }, span) };
    }
    if (e instanceof InvalidPoint) {
      return { tag: "malformed", kind: keyword, diagnostic: makeDiagnostic("E0102", { point: e.point }, span) };
    }
    throw e;
  }
}

/**
 * Read every line of a DSL text (or pre-split lines).
 */
export function readLines(input: string | readonly string[]): LineResult[] {
  const lines = typeof input === "string" ? input.split(/\r?\n/) : input;
  return lines.map((raw, i) => readLine(raw, i + 1));
}
