// src/io/jsonl.ts
// JSON-lines helpers for sample datasets

import * as fs from "fs";
import * as path from "path";

export type JsonLine =
  | { line: number; raw: string; ok: true; value: unknown }
  | { line: number; raw: string; ok: false; reason: string };

/**
 * Split JSONL text into parsed lines. Blank lines are skipped; line numbers are 1-based.
 */
export function parseJsonLines(text: string): JsonLine[] {
  const out: JsonLine[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    if (!raw.trim()) return;
    try {
      out.push({ line: i + 1, raw, ok: true, value: JSON.parse(raw) });
    } catch (e) {
      out.push({ line: i + 1, raw, ok: false, reason: e instanceof Error ? e.message : String(e) });
    }
  });
  return out;
}

export function toJsonLines(values: readonly unknown[]): string {
  return values.map(v => JSON.stringify(v) + "\n").join("");
}

export function readJsonLinesFile(filePath: string): JsonLine[] {
  return parseJsonLines(fs.readFileSync(filePath, "utf8"));
}

/**
 * Write rows to a JSONL file, creating parent directories. `append` keeps existing rows.
 */
export function writeJsonLinesFile(filePath: string, values: readonly unknown[], append = false): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  const body = toJsonLines(values);
  if (append) {
    fs.appendFileSync(filePath, body);
  } else {
    fs.writeFileSync(filePath, body);
  }
}

/** Write raw, already serialized lines. */
export function writeRawLinesFile(filePath: string, lines: readonly string[]): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, lines.map(l => l + "\n").join(""));
}
