// src/dsl/value.ts
// Property value coercion (DSL → plan) and formatting (project → DSL)

import type { TaggedValue } from "./types";

const UNIT_SUFFIX = /\s*(dB|db|DB|%|cents|Cents|ms|s|Hz|hz)$/;
const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(\d+\.\d*|\.\d+)([eE][+-]?\d+)?$/;

function isNumeric(text: string): boolean {
  return INTEGER.test(text) || FLOAT.test(text);
}

/**
 * Coerce the raw text after `=` in a SET_PROP line.
 *
 *   "-6 dB"   → number -6
 *   "true"    → boolean true
 *   "0.5"     → number 0.5
 *   "\"Red\"" → text Red
 */
export function parseValue(raw: string): TaggedValue {
  let s = raw.trim();

  const unit = UNIT_SUFFIX.exec(s);
  if (unit) {
    const stripped = s.slice(0, unit.index);
    if (isNumeric(stripped)) s = stripped;
  }

  const lower = s.toLowerCase();
  if (lower === "true") return { tag: "boolean", value: true };
  if (lower === "false") return { tag: "boolean", value: false };

  if (s.includes(".") ? FLOAT.test(s) : INTEGER.test(s)) {
    const n = Number(s);
    // Integers past 2^53 stay as written
    return !s.includes(".") && !Number.isSafeInteger(n)
      ? { tag: "text", value: s }
      : { tag: "number", value: n };
  }

  if (s.length >= 2 && s.startsWith("\"") && s.endsWith("\"")) {
    return { tag: "text", value: s.slice(1, -1) };
  }

  return { tag: "text", value: s };
}

export function plainValue(value: TaggedValue): boolean | number | string {
  return value.value;
}

/**
 * Render a stored property value for a SET_PROP line.
 * Booleans become True/False, decimals keep their point, everything else is quoted.
 */
export function formatPropertyValue(raw: string): string {
  const lower = raw.toLowerCase();
  if (lower === "true") return "True";
  if (lower === "false") return "False";

  if (raw.includes(".") && FLOAT.test(raw)) {
    const n = Number(raw);
    return Number.isInteger(n) ? n.toFixed(1) : String(n);
  }
  if (INTEGER.test(raw)) {
    const n = Number(raw);
    return Number.isSafeInteger(n) ? String(n) : raw;
  }

  return `"${raw}"`;
}
