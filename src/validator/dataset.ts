// src/validator/dataset.ts
// Whole-dataset validation over JSON-lines sample records

import { parseJsonLines, readJsonLinesFile, type JsonLine } from "../io/jsonl";
import { DIAGNOSTIC_CODES, isDiagnosticCode, makeDiagnostic } from "../outcome/codes";
import { formatDiagnostic } from "../outcome/diagnostic";
import { emptyCommandCounts } from "../compiler/plan";
import type { ValidationResult } from "./types";
import { SampleValidator } from "./validator";

export interface DatasetStats {
  total: number;
  valid: number;
  invalid: number;
  syntaxErrors: number;
  semanticErrors: number;
  dependencyWarnings: number;
}

export interface LineValidation {
  /** 1-based line of the dataset file. */
  line: number;
  raw: string;
  result: ValidationResult;
}

export interface DatasetReport {
  stats: DatasetStats;
  results: LineValidation[];
  validLines: string[];
  invalidLines: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rejected(reason: string): ValidationResult {
  const diag = makeDiagnostic("E0105", { reason });
  return {
    valid: false,
    syntaxOk: false,
    semanticOk: false,
    dependencyOk: false,
    errors: [formatDiagnostic(diag)],
    warnings: [],
    diagnostics: [diag],
    planLength: 0,
    commandsFound: emptyCommandCounts(),
  };
}

/**
 * Validate every record of a JSONL dataset as one batch.
 */
export function validateDataset(text: string, validator: SampleValidator = new SampleValidator()): DatasetReport {
  return validateLines(parseJsonLines(text), validator);
}

/** Same as validateDataset, reading the JSONL file at `filePath`. */
export function validateDatasetFile(filePath: string, validator: SampleValidator = new SampleValidator()): DatasetReport {
  return validateLines(readJsonLinesFile(filePath), validator);
}

function validateLines(entries: readonly JsonLine[], validator: SampleValidator): DatasetReport {
  validator.reset();
  const stats: DatasetStats = { total: 0, valid: 0, invalid: 0, syntaxErrors: 0, semanticErrors: 0, dependencyWarnings: 0 };
  const report: DatasetReport = { stats, results: [], validLines: [], invalidLines: [] };

  for (const entry of entries) {
    let result: ValidationResult;
    if (!entry.ok) {
      result = rejected(entry.reason);
    } else if (!isRecord(entry.value)) {
      result = rejected("expected an object");
    } else {
      const output = entry.value.output;
      result = validator.validate(typeof output === "string" ? output : "");
    }

    report.results.push({ line: entry.line, raw: entry.raw, result });
    stats.total++;
    if (result.valid) {
      stats.valid++;
      report.validLines.push(entry.raw);
    } else {
      stats.invalid++;
      report.invalidLines.push(entry.raw);
    }
    if (!result.syntaxOk) stats.syntaxErrors++;
    if (!result.semanticOk) stats.semanticErrors++;
    stats.dependencyWarnings += result.diagnostics.filter(d => d.severity === "warning" && d.code.startsWith("W03")).length;
  }

  return report;
}

function percent(n: number, total: number): string {
  return `${((n / Math.max(1, total)) * 100).toFixed(1)}%`;
}

/**
 * Printable summary: counters, the first five failing samples, and the five
 * most frequent warning codes.
 */
export function formatDatasetReport(report: DatasetReport): string {
  const { stats } = report;
  const lines: string[] = [
    "DSL validation report",
    `Total samples:        ${stats.total}`,
    `Valid:                ${stats.valid} (${percent(stats.valid, stats.total)})`,
    `Invalid:              ${stats.invalid} (${percent(stats.invalid, stats.total)})`,
    `Syntax errors:        ${stats.syntaxErrors}`,
    `Semantic errors:      ${stats.semanticErrors}`,
    `Dependency warnings:  ${stats.dependencyWarnings}`,
  ];

  const failing = report.results.filter(r => !r.result.valid).slice(0, 5);
  if (failing.length > 0) {
    lines.push("First failing samples:");
    for (const f of failing) {
      lines.push(`  Line ${f.line}: ${f.result.errors.slice(0, 2).join(", ")}`);
    }
  }

  const byCode = new Map<string, number>();
  for (const r of report.results) {
    for (const d of r.result.diagnostics) {
      if (d.severity === "warning") byCode.set(d.code, (byCode.get(d.code) ?? 0) + 1);
    }
  }
  if (byCode.size > 0) {
    lines.push("Most common warnings:");
    const top = [...byCode.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0])).slice(0, 5);
    for (const [code, count] of top) {
      const label = isDiagnosticCode(code) ? DIAGNOSTIC_CODES[code].template : code;
      lines.push(`  ${code} ${label}: ${count}`);
    }
  }

  return lines.join("\n");
}
