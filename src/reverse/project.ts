// src/reverse/project.ts
// Batch decompilation of work-unit files into a sample dataset

import * as fs from "fs";
import * as path from "path";
import { writeJsonLinesFile } from "../io/jsonl";
import { loadWorkUnitFile } from "../project/wwu";
import { COMPLEXITY_TIERS, type Complexity } from "./complexity";
import { ReverseCompiler, type ReverseOptions, type ReverseStats } from "./extract";
import { toSampleRecord, type ExtractedSample, type SampleRecord, type SampleStage } from "./sample";

export type LogFn = (line: string) => void;

export interface DecompileOptions extends ReverseOptions {
  output: string;
  append?: boolean;
  stages?: SampleStage[];
  log?: LogFn;
}

export interface DecompileReport {
  output: string;
  files: string[];
  failed: Array<{ file: string; reason: string }>;
  samples: number;
  complexity: Record<Complexity, number>;
  stats: ReverseStats;
}

function cleanPath(raw: string): string {
  return raw.trim().replace(/^["']+|["']+$/g, "").trim();
}

function walkDir(dir: string, out: string[]): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) walkDir(full, out);
    else if (entry.isFile() && entry.name.endsWith(".wwu")) out.push(full);
  }
}

/**
 * Expand files and directories into a de-duplicated list of .wwu files.
 */
export function collectWorkUnitFiles(paths: readonly string[], log: LogFn = () => {}): string[] {
  const found: string[] = [];

  for (const raw of paths) {
    const p = cleanPath(raw);
    if (!p) continue;

    if (!fs.existsSync(p)) {
      log(`  skip (not found): ${p}`);
      continue;
    }

    if (fs.statSync(p).isFile()) {
      if (p.endsWith(".wwu")) found.push(p);
      else log(`  skip (not a .wwu file): ${p}`);
      continue;
    }

    const before = found.length;
    walkDir(p, found);
    log(`  scanned ${p}: ${found.length - before} .wwu files`);
  }

  return [...new Set(found)];
}

function applyStages(record: SampleRecord, stages: readonly SampleStage[]): SampleRecord[] {
  let records = [record];
  for (const stage of stages) {
    records = records.flatMap(r => {
      const result = stage.apply(r);
      return Array.isArray(result) ? result : [result];
    });
  }
  return records;
}

export class ProjectDecompiler {
  private readonly compiler: ReverseCompiler;
  private readonly log: LogFn;

  constructor(private readonly options: DecompileOptions) {
    this.compiler = new ReverseCompiler(options);
    this.log = options.log ?? (line => console.log(line));
  }

  run(paths: readonly string[]): DecompileReport {
    this.compiler.resetStats();
    const files = collectWorkUnitFiles(paths, this.log);
    const report: DecompileReport = {
      output: this.options.output,
      files,
      failed: [],
      samples: 0,
      complexity: { simple: 0, medium: 0, complex: 0, expert: 0 },
      stats: this.compiler.getStats(),
    };

    if (files.length === 0) {
      this.log("no .wwu files found");
      return report;
    }

    const records: SampleRecord[] = [];
    files.forEach((file, i) => {
      let samples: ExtractedSample[];
      try {
        samples = this.compiler.extractDocument(loadWorkUnitFile(file));
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        report.failed.push({ file, reason });
        this.log(`  [${i + 1}/${files.length}] ${path.basename(file)}: failed: ${reason}`);
        return;
      }
      for (const sample of samples) {
        report.complexity[sample.complexity]++;
        records.push(...applyStages(toSampleRecord(sample), this.options.stages ?? []));
      }
      this.log(`  [${i + 1}/${files.length}] ${path.basename(file)}: ${samples.length} samples`);
    });

    writeJsonLinesFile(this.options.output, records, this.options.append === true);
    report.samples = records.length;
    report.stats = this.compiler.getStats();
    return report;
  }
}

export function formatDecompileReport(report: DecompileReport): string {
  const lines: string[] = [];
  lines.push("Reverse compilation report");
  lines.push(`Files processed:  ${report.files.length}`);
  lines.push(`Files failed:     ${report.failed.length}`);
  lines.push(`Samples written:  ${report.samples}`);
  lines.push("Complexity:");
  const total = Math.max(1, COMPLEXITY_TIERS.reduce((n, t) => n + report.complexity[t], 0));
  for (const tier of COMPLEXITY_TIERS) {
    const count = report.complexity[tier];
    lines.push(`  ${tier.padEnd(8)} ${String(count).padStart(5)} (${((count / total) * 100).toFixed(1)}%)`);
  }
  lines.push("Lines emitted:");
  lines.push(`  CREATE      ${report.stats.creates}`);
  lines.push(`  SET_PROP    ${report.stats.setProps}`);
  lines.push(`  LINK        ${report.stats.links}`);
  lines.push(`  ASSIGN      ${report.stats.assigns}`);
  lines.push(`  ADD_ACTION  ${report.stats.actions}`);
  lines.push(`Output: ${report.output}`);
  return lines.join("\n");
}
