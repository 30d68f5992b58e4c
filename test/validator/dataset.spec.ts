// test/validator/dataset.spec.ts
// Whole-dataset validation and its report

import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { formatDatasetReport, validateDataset, validateDatasetFile } from "../../src/validator/dataset";
import { SampleValidator } from "../../src/validator/validator";

const row = (output: string) => JSON.stringify({ instruction: "", input: "", output, meta: {} });

const DATASET = [
  row('CREATE ActorMixer "Weapons" UNDER "Default Work Unit"'),
  "{oops",
  row('LINK "Hit" TO "Master Audio Bus" AS "Bogus"'),
  "[1, 2]",
  row('CREATE Sound "Gun" UNDER "Weapons"'),
  JSON.stringify({ meta: {} }),
  row('CREATE Sound "Lost" UNDER "Nowhere"'),
  "",
].join("\n");

describe("validateDataset", () => {
  const report = validateDataset(DATASET);

  it("counts outcomes", () => {
    expect(report.stats).toEqual({
      total: 7,
      valid: 3,
      invalid: 4,
      syntaxErrors: 3,
      semanticErrors: 3,
      dependencyWarnings: 1,
    });
  });

  it("splits raw lines into valid and invalid", () => {
    const lines = DATASET.split("\n");
    expect(report.validLines).toEqual([lines[0], lines[4], lines[6]]);
    expect(report.invalidLines).toEqual([lines[1], lines[2], lines[3], lines[5]]);
  });

  it("rejects undecodable records with E0105", () => {
    const bad = report.results.find(r => r.line === 2);
    expect(bad?.result.diagnostics.map(d => d.code)).toEqual(["E0105"]);
    const notObject = report.results.find(r => r.line === 4);
    expect(notObject?.result.errors).toEqual(["Invalid JSON record: expected an object"]);
  });

  it("lets later records depend on earlier valid ones", () => {
    const gun = report.results.find(r => r.line === 5);
    expect(gun?.result.warnings).toEqual([]);
  });

  it("starts each dataset with a fresh batch", () => {
    const validator = new SampleValidator();
    validator.validate('CREATE ActorMixer "Nowhere" UNDER "Default Work Unit"');
    const again = validateDataset(row('CREATE Sound "Lost" UNDER "Nowhere"'), validator);
    expect(again.stats.dependencyWarnings).toBe(1);
  });
});

describe("validateDatasetFile", () => {
  it("reads the dataset from disk", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wwdsl-dataset-"));
    const file = path.join(dir, "samples.jsonl");
    fs.writeFileSync(file, DATASET);

    expect(validateDatasetFile(file).stats).toEqual(validateDataset(DATASET).stats);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("throws when the file is missing", () => {
    expect(() => validateDatasetFile(path.join(os.tmpdir(), "wwdsl-absent", "none.jsonl"))).toThrow(/ENOENT/);
  });
});

describe("formatDatasetReport", () => {
  it("summarizes counters, failures and warning codes", () => {
    const text = formatDatasetReport(validateDataset(DATASET)).split("\n");
    expect(text.slice(0, 7)).toEqual([
      "DSL validation report",
      "Total samples:        7",
      "Valid:                3 (42.9%)",
      "Invalid:              4 (57.1%)",
      "Syntax errors:        3",
      "Semantic errors:      3",
      "Dependency warnings:  1",
    ]);
    expect(text).toContain("  Line 3: Line 1: Invalid reference type 'Bogus'");
    expect(text).toContain("  Line 4: Invalid JSON record: expected an object");
    expect(text).toContain("  Line 6: DSL output is empty");
    expect(text.slice(-3)).toEqual([
      "Most common warnings:",
      "  W0103 Unknown reference slot '{slot}' passed through: 1",
      "  W0301 Parent '{parent}' not found in context (object: {name}): 1",
    ]);
  });
});
