// test/reverse/project.spec.ts
// Batch decompilation into a JSONL dataset

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { readJsonLinesFile } from "../../src/io/jsonl";
import { collectWorkUnitFiles, formatDecompileReport, ProjectDecompiler } from "../../src/reverse/project";
import { toRecord, type SampleStage } from "../../src/reverse/sample";

const fixtures = fileURLToPath(new URL("../fixtures", import.meta.url));

let dir: string;
let logs: string[];

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "wwdsl-decompile-"));
  logs = [];
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("collectWorkUnitFiles", () => {
  it("walks directories and keeps only .wwu files", () => {
    const files = collectWorkUnitFiles([fixtures], line => logs.push(line));
    expect(files.map(f => path.basename(f)).sort()).toEqual(["Broken.wwu", "Combat.wwu", "Weapons.wwu"]);
    expect(logs).toEqual([`  scanned ${fixtures}: 3 .wwu files`]);
  });

  it("strips quotes, skips missing paths and de-duplicates", () => {
    const weapons = path.join(fixtures, "Weapons.wwu");
    const files = collectWorkUnitFiles([`"${weapons}"`, weapons, path.join(fixtures, "notes.txt"), path.join(dir, "missing")], line => logs.push(line));
    expect(files).toEqual([weapons]);
    expect(logs).toEqual([
      `  skip (not a .wwu file): ${path.join(fixtures, "notes.txt")}`,
      `  skip (not found): ${path.join(dir, "missing")}`,
    ]);
  });
});

describe("ProjectDecompiler", () => {
  it("writes one record per sample and reports failed files", () => {
    const output = path.join(dir, "out", "samples.jsonl");
    const report = new ProjectDecompiler({ output, log: line => logs.push(line) }).run([fixtures]);

    expect(report.files).toHaveLength(3);
    expect(report.failed.map(f => path.basename(f.file))).toEqual(["Broken.wwu"]);
    expect(report.samples).toBe(3);
    expect(report.complexity).toEqual({ simple: 0, medium: 0, complex: 0, expert: 3 });
    expect(report.stats).toEqual({ creates: 9, setProps: 1, links: 3, assigns: 4, actions: 2 });

    const rows = readJsonLinesFile(output);
    expect(rows).toHaveLength(3);
    const records = rows.map(r => (r.ok ? toRecord(r.value) : undefined));
    const event = records.find(r => r?.meta.root_type === "Event");
    expect(event).toEqual({
      instruction: "",
      input: "",
      output: [
        'CREATE Event "Play_Gun_Shot" UNDER "Default Work Unit"',
        'ADD_ACTION "Play_Gun_Shot" PLAY "Gun_Shot"',
        'ADD_ACTION "Play_Gun_Shot" STOP "Music_Loop"',
      ].join("\n"),
      meta: {
        source: "Combat.wwu",
        root_type: "Event",
        root_name: "Play_Gun_Shot",
        line_count: 3,
        depth: 0,
        complexity: "expert",
        commands: { CREATE: 1, SET_PROP: 0, LINK: 0, ASSIGN: 0, ADD_ACTION: 2 },
      },
    });
  });

  it("appends instead of replacing when asked", () => {
    const output = path.join(dir, "samples.jsonl");
    const weapons = path.join(fixtures, "Weapons.wwu");
    new ProjectDecompiler({ output, log: () => {} }).run([weapons]);
    new ProjectDecompiler({ output, append: true, log: () => {} }).run([weapons]);
    expect(readJsonLinesFile(output)).toHaveLength(4);
  });

  it("runs later stages over every record", () => {
    const output = path.join(dir, "samples.jsonl");
    const tagged: SampleStage = {
      name: "tag",
      apply: record => [record, { ...record, instruction: "variant", meta: { ...record.meta, variant: true } }],
    };
    const report = new ProjectDecompiler({ output, stages: [tagged], log: () => {} }).run([path.join(fixtures, "Combat.wwu")]);
    expect(report.samples).toBe(2);

    const rows = readJsonLinesFile(output).map(r => (r.ok ? toRecord(r.value) : undefined));
    expect(rows[1]?.instruction).toBe("variant");
    expect(rows[1]?.meta.variant).toBe(true);
    expect(rows[1]?.output).toBe(rows[0]?.output);
  });

  it("writes nothing and reports it when no files are found", () => {
    const output = path.join(dir, "samples.jsonl");
    const report = new ProjectDecompiler({ output, log: line => logs.push(line) }).run([path.join(dir, "missing")]);
    expect(report.samples).toBe(0);
    expect(fs.existsSync(output)).toBe(false);
    expect(logs[logs.length - 1]).toBe("no .wwu files found");
  });

  it("formats a report", () => {
    const output = path.join(dir, "samples.jsonl");
    const report = new ProjectDecompiler({ output, log: () => {} }).run([path.join(fixtures, "Combat.wwu")]);
    const text = formatDecompileReport(report).split("\n");
    expect(text[0]).toBe("Reverse compilation report");
    expect(text).toContain("Samples written:  1");
    expect(text).toContain("  expert       1 (100.0%)");
    expect(text).toContain("  ADD_ACTION  2");
  });
});

describe("toRecord", () => {
  it("requires an output string", () => {
    expect(toRecord({ instruction: "x" })).toBeUndefined();
    expect(toRecord("text")).toBeUndefined();
  });

  it("fills missing fields with zero values", () => {
    expect(toRecord({ output: 'DELETE "A"' })).toEqual({
      instruction: "",
      input: "",
      output: 'DELETE "A"',
      meta: {
        source: "",
        root_type: "",
        root_name: "",
        line_count: 0,
        depth: 0,
        complexity: "simple",
        commands: { CREATE: 0, SET_PROP: 0, LINK: 0, ASSIGN: 0, ADD_ACTION: 0 },
      },
    });
  });
});
