// test/dsl/reader.spec.ts
// Line reader: dispatch, argument shapes and diagnostics

import { describe, it, expect } from "vitest";
import { readLine, readLines, parseCurvePoints } from "../../src/dsl/reader";

describe("readLine", () => {
  it("reads CREATE with a multi-word type", () => {
    const r = readLine('CREATE Random Sequence Container "Footsteps" UNDER "Default Work Unit"', 1);
    expect(r).toEqual({
      tag: "instruction",
      line: 1,
      warnings: [],
      instruction: { kind: "CREATE", type: "Random Sequence Container", name: "Footsteps", parent: "Default Work Unit" },
    });
  });

  it("keeps keywords case-insensitive", () => {
    const r = readLine('link "Hit" to "Master" as "Bus"', 4);
    expect(r.tag).toBe("instruction");
    if (r.tag !== "instruction") return;
    expect(r.instruction).toEqual({ kind: "LINK", object: "Hit", target: "Master", slot: "Bus" });
  });

  it("keeps raw backslashes inside quotes", () => {
    const r = readLine('MOVE "Hit" TO "\\Actor-Mixer Hierarchy\\Weapons"', 1);
    if (r.tag !== "instruction") throw new Error(`unexpected ${r.tag}`);
    expect(r.instruction).toEqual({ kind: "MOVE", object: "Hit", parent: "\\Actor-Mixer Hierarchy\\Weapons" });
  });

  it("reads SET_PROP values verbatim", () => {
    const r = readLine('SET_PROP "Hit" "Volume" = -6 dB', 2);
    if (r.tag !== "instruction") throw new Error(`unexpected ${r.tag}`);
    expect(r.instruction).toEqual({ kind: "SET_PROP", object: "Hit", property: "Volume", value: "-6 dB" });
  });

  it("reads ADD_ACTION with and without a value", () => {
    const a = readLine('ADD_ACTION "Play_Hit" Play "Hit"', 1);
    const b = readLine('ADD_ACTION "Set_Surface" SetSwitch "Surface" "Grass"', 2);
    if (a.tag !== "instruction" || b.tag !== "instruction") throw new Error("expected instructions");
    expect(a.instruction).toEqual({ kind: "ADD_ACTION", event: "Play_Hit", action: "Play", target: "Hit" });
    expect(b.instruction).toEqual({ kind: "ADD_ACTION", event: "Set_Surface", action: "SetSwitch", target: "Surface", value: "Grass" });
  });

  it("reads optional clauses of CREATE_EVENT and IMPORT_AUDIO", () => {
    const e = readLine('CREATE_EVENT "Play_Hit" PLAY "Hit"', 1);
    const i = readLine('IMPORT_AUDIO "C:\\audio\\hit.wav" INTO "Weapons" AS "Hit_Sound"', 2);
    if (e.tag !== "instruction" || i.tag !== "instruction") throw new Error("expected instructions");
    expect(e.instruction).toEqual({ kind: "CREATE_EVENT", event: "Play_Hit", target: "Hit" });
    expect(i.instruction).toEqual({ kind: "IMPORT_AUDIO", file: "C:\\audio\\hit.wav", parent: "Weapons", name: "Hit_Sound" });
  });

  it("reads curve points", () => {
    const r = readLine('SET_RTPC_CURVE "Engine" "RPM" "Pitch" POINTS [(0, -1200), (5000, 0.5)]', 1);
    if (r.tag !== "instruction") throw new Error(`unexpected ${r.tag}`);
    expect(r.instruction).toEqual({
      kind: "SET_RTPC_CURVE",
      object: "Engine",
      gameParameter: "RPM",
      property: "Pitch",
      points: [{ x: 0, y: -1200 }, { x: 5000, y: 0.5 }],
    });
  });

  it("strips leading enumeration", () => {
    const r = readLine('3. DELETE "Old"', 3);
    if (r.tag !== "instruction") throw new Error(`unexpected ${r.tag}`);
    expect(r.instruction).toEqual({ kind: "DELETE", object: "Old" });
  });

  it("skips comments, blanks and formatting noise", () => {
    expect(readLine("", 1)).toEqual({ tag: "skip" });
    expect(readLine("# comment", 1)).toEqual({ tag: "skip" });
    expect(readLine("// comment", 1)).toEqual({ tag: "skip" });
    expect(readLine("```", 1)).toEqual({ tag: "skip" });
  });

  it("reports an unknown keyword as unrecognized", () => {
    const r = readLine("PLAY everything loudly", 7);
    expect(r.tag).toBe("unrecognized");
    if (r.tag !== "unrecognized") return;
    expect(r.diagnostic.code).toBe("W0101");
    expect(r.diagnostic.message).toBe("Unrecognized instruction: PLAY everything loudly...");
    expect(r.diagnostic.span).toEqual({ line: 7 });
  });

  it("reports a known keyword with bad arguments as malformed for that keyword", () => {
    const r = readLine('LINK "Hit" "Master" AS "Bus"', 5);
    expect(r.tag).toBe("malformed");
    if (r.tag !== "malformed") return;
    expect(r.kind).toBe("LINK");
    expect(r.diagnostic.code).toBe("E0101");
    expect(r.diagnostic.message).toBe("Malformed LINK instruction: expected TO");
  });

  it("reports an invalid curve point", () => {
    const r = readLine('SET_RTPC_CURVE "Engine" "RPM" "Pitch" POINTS [(0, 1), (x, 2)]', 1);
    if (r.tag !== "malformed") throw new Error(`unexpected ${r.tag}`);
    expect(r.diagnostic.code).toBe("E0102");
    expect(r.diagnostic.message).toBe("Invalid curve point '(x, 2)'");
  });

  it("warns on trailing text", () => {
    const r = readLine('DELETE "Old" please', 1);
    if (r.tag !== "instruction") throw new Error(`unexpected ${r.tag}`);
    expect(r.warnings.map(w => w.message)).toEqual(["Trailing text ignored: please"]);
  });
});

describe("readLines", () => {
  it("numbers lines from 1 and handles CRLF", () => {
    const results = readLines('# header\r\nDELETE "A"\r\nDELETE "B"');
    expect(results.map(r => r.tag)).toEqual(["skip", "instruction", "instruction"]);
    const lines = results.flatMap(r => (r.tag === "instruction" ? [r.line] : []));
    expect(lines).toEqual([2, 3]);
  });
});

describe("parseCurvePoints", () => {
  it("returns no points for text without pairs", () => {
    expect(parseCurvePoints("nothing")).toEqual([]);
  });
});
