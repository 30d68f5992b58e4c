// test/outcome/diagnostic.spec.ts
// Diagnostic construction and rendering

import { describe, it, expect } from "vitest";
import { isDiagnosticCode, makeDiagnostic } from "../../src/outcome/codes";
import { errorDiag, errorsOf, formatDiagnostic, hasErrors, warnDiag, warningsOf } from "../../src/outcome/diagnostic";

describe("makeDiagnostic", () => {
  it("fills the code template and keeps the parameters", () => {
    const diag = makeDiagnostic("W0301", { parent: "Weapons", name: "Gun" }, { line: 4 });
    expect(diag).toEqual({
      code: "W0301",
      severity: "warning",
      message: "Parent 'Weapons' not found in context (object: Gun)",
      span: { line: 4 },
      data: { parent: "Weapons", name: "Gun" },
    });
  });

  it("inserts parameter text literally", () => {
    const diag = makeDiagnostic("W0302", { target: "Bus_$&_$'", name: "Hit" });
    expect(diag.message).toBe("Reference target 'Bus_$&_$'' may not exist (object: Hit)");
  });

  it("leaves span and data out when not given", () => {
    expect(makeDiagnostic("E0104")).toEqual({ code: "E0104", severity: "error", message: "DSL output is empty" });
  });

  it("recognizes table codes only", () => {
    expect(isDiagnosticCode("E0201")).toBe(true);
    expect(isDiagnosticCode("E9999")).toBe(false);
    expect(isDiagnosticCode("toString")).toBe(false);
  });
});

describe("diagnostic rendering", () => {
  const diags = [
    errorDiag("E0101", "Malformed LINK instruction", { span: { line: 2 } }),
    warnDiag("W0105", "Trailing text ignored: x"),
    errorDiag("E0104", "DSL output is empty"),
  ];

  it("prefixes the line number when there is a span", () => {
    expect(formatDiagnostic(diags[0])).toBe("Line 2: Malformed LINK instruction");
    expect(formatDiagnostic(diags[1])).toBe("Trailing text ignored: x");
  });

  it("splits by severity", () => {
    expect(errorsOf(diags)).toEqual(["Line 2: Malformed LINK instruction", "DSL output is empty"]);
    expect(warningsOf(diags)).toEqual(["Trailing text ignored: x"]);
    expect(hasErrors(diags)).toBe(true);
    expect(hasErrors([diags[1]])).toBe(false);
  });
});
