import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { isObjectKind } from "../../tables/kinds";
import { isWhitelistedProperty } from "../../tables/properties";
import { normalizeReference } from "../../tables/types";
import type { PassResult, SampleContext, ValidationPass } from "../types";

export const semanticPass: ValidationPass = {
  id: "validate/semantic",
  name: "Semantic Check",
  level: "semantic",
  dependencies: ["validate/syntax"],
  run(ctx: SampleContext): PassResult {
    const diagnostics: Diagnostic[] = [];
    let ok = true;

    for (const result of ctx.lines) {
      if (result.tag !== "instruction") continue;
      const ins = result.instruction;
      const span = { line: result.line };

      switch (ins.kind) {
        case "CREATE":
          if (!isObjectKind(ins.type)) {
            diagnostics.push(makeDiagnostic("W0201", { type: ins.type }, span));
          }
          break;
        case "SET_PROP":
          if (!isWhitelistedProperty(ins.property)) {
            diagnostics.push(makeDiagnostic("W0202", { property: ins.property }, span));
          }
          break;
        case "LINK":
          if (normalizeReference(ins.slot).tag === "unrecognized") {
            diagnostics.push(makeDiagnostic("E0201", { slot: ins.slot }, span));
            ok = false;
          }
          break;
        default:
          break;
      }
    }

    return { ok, diagnostics };
  },
};
