import { compile } from "../../compiler/compiler";
import { validatePlan } from "../../compiler/plan";
import { makeDiagnostic } from "../../outcome/codes";
import type { PassResult, SampleContext, ValidationPass } from "../types";

/**
 * Compiles the sample; an empty plan fails the level. Compiler diagnostics
 * are reported as they are.
 */
export const syntaxPass: ValidationPass = {
  id: "validate/syntax",
  name: "Syntax Check",
  level: "syntax",
  run(ctx: SampleContext): PassResult {
    if (!ctx.output.trim()) {
      return { ok: false, diagnostics: [makeDiagnostic("E0104")] };
    }

    const { plan, diagnostics } = compile(ctx.output);
    if (!validatePlan(plan).ok) {
      return { ok: false, diagnostics: [...diagnostics, makeDiagnostic("E0103")], plan };
    }
    return { ok: true, diagnostics, plan };
  },
};
