import { soundNameFromFile } from "../../compiler/compiler";
import { isVerbatimPath } from "../../compiler/resolve";
import type { Instruction } from "../../dsl/types";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { PassResult, SampleContext, ValidationPass } from "../types";

/**
 * Name an instruction brings into existence, if any.
 */
export function introducedName(ins: Instruction): string | undefined {
  switch (ins.kind) {
    case "CREATE":
      return ins.name;
    case "CREATE_EVENT":
      return ins.event;
    case "IMPORT_AUDIO":
      return ins.name ?? soundNameFromFile(ins.file);
    case "COPY":
    case "RENAME":
      return ins.newName;
    default:
      return undefined;
  }
}

/**
 * Replays the sample in order and warns on names used before anything
 * created them. Paths, identifiers and queries are not checked.
 */
export const dependencyPass: ValidationPass = {
  id: "validate/dependency",
  name: "Dependency Check",
  level: "dependency",
  dependencies: ["validate/semantic"],
  run(ctx: SampleContext): PassResult {
    const diagnostics: Diagnostic[] = [];
    const local = new Set<string>();
    const known = (name: string) =>
      isVerbatimPath(name) || local.has(name) || ctx.knownNames.has(name) || ctx.systemObjects.has(name);

    for (const result of ctx.lines) {
      if (result.tag !== "instruction") continue;
      const ins = result.instruction;
      const span = { line: result.line };

      const created = introducedName(ins);
      if (created !== undefined) local.add(created);

      switch (ins.kind) {
        case "CREATE":
          if (!known(ins.parent)) {
            diagnostics.push(makeDiagnostic("W0301", { parent: ins.parent, name: ins.name }, span));
          }
          break;
        case "LINK":
          if (!known(ins.target)) {
            diagnostics.push(makeDiagnostic("W0302", { target: ins.target, name: ins.object }, span));
          }
          break;
        case "ASSIGN":
          if (!known(ins.target)) {
            diagnostics.push(makeDiagnostic("W0303", { target: ins.target, name: ins.child }, span));
          }
          break;
        default:
          break;
      }
    }

    return { ok: diagnostics.length === 0, diagnostics };
  },
};
