// src/compiler/compiler.ts
// Forward compiler: DSL text → execution plan
//
// Each line is read independently; a bad line records a diagnostic and is
// skipped, so compile() never throws on input.

import { readLines } from "../dsl/reader";
import type { Instruction } from "../dsl/types";
import { parseValue, plainValue } from "../dsl/value";
import { makeDiagnostic } from "../outcome/codes";
import { errorsOf, warningsOf, type Diagnostic, type Span } from "../outcome/diagnostic";
import type { ProjectLookup } from "../registry/types";
import { PLAY_ACTION_CODE, actionCode } from "../tables/actions";
import { ASSET_KINDS } from "../tables/kinds";
import { normalizeReference, normalizeType } from "../tables/types";
import { WAAPI, type Plan, type PlanStep, type PlanValue } from "./plan";
import { contentWorkUnit, resolveFixedParent, resolveParent, resolveReferenceTarget } from "./resolve";

export interface CompileResult {
  plan: Plan;
  /** Rendered error diagnostics ("Line N: message"). */
  errors: string[];
  warnings: string[];
  diagnostics: Diagnostic[];
}

/**
 * Base name of an audio file without its extension. Accepts either separator.
 */
export function soundNameFromFile(file: string): string {
  const segments = file.split(/[\\/]/);
  const base = segments[segments.length - 1] ?? file;
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

function actionStep(event: string, keyword: string, target: string, value: string | undefined, span: Span, diags: Diagnostic[]): PlanStep {
  let code = actionCode(keyword);
  if (code === undefined) {
    diags.push(makeDiagnostic("W0104", { action: keyword }, span));
    code = PLAY_ACTION_CODE;
  }

  const args: Record<string, PlanValue> = {
    parent: event,
    type: "Action",
    name: "",
    onNameConflict: "merge",
    "@ActionType": code,
    "@Target": target,
  };

  const key = keyword.toLowerCase();
  if (value !== undefined && key === "setswitch") args["@SwitchValue"] = value;
  if (value !== undefined && key === "setstate") args["@StateValue"] = value;

  return { action: WAAPI.create, args };
}

/**
 * Compiles DSL to plan steps. The optional registry is read-only and may be
 * shared between compilers.
 */
export class ForwardCompiler {
  constructor(private readonly registry?: ProjectLookup) {}

  compile(input: string | readonly string[]): CompileResult {
    const plan: Plan = [];
    const diagnostics: Diagnostic[] = [];

    for (const result of readLines(input)) {
      switch (result.tag) {
        case "skip":
          break;
        case "malformed":
        case "unrecognized":
          diagnostics.push(result.diagnostic);
          break;
        case "instruction":
          diagnostics.push(...result.warnings);
          plan.push(...this.emit(result.instruction, { line: result.line }, diagnostics));
          break;
      }
    }

    return {
      plan,
      errors: errorsOf(diagnostics),
      warnings: warningsOf(diagnostics),
      diagnostics,
    };
  }

  /**
   * Plan steps for one instruction.
   */
  emit(ins: Instruction, span: Span, diags: Diagnostic[]): PlanStep[] {
    switch (ins.kind) {
      case "CREATE":
        return this.emitCreate(ins.type, ins.name, ins.parent, span, diags);

      case "SET_PROP":
        return [{
          action: WAAPI.setProperty,
          args: { object: ins.object, property: ins.property, value: plainValue(parseValue(ins.value)) },
        }];

      case "LINK":
        return this.emitLink(ins.object, ins.target, ins.slot, span, diags);

      case "ASSIGN":
        return [{
          action: WAAPI.addAssignment,
          args: { child: ins.child, stateOrSwitch: ins.target },
        }];

      case "ADD_ACTION":
        return [actionStep(ins.event, ins.action, ins.target, ins.value, span, diags)];

      case "CREATE_EVENT": {
        const parent = resolveFixedParent(ins.parent ?? "Default Work Unit", "Event");
        return [
          { action: WAAPI.create, args: { type: "Event", name: ins.event, parent, onNameConflict: "merge" } },
          actionStep(ins.event, "play", ins.target, undefined, span, diags),
        ];
      }

      case "IMPORT_AUDIO": {
        const name = ins.name ?? soundNameFromFile(ins.file);
        const parent = resolveFixedParent(ins.parent, "Sound");
        return [{
          action: WAAPI.importAudio,
          args: {
            importOperation: "useExisting",
            default: { importLanguage: "SFX" },
            imports: [{ audioFile: ins.file, objectPath: `<Sound>${name}`, parent }],
          },
        }];
      }

      case "SET_RTPC_CURVE":
        return [{
          action: WAAPI.setAttenuationCurve,
          args: {
            object: ins.object,
            curveType: ins.property,
            use: ins.gameParameter,
            points: ins.points.map(p => ({ x: p.x, y: p.y, shape: "Linear" })),
          },
        }];

      case "DELETE":
        return [{ action: WAAPI.delete, args: { object: ins.object } }];

      case "COPY":
        return [{
          action: WAAPI.copy,
          args: { object: ins.source, parent: ins.parent, onNameConflict: "rename" },
          options: { return: ["name", "id"] },
        }];

      case "MOVE":
        return [{
          action: WAAPI.move,
          args: { object: ins.object, parent: ins.parent, onNameConflict: "rename" },
        }];

      case "RENAME":
        return [{ action: WAAPI.setName, args: { object: ins.object, value: ins.newName } }];
    }
  }

  private emitCreate(rawType: string, name: string, rawParent: string, span: Span, diags: Diagnostic[]): PlanStep[] {
    const normalized = normalizeType(rawType);
    if (normalized.tag === "unrecognized") {
      diags.push(makeDiagnostic("W0102", { type: rawType }, span));
    }

    let kind = normalized.value;
    let parent = resolveParent(rawParent, kind, this.registry).value;
    const steps: PlanStep[] = [];

    if (this.registry && ASSET_KINDS.has(kind)) {
      const redirect = contentWorkUnit(this.registry, parent, rawParent);
      if (redirect) {
        steps.push(redirect.step);
        parent = redirect.parent;
      }
    }

    // Work units only nest at the top of a hierarchy.
    if (kind === "WorkUnit" && (parent.startsWith("{") || parent.toLowerCase().includes("\\actor-mixer hierarchy\\"))) {
      kind = "ActorMixer";
    }

    steps.push({
      action: WAAPI.create,
      args: { type: kind, name, parent, onNameConflict: kind === "WorkUnit" ? "rename" : "merge" },
    });
    return steps;
  }

  private emitLink(object: string, rawTarget: string, rawSlot: string, span: Span, diags: Diagnostic[]): PlanStep[] {
    const normalized = normalizeReference(rawSlot);
    if (normalized.tag === "unrecognized") {
      diags.push(makeDiagnostic("W0103", { slot: rawSlot }, span));
    }

    const slot = normalized.value;
    const target = resolveReferenceTarget(rawTarget, slot, this.registry);
    const steps: PlanStep[] = [];

    if (slot === "OutputBus") {
      steps.push({ action: WAAPI.setProperty, args: { object, property: "OverrideOutput", value: true } });
    }
    if (slot === "Attenuation") {
      steps.push({ action: WAAPI.setProperty, args: { object, property: "OverridePositioning", value: true } });
    }

    steps.push({ action: WAAPI.setReference, args: { object, reference: slot, value: target } });
    return steps;
  }
}

export function compile(input: string | readonly string[], registry?: ProjectLookup): CompileResult {
  return new ForwardCompiler(registry).compile(input);
}
