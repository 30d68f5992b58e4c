// src/compiler/plan.ts
// Execution plan: ordered remote-procedure steps against the authoring API

/**
 * JSON-compatible argument value.
 */
export type PlanValue =
  | string
  | number
  | boolean
  | PlanValue[]
  | { [key: string]: PlanValue };

export interface PlanStep {
  action: string;
  args: Record<string, PlanValue>;
  options?: { return: string[] };
}

export type Plan = PlanStep[];

/** Remote procedure names used by emitted steps. */
export const WAAPI = {
  create: "ak.wwise.core.object.create",
  setProperty: "ak.wwise.core.object.setProperty",
  setReference: "ak.wwise.core.object.setReference",
  addAssignment: "ak.wwise.core.switchContainer.addAssignment",
  delete: "ak.wwise.core.object.delete",
  copy: "ak.wwise.core.object.copy",
  move: "ak.wwise.core.object.move",
  setName: "ak.wwise.core.object.setName",
  importAudio: "ak.wwise.core.audio.import",
  setAttenuationCurve: "ak.wwise.core.object.setAttenuationCurve",
} as const;

export type PlanCheck = { ok: true } | { ok: false; reason: string };

export function validatePlan(plan: Plan): PlanCheck {
  if (plan.length === 0) return { ok: false, reason: "empty plan" };
  return { ok: true };
}

export type CommandCounts = {
  CREATE: number;
  SET_PROP: number;
  LINK: number;
  ASSIGN: number;
  ADD_ACTION: number;
  OTHER: number;
};

export function emptyCommandCounts(): CommandCounts {
  return { CREATE: 0, SET_PROP: 0, LINK: 0, ASSIGN: 0, ADD_ACTION: 0, OTHER: 0 };
}

/**
 * Count plan steps by the DSL command family that produced them.
 * Action creates count as ADD_ACTION.
 */
export function summarizePlan(plan: Plan): CommandCounts {
  const counts = emptyCommandCounts();
  for (const step of plan) {
    switch (step.action) {
      case WAAPI.create:
        if (step.args.type === "Action") counts.ADD_ACTION++;
        else counts.CREATE++;
        break;
      case WAAPI.setProperty:
        counts.SET_PROP++;
        break;
      case WAAPI.setReference:
        counts.LINK++;
        break;
      case WAAPI.addAssignment:
        counts.ASSIGN++;
        break;
      default:
        counts.OTHER++;
    }
  }
  return counts;
}
