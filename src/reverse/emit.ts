// src/reverse/emit.ts
// Object node → DSL instructions for that node alone

import type { Instruction } from "../dsl/types";
import { formatPropertyValue } from "../dsl/value";
import type { ObjectNode } from "../project/tree";
import { actionKeywordForCode } from "../tables/actions";
import { isObjectKind } from "../tables/kinds";
import { isDefaultValue, isWhitelistedProperty } from "../tables/properties";

/** Objects every project already has; never created by a sample. */
const BUILT_IN_NAMES: ReadonlySet<string> = new Set(["Default Work Unit", "Master Audio Bus", "Master-Mixer Hierarchy"]);

/** Stored reference slot → keyword written after AS. */
const REFERENCE_KEYWORDS: ReadonlyMap<string, string> = new Map([
  ["OutputBus", "Bus"],
  ["Attenuation", "Attenuation"],
  ["UserAuxSend0", "UserAuxSend0"],
  ["UserAuxSend1", "UserAuxSend1"],
  ["Effect0", "Effect0"],
  ["Effect1", "Effect1"],
  ["Effect2", "Effect2"],
  ["Effect3", "Effect3"],
  ["Conversion", "Conversion"],
  ["SwitchGroupOrStateGroup", "SwitchGroupOrStateGroup"],
  ["StateGroup", "StateGroup"],
  ["GameParameter", "GameParameter"],
]);

export function referenceKeyword(slot: string): string | undefined {
  const mapped = REFERENCE_KEYWORDS.get(slot);
  if (mapped !== undefined) return mapped;
  return slot.includes("Effect") ? slot : undefined;
}

export interface EmitOptions {
  skipDefaults: boolean;
}

/**
 * Instructions for one node. `assignments` are kept apart so the caller can
 * place them after the node's children are created.
 */
export interface NodeInstructions {
  lines: Instruction[];
  assignments: Instruction[];
}

function actionInstruction(action: ObjectNode, event: string): Instruction | undefined {
  const typeProp = action.properties.find(p => p.name === "ActionType");
  const target = action.references.find(r => r.slot === "Target");
  if (!target || !target.targetName) return undefined;
  return {
    kind: "ADD_ACTION",
    event,
    action: actionKeywordForCode(typeProp?.value ?? "1"),
    target: target.targetName,
  };
}

export function nodeInstructions(node: ObjectNode, parentName: string, options: EmitOptions): NodeInstructions {
  const out: NodeInstructions = { lines: [], assignments: [] };
  if (!node.name || !isObjectKind(node.kind)) return out;

  const name = node.name;

  if (!BUILT_IN_NAMES.has(name)) {
    out.lines.push({ kind: "CREATE", type: node.kind, name, parent: parentName });
  }

  for (const prop of node.properties) {
    if (!isWhitelistedProperty(prop.name) || prop.value === "") continue;
    if (options.skipDefaults && isDefaultValue(prop.name, prop.value)) continue;
    out.lines.push({ kind: "SET_PROP", object: name, property: prop.name, value: formatPropertyValue(prop.value) });
  }

  for (const ref of node.references) {
    const keyword = referenceKeyword(ref.slot);
    if (keyword === undefined || !ref.targetName || ref.targetName === "Master Audio Bus") continue;
    out.lines.push({ kind: "LINK", object: name, target: ref.targetName, slot: keyword });
  }

  if (node.kind === "SwitchContainer") {
    for (const a of node.assignments) {
      out.assignments.push({ kind: "ASSIGN", child: a.child, target: a.state });
    }
  }

  if (node.kind === "Event") {
    for (const child of node.children) {
      if (child.kind !== "Action") continue;
      const ins = actionInstruction(child, name);
      if (ins) out.lines.push(ins);
    }
  }

  return out;
}
