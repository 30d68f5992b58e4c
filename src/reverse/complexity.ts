// src/reverse/complexity.ts
// Sample complexity tiers

import type { Instruction } from "../dsl/types";

export type Complexity = "simple" | "medium" | "complex" | "expert";

export const COMPLEXITY_TIERS: readonly Complexity[] = ["simple", "medium", "complex", "expert"];

/** Per-family line counts of a sample. */
export interface SampleCommands {
  CREATE: number;
  SET_PROP: number;
  LINK: number;
  ASSIGN: number;
  ADD_ACTION: number;
}

export function countCommands(instructions: readonly Instruction[]): SampleCommands {
  const counts: SampleCommands = { CREATE: 0, SET_PROP: 0, LINK: 0, ASSIGN: 0, ADD_ACTION: 0 };
  for (const ins of instructions) {
    switch (ins.kind) {
      case "CREATE":
      case "SET_PROP":
      case "LINK":
      case "ASSIGN":
      case "ADD_ACTION":
        counts[ins.kind]++;
        break;
      default:
        break;
    }
  }
  return counts;
}

/**
 * Tier a sample. Switch/state assignments, event actions, heavy routing or
 * deep nesting are always "expert"; otherwise size and depth decide.
 */
export function classifyComplexity(commands: SampleCommands, lineCount: number, depth: number): Complexity {
  if (commands.ASSIGN > 0 || commands.ADD_ACTION > 0 || commands.LINK >= 3 || depth >= 3) {
    return "expert";
  }
  if (lineCount <= 3 && depth <= 1) return "simple";
  if (lineCount <= 10 && depth <= 2) return "medium";
  return "complex";
}
