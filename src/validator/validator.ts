// src/validator/validator.ts
// Batch-scoped three-level sample validator

import { emptyCommandCounts, summarizePlan } from "../compiler/plan";
import { readLines } from "../dsl/reader";
import { errorsOf, hasErrors, warningsOf } from "../outcome/diagnostic";
import { introducedName } from "./passes/dependency";
import { createDefaultRunner, type ValidatorRunner } from "./runner";
import type { ValidationResult, ValidatorConfig } from "./types";

export const SYSTEM_OBJECTS: readonly string[] = [
  "Master Audio Bus",
  "Master",
  "Root",
  "Default Work Unit",
  "Default Conversion Settings",
  "Master-Mixer Hierarchy",
  "Actor-Mixer Hierarchy",
  "Events",
  "Switches",
  "States",
  "Game Parameters",
  "Attenuations",
  "Effects",
];

/**
 * Validates samples one after another. Names created by a valid sample are
 * remembered, so later samples may depend on them; reset() starts a new batch.
 */
export class SampleValidator {
  private readonly runner: ValidatorRunner;
  private readonly systemObjects: ReadonlySet<string>;
  private created = new Set<string>();

  constructor(config: Partial<ValidatorConfig> = {}) {
    this.runner = createDefaultRunner(config);
    this.systemObjects = new Set(config.systemObjects ?? SYSTEM_OBJECTS);
  }

  /** Names contributed by valid samples so far. */
  get knownObjects(): ReadonlySet<string> {
    return this.created;
  }

  reset(): void {
    this.created = new Set();
  }

  validate(output: string): ValidationResult {
    const lines = readLines(output);
    const { diagnostics, passResults, levels } = this.runner.run({
      output,
      lines,
      knownNames: this.created,
      systemObjects: this.systemObjects,
    });

    const plan = passResults.get("validate/syntax")?.plan ?? [];
    const syntaxOk = levels.syntax.ok;
    const semanticOk = levels.semantic.ok;
    const valid = syntaxOk && semanticOk && !hasErrors(diagnostics);

    if (valid) {
      for (const result of lines) {
        if (result.tag !== "instruction") continue;
        const name = introducedName(result.instruction);
        if (name !== undefined) this.created.add(name);
      }
    }

    return {
      valid,
      syntaxOk,
      semanticOk,
      dependencyOk: levels.dependency.ran && levels.dependency.ok,
      errors: errorsOf(diagnostics),
      warnings: warningsOf(diagnostics),
      diagnostics,
      planLength: plan.length,
      commandsFound: plan.length > 0 ? summarizePlan(plan) : emptyCommandCounts(),
    };
  }
}
