import type { Diagnostic } from "../outcome/diagnostic";
import { dependencyPass } from "./passes/dependency";
import { semanticPass } from "./passes/semantic";
import { syntaxPass } from "./passes/syntax";
import {
  LEVEL_ORDER,
  type LevelOutcome,
  type PassConfig,
  type PassResult,
  type RunOutcome,
  type SampleContext,
  type SeverityOverride,
  type ValidationLevel,
  type ValidationPass,
  type ValidatorConfig,
} from "./types";

const DEFAULT_CONFIG: ValidatorConfig = { passes: {} };

export class ValidatorRunner {
  private passes: Map<string, ValidationPass> = new Map();
  private config: ValidatorConfig;

  constructor(config: Partial<ValidatorConfig> = DEFAULT_CONFIG) {
    this.config = { passes: config.passes ?? {} };
  }

  register(pass: ValidationPass): void {
    if (this.passes.has(pass.id)) {
      throw new Error(`Pass already registered: ${pass.id}`);
    }
    this.passes.set(pass.id, pass);
  }

  /**
   * Run passes level by level; a level with a failing pass ends the run.
   */
  run(ctx: SampleContext): RunOutcome {
    const diagnostics: Diagnostic[] = [];
    const passResults = new Map<string, PassResult>();
    const levels = initialLevels();
    const sorted = this.resolvePassOrder();

    for (const level of LEVEL_ORDER) {
      const levelPasses = sorted.filter(p => p.level === level);
      if (levelPasses.length === 0) continue;

      const outcome = levels[level];
      outcome.ran = true;

      for (const pass of levelPasses) {
        const config = this.getPassConfig(pass.id);
        const result = pass.run(ctx);
        passResults.set(pass.id, result);
        diagnostics.push(...applySeverityOverride(result.diagnostics, config.severityOverride));

        // A pass demoted below error no longer gates later levels.
        const gates = config.severityOverride === undefined || config.severityOverride === "error";
        if (!result.ok && gates) outcome.ok = false;
      }

      if (!outcome.ok) break;
    }

    return { diagnostics, passResults, levels };
  }

  private resolvePassOrder(): ValidationPass[] {
    const enabledPasses = Array.from(this.passes.values()).filter(p => this.isPassEnabled(p.id));
    const passLookup = new Map(enabledPasses.map(p => [p.id, p]));
    const ordered: ValidationPass[] = [];
    const executed = new Set<string>();

    for (const pass of enabledPasses) {
      for (const dep of this.enabledDependencies(pass)) {
        if (!passLookup.has(dep)) {
          throw new Error(`Pass dependency not registered: ${dep}`);
        }
      }
    }

    for (const level of LEVEL_ORDER) {
      const levelPasses = enabledPasses.filter(p => p.level === level);
      if (levelPasses.length === 0) continue;

      const indegree = new Map<string, number>();
      const edges = new Map<string, Set<string>>();

      for (const pass of levelPasses) {
        indegree.set(pass.id, 0);
        edges.set(pass.id, new Set());
      }

      for (const pass of levelPasses) {
        for (const dep of this.enabledDependencies(pass)) {
          const depPass = passLookup.get(dep);
          if (!depPass) continue;

          const depIndex = LEVEL_ORDER.indexOf(depPass.level);
          const passIndex = LEVEL_ORDER.indexOf(pass.level);

          if (depIndex > passIndex) {
            throw new Error(`Pass ${pass.id} depends on ${dep} in later level ${depPass.level}`);
          }
          if (depIndex < passIndex) {
            if (!executed.has(dep)) {
              throw new Error(`Pass dependency has not run: ${dep} (required by ${pass.id})`);
            }
            continue;
          }

          edges.get(dep)?.add(pass.id);
          indegree.set(pass.id, (indegree.get(pass.id) ?? 0) + 1);
        }
      }

      const ready = levelPasses
        .filter(p => (indegree.get(p.id) ?? 0) === 0)
        .sort((a, b) => a.id.localeCompare(b.id));

      let processed = 0;
      for (let next = ready.shift(); next !== undefined; next = ready.shift()) {
        ordered.push(next);
        executed.add(next.id);
        processed++;

        for (const target of edges.get(next.id) ?? []) {
          const updated = (indegree.get(target) ?? 0) - 1;
          indegree.set(target, updated);
          const targetPass = passLookup.get(target);
          if (updated === 0 && targetPass) {
            ready.push(targetPass);
            ready.sort((a, b) => a.id.localeCompare(b.id));
          }
        }
      }

      if (processed !== levelPasses.length) {
        throw new Error(`Pass dependency cycle detected in level ${level}`);
      }
    }

    return ordered;
  }

  private getPassConfig(passId: string): PassConfig {
    return this.config.passes[passId] ?? { enabled: true };
  }

  private isPassEnabled(passId: string): boolean {
    const config = this.getPassConfig(passId);
    return config.enabled !== false && config.severityOverride !== "off";
  }

  private enabledDependencies(pass: ValidationPass): string[] {
    return (pass.dependencies ?? []).filter(dep => this.isPassEnabled(dep));
  }
}

function initialLevels(): Record<ValidationLevel, LevelOutcome> {
  return {
    syntax: { ran: false, ok: true },
    semantic: { ran: false, ok: true },
    dependency: { ran: false, ok: true },
  };
}

function applySeverityOverride(diagnostics: Diagnostic[], override?: SeverityOverride): Diagnostic[] {
  if (!override || override === "off") {
    return diagnostics;
  }
  return diagnostics.map(d => ({ ...d, severity: override }));
}

export function createDefaultRunner(config?: Partial<ValidatorConfig>): ValidatorRunner {
  const runner = new ValidatorRunner(config ?? DEFAULT_CONFIG);
  runner.register(syntaxPass);
  runner.register(semanticPass);
  runner.register(dependencyPass);
  return runner;
}
