import type { Plan, CommandCounts } from "../compiler/plan";
import type { LineResult } from "../dsl/types";
import type { Diagnostic } from "../outcome/diagnostic";

export type ValidationLevel = "syntax" | "semantic" | "dependency";

export const LEVEL_ORDER: readonly ValidationLevel[] = ["syntax", "semantic", "dependency"];

/**
 * What a pass sees of one sample.
 */
export interface SampleContext {
  /** DSL text of the sample. */
  output: string;
  lines: LineResult[];
  /** Names created by earlier valid samples of the batch. */
  knownNames: ReadonlySet<string>;
  /** Objects every project has. */
  systemObjects: ReadonlySet<string>;
}

export interface PassResult {
  /** False stops the runner after this pass's level. */
  ok: boolean;
  diagnostics: Diagnostic[];
  plan?: Plan;
}

export interface ValidationPass {
  id: string;
  name: string;
  level: ValidationLevel;
  dependencies?: string[];
  run(ctx: SampleContext): PassResult;
}

export type SeverityOverride = "error" | "warning" | "info" | "off";

export interface PassConfig {
  enabled: boolean;
  severityOverride?: SeverityOverride;
}

export interface ValidatorConfig {
  passes: Record<string, PassConfig>;
  systemObjects?: string[];
}

export interface LevelOutcome {
  ran: boolean;
  ok: boolean;
}

export interface RunOutcome {
  diagnostics: Diagnostic[];
  passResults: Map<string, PassResult>;
  levels: Record<ValidationLevel, LevelOutcome>;
}

export interface ValidationResult {
  valid: boolean;
  syntaxOk: boolean;
  semanticOk: boolean;
  dependencyOk: boolean;
  /** Rendered diagnostics ("Line N: message"). */
  errors: string[];
  warnings: string[];
  diagnostics: Diagnostic[];
  planLength: number;
  commandsFound: CommandCounts;
}
