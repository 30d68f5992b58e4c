// src/core/config/config.ts
// Configuration for the compilers, the validator and the CLI

import * as fs from "fs";
import * as path from "path";
import type { PassConfig, SeverityOverride } from "../../validator/types";
import { SYSTEM_OBJECTS } from "../../validator/validator";

// =========================================================================
// Configuration Types
// =========================================================================

export type ReverseConfig = {
  /** Leaf sounds become samples of their own */
  includeSounds: boolean;
  /** Leave out properties still at their default value */
  skipDefaults: boolean;
};

export type ValidatorSettings = {
  /** Names assumed to exist in every project */
  systemObjects: string[];
  /** Per-pass enable/severity settings, keyed by pass id */
  passes: Record<string, PassConfig>;
};

export type CliConfig = {
  verbose: boolean;
};

export type WwdslConfig = {
  reverse: ReverseConfig;
  validator: ValidatorSettings;
  cli: CliConfig;
};

/** A configuration layer: any subset of fields. */
export type ConfigLayer = {
  reverse?: Partial<ReverseConfig>;
  validator?: Partial<ValidatorSettings>;
  cli?: Partial<CliConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_REVERSE_CONFIG: ReverseConfig = {
  includeSounds: false,
  skipDefaults: true,
};

export const DEFAULT_VALIDATOR_SETTINGS: ValidatorSettings = {
  systemObjects: [...SYSTEM_OBJECTS],
  passes: {},
};

export const DEFAULT_CONFIG: WwdslConfig = {
  reverse: DEFAULT_REVERSE_CONFIG,
  validator: DEFAULT_VALIDATOR_SETTINGS,
  cli: { verbose: false },
};

export const KNOWN_PASS_IDS: readonly string[] = ["validate/syntax", "validate/semantic", "validate/dependency"];

const CONFIG_FILE_NAMES = ["wwdsl.config.json", "wwdsl.config.yaml", "wwdsl.config.yml"];

// =========================================================================
// Value readers
// =========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBool(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return undefined;
  const v = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return undefined;
}

/** A list, or a comma-separated string. */
function readStringList(value: unknown): string[] | undefined {
  if (typeof value === "string") {
    return value.split(",").map(s => s.trim()).filter(s => s.length > 0);
  }
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string");
  }
  return undefined;
}

function isSeverityOverride(value: unknown): value is SeverityOverride {
  return value === "error" || value === "warning" || value === "info" || value === "off";
}

function readPasses(value: unknown): Record<string, PassConfig> | undefined {
  if (!isRecord(value)) return undefined;
  const passes: Record<string, PassConfig> = {};
  for (const [id, raw] of Object.entries(value)) {
    if (!isRecord(raw)) continue;
    const severity = raw.severityOverride ?? raw.severity_override;
    const pass: PassConfig = { enabled: readBool(raw.enabled) ?? true };
    if (isSeverityOverride(severity)) pass.severityOverride = severity;
    passes[id] = pass;
  }
  return passes;
}

/** First defined value among camelCase and snake_case spellings. */
function pick(data: Record<string, unknown>, camel: string, snake: string): unknown {
  return data[camel] ?? data[snake];
}

/** The layer section, or undefined when none of its fields is set. */
function compact<T extends Record<string, unknown>>(obj: T): T | undefined {
  return Object.values(obj).some(v => v !== undefined) ? obj : undefined;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Configuration layer from environment variables (only those that are set).
 */
export function configFromEnv(prefix = "WWDSL", env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  return {
    reverse: compact({
      includeSounds: readBool(env[`${prefix}_INCLUDE_SOUNDS`]),
      skipDefaults: readBool(env[`${prefix}_SKIP_DEFAULTS`]),
    }),
    validator: compact({
      systemObjects: readStringList(env[`${prefix}_SYSTEM_OBJECTS`]),
    }),
    cli: compact({
      verbose: readBool(env[`${prefix}_VERBOSE`]),
    }),
  };
}

/**
 * Configuration layer from a JSON or YAML file.
 */
export function configFromFile(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Configuration layer from a plain object. Keys may be camelCase or snake_case.
 */
export function configFromObject(data: Record<string, unknown>): ConfigLayer {
  const reverseData = isRecord(data.reverse) ? data.reverse : {};
  const validatorData = isRecord(data.validator) ? data.validator : {};
  const cliData = isRecord(data.cli) ? data.cli : {};

  return {
    reverse: compact({
      includeSounds: readBool(pick(reverseData, "includeSounds", "include_sounds")),
      skipDefaults: readBool(pick(reverseData, "skipDefaults", "skip_defaults")),
    }),
    validator: compact({
      systemObjects: readStringList(pick(validatorData, "systemObjects", "system_objects")),
      passes: readPasses(validatorData.passes),
    }),
    cli: compact({
      verbose: readBool(cliData.verbose),
    }),
  };
}

/**
 * Merge layers over the defaults, later ones overriding earlier ones.
 */
export function mergeConfigs(...layers: ConfigLayer[]): WwdslConfig {
  const result: WwdslConfig = {
    reverse: { ...DEFAULT_CONFIG.reverse },
    validator: { ...DEFAULT_CONFIG.validator, passes: { ...DEFAULT_CONFIG.validator.passes } },
    cli: { ...DEFAULT_CONFIG.cli },
  };

  for (const layer of layers) {
    const { reverse, validator, cli } = layer;
    result.reverse = {
      includeSounds: reverse?.includeSounds ?? result.reverse.includeSounds,
      skipDefaults: reverse?.skipDefaults ?? result.reverse.skipDefaults,
    };
    result.validator = {
      systemObjects: validator?.systemObjects ?? result.validator.systemObjects,
      passes: { ...result.validator.passes, ...validator?.passes },
    };
    result.cli = {
      verbose: cli?.verbose ?? result.cli.verbose,
    };
  }

  return result;
}

/**
 * Load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigLayer;
}): WwdslConfig {
  const layers: ConfigLayer[] = [configFromEnv("WWDSL", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    // Try to find default config files
    const cwd = options?.cwd ?? process.cwd();
    for (const name of CONFIG_FILE_NAMES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  const lines = content.split("\n");

  for (const rawLine of lines) {
    // Skip empty lines and comments
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    if (indent < 0) continue;

    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      // Nested object
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: WwdslConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.validator.systemObjects.some(name => name.trim().length === 0)) {
    errors.push("validator.systemObjects contains an empty name");
  }
  if (config.validator.systemObjects.length === 0) {
    warnings.push("validator.systemObjects is empty; every default parent will be reported as missing");
  }

  for (const id of Object.keys(config.validator.passes)) {
    if (!KNOWN_PASS_IDS.includes(id)) {
      warnings.push(`Unknown validator pass: ${id}`);
    }
  }
  if (config.validator.passes["validate/syntax"]?.enabled === false) {
    warnings.push("Syntax pass disabled: empty samples will not be rejected");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
