// bin/wwdsl-cli-lib.ts
// Shared CLI utilities for the wwdsl command
// Exported functions for testing

import * as fs from "fs";
import { fileURLToPath } from "url";
import { compile } from "../src/compiler/compiler";
import { validatePlan } from "../src/compiler/plan";
import { loadConfig, validateConfig, type ConfigLayer, type WwdslConfig } from "../src/core/config";
import { writeRawLinesFile } from "../src/io/jsonl";
import { loadWorkUnitFile } from "../src/project/wwu";
import { buildRegistry, loadRegistryFile } from "../src/registry/build";
import type { ObjectRegistry } from "../src/registry/registry";
import { collectWorkUnitFiles, formatDecompileReport, ProjectDecompiler, type LogFn } from "../src/reverse/project";
import { formatDatasetReport, validateDatasetFile } from "../src/validator/dataset";
import { SampleValidator } from "../src/validator/validator";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const CLI_COMMANDS = ["compile", "decompile", "validate", "index"] as const;

export type CliCommand = (typeof CLI_COMMANDS)[number];

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  command?: CliCommand;
  inputs: string[];
  registry?: string;
  output?: string;
  append?: boolean;
  includeSounds?: boolean;
  valid?: string;
  invalid?: string;
  config?: string;
  verbose?: boolean;
  /** Usage problems found while parsing. */
  errors: string[];
};

export type CliIo = {
  log: LogFn;
  error: LogFn;
};

function isCliCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some(c => c === value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { inputs: [], errors: [] };

  const valueOf = (flag: string, i: number): string | undefined => {
    const value = args[i];
    if (value === undefined || value.startsWith("-")) {
      result.errors.push(`Missing value for ${flag}`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--append") {
      result.append = true;
    } else if (arg === "--include-sounds") {
      result.includeSounds = true;
    } else if (arg === "--registry" || arg === "-r") {
      result.registry = valueOf(arg, ++i);
    } else if (arg === "--output" || arg === "-o") {
      result.output = valueOf(arg, ++i);
    } else if (arg === "--valid") {
      result.valid = valueOf(arg, ++i);
    } else if (arg === "--invalid") {
      result.invalid = valueOf(arg, ++i);
    } else if (arg === "--config" || arg === "-c") {
      result.config = valueOf(arg, ++i);
    } else if (arg.startsWith("-")) {
      result.errors.push(`Unknown option: ${arg}`);
    } else if (result.command === undefined) {
      // First positional argument names the command
      if (isCliCommand(arg)) result.command = arg;
      else result.errors.push(`Unknown command: ${arg}`);
    } else {
      result.inputs.push(arg);
    }
  }

  return result;
}

/**
 * Usage errors for a parsed command line; empty when it can run.
 */
export function checkCliArgs(args: CliArgs): string[] {
  const errors = [...args.errors];
  if (args.help || args.version) return errors;

  if (args.command === undefined) {
    if (errors.length === 0) errors.push("No command given");
    return errors;
  }
  if (args.inputs.length === 0) {
    errors.push(`${args.command}: no input given`);
  }
  if ((args.command === "compile" || args.command === "validate") && args.inputs.length > 1) {
    errors.push(`${args.command}: expects exactly one input file`);
  }
  if (args.command === "index" && args.output === undefined) {
    errors.push("index: --output is required");
  }
  return errors;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
wwdsl - Bidirectional compiler for the audio-object DSL

USAGE:
  wwdsl compile <file.dsl> [--registry <index.json>] [-o <plan.json>]
  wwdsl decompile <paths...> [-o <samples.jsonl>] [--append] [--include-sounds]
  wwdsl validate <dataset.jsonl> [--valid <file>] [--invalid <file>]
  wwdsl index <paths...> -o <index.json>

COMMANDS:
  compile                            Compile DSL text into an execution plan (JSON)
  decompile                          Turn .wwu work units into DSL samples (JSONL)
  validate                           Check every sample of a JSONL dataset
  index                              Build a registry index from .wwu work units

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -r, --registry <file>              Registry index used to resolve parents
  -o, --output <file>                Output file
  --append                           Append to the output instead of replacing it
  --include-sounds                   Emit leaf sounds as samples of their own
  --valid <file>                     Write the valid dataset lines here
  --invalid <file>                   Write the invalid dataset lines here
  -c, --config <file>                Config file (.json, .yaml, .yml)
  --verbose                          Show diagnostics and progress

ENVIRONMENT:
  WWDSL_INCLUDE_SOUNDS, WWDSL_SKIP_DEFAULTS, WWDSL_VERBOSE, WWDSL_SYSTEM_OBJECTS

EXAMPLES:
  wwdsl compile hit.dsl -o hit.plan.json
  wwdsl index ./Project/Events ./Project/Actor-Mixer\\ Hierarchy -o registry.json
  wwdsl decompile ./Project -o samples.jsonl
  wwdsl validate samples.jsonl --invalid rejected.jsonl
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `wwdsl v${pkg.version}`;
    }
  } catch {
    // package.json unreadable: fall through to the built-in version
  }
  return "wwdsl v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Effective configuration: flags override the config file, which overrides the environment.
 */
export function buildConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): WwdslConfig {
  const overrides: ConfigLayer = {};
  if (args.includeSounds) overrides.reverse = { includeSounds: true };
  if (args.verbose) overrides.cli = { verbose: true };
  return loadConfig({ configFile: args.config, env, overrides });
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Run a file operation, reporting a failure as "failed: <file>: <reason>".
 */
function attempt<T>(file: string, io: CliIo, fn: () => T): { ok: true; value: T } | { ok: false } {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    io.error(`failed: ${file}: ${errorMessage(e)}`);
    return { ok: false };
  }
}

function runCompile(args: CliArgs, config: WwdslConfig, io: CliIo): number {
  const [file] = args.inputs;

  let registry: ObjectRegistry | undefined;
  if (args.registry) {
    const index = args.registry;
    const loaded = attempt(index, io, () => loadRegistryFile(index));
    if (!loaded.ok) return 1;
    registry = loaded.value;
  }

  const source = attempt(file, io, () => fs.readFileSync(file, "utf8"));
  if (!source.ok) return 1;
  const result = compile(source.value, registry);

  for (const e of result.errors) io.error(`error: ${e}`);
  if (config.cli.verbose) {
    for (const w of result.warnings) io.error(`warning: ${w}`);
  }

  const check = validatePlan(result.plan);
  if (!check.ok) io.error(`error: ${check.reason}`);

  const json = JSON.stringify(result.plan, null, 2);
  if (args.output) {
    fs.writeFileSync(args.output, json + "\n");
    io.log(`${result.plan.length} steps written to ${args.output}`);
  } else {
    io.log(json);
  }
  return check.ok ? 0 : 1;
}

function runDecompile(args: CliArgs, config: WwdslConfig, io: CliIo): number {
  const decompiler = new ProjectDecompiler({
    ...config.reverse,
    output: args.output ?? "samples.jsonl",
    append: args.append === true,
    log: config.cli.verbose ? io.log : () => {},
  });
  const report = decompiler.run(args.inputs);
  for (const f of report.failed) io.error(`failed: ${f.file}: ${f.reason}`);
  io.log(formatDecompileReport(report));
  return 0;
}

function runValidate(args: CliArgs, config: WwdslConfig, io: CliIo): number {
  const [file] = args.inputs;
  const validator = new SampleValidator(config.validator);
  const read = attempt(file, io, () => validateDatasetFile(file, validator));
  if (!read.ok) return 1;
  const report = read.value;

  if (args.valid) writeRawLinesFile(args.valid, report.validLines);
  if (args.invalid) writeRawLinesFile(args.invalid, report.invalidLines);

  io.log(formatDatasetReport(report));
  return report.stats.invalid === 0 ? 0 : 1;
}

function runIndex(args: CliArgs, config: WwdslConfig, io: CliIo): number {
  const log: LogFn = config.cli.verbose ? io.log : () => {};
  const documents = collectWorkUnitFiles(args.inputs, log).flatMap(file => {
    const loaded = attempt(file, io, () => loadWorkUnitFile(file));
    return loaded.ok ? [loaded.value] : [];
  });

  const registry = buildRegistry(documents);
  const check = registry.validate();
  for (const e of check.errors) io.error(`warning: ${e}`);

  const output = args.output ?? "registry.json";
  fs.writeFileSync(output, JSON.stringify(registry.toJSON(), null, 2) + "\n");
  io.log(`${registry.size} objects from ${documents.length} work units written to ${output}`);
  return 0;
}

/**
 * Run a parsed command line. Returns the process exit code.
 */
export function runCli(args: CliArgs, io: CliIo, env: NodeJS.ProcessEnv = process.env): number {
  if (args.help) {
    io.log(getHelpText());
    return 0;
  }
  if (args.version) {
    io.log(getVersion());
    return 0;
  }

  const usage = checkCliArgs(args);
  if (usage.length > 0) {
    for (const u of usage) io.error(`Error: ${u}`);
    io.error("Run 'wwdsl --help' for usage.");
    return 2;
  }

  let config: WwdslConfig;
  try {
    config = buildConfig(args, env);
  } catch (e) {
    io.error(`config error: ${errorMessage(e)}`);
    return 2;
  }

  const check = validateConfig(config);
  for (const w of check.warnings) io.error(`config warning: ${w}`);
  if (!check.valid) {
    for (const e of check.errors) io.error(`config error: ${e}`);
    return 2;
  }

  switch (args.command) {
    case "compile":
      return runCompile(args, config, io);
    case "decompile":
      return runDecompile(args, config, io);
    case "validate":
      return runValidate(args, config, io);
    case "index":
      return runIndex(args, config, io);
    default:
      return 2;
  }
}
