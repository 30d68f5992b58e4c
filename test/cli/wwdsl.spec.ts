// test/cli/wwdsl.spec.ts
// Tests for the wwdsl command line

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import {
  buildConfig,
  checkCliArgs,
  getHelpText,
  getVersion,
  parseCliArgs,
  runCli,
  type CliIo,
} from "../../bin/wwdsl-cli-lib";

const fixtures = fileURLToPath(new URL("../fixtures", import.meta.url));

describe("wwdsl CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should parse --help and --version flags", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
    });

    it("should parse a command with inputs and options", () => {
      const parsed = parseCliArgs(["compile", "hit.dsl", "--registry", "index.json", "-o", "plan.json", "--verbose"]);
      expect(parsed).toEqual({
        command: "compile",
        inputs: ["hit.dsl"],
        registry: "index.json",
        output: "plan.json",
        verbose: true,
        errors: [],
      });
    });

    it("should collect several inputs for decompile", () => {
      const parsed = parseCliArgs(["decompile", "a", "b", "--append", "--include-sounds"]);
      expect(parsed.inputs).toEqual(["a", "b"]);
      expect(parsed.append).toBe(true);
      expect(parsed.includeSounds).toBe(true);
    });

    it("should report unknown commands, unknown options and missing values", () => {
      expect(parseCliArgs(["explode"]).errors).toEqual(["Unknown command: explode"]);
      expect(parseCliArgs(["validate", "d.jsonl", "--fast"]).errors).toEqual(["Unknown option: --fast"]);
      expect(parseCliArgs(["validate", "d.jsonl", "--valid"]).errors).toEqual(["Missing value for --valid"]);
    });
  });

  describe("Usage checks", () => {
    it("should require a command and inputs", () => {
      expect(checkCliArgs(parseCliArgs([]))).toEqual(["No command given"]);
      expect(checkCliArgs(parseCliArgs(["decompile"]))).toEqual(["decompile: no input given"]);
      expect(checkCliArgs(parseCliArgs(["compile", "a.dsl", "b.dsl"]))).toEqual(["compile: expects exactly one input file"]);
      expect(checkCliArgs(parseCliArgs(["index", "dir"]))).toEqual(["index: --output is required"]);
      expect(checkCliArgs(parseCliArgs(["--help"]))).toEqual([]);
    });
  });

  describe("Help and version", () => {
    it("should list every command", () => {
      const help = getHelpText();
      for (const command of ["compile", "decompile", "validate", "index"]) {
        expect(help).toContain(`wwdsl ${command} `);
      }
    });

    it("should read the version from package.json", () => {
      expect(getVersion()).toBe("wwdsl v0.1.0");
    });
  });

  describe("Configuration building", () => {
    it("should let flags override the environment", () => {
      const config = buildConfig(parseCliArgs(["decompile", "x", "--include-sounds"]), { WWDSL_INCLUDE_SOUNDS: "false", WWDSL_SKIP_DEFAULTS: "no" });
      expect(config.reverse).toEqual({ includeSounds: true, skipDefaults: false });
      expect(config.cli.verbose).toBe(false);
    });
  });

  describe("Running commands", () => {
    let dir: string;
    let out: string[];
    let err: string[];
    let io: CliIo;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "wwdsl-cli-"));
      out = [];
      err = [];
      io = { log: line => out.push(line), error: line => err.push(line) };
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should exit 2 on usage errors", () => {
      expect(runCli(parseCliArgs([]), io, {})).toBe(2);
      expect(err).toEqual(["Error: No command given", "Run 'wwdsl --help' for usage."]);
    });

    it("should compile a file to a plan", () => {
      const source = path.join(dir, "hit.dsl");
      const plan = path.join(dir, "hit.plan.json");
      fs.writeFileSync(source, 'CREATE Sound "Hit_01" UNDER "Default Work Unit"\nLINK "Hit_01" TO "Master Audio Bus" AS "Bus"\n');

      expect(runCli(parseCliArgs(["compile", source, "-o", plan]), io, {})).toBe(0);
      expect(out).toEqual([`3 steps written to ${plan}`]);
      const steps: unknown = JSON.parse(fs.readFileSync(plan, "utf8"));
      expect(Array.isArray(steps) && steps.length).toBe(3);
    });

    it("should exit 2 when the config file cannot be loaded", () => {
      const missing = path.join(dir, "missing.json");
      expect(runCli(parseCliArgs(["validate", "x.jsonl", "--config", missing]), io, {})).toBe(2);
      expect(err).toEqual([`config error: Config file not found: ${missing}`]);

      err = [];
      const broken = path.join(dir, "wwdsl.config.json");
      fs.writeFileSync(broken, "{ not json");
      expect(runCli(parseCliArgs(["validate", "x.jsonl", "-c", broken]), io, {})).toBe(2);
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(/^config error: /);
    });

    it("should report unreadable inputs and exit 1", () => {
      const source = path.join(dir, "absent.dsl");
      expect(runCli(parseCliArgs(["compile", source]), io, {})).toBe(1);
      expect(err).toHaveLength(1);
      expect(err[0].startsWith(`failed: ${source}: ENOENT`)).toBe(true);

      err = [];
      const dataset = path.join(dir, "absent.jsonl");
      expect(runCli(parseCliArgs(["validate", dataset]), io, {})).toBe(1);
      expect(err[0].startsWith(`failed: ${dataset}: ENOENT`)).toBe(true);
      expect(out).toEqual([]);
    });

    it("should report a malformed registry index and exit 1", () => {
      const index = path.join(dir, "registry.json");
      const source = path.join(dir, "hit.dsl");
      fs.writeFileSync(index, JSON.stringify([]));
      fs.writeFileSync(source, 'CREATE Sound "Hit" UNDER "Weapons"\n');

      expect(runCli(parseCliArgs(["compile", source, "--registry", index]), io, {})).toBe(1);
      expect(err).toEqual([`failed: ${index}: Registry index must be an object with an 'entries' array`]);
      expect(out).toEqual([]);
    });

    it("should exit 1 when nothing compiles", () => {
      const source = path.join(dir, "empty.dsl");
      fs.writeFileSync(source, "# nothing here\n");

      expect(runCli(parseCliArgs(["compile", source]), io, {})).toBe(1);
      expect(err).toEqual(["error: empty plan"]);
      expect(out).toEqual(["[]"]);
    });

    it("should build an index and compile against it", () => {
      const index = path.join(dir, "registry.json");
      expect(runCli(parseCliArgs(["index", fixtures, "-o", index]), io, {})).toBe(0);
      expect(out).toEqual([`9 objects from 2 work units written to ${index}`]);
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(/^failed: .*Broken\.wwu: XML parse error/);

      out = [];
      const source = path.join(dir, "pistol.dsl");
      fs.writeFileSync(source, 'CREATE Sound "Pistol" UNDER "Weapons"\n');
      expect(runCli(parseCliArgs(["compile", source, "--registry", index]), io, {})).toBe(0);
      const [step] = JSON.parse(out[0]);
      expect(step.args.parent).toBe("\\Actor-Mixer Hierarchy\\Default Work Unit\\Weapons");
    });

    it("should decompile a project into a dataset", () => {
      const output = path.join(dir, "samples.jsonl");
      expect(runCli(parseCliArgs(["decompile", fixtures, "-o", output]), io, {})).toBe(0);
      expect(out[0].split("\n")).toContain("Samples written:  3");
      expect(fs.readFileSync(output, "utf8").trim().split("\n")).toHaveLength(3);
    });

    it("should validate a dataset and split its lines", () => {
      const dataset = path.join(dir, "samples.jsonl");
      const invalid = path.join(dir, "rejected.jsonl");
      const good = JSON.stringify({ output: 'CREATE ActorMixer "Weapons" UNDER "Default Work Unit"' });
      const bad = JSON.stringify({ output: 'LINK "Hit" TO "Master Audio Bus" AS "Bogus"' });
      fs.writeFileSync(dataset, `${good}\n${bad}\n`);

      expect(runCli(parseCliArgs(["validate", dataset, "--invalid", invalid]), io, {})).toBe(1);
      expect(fs.readFileSync(invalid, "utf8")).toBe(`${bad}\n`);
      expect(out[0].split("\n")[1]).toBe("Total samples:        2");
    });
  });
});
