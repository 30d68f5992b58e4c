#!/usr/bin/env npx tsx
// bin/wwdsl.ts
// wwdsl command line: compile, decompile, validate and index
//
// Run:  npx tsx bin/wwdsl.ts <command> [options] [inputs...]

import { parseCliArgs, runCli } from "./wwdsl-cli-lib";

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): void {
  const args = parseCliArgs(process.argv.slice(2));
  const code = runCli(args, {
    log: line => console.log(line),
    error: line => console.error(line),
  });
  process.exitCode = code;
}

try {
  main();
} catch (error) {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
