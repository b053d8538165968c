#!/usr/bin/env node
/**
 * workflow-gate: CLI entry point.
 */

import { runCli } from "./main.js";

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (e: unknown) => {
    process.stderr.write(`Fatal: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exit(2);
  },
);
