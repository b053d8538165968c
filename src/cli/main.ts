/**
 * Argument parsing and command routing for the workflow-gate CLI.
 */

import { GateError } from "../gate/errors.js";
import { resolveConfig, type GateConfig } from "../config/config.js";
import {
  cmdCheckName,
  cmdConfigShow,
  cmdListUsage,
  cmdRequirements,
  cmdServe,
  cmdVerifyUsage,
} from "./commands.js";

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export function parseArgs(argv: readonly string[]): {
  positional: string[];
  flags: Map<string, string>;
  boolFlags: Set<string>;
} {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const boolFlags = new Set<string>();

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";
    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags.set(name, next);
        i += 2;
      } else {
        boolFlags.add(name);
        flags.set(name, "true");
        i += 1;
      }
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, boolFlags };
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

export const USAGE = `workflow-gate: gated MCP tool server

Usage:
  workflow-gate serve
  workflow-gate config show [--json]
  workflow-gate requirements [--json]
  workflow-gate check-name <name>... [--json]
  workflow-gate list-usage --session <id> [--json]
  workflow-gate verify-usage --session <id> [--json]

Environment:
  WORKFLOW_GATE_HOME       Base directory (default ~/.workflow-gate)
  GATE_USAGE_DB_PATH       Usage ledger SQLite file
  GATE_USAGE_TRACKING      on | off
  GATE_CONNECTIONS_FILE    Connection catalog YAML
  GATE_KNOWLEDGE_DIR       Knowledge documents directory
  GATE_DOCS_SEARCH_URL     Documentation search service
  GATE_LOG_LEVEL           Log level (default info)
`;

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Run one CLI invocation. Exit codes: 0 success, 1 error, 2 fatal
 * (invalid configuration).
 */
export async function runCli(
  argv: readonly string[],
  env: Record<string, string | undefined> = process.env,
): Promise<number> {
  if (argv.length === 0) {
    process.stderr.write(USAGE);
    return 1;
  }

  const { positional, flags, boolFlags } = parseArgs(argv);
  const json = boolFlags.has("json");

  if (boolFlags.has("help") || boolFlags.has("h") || positional[0] === "help") {
    process.stdout.write(USAGE);
    return 0;
  }

  let config: GateConfig;
  try {
    config = resolveConfig(env);
  } catch (e: unknown) {
    if (e instanceof GateError) {
      process.stderr.write(`Fatal: ${e.message}\n`);
      return 2;
    }
    throw e;
  }

  const command = positional[0];

  switch (command) {
    case "serve":
      return cmdServe(config);

    case "config":
      if (positional[1] === "show") {
        return cmdConfigShow(config, json);
      }
      process.stderr.write("Unknown config subcommand. Use: config show\n");
      return 1;

    case "requirements":
      return cmdRequirements(json);

    case "check-name":
      return cmdCheckName(positional.slice(1), json);

    case "list-usage":
      return cmdListUsage(flags, config, json);

    case "verify-usage":
      return cmdVerifyUsage(flags, config, json);

    default:
      process.stderr.write(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}
