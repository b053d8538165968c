/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed arguments
 *   - calls library functions (no business logic here)
 *   - writes to stdout / stderr
 *   - returns an exit code (0 = success, 1 = error)
 */

import { canonicalJson } from "../audit/canonical.js";
import { UsageLedger } from "../audit/ledger.js";
import { describeConfig, ensureDataDirs, type GateConfig } from "../config/config.js";
import { findPlaceholderNames } from "../gate/placeholder.js";
import { getActionDefinition, getSupportedActions } from "../gate/requirements.js";
import { closeAppContext, createAppContext } from "../server/context.js";
import { startStdioServer } from "../server/mcp.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function err(msg: string): void {
  process.stderr.write(`error: ${msg}\n`);
}

function out(msg: string): void {
  process.stdout.write(msg + "\n");
}

function requireFlag(
  flags: Map<string, string>,
  name: string,
): string | undefined {
  const v = flags.get(name);
  if (!v || v === "true") {
    err(`missing required flag: --${name}`);
    return undefined;
  }
  return v;
}

// ---------------------------------------------------------------------------
// serve
// ---------------------------------------------------------------------------

export async function cmdServe(config: GateConfig): Promise<number> {
  ensureDataDirs(config);
  const ctx = createAppContext(config);
  try {
    const { server, closed } = await startStdioServer(ctx);
    const shutdown = (): void => {
      server.close().catch((e: unknown) => {
        ctx.logger.error({ err: e }, "error while closing server");
      });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    await closed;
    ctx.logger.info("stdio transport closed");
    return 0;
  } finally {
    closeAppContext(ctx);
  }
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export function cmdConfigShow(config: GateConfig, json: boolean): number {
  const shown = describeConfig(config);
  if (json) {
    out(canonicalJson(shown));
  } else {
    for (const [key, value] of Object.entries(shown)) {
      out(`${(key + ":").padEnd(18)}${value === undefined ? "(unset)" : String(value)}`);
    }
  }
  return 0;
}

// ---------------------------------------------------------------------------
// requirements
// ---------------------------------------------------------------------------

export function cmdRequirements(json: boolean): number {
  const rows = getSupportedActions().map((kind) => {
    const def = getActionDefinition(kind);
    return {
      action: kind,
      requiredTopics: def ? [...def.requiredTopics] : [],
      referencedResources: def ? [...def.referencedResourceKinds] : [],
      requiredResources: def ? [...def.requiredResourceKinds] : [],
    };
  });

  if (json) {
    out(canonicalJson(rows));
  } else {
    for (const row of rows) {
      const topics = row.requiredTopics.length > 0 ? row.requiredTopics.join(", ") : "-";
      out(`${row.action.padEnd(34)}${topics}`);
    }
  }
  return 0;
}

// ---------------------------------------------------------------------------
// check-name
// ---------------------------------------------------------------------------

export function cmdCheckName(names: string[], json: boolean): number {
  if (names.length === 0) {
    err("check-name needs at least one name");
    return 1;
  }
  const flagged = new Set(findPlaceholderNames(names));

  if (json) {
    out(canonicalJson(names.map((name) => ({ name, placeholder: flagged.has(name) }))));
  } else {
    for (const name of names) {
      out(`${flagged.has(name) ? "PLACEHOLDER" : "ok"}  ${name}`);
    }
  }
  return flagged.size > 0 ? 1 : 0;
}

// ---------------------------------------------------------------------------
// list-usage
// ---------------------------------------------------------------------------

export function cmdListUsage(
  flags: Map<string, string>,
  config: GateConfig,
  json: boolean,
): number {
  const sessionId = requireFlag(flags, "session");
  if (!sessionId) return 1;

  const ledger = new UsageLedger(config.usageDbPath);
  try {
    const events = ledger.listEvents(sessionId);
    if (events.length === 0) {
      if (!json) out(`No usage recorded for session ${sessionId}`);
      else out("[]");
      return 0;
    }

    if (json) {
      out(canonicalJson(events));
    } else {
      for (const e of events) {
        out(
          `  seq=${String(e.seq).padStart(3)} type=${e.type.padEnd(18)} ts=${e.ts} hash=${e.hash.slice(0, 12)}…`,
        );
      }
      out(`${events.length} event(s)`);
    }
    return 0;
  } finally {
    ledger.close();
  }
}

// ---------------------------------------------------------------------------
// verify-usage
// ---------------------------------------------------------------------------

export function cmdVerifyUsage(
  flags: Map<string, string>,
  config: GateConfig,
  json: boolean,
): number {
  const sessionId = requireFlag(flags, "session");
  if (!sessionId) return 1;

  const ledger = new UsageLedger(config.usageDbPath);
  try {
    const result = ledger.verifySessionChain(sessionId);
    if (json) {
      out(canonicalJson(result));
    } else if (result.valid) {
      out(`Session ${sessionId}: VALID (${result.eventCount} events)`);
    } else {
      err(`Session ${sessionId}: INVALID`);
      for (const f of result.failures) {
        err(`  seq=${f.seq} reason=${f.reason} expected=${f.expected} actual=${f.actual}`);
      }
    }
    return result.valid ? 0 : 1;
  } finally {
    ledger.close();
  }
}
