/**
 * CLI tests.
 *
 * Each test runs `runCli` in process against a temp directory (via
 * WORKFLOW_GATE_HOME) and asserts exit codes and output.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { UsageLedger } from "../src/audit/ledger.js";
import { parseArgs, runCli } from "../src/cli/main.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

let tempDir: string;
let cliEnv: Record<string, string>;

async function run(args: string[], env: Record<string, string> = cliEnv): Promise<RunResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const outSpy = vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
    stdout.push(String(chunk));
    return true;
  });
  const errSpy = vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
    stderr.push(String(chunk));
    return true;
  });
  try {
    const exitCode = await runCli(args, env);
    return { stdout: stdout.join(""), stderr: stderr.join(""), exitCode };
  } finally {
    outSpy.mockRestore();
    errSpy.mockRestore();
  }
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "gate-cli-"));
  cliEnv = { WORKFLOW_GATE_HOME: tempDir };
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

function seedLedger(): void {
  const ledger = new UsageLedger(join(tempDir, "usage.sqlite"));
  try {
    ledger.record("s1", { type: "TopicStudied", payload: { topic: "profiles" } });
  } finally {
    ledger.close();
  }
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

describe("parseArgs", () => {
  test("separates positionals, valued flags and boolean flags", () => {
    const { positional, flags, boolFlags } = parseArgs([
      "list-usage",
      "--session",
      "s1",
      "--json",
    ]);
    expect(positional).toEqual(["list-usage"]);
    expect(flags.get("session")).toBe("s1");
    expect([...boolFlags]).toEqual(["json"]);
  });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("workflow-gate CLI", () => {
  test("no arguments prints usage and fails", async () => {
    const r = await run([]);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toContain("Usage:");
  });

  test("--help prints usage", async () => {
    const r = await run(["--help"]);
    expect(r.exitCode).toBe(0);
    expect(r.stdout).toContain("workflow-gate check-name <name>...");
  });

  test("invalid configuration is fatal", async () => {
    const r = await run(["requirements"], { GATE_LOG_LEVEL: "loud" });
    expect(r.exitCode).toBe(2);
    expect(r.stderr).toMatch(/^Fatal: Invalid configuration: GATE_LOG_LEVEL: /);
  });

  test("unknown command fails", async () => {
    const r = await run(["frobnicate"]);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toContain("Unknown command: frobnicate");
  });

  test("config show masks the search token", async () => {
    const r = await run(["config", "show", "--json"], {
      ...cliEnv,
      GATE_DOCS_SEARCH_TOKEN: "test-secret",
    });
    expect(r.exitCode).toBe(0);
    const shown: unknown = JSON.parse(r.stdout);
    expect(shown).toMatchObject({
      homeDir: tempDir,
      usageDbPath: join(tempDir, "usage.sqlite"),
      docsSearchToken: "[REDACTED]",
    });
  });

  test("config show text output", async () => {
    const r = await run(["config", "show"]);
    const lines = r.stdout.split("\n");
    expect(lines).toContain(`homeDir:          ${tempDir}`);
    expect(lines).toContain("docsSearchUrl:    (unset)");
  });

  test("requirements lists every action", async () => {
    const r = await run(["requirements", "--json"]);
    expect(r.exitCode).toBe(0);
    const rows: unknown = JSON.parse(r.stdout);
    expect(Array.isArray(rows) && rows.length).toBe(16);
    expect(rows).toContainEqual({
      action: "create_inputs_yaml",
      requiredTopics: ["profiles", "inputs"],
      referencedResources: ["table", "connection"],
      requiredResources: ["table"],
    });
    expect(rows).toContainEqual({
      action: "evaluate_eligible_user_filters",
      requiredTopics: ["profiles", "propensity"],
      referencedResources: ["table"],
      requiredResources: ["table"],
    });
  });

  test("requirements text output shows - for no topics", async () => {
    const r = await run(["requirements"]);
    expect(r.stdout.split("\n")[0]).toBe(`${"list_connections".padEnd(34)}-`);
  });

  test("check-name flags placeholders", async () => {
    const r = await run(["check-name", "my_table", "ANALYTICS.PROD.EVENTS"]);
    expect(r.exitCode).toBe(1);
    expect(r.stdout).toBe("PLACEHOLDER  my_table\nok  ANALYTICS.PROD.EVENTS\n");
  });

  test("check-name passes real names", async () => {
    const r = await run(["check-name", "ANALYTICS.PROD.EVENTS", "--json"]);
    expect(r.exitCode).toBe(0);
    expect(JSON.parse(r.stdout)).toEqual([{ name: "ANALYTICS.PROD.EVENTS", placeholder: false }]);
  });

  test("check-name without names fails", async () => {
    const r = await run(["check-name"]);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toBe("error: check-name needs at least one name\n");
  });

  test("list-usage requires --session", async () => {
    const r = await run(["list-usage"]);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toBe("error: missing required flag: --session\n");
  });

  test("list-usage on an empty ledger", async () => {
    const r = await run(["list-usage", "--session", "s1"]);
    expect(r.exitCode).toBe(0);
    expect(r.stdout).toBe("No usage recorded for session s1\n");
  });

  test("list-usage shows recorded events", async () => {
    seedLedger();
    const r = await run(["list-usage", "--session", "s1"]);
    expect(r.exitCode).toBe(0);
    const lines = r.stdout.trimEnd().split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^ {2}seq= {2}1 type=SessionStarted /);
    expect(lines[1]).toMatch(/^ {2}seq= {2}2 type=TopicStudied /);
    expect(lines[2]).toBe("2 event(s)");
  });

  test("list-usage --json", async () => {
    seedLedger();
    const r = await run(["list-usage", "--session", "s1", "--json"]);
    const events: unknown = JSON.parse(r.stdout);
    expect(events).toMatchObject([
      { seq: 1, type: "SessionStarted" },
      { seq: 2, type: "TopicStudied", payload: { topic: "profiles" } },
    ]);
  });

  test("verify-usage reports a valid chain", async () => {
    seedLedger();
    const r = await run(["verify-usage", "--session", "s1"]);
    expect(r.exitCode).toBe(0);
    expect(r.stdout).toBe("Session s1: VALID (2 events)\n");
  });
});
