/**
 * Server configuration resolved from environment variables.
 *
 * Defaults:
 *   Home:        ~/.workflow-gate
 *   Usage DB:    <home>/usage.sqlite
 *   Connections: <home>/connections.yaml
 *   Knowledge:   the knowledge/ directory shipped with the package
 *
 * Environment overrides:
 *   WORKFLOW_GATE_HOME       base directory
 *   GATE_USAGE_DB_PATH       SQLite file for the usage ledger
 *   GATE_USAGE_TRACKING      "on" | "off"
 *   GATE_CONNECTIONS_FILE    YAML connection catalog
 *   GATE_KNOWLEDGE_DIR       directory of <topic>.md documents
 *   GATE_DOCS_SEARCH_URL     documentation search service base URL
 *   GATE_DOCS_SEARCH_TOKEN   bearer token for the search service
 *   GATE_LOG_LEVEL           pino level
 *   GATE_DEFAULT_SESSION_ID  session used when a call names none
 */

import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { DEFAULT_KNOWLEDGE_DIR } from "../collaborators/knowledge.js";
import { GateError } from "../gate/errors.js";
import { SessionIdSchema } from "../gate/schemas.js";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface GateConfig {
  homeDir: string;
  usageDbPath: string;
  usageTracking: boolean;
  connectionsFile: string;
  knowledgeDir: string;
  docsSearchUrl: string | undefined;
  docsSearchToken: string | undefined;
  logLevel: LogLevel;
  defaultSessionId: string;
}

const optionalText = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional();

const EnvSchema = z.object({
  WORKFLOW_GATE_HOME: optionalText,
  GATE_USAGE_DB_PATH: optionalText,
  GATE_USAGE_TRACKING: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["on", "off"]))
    .optional(),
  GATE_CONNECTIONS_FILE: optionalText,
  GATE_KNOWLEDGE_DIR: optionalText,
  GATE_DOCS_SEARCH_URL: optionalText.pipe(z.string().url().optional()),
  GATE_DOCS_SEARCH_TOKEN: optionalText,
  GATE_LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
  GATE_DEFAULT_SESSION_ID: SessionIdSchema.optional(),
});

/**
 * @throws GateError with code CONFIG_INVALID
 */
export function resolveConfig(
  env: Record<string, string | undefined> = process.env,
): GateConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new GateError(
      `Invalid configuration: ${issues.join("; ")}`,
      "CONFIG_INVALID",
      { issues },
    );
  }
  const e = parsed.data;

  const homeDir = resolve(e.WORKFLOW_GATE_HOME ?? join(homedir(), ".workflow-gate"));
  return {
    homeDir,
    usageDbPath: resolve(e.GATE_USAGE_DB_PATH ?? join(homeDir, "usage.sqlite")),
    usageTracking: (e.GATE_USAGE_TRACKING ?? "on") === "on",
    connectionsFile: resolve(e.GATE_CONNECTIONS_FILE ?? join(homeDir, "connections.yaml")),
    knowledgeDir: resolve(e.GATE_KNOWLEDGE_DIR ?? DEFAULT_KNOWLEDGE_DIR),
    docsSearchUrl: e.GATE_DOCS_SEARCH_URL,
    docsSearchToken: e.GATE_DOCS_SEARCH_TOKEN,
    logLevel: e.GATE_LOG_LEVEL ?? "info",
    defaultSessionId: e.GATE_DEFAULT_SESSION_ID ?? "default",
  };
}

/**
 * Ensure the home directory, and the usage DB's directory when tracking
 * is on, exist.
 */
export function ensureDataDirs(config: GateConfig): void {
  mkdirSync(config.homeDir, { recursive: true });
  if (config.usageTracking) {
    mkdirSync(dirname(config.usageDbPath), { recursive: true });
  }
}

/** Config with secrets masked, for display. */
export function describeConfig(config: GateConfig): Record<string, unknown> {
  return {
    ...config,
    docsSearchToken: config.docsSearchToken === undefined ? undefined : "[REDACTED]",
  };
}
