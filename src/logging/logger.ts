/**
 * Structured logging. JSON lines on stderr: stdout belongs to the MCP
 * stdio transport.
 */

import pino, { type Logger } from "pino";
import type { LogLevel } from "../config/config.js";

export type { Logger } from "pino";

export function createLogger(level: LogLevel = "info"): Logger {
  return pino({ name: "workflow-gate", level }, pino.destination(2));
}

/** Logger that drops everything; used by tests and one-shot CLI commands. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
