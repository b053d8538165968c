/**
 * Dispatch middleware: structured logging and usage tracking.
 */

import type { Logger } from "pino";
import type { UsageTracker } from "../audit/tracker.js";
import type { DispatchMiddleware, DispatchOutcome } from "./types.js";

export function loggingMiddleware(logger: Logger): DispatchMiddleware {
  return async (call, next) => {
    const started = performance.now();
    const outcome = await next();
    const fields = {
      sessionId: call.sessionId,
      actionKind: call.actionKind,
      durationMs: Math.round(performance.now() - started),
    };
    switch (outcome.outcome) {
      case "completed":
        logger.info(fields, "action completed");
        break;
      case "blocked":
        logger.warn({ ...fields, reasonKind: outcome.reasonKind }, "action blocked");
        break;
      case "collaborator_error":
        logger.error({ ...fields, error: outcome.error }, "collaborator failed");
        break;
    }
    return outcome;
  };
}

function usagePayload(
  outcome: DispatchOutcome,
  base: Record<string, unknown>,
): Record<string, unknown> {
  switch (outcome.outcome) {
    case "completed":
      return base;
    case "blocked":
      return { ...base, reasonKind: outcome.reasonKind, details: outcome.details };
    case "collaborator_error":
      return {
        ...base,
        collaborator: outcome.error.collaborator,
        errorKind: outcome.error.kind,
        message: outcome.error.message,
      };
  }
}

const USAGE_EVENT_BY_OUTCOME = {
  completed: "ToolCallCompleted",
  blocked: "ToolCallBlocked",
  collaborator_error: "ToolCallFailed",
} as const;

export function usageMiddleware(tracker: UsageTracker): DispatchMiddleware {
  return async (call, next) => {
    const started = performance.now();
    const outcome = await next();
    tracker.record(call.sessionId, {
      type: USAGE_EVENT_BY_OUTCOME[outcome.outcome],
      payload: usagePayload(outcome, {
        actionKind: call.actionKind,
        resourceRefs: call.resourceRefs,
        durationMs: Math.round(performance.now() - started),
      }),
    });
    return outcome;
  };
}
