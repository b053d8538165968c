/**
 * Usage tracking front for the ledger.
 *
 * Tracking is best-effort: a ledger write that fails is logged and the
 * tool call carries on. With tracking off, nothing is recorded.
 */

import type { Logger } from "pino";
import type { UsageEvent, UsageEventDraft, UsageLedger } from "./ledger.js";

export class UsageTracker {
  private readonly ledger: UsageLedger | null;
  private readonly logger: Logger;

  constructor(ledger: UsageLedger | null, logger: Logger) {
    this.ledger = ledger;
    this.logger = logger;
  }

  get enabled(): boolean {
    return this.ledger !== null;
  }

  record(sessionId: string, draft: UsageEventDraft): UsageEvent | undefined {
    if (!this.ledger) {
      return undefined;
    }
    try {
      return this.ledger.record(sessionId, draft);
    } catch (err: unknown) {
      this.logger.warn({ err, sessionId, type: draft.type }, "usage event not recorded");
      return undefined;
    }
  }
}
