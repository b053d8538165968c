export {
  canonicalJson,
  redactSecrets,
  redactPayload,
  REDACTED,
  SECRET_KEYS,
} from "./canonical.js";

export {
  sha256,
  computeEventHash,
  verifyChain,
  type ChainedEvent,
  type ChainFailure,
  type ChainVerificationResult,
} from "./hashing.js";

export {
  UsageLedger,
  LedgerError,
  USAGE_EVENT_TYPES,
  LEDGER_SCHEMA_VERSION,
  type LedgerErrorCode,
  type UsageEventType,
  type UsageEventDraft,
  type UsageEvent,
  type LedgerSession,
} from "./ledger.js";

export { UsageTracker } from "./tracker.js";
