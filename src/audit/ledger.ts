/**
 * SQLite-backed append-only usage ledger.
 *
 * Storage:
 *   - `sessions` table (session_id, created_at, metadata)
 *   - `events` table   (session_id, seq, event_id, ts, type, schema_version,
 *                       payload_json, prev_hash, hash)
 *
 * Invariants enforced at write time:
 *   1. seq increments by exactly 1 per session (no gaps, no reuse).
 *   2. prevHash matches the hash of the preceding event (null for seq 1).
 *   3. The first event of every session is "SessionStarted".
 *   4. Payloads are redacted before they are hashed or stored.
 *   5. Appends run in a transaction; no UPDATE or DELETE touches events.
 */

import Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { canonicalJson, redactPayload } from "./canonical.js";
import {
  computeEventHash,
  verifyChain,
  type ChainVerificationResult,
} from "./hashing.js";

// ---------------------------------------------------------------------------
// Minimal statement interface (keeps call sites free of the conditional
// generics in @types/better-sqlite3).
// ---------------------------------------------------------------------------

interface Stmt {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

export type LedgerErrorCode =
  | "SESSION_NOT_FOUND"
  | "FIRST_EVENT_NOT_SESSION_STARTED"
  | "EVENT_ID_CONFLICT"
  | "CORRUPT_ROW";

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: LedgerErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details ?? {};
  }
}

// ---------------------------------------------------------------------------
// Public data types
// ---------------------------------------------------------------------------

export const USAGE_EVENT_TYPES = [
  "SessionStarted",
  "ToolCallCompleted",
  "ToolCallBlocked",
  "ToolCallFailed",
  "TopicStudied",
  "ResourcesConfirmed",
  "SessionReset",
] as const;

export type UsageEventType = (typeof USAGE_EVENT_TYPES)[number];

export const LEDGER_SCHEMA_VERSION = "1.0.0";

export interface UsageEventDraft {
  type: UsageEventType;
  payload: Record<string, unknown>;
  /** Defaults to a fresh uuid v4. */
  eventId?: string;
  /** ISO 8601 UTC; defaults to now. */
  ts?: string;
}

export interface UsageEvent {
  eventId: string;
  sessionId: string;
  seq: number;
  ts: string;
  type: string;
  schemaVersion: string;
  payload: Record<string, unknown>;
  prevHash: string | null;
  hash: string;
}

export interface LedgerSession {
  sessionId: string;
  createdAt: string;
  metadata: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Row shapes
// ---------------------------------------------------------------------------

const JsonRecordSchema = z.record(z.string(), z.unknown());

const EventRowSchema = z.object({
  session_id: z.string(),
  seq: z.number().int(),
  event_id: z.string(),
  ts: z.string(),
  type: z.string(),
  schema_version: z.string(),
  payload_json: z.string(),
  prev_hash: z.string().nullable(),
  hash: z.string(),
});

const LastEventRowSchema = z.object({ seq: z.number().int(), hash: z.string() });

const SessionRowSchema = z.object({
  session_id: z.string(),
  created_at: z.string(),
  metadata: z.string(),
});

function parseRow<T>(schema: z.ZodType<T>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new LedgerError("Ledger row has an unexpected shape", "CORRUPT_ROW", {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

function parseJsonRecord(text: string): Record<string, unknown> {
  return parseRow(JsonRecordSchema, JSON.parse(text));
}

function rowToUsageEvent(raw: unknown): UsageEvent {
  const row = parseRow(EventRowSchema, raw);
  return {
    eventId: row.event_id,
    sessionId: row.session_id,
    seq: row.seq,
    ts: row.ts,
    type: row.type,
    schemaVersion: row.schema_version,
    payload: parseJsonRecord(row.payload_json),
    prevHash: row.prev_hash,
    hash: row.hash,
  };
}

function rowToSession(raw: unknown): LedgerSession {
  const row = parseRow(SessionRowSchema, raw);
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(parseJsonRecord(row.metadata))) {
    metadata[key] = String(value);
  }
  return { sessionId: row.session_id, createdAt: row.created_at, metadata };
}

// ---------------------------------------------------------------------------
// DDL
// ---------------------------------------------------------------------------

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id  TEXT PRIMARY KEY,
  created_at  TEXT NOT NULL,
  metadata    TEXT NOT NULL DEFAULT '{}'
);

CREATE TABLE IF NOT EXISTS events (
  session_id     TEXT    NOT NULL REFERENCES sessions(session_id),
  seq            INTEGER NOT NULL,
  event_id       TEXT    NOT NULL UNIQUE,
  ts             TEXT    NOT NULL,
  type           TEXT    NOT NULL,
  schema_version TEXT    NOT NULL,
  payload_json   TEXT    NOT NULL,
  prev_hash      TEXT,
  hash           TEXT    NOT NULL,
  PRIMARY KEY (session_id, seq)
);

CREATE INDEX IF NOT EXISTS idx_events_session_id ON events(session_id);
CREATE INDEX IF NOT EXISTS idx_events_type ON events(type);
`;

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export class UsageLedger {
  private readonly db: InstanceType<typeof Database>;

  private readonly stmtInsertSession: Stmt;
  private readonly stmtGetSession: Stmt;
  private readonly stmtListSessions: Stmt;
  private readonly stmtLastEvent: Stmt;
  private readonly stmtInsertEvent: Stmt;
  private readonly stmtEventsBySession: Stmt;

  private readonly txnAppend: (sessionId: string, draft: UsageEventDraft) => UsageEvent;
  private readonly txnEnsure: (
    sessionId: string,
    metadata: Record<string, string>,
  ) => LedgerSession;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);

    this.stmtInsertSession = this.db.prepare(
      "INSERT INTO sessions (session_id, created_at, metadata) VALUES (?, ?, ?)",
    ) as Stmt;

    this.stmtGetSession = this.db.prepare(
      "SELECT session_id, created_at, metadata FROM sessions WHERE session_id = ?",
    ) as Stmt;

    this.stmtListSessions = this.db.prepare(
      "SELECT session_id, created_at, metadata FROM sessions ORDER BY created_at ASC, session_id ASC",
    ) as Stmt;

    this.stmtLastEvent = this.db.prepare(
      "SELECT seq, hash FROM events WHERE session_id = ? ORDER BY seq DESC LIMIT 1",
    ) as Stmt;

    this.stmtInsertEvent = this.db.prepare(
      `INSERT INTO events
         (session_id, seq, event_id, ts, type, schema_version,
          payload_json, prev_hash, hash)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ) as Stmt;

    this.stmtEventsBySession = this.db.prepare(
      "SELECT * FROM events WHERE session_id = ? ORDER BY seq ASC",
    ) as Stmt;

    this.txnAppend = this.db.transaction(
      (sessionId: string, draft: UsageEventDraft): UsageEvent => {
        if (this.stmtGetSession.get(sessionId) === undefined) {
          throw new LedgerError(
            `Session not found: ${sessionId}`,
            "SESSION_NOT_FOUND",
            { sessionId },
          );
        }

        const lastRaw = this.stmtLastEvent.get(sessionId);
        const last = lastRaw === undefined ? undefined : parseRow(LastEventRowSchema, lastRaw);
        const seq = last ? last.seq + 1 : 1;
        const prevHash: string | null = last ? last.hash : null;

        if (seq === 1 && draft.type !== "SessionStarted") {
          throw new LedgerError(
            `First event in a session must be SessionStarted, got: ${draft.type}`,
            "FIRST_EVENT_NOT_SESSION_STARTED",
            { sessionId, type: draft.type },
          );
        }

        const eventId = draft.eventId ?? uuidv4();
        const ts = draft.ts ?? new Date().toISOString();
        // Round-trip through canonical JSON so the hashed payload equals
        // what listEvents later reads back.
        const payload = parseJsonRecord(canonicalJson(redactPayload(draft.payload)));
        const hash = computeEventHash({
          eventId,
          sessionId,
          seq,
          ts,
          type: draft.type,
          schemaVersion: LEDGER_SCHEMA_VERSION,
          payload,
        });

        try {
          this.stmtInsertEvent.run(
            sessionId,
            seq,
            eventId,
            ts,
            draft.type,
            LEDGER_SCHEMA_VERSION,
            canonicalJson(payload),
            prevHash,
            hash,
          );
        } catch (err: unknown) {
          if (err instanceof Error && err.message.includes("UNIQUE constraint")) {
            throw new LedgerError(
              `Event ID already exists: ${eventId}`,
              "EVENT_ID_CONFLICT",
              { eventId },
            );
          }
          throw err;
        }

        return {
          eventId,
          sessionId,
          seq,
          ts,
          type: draft.type,
          schemaVersion: LEDGER_SCHEMA_VERSION,
          payload,
          prevHash,
          hash,
        };
      },
    );

    this.txnEnsure = this.db.transaction(
      (sessionId: string, metadata: Record<string, string>): LedgerSession => {
        const existing = this.stmtGetSession.get(sessionId);
        if (existing !== undefined) {
          return rowToSession(existing);
        }
        const createdAt = new Date().toISOString();
        this.stmtInsertSession.run(sessionId, createdAt, canonicalJson(metadata));
        this.txnAppend(sessionId, {
          type: "SessionStarted",
          payload: { metadata },
          ts: createdAt,
        });
        return { sessionId, createdAt, metadata: { ...metadata } };
      },
    );
  }

  // -----------------------------------------------------------------------
  // Sessions
  // -----------------------------------------------------------------------

  /**
   * Create the session's chain (with its SessionStarted event) unless it
   * already exists. Idempotent.
   */
  ensureSession(sessionId: string, metadata: Record<string, string> = {}): LedgerSession {
    return this.txnEnsure(sessionId, metadata);
  }

  getSession(sessionId: string): LedgerSession | undefined {
    const row = this.stmtGetSession.get(sessionId);
    return row === undefined ? undefined : rowToSession(row);
  }

  listSessions(): LedgerSession[] {
    return this.stmtListSessions.all().map(rowToSession);
  }

  // -----------------------------------------------------------------------
  // Events
  // -----------------------------------------------------------------------

  /** Append to an existing session's chain. */
  append(sessionId: string, draft: UsageEventDraft): UsageEvent {
    return this.txnAppend(sessionId, draft);
  }

  /** Append, starting the session's chain first when needed. */
  record(sessionId: string, draft: UsageEventDraft): UsageEvent {
    this.ensureSession(sessionId);
    return this.txnAppend(sessionId, draft);
  }

  listEvents(sessionId: string): UsageEvent[] {
    return this.stmtEventsBySession.all(sessionId).map(rowToUsageEvent);
  }

  verifySessionChain(sessionId: string): ChainVerificationResult {
    return verifyChain(this.listEvents(sessionId));
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  close(): void {
    this.db.close();
  }
}
