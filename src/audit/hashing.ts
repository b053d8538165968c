/**
 * SHA-256 hashing for usage events.
 *
 * An event's hash covers every field except `hash` and `prevHash`,
 * serialized as canonical JSON. Pure functions.
 */

import { createHash } from "node:crypto";
import { canonicalJson } from "./canonical.js";

export function sha256(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

// ---------------------------------------------------------------------------
// Event hash computation
// ---------------------------------------------------------------------------

const HASH_EXCLUDED_FIELDS: ReadonlySet<string> = new Set([
  "hash",
  "prevHash",
]);

export function computeEventHash(event: object): string {
  const stripped: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    if (!HASH_EXCLUDED_FIELDS.has(key)) {
      stripped[key] = value;
    }
  }
  return sha256(canonicalJson(stripped));
}

// ---------------------------------------------------------------------------
// Chain verification
// ---------------------------------------------------------------------------

/** The fields chain verification reads; the rest is covered by the hash. */
export interface ChainedEvent {
  eventId: string;
  seq: number;
  prevHash: string | null;
  hash: string;
}

export interface ChainFailure {
  seq: number;
  eventId: string;
  reason:
    | "hash_mismatch"
    | "prevHash_mismatch"
    | "first_event_prevHash_not_null"
    | "seq_gap";
  expected: string;
  actual: string;
}

export interface ChainVerificationResult {
  valid: boolean;
  eventCount: number;
  failures: ChainFailure[];
  hashes: string[];
}

/**
 * Verify the hash chain of events sorted by `seq` ascending.
 *
 * Per event: the recomputed hash matches, `prevHash` links to the previous
 * event's hash (null for the first) and `seq` equals its position.
 */
export function verifyChain(
  events: readonly ChainedEvent[],
): ChainVerificationResult {
  const failures: ChainFailure[] = [];
  const hashes: string[] = [];
  let previous: ChainedEvent | undefined;

  events.forEach((event, i) => {
    const { seq, eventId } = event;

    const expectedHash = computeEventHash(event);
    if (event.hash !== expectedHash) {
      failures.push({
        seq,
        eventId,
        reason: "hash_mismatch",
        expected: expectedHash,
        actual: event.hash,
      });
    }

    if (previous === undefined) {
      if (event.prevHash !== null) {
        failures.push({
          seq,
          eventId,
          reason: "first_event_prevHash_not_null",
          expected: "null",
          actual: event.prevHash,
        });
      }
    } else if (event.prevHash !== previous.hash) {
      failures.push({
        seq,
        eventId,
        reason: "prevHash_mismatch",
        expected: previous.hash,
        actual: event.prevHash ?? "null",
      });
    }

    if (seq !== i + 1) {
      failures.push({
        seq,
        eventId,
        reason: "seq_gap",
        expected: String(i + 1),
        actual: String(seq),
      });
    }

    hashes.push(event.hash);
    previous = event;
  });

  return {
    valid: failures.length === 0,
    eventCount: events.length,
    failures,
    hashes,
  };
}
