import { describe, it, expect } from "vitest";
import {
  computeEventHash,
  sha256,
  verifyChain,
  type ChainedEvent,
} from "../src/audit/hashing.js";

// ===================================================================
// sha256
// ===================================================================

describe("sha256", () => {
  it("produces correct digest for empty string", () => {
    expect(sha256("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("produces correct digest for 'hello'", () => {
    expect(sha256("hello")).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  it("returns a 64-char lowercase hex string", () => {
    expect(sha256("anything")).toMatch(/^[0-9a-f]{64}$/);
  });
});

// ===================================================================
// computeEventHash
// ===================================================================

describe("computeEventHash", () => {
  const baseEvent = {
    eventId: "evt-001",
    sessionId: "s1",
    seq: 1,
    ts: "2026-02-09T12:00:00.000Z",
    type: "SessionStarted",
    schemaVersion: "1.0.0",
    payload: { metadata: {} },
  };

  it("excludes hash and prevHash from computation", () => {
    const h1 = computeEventHash({ ...baseEvent, hash: "anything", prevHash: "anything" });
    const h2 = computeEventHash({ ...baseEvent, hash: "different", prevHash: null });
    expect(h1).toBe(h2);
    expect(h1).toBe(computeEventHash(baseEvent));
  });

  it("equals the digest of the canonical JSON", () => {
    expect(computeEventHash(baseEvent)).toBe(
      sha256(
        '{"eventId":"evt-001","payload":{"metadata":{}},"schemaVersion":"1.0.0","seq":1,"sessionId":"s1","ts":"2026-02-09T12:00:00.000Z","type":"SessionStarted"}',
      ),
    );
  });

  it("changes when any covered field changes", () => {
    const base = computeEventHash(baseEvent);
    expect(computeEventHash({ ...baseEvent, seq: 2 })).not.toBe(base);
    expect(computeEventHash({ ...baseEvent, sessionId: "s2" })).not.toBe(base);
    expect(computeEventHash({ ...baseEvent, payload: { metadata: { k: "v" } } })).not.toBe(base);
  });

  it("is stable across key insertion order", () => {
    const reordered = {
      payload: { metadata: {} },
      schemaVersion: "1.0.0",
      type: "SessionStarted",
      ts: "2026-02-09T12:00:00.000Z",
      seq: 1,
      sessionId: "s1",
      eventId: "evt-001",
    };
    expect(computeEventHash(reordered)).toBe(computeEventHash(baseEvent));
  });
});

// ===================================================================
// verifyChain
// ===================================================================

interface TestEvent extends ChainedEvent {
  sessionId: string;
  type: string;
  payload: Record<string, unknown>;
}

function buildChain(count: number): TestEvent[] {
  const events: TestEvent[] = [];
  for (let i = 0; i < count; i++) {
    const body = {
      eventId: `evt-${String(i).padStart(3, "0")}`,
      sessionId: "s1",
      seq: i + 1,
      type: i === 0 ? "SessionStarted" : "ToolCallCompleted",
      payload: { index: i },
    };
    events.push({
      ...body,
      prevHash: events[i - 1]?.hash ?? null,
      hash: computeEventHash(body),
    });
  }
  return events;
}

function at(events: TestEvent[], index: number): TestEvent {
  const event = events[index];
  if (!event) throw new Error(`no event at ${index}`);
  return event;
}

describe("verifyChain", () => {
  it("verifies a valid chain", () => {
    const events = buildChain(5);
    const result = verifyChain(events);
    expect(result.valid).toBe(true);
    expect(result.eventCount).toBe(5);
    expect(result.failures).toEqual([]);
    expect(result.hashes).toEqual(events.map((e) => e.hash));
  });

  it("verifies an empty list", () => {
    expect(verifyChain([])).toEqual({ valid: true, eventCount: 0, failures: [], hashes: [] });
  });

  it("detects payload tampering at the tampered event", () => {
    const events = buildChain(3);
    at(events, 1).payload = { index: 999 };

    const result = verifyChain(events);
    expect(result.valid).toBe(false);
    expect(result.failures.map((f) => [f.seq, f.reason])).toEqual([[2, "hash_mismatch"]]);
  });

  it("detects a broken link", () => {
    const events = buildChain(3);
    at(events, 2).prevHash = "0".repeat(64);

    const result = verifyChain(events);
    expect(result.failures).toEqual([
      {
        seq: 3,
        eventId: "evt-002",
        reason: "prevHash_mismatch",
        expected: at(events, 1).hash,
        actual: "0".repeat(64),
      },
    ]);
  });

  it("detects a non-null prevHash on the first event", () => {
    const events = buildChain(2);
    at(events, 0).prevHash = "somehash";

    const result = verifyChain(events);
    expect(result.failures.map((f) => f.reason)).toEqual(["first_event_prevHash_not_null"]);
  });

  it("detects a seq gap", () => {
    const events = buildChain(3);
    at(events, 1).seq = 5;

    const reasons = verifyChain(events).failures.map((f) => f.reason);
    expect(reasons).toContain("seq_gap");
    expect(reasons).toContain("hash_mismatch");
  });

  it("reports the next link when a tampered hash is recomputed", () => {
    const events = buildChain(3);
    const first = at(events, 0);
    first.payload = { index: 999 };
    first.hash = computeEventHash(first);

    const result = verifyChain(events);
    expect(result.failures.map((f) => [f.seq, f.reason])).toEqual([[2, "prevHash_mismatch"]]);
  });
});
