/**
 * SessionRegistry: lazy, per-id workflow state with per-session locks.
 *
 * Session ids are opaque strings chosen by the caller. Creation is
 * synchronous, so two concurrent first references to the same id always
 * share one entry. Sessions live for the process lifetime; nothing is
 * persisted.
 */

import type { ResourceKind } from "../gate/requirements.js";
import { SessionLock } from "./lock.js";
import { WorkflowState, type WorkflowSnapshot } from "./state.js";

interface SessionEntry {
  state: WorkflowState;
  readonly lock: SessionLock;
}

export interface ConfirmResult {
  kind: ResourceKind;
  /** Names that look like placeholders. Empty when the batch was recorded. */
  violations: string[];
  snapshot: WorkflowSnapshot;
}

// ---------------------------------------------------------------------------
// SessionHandle
// ---------------------------------------------------------------------------

/**
 * Access to one session. Every operation holds the session lock for the
 * duration of the in-memory work and nothing else.
 */
export class SessionHandle {
  public readonly sessionId: string;
  private readonly entry: SessionEntry;

  constructor(sessionId: string, entry: SessionEntry) {
    this.sessionId = sessionId;
    this.entry = entry;
  }

  withExclusive<T>(fn: (state: WorkflowState) => T | Promise<T>): Promise<T> {
    return this.entry.lock.runExclusive(() => fn(this.entry.state));
  }

  recordTopicStudied(topic: string): Promise<WorkflowSnapshot> {
    return this.withExclusive((state) => {
      state.recordTopicStudied(topic);
      return state.snapshot();
    });
  }

  confirmResources(
    kind: ResourceKind,
    names: readonly string[],
  ): Promise<ConfirmResult> {
    return this.withExclusive((state) => {
      const violations = state.confirmResources(kind, names);
      return { kind, violations, snapshot: state.snapshot() };
    });
  }

  snapshot(): Promise<WorkflowSnapshot> {
    return this.withExclusive((state) => state.snapshot());
  }
}

// ---------------------------------------------------------------------------
// SessionRegistry
// ---------------------------------------------------------------------------

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly clock: () => Date;

  constructor(options?: { clock?: () => Date }) {
    this.clock = options?.clock ?? (() => new Date());
  }

  getOrCreate(sessionId: string): SessionHandle {
    return new SessionHandle(sessionId, this.entryFor(sessionId));
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Discard everything a session has studied and confirmed. Waits for the
   * session lock so an in-flight evaluation finishes against the old state.
   *
   * `release` runs inside the same critical section, after the state is
   * replaced, so no evaluation for this session sees the new state before
   * the session's external resources are released.
   */
  reset(
    sessionId: string,
    release?: (sessionId: string) => void | Promise<void>,
  ): Promise<WorkflowSnapshot> {
    const entry = this.entryFor(sessionId);
    return entry.lock.runExclusive(async () => {
      entry.state = new WorkflowState(sessionId, this.clock());
      await release?.(sessionId);
      return entry.state.snapshot();
    });
  }

  private entryFor(sessionId: string): SessionEntry {
    let entry = this.sessions.get(sessionId);
    if (!entry) {
      entry = {
        state: new WorkflowState(sessionId, this.clock()),
        lock: new SessionLock(),
      };
      this.sessions.set(sessionId, entry);
    }
    return entry;
  }
}
