/**
 * WorkflowState: per-session knowledge and confirmation tracker.
 *
 * Studied topics and confirmed resource names only ever grow while the
 * state object lives. Not safe for concurrent use on its own: callers go
 * through a SessionHandle, which holds the session lock.
 */

import { findPlaceholderNames } from "../gate/placeholder.js";
import type { ResourceKind } from "../gate/requirements.js";
import type { GateSnapshot } from "../gate/types.js";

// ---------------------------------------------------------------------------
// Phase (advisory only; never consulted by the gate)
// ---------------------------------------------------------------------------

export type WorkflowPhase =
  | "start"
  | "knowledge_gathering"
  | "resources_confirmed";

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export interface WorkflowSnapshot extends GateSnapshot {
  sessionId: string;
  createdAt: string;
  phase: WorkflowPhase;
  studiedTopics: ReadonlySet<string>;
  confirmedResources: ReadonlyMap<ResourceKind, ReadonlySet<string>>;
}

/** JSON-friendly rendering of a snapshot (sorted for stable output). */
export interface WorkflowStateView {
  sessionId: string;
  createdAt: string;
  phase: WorkflowPhase;
  studiedTopics: string[];
  confirmedResources: Partial<Record<ResourceKind, string[]>>;
}

export function toStateView(snapshot: WorkflowSnapshot): WorkflowStateView {
  const confirmedResources: Partial<Record<ResourceKind, string[]>> = {};
  for (const [kind, names] of snapshot.confirmedResources) {
    confirmedResources[kind] = [...names].sort();
  }
  return {
    sessionId: snapshot.sessionId,
    createdAt: snapshot.createdAt,
    phase: snapshot.phase,
    studiedTopics: [...snapshot.studiedTopics].sort(),
    confirmedResources,
  };
}

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

export class WorkflowState {
  public readonly sessionId: string;
  public readonly createdAt: string;

  private readonly studiedTopics = new Set<string>();
  private readonly confirmedResources = new Map<ResourceKind, Set<string>>();
  private phase: WorkflowPhase = "start";

  constructor(sessionId: string, createdAt: Date = new Date()) {
    this.sessionId = sessionId;
    this.createdAt = createdAt.toISOString();
  }

  recordTopicStudied(topic: string): void {
    this.studiedTopics.add(topic);
    if (this.phase === "start") {
      this.phase = "knowledge_gathering";
    }
  }

  /**
   * Confirm a batch of names for one resource kind. All-or-nothing: when
   * any name looks like a placeholder, the violating names are returned and
   * nothing is recorded.
   */
  confirmResources(kind: ResourceKind, names: readonly string[]): string[] {
    const violations = findPlaceholderNames(names);
    if (violations.length > 0) {
      return violations;
    }
    if (names.length === 0) {
      return [];
    }

    let confirmed = this.confirmedResources.get(kind);
    if (!confirmed) {
      confirmed = new Set<string>();
      this.confirmedResources.set(kind, confirmed);
    }
    for (const name of names) {
      confirmed.add(name);
    }
    this.phase = "resources_confirmed";
    return [];
  }

  snapshot(): WorkflowSnapshot {
    const confirmed = new Map<ResourceKind, ReadonlySet<string>>();
    for (const [kind, names] of this.confirmedResources) {
      confirmed.set(kind, new Set(names));
    }
    return Object.freeze({
      sessionId: this.sessionId,
      createdAt: this.createdAt,
      phase: this.phase,
      studiedTopics: new Set(this.studiedTopics),
      confirmedResources: confirmed,
    });
  }
}
