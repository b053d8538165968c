/**
 * Gate-layer types shared by the session tracker, the dispatcher and the
 * tool server.
 */

import type { ActionKind, KnowledgeTopic, ResourceKind } from "./requirements.js";

/** Resource names referenced by an action, grouped by kind, in request order. */
export type ResourceRefs = Readonly<Partial<Record<ResourceKind, readonly string[]>>>;

export interface ActionRequest<P = unknown> {
  actionKind: string;
  resourceRefs: ResourceRefs;
  payload: P;
}

/**
 * The read-only view of a session the gate evaluates against.
 * Structural so that any immutable snapshot satisfies it.
 */
export interface GateSnapshot {
  studiedTopics: ReadonlySet<string>;
  confirmedResources: ReadonlyMap<string, ReadonlySet<string>>;
}

export type BlockReasonKind =
  | "UnknownAction"
  | "UndeclaredResource"
  | "MissingKnowledge"
  | "UnconfirmedResource"
  | "PlaceholderName";

export type GateBlock =
  | {
      reasonKind: "UnknownAction";
      details: { actionKind: string; supportedActions: readonly ActionKind[] };
    }
  | {
      reasonKind: "UndeclaredResource";
      details: {
        actionKind: ActionKind;
        undeclaredKinds: string[];
        referencedResourceKinds: readonly ResourceKind[];
      };
    }
  | {
      reasonKind: "MissingKnowledge";
      details: { actionKind: ActionKind; missingTopics: KnowledgeTopic[] };
    }
  | {
      reasonKind: "UnconfirmedResource";
      details: {
        actionKind: ActionKind;
        unconfirmed: Record<string, string[]>;
        /** Required kinds the request named no resource for. Omitted when none. */
        missingKinds?: ResourceKind[];
      };
    }
  | {
      reasonKind: "PlaceholderName";
      details: { actionKind: ActionKind; names: string[] };
    };

export type ValidationResult<P = unknown> =
  | { status: "approved"; actionKind: ActionKind; payload: P }
  | ({ status: "blocked" } & GateBlock);
