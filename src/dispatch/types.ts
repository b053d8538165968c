/**
 * Dispatch-layer types: calls, outcomes, handlers and middleware.
 */

import type { CollaboratorFailure, CollaboratorName } from "../collaborators/errors.js";
import type { ActionKind } from "../gate/requirements.js";
import type { BlockReasonKind, GateBlock, ResourceRefs } from "../gate/types.js";

export interface DispatchCall {
  sessionId: string;
  actionKind: string;
  resourceRefs: ResourceRefs;
  payload: unknown;
}

export interface DispatchOptions {
  /** Reaches the handler only; the gate itself is never cancelled. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export interface CompletedOutcome {
  approved: true;
  outcome: "completed";
  actionKind: ActionKind;
  result: unknown;
}

export interface CollaboratorErrorOutcome {
  approved: true;
  outcome: "collaborator_error";
  actionKind: ActionKind;
  error: CollaboratorFailure;
}

export interface BlockedOutcome {
  approved: false;
  outcome: "blocked";
  reasonKind: BlockReasonKind;
  details: GateBlock["details"];
  nextSteps: string[];
}

export type DispatchOutcome =
  | CompletedOutcome
  | CollaboratorErrorOutcome
  | BlockedOutcome;

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export interface HandlerContext {
  sessionId: string;
  resourceRefs: ResourceRefs;
  signal: AbortSignal | undefined;
}

export interface ActionHandler {
  /** Attributed when the handler fails with something other than a CollaboratorError. */
  collaborator: CollaboratorName;
  run(payload: unknown, ctx: HandlerContext): Promise<unknown>;
}

export type HandlerTable = Readonly<Partial<Record<ActionKind, ActionHandler>>>;

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

export type DispatchMiddleware = (
  call: DispatchCall,
  next: () => Promise<DispatchOutcome>,
) => Promise<DispatchOutcome>;
