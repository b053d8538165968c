/**
 * Action Gate: pure evaluation logic.
 *
 * Decides whether an action requested by an agent may proceed, given an
 * immutable snapshot of its session. No side effects, no I/O, no clock.
 *
 * Checks run in a fixed order and the first failing check is reported:
 *   0. the action kind must be declared in the requirement table, and
 *      every referenced resource kind must be declared for it
 *   1. every required knowledge topic must have been studied
 *   2. every required resource kind must be named, and every referenced
 *      resource name must have been confirmed
 *   3. no referenced name may look like a placeholder
 *
 * INVARIANT: an action is forwarded to a collaborator only if
 * evaluateActionGate() returned status "approved" for it.
 */

import {
  getActionDefinition,
  getSupportedActions,
  type ResourceKind,
} from "./requirements.js";
import { findPlaceholderNames } from "./placeholder.js";
import type {
  ActionRequest,
  GateSnapshot,
  ResourceRefs,
  ValidationResult,
} from "./types.js";

function refEntries(refs: ResourceRefs): Array<[string, readonly string[]]> {
  const entries: Array<[string, readonly string[]]> = [];
  for (const [kind, names] of Object.entries(refs)) {
    if (names !== undefined) {
      entries.push([kind, names]);
    }
  }
  return entries;
}

/**
 * Names that were never confirmed, per kind, in request order without
 * duplicates. Kinds with no gap are omitted.
 */
function findUnconfirmed(
  snapshot: GateSnapshot,
  refs: ResourceRefs,
): Record<string, string[]> {
  const unconfirmed: Record<string, string[]> = {};
  for (const [kind, names] of refEntries(refs)) {
    const confirmed = snapshot.confirmedResources.get(kind);
    const missing: string[] = [];
    for (const name of names) {
      if (confirmed?.has(name) !== true && !missing.includes(name)) {
        missing.push(name);
      }
    }
    if (missing.length > 0) {
      unconfirmed[kind] = missing;
    }
  }
  return unconfirmed;
}

function missingRequiredKinds(
  required: readonly ResourceKind[],
  refs: ResourceRefs,
): ResourceKind[] {
  return required.filter((kind) => (refs[kind]?.length ?? 0) === 0);
}

export function evaluateActionGate<P>(
  snapshot: GateSnapshot,
  request: ActionRequest<P>,
): ValidationResult<P> {
  // --- 0. Known action ---

  const definition = getActionDefinition(request.actionKind);
  if (!definition) {
    return {
      status: "blocked",
      reasonKind: "UnknownAction",
      details: {
        actionKind: request.actionKind,
        supportedActions: getSupportedActions(),
      },
    };
  }
  const actionKind = definition.kind;

  const declared: readonly string[] = definition.referencedResourceKinds;
  const undeclaredKinds = refEntries(request.resourceRefs)
    .map(([kind]) => kind)
    .filter((kind) => !declared.includes(kind));
  if (undeclaredKinds.length > 0) {
    return {
      status: "blocked",
      reasonKind: "UndeclaredResource",
      details: {
        actionKind,
        undeclaredKinds,
        referencedResourceKinds: definition.referencedResourceKinds,
      },
    };
  }

  // --- 1. Knowledge ---

  const missingTopics = definition.requiredTopics.filter(
    (topic) => !snapshot.studiedTopics.has(topic),
  );
  if (missingTopics.length > 0) {
    return {
      status: "blocked",
      reasonKind: "MissingKnowledge",
      details: { actionKind, missingTopics },
    };
  }

  // --- 2. Confirmation ---

  const unconfirmed = findUnconfirmed(snapshot, request.resourceRefs);
  const missingKinds = missingRequiredKinds(
    definition.requiredResourceKinds,
    request.resourceRefs,
  );
  if (Object.keys(unconfirmed).length > 0 || missingKinds.length > 0) {
    return {
      status: "blocked",
      reasonKind: "UnconfirmedResource",
      details:
        missingKinds.length > 0
          ? { actionKind, unconfirmed, missingKinds }
          : { actionKind, unconfirmed },
    };
  }

  // --- 3. Placeholders, re-checked regardless of confirmation history ---

  const placeholders = findPlaceholderNames(
    refEntries(request.resourceRefs).flatMap(([, names]) => names),
  );
  if (placeholders.length > 0) {
    return {
      status: "blocked",
      reasonKind: "PlaceholderName",
      details: { actionKind, names: placeholders },
    };
  }

  return { status: "approved", actionKind, payload: request.payload };
}
