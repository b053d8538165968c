/**
 * Human-readable next steps for blocked actions, and a progress summary
 * for the workflow-state tool.
 */

import {
  getSupportedActions,
  requiredTopicsFor,
  type ActionKind,
  type KnowledgeTopic,
} from "../gate/requirements.js";
import type { GateBlock, GateSnapshot } from "../gate/types.js";

export function nextStepsFor(block: GateBlock): string[] {
  switch (block.reasonKind) {
    case "UnknownAction":
      return [
        `"${block.details.actionKind}" is not a supported action. Supported actions: ${block.details.supportedActions.join(", ")}.`,
      ];
    case "UndeclaredResource":
      return [
        `${block.details.actionKind} does not take ${block.details.undeclaredKinds.join(", ")} references. It takes: ${block.details.referencedResourceKinds.join(", ") || "none"}.`,
      ];
    case "MissingKnowledge":
      return block.details.missingTopics.map(
        (topic) => `Call about_profiles with topic "${topic}" and read it.`,
      );
    case "UnconfirmedResource":
      return [
        ...(block.details.missingKinds ?? []).map(
          (kind) =>
            `Ask the user which ${kind} ${block.details.actionKind} should use, confirm it with confirm_resources, then pass it to the action.`,
        ),
        ...Object.entries(block.details.unconfirmed).map(
          ([kind, names]) =>
            `Ask the user to confirm the ${kind} name(s) ${names.join(", ")}, then call confirm_resources with kind "${kind}".`,
        ),
      ];
    case "PlaceholderName":
      return [
        `The name(s) ${block.details.names.join(", ")} look like placeholders. Ask the user for the real names and confirm those instead.`,
      ];
  }
}

export interface WorkflowProgress {
  /** Actions whose knowledge requirements are met. */
  unlockedActions: ActionKind[];
  /** Actions still waiting on knowledge. */
  lockedActions: ActionKind[];
  /** Topics the locked actions need, in first-needed order. */
  topicsToStudy: KnowledgeTopic[];
}

export function describeProgress(snapshot: GateSnapshot): WorkflowProgress {
  const unlockedActions: ActionKind[] = [];
  const lockedActions: ActionKind[] = [];
  const topicsToStudy: KnowledgeTopic[] = [];

  for (const action of getSupportedActions()) {
    const missing = (requiredTopicsFor(action) ?? []).filter(
      (topic) => !snapshot.studiedTopics.has(topic),
    );
    if (missing.length === 0) {
      unlockedActions.push(action);
      continue;
    }
    lockedActions.push(action);
    for (const topic of missing) {
      if (!topicsToStudy.includes(topic)) {
        topicsToStudy.push(topic);
      }
    }
  }

  return { unlockedActions, lockedActions, topicsToStudy };
}
