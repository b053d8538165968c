/**
 * Knowledge Requirement Table: static action model.
 *
 * Every action an agent can request is declared here, together with the
 * knowledge topics it must have studied and the resource kinds whose names
 * must be human-confirmed. No dynamic action creation: an action kind that
 * is not declared here is unknown to the gate.
 */

import { GateError } from "./errors.js";

// ---------------------------------------------------------------------------
// Vocabulary
// ---------------------------------------------------------------------------

export const KNOWLEDGE_TOPICS = [
  "profiles",
  "cli",
  "project",
  "inputs",
  "models",
  "macros",
  "propensity",
  "datediff-entity-vars",
] as const;

export type KnowledgeTopic = (typeof KNOWLEDGE_TOPICS)[number];

export const RESOURCE_KINDS = [
  "connection",
  "database",
  "schema",
  "table",
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export const ACTION_KINDS = [
  "list_connections",
  "search_docs",
  "initialize_connection",
  "list_tables",
  "input_table_suggestions",
  "describe_table",
  "run_query",
  "analyze_existing_project",
  "get_profiles_output_details",
  "create_inputs_yaml",
  "create_models_yaml",
  "create_entity_vars",
  "add_date_filtering",
  "create_propensity_model",
  "evaluate_eligible_user_filters",
  "validate_propensity_model_config",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export function isKnowledgeTopic(value: string): value is KnowledgeTopic {
  return (KNOWLEDGE_TOPICS as readonly string[]).includes(value);
}

export function isResourceKind(value: string): value is ResourceKind {
  return (RESOURCE_KINDS as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Action definitions
// ---------------------------------------------------------------------------

export interface ActionDefinition {
  kind: ActionKind;
  description: string;
  /** Topics that must all be studied, in the order they are reported. */
  requiredTopics: readonly KnowledgeTopic[];
  /**
   * Resource kinds the action may refer to; each referenced name must be
   * confirmed. References of any other kind are rejected.
   */
  referencedResourceKinds: readonly ResourceKind[];
  /** Subset of referencedResourceKinds that must name at least one resource. */
  requiredResourceKinds: readonly ResourceKind[];
}

const ACTION_DEFINITIONS: readonly ActionDefinition[] = [
  // Discovery
  {
    kind: "list_connections",
    description: "List warehouse connections available to the project",
    requiredTopics: [],
    referencedResourceKinds: [],
    requiredResourceKinds: [],
  },
  {
    kind: "search_docs",
    description: "Search the profiles documentation and FAQ",
    requiredTopics: [],
    referencedResourceKinds: [],
    requiredResourceKinds: [],
  },
  {
    kind: "initialize_connection",
    description: "Open a warehouse connection for this session",
    requiredTopics: ["profiles"],
    referencedResourceKinds: ["connection"],
    requiredResourceKinds: ["connection"],
  },
  {
    kind: "list_tables",
    description: "List tables in a warehouse schema",
    requiredTopics: ["profiles"],
    referencedResourceKinds: [],
    requiredResourceKinds: [],
  },
  {
    kind: "input_table_suggestions",
    description: "Suggest input tables across several warehouse schemas",
    requiredTopics: ["profiles"],
    referencedResourceKinds: [],
    requiredResourceKinds: [],
  },
  {
    kind: "describe_table",
    description: "Describe the columns of a confirmed table",
    requiredTopics: ["profiles"],
    referencedResourceKinds: ["table"],
    requiredResourceKinds: ["table"],
  },
  {
    kind: "run_query",
    description: "Run an ad-hoc SQL query on the active connection",
    requiredTopics: ["profiles"],
    referencedResourceKinds: [],
    requiredResourceKinds: [],
  },
  {
    kind: "analyze_existing_project",
    description: "Analyze the structure of an existing project on disk",
    requiredTopics: ["profiles"],
    referencedResourceKinds: [],
    requiredResourceKinds: [],
  },
  {
    kind: "get_profiles_output_details",
    description: "Locate the output schema, feature views and id stitcher tables of a run",
    requiredTopics: ["profiles"],
    referencedResourceKinds: [],
    requiredResourceKinds: [],
  },
  // Configuration
  {
    kind: "create_inputs_yaml",
    description: "Generate inputs.yaml for confirmed tables",
    requiredTopics: ["profiles", "inputs"],
    referencedResourceKinds: ["table", "connection"],
    requiredResourceKinds: ["table"],
  },
  {
    kind: "create_models_yaml",
    description: "Generate profiles.yaml with an id stitcher model",
    requiredTopics: ["profiles", "inputs", "models", "macros"],
    referencedResourceKinds: ["table", "connection"],
    requiredResourceKinds: ["table"],
  },
  {
    kind: "create_entity_vars",
    description: "Generate an entity var group",
    requiredTopics: ["profiles", "models", "macros"],
    referencedResourceKinds: ["table", "connection"],
    requiredResourceKinds: ["table"],
  },
  {
    kind: "add_date_filtering",
    description: "Generate time-windowed entity vars using datediff macros",
    requiredTopics: ["profiles", "models", "macros", "datediff-entity-vars"],
    referencedResourceKinds: ["table", "connection"],
    requiredResourceKinds: ["table"],
  },
  {
    kind: "create_propensity_model",
    description: "Generate a propensity model definition",
    requiredTopics: ["profiles", "inputs", "models", "propensity"],
    referencedResourceKinds: ["table", "connection"],
    requiredResourceKinds: ["table"],
  },
  // Propensity analysis
  {
    kind: "evaluate_eligible_user_filters",
    description: "Score candidate eligible-user filters against a confirmed label table",
    requiredTopics: ["profiles", "propensity"],
    referencedResourceKinds: ["table"],
    requiredResourceKinds: ["table"],
  },
  {
    kind: "validate_propensity_model_config",
    description: "Check a configured propensity model for common pitfalls before a run",
    requiredTopics: ["profiles", "propensity"],
    referencedResourceKinds: [],
    requiredResourceKinds: [],
  },
];

// ---------------------------------------------------------------------------
// Table validation
// ---------------------------------------------------------------------------

/**
 * Check the structural soundness of a requirement table.
 * @throws GateError with code REQUIREMENT_TABLE_INVALID
 */
export function validateRequirementTable(
  definitions: readonly ActionDefinition[],
  expectedKinds: readonly string[] = ACTION_KINDS,
): void {
  const seen = new Set<string>();
  for (const def of definitions) {
    if (seen.has(def.kind)) {
      throw new GateError(
        `Duplicate action kind in requirement table: ${def.kind}`,
        "REQUIREMENT_TABLE_INVALID",
        { kind: def.kind },
      );
    }
    seen.add(def.kind);

    const topics = new Set<string>();
    for (const topic of def.requiredTopics) {
      if (!isKnowledgeTopic(topic) || topics.has(topic)) {
        throw new GateError(
          `Invalid or repeated topic "${topic}" for action ${def.kind}`,
          "REQUIREMENT_TABLE_INVALID",
          { kind: def.kind, topic },
        );
      }
      topics.add(topic);
    }

    for (const resourceKind of def.referencedResourceKinds) {
      if (!isResourceKind(resourceKind)) {
        throw new GateError(
          `Unknown resource kind "${resourceKind}" for action ${def.kind}`,
          "REQUIREMENT_TABLE_INVALID",
          { kind: def.kind, resourceKind },
        );
      }
    }

    for (const resourceKind of def.requiredResourceKinds) {
      if (!def.referencedResourceKinds.includes(resourceKind)) {
        throw new GateError(
          `Required resource kind "${resourceKind}" is not referenced by action ${def.kind}`,
          "REQUIREMENT_TABLE_INVALID",
          { kind: def.kind, resourceKind },
        );
      }
    }
  }

  const undeclared = expectedKinds.filter((kind) => !seen.has(kind));
  if (undeclared.length > 0) {
    throw new GateError(
      `Requirement table is missing actions: ${undeclared.join(", ")}`,
      "REQUIREMENT_TABLE_INVALID",
      { undeclared },
    );
  }
}

validateRequirementTable(ACTION_DEFINITIONS);

export const REQUIREMENT_TABLE: ReadonlyMap<string, ActionDefinition> =
  new Map(ACTION_DEFINITIONS.map((def) => [def.kind, def]));

// ---------------------------------------------------------------------------
// Table queries
// ---------------------------------------------------------------------------

export function getActionDefinition(
  kind: string,
): ActionDefinition | undefined {
  return REQUIREMENT_TABLE.get(kind);
}

export function isActionKind(kind: string): kind is ActionKind {
  return REQUIREMENT_TABLE.has(kind);
}

export function getSupportedActions(): readonly ActionKind[] {
  return ACTION_DEFINITIONS.map((def) => def.kind);
}

/**
 * Required topics for an action, or undefined when the action is unknown.
 */
export function requiredTopicsFor(
  kind: string,
): readonly KnowledgeTopic[] | undefined {
  return REQUIREMENT_TABLE.get(kind)?.requiredTopics;
}
