import { describe, it, expect } from "vitest";
import { GateError } from "../src/gate/errors.js";
import {
  ACTION_KINDS,
  REQUIREMENT_TABLE,
  getActionDefinition,
  getSupportedActions,
  isActionKind,
  requiredTopicsFor,
  validateRequirementTable,
  type ActionDefinition,
} from "../src/gate/requirements.js";

function def(overrides: Partial<ActionDefinition> & Pick<ActionDefinition, "kind">): ActionDefinition {
  return {
    description: "test action",
    requiredTopics: [],
    referencedResourceKinds: [],
    requiredResourceKinds: [],
    ...overrides,
  };
}

describe("requirement table", () => {
  it("declares every action kind exactly once", () => {
    expect(REQUIREMENT_TABLE.size).toBe(ACTION_KINDS.length);
    expect(getSupportedActions()).toEqual([...ACTION_KINDS]);
  });

  it.each([
    { kind: "list_connections", topics: [] },
    { kind: "search_docs", topics: [] },
    { kind: "initialize_connection", topics: ["profiles"] },
    { kind: "list_tables", topics: ["profiles"] },
    { kind: "input_table_suggestions", topics: ["profiles"] },
    { kind: "describe_table", topics: ["profiles"] },
    { kind: "run_query", topics: ["profiles"] },
    { kind: "analyze_existing_project", topics: ["profiles"] },
    { kind: "get_profiles_output_details", topics: ["profiles"] },
    { kind: "create_inputs_yaml", topics: ["profiles", "inputs"] },
    { kind: "create_models_yaml", topics: ["profiles", "inputs", "models", "macros"] },
    { kind: "create_entity_vars", topics: ["profiles", "models", "macros"] },
    { kind: "add_date_filtering", topics: ["profiles", "models", "macros", "datediff-entity-vars"] },
    { kind: "create_propensity_model", topics: ["profiles", "inputs", "models", "propensity"] },
    { kind: "evaluate_eligible_user_filters", topics: ["profiles", "propensity"] },
    { kind: "validate_propensity_model_config", topics: ["profiles", "propensity"] },
  ])("$kind requires $topics", ({ kind, topics }) => {
    expect(requiredTopicsFor(kind)).toEqual(topics);
  });

  it.each([
    { kind: "initialize_connection", required: ["connection"] },
    { kind: "describe_table", required: ["table"] },
    { kind: "create_inputs_yaml", required: ["table"] },
    { kind: "create_propensity_model", required: ["table"] },
    { kind: "evaluate_eligible_user_filters", required: ["table"] },
    { kind: "run_query", required: [] },
  ])("$kind must name $required", ({ kind, required }) => {
    expect(getActionDefinition(kind)?.requiredResourceKinds).toEqual(required);
  });

  it("returns undefined for unknown actions", () => {
    expect(getActionDefinition("drop_database")).toBeUndefined();
    expect(requiredTopicsFor("drop_database")).toBeUndefined();
    expect(isActionKind("drop_database")).toBe(false);
    expect(isActionKind("run_query")).toBe(true);
  });
});

describe("validateRequirementTable", () => {
  it("accepts a well-formed table", () => {
    expect(() =>
      validateRequirementTable(
        [def({ kind: "list_connections" }), def({ kind: "run_query", requiredTopics: ["profiles"] })],
        ["list_connections", "run_query"],
      ),
    ).not.toThrow();
  });

  it("rejects duplicate action kinds", () => {
    try {
      validateRequirementTable(
        [def({ kind: "run_query" }), def({ kind: "run_query" })],
        ["run_query"],
      );
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(GateError);
      expect((e as GateError).code).toBe("REQUIREMENT_TABLE_INVALID");
    }
  });

  it("rejects a repeated topic", () => {
    expect(() =>
      validateRequirementTable(
        [def({ kind: "run_query", requiredTopics: ["profiles", "profiles"] })],
        ["run_query"],
      ),
    ).toThrow(/Invalid or repeated topic "profiles"/);
  });

  it("rejects an action kind with no definition", () => {
    expect(() =>
      validateRequirementTable([def({ kind: "run_query" })], ["run_query", "list_tables"]),
    ).toThrow("Requirement table is missing actions: list_tables");
  });

  it("rejects a required resource kind the action does not reference", () => {
    expect(() =>
      validateRequirementTable(
        [def({ kind: "describe_table", referencedResourceKinds: ["schema"], requiredResourceKinds: ["table"] })],
        ["describe_table"],
      ),
    ).toThrow('Required resource kind "table" is not referenced by action describe_table');
  });
});
