/**
 * Action handlers: one per action kind, each forwarding an approved
 * request to its collaborator.
 *
 * Payloads are re-validated here so that callers other than the MCP tool
 * layer get the same shape guarantees.
 */

import { z } from "zod";
import type { ConnectionCatalog } from "../collaborators/connections.js";
import { CollaboratorError, type CollaboratorName } from "../collaborators/errors.js";
import {
  DateFilteredVarsParamsSchema,
  EntityVarsParamsSchema,
  InputsParamsSchema,
  ModelsParamsSchema,
  PropensityParamsSchema,
  type ConfigGenerator,
} from "../collaborators/generator.js";
import {
  EligibleUserFiltersParamsSchema,
  evaluateEligibleUserFilters,
} from "../collaborators/eligibility.js";
import { OutputDetailsParamsSchema, profilesOutputDetails } from "../collaborators/outputs.js";
import { analyzeProject, loadProject } from "../collaborators/project.js";
import {
  PropensityValidationParamsSchema,
  validatePropensityModel,
} from "../collaborators/propensity.js";
import {
  InputTableSuggestionsParamsSchema,
  suggestInputTables,
} from "../collaborators/suggestions.js";
import type { DocumentationSearch } from "../collaborators/types.js";
import type { WarehouseManager } from "../collaborators/warehouse.js";
import type { ActionKind } from "../gate/requirements.js";
import type { ActionHandler, HandlerContext } from "./types.js";

export function defineHandler<S extends z.ZodTypeAny>(
  collaborator: CollaboratorName,
  schema: S,
  fn: (payload: z.output<S>, ctx: HandlerContext) => unknown,
): ActionHandler {
  return {
    collaborator,
    async run(payload, ctx) {
      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        throw new CollaboratorError(
          "Invalid request payload",
          collaborator,
          "invalid_request",
          { issues: parsed.error.issues },
        );
      }
      return fn(parsed.data, ctx);
    },
  };
}

// ---------------------------------------------------------------------------
// Payload schemas
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_ROWS = 100;

export const SearchDocsPayloadSchema = z.object({
  query: z.string().trim().min(1).max(2000),
  k: z.number().int().min(1).max(20).default(5),
});

export const InitializeConnectionPayloadSchema = z.object({
  connectionName: z.string().trim().min(1),
});

export const ListTablesPayloadSchema = z.object({
  schema: z.string().trim().default("main"),
});

export const DescribeTablePayloadSchema = z.object({
  table: z.string().trim().min(1),
});

export const RunQueryPayloadSchema = z.object({
  sql: z.string().trim().min(1),
  maxRows: z.number().int().min(1).max(10_000).default(DEFAULT_MAX_ROWS),
});

export const AnalyzeProjectPayloadSchema = z.object({
  projectPath: z.string().trim().min(1),
});

// ---------------------------------------------------------------------------
// Handler table
// ---------------------------------------------------------------------------

export interface HandlerDeps {
  connections: ConnectionCatalog;
  warehouses: WarehouseManager;
  docs: DocumentationSearch;
  generator: ConfigGenerator;
}

export function createActionHandlers(
  deps: HandlerDeps,
): Record<ActionKind, ActionHandler> {
  const { connections, warehouses, docs, generator } = deps;

  return {
    list_connections: defineHandler("connections", z.object({}).passthrough(), () => ({
      connections: connections.listNames(),
    })),

    search_docs: defineHandler("docs_search", SearchDocsPayloadSchema, async (p, ctx) => ({
      query: p.query,
      results: await docs.search(p.query, p.k, ctx.signal),
    })),

    initialize_connection: defineHandler(
      "warehouse",
      InitializeConnectionPayloadSchema,
      (p, ctx) => {
        const active = warehouses.initialize(
          ctx.sessionId,
          p.connectionName,
          connections.get(p.connectionName),
        );
        return {
          connectionName: active.connectionName,
          warehouseType: active.warehouse.warehouseType,
          status: "connected",
        };
      },
    ),

    list_tables: defineHandler("warehouse", ListTablesPayloadSchema, async (p, ctx) => {
      const { connectionName, warehouse } = warehouses.requireActive(ctx.sessionId);
      return { connectionName, schema: p.schema, tables: await warehouse.listTables(p.schema) };
    }),

    input_table_suggestions: defineHandler(
      "warehouse",
      InputTableSuggestionsParamsSchema,
      async (p, ctx) => {
        const { connectionName, warehouse } = warehouses.requireActive(ctx.sessionId);
        return { connectionName, ...(await suggestInputTables(warehouse, p.schemas)) };
      },
    ),

    describe_table: defineHandler("warehouse", DescribeTablePayloadSchema, async (p, ctx) => {
      const { warehouse } = warehouses.requireActive(ctx.sessionId);
      return { table: p.table, columns: await warehouse.describeTable(p.table) };
    }),

    run_query: defineHandler("warehouse", RunQueryPayloadSchema, async (p, ctx) => {
      const { warehouse } = warehouses.requireActive(ctx.sessionId);
      const result = await warehouse.executeQuery(p.sql, p.maxRows);
      return {
        columns: result.columns,
        rows: result.rows,
        rowCount: result.rowCount,
        truncated: result.truncated,
      };
    }),

    analyze_existing_project: defineHandler(
      "project_analyzer",
      AnalyzeProjectPayloadSchema,
      (p) => analyzeProject(p.projectPath),
    ),

    get_profiles_output_details: defineHandler(
      "project_analyzer",
      OutputDetailsParamsSchema,
      (p) => profilesOutputDetails(p.projectPath, p.showModelsOutputPath, connections),
    ),

    create_inputs_yaml: defineHandler("generator", InputsParamsSchema, (p) =>
      generator.generate("inputs", p),
    ),

    create_models_yaml: defineHandler("generator", ModelsParamsSchema, (p) =>
      generator.generate("models", p),
    ),

    create_entity_vars: defineHandler("generator", EntityVarsParamsSchema, (p) =>
      generator.generate("entity_vars", p),
    ),

    add_date_filtering: defineHandler("generator", DateFilteredVarsParamsSchema, (p) =>
      generator.generate("date_filtered_vars", p),
    ),

    create_propensity_model: defineHandler("generator", PropensityParamsSchema, (p) =>
      generator.generate("propensity", p),
    ),

    evaluate_eligible_user_filters: defineHandler(
      "warehouse",
      EligibleUserFiltersParamsSchema,
      async (p, ctx) => {
        const { warehouse } = warehouses.requireActive(ctx.sessionId);
        return evaluateEligibleUserFilters(warehouse, p);
      },
    ),

    validate_propensity_model_config: defineHandler(
      "project_analyzer",
      PropensityValidationParamsSchema,
      async (p, ctx) => {
        const { warehouse } = warehouses.requireActive(ctx.sessionId);
        return validatePropensityModel(loadProject(p.projectPath), p.modelName, warehouse);
      },
    ),
  };
}
