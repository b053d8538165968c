/**
 * MCP tool registrations.
 *
 * Ungated tools manage the workflow itself (study a topic, confirm
 * resources, inspect or reset state). Every other tool is an action and
 * goes through the dispatcher, which runs the gate first.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { CollaboratorError } from "../collaborators/errors.js";
import {
  DateFilteredVarsParamsSchema,
  EntityVarsParamsSchema,
  InputsParamsSchema,
  ModelsParamsSchema,
  PropensityParamsSchema,
} from "../collaborators/generator.js";
import { describeProgress } from "../dispatch/guidance.js";
import type { DispatchOutcome } from "../dispatch/types.js";
import type { ActionKind } from "../gate/requirements.js";
import {
  KnowledgeTopicSchema,
  ResourceKindSchema,
  ResourceNameSchema,
  ResourceNamesSchema,
  SessionIdSchema,
} from "../gate/schemas.js";
import type { ResourceRefs } from "../gate/types.js";
import { toStateView } from "../session/state.js";
import type { AppContext } from "./context.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const sessionShape = {
  session_id: SessionIdSchema.optional().describe(
    "Conversation id. Defaults to the transport session, then the server default.",
  ),
};

const resourceShape = {
  connection: ResourceNameSchema.describe("Confirmed connection this file is for"),
  tables: ResourceNamesSchema.min(1).describe("Confirmed tables this file reads"),
};

interface ToolExtra {
  sessionId?: string;
  signal: AbortSignal;
}

/** Explicit argument, then transport session, then configured default. */
export function resolveSessionId(
  explicit: string | undefined,
  transportSessionId: string | undefined,
  defaultSessionId: string,
): string {
  return explicit ?? transportSessionId ?? defaultSessionId;
}

function json(value: unknown, isError = false): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}

function outcomeResult(outcome: DispatchOutcome): CallToolResult {
  return json(outcome, outcome.outcome === "collaborator_error");
}

function refs(connection: string, tables: readonly string[]): ResourceRefs {
  return { connection: [connection], table: [...tables] };
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerWorkflowTools(server: McpServer, ctx: AppContext): void {
  const sessionFor = (explicit: string | undefined, extra: ToolExtra): string =>
    resolveSessionId(explicit, extra.sessionId, ctx.config.defaultSessionId);

  const dispatch = async (
    actionKind: ActionKind,
    sessionId: string,
    resourceRefs: ResourceRefs,
    payload: unknown,
    extra: ToolExtra,
  ): Promise<CallToolResult> =>
    outcomeResult(
      await ctx.dispatcher.dispatch(
        { sessionId, actionKind, resourceRefs, payload },
        { signal: extra.signal },
      ),
    );

  // -----------------------------------------------------------------------
  // Workflow tools (ungated)
  // -----------------------------------------------------------------------

  server.registerTool(
    "about_profiles",
    {
      title: "Study a topic",
      description:
        "Read the reference material for one knowledge topic. Actions stay blocked until the topics they need have been read.",
      inputSchema: { topic: KnowledgeTopicSchema, ...sessionShape },
    },
    async ({ topic, session_id }, extra) => {
      const sessionId = sessionFor(session_id, extra);
      let content: string;
      try {
        content = ctx.knowledge.read(topic);
      } catch (err: unknown) {
        if (err instanceof CollaboratorError) {
          return json({ outcome: "collaborator_error", error: err.toFailure() }, true);
        }
        throw err;
      }
      const snapshot = await ctx.registry.getOrCreate(sessionId).recordTopicStudied(topic);
      ctx.usage.record(sessionId, { type: "TopicStudied", payload: { topic } });
      return json({
        topic,
        studiedTopics: toStateView(snapshot).studiedTopics,
        content,
      });
    },
  );

  server.registerTool(
    "confirm_resources",
    {
      title: "Confirm resource names",
      description:
        "Record resource names the user has explicitly confirmed. A batch with any placeholder-looking name is rejected whole.",
      inputSchema: {
        kind: ResourceKindSchema,
        names: ResourceNamesSchema,
        ...sessionShape,
      },
    },
    async ({ kind, names, session_id }, extra) => {
      const sessionId = sessionFor(session_id, extra);
      const { violations, snapshot } = await ctx.registry
        .getOrCreate(sessionId)
        .confirmResources(kind, names);
      const accepted = violations.length === 0;
      ctx.usage.record(sessionId, {
        type: "ResourcesConfirmed",
        payload: { kind, names, accepted, violations },
      });
      if (!accepted) {
        return json({
          confirmed: false,
          kind,
          violations,
          message:
            "These names look like placeholders. Ask the user for the real names; nothing was recorded.",
        });
      }
      return json({
        confirmed: true,
        kind,
        names,
        confirmedResources: toStateView(snapshot).confirmedResources,
      });
    },
  );

  server.registerTool(
    "get_workflow_state",
    {
      title: "Workflow state",
      description: "Show what this session has studied and confirmed, and which actions are unlocked.",
      inputSchema: sessionShape,
    },
    async ({ session_id }, extra) => {
      const snapshot = await ctx.registry.getOrCreate(sessionFor(session_id, extra)).snapshot();
      return json({ state: toStateView(snapshot), progress: describeProgress(snapshot) });
    },
  );

  server.registerTool(
    "reset_session",
    {
      title: "Reset session",
      description: "Forget everything this session studied and confirmed and close its warehouse connection.",
      inputSchema: sessionShape,
    },
    async ({ session_id }, extra) => {
      const sessionId = sessionFor(session_id, extra);
      const snapshot = await ctx.registry.reset(sessionId, (id) => ctx.warehouses.closeSession(id));
      ctx.usage.record(sessionId, { type: "SessionReset", payload: {} });
      return json({ reset: true, state: toStateView(snapshot) });
    },
  );

  // -----------------------------------------------------------------------
  // Discovery actions
  // -----------------------------------------------------------------------

  server.registerTool(
    "get_existing_connections",
    {
      title: "List connections",
      description: "List the warehouse connections configured for this server.",
      inputSchema: sessionShape,
    },
    async ({ session_id }, extra) =>
      dispatch("list_connections", sessionFor(session_id, extra), {}, {}, extra),
  );

  server.registerTool(
    "search_profiles_docs",
    {
      title: "Search documentation",
      description: "Search the profiles documentation and FAQ.",
      inputSchema: {
        query: z.string().min(1),
        k: z.number().int().min(1).max(20).optional(),
        ...sessionShape,
      },
    },
    async ({ query, k, session_id }, extra) =>
      dispatch("search_docs", sessionFor(session_id, extra), {}, { query, k }, extra),
  );

  server.registerTool(
    "initialize_warehouse_connection",
    {
      title: "Connect to warehouse",
      description: "Open a confirmed warehouse connection for this session.",
      inputSchema: { connection_name: ResourceNameSchema, ...sessionShape },
    },
    async ({ connection_name, session_id }, extra) =>
      dispatch(
        "initialize_connection",
        sessionFor(session_id, extra),
        { connection: [connection_name] },
        { connectionName: connection_name },
        extra,
      ),
  );

  server.registerTool(
    "list_tables",
    {
      title: "List tables",
      description: "List tables in a schema of the active warehouse connection.",
      inputSchema: { schema: z.string().optional(), ...sessionShape },
    },
    async ({ schema, session_id }, extra) =>
      dispatch("list_tables", sessionFor(session_id, extra), {}, { schema }, extra),
  );

  server.registerTool(
    "input_table_suggestions",
    {
      title: "Suggest input tables",
      description:
        "Suggest event stream tables for inputs.yaml across one or more schemas of the active connection. Confirm the ones the user picks before using them.",
      inputSchema: { schemas: z.array(z.string().min(1)).min(1), ...sessionShape },
    },
    async ({ schemas, session_id }, extra) =>
      dispatch("input_table_suggestions", sessionFor(session_id, extra), {}, { schemas }, extra),
  );

  server.registerTool(
    "describe_table",
    {
      title: "Describe table",
      description: "Show the columns of a confirmed table.",
      inputSchema: { table: ResourceNameSchema, ...sessionShape },
    },
    async ({ table, session_id }, extra) =>
      dispatch("describe_table", sessionFor(session_id, extra), { table: [table] }, { table }, extra),
  );

  server.registerTool(
    "run_query",
    {
      title: "Run query",
      description: "Run a read-only SQL query on the active warehouse connection.",
      inputSchema: {
        sql: z.string().min(1),
        max_rows: z.number().int().min(1).max(10_000).optional(),
        ...sessionShape,
      },
    },
    async ({ sql, max_rows, session_id }, extra) =>
      dispatch("run_query", sessionFor(session_id, extra), {}, { sql, maxRows: max_rows }, extra),
  );

  server.registerTool(
    "analyze_existing_project",
    {
      title: "Analyze project",
      description: "Summarize the inputs, models and var groups of an existing project directory.",
      inputSchema: { project_path: z.string().min(1), ...sessionShape },
    },
    async ({ project_path, session_id }, extra) =>
      dispatch(
        "analyze_existing_project",
        sessionFor(session_id, extra),
        {},
        { projectPath: project_path },
        extra,
      ),
  );

  server.registerTool(
    "get_profiles_output_details",
    {
      title: "Locate run outputs",
      description:
        "After a run, find the output schema and the feature view and id stitcher tables per entity. Needs the JSON saved from `pb show models -p <project> --json --migrate_on_load > <file>`.",
      inputSchema: {
        project_path: z.string().min(1),
        show_models_output_path: z.string().min(1),
        ...sessionShape,
      },
    },
    async ({ project_path, show_models_output_path, session_id }, extra) =>
      dispatch(
        "get_profiles_output_details",
        sessionFor(session_id, extra),
        {},
        { projectPath: project_path, showModelsOutputPath: show_models_output_path },
        extra,
      ),
  );

  // -----------------------------------------------------------------------
  // Configuration actions
  // -----------------------------------------------------------------------

  server.registerTool(
    "create_inputs_yaml",
    {
      title: "Create inputs.yaml",
      description: "Generate inputs.yaml for confirmed tables of a confirmed connection.",
      inputSchema: { ...InputsParamsSchema.shape, ...sessionShape },
    },
    async ({ session_id, ...params }, extra) =>
      dispatch(
        "create_inputs_yaml",
        sessionFor(session_id, extra),
        refs(params.connection, params.inputs.map((input) => input.table)),
        params,
        extra,
      ),
  );

  server.registerTool(
    "create_models_yaml",
    {
      title: "Create profiles.yaml",
      description: "Generate an id stitcher model over declared inputs.",
      inputSchema: { ...ModelsParamsSchema.shape, ...resourceShape, ...sessionShape },
    },
    async ({ session_id, connection, tables, ...params }, extra) =>
      dispatch("create_models_yaml", sessionFor(session_id, extra), refs(connection, tables), params, extra),
  );

  server.registerTool(
    "create_entity_vars",
    {
      title: "Create entity vars",
      description: "Generate an entity var group.",
      inputSchema: { ...EntityVarsParamsSchema.shape, ...resourceShape, ...sessionShape },
    },
    async ({ session_id, connection, tables, ...params }, extra) =>
      dispatch("create_entity_vars", sessionFor(session_id, extra), refs(connection, tables), params, extra),
  );

  server.registerTool(
    "add_date_filtering",
    {
      title: "Add date filtering",
      description: "Generate time-windowed entity vars using the datediff macro.",
      inputSchema: { ...DateFilteredVarsParamsSchema.shape, ...resourceShape, ...sessionShape },
    },
    async ({ session_id, connection, tables, ...params }, extra) =>
      dispatch("add_date_filtering", sessionFor(session_id, extra), refs(connection, tables), params, extra),
  );

  server.registerTool(
    "create_propensity_model",
    {
      title: "Create propensity model",
      description: "Generate a propensity model over existing entity vars.",
      inputSchema: { ...PropensityParamsSchema.shape, ...resourceShape, ...sessionShape },
    },
    async ({ session_id, connection, tables, ...params }, extra) =>
      dispatch(
        "create_propensity_model",
        sessionFor(session_id, extra),
        refs(connection, tables),
        params,
        extra,
      ),
  );

  // -----------------------------------------------------------------------
  // Propensity analysis actions
  // -----------------------------------------------------------------------

  server.registerTool(
    "evaluate_eligible_user_filters",
    {
      title: "Evaluate eligible-user filters",
      description:
        "Score candidate eligible_users conditions against a confirmed label table and pick the one with the best recall within the positive-rate and size limits.",
      inputSchema: {
        filter_sqls: z.array(z.string().min(1)).min(1),
        label_table: ResourceNameSchema.describe("Confirmed table holding the label and entity columns"),
        label_column: z.string().min(1).describe("Column that is 1 for positive entities"),
        entity_column: z.string().min(1),
        min_pos_rate: z.number().min(0).max(1).optional(),
        max_pos_rate: z.number().min(0).max(1).optional(),
        min_total_rows: z.number().int().min(0).optional(),
        ...sessionShape,
      },
    },
    async (args, extra) =>
      dispatch(
        "evaluate_eligible_user_filters",
        sessionFor(args.session_id, extra),
        { table: [args.label_table] },
        {
          filterSqls: args.filter_sqls,
          labelTable: args.label_table,
          labelColumn: args.label_column,
          entityColumn: args.entity_column,
          minPositiveRate: args.min_pos_rate,
          maxPositiveRate: args.max_pos_rate,
          minEligibleRows: args.min_total_rows,
        },
        extra,
      ),
  );

  server.registerTool(
    "validate_propensity_model_config",
    {
      title: "Validate propensity model",
      description:
        "Check one configured propensity model for common pitfalls (inputs without occurred_at_col, features from tables without enough history) before running it.",
      inputSchema: {
        project_path: z.string().min(1),
        model_name: z.string().min(1),
        ...sessionShape,
      },
    },
    async ({ project_path, model_name, session_id }, extra) =>
      dispatch(
        "validate_propensity_model_config",
        sessionFor(session_id, extra),
        {},
        { projectPath: project_path, modelName: model_name },
        extra,
      ),
  );
}
