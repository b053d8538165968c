/**
 * Config generator: renders project YAML from validated parameters.
 *
 * Pure: parameters in, file text out. The agent writes the files; this
 * module never touches the filesystem. Generated content is structurally
 * shaped only; whether the SQL inside it is meaningful is not checked.
 */

import { Document } from "yaml";
import { z } from "zod";
import type { GeneratedFile, GeneratedFileKind } from "./types.js";

// ---------------------------------------------------------------------------
// Parameter schemas
// ---------------------------------------------------------------------------

const identifier = z
  .string()
  .trim()
  .regex(/^[A-Za-z][A-Za-z0-9_]*$/, "Must start with a letter and contain only letters, digits and _");

const sqlFragment = z.string().trim().min(1).max(4000);

export const InputsParamsSchema = z.object({
  connection: z.string().trim().min(1),
  inputs: z
    .array(
      z.object({
        name: identifier,
        table: z.string().trim().min(1),
        occurredAtCol: z.string().trim().min(1).optional(),
        ids: z
          .array(
            z.object({
              select: sqlFragment,
              type: identifier,
              entity: identifier,
            }),
          )
          .min(1),
      }),
    )
    .min(1),
});

export const ModelsParamsSchema = z.object({
  entity: identifier,
  modelName: identifier.optional(),
  edgeSources: z.array(identifier).min(1),
});

const entityVarSchema = z.object({
  name: identifier,
  select: sqlFragment,
  from: identifier,
  where: sqlFragment.optional(),
  description: z.string().trim().max(500).optional(),
});

export const EntityVarsParamsSchema = z.object({
  entity: identifier,
  groupName: identifier.optional(),
  vars: z.array(entityVarSchema).min(1),
});

export const DateFilteredVarsParamsSchema = z.object({
  entity: identifier,
  groupName: identifier.optional(),
  vars: z
    .array(
      entityVarSchema.omit({ where: true }).extend({
        timestampColumn: z.string().trim().min(1),
        windowDays: z.number().int().positive().max(3650),
      }),
    )
    .min(1),
});

export const PropensityParamsSchema = z.object({
  name: identifier,
  entity: identifier,
  predictVar: identifier,
  labelValue: z.union([z.number(), z.string()]).default(1),
  predictWindowDays: z.number().int().positive().max(3650),
  eligibleUsers: sqlFragment.optional(),
  featureVars: z.array(identifier).min(1),
});

export type InputsParams = z.infer<typeof InputsParamsSchema>;
export type ModelsParams = z.infer<typeof ModelsParamsSchema>;
export type EntityVarsParams = z.infer<typeof EntityVarsParamsSchema>;
export type DateFilteredVarsParams = z.infer<typeof DateFilteredVarsParamsSchema>;
export type PropensityParams = z.infer<typeof PropensityParamsSchema>;

export interface GeneratorParams {
  inputs: InputsParams;
  models: ModelsParams;
  entity_vars: EntityVarsParams;
  date_filtered_vars: DateFilteredVarsParams;
  propensity: PropensityParams;
}

export interface ConfigGenerator {
  generate<K extends GeneratedFileKind>(
    kind: K,
    params: GeneratorParams[K],
  ): GeneratedFile;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function render(value: unknown, comment?: string): string {
  const doc = new Document(value);
  if (comment) {
    doc.commentBefore = ` ${comment}`;
  }
  return doc.toString({ lineWidth: 0 });
}

/** The datediff macro call used for time-windowed entity vars. */
export function datediffWhere(timestampColumn: string, windowDays: number): string {
  return `{{macro_datediff_n('${timestampColumn}','${windowDays}')}}`;
}

function buildInputs(params: InputsParams): GeneratedFile {
  const inputs = params.inputs.map((input) => {
    const entities = [...new Set(input.ids.map((id) => id.entity))];
    const appDefaults: Record<string, unknown> = { table: input.table };
    if (input.occurredAtCol) {
      appDefaults["occurred_at_col"] = input.occurredAtCol;
    }
    appDefaults["ids"] = input.ids.map((id) => ({
      select: id.select,
      type: id.type,
      entity: id.entity,
    }));
    return {
      name: input.name,
      contract: {
        is_optional: false,
        is_event_stream: input.occurredAtCol !== undefined,
        with_entity_ids: entities,
      },
      app_defaults: appDefaults,
    };
  });
  return {
    fileName: "models/inputs.yaml",
    content: render({ inputs }, `connection: ${params.connection}`),
  };
}

function buildModels(params: ModelsParams): GeneratedFile {
  const model = {
    name: params.modelName ?? `${params.entity}_id_stitcher`,
    model_type: "id_stitcher",
    model_spec: {
      entity_key: params.entity,
      edge_sources: params.edgeSources.map((source) => ({ from: `inputs/${source}` })),
    },
  };
  return { fileName: "models/profiles.yaml", content: render({ models: [model] }) };
}

function entityVar(v: {
  name: string;
  select: string;
  from: string;
  where?: string | undefined;
  description?: string | undefined;
}): Record<string, unknown> {
  const out: Record<string, unknown> = {
    name: v.name,
    select: v.select,
    from: `inputs/${v.from}`,
  };
  if (v.where) out["where"] = v.where;
  if (v.description) out["description"] = v.description;
  return { entity_var: out };
}

function buildEntityVars(params: EntityVarsParams): GeneratedFile {
  const group = {
    name: params.groupName ?? `${params.entity}_vars`,
    entity_key: params.entity,
    vars: params.vars.map(entityVar),
  };
  return { fileName: "models/profiles.yaml", content: render({ var_groups: [group] }) };
}

function buildDateFilteredVars(params: DateFilteredVarsParams): GeneratedFile {
  const group = {
    name: params.groupName ?? `${params.entity}_windowed_vars`,
    entity_key: params.entity,
    vars: params.vars.map((v) =>
      entityVar({
        name: v.name,
        select: v.select,
        from: v.from,
        where: datediffWhere(v.timestampColumn, v.windowDays),
        description: v.description,
      }),
    ),
  };
  return { fileName: "models/profiles.yaml", content: render({ var_groups: [group] }) };
}

function buildPropensity(params: PropensityParams): GeneratedFile {
  const training: Record<string, unknown> = {
    predict_var: `entity/${params.entity}/${params.predictVar}`,
    label_value: params.labelValue,
    predict_window_days: params.predictWindowDays,
  };
  if (params.eligibleUsers) {
    training["eligible_users"] = params.eligibleUsers;
  }

  const model = {
    name: params.name,
    model_type: "propensity",
    model_spec: {
      entity_key: params.entity,
      training,
      prediction: {
        output_columns: {
          percentile: { name: `percentile_${params.name}` },
          score: { name: `${params.name}_score` },
        },
      },
      inputs: params.featureVars.map((v) => `entity/${params.entity}/${v}`),
    },
  };
  return { fileName: "models/propensity.yaml", content: render({ models: [model] }) };
}

const BUILDERS: { [K in GeneratedFileKind]: (params: GeneratorParams[K]) => GeneratedFile } = {
  inputs: buildInputs,
  models: buildModels,
  entity_vars: buildEntityVars,
  date_filtered_vars: buildDateFilteredVars,
  propensity: buildPropensity,
};

export class YamlConfigGenerator implements ConfigGenerator {
  generate<K extends GeneratedFileKind>(kind: K, params: GeneratorParams[K]): GeneratedFile {
    const build: (p: GeneratorParams[K]) => GeneratedFile = BUILDERS[kind];
    return build(params);
  }
}
