/**
 * Pre-run checks for a configured propensity model.
 *
 * Features must come from input tables that carry an occurred_at_col and
 * hold more history than the prediction window; static tables without
 * history give the model nothing to learn past points in time from. When
 * a feature cannot be traced to a single input (it has no `from`, or
 * reads from another model) every input table is checked instead and
 * problems are reported as warnings.
 */

import { z } from "zod";
import { CollaboratorError } from "./errors.js";
import type { LoadedProject } from "./project.js";
import type { WarehouseService } from "./types.js";

export const PropensityValidationParamsSchema = z.object({
  projectPath: z.string().trim().min(1),
  modelName: z.string().trim().min(1),
});

export interface ValidationIssue {
  type: string;
  message: string;
  remediation: string;
  feature?: string;
  table?: string;
  /** Set on issues found by the all-tables check. */
  context?: string;
}

export interface InputTableStats {
  minDate: string | null;
  maxDate: string | null;
  dateRangeDays: number;
  totalRows: number;
  occurredAtCol: string;
}

export type PropensityValidationStatus = "PASSED" | "WARNINGS" | "FAILED";

export interface PropensityValidation {
  modelName: string;
  validationStatus: PropensityValidationStatus;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  suggestions: ValidationIssue[];
  tableStats: Record<string, InputTableStats>;
}

// ---------------------------------------------------------------------------
// Project content
// ---------------------------------------------------------------------------

const InputListSchema = z.array(
  z
    .object({
      name: z.string(),
      app_defaults: z
        .object({
          table: z.string().optional(),
          occurred_at_col: z.string().optional(),
        })
        .passthrough()
        .optional(),
    })
    .passthrough(),
);

const ModelListSchema = z.array(
  z
    .object({
      name: z.string(),
      model_type: z.string().optional(),
      model_spec: z.unknown().optional(),
    })
    .passthrough(),
);

const PropensitySpecSchema = z
  .object({
    training: z
      .object({ predict_window_days: z.number().optional() })
      .passthrough()
      .optional(),
    inputs: z.array(z.string()).optional(),
  })
  .passthrough();

const VarGroupListSchema = z.array(
  z.object({ vars: z.array(z.unknown()).optional() }).passthrough(),
);

const EntityVarItemSchema = z
  .object({
    entity_var: z
      .object({
        name: z.string(),
        from: z.string().optional(),
        is_feature: z.boolean().optional(),
      })
      .passthrough(),
  })
  .passthrough();

type InputTable = z.infer<typeof InputListSchema>[number];
type EntityVar = z.infer<typeof EntityVarItemSchema>["entity_var"];

interface ProjectContent {
  inputs: Map<string, InputTable>;
  entityVars: Map<string, EntityVar>;
  models: z.infer<typeof ModelListSchema>;
}

function collect(project: LoadedProject): ProjectContent {
  const inputs = new Map<string, InputTable>();
  const entityVars = new Map<string, EntityVar>();
  const models: z.infer<typeof ModelListSchema> = [];

  for (const { doc } of project.documents) {
    const inputList = InputListSchema.safeParse(doc["inputs"]);
    if (inputList.success) {
      for (const input of inputList.data) inputs.set(input.name, input);
    }
    const modelList = ModelListSchema.safeParse(doc["models"]);
    if (modelList.success) {
      models.push(...modelList.data);
    }
    const groups = VarGroupListSchema.safeParse(doc["var_groups"]);
    if (groups.success) {
      for (const item of groups.data.flatMap((g) => g.vars ?? [])) {
        const parsed = EntityVarItemSchema.safeParse(item);
        if (parsed.success) {
          entityVars.set(parsed.data.entity_var.name, parsed.data.entity_var);
        }
      }
    }
  }
  return { inputs, entityVars, models };
}

/** "entity/<entity>/<var>" to the var name. */
function featureVarName(reference: string): string | null {
  const parts = reference.split("/");
  return parts.length === 3 && parts[0] === "entity" && parts[2] ? parts[2] : null;
}

/** "inputs/<name>" to the input name. */
function inputName(from: string): string | null {
  const parts = from.split("/");
  return parts.length === 2 && parts[0] === "inputs" && parts[1] ? parts[1] : null;
}

// ---------------------------------------------------------------------------
// Historic data
// ---------------------------------------------------------------------------

const StatsRowSchema = z.object({
  min_date: z.union([z.string(), z.number()]).nullable(),
  max_date: z.union([z.string(), z.number()]).nullable(),
  date_range_days: z.number().nullable(),
  total_rows: z.number(),
});

function dateRangeDaysExpr(warehouseType: string, column: string): string {
  if (warehouseType.toLowerCase() === "sqlite") {
    return `CAST(julianday(MAX(${column})) - julianday(MIN(${column})) AS INTEGER)`;
  }
  return `DATEDIFF(day, MIN(${column}), MAX(${column}))`;
}

async function readStats(
  warehouse: WarehouseService,
  table: string,
  column: string,
): Promise<InputTableStats> {
  const sql = [
    `SELECT MIN(${column}) AS min_date, MAX(${column}) AS max_date,`,
    `${dateRangeDaysExpr(warehouse.warehouseType, column)} AS date_range_days,`,
    `COUNT(*) AS total_rows FROM ${table} WHERE ${column} IS NOT NULL`,
  ].join(" ");
  const result = await warehouse.executeQuery(sql, 1);
  const row = StatsRowSchema.safeParse(result.rows[0]);
  if (!row.success) {
    throw new CollaboratorError(
      "Date range query returned an unexpected row",
      "warehouse",
      "invalid_response",
      { sql },
    );
  }
  return {
    minDate: row.data.min_date === null ? null : String(row.data.min_date),
    maxDate: row.data.max_date === null ? null : String(row.data.max_date),
    dateRangeDays: row.data.date_range_days ?? 0,
    totalRows: row.data.total_rows,
    occurredAtCol: column,
  };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const ALL_TABLES_CONTEXT =
  "Found by checking every input table; it only matters if this table feeds the model's features";

class ValidationRun {
  readonly errors: ValidationIssue[] = [];
  readonly warnings: ValidationIssue[] = [];
  readonly suggestions: ValidationIssue[] = [];
  readonly tableStats: Record<string, InputTableStats> = {};
  private readonly modelName: string;
  private readonly warehouse: WarehouseService;
  private readonly predictWindowDays: number;

  constructor(modelName: string, warehouse: WarehouseService, predictWindowDays: number) {
    this.modelName = modelName;
    this.warehouse = warehouse;
    this.predictWindowDays = predictWindowDays;
  }

  /** A direct feature source reports errors; the all-tables check reports warnings. */
  async checkInput(input: InputTable, feature: string | null): Promise<void> {
    const column = input.app_defaults?.occurred_at_col;
    if (!column) {
      this.report(feature, {
        type: "MISSING_OCCURRED_AT_COL",
        table: input.name,
        message: `Input table '${input.name}' has no occurred_at_col`,
        remediation:
          "Add occurred_at_col to the table's app_defaults in inputs.yaml, or drop the features read from it",
      });
      return;
    }
    if (input.name in this.tableStats) {
      return;
    }

    const table = input.app_defaults?.table ?? input.name;
    let stats: InputTableStats;
    try {
      stats = await readStats(this.warehouse, table, column);
    } catch (err: unknown) {
      if (!(err instanceof CollaboratorError)) {
        throw err;
      }
      const issue: ValidationIssue = {
        type: "DATA_VALIDATION_SKIPPED",
        table: input.name,
        message: `Could not check historic data of '${input.name}': ${err.message}`,
        remediation: "Check by hand that the table holds enough history",
      };
      if (feature === null) {
        this.warnings.push({ ...issue, context: ALL_TABLES_CONTEXT });
      } else {
        this.suggestions.push({ ...issue, feature });
      }
      return;
    }

    this.tableStats[input.name] = stats;
    if (stats.dateRangeDays < this.predictWindowDays) {
      this.report(feature, {
        type: "INSUFFICIENT_HISTORIC_DATA",
        table: input.name,
        message: `Input table '${input.name}' spans ${stats.dateRangeDays} days (${stats.minDate ?? "none"} to ${stats.maxDate ?? "none"}); at least ${this.predictWindowDays} days (predict_window_days) are needed to build past feature snapshots`,
        remediation:
          "Use a table that keeps history; tables that an ETL job overwrites cannot provide it",
      });
    }
  }

  report(feature: string | null, issue: ValidationIssue): void {
    if (feature === null) {
      this.warnings.push({ ...issue, context: ALL_TABLES_CONTEXT });
    } else {
      this.errors.push({ ...issue, feature });
    }
  }

  finish(): PropensityValidation {
    return {
      modelName: this.modelName,
      validationStatus:
        this.errors.length > 0 ? "FAILED" : this.warnings.length > 0 ? "WARNINGS" : "PASSED",
      errors: this.errors,
      warnings: this.warnings,
      suggestions: this.suggestions,
      tableStats: this.tableStats,
    };
  }
}

function failed(modelName: string, errors: ValidationIssue[]): PropensityValidation {
  return {
    modelName,
    validationStatus: "FAILED",
    errors,
    warnings: [],
    suggestions: [],
    tableStats: {},
  };
}

export async function validatePropensityModel(
  project: LoadedProject,
  modelName: string,
  warehouse: WarehouseService,
): Promise<PropensityValidation> {
  const content = collect(project);

  const model = content.models.find(
    (m) => m.name === modelName && m.model_type === "propensity",
  );
  if (!model) {
    return failed(modelName, [
      {
        type: "MODEL_NOT_FOUND",
        message: `No propensity model named '${modelName}' in the project`,
        remediation: "Check the model name against the models declared in the model folders",
      },
    ]);
  }

  const spec = PropensitySpecSchema.safeParse(model.model_spec);
  if (!spec.success) {
    return failed(modelName, [
      {
        type: "MODEL_SPEC_NOT_FOUND",
        message: `Propensity model '${modelName}' has no usable model_spec`,
        remediation: "Add a model_spec with training and inputs sections",
      },
    ]);
  }

  const predictWindowDays = spec.data.training?.predict_window_days;
  if (predictWindowDays === undefined || predictWindowDays <= 0) {
    return failed(modelName, [
      {
        type: "INVALID_PREDICT_WINDOW_DAYS",
        message: `Propensity model '${modelName}' needs a positive training.predict_window_days`,
        remediation: "Set training.predict_window_days to a positive number of days",
      },
    ]);
  }

  const features = spec.data.inputs ?? [];
  if (features.length === 0) {
    return failed(modelName, [
      {
        type: "NO_INPUTS_DEFINED",
        message: `Propensity model '${modelName}' lists no input features`,
        remediation: "List the entity vars to train on under model_spec.inputs",
      },
    ]);
  }

  const errors: ValidationIssue[] = [];
  const traced: Array<{ feature: string; entityVar: EntityVar }> = [];
  for (const feature of features) {
    const varName = featureVarName(feature);
    if (varName === null) {
      errors.push({
        type: "INVALID_FEATURE_REFERENCE",
        feature,
        message: `Cannot parse feature reference '${feature}'`,
        remediation: "Write features as entity/<entity>/<var>",
      });
      continue;
    }
    const entityVar = content.entityVars.get(varName);
    if (!entityVar) {
      errors.push({
        type: "NO_ENTITY_VAR_DEFINED",
        feature,
        message: `No entity var named '${varName}' is defined`,
        remediation: "Define the entity var in a var group, or remove the feature",
      });
      continue;
    }
    if (entityVar.is_feature === false) {
      errors.push({
        type: "INVALID_ENTITY_VAR_TYPE",
        feature,
        message: `Entity var '${varName}' is marked is_feature: false`,
        remediation: "Use entity vars that are features",
      });
      continue;
    }
    traced.push({ feature, entityVar });
  }
  if (errors.length > 0) {
    return failed(modelName, errors);
  }

  const run = new ValidationRun(modelName, warehouse, predictWindowDays);
  const untraceable = traced.some(
    ({ entityVar }) => entityVar.from === undefined || inputName(entityVar.from) === null,
  );

  if (untraceable) {
    for (const input of content.inputs.values()) {
      await run.checkInput(input, null);
    }
    return run.finish();
  }

  for (const { feature, entityVar } of traced) {
    const name = inputName(entityVar.from ?? "");
    const input = name === null ? undefined : content.inputs.get(name);
    if (!input) {
      run.warnings.push({
        type: "INPUT_TABLE_NOT_FOUND",
        feature,
        table: name ?? "",
        message: `Input '${name ?? ""}' used by '${feature}' is not declared in any inputs file`,
        remediation: "Declare the input, or remove the features read from it",
      });
      continue;
    }
    await run.checkInput(input, feature);
  }
  return run.finish();
}
