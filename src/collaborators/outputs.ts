/**
 * Where a project run wrote its tables.
 *
 * Reads the JSON that `pb show models --json` prints (saved to a file by
 * the agent) and groups feature views and id stitcher tables by entity.
 * Output tables live in the output schema of the project's connection,
 * not in whatever schema the session is browsing.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import type { ConnectionCatalog } from "./connections.js";
import { CollaboratorError } from "./errors.js";
import { loadProject } from "./project.js";

export const DEFAULT_OUTPUT_SCHEMA = "main";

export const OutputDetailsParamsSchema = z.object({
  projectPath: z.string().trim().min(1),
  showModelsOutputPath: z.string().trim().min(1),
});

export interface EntityOutputTables {
  /** Qualified names; one view per id type, all with the same features. */
  featureViews: string[];
  idStitcher: string | null;
}

export interface ProfilesOutputDetails {
  outputSchema: string;
  tablesInfo: Record<string, EntityOutputTables>;
}

const ModelEntrySchema = z
  .object({
    model_type: z.string(),
    model_path: z.string(),
    material_name: z.string().min(1),
  })
  .passthrough();

const ANSI_ESCAPE_RE = /\x1B\[[0-?]*[ -/]*[@-~]/g;

/**
 * The first balanced JSON object in command output. Colour codes and any
 * log lines around the object are ignored.
 */
export function extractJsonObject(text: string): unknown {
  const clean = text.replace(ANSI_ESCAPE_RE, "");
  const start = clean.indexOf("{");
  if (start === -1) {
    throw new Error("no JSON object found");
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < clean.length; i++) {
    const ch = clean[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return JSON.parse(clean.slice(start, i + 1));
    }
  }
  throw new Error("JSON object is not closed");
}

function outputSchemaFor(projectPath: string, connections: ConnectionCatalog): string {
  const connection = loadProject(projectPath).project.connection;
  if (!connection) {
    throw new CollaboratorError(
      "pb_project.yaml does not name a connection",
      "project_analyzer",
      "invalid_request",
      { projectPath },
    );
  }
  const schema = connections.get(connection)["output_schema"];
  return typeof schema === "string" && schema.length > 0 ? schema : DEFAULT_OUTPUT_SCHEMA;
}

export function profilesOutputDetails(
  projectPath: string,
  showModelsOutputPath: string,
  connections: ConnectionCatalog,
): ProfilesOutputDetails {
  const outputSchema = outputSchemaFor(projectPath, connections);

  const outputFile = resolve(showModelsOutputPath);
  if (!existsSync(outputFile)) {
    throw new CollaboratorError(
      `pb show models output not found at ${outputFile}`,
      "project_analyzer",
      "invalid_request",
      { showModelsOutputPath: outputFile },
    );
  }

  let models: unknown;
  try {
    models = extractJsonObject(readFileSync(outputFile, "utf8"));
  } catch (err: unknown) {
    throw new CollaboratorError(
      `Cannot parse pb show models output: ${err instanceof Error ? err.message : String(err)}. The file may hold the logs of a failed run.`,
      "project_analyzer",
      "invalid_request",
      { showModelsOutputPath: outputFile },
    );
  }
  if (typeof models !== "object" || models === null || Array.isArray(models)) {
    throw new CollaboratorError(
      "pb show models output is not a JSON object",
      "project_analyzer",
      "invalid_request",
      { showModelsOutputPath: outputFile },
    );
  }

  const tablesInfo: Record<string, EntityOutputTables> = {};
  const tablesFor = (entity: string): EntityOutputTables => {
    const existing = tablesInfo[entity];
    if (existing) return existing;
    const created: EntityOutputTables = { featureViews: [], idStitcher: null };
    tablesInfo[entity] = created;
    return created;
  };

  const entries: unknown[] = Object.values(models);
  for (const value of entries) {
    const entry = ModelEntrySchema.safeParse(value);
    if (!entry.success) continue;
    const { model_type: modelType, model_path: modelPath, material_name: material } = entry.data;
    const entity = modelPath.split("/")[0] ?? "";
    const qualified = `${outputSchema}.${material}`;

    if (modelType === "feature_view") {
      tablesFor(entity).featureViews.push(qualified);
    } else if (modelType === "id_stitcher" && entity !== "models") {
      // A named stitcher wins over the entity's default one.
      const tables = tablesFor(entity);
      if (tables.idStitcher === null || !material.toLowerCase().includes("default")) {
        tables.idStitcher = qualified;
      }
    }
  }

  return { outputSchema, tablesInfo };
}
