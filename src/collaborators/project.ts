/**
 * Offline analysis of an existing project directory.
 *
 * Reads pb_project.yaml, scans the YAML files under its model_folders and
 * summarizes the inputs, models and var groups they declare. Read-only.
 */

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { extname, join, relative, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { CollaboratorError } from "./errors.js";

const ProjectFileSchema = z
  .object({
    name: z.string().optional(),
    schema_version: z.union([z.number(), z.string()]).optional(),
    connection: z.string().optional(),
    model_folders: z.array(z.string()).optional(),
    entities: z
      .array(z.object({ name: z.string() }).passthrough())
      .optional(),
  })
  .passthrough();

const NamedListSchema = z.array(z.object({ name: z.string() }).passthrough());

const ModelListSchema = z.array(
  z.object({ name: z.string(), model_type: z.string().optional() }).passthrough(),
);

const VarGroupListSchema = z.array(
  z
    .object({
      name: z.string(),
      entity_key: z.string().optional(),
      vars: z.array(z.unknown()).optional(),
    })
    .passthrough(),
);

export interface ProjectFileSummary {
  path: string;
  inputs: string[];
  models: Array<{ name: string; modelType: string | null }>;
  varGroups: Array<{ name: string; entityKey: string | null; varCount: number }>;
}

export interface ProjectIssue {
  file: string;
  message: string;
}

export interface ProjectAnalysis {
  projectPath: string;
  projectName: string | null;
  schemaVersion: string | null;
  connection: string | null;
  entities: string[];
  modelFolders: string[];
  files: ProjectFileSummary[];
  errors: ProjectIssue[];
  warnings: ProjectIssue[];
  status: "success" | "warning" | "error";
}

function listYamlFiles(dir: string): string[] {
  const found: string[] = [];
  for (const entry of readdirSync(dir).sort()) {
    const full = join(dir, entry);
    if (statSync(full).isDirectory()) {
      found.push(...listYamlFiles(full));
    } else if ([".yaml", ".yml"].includes(extname(entry))) {
      found.push(full);
    }
  }
  return found;
}

function summarizeFile(path: string, doc: Record<string, unknown>): ProjectFileSummary {
  const inputs = NamedListSchema.safeParse(doc["inputs"]);
  const models = ModelListSchema.safeParse(doc["models"]);
  const varGroups = VarGroupListSchema.safeParse(doc["var_groups"]);
  return {
    path,
    inputs: inputs.success ? inputs.data.map((i) => i.name) : [],
    models: models.success
      ? models.data.map((m) => ({ name: m.name, modelType: m.model_type ?? null }))
      : [],
    varGroups: varGroups.success
      ? varGroups.data.map((g) => ({
          name: g.name,
          entityKey: g.entity_key ?? null,
          varCount: g.vars?.length ?? 0,
        }))
      : [],
  };
}

export type ProjectFile = z.infer<typeof ProjectFileSchema>;

export interface ProjectDocument {
  /** Path relative to the project root. */
  path: string;
  doc: Record<string, unknown>;
}

export interface LoadedProject {
  root: string;
  project: ProjectFile;
  modelFolders: string[];
  documents: ProjectDocument[];
  errors: ProjectIssue[];
  warnings: ProjectIssue[];
}

/**
 * Read pb_project.yaml and every YAML mapping under its model folders.
 * Unreadable model files are reported, not thrown.
 */
export function loadProject(projectPath: string): LoadedProject {
  const root = resolve(projectPath);
  const projectFile = join(root, "pb_project.yaml");
  if (!existsSync(projectFile)) {
    throw new CollaboratorError(
      `pb_project.yaml not found in ${root}`,
      "project_analyzer",
      "invalid_request",
      { projectPath: root },
    );
  }

  let projectDoc: unknown;
  try {
    projectDoc = parseYaml(readFileSync(projectFile, "utf8"));
  } catch (err: unknown) {
    throw new CollaboratorError(
      `pb_project.yaml is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
      "project_analyzer",
      "invalid_request",
      { projectPath: root },
    );
  }

  const project = ProjectFileSchema.safeParse(projectDoc ?? {});
  if (!project.success) {
    throw new CollaboratorError(
      "pb_project.yaml has an unexpected structure",
      "project_analyzer",
      "invalid_request",
      { projectPath: root, issues: project.error.issues },
    );
  }

  const errors: ProjectIssue[] = [];
  const warnings: ProjectIssue[] = [];
  const documents: ProjectDocument[] = [];
  const modelFolders = project.data.model_folders ?? ["models"];

  for (const folder of modelFolders) {
    const dir = join(root, folder);
    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
      warnings.push({ file: folder, message: "model folder does not exist" });
      continue;
    }
    for (const file of listYamlFiles(dir)) {
      const rel = relative(root, file);
      let doc: unknown;
      try {
        doc = parseYaml(readFileSync(file, "utf8"));
      } catch (err: unknown) {
        errors.push({ file: rel, message: err instanceof Error ? err.message : String(err) });
        continue;
      }
      if (typeof doc !== "object" || doc === null || Array.isArray(doc)) {
        warnings.push({ file: rel, message: "file does not contain a YAML mapping" });
        continue;
      }
      documents.push({ path: rel, doc: Object.fromEntries(Object.entries(doc)) });
    }
  }

  return { root, project: project.data, modelFolders, documents, errors, warnings };
}

export function analyzeProject(projectPath: string): ProjectAnalysis {
  const loaded = loadProject(projectPath);
  const { project, errors } = loaded;
  const warnings = [...loaded.warnings];
  const files = loaded.documents.map(({ path, doc }) => summarizeFile(path, doc));

  if (!files.some((f) => f.inputs.length > 0)) {
    warnings.push({ file: "pb_project.yaml", message: "no inputs are declared in the model folders" });
  }

  return {
    projectPath: loaded.root,
    projectName: project.name ?? null,
    schemaVersion: project.schema_version !== undefined ? String(project.schema_version) : null,
    connection: project.connection ?? null,
    entities: (project.entities ?? []).map((e) => e.name),
    modelFolders: loaded.modelFolders,
    files,
    errors,
    warnings,
    status: errors.length > 0 ? "error" : warnings.length > 0 ? "warning" : "success",
  };
}
