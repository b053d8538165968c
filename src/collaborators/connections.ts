/**
 * Connection catalog backed by a YAML file.
 *
 *   connections:
 *     analytics_local:
 *       type: sqlite
 *       path: ./warehouse.db
 *
 * A missing file means no connections are configured. Relative paths are
 * resolved against the directory holding the file.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { CollaboratorError } from "./errors.js";
import type { ConnectionDetails } from "./warehouse.js";

const ConnectionEntrySchema = z
  .object({
    type: z.string().min(1),
    path: z.string().min(1).optional(),
  })
  .passthrough();

const ConnectionsFileSchema = z
  .object({
    connections: z.record(z.string(), ConnectionEntrySchema).default({}),
  })
  .passthrough();

type ConnectionsFile = z.infer<typeof ConnectionsFileSchema>;

export class ConnectionCatalog {
  public readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  listNames(): string[] {
    return Object.keys(this.load().connections).sort();
  }

  get(name: string): ConnectionDetails {
    const entry = this.load().connections[name];
    if (!entry) {
      throw new CollaboratorError(
        `Connection not found: ${name}`,
        "connections",
        "invalid_request",
        { name, available: this.listNames() },
      );
    }
    const details: ConnectionDetails = { ...entry };
    if (entry.path !== undefined && entry.path !== ":memory:" && !isAbsolute(entry.path)) {
      details["path"] = resolve(dirname(this.filePath), entry.path);
    }
    return details;
  }

  private load(): ConnectionsFile {
    if (!existsSync(this.filePath)) {
      return { connections: {} };
    }

    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(this.filePath, "utf8"));
    } catch (err: unknown) {
      throw new CollaboratorError(
        `Cannot read connections file ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`,
        "connections",
        "invalid_response",
        { filePath: this.filePath },
      );
    }

    const parsed = ConnectionsFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new CollaboratorError(
        `Connections file ${this.filePath} is malformed`,
        "connections",
        "invalid_response",
        { filePath: this.filePath, issues: parsed.error.issues },
      );
    }
    return parsed.data;
  }
}
