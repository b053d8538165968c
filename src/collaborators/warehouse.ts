/**
 * Warehouse capability implementations, the type-keyed factory, and the
 * per-session connection manager.
 *
 * The SQLite warehouse opens its database read-only: agents inspect data,
 * they never write to it through this server.
 */

import Database from "better-sqlite3";
import { CollaboratorError } from "./errors.js";
import type { ColumnInfo, QueryResult, WarehouseService } from "./types.js";

// ---------------------------------------------------------------------------
// Connection details
// ---------------------------------------------------------------------------

export interface ConnectionDetails {
  type: string;
  [key: string]: unknown;
}

export const SUPPORTED_WAREHOUSE_TYPES: readonly string[] = ["sqlite"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_$]*$/;

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Split "schema.table" (or "table") into its parts. */
export function splitTableName(name: string): { schema: string; table: string } {
  const dot = name.lastIndexOf(".");
  if (dot === -1) {
    return { schema: "main", table: name };
  }
  return { schema: name.slice(0, dot), table: name.slice(dot + 1) };
}

// ---------------------------------------------------------------------------
// SQLite warehouse
// ---------------------------------------------------------------------------

export class SqliteWarehouse implements WarehouseService {
  public readonly warehouseType = "sqlite";
  private readonly path: string;
  private db: InstanceType<typeof Database> | null;

  constructor(path: string) {
    this.path = path;
    try {
      this.db = new Database(path, { readonly: true, fileMustExist: true });
    } catch (err: unknown) {
      throw new CollaboratorError(
        `Cannot open SQLite warehouse at ${path}: ${messageOf(err)}`,
        "warehouse",
        "connectivity",
        { path },
      );
    }
  }

  async executeQuery(sql: string, maxRows?: number): Promise<QueryResult> {
    const db = this.requireOpen();
    try {
      const stmt = db.prepare(sql);
      if (stmt.reader) {
        const columns = stmt.columns().map((c) => c.name);
        const rows: Array<Record<string, unknown>> = [];
        let truncated = false;
        for (const row of stmt.iterate()) {
          if (maxRows !== undefined && rows.length >= maxRows) {
            truncated = true;
            break;
          }
          if (isRecord(row)) {
            rows.push(row);
          }
        }
        return { columns, rows, rowCount: rows.length, truncated };
      }
      const info = stmt.run();
      return { columns: [], rows: [], rowCount: info.changes, truncated: false };
    } catch (err: unknown) {
      throw new CollaboratorError(
        `Query failed: ${messageOf(err)}`,
        "warehouse",
        "query",
        { sql },
      );
    }
  }

  async listTables(schema: string): Promise<string[]> {
    const db = this.requireOpen();
    const target = schema.trim() === "" ? "main" : schema.trim();
    if (!IDENTIFIER_RE.test(target)) {
      throw new CollaboratorError(
        `Invalid schema name: ${schema}`,
        "warehouse",
        "invalid_request",
        { schema },
      );
    }
    try {
      const rows = db
        .prepare(
          `SELECT name FROM ${quoteIdent(target)}.sqlite_master
           WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%'
           ORDER BY name`,
        )
        .all()
        .filter(isRecord);
      return rows.map((row) => `${target}.${String(row["name"])}`);
    } catch (err: unknown) {
      throw new CollaboratorError(
        `Cannot list tables in schema ${target}: ${messageOf(err)}`,
        "warehouse",
        "query",
        { schema: target },
      );
    }
  }

  async describeTable(name: string): Promise<ColumnInfo[]> {
    const db = this.requireOpen();
    const { schema, table } = splitTableName(name.trim());
    let rows: Array<Record<string, unknown>>;
    try {
      rows = db
        .prepare(`PRAGMA ${quoteIdent(schema)}.table_info(${quoteIdent(table)})`)
        .all()
        .filter(isRecord);
    } catch (err: unknown) {
      throw new CollaboratorError(
        `Cannot describe table ${name}: ${messageOf(err)}`,
        "warehouse",
        "query",
        { table: name },
      );
    }
    if (rows.length === 0) {
      throw new CollaboratorError(
        `Table not found: ${name}`,
        "warehouse",
        "query",
        { table: name },
      );
    }
    return rows.map((row) => ({
      name: String(row["name"]),
      type: String(row["type"] ?? ""),
      nullable: row["notnull"] === 0,
    }));
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private requireOpen(): InstanceType<typeof Database> {
    if (!this.db) {
      throw new CollaboratorError(
        `SQLite warehouse at ${this.path} is closed`,
        "warehouse",
        "connectivity",
        { path: this.path },
      );
    }
    return this.db;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export type WarehouseFactory = (details: ConnectionDetails) => WarehouseService;

export const createWarehouse: WarehouseFactory = (details) => {
  const type = details.type.toLowerCase();
  switch (type) {
    case "sqlite": {
      const path = details["path"];
      if (typeof path !== "string" || path.length === 0) {
        throw new CollaboratorError(
          "sqlite connection requires a path",
          "warehouse",
          "invalid_request",
        );
      }
      return new SqliteWarehouse(path);
    }
    default:
      throw new CollaboratorError(
        `Unsupported warehouse type: ${details.type}. Supported: ${SUPPORTED_WAREHOUSE_TYPES.join(", ")}`,
        "warehouse",
        "invalid_request",
        { type: details.type },
      );
  }
};

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export interface ActiveWarehouse {
  connectionName: string;
  warehouse: WarehouseService;
}

/**
 * Holds at most one active warehouse connection per session.
 */
export class WarehouseManager {
  private readonly active = new Map<string, ActiveWarehouse>();
  private readonly factory: WarehouseFactory;

  constructor(factory: WarehouseFactory = createWarehouse) {
    this.factory = factory;
  }

  initialize(
    sessionId: string,
    connectionName: string,
    details: ConnectionDetails,
  ): ActiveWarehouse {
    const warehouse = this.factory(details);
    this.closeSession(sessionId);
    const entry = { connectionName, warehouse };
    this.active.set(sessionId, entry);
    return entry;
  }

  getActive(sessionId: string): ActiveWarehouse | undefined {
    return this.active.get(sessionId);
  }

  requireActive(sessionId: string): ActiveWarehouse {
    const entry = this.active.get(sessionId);
    if (!entry) {
      throw new CollaboratorError(
        "No warehouse connection initialized. Call initialize_warehouse_connection first.",
        "warehouse",
        "unavailable",
        { sessionId },
      );
    }
    return entry;
  }

  closeSession(sessionId: string): void {
    const entry = this.active.get(sessionId);
    if (entry) {
      entry.warehouse.close();
      this.active.delete(sessionId);
    }
  }

  closeAll(): void {
    for (const entry of this.active.values()) {
      entry.warehouse.close();
    }
    this.active.clear();
  }
}
