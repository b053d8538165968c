import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import { CollaboratorError } from "../src/collaborators/errors.js";
import type { WarehouseService } from "../src/collaborators/types.js";
import {
  SqliteWarehouse,
  WarehouseManager,
  createWarehouse,
  splitTableName,
} from "../src/collaborators/warehouse.js";

// ---------------------------------------------------------------------------
// Fixture database
// ---------------------------------------------------------------------------

let tempDir: string;
let dbPath: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "gate-warehouse-"));
  dbPath = join(tempDir, "warehouse.db");
  const db = new Database(dbPath);
  db.exec(`
    CREATE TABLE tracks (
      user_id   TEXT NOT NULL,
      event     TEXT,
      timestamp TEXT NOT NULL
    );
    CREATE TABLE orders (order_id INTEGER PRIMARY KEY, user_id TEXT, total REAL);
    CREATE VIEW recent_tracks AS SELECT * FROM tracks;
    INSERT INTO tracks VALUES ('u1', 'signup', '2026-01-01'), ('u2', 'login', '2026-01-02');
  `);
  db.close();
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

async function failure(p: Promise<unknown>): Promise<CollaboratorError> {
  try {
    await p;
  } catch (e) {
    if (e instanceof CollaboratorError) return e;
    throw e;
  }
  throw new Error("expected a CollaboratorError");
}

// ---------------------------------------------------------------------------
// SqliteWarehouse
// ---------------------------------------------------------------------------

describe("SqliteWarehouse", () => {
  it("runs queries and returns columns and rows", async () => {
    const wh = new SqliteWarehouse(dbPath);
    try {
      const result = await wh.executeQuery("SELECT user_id, event FROM tracks ORDER BY user_id");
      expect(result).toEqual({
        columns: ["user_id", "event"],
        rows: [
          { user_id: "u1", event: "signup" },
          { user_id: "u2", event: "login" },
        ],
        rowCount: 2,
        truncated: false,
      });
    } finally {
      wh.close();
    }
  });

  it("stops reading once the row limit is passed", async () => {
    const db = new Database(dbPath);
    const insert = db.prepare("INSERT INTO orders (user_id, total) VALUES (?, ?)");
    for (let i = 0; i < 500; i++) insert.run(`u${i}`, i);
    db.close();

    const wh = new SqliteWarehouse(dbPath);
    try {
      const limited = await wh.executeQuery("SELECT order_id FROM orders ORDER BY order_id", 3);
      expect(limited).toEqual({
        columns: ["order_id"],
        rows: [{ order_id: 1 }, { order_id: 2 }, { order_id: 3 }],
        rowCount: 3,
        truncated: true,
      });

      const exact = await wh.executeQuery("SELECT user_id FROM tracks", 2);
      expect(exact.truncated).toBe(false);
      expect(exact.rowCount).toBe(2);

      expect((await wh.executeQuery("SELECT COUNT(*) AS n FROM orders", 1)).rows).toEqual([{ n: 500 }]);
    } finally {
      wh.close();
    }
  });

  it("is read-only", async () => {
    const wh = new SqliteWarehouse(dbPath);
    try {
      const err = await failure(wh.executeQuery("DELETE FROM tracks"));
      expect(err.kind).toBe("query");
      expect(err.collaborator).toBe("warehouse");
    } finally {
      wh.close();
    }
  });

  it("reports SQL errors as query failures", async () => {
    const wh = new SqliteWarehouse(dbPath);
    try {
      const err = await failure(wh.executeQuery("SELECT * FROM nope"));
      expect(err.kind).toBe("query");
      expect(err.message).toBe("Query failed: no such table: nope");
    } finally {
      wh.close();
    }
  });

  it("lists tables and views qualified by schema", async () => {
    const wh = new SqliteWarehouse(dbPath);
    try {
      expect(await wh.listTables("main")).toEqual(["main.orders", "main.recent_tracks", "main.tracks"]);
      expect(await wh.listTables("")).toEqual(["main.orders", "main.recent_tracks", "main.tracks"]);
    } finally {
      wh.close();
    }
  });

  it("rejects schema names that are not identifiers", async () => {
    const wh = new SqliteWarehouse(dbPath);
    try {
      const err = await failure(wh.listTables("main; DROP TABLE tracks"));
      expect(err.kind).toBe("invalid_request");
    } finally {
      wh.close();
    }
  });

  it("describes table columns", async () => {
    const wh = new SqliteWarehouse(dbPath);
    try {
      expect(await wh.describeTable("main.tracks")).toEqual([
        { name: "user_id", type: "TEXT", nullable: false },
        { name: "event", type: "TEXT", nullable: true },
        { name: "timestamp", type: "TEXT", nullable: false },
      ]);
      const err = await failure(wh.describeTable("missing"));
      expect(err.message).toBe("Table not found: missing");
    } finally {
      wh.close();
    }
  });

  it("fails with connectivity errors when the file is missing or closed", async () => {
    expect(() => new SqliteWarehouse(join(tempDir, "absent.db"))).toThrow(CollaboratorError);

    const wh = new SqliteWarehouse(dbPath);
    wh.close();
    const err = await failure(wh.executeQuery("SELECT 1"));
    expect(err.kind).toBe("connectivity");
  });
});

describe("splitTableName", () => {
  it("defaults the schema to main", () => {
    expect(splitTableName("tracks")).toEqual({ schema: "main", table: "tracks" });
    expect(splitTableName("analytics.tracks")).toEqual({ schema: "analytics", table: "tracks" });
  });
});

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

describe("createWarehouse", () => {
  it("builds sqlite warehouses", () => {
    const wh = createWarehouse({ type: "SQLite", path: dbPath });
    expect(wh.warehouseType).toBe("sqlite");
    wh.close();
  });

  it("rejects unsupported types", () => {
    try {
      createWarehouse({ type: "snowflake", account: "acme" });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CollaboratorError);
      expect(e).toMatchObject({ kind: "invalid_request" });
      expect((e as Error).message).toBe("Unsupported warehouse type: snowflake. Supported: sqlite");
    }
  });

  it("requires a path for sqlite", () => {
    expect(() => createWarehouse({ type: "sqlite" })).toThrow("sqlite connection requires a path");
  });
});

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

function fakeWarehouse(): WarehouseService & { close: ReturnType<typeof vi.fn> } {
  return {
    warehouseType: "fake",
    executeQuery: async () => ({ columns: [], rows: [], rowCount: 0, truncated: false }),
    listTables: async () => [],
    describeTable: async () => [],
    close: vi.fn(),
  };
}

describe("WarehouseManager", () => {
  it("keeps one active connection per session", () => {
    const created: Array<ReturnType<typeof fakeWarehouse>> = [];
    const manager = new WarehouseManager(() => {
      const wh = fakeWarehouse();
      created.push(wh);
      return wh;
    });

    manager.initialize("s1", "first", { type: "fake" });
    manager.initialize("s1", "second", { type: "fake" });
    manager.initialize("s2", "other", { type: "fake" });

    expect(created[0]?.close).toHaveBeenCalledTimes(1);
    expect(manager.getActive("s1")?.connectionName).toBe("second");
    expect(manager.getActive("s2")?.connectionName).toBe("other");

    manager.closeAll();
    expect(created[1]?.close).toHaveBeenCalledTimes(1);
    expect(created[2]?.close).toHaveBeenCalledTimes(1);
    expect(manager.getActive("s1")).toBeUndefined();
  });

  it("keeps the previous connection when the new one fails to open", () => {
    const first = fakeWarehouse();
    let calls = 0;
    const manager = new WarehouseManager(() => {
      calls++;
      if (calls === 1) return first;
      throw new CollaboratorError("cannot connect", "warehouse", "connectivity");
    });

    manager.initialize("s1", "good", { type: "fake" });
    expect(() => manager.initialize("s1", "bad", { type: "fake" })).toThrow("cannot connect");
    expect(manager.getActive("s1")?.connectionName).toBe("good");
    expect(first.close).not.toHaveBeenCalled();
  });

  it("requireActive explains how to connect", () => {
    const manager = new WarehouseManager(() => fakeWarehouse());
    expect(() => manager.requireActive("s1")).toThrow(
      "No warehouse connection initialized. Call initialize_warehouse_connection first.",
    );
  });
});
