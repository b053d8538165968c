import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import { CollaboratorError } from "../src/collaborators/errors.js";
import { suggestInputTables } from "../src/collaborators/suggestions.js";
import { SqliteWarehouse } from "../src/collaborators/warehouse.js";

let tempDir: string;
let warehouse: SqliteWarehouse;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "gate-suggestions-"));
  const dbPath = join(tempDir, "events.db");
  const db = new Database(dbPath);
  db.exec(`
    CREATE TABLE tracks (user_id TEXT, event TEXT, timestamp TEXT);
    CREATE TABLE pages (user_id TEXT, path TEXT);
    CREATE TABLE identifies (user_id TEXT, email TEXT);
    CREATE TABLE order_completed (user_id TEXT, total REAL);
    CREATE TABLE product_viewed (user_id TEXT, sku TEXT);
    CREATE TABLE old_tracks (user_id TEXT);
    CREATE TABLE accounts (account_id TEXT);
    INSERT INTO tracks VALUES
      ('u1', 'order_completed', '2026-01-01'),
      ('u2', 'order_completed', '2026-01-02'),
      ('u1', 'product_viewed', '2026-01-02'),
      ('u3', 'signup', '2026-01-03'),
      ('u4', NULL, '2026-01-04');
  `);
  db.close();
  warehouse = new SqliteWarehouse(dbPath);
});

afterEach(() => {
  warehouse.close();
  rmSync(tempDir, { recursive: true, force: true });
});

describe("suggestInputTables", () => {
  it("suggests event stream tables and tables named after frequent events", async () => {
    const result = await suggestInputTables(warehouse, ["main"]);
    expect(result.suggestions).toEqual([
      "main.identifies",
      "main.old_tracks",
      "main.order_completed",
      "main.pages",
      "main.product_viewed",
      "main.tracks",
    ]);
  });

  it("reports tracks-like tables without an event column as warnings", async () => {
    const result = await suggestInputTables(warehouse, ["main"]);
    expect(result.warnings).toEqual([
      "Could not read events from main.old_tracks: Query failed: no such column: event",
    ]);
  });

  it("merges repeated schemas without duplicates", async () => {
    const once = await suggestInputTables(warehouse, ["main"]);
    const twice = await suggestInputTables(warehouse, ["main", "main"]);
    expect(twice.schemas).toEqual(["main", "main"]);
    expect(twice.suggestions).toEqual(once.suggestions);
  });

  it("fails on a schema that does not exist", async () => {
    await expect(suggestInputTables(warehouse, ["missing"])).rejects.toBeInstanceOf(CollaboratorError);
  });
});
