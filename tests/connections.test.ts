import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConnectionCatalog } from "../src/collaborators/connections.js";
import { CollaboratorError } from "../src/collaborators/errors.js";

let tempDir: string;
let file: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "gate-connections-"));
  file = join(tempDir, "connections.yaml");
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe("ConnectionCatalog", () => {
  it("treats a missing file as no connections", () => {
    expect(new ConnectionCatalog(file).listNames()).toEqual([]);
  });

  it("lists connection names sorted", () => {
    writeFileSync(
      file,
      [
        "connections:",
        "  warehouse_prod:",
        "    type: sqlite",
        "    path: ./prod.db",
        "  analytics_local:",
        "    type: sqlite",
        "    path: /data/analytics.db",
      ].join("\n"),
    );
    expect(new ConnectionCatalog(file).listNames()).toEqual(["analytics_local", "warehouse_prod"]);
  });

  it("resolves relative paths against the file's directory", () => {
    writeFileSync(
      file,
      "connections:\n  warehouse_prod:\n    type: sqlite\n    path: ./prod.db\n    password: test-secret\n",
    );
    expect(new ConnectionCatalog(file).get("warehouse_prod")).toEqual({
      type: "sqlite",
      path: join(tempDir, "prod.db"),
      password: "test-secret",
    });
  });

  it("keeps :memory: paths as they are", () => {
    writeFileSync(file, "connections:\n  scratch:\n    type: sqlite\n    path: ':memory:'\n");
    expect(new ConnectionCatalog(file).get("scratch")["path"]).toBe(":memory:");
  });

  it("reports unknown names with the available ones", () => {
    writeFileSync(file, "connections:\n  warehouse_prod:\n    type: sqlite\n");
    try {
      new ConnectionCatalog(file).get("staging");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CollaboratorError);
      expect(e).toMatchObject({
        kind: "invalid_request",
        message: "Connection not found: staging",
        details: { name: "staging", available: ["warehouse_prod"] },
      });
    }
  });

  it("rejects malformed files", () => {
    writeFileSync(file, "connections:\n  broken:\n    path: 42\n");
    expect(() => new ConnectionCatalog(file).listNames()).toThrow(/is malformed$/);
  });

  it("rejects invalid YAML", () => {
    writeFileSync(file, "connections: [unclosed\n");
    expect(() => new ConnectionCatalog(file).listNames()).toThrow(CollaboratorError);
  });
});
