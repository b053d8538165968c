import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConnectionCatalog } from "../src/collaborators/connections.js";
import { CollaboratorError } from "../src/collaborators/errors.js";
import { extractJsonObject, profilesOutputDetails } from "../src/collaborators/outputs.js";

let dir: string;
let connections: ConnectionCatalog;
let outputFile: string;

function model(modelType: string, modelPath: string, materialName: string) {
  return { model_type: modelType, model_path: modelPath, material_name: materialName };
}

const SHOW_MODELS = {
  "user/all/user_features": {
    ...model("feature_view", "user/all/user_features", "user_features"),
    description: "counts {distinct} users }",
  },
  "user/all/default_id_stitcher": model("id_stitcher", "user/all/default_id_stitcher", "user_default_id_stitcher"),
  "user/all/user_id_stitcher": model("id_stitcher", "user/all/user_id_stitcher", "user_id_stitcher"),
  "user/all/user_features_by_email": model("feature_view", "user/all/user_features_by_email", "user_features_by_email"),
  "user/all/late_default": model("id_stitcher", "user/all/late_default", "user_default_id_stitcher_2"),
  "account/all/account_features": model("feature_view", "account/all/account_features", "account_features"),
  "models/shared_stitcher": model("id_stitcher", "models/shared_stitcher", "shared_stitcher"),
  "user/all/raw_events": model("sql_template", "user/all/raw_events", "raw_events"),
  note: "not a model",
};

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "gate-outputs-"));
  mkdirSync(join(dir, "models"));
  writeFileSync(join(dir, "pb_project.yaml"), "name: churn_project\nconnection: warehouse_prod\n");
  writeFileSync(
    join(dir, "connections.yaml"),
    [
      "connections:",
      "  warehouse_prod:",
      "    type: sqlite",
      "    path: ./prod.db",
      "    output_schema: analytics",
      "  scratch:",
      "    type: sqlite",
      "    path: ./scratch.db",
      "",
    ].join("\n"),
  );
  connections = new ConnectionCatalog(join(dir, "connections.yaml"));
  outputFile = join(dir, "show_models.txt");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("extractJsonObject", () => {
  it("skips colour codes and log lines around the object", () => {
    const text = '\x1B[32mINFO\x1B[0m compiling\n{"a": "x}y", "b": {"c": 1}}\nDone in 2s';
    expect(extractJsonObject(text)).toEqual({ a: "x}y", b: { c: 1 } });
  });

  it("reports output without a complete object", () => {
    expect(() => extractJsonObject("no models")).toThrow("no JSON object found");
    expect(() => extractJsonObject('{"a": {"b": 1}')).toThrow("JSON object is not closed");
  });
});

describe("profilesOutputDetails", () => {
  it("groups feature views and id stitchers by entity in the output schema", () => {
    writeFileSync(outputFile, `\x1B[33mWARN\x1B[0m slow query\n${JSON.stringify(SHOW_MODELS, null, 2)}\n`);
    expect(profilesOutputDetails(dir, outputFile, connections)).toEqual({
      outputSchema: "analytics",
      tablesInfo: {
        user: {
          featureViews: ["analytics.user_features", "analytics.user_features_by_email"],
          idStitcher: "analytics.user_id_stitcher",
        },
        account: {
          featureViews: ["analytics.account_features"],
          idStitcher: null,
        },
      },
    });
  });

  it("falls back to the main schema when the connection names none", () => {
    writeFileSync(join(dir, "pb_project.yaml"), "name: churn_project\nconnection: scratch\n");
    writeFileSync(outputFile, JSON.stringify({ "account/all/account_features": SHOW_MODELS["account/all/account_features"] }));
    expect(profilesOutputDetails(dir, outputFile, connections)).toEqual({
      outputSchema: "main",
      tablesInfo: { account: { featureViews: ["main.account_features"], idStitcher: null } },
    });
  });

  it("rejects missing and unreadable output files", () => {
    expect(() => profilesOutputDetails(dir, outputFile, connections)).toThrow(
      `pb show models output not found at ${outputFile}`,
    );

    writeFileSync(outputFile, 'ERROR run failed\n{"user/all/user_features": {');
    expect(() => profilesOutputDetails(dir, outputFile, connections)).toThrow(
      "Cannot parse pb show models output: JSON object is not closed",
    );
  });

  it("requires the project to name a connection", () => {
    writeFileSync(join(dir, "pb_project.yaml"), "name: churn_project\n");
    writeFileSync(outputFile, "{}");
    expect(() => profilesOutputDetails(dir, outputFile, connections)).toThrow(CollaboratorError);
    expect(() => profilesOutputDetails(dir, outputFile, connections)).toThrow(
      "pb_project.yaml does not name a connection",
    );
  });
});
