import { describe, it, expect } from "vitest";
import { WorkflowState, toStateView } from "../src/session/state.js";

const CREATED = new Date("2026-03-01T09:00:00.000Z");

describe("WorkflowState", () => {
  it("starts empty in the start phase", () => {
    const state = new WorkflowState("s1", CREATED);
    expect(toStateView(state.snapshot())).toEqual({
      sessionId: "s1",
      createdAt: "2026-03-01T09:00:00.000Z",
      phase: "start",
      studiedTopics: [],
      confirmedResources: {},
    });
  });

  it("records topics idempotently and moves to knowledge_gathering", () => {
    const state = new WorkflowState("s1", CREATED);
    state.recordTopicStudied("profiles");
    state.recordTopicStudied("profiles");
    const snap = state.snapshot();
    expect([...snap.studiedTopics]).toEqual(["profiles"]);
    expect(snap.phase).toBe("knowledge_gathering");
  });

  it("confirms a clean batch and moves to resources_confirmed", () => {
    const state = new WorkflowState("s1", CREATED);
    state.recordTopicStudied("profiles");
    expect(state.confirmResources("table", ["EVENTS", "ORDERS"])).toEqual([]);
    const view = toStateView(state.snapshot());
    expect(view.confirmedResources).toEqual({ table: ["EVENTS", "ORDERS"] });
    expect(view.phase).toBe("resources_confirmed");
  });

  it("rejects a batch whole when any name is a placeholder", () => {
    const state = new WorkflowState("s1", CREATED);
    expect(state.confirmResources("table", ["EVENTS", "my_table", "demo_users"])).toEqual([
      "my_table",
      "demo_users",
    ]);
    expect(state.snapshot().confirmedResources.size).toBe(0);
    expect(state.snapshot().phase).toBe("start");
  });

  it("treats an empty batch as a no-op", () => {
    const state = new WorkflowState("s1", CREATED);
    expect(state.confirmResources("schema", [])).toEqual([]);
    expect(state.snapshot().confirmedResources.has("schema")).toBe(false);
    expect(state.snapshot().phase).toBe("start");
  });

  it("only grows: later batches add to earlier ones", () => {
    const state = new WorkflowState("s1", CREATED);
    state.confirmResources("table", ["EVENTS"]);
    state.confirmResources("table", ["your_table"]);
    state.confirmResources("table", ["ORDERS", "EVENTS"]);
    expect(toStateView(state.snapshot()).confirmedResources).toEqual({
      table: ["EVENTS", "ORDERS"],
    });
  });

  it("compares names exactly, without case folding", () => {
    const state = new WorkflowState("s1", CREATED);
    state.confirmResources("table", ["Events"]);
    const confirmed = state.snapshot().confirmedResources.get("table");
    expect(confirmed?.has("Events")).toBe(true);
    expect(confirmed?.has("EVENTS")).toBe(false);
  });

  it("returns snapshots detached from later mutations", () => {
    const state = new WorkflowState("s1", CREATED);
    state.confirmResources("table", ["EVENTS"]);
    const before = state.snapshot();
    state.recordTopicStudied("inputs");
    state.confirmResources("table", ["ORDERS"]);
    expect(before.studiedTopics.size).toBe(0);
    expect([...(before.confirmedResources.get("table") ?? [])]).toEqual(["EVENTS"]);
    expect(Object.isFrozen(before)).toBe(true);
  });
});
