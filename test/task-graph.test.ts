import { describe, expect, it } from "vitest";
import { ConstructionError } from "../src/errors.js";
import {
  byDispatchOrder,
  downstreamOf,
  executionLayers,
  findCycle,
  isSettled,
  promotable,
  readySet,
  topologicalSort,
  validate,
} from "../src/planner/task-graph.js";
import { makeSubtask } from "./helpers.js";

const node = (id: string, dependencies: string[] = []) => ({ id, dependencies });

describe("validate", () => {
  it("accepts an empty graph", () => {
    expect(() => validate([])).not.toThrow();
    expect(executionLayers([])).toEqual([]);
  });

  it("rejects duplicate ids", () => {
    expect(() => validate([node("a"), node("a")])).toThrow('Duplicate node id "a"');
  });

  it("throws on missing dependency", () => {
    expect(() => validate([node("a", ["nonexistent"])])).toThrow('depends on unknown node "nonexistent"');
  });

  it("throws on self-dependency", () => {
    expect(() => validate([node("a", ["a"])])).toThrow("depends on itself");
  });

  it("throws a ConstructionError carrying the cycle path", () => {
    let caught: unknown;
    try {
      validate([node("A", ["B"]), node("B", ["A"])]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConstructionError);
    if (!(caught instanceof ConstructionError)) return;
    expect(caught.code).toBe("CYCLE_DETECTED");
    expect(caught.cycle).toEqual(["A", "B", "A"]);
    expect(caught.message).toBe("Task graph contains a cycle: A -> B -> A");
  });

  it("accepts a valid DAG", () => {
    expect(() => validate([node("a"), node("b", ["a"]), node("c", ["a", "b"])])).not.toThrow();
  });
});

describe("findCycle", () => {
  it("returns null for a DAG", () => {
    expect(findCycle([node("a"), node("b", ["a"])])).toBeNull();
  });

  it("finds a longer cycle", () => {
    expect(findCycle([node("a", ["c"]), node("b", ["a"]), node("c", ["b"])])).toEqual(["a", "b", "c", "a"]);
  });
});

describe("topologicalSort", () => {
  it("puts dependencies first and keeps input order otherwise", () => {
    const sorted = topologicalSort([node("c", ["a"]), node("a"), node("b", ["a"])]);
    expect(sorted.map((n) => n.id)).toEqual(["a", "c", "b"]);
  });
});

describe("executionLayers", () => {
  it("layers the diamond into T1, {T2, T3}, T4", () => {
    const layers = executionLayers([
      node("T1"),
      node("T2", ["T1"]),
      node("T3", ["T1"]),
      node("T4", ["T2", "T3"]),
    ]);
    expect(layers).toEqual([["T1"], ["T2", "T3"], ["T4"]]);
  });

  it("puts independent nodes in the first layer", () => {
    expect(executionLayers([node("a"), node("b"), node("c", ["b"])])).toEqual([["a", "b"], ["c"]]);
  });
});

describe("ready set", () => {
  it("promotes pending subtasks whose dependencies all completed", () => {
    const tasks = [
      makeSubtask("a", [], { status: "completed" }),
      makeSubtask("b", ["a"]),
      makeSubtask("c", ["a", "b"]),
      makeSubtask("d"),
    ];
    expect(promotable(tasks).map((t) => t.id)).toEqual(["b", "d"]);
  });

  it("does not promote behind a failed dependency", () => {
    const tasks = [makeSubtask("a", [], { status: "failed" }), makeSubtask("b", ["a"])];
    expect(promotable(tasks)).toEqual([]);
  });

  it("orders by priority, then insertion order", () => {
    const tasks = [
      makeSubtask("low", [], { status: "ready", priority: 1, seq: 0 }),
      makeSubtask("high-late", [], { status: "ready", priority: 3, seq: 2 }),
      makeSubtask("high-early", [], { status: "ready", priority: 3, seq: 1 }),
      makeSubtask("pending", [], { status: "pending", priority: 9, seq: 3 }),
    ];
    expect(readySet(tasks).map((t) => t.id)).toEqual(["high-early", "high-late", "low"]);
    expect([...tasks].sort(byDispatchOrder).map((t) => t.id)[0]).toBe("pending");
  });
});

describe("isSettled", () => {
  it("is true only when everything completed or aborted", () => {
    expect(isSettled([makeSubtask("a", [], { status: "completed" }), makeSubtask("b", [], { status: "aborted" })])).toBe(true);
    expect(isSettled([makeSubtask("a", [], { status: "completed" }), makeSubtask("b", [], { status: "failed" })])).toBe(false);
  });
});

describe("downstreamOf", () => {
  it("collects transitive dependents breadth first", () => {
    const nodes = [node("T1"), node("T2", ["T1"]), node("T3", ["T1"]), node("T4", ["T2", "T3"]), node("X")];
    expect(downstreamOf(nodes, "T1")).toEqual(["T2", "T3", "T4"]);
    expect(downstreamOf(nodes, "T4")).toEqual([]);
  });
});
