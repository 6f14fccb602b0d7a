import { describe, expect, it } from "vitest";
import { ConstructionError, ValidationError } from "../src/errors.js";
import { Decomposer } from "../src/planner/decomposer.js";
import type { DagSkeleton } from "../src/planner/types.js";
import { createSession, makeSpec, memoryStore } from "./helpers.js";

describe("Decomposer.analyze", () => {
  const decomposer = new Decomposer();

  it("scores complexity from weighted keywords", () => {
    expect(decomposer.analyze("Implement a payment system")).toEqual({
      taskType: "development",
      complexity: "complex",
      score: 4,
    });
    expect(decomposer.analyze("refactor the parser")).toEqual({
      taskType: "refactor",
      complexity: "medium",
      score: 2,
    });
  });

  it("classifies by the first template with a matching keyword", () => {
    expect(decomposer.analyze("fix typo in readme")).toEqual({ taskType: "docs", complexity: "simple", score: 1 });
    expect(decomposer.analyze("add coverage for the parser").taskType).toBe("test");
  });

  it("prefers test, docs and research over refactor", () => {
    expect(decomposer.analyze("refactor the test suite").taskType).toBe("test");
    expect(decomposer.analyze("rewrite the readme").taskType).toBe("docs");
    expect(decomposer.analyze("investigate how to restructure the cache").taskType).toBe("research");
  });

  it("matches whole words only", () => {
    expect(decomposer.analyze("review tested modules").taskType).toBe("development");
  });

  it("falls back to development with nothing recognisable", () => {
    expect(decomposer.analyze("hello world")).toEqual({ taskType: "development", complexity: "simple", score: 0 });
  });
});

describe("Decomposer.decompose", () => {
  it("builds the full development template for complex goals", () => {
    const skeleton = new Decomposer().decompose("Implement a payment system");

    expect(skeleton.taskType).toBe("development");
    expect(skeleton.complexity).toBe("complex");
    expect(skeleton.subtasks.map((s) => s.id)).toEqual(["research", "design", "implement", "test", "document", "review"]);

    const byId = new Map(skeleton.subtasks.map((s) => [s.id, s]));
    expect(byId.get("test")?.dependencies).toEqual(["implement"]);
    expect(byId.get("document")?.dependencies).toEqual(["implement"]);
    expect(byId.get("review")?.dependencies).toEqual(["test", "document"]);
    expect(byId.get("research")?.role).toBe("researcher");
    expect(byId.get("research")?.description).toBe(
      "Research technical approaches and best practices: Implement a payment system",
    );
    expect(byId.get("design")?.inputPayload).toEqual({
      goal: "Implement a payment system",
      step: "design",
      taskType: "development",
    });
  });

  it("drops optional steps for simple goals and rewires their dependents", () => {
    const skeleton = new Decomposer().decompose("add a button", "development");

    expect(skeleton.complexity).toBe("simple");
    expect(skeleton.subtasks.map((s) => s.id)).toEqual(["design", "implement", "test", "document", "review"]);
    expect(skeleton.subtasks[0].dependencies).toEqual([]);
  });

  it("keeps optional steps when complexity is overridden", () => {
    const skeleton = new Decomposer().decompose("add a button", "development", { complexity: "medium" });
    expect(skeleton.subtasks).toHaveLength(6);
  });

  it("normalises the task type hint", () => {
    const skeleton = new Decomposer().decompose("tidy things", " Refactor ");
    expect(skeleton.taskType).toBe("refactor");
    expect(skeleton.subtasks.map((s) => s.id)).toEqual(["analyze", "plan", "refactor", "verify"]);
  });

  it("falls back to a single coder subtask for unknown types", () => {
    const skeleton = new Decomposer().decompose("do something", "astrology");
    expect(skeleton.taskType).toBe("astrology");
    expect(skeleton.subtasks).toEqual([
      {
        id: "execute",
        description: "Execute the task: do something",
        role: "coder",
        dependencies: [],
        priority: 2,
        maxRetries: undefined,
        timeoutMs: undefined,
        inputPayload: { goal: "do something", step: "execute", taskType: "astrology" },
      },
    ]);
  });

  it("passes retry and timeout options to every subtask", () => {
    const skeleton = new Decomposer().decompose("gather notes", "research", { maxRetries: 5, timeoutMs: 900 });
    expect(skeleton.subtasks.map((s) => [s.id, s.maxRetries, s.timeoutMs])).toEqual([
      ["gather", 5, 900],
      ["synthesize", 5, 900],
    ]);
  });
});

describe("Decomposer templates", () => {
  it("lists the built-in task types in match order", () => {
    expect(new Decomposer().taskTypes()).toEqual(["test", "docs", "research", "refactor", "development"]);
  });

  it("rejects a second template for the same task type", () => {
    const decomposer = new Decomposer();
    let caught: unknown;
    try {
      decomposer.register({ taskType: "development", keywords: [], steps: [] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: "DUPLICATE_REGISTRATION" });
  });

  it("uses registered templates", () => {
    const decomposer = new Decomposer();
    decomposer.register({
      taskType: "release",
      keywords: ["release"],
      steps: [
        { key: "bump", role: "coder", description: "Bump the version", dependsOn: [], priority: 2 },
        { key: "notes", role: "writer", description: "Write release notes", dependsOn: ["bump"], priority: 1 },
      ],
    });
    const skeleton = decomposer.decompose("cut the release");
    expect(skeleton.taskType).toBe("release");
    expect(skeleton.subtasks.map((s) => s.id)).toEqual(["bump", "notes"]);
  });
});

describe("cyclic skeletons", () => {
  it("rejects a cyclic template before anything is created", () => {
    const decomposer = new Decomposer();
    decomposer.register({
      taskType: "loop",
      keywords: [],
      steps: [
        { key: "A", role: "coder", description: "a", dependsOn: ["B"], priority: 1 },
        { key: "B", role: "coder", description: "b", dependsOn: ["A"], priority: 1 },
      ],
    });
    expect(() => decomposer.decompose("anything", "loop")).toThrow(ConstructionError);
  });

  it("raises ConstructionError for {A:[B], B:[A]} and creates zero subtasks", () => {
    const skeleton: DagSkeleton = {
      goal: "cyclic",
      taskType: "development",
      complexity: "simple",
      subtasks: [makeSpec("A", ["B"]), makeSpec("B", ["A"])],
    };
    const store = memoryStore();

    expect(() => new Decomposer().validate(skeleton)).toThrow(ConstructionError);
    expect(() => createSession(store, skeleton.subtasks)).toThrow(ConstructionError);
    expect(store.listSessions()).toEqual([]);
    store.close();
  });

  it("rejects a skeleton with no subtasks", () => {
    const skeleton: DagSkeleton = { goal: "nothing", taskType: "development", complexity: "simple", subtasks: [] };
    expect(() => new Decomposer().validate(skeleton)).toThrow("Skeleton has no subtasks");
  });
});
