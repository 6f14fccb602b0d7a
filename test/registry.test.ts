import { describe, expect, it } from "vitest";
import type { WorkerAdapter } from "../src/agents/adapter.js";
import { WorkerRegistry } from "../src/agents/registry.js";
import { ValidationError } from "../src/errors.js";
import { makeWorker } from "./helpers.js";

const probed = (healthCheck: () => Promise<boolean>): WorkerAdapter => ({
  name: "probed",
  role: "reviewer",
  type: "custom",
  execute: async (input) => ({
    taskId: input.taskId,
    status: "completed",
    outputData: {},
    executionTime: 0,
    resourceUsage: {},
  }),
  healthCheck,
});

describe("WorkerRegistry", () => {
  it("binds one worker per role", () => {
    const registry = new WorkerRegistry();
    const coder = makeWorker("coder", async () => ({}));
    registry.add(coder);
    registry.add(makeWorker("tester", async () => ({})));

    expect(registry.get("coder")).toBe(coder);
    expect(registry.has("writer")).toBe(false);
    expect(registry.roles()).toEqual(["coder", "tester"]);
    expect(registry.list().map((w) => w.name)).toEqual(["coder-fn", "tester-fn"]);
  });

  it("throws on a second worker for a role", () => {
    const registry = new WorkerRegistry();
    registry.add(makeWorker("coder", async () => ({})));

    let caught: unknown;
    try {
      registry.add(makeWorker("coder", async () => ({})));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: "DUPLICATE_REGISTRATION" });
  });

  it("removes workers", () => {
    const registry = new WorkerRegistry();
    registry.add(makeWorker("coder", async () => ({})));
    expect(registry.remove("coder")).toBe(true);
    expect(registry.get("coder")).toBeUndefined();
    expect(registry.remove("coder")).toBe(false);
  });

  it("reports an unbound role as unhealthy", async () => {
    const health = await new WorkerRegistry().checkHealth("writer");
    expect(health).toMatchObject({ role: "writer", name: "", healthy: false, error: "No worker bound" });
  });

  it("treats workers without a probe as healthy", async () => {
    const registry = new WorkerRegistry();
    registry.add(makeWorker("coder", async () => ({})));
    expect(await registry.checkHealth("coder")).toMatchObject({ name: "coder-fn", healthy: true });
  });

  it("records probe results and failures", async () => {
    const registry = new WorkerRegistry();
    registry.add(
      probed(async () => {
        throw new Error("probe exploded");
      }),
    );
    registry.add(makeWorker("coder", async () => ({})));

    const all = await registry.checkAllHealth();
    expect(all.map((h) => [h.role, h.healthy])).toEqual([
      ["reviewer", false],
      ["coder", true],
    ]);
    expect(registry.getCachedHealth("reviewer")?.error).toBe("probe exploded");
    expect(registry.getCachedHealth("tester")).toBeUndefined();
  });

  it("passes the probe's answer through", async () => {
    const registry = new WorkerRegistry();
    registry.add(probed(async () => false));
    expect((await registry.checkHealth("reviewer")).healthy).toBe(false);
    expect(registry.getCachedHealth("reviewer")?.error).toBeUndefined();
  });
});
