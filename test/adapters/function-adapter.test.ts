import { describe, expect, it } from "vitest";
import type { WorkerContext, WorkerInput } from "../../src/agents/adapter.js";
import { FunctionAdapter } from "../../src/agents/function-adapter.js";

const input: WorkerInput = { taskId: "t1", description: "do t1", role: "coder", inputData: { n: 1 } };

const context = (attempt = 1): WorkerContext => ({
  signal: new AbortController().signal,
  attempt,
  heartbeat: () => undefined,
});

describe("FunctionAdapter", () => {
  it("has correct type, name and role", () => {
    const adapter = new FunctionAdapter({ name: "echo", role: "writer", fn: async () => ({}) });
    expect(adapter.name).toBe("echo");
    expect(adapter.role).toBe("writer");
    expect(adapter.type).toBe("function");
  });

  it("returns the function's payload as output", async () => {
    const adapter = new FunctionAdapter({
      name: "echo",
      role: "coder",
      fn: async (received, ctx) => ({ echoed: received.inputData.n, attempt: ctx.attempt }),
    });

    const output = await adapter.execute(input, context(3));
    expect(output).toMatchObject({
      taskId: "t1",
      status: "completed",
      outputData: { echoed: 1, attempt: 3 },
      resourceUsage: {},
    });
    expect(output.errorMessage).toBeUndefined();
    expect(output.executionTime).toBeGreaterThanOrEqual(0);
  });

  it("turns a throw into a failed output", async () => {
    const adapter = new FunctionAdapter({
      name: "failing",
      role: "coder",
      fn: async () => {
        throw new Error("boom");
      },
    });

    expect(await adapter.execute(input, context())).toMatchObject({
      taskId: "t1",
      status: "failed",
      outputData: {},
      errorMessage: "boom",
    });
  });

  it("stringifies non-Error throws", async () => {
    const adapter = new FunctionAdapter({
      name: "failing",
      role: "coder",
      fn: () => Promise.reject("plain reason"),
    });

    expect((await adapter.execute(input, context())).errorMessage).toBe("plain reason");
  });
});
