import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WorkerRegistry } from "../src/agents/registry.js";
import { UnschedulableGraphError, ValidationError } from "../src/errors.js";
import { Dispatcher } from "../src/executor/dispatcher.js";
import { Scheduler, settledState } from "../src/executor/scheduler.js";
import type { TaskStore } from "../src/persistence/task-store.js";
import type { SubtaskSpec } from "../src/planner/types.js";
import { InMemoryErrorMemory, seedRemedies } from "../src/reflexion/memory.js";
import { Reflexion, type ReflexionDecision } from "../src/reflexion/reflexion.js";
import {
  aborted,
  createSession,
  makeSpec,
  makeSubtask,
  makeWorker,
  memoryStore,
  sleep,
  type WorkerCall,
} from "./helpers.js";

const POLL = { pollIntervalMs: 20 };

describe("settledState", () => {
  it("is completed, partial or failed by how many subtasks completed", () => {
    const done = makeSubtask("a", [], { status: "completed" });
    const lost = makeSubtask("b", [], { status: "aborted" });
    expect(settledState([done, done])).toBe("completed");
    expect(settledState([done, lost])).toBe("partial");
    expect(settledState([lost, lost])).toBe("failed");
  });
});

describe("Scheduler", () => {
  let store: TaskStore;
  let registry: WorkerRegistry;
  let dispatcher: Dispatcher;
  let memory: InMemoryErrorMemory;
  let scheduler: Scheduler;

  beforeEach(() => {
    store = memoryStore();
    registry = new WorkerRegistry();
    dispatcher = new Dispatcher(store, registry, { heartbeatCheckMs: 10, cancelGraceMs: 1_000 });
    memory = new InMemoryErrorMemory();
    scheduler = new Scheduler(store, dispatcher, new Reflexion(store, memory));
  });

  afterEach(async () => {
    await dispatcher.shutdown(0);
    store.close();
  });

  it("runs the diamond T1 -> {T2, T3} -> T4 in dependency order", async () => {
    const events: string[] = [];
    registry.add(
      makeWorker("coder", async (input) => {
        events.push(`start:${input.taskId}`);
        await sleep(5);
        events.push(`end:${input.taskId}`);
        return { summary: input.taskId };
      }),
    );
    const session = createSession(store, [
      makeSpec("T1"),
      makeSpec("T2", ["T1"]),
      makeSpec("T3", ["T1"]),
      makeSpec("T4", ["T2", "T3"]),
    ]);

    const result = await scheduler.run(session.id, POLL);

    expect(result).toMatchObject({ sessionId: session.id, state: "completed", dispatches: 4 });
    expect(events.slice(0, 4)).toEqual(["start:T1", "end:T1", "start:T2", "start:T3"]);
    expect(events.indexOf("start:T4")).toBeGreaterThan(events.indexOf("end:T2"));
    expect(events.indexOf("start:T4")).toBeGreaterThan(events.indexOf("end:T3"));
    expect(events.at(-1)).toBe("end:T4");
    expect(store.getSession(session.id).state).toBe("completed");
    expect(store.list(session.id).every((t) => t.status === "completed")).toBe(true);
  });

  it("does nothing for a session that already finished", async () => {
    registry.add(makeWorker("coder", async () => ({})));
    const session = createSession(store, [makeSpec("a")]);
    await scheduler.run(session.id, POLL);

    expect(await scheduler.run(session.id, POLL)).toEqual({
      sessionId: session.id,
      state: "completed",
      dispatches: 0,
      durationMs: 0,
    });
  });

  it("never runs more subtasks than the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    registry.add(
      makeWorker("coder", async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(20);
        active--;
        return {};
      }),
    );
    const session = createSession(store, ["a", "b", "c", "d", "e"].map((id) => makeSpec(id)));

    const result = await scheduler.run(session.id, POLL);
    expect(result.dispatches).toBe(5);
    expect(peak).toBe(2);
  });

  it("dispatches by priority, then insertion order", async () => {
    const started: string[] = [];
    registry.add(makeWorker("coder", async () => ({})));
    const session = createSession(store, [
      makeSpec("a", [], { priority: 1 }),
      makeSpec("b", [], { priority: 5 }),
      makeSpec("c", [], { priority: 3 }),
      makeSpec("d", [], { priority: 3 }),
    ]);

    await scheduler.run(session.id, {
      ...POLL,
      concurrencyLimit: 1,
      callbacks: { onTaskStart: (task) => started.push(task.id) },
    });
    expect(started).toEqual(["b", "c", "d", "a"]);
  });

  it("dispatches a failing subtask exactly maxRetries + 1 times", async () => {
    const retries: ReflexionDecision[] = [];
    let calls = 0;
    registry.add(
      makeWorker("coder", async () => {
        calls++;
        throw new Error("boom");
      }),
    );
    const session = createSession(store, [makeSpec("a", [], { maxRetries: 2 })]);

    const result = await scheduler.run(session.id, {
      ...POLL,
      callbacks: { onRetry: (_task, decision) => retries.push(decision) },
    });

    expect(calls).toBe(3);
    expect(result).toMatchObject({ state: "failed", dispatches: 3 });
    expect(store.get(session.id, "a")).toMatchObject({
      status: "aborted",
      failureReason: "retries_exhausted",
      attemptCount: 2,
      errorMessage: "boom",
    });
    expect(retries).toEqual([
      { action: "retry", signature: "coder:unknown", category: "unknown", hints: undefined },
      { action: "retry", signature: "coder:unknown", category: "unknown", hints: undefined },
    ]);
    expect(memory.history("coder:unknown").map((e) => e.outcome)).toEqual(["retried", "retried", "exhausted"]);
  });

  it("retries with a remembered remedy and credits it on success", async () => {
    await seedRemedies(memory);
    const calls: WorkerCall[] = [];
    registry.add(
      makeWorker("coder", async (input, ctx) => {
        calls.push({ input, ctx });
        if (calls.length === 1) throw new Error("ENOENT: no such file or directory, open 'app.ts'");
        return { summary: "fixed" };
      }),
    );
    const session = createSession(store, [makeSpec("a", [], { inputPayload: { goal: "g" } })]);

    const result = await scheduler.run(session.id, POLL);

    expect(result).toMatchObject({ state: "completed", dispatches: 2 });
    expect(calls[1].ctx.attempt).toBe(2);
    expect(calls[1].input.inputData).toEqual({
      goal: "g",
      remedyHints: ["Check the file path", "Create the missing file", "Confirm the working directory"],
      previousError: "ENOENT: no such file or directory, open 'app.ts'",
      reflexionSignature: "coder:file_not_found",
    });
    expect(store.transitions(session.id, "a").map((t) => t.reason)).toContain("remedy_applied");
    expect(await memory.lookup("coder:file_not_found")).toEqual({
      signature: "coder:file_not_found",
      hints: ["Check the file path", "Create the missing file", "Confirm the working directory"],
      successes: 1,
      failures: 0,
    });
  });

  it("aborts everything downstream of an aborted subtask and finishes partial", async () => {
    const started: string[] = [];
    registry.add(
      makeWorker("coder", async (input) => {
        started.push(input.taskId);
        if (input.taskId === "a") throw new Error("broken");
        return {};
      }),
    );
    const session = createSession(store, [
      makeSpec("a", [], { maxRetries: 0 }),
      makeSpec("b", ["a"]),
      makeSpec("c"),
      makeSpec("d", ["b"]),
    ]);

    const result = await scheduler.run(session.id, POLL);

    expect(result.state).toBe("partial");
    expect(started.sort()).toEqual(["a", "c"]);
    expect(store.get(session.id, "b").failureReason).toBe("dependency_aborted");
    expect(store.get(session.id, "d").failureReason).toBe("dependency_aborted");
    expect(store.get(session.id, "c").status).toBe("completed");
  });

  it("fails an unschedulable graph instead of hanging", async () => {
    registry.add(
      makeWorker("coder", async (input) => {
        if (input.taskId === "a") throw new Error("broken");
        return {};
      }),
    );
    const session = createSession(store, [makeSpec("a", [], { maxRetries: 0 }), makeSpec("b", ["a"]), makeSpec("c")]);

    const run = scheduler.run(session.id, { ...POLL, abortDownstream: false });

    await expect(run).rejects.toThrow(UnschedulableGraphError);
    await expect(run).rejects.toThrow(`Session "${session.id}" cannot make progress: b pending with no runnable work`);
    expect(store.getSession(session.id)).toMatchObject({
      state: "failed",
      error: `Session "${session.id}" cannot make progress: b pending with no runnable work`,
    });
    expect(store.get(session.id, "b")).toMatchObject({ status: "aborted", failureReason: "unschedulable" });
  });

  it("fails a running subtask nobody is executing and retries it", async () => {
    registry.add(makeWorker("coder", async () => ({ summary: "recovered" })));
    const session = createSession(store, [makeSpec("a")]);
    const ref = { sessionId: session.id, id: "a" };
    store.markStatus(ref, "ready", "dependencies_completed");
    store.markStatus(ref, "running", "dispatched");

    const result = await scheduler.run(session.id, POLL);

    expect(result).toMatchObject({ state: "completed", dispatches: 1 });
    expect(store.get(session.id, "a").attemptCount).toBe(1);
    expect(store.transitions(session.id, "a").map((t) => t.reason)).toEqual([
      "dependencies_completed",
      "dispatched",
      "worker_lost",
      "retry",
      "retry_scheduled",
      "dispatched",
      "worker_completed",
    ]);
  });

  it("cancels when the caller's signal aborts", async () => {
    registry.add(
      makeWorker("coder", async (_input, ctx) => {
        await aborted(ctx.signal);
        return {};
      }),
    );
    const session = createSession(store, [makeSpec("a"), makeSpec("b", ["a"])]);
    const controller = new AbortController();

    const result = await scheduler.run(session.id, {
      ...POLL,
      signal: controller.signal,
      callbacks: { onTaskStart: () => controller.abort() },
    });

    expect(result).toMatchObject({ state: "cancelled", dispatches: 1 });
    expect(store.getSession(session.id).state).toBe("cancelled");
    expect(store.list(session.id).map((t) => [t.id, t.status, t.failureReason])).toEqual([
      ["a", "aborted", "cancelled"],
      ["b", "aborted", "cancelled"],
    ]);
  });

  it("cancels when another writer flags the session in the store", async () => {
    registry.add(
      makeWorker("coder", async (_input, ctx) => {
        await aborted(ctx.signal);
        return {};
      }),
    );
    const session = createSession(store, [makeSpec("a"), makeSpec("b")]);

    const run = scheduler.run(session.id, POLL);
    await sleep(30);
    expect(store.requestCancel(session.id)).toBe(true);

    expect((await run).state).toBe("cancelled");
    expect(store.list(session.id).map((t) => t.status)).toEqual(["aborted", "aborted"]);
  });

  it("never starts a subtask before all its dependencies completed", async () => {
    for (const seed of [7, 42, 1234]) {
      let state = seed;
      const random = (): number => {
        state = (state * 16_807) % 2_147_483_647;
        return state / 2_147_483_647;
      };
      const specs: SubtaskSpec[] = [];
      for (let i = 0; i < 15; i++) {
        const deps = specs.filter(() => random() < 0.3).map((s) => s.id);
        specs.push(makeSpec(`n${i}`, deps, { priority: Math.floor(random() * 3) }));
      }
      const depsOf = new Map(specs.map((s) => [s.id, s.dependencies]));

      const local = memoryStore();
      const localRegistry = new WorkerRegistry();
      const localDispatcher = new Dispatcher(local, localRegistry, { heartbeatCheckMs: 10 });
      const localScheduler = new Scheduler(local, localDispatcher, new Reflexion(local, new InMemoryErrorMemory()));
      const violations: string[] = [];
      let sessionId = "";
      localRegistry.add(
        makeWorker("coder", async (input) => {
          for (const dep of depsOf.get(input.taskId) ?? []) {
            if (local.get(sessionId, dep).status !== "completed") violations.push(`${input.taskId} before ${dep}`);
          }
          await sleep(Math.floor(random() * 4));
          return {};
        }),
      );
      sessionId = createSession(local, specs, { concurrencyLimit: 3 }).id;

      const result = await localScheduler.run(sessionId, POLL);

      expect(violations).toEqual([]);
      expect(result).toMatchObject({ state: "completed", dispatches: 15 });
      local.close();
    }
  });

  it("keeps scheduling when callbacks throw", async () => {
    let calls = 0;
    registry.add(
      makeWorker("coder", async (_input, ctx) => {
        calls++;
        ctx.heartbeat(50);
        if (calls === 1) throw new Error("first try fails");
        return {};
      }),
    );
    const session = createSession(store, [makeSpec("a", [], { maxRetries: 1 })]);
    const explode = (): void => {
      throw new Error("callback failed");
    };

    const result = await scheduler.run(session.id, {
      ...POLL,
      callbacks: { onTaskStart: explode, onTaskEnd: explode, onHeartbeat: explode, onRetry: explode },
    });

    expect(result).toMatchObject({ state: "completed", dispatches: 2 });
    expect(calls).toBe(2);
    expect(store.get(session.id, "a").status).toBe("completed");
  });

  it("rejects a concurrency limit below one before touching the session", async () => {
    registry.add(makeWorker("coder", async () => ({})));
    const session = createSession(store, [makeSpec("a")]);

    await expect(scheduler.run(session.id, { ...POLL, concurrencyLimit: 0 })).rejects.toThrow(ValidationError);
    expect(store.getSession(session.id).state).toBe("pending");
    expect(store.get(session.id, "a").status).toBe("pending");
  });

  it("completes a session with no subtasks", async () => {
    const session = createSession(store, []);

    expect(await scheduler.run(session.id, POLL)).toMatchObject({ state: "completed", dispatches: 0 });
    expect(store.getSession(session.id).executionOrder).toEqual([]);
  });

  it("retries a worker that stops heartbeating and dispatches it again", async () => {
    const attempts: number[] = [];
    registry.add(
      makeWorker("coder", async (_input, ctx) => {
        attempts.push(ctx.attempt);
        if (ctx.attempt === 1) await new Promise<never>(() => undefined);
        return { summary: "second try" };
      }),
    );
    const session = createSession(store, [makeSpec("a", [], { timeoutMs: 50, maxRetries: 1 })]);

    const result = await scheduler.run(session.id, POLL);

    expect(result).toMatchObject({ state: "completed", dispatches: 2 });
    expect(attempts).toEqual([1, 2]);
    expect(store.transitions(session.id, "a").map((t) => `${t.from}->${t.to} ${t.reason}`)).toEqual([
      "pending->ready dependencies_completed",
      "ready->running dispatched",
      "running->failed timeout",
      "failed->retrying retry",
      "retrying->ready retry_scheduled",
      "ready->running dispatched",
      "running->completed worker_completed",
    ]);
    expect(store.get(session.id, "a")).toMatchObject({ status: "completed", attemptCount: 1 });
  });
});
