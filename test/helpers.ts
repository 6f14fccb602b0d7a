import type { WorkerContext, WorkerInput } from "../src/agents/adapter.js";
import { FunctionAdapter, type WorkerFunction } from "../src/agents/function-adapter.js";
import { TaskStore, type NewSession, type TaskStoreOptions } from "../src/persistence/task-store.js";
import type { Payload, Session, Subtask, SubtaskSpec, WorkerRole } from "../src/planner/types.js";

export const makeSpec = (
  id: string,
  dependencies: string[] = [],
  overrides: Partial<SubtaskSpec> = {},
): SubtaskSpec => ({
  id,
  description: `do ${id}`,
  role: "coder",
  dependencies,
  priority: 0,
  ...overrides,
});

export const makeSubtask = (id: string, dependencies: string[] = [], overrides: Partial<Subtask> = {}): Subtask => ({
  id,
  sessionId: "s1",
  seq: 0,
  description: `do ${id}`,
  role: "coder",
  dependencies,
  status: "pending",
  priority: 0,
  attemptCount: 0,
  maxRetries: 2,
  inputPayload: {},
  timeoutMs: 1_000,
  progress: 0,
  createdAt: 0,
  ...overrides,
});

export const memoryStore = (opts: TaskStoreOptions = {}): TaskStore =>
  new TaskStore({ dbPath: ":memory:", queueDir: null, ...opts });

export const createSession = (
  store: TaskStore,
  specs: SubtaskSpec[],
  overrides: Partial<NewSession> = {},
): Session =>
  store.create(
    { goal: "test goal", taskType: "development", complexity: "medium", concurrencyLimit: 2, ...overrides },
    specs,
  );

export const makeWorker = (role: WorkerRole, fn: WorkerFunction): FunctionAdapter =>
  new FunctionAdapter({ name: `${role}-fn`, role, fn });

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Resolve when `signal` aborts. */
export const aborted = (signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });

export type WorkerCall = { input: WorkerInput; ctx: WorkerContext };

/** Records every call, then answers with `output`. */
export const recordingFn = (calls: WorkerCall[], output: Payload = {}): WorkerFunction =>
  async (input, ctx) => {
    calls.push({ input, ctx });
    return output;
  };
