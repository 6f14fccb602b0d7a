import type { WorkerAdapter, WorkerContext, WorkerInput, WorkerOutput } from "../agents/adapter.js";
import type { WorkerRegistry } from "../agents/registry.js";
import { outputSchemaFor } from "../agents/roles.js";
import { getConfig } from "../config.js";
import { ConflictError, WorkerError, WorkerTimeoutError, errorMessage } from "../errors.js";
import type { TaskStore } from "../persistence/task-store.js";
import type { FailureReason, Subtask, SubtaskRef } from "../planner/types.js";
import { invokeCallback } from "../utils/callbacks.js";
import { createLogger } from "../utils/logger.js";
import type { DispatchHandle, DispatchOutcome, TaskCallbacks } from "./types.js";

const log = createLogger("dispatcher");

export type DispatcherOptions = {
  heartbeatCheckMs?: number;
  cancelGraceMs?: number;
  callbacks?: TaskCallbacks;
};

type Interrupt = { type: "timeout" } | { type: "cancel"; graceMs: number };

type Execution =
  | { type: "output"; output: WorkerOutput }
  | { type: "error"; error: WorkerError };

type ActiveHandle = DispatchHandle & {
  timeoutMs: number;
  controller: AbortController;
  interrupt: (reason: Interrupt) => void;
  interrupted: Promise<Interrupt>;
  released: boolean;
};

function keyOf(ref: SubtaskRef): string {
  return `${ref.sessionId}/${ref.id}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Binds ready subtasks to the worker registered for their role and follows
 * each one until it leaves `running`. Every dispatch gets its own input copy,
 * abort signal and context object.
 */
export class Dispatcher {
  private store: TaskStore;
  private registry: WorkerRegistry;
  private handles = new Map<string, ActiveHandle>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private heartbeatCheckMs: number;
  private cancelGraceMs: number;
  private callbacks: TaskCallbacks;

  constructor(store: TaskStore, registry: WorkerRegistry, opts?: DispatcherOptions) {
    const cfg = getConfig().timeouts;
    this.store = store;
    this.registry = registry;
    this.heartbeatCheckMs = opts?.heartbeatCheckMs ?? cfg.heartbeatCheck;
    this.cancelGraceMs = opts?.cancelGraceMs ?? cfg.cancelGrace;
    this.callbacks = opts?.callbacks ?? {};
  }

  /**
   * Move a ready subtask to running and start its worker. Throws
   * ConflictError when the subtask is no longer ready.
   */
  dispatch(subtask: Subtask, callbacks?: TaskCallbacks): DispatchHandle {
    const ref: SubtaskRef = { sessionId: subtask.sessionId, id: subtask.id };
    const hooks = { ...this.callbacks, ...callbacks };
    const running = this.store.markStatus(ref, "running", "dispatched", { expect: "ready" });
    const attempt = running.attemptCount + 1;
    invokeCallback("onTaskStart", hooks.onTaskStart, running, attempt);

    const worker = this.registry.get(running.role);
    const controller = new AbortController();
    let interrupt: (reason: Interrupt) => void = () => undefined;
    const interrupted = new Promise<Interrupt>((resolve) => {
      interrupt = resolve;
    });
    const now = Date.now();

    const handle: ActiveHandle = {
      ref,
      role: running.role,
      worker: worker?.name ?? "",
      attempt,
      startedAt: now,
      lastHeartbeat: now,
      progress: 0,
      signal: controller.signal,
      timeoutMs: running.timeoutMs,
      controller,
      interrupt,
      interrupted,
      released: false,
      done: Promise.resolve<DispatchOutcome>({ kind: "lost", ref, error: "not started" }),
    };

    if (!worker) {
      const message = `No worker registered for role "${running.role}"`;
      log.warn(`${ref.id}: ${message}`);
      handle.released = true;
      handle.done = Promise.resolve(this.fail(handle, "no_worker", message)).then((outcome) => {
        invokeCallback("onTaskEnd", hooks.onTaskEnd, outcome);
        return outcome;
      });
      return handle;
    }

    const ctx: WorkerContext = {
      signal: controller.signal,
      attempt,
      heartbeat: (progress) => this.recordHeartbeat(handle, progress, hooks),
    };
    const input: WorkerInput = {
      taskId: running.id,
      description: running.description,
      role: running.role,
      inputData: structuredClone(running.inputPayload),
    };

    this.handles.set(keyOf(ref), handle);
    this.ensureSweep();
    log.info(`Dispatched ${ref.id} to ${worker.name}`, { session: ref.sessionId, attempt });

    handle.done = this.supervise(handle, worker, input, ctx).then((outcome) => {
      invokeCallback("onTaskEnd", hooks.onTaskEnd, outcome);
      return outcome;
    });
    return handle;
  }

  /** In-flight handles, optionally for one session. */
  active(sessionId?: string): DispatchHandle[] {
    const all = [...this.handles.values()];
    return sessionId === undefined ? all : all.filter((h) => h.ref.sessionId === sessionId);
  }

  has(ref: SubtaskRef): boolean {
    return this.handles.has(keyOf(ref));
  }

  /**
   * Signal every active worker of the session, give each up to `graceMs` to
   * stop, then reclaim it. Running subtasks end `aborted` with reason
   * `cancelled`. Resolves with their ids once all have settled.
   */
  async cancel(sessionId: string, graceMs = this.cancelGraceMs): Promise<string[]> {
    const targets = this.active(sessionId);
    for (const handle of targets) {
      const active = this.handles.get(keyOf(handle.ref));
      if (!active) continue;
      active.controller.abort();
      active.interrupt({ type: "cancel", graceMs });
    }
    const outcomes = await Promise.all(targets.map((h) => h.done));
    return outcomes.flatMap((o) => (o.kind === "aborted" ? [o.subtask.id] : []));
  }

  /** Cancel everything in flight and stop the heartbeat sweep. */
  async shutdown(graceMs = this.cancelGraceMs): Promise<void> {
    const sessions = new Set(this.active().map((h) => h.ref.sessionId));
    await Promise.all([...sessions].map((id) => this.cancel(id, graceMs)));
    this.stopSweep();
  }

  private async supervise(
    handle: ActiveHandle,
    worker: WorkerAdapter,
    input: WorkerInput,
    ctx: WorkerContext,
  ): Promise<DispatchOutcome> {
    const execution: Promise<Execution> = worker.execute(input, ctx).then(
      (output): Execution => ({ type: "output", output }),
      (err: unknown): Execution => ({ type: "error", error: new WorkerError(input.taskId, errorMessage(err), err) }),
    );

    const first = await Promise.race([execution, handle.interrupted]);

    if (first.type === "cancel") {
      // Cooperative stop: wait for the worker up to the grace period, then reclaim
      await Promise.race([execution, sleep(first.graceMs)]);
    }
    this.release(handle);

    try {
      return this.settle(handle, first);
    } catch (err) {
      log.error(`${handle.ref.id}: could not record outcome`, { error: errorMessage(err) });
      return { kind: "lost", ref: handle.ref, error: errorMessage(err) };
    }
  }

  private settle(handle: ActiveHandle, event: Execution | Interrupt): DispatchOutcome {
    const { ref } = handle;
    switch (event.type) {
      case "timeout":
        return this.fail(handle, "timeout", new WorkerTimeoutError(ref.id, handle.timeoutMs).message);
      case "cancel":
        return this.abort(handle);
      case "error":
        return this.fail(handle, "worker_error", event.error.message);
      case "output": {
        const { output } = event;
        if (output.status === "failed") {
          return this.fail(handle, "worker_error", output.errorMessage ?? "Worker reported failure");
        }
        const parsed = outputSchemaFor(handle.role).safeParse(output.outputData);
        if (!parsed.success) {
          const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "output"}: ${i.message}`).join("; ");
          return this.fail(handle, "invalid_output", `Output violates the ${handle.role} contract: ${issues}`);
        }
        try {
          const subtask = this.store.markStatus(ref, "completed", "worker_completed", {
            expect: "running",
            outputPayload: output.outputData,
          });
          log.info(`${ref.id} completed`, { session: ref.sessionId, ms: Date.now() - handle.startedAt });
          return { kind: "completed", subtask };
        } catch (err) {
          if (err instanceof ConflictError) return this.superseded(handle);
          throw err;
        }
      }
    }
  }

  private fail(handle: ActiveHandle, reason: FailureReason, message: string): DispatchOutcome {
    try {
      const subtask = this.store.markStatus(handle.ref, "failed", reason, {
        expect: "running",
        failureReason: reason,
        errorMessage: message,
      });
      log.warn(`${handle.ref.id} failed (${reason})`, { session: handle.ref.sessionId, error: message });
      return { kind: "failed", subtask, reason, error: message };
    } catch (err) {
      if (err instanceof ConflictError) return this.superseded(handle);
      throw err;
    }
  }

  private abort(handle: ActiveHandle): DispatchOutcome {
    try {
      const subtask = this.store.markStatus(handle.ref, "aborted", "cancelled", { expect: "running" });
      log.info(`${handle.ref.id} aborted`, { session: handle.ref.sessionId });
      return { kind: "aborted", subtask };
    } catch (err) {
      if (err instanceof ConflictError) return this.superseded(handle);
      throw err;
    }
  }

  /** Someone else moved the subtask out of `running` first; report what the store now holds. */
  private superseded(handle: ActiveHandle): DispatchOutcome {
    const subtask = this.store.get(handle.ref.sessionId, handle.ref.id);
    log.debug(`${handle.ref.id}: late result ignored, subtask is ${subtask.status}`);
    switch (subtask.status) {
      case "completed":
        return { kind: "completed", subtask };
      case "aborted":
        return { kind: "aborted", subtask };
      case "failed":
        return {
          kind: "failed",
          subtask,
          reason: subtask.failureReason ?? "worker_error",
          error: subtask.errorMessage ?? "",
        };
      default:
        return { kind: "lost", ref: handle.ref, error: `subtask is ${subtask.status}` };
    }
  }

  private recordHeartbeat(handle: ActiveHandle, progress: number, hooks: TaskCallbacks): void {
    if (handle.released) return;
    handle.lastHeartbeat = Date.now();
    handle.progress = Math.max(0, Math.min(100, progress));
    this.store.heartbeat(handle.ref, handle.progress);
    invokeCallback("onHeartbeat", hooks.onHeartbeat, handle.ref, handle.progress);
  }

  private release(handle: ActiveHandle): void {
    handle.released = true;
    this.handles.delete(keyOf(handle.ref));
    if (this.handles.size === 0) this.stopSweep();
  }

  /** Fail every handle that has been silent longer than its subtask's timeout. */
  private sweep(): void {
    const now = Date.now();
    for (const handle of this.handles.values()) {
      if (now - handle.lastHeartbeat <= handle.timeoutMs) continue;
      log.warn(`${handle.ref.id}: no heartbeat for ${now - handle.lastHeartbeat}ms`, {
        session: handle.ref.sessionId,
      });
      handle.controller.abort(new WorkerTimeoutError(handle.ref.id, handle.timeoutMs));
      handle.interrupt({ type: "timeout" });
    }
  }

  private ensureSweep(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.heartbeatCheckMs);
    this.sweepTimer.unref();
  }

  private stopSweep(): void {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }
}
