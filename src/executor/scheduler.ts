import { getConfig } from "../config.js";
import { ConflictError, UnschedulableGraphError, errorMessage } from "../errors.js";
import type { TaskStore } from "../persistence/task-store.js";
import { downstreamOf, isSettled, promotable, readySet } from "../planner/task-graph.js";
import type { SessionState, Subtask, SubtaskRef } from "../planner/types.js";
import type { Reflexion } from "../reflexion/reflexion.js";
import { ConcurrencyLimitSchema, parseOrThrow } from "../schemas.js";
import { invokeCallback } from "../utils/callbacks.js";
import { createLogger } from "../utils/logger.js";
import type { Dispatcher } from "./dispatcher.js";
import type { DispatchHandle, DispatchOutcome, ScheduleOptions, ScheduleResult, TaskCallbacks } from "./types.js";

const log = createLogger("scheduler");

const FINAL_STATES: readonly SessionState[] = ["completed", "partial", "failed", "cancelled"];

/** Final session state for a fully settled graph. */
export function settledState(subtasks: readonly Subtask[]): SessionState {
  const completed = subtasks.filter((t) => t.status === "completed").length;
  if (completed === subtasks.length) return "completed";
  return completed > 0 ? "partial" : "failed";
}

/**
 * One scheduling decision-maker per session. Each pass reconciles the
 * in-flight view against the store, routes failures through reflexion,
 * promotes what became ready and dispatches up to the concurrency limit.
 * Passes run after every dispatch outcome and on a poll tick.
 */
export class Scheduler {
  private store: TaskStore;
  private dispatcher: Dispatcher;
  private reflexion: Reflexion;

  constructor(store: TaskStore, dispatcher: Dispatcher, reflexion: Reflexion) {
    this.store = store;
    this.dispatcher = dispatcher;
    this.reflexion = reflexion;
  }

  async run(sessionId: string, opts?: ScheduleOptions): Promise<ScheduleResult> {
    const start = Date.now();
    const cfg = getConfig();
    const pollIntervalMs = opts?.pollIntervalMs ?? cfg.scheduling.pollIntervalMs;
    const abortDownstream = opts?.abortDownstream ?? cfg.scheduling.abortDownstream;
    const callbacks: TaskCallbacks = opts?.callbacks ?? {};

    let session = this.store.getSession(sessionId);
    if (FINAL_STATES.includes(session.state)) {
      log.info(`Session ${sessionId} already ${session.state}`);
      return { sessionId, state: session.state, dispatches: 0, durationMs: 0 };
    }
    const limit = parseOrThrow(
      ConcurrencyLimitSchema,
      opts?.concurrencyLimit ?? session.concurrencyLimit,
      "concurrency limit",
    );
    if (session.state === "pending") session = this.store.setSessionState(sessionId, "running");

    const inflight = new Map<string, DispatchHandle>();
    const settled: DispatchOutcome[] = [];
    let dispatches = 0;
    let wake: () => void = () => undefined;
    const onAbort = (): void => wake();
    opts?.signal?.addEventListener("abort", onAbort, { once: true });

    log.info(`Scheduling session ${sessionId}`, { limit });

    try {
      for (;;) {
        // Outcomes that arrived since the last pass
        for (const outcome of settled.splice(0)) {
          const id = outcome.kind === "lost" ? outcome.ref.id : outcome.subtask.id;
          inflight.delete(id);
          if (outcome.kind === "completed") await this.reflexion.recordSuccess(outcome.subtask);
        }

        session = this.store.getSession(sessionId);
        if (opts?.signal?.aborted || session.state === "cancelling" || session.state === "cancelled") {
          await this.cancel(sessionId, opts?.cancelGraceMs);
          return { sessionId, state: "cancelled", dispatches, durationMs: Date.now() - start };
        }

        this.reconcile(sessionId, inflight);
        await this.handleFailures(sessionId, callbacks);
        this.promote(sessionId, abortDownstream);

        const tasks = this.store.list(sessionId);
        const running = tasks.filter((t) => t.status === "running").length;
        for (const task of readySet(tasks).slice(0, Math.max(0, limit - running))) {
          let handle: DispatchHandle;
          try {
            handle = this.dispatcher.dispatch(task, callbacks);
          } catch (err) {
            if (err instanceof ConflictError) {
              log.debug(`Skipped dispatch of ${task.id}: ${err.message}`);
              continue;
            }
            throw err;
          }
          dispatches++;
          inflight.set(task.id, handle);
          const ref = handle.ref;
          void handle.done.then(
            (outcome) => {
              settled.push(outcome);
              wake();
            },
            (err: unknown) => {
              log.error(`${ref.id}: dispatch ended abnormally`, { session: sessionId, error: errorMessage(err) });
              settled.push({ kind: "lost", ref, error: errorMessage(err) });
              wake();
            },
          );
        }

        if (inflight.size === 0 && settled.length === 0) {
          const after = this.store.list(sessionId);
          if (isSettled(after)) {
            const state = settledState(after);
            this.store.setSessionState(sessionId, state);
            log.info(`Session ${sessionId} ${state}`, { dispatches, ms: Date.now() - start });
            return { sessionId, state, dispatches, durationMs: Date.now() - start };
          }
          if (after.some((t) => t.status === "ready" || t.status === "failed" || t.status === "retrying")) {
            // Next pass after pending I/O
            await new Promise<void>((resolve) => setImmediate(resolve));
            continue;
          }
          this.stall(sessionId, after);
        }

        if (settled.length > 0) continue;
        await new Promise<void>((resolve) => {
          const timer = setTimeout(done, pollIntervalMs);
          function done(): void {
            clearTimeout(timer);
            resolve();
          }
          wake = done;
        });
        wake = () => undefined;
      }
    } finally {
      opts?.signal?.removeEventListener("abort", onAbort);
    }
  }

  /** Store says running, but nothing here is executing it: the worker was lost. */
  private reconcile(sessionId: string, inflight: ReadonlyMap<string, DispatchHandle>): void {
    for (const task of this.store.listByStatus(sessionId, "running")) {
      if (inflight.has(task.id)) continue;
      const ref: SubtaskRef = { sessionId, id: task.id };
      try {
        this.store.markStatus(ref, "failed", "worker_lost", {
          expect: "running",
          failureReason: "worker_lost",
          errorMessage: "No live worker for running subtask",
        });
        log.warn(`${task.id}: worker lost, handing to reflexion`, { session: sessionId });
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;
      }
    }
  }

  private async handleFailures(sessionId: string, callbacks: TaskCallbacks): Promise<void> {
    for (const task of this.store.listByStatus(sessionId, "failed")) {
      try {
        const { decision, subtask } = await this.reflexion.handleFailure(task);
        if (decision.action === "retry") invokeCallback("onRetry", callbacks.onRetry, subtask, decision);
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;
        log.debug(`Reflexion skipped ${task.id}: ${err.message}`);
      }
    }
  }

  private promote(sessionId: string, abortDownstream: boolean): void {
    for (const task of this.store.listByStatus(sessionId, "retrying")) {
      this.tryMark({ sessionId, id: task.id }, "ready", "retry_scheduled", "retrying");
    }
    for (const task of promotable(this.store.list(sessionId))) {
      this.tryMark({ sessionId, id: task.id }, "ready", "dependencies_completed", "pending");
    }
    if (!abortDownstream) return;

    const tasks = this.store.list(sessionId);
    const pending = new Set(tasks.filter((t) => t.status === "pending").map((t) => t.id));
    for (const aborted of tasks.filter((t) => t.status === "aborted")) {
      for (const id of downstreamOf(tasks, aborted.id)) {
        if (!pending.delete(id)) continue;
        if (this.tryMark({ sessionId, id }, "aborted", "dependency_aborted", "pending")) {
          log.info(`${id}: aborted, upstream ${aborted.id} was aborted`, { session: sessionId });
        }
      }
    }
  }

  /** Nothing ready, nothing running, something pending: the graph cannot finish. */
  private stall(sessionId: string, tasks: readonly Subtask[]): never {
    const stalled = tasks.filter((t) => t.status === "pending").map((t) => t.id);
    const error = new UnschedulableGraphError(sessionId, stalled);
    this.store.abortWhere(sessionId, ["pending"], "unschedulable");
    this.store.setSessionState(sessionId, "failed", error.message);
    log.error(error.message);
    throw error;
  }

  private async cancel(sessionId: string, graceMs?: number): Promise<void> {
    log.info(`Cancelling session ${sessionId}`);
    this.store.abortWhere(sessionId, ["pending", "ready", "failed", "retrying"], "cancelled");
    await this.dispatcher.cancel(sessionId, graceMs);
    // Running rows with no handle here belong to nobody
    this.store.abortWhere(sessionId, ["running"], "cancelled");
    this.store.setSessionState(sessionId, "cancelled");
  }

  private tryMark(ref: SubtaskRef, next: Subtask["status"], reason: string, expect: Subtask["status"]): boolean {
    try {
      this.store.markStatus(ref, next, reason, { expect });
      return true;
    } catch (err) {
      if (!(err instanceof ConflictError)) throw err;
      log.debug(`${ref.id}: ${errorMessage(err)}`);
      return false;
    }
  }
}
