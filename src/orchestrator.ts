import type { WorkerAdapter } from "./agents/adapter.js";
import { WorkerRegistry } from "./agents/registry.js";
import { aggregate, progressOf, type AggregateResult, type Progress } from "./aggregator/aggregator.js";
import { validateResult, type ValidationReport } from "./aggregator/validate.js";
import { getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { Dispatcher } from "./executor/dispatcher.js";
import { Scheduler } from "./executor/scheduler.js";
import type { TaskCallbacks } from "./executor/types.js";
import { readQueueFile } from "./persistence/queue-file.js";
import { TaskStore } from "./persistence/task-store.js";
import { Decomposer } from "./planner/decomposer.js";
import type {
  Complexity,
  DagSkeleton,
  FailureReason,
  Session,
  SessionState,
  SubtaskStatus,
  WorkerRole,
} from "./planner/types.js";
import { SqliteErrorMemory, seedRemedies, type ErrorMemory } from "./reflexion/memory.js";
import { Reflexion } from "./reflexion/reflexion.js";
import { StartRequestSchema, parseOrThrow } from "./schemas.js";
import { invokeCallback } from "./utils/callbacks.js";
import { log } from "./utils/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OrchestratorCallbacks = TaskCallbacks & {
  onSessionStart?: (session: Session) => void;
  onFinish?: (report: SessionReport) => void;
  onError?: (sessionId: string, error: Error) => void;
};

export type OrchestratorOptions = {
  /** Share an existing store. Otherwise one is opened from `dbPath`/`queueDir` or config. */
  store?: TaskStore;
  dbPath?: string;
  queueDir?: string | null;
  /** Error memory for reflexion. Defaults to a seeded SQLite memory beside the store. */
  memory?: ErrorMemory;
  decomposer?: Decomposer;
  heartbeatCheckMs?: number;
  cancelGraceMs?: number;
  pollIntervalMs?: number;
  abortDownstream?: boolean;
  callbacks?: OrchestratorCallbacks;
};

export type StartOptions = {
  taskType?: string;
  concurrencyLimit?: number;
  complexity?: Complexity;
  maxRetries?: number;
  timeoutMs?: number;
};

export type TaskState = {
  id: string;
  role: WorkerRole;
  status: SubtaskStatus;
  attemptCount: number;
  progress: number;
  failureReason?: FailureReason;
};

export type SessionStatus = {
  sessionId: string;
  state: SessionState;
  tasks: TaskState[];
  progress: Progress;
};

export type SessionReport = AggregateResult & {
  state: SessionState;
  /** False while the session is still running; the report is then a partial snapshot. */
  final: boolean;
  error?: string;
  validation: ValidationReport;
};

const FINAL_STATES: readonly SessionState[] = ["completed", "partial", "failed", "cancelled"];

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Control surface: decompose a goal, persist it, drive the schedule in the
 * background and report the aggregated result.
 */
export class Orchestrator {
  readonly store: TaskStore;
  readonly workers = new WorkerRegistry();
  readonly decomposer: Decomposer;
  readonly memory: ErrorMemory;

  private dispatcher: Dispatcher;
  private scheduler: Scheduler;
  private ownsStore: boolean;
  private ready: Promise<void>;
  private callbacks: OrchestratorCallbacks;
  private pollIntervalMs?: number;
  private abortDownstream?: boolean;
  private cancelGraceMs?: number;
  private active = new Map<string, { controller: AbortController; done: Promise<SessionReport> }>();

  constructor(opts?: OrchestratorOptions) {
    this.ownsStore = !opts?.store;
    this.store = opts?.store ?? new TaskStore({ dbPath: opts?.dbPath, queueDir: opts?.queueDir });
    this.decomposer = opts?.decomposer ?? new Decomposer();
    this.callbacks = opts?.callbacks ?? {};
    this.pollIntervalMs = opts?.pollIntervalMs;
    this.abortDownstream = opts?.abortDownstream;
    this.cancelGraceMs = opts?.cancelGraceMs;

    if (opts?.memory) {
      this.memory = opts.memory;
      this.ready = Promise.resolve();
    } else {
      const memory = new SqliteErrorMemory(this.store.database);
      this.memory = memory;
      this.ready = seedRemedies(memory).then(() => undefined);
    }

    this.dispatcher = new Dispatcher(this.store, this.workers, {
      heartbeatCheckMs: opts?.heartbeatCheckMs,
      cancelGraceMs: opts?.cancelGraceMs,
    });
    this.scheduler = new Scheduler(this.store, this.dispatcher, new Reflexion(this.store, this.memory));
  }

  addWorker(worker: WorkerAdapter): void {
    this.workers.add(worker);
  }

  /** Decompose without persisting anything. */
  plan(goal: string, opts?: StartOptions): DagSkeleton {
    const req = parseOrThrow(StartRequestSchema, { goal, ...opts }, "start request");
    return this.decomposer.decompose(req.goal, req.taskType, {
      complexity: req.complexity,
      maxRetries: opts?.maxRetries,
      timeoutMs: opts?.timeoutMs,
    });
  }

  /** Decompose, persist and start scheduling in the background. Returns the session id. */
  start(goal: string, opts?: StartOptions): string {
    return this.startPlan(this.plan(goal, opts), opts);
  }

  /** Persist a ready-made skeleton and start scheduling it. */
  startPlan(skeleton: DagSkeleton, opts?: StartOptions): string {
    this.decomposer.validate(skeleton);
    const session = this.store.create(
      {
        goal: skeleton.goal,
        taskType: skeleton.taskType,
        complexity: skeleton.complexity,
        concurrencyLimit: opts?.concurrencyLimit ?? getConfig().limits.concurrencyLimit,
      },
      skeleton.subtasks,
    );
    log.info(`Session ${session.id} started`, { taskType: session.taskType, subtasks: skeleton.subtasks.length });
    invokeCallback("onSessionStart", this.callbacks.onSessionStart, session);
    this.launch(session.id);
    return session.id;
  }

  /** Start and wait for the final report. */
  async run(goal: string, opts?: StartOptions): Promise<SessionReport> {
    return this.wait(this.start(goal, opts));
  }

  /** Resolves with the report once the session stops running in this process. */
  async wait(sessionId: string): Promise<SessionReport> {
    const active = this.active.get(sessionId);
    return active ? active.done : this.result(sessionId);
  }

  /**
   * Pick up a persisted session, e.g. after a restart. Subtasks left
   * `running` by a dead process are reconciled as lost workers.
   */
  resume(sessionId: string): string {
    if (this.active.has(sessionId)) return sessionId;
    const session = this.store.getSession(sessionId);
    if (FINAL_STATES.includes(session.state)) {
      log.info(`Session ${sessionId} already ${session.state}, nothing to resume`);
      return sessionId;
    }
    log.info(`Resuming session ${sessionId}`);
    this.launch(sessionId);
    return sessionId;
  }

  /** Load a queue file into the store when the session is unknown, then resume it. */
  resumeFromQueueFile(path: string): string {
    const queue = readQueueFile(path);
    if (!this.store.findSession(queue.session.id)) {
      this.store.importSnapshot(queue);
    }
    return this.resume(queue.session.id);
  }

  /**
   * Cancel a session. When it runs in this process its scheduler winds it
   * down; otherwise the store is updated directly and the owning process
   * notices on its next poll. Returns false if it had already finished.
   */
  async cancel(sessionId: string): Promise<boolean> {
    const requested = this.store.requestCancel(sessionId);
    const active = this.active.get(sessionId);
    if (active) {
      active.controller.abort();
      await active.done;
      return requested;
    }
    if (!requested) return false;
    this.store.abortWhere(sessionId, ["pending", "ready", "running", "failed", "retrying"], "cancelled");
    this.store.setSessionState(sessionId, "cancelled");
    log.info(`Session ${sessionId} cancelled through the store`);
    return true;
  }

  status(sessionId: string): SessionStatus {
    const session = this.store.getSession(sessionId);
    const subtasks = this.store.list(sessionId);
    return {
      sessionId,
      state: session.state,
      tasks: subtasks.map((t) => ({
        id: t.id,
        role: t.role,
        status: t.status,
        attemptCount: t.attemptCount,
        progress: t.progress,
        failureReason: t.failureReason,
      })),
      progress: progressOf(subtasks),
    };
  }

  /** Final report, or a partial snapshot while the session is still running. */
  result(sessionId: string): SessionReport {
    const session = this.store.getSession(sessionId);
    const subtasks = this.store.list(sessionId);
    const aggregated = aggregate(session, subtasks);
    return {
      ...aggregated,
      state: session.state,
      final: FINAL_STATES.includes(session.state),
      error: session.error,
      validation: validateResult(aggregated, subtasks),
    };
  }

  sessions(limit?: number): Session[] {
    return this.store.listSessions(limit);
  }

  /** Cancel everything running here and release the store if this instance opened it. */
  async shutdown(): Promise<void> {
    await this.ready;
    const running = [...this.active.values()];
    for (const { controller } of running) controller.abort();
    await Promise.all(running.map((a) => a.done));
    await this.dispatcher.shutdown();
    if (this.ownsStore) this.store.close();
  }

  private launch(sessionId: string): void {
    const controller = new AbortController();
    const done = this.drive(sessionId, controller.signal);
    this.active.set(sessionId, { controller, done });
    const forget = (): void => {
      this.active.delete(sessionId);
    };
    void done.then(forget, (err: unknown) => {
      forget();
      log.error(`Session ${sessionId} could not report`, { error: errorMessage(err) });
    });
  }

  private async drive(sessionId: string, signal: AbortSignal): Promise<SessionReport> {
    try {
      await this.ready;
      await this.scheduler.run(sessionId, {
        signal,
        pollIntervalMs: this.pollIntervalMs,
        abortDownstream: this.abortDownstream,
        cancelGraceMs: this.cancelGraceMs,
        callbacks: this.callbacks,
      });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.error(`Session ${sessionId} failed`, { error: errorMessage(err) });
      const session = this.store.findSession(sessionId);
      if (session && !FINAL_STATES.includes(session.state)) {
        this.store.setSessionState(sessionId, "failed", error.message);
      }
      invokeCallback("onError", this.callbacks.onError, sessionId, error);
    }

    const report = this.result(sessionId);
    invokeCallback("onFinish", this.callbacks.onFinish, report);
    return report;
  }
}
