import Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import { ConflictError, errorMessage, NotFoundError } from "../errors.js";
import { executionLayers, validate } from "../planner/task-graph.js";
import {
  FAILURE_REASONS,
  type Complexity,
  type FailureReason,
  type Payload,
  type Session,
  type SessionState,
  type Subtask,
  type SubtaskRef,
  type SubtaskSpec,
  type SubtaskStatus,
} from "../planner/types.js";
import { ConcurrencyLimitSchema, PayloadSchema, parseOrThrow, type QueueFile } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { buildQueueFile, queueFilePath, writeQueueFile } from "./queue-file.js";
import { assertTransition } from "./state-machine.js";

const log = createLogger("store");

export type TaskStoreOptions = {
  /** SQLite file, or ":memory:". Defaults to the configured path. */
  dbPath?: string;
  /** Directory for per-session queue files. Null disables them. */
  queueDir?: string | null;
};

export type NewSession = {
  goal: string;
  taskType: string;
  complexity: Complexity;
  concurrencyLimit: number;
  id?: string;
  mainTaskId?: string;
};

export type StatusPatch = {
  /** Compare-and-set: fail with ConflictError unless the subtask is currently in this status. */
  expect?: SubtaskStatus;
  inputPayload?: Payload;
  outputPayload?: Payload;
  failureReason?: FailureReason;
  errorMessage?: string;
};

export type Transition = {
  sessionId: string;
  taskId: string;
  from: SubtaskStatus;
  to: SubtaskStatus;
  reason: string;
  at: number;
};

const FINAL_SESSION_STATES: readonly SessionState[] = ["completed", "partial", "failed", "cancelled"];

function isFailureReason(reason: string): reason is FailureReason {
  return (FAILURE_REASONS as readonly string[]).includes(reason);
}

/**
 * Durable home of sessions, subtasks and their status history. Every status
 * change is a compare-and-set against the status the caller observed, so two
 * writers can never both apply a transition from the same state.
 */
export class TaskStore {
  private db: Database.Database;
  private queueDir: string | null;

  constructor(opts?: TaskStoreOptions) {
    const cfg = getConfig().persistence;
    const path = opts?.dbPath ?? cfg.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.queueDir = opts?.queueDir === undefined ? cfg.queueDir : opts.queueDir;
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id                TEXT PRIMARY KEY,
        main_task_id      TEXT NOT NULL,
        goal              TEXT NOT NULL,
        task_type         TEXT NOT NULL,
        complexity        TEXT NOT NULL,
        state             TEXT NOT NULL DEFAULT 'pending',
        concurrency_limit INTEGER NOT NULL,
        execution_order   TEXT NOT NULL DEFAULT '[]',
        error             TEXT,
        created_at        INTEGER NOT NULL,
        updated_at        INTEGER NOT NULL,
        finished_at       INTEGER
      );
      CREATE TABLE IF NOT EXISTS subtasks (
        session_id     TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        id             TEXT NOT NULL,
        seq            INTEGER NOT NULL,
        description    TEXT NOT NULL,
        role           TEXT NOT NULL,
        dependencies   TEXT NOT NULL DEFAULT '[]',
        status         TEXT NOT NULL DEFAULT 'pending',
        priority       INTEGER NOT NULL DEFAULT 0,
        attempt_count  INTEGER NOT NULL DEFAULT 0,
        max_retries    INTEGER NOT NULL,
        input_payload  TEXT NOT NULL DEFAULT '{}',
        output_payload TEXT,
        timeout_ms     INTEGER NOT NULL,
        failure_reason TEXT,
        error_message  TEXT,
        progress       REAL NOT NULL DEFAULT 0,
        created_at     INTEGER NOT NULL,
        started_at     INTEGER,
        completed_at   INTEGER,
        heartbeat_at   INTEGER,
        PRIMARY KEY (session_id, id)
      );
      CREATE INDEX IF NOT EXISTS idx_subtasks_status ON subtasks(session_id, status);
      CREATE TABLE IF NOT EXISTS transitions (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id  TEXT NOT NULL,
        task_id     TEXT NOT NULL,
        from_status TEXT NOT NULL,
        to_status   TEXT NOT NULL,
        reason      TEXT NOT NULL,
        at          INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_transitions_session ON transitions(session_id, id);
    `);
  }

  /** The underlying connection, for collaborators that keep their own tables beside ours. */
  get database(): Database.Database {
    return this.db;
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  /** Validate the graph, then persist the session and all its subtasks in one transaction. */
  create(input: NewSession, specs: SubtaskSpec[]): Session {
    parseOrThrow(ConcurrencyLimitSchema, input.concurrencyLimit, "concurrency limit");
    validate(specs);

    const cfg = getConfig();
    const now = Date.now();
    const id = input.id ?? randomUUID();
    const mainTaskId = input.mainTaskId ?? `main_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
    const executionOrder = executionLayers(specs);

    const insertSession = this.db.prepare(`
      INSERT INTO sessions (id, main_task_id, goal, task_type, complexity, state, concurrency_limit, execution_order, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, 'pending', ?, ?, ?, ?)
    `);
    const insertSubtask = this.prepareInsertSubtask();

    this.db.transaction(() => {
      insertSession.run(
        id,
        mainTaskId,
        input.goal,
        input.taskType,
        input.complexity,
        input.concurrencyLimit,
        JSON.stringify(executionOrder),
        now,
        now,
      );
      specs.forEach((spec, seq) => {
        insertSubtask.run(this.specToRow(id, spec, seq, now, cfg.retry.maxRetries, cfg.timeouts.taskDefault));
      });
    })();

    log.info(`Created session ${id}`, { subtasks: specs.length, layers: executionOrder.length });
    this.writeQueue(id);
    return this.getSession(id);
  }

  findSession(id: string): Session | undefined {
    const row = this.db.prepare("SELECT * FROM sessions WHERE id = ?").get(id) as SessionRow | undefined;
    return row ? rowToSession(row) : undefined;
  }

  getSession(id: string): Session {
    const session = this.findSession(id);
    if (!session) throw new NotFoundError(`Unknown session "${id}"`);
    return session;
  }

  listSessions(limit = getConfig().limits.maxSessions): Session[] {
    const rows = this.db
      .prepare("SELECT * FROM sessions ORDER BY created_at DESC, rowid DESC LIMIT ?")
      .all(limit) as SessionRow[];
    return rows.map(rowToSession);
  }

  setSessionState(id: string, state: SessionState, error?: string): Session {
    const now = Date.now();
    const finishedAt = FINAL_SESSION_STATES.includes(state) ? now : null;
    const res = this.db
      .prepare("UPDATE sessions SET state = ?, error = COALESCE(?, error), updated_at = ?, finished_at = COALESCE(?, finished_at) WHERE id = ?")
      .run(state, error ?? null, now, finishedAt, id);
    if (res.changes === 0) throw new NotFoundError(`Unknown session "${id}"`);
    this.writeQueue(id);
    return this.getSession(id);
  }

  /**
   * Flag a live session for cancellation. Returns false when the session had
   * already finished or was already cancelling.
   */
  requestCancel(id: string): boolean {
    this.getSession(id);
    const res = this.db
      .prepare("UPDATE sessions SET state = 'cancelling', updated_at = ? WHERE id = ? AND state IN ('pending', 'running')")
      .run(Date.now(), id);
    if (res.changes > 0) this.writeQueue(id);
    return res.changes > 0;
  }

  // ---------------------------------------------------------------------------
  // Subtasks
  // ---------------------------------------------------------------------------

  find(ref: SubtaskRef): Subtask | undefined {
    const row = this.db
      .prepare("SELECT * FROM subtasks WHERE session_id = ? AND id = ?")
      .get(ref.sessionId, ref.id) as SubtaskRow | undefined;
    return row ? rowToSubtask(row) : undefined;
  }

  get(sessionId: string, id: string): Subtask {
    const subtask = this.find({ sessionId, id });
    if (!subtask) throw new NotFoundError(`Unknown subtask "${id}" in session "${sessionId}"`);
    return subtask;
  }

  list(sessionId: string): Subtask[] {
    const rows = this.db
      .prepare("SELECT * FROM subtasks WHERE session_id = ? ORDER BY seq")
      .all(sessionId) as SubtaskRow[];
    return rows.map(rowToSubtask);
  }

  listByStatus(sessionId: string, status: SubtaskStatus): Subtask[] {
    const rows = this.db
      .prepare("SELECT * FROM subtasks WHERE session_id = ? AND status = ? ORDER BY seq")
      .all(sessionId, status) as SubtaskRow[];
    return rows.map(rowToSubtask);
  }

  /**
   * Insert a new pending subtask into a live session, or update the
   * definition of one that has not started. The whole graph is re-validated
   * and the cached layering recomputed.
   */
  upsert(sessionId: string, spec: SubtaskSpec): Subtask {
    this.getSession(sessionId);
    const cfg = getConfig();

    this.db.transaction(() => {
      const existing = this.find({ sessionId, id: spec.id });
      const others = this.list(sessionId).filter((t) => t.id !== spec.id);
      const graph = [...others, { id: spec.id, dependencies: spec.dependencies }];
      validate(graph);

      if (!existing) {
        const seq = others.reduce((max, t) => Math.max(max, t.seq), -1) + 1;
        this.prepareInsertSubtask().run(
          this.specToRow(sessionId, spec, seq, Date.now(), cfg.retry.maxRetries, cfg.timeouts.taskDefault),
        );
      } else {
        if (existing.status !== "pending" && existing.status !== "ready") {
          throw new ConflictError(
            "STALE_STATE",
            `Subtask "${spec.id}" is ${existing.status} and can no longer be redefined`,
          );
        }
        const unmet = spec.dependencies.filter((dep) => others.find((t) => t.id === dep)?.status !== "completed");
        if (existing.status === "ready" && unmet.length > 0) {
          throw new ConflictError(
            "STALE_STATE",
            `Subtask "${spec.id}" is ready and cannot take unfinished dependencies: ${unmet.join(", ")}`,
          );
        }
        this.db.prepare(`
          UPDATE subtasks SET description = ?, role = ?, dependencies = ?, priority = ?, max_retries = ?, timeout_ms = ?, input_payload = ?
          WHERE session_id = ? AND id = ? AND status = ?
        `).run(
          spec.description,
          spec.role,
          JSON.stringify(spec.dependencies),
          spec.priority,
          spec.maxRetries ?? existing.maxRetries,
          spec.timeoutMs ?? existing.timeoutMs,
          JSON.stringify(spec.inputPayload ?? existing.inputPayload),
          sessionId,
          spec.id,
          existing.status,
        );
      }

      this.db
        .prepare("UPDATE sessions SET execution_order = ?, updated_at = ? WHERE id = ?")
        .run(JSON.stringify(executionLayers(graph)), Date.now(), sessionId);
    })();

    this.writeQueue(sessionId);
    return this.get(sessionId, spec.id);
  }

  /**
   * Apply one state-machine transition as a compare-and-set. Throws
   * ConflictError when the transition is illegal or another writer moved the
   * subtask first, NotFoundError for unknown ids.
   */
  markStatus(ref: SubtaskRef, next: SubtaskStatus, reason: string, patch?: StatusPatch): Subtask {
    const updated = this.db.transaction(() => {
      const current = this.get(ref.sessionId, ref.id);
      if (patch?.expect && current.status !== patch.expect) {
        throw new ConflictError(
          "STALE_STATE",
          `Subtask "${ref.id}" is ${current.status}, expected ${patch.expect}`,
        );
      }
      assertTransition(ref.id, current.status, next, reason);

      const now = Date.now();
      const row = applyTransition(current, next, reason, now, patch);
      const res = this.db.prepare(`
        UPDATE subtasks SET
          status = @status, attempt_count = @attemptCount, input_payload = @inputPayload,
          output_payload = @outputPayload, failure_reason = @failureReason, error_message = @errorMessage,
          progress = @progress, started_at = @startedAt, completed_at = @completedAt, heartbeat_at = @heartbeatAt
        WHERE session_id = @sessionId AND id = @id AND status = @observed
      `).run({ ...row, sessionId: ref.sessionId, id: ref.id, observed: current.status });
      if (res.changes === 0) {
        throw new ConflictError("STALE_STATE", `Subtask "${ref.id}" changed while moving to ${next}`);
      }

      this.db
        .prepare("INSERT INTO transitions (session_id, task_id, from_status, to_status, reason, at) VALUES (?, ?, ?, ?, ?, ?)")
        .run(ref.sessionId, ref.id, current.status, next, reason, now);
      this.db.prepare("UPDATE sessions SET updated_at = ? WHERE id = ?").run(now, ref.sessionId);

      return this.get(ref.sessionId, ref.id);
    })();

    log.debug(`${ref.id}: -> ${next}`, { session: ref.sessionId, reason });
    this.writeQueue(ref.sessionId);
    return updated;
  }

  /** Record liveness and progress for a running subtask. Returns false if it is no longer running. */
  heartbeat(ref: SubtaskRef, progress: number): boolean {
    const res = this.db
      .prepare("UPDATE subtasks SET heartbeat_at = ?, progress = ? WHERE session_id = ? AND id = ? AND status = 'running'")
      .run(Date.now(), Math.max(0, Math.min(100, progress)), ref.sessionId, ref.id);
    return res.changes > 0;
  }

  /** Abort every subtask of the session currently in one of `statuses`. Returns the aborted ids. */
  abortWhere(sessionId: string, statuses: readonly SubtaskStatus[], reason: FailureReason): string[] {
    const aborted: string[] = [];
    for (const task of this.list(sessionId)) {
      if (!statuses.includes(task.status)) continue;
      try {
        this.markStatus({ sessionId, id: task.id }, "aborted", reason, { expect: task.status });
        aborted.push(task.id);
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;
        log.debug(`Skipped abort of ${task.id}: ${err.message}`);
      }
    }
    return aborted;
  }

  transitions(sessionId: string, taskId?: string): Transition[] {
    const rows = (taskId === undefined
      ? this.db.prepare("SELECT * FROM transitions WHERE session_id = ? ORDER BY id").all(sessionId)
      : this.db.prepare("SELECT * FROM transitions WHERE session_id = ? AND task_id = ? ORDER BY id").all(sessionId, taskId)
    ) as TransitionRow[];
    return rows.map((r) => ({
      sessionId: r.session_id,
      taskId: r.task_id,
      from: r.from_status,
      to: r.to_status,
      reason: r.reason,
      at: r.at,
    }));
  }

  // ---------------------------------------------------------------------------
  // Queue file
  // ---------------------------------------------------------------------------

  snapshot(sessionId: string): QueueFile {
    return buildQueueFile(this.getSession(sessionId), this.list(sessionId));
  }

  /** Restore a session from a queue file into this store, e.g. after losing the database. */
  importSnapshot(queue: QueueFile): Session {
    const session = queue.session;
    if (this.findSession(session.id)) {
      throw new ConflictError("STALE_STATE", `Session "${session.id}" already exists`);
    }
    const subtasks = Object.values(queue.tasks).sort((a, b) => a.seq - b.seq);
    validate(subtasks);

    const insertSubtask = this.prepareInsertSubtask();
    this.db.transaction(() => {
      this.db.prepare(`
        INSERT INTO sessions (id, main_task_id, goal, task_type, complexity, state, concurrency_limit, execution_order, error, created_at, updated_at, finished_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        session.id,
        session.mainTaskId,
        session.goal,
        session.taskType,
        session.complexity,
        session.state,
        session.concurrencyLimit,
        JSON.stringify(executionLayers(subtasks)),
        session.error ?? null,
        session.createdAt,
        Date.now(),
        session.finishedAt ?? null,
      );
      for (const task of subtasks) {
        insertSubtask.run(subtaskToRow(task));
      }
    })();

    log.info(`Imported session ${session.id} from queue file`, { subtasks: subtasks.length });
    return this.getSession(session.id);
  }

  close(): void {
    this.db.close();
  }

  private writeQueue(sessionId: string): void {
    if (!this.queueDir) return;
    const path = queueFilePath(this.queueDir, sessionId);
    try {
      writeQueueFile(path, this.snapshot(sessionId));
    } catch (err) {
      // The database already holds the transition; the queue file catches up on the next write.
      log.error(`Failed to write queue file ${path}`, { error: errorMessage(err) });
    }
  }

  private prepareInsertSubtask(): Database.Statement {
    return this.db.prepare(`
      INSERT INTO subtasks (
        session_id, id, seq, description, role, dependencies, status, priority, attempt_count, max_retries,
        input_payload, output_payload, timeout_ms, failure_reason, error_message, progress,
        created_at, started_at, completed_at, heartbeat_at
      ) VALUES (
        @session_id, @id, @seq, @description, @role, @dependencies, @status, @priority, @attempt_count, @max_retries,
        @input_payload, @output_payload, @timeout_ms, @failure_reason, @error_message, @progress,
        @created_at, @started_at, @completed_at, @heartbeat_at
      )
    `);
  }

  private specToRow(
    sessionId: string,
    spec: SubtaskSpec,
    seq: number,
    now: number,
    defaultRetries: number,
    defaultTimeout: number,
  ): SubtaskRow {
    return subtaskToRow({
      id: spec.id,
      sessionId,
      seq,
      description: spec.description,
      role: spec.role,
      dependencies: spec.dependencies,
      status: "pending",
      priority: spec.priority,
      attemptCount: 0,
      maxRetries: spec.maxRetries ?? defaultRetries,
      inputPayload: spec.inputPayload ?? {},
      timeoutMs: spec.timeoutMs ?? defaultTimeout,
      progress: 0,
      createdAt: now,
    });
  }
}

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

type SessionRow = {
  id: string;
  main_task_id: string;
  goal: string;
  task_type: string;
  complexity: Complexity;
  state: SessionState;
  concurrency_limit: number;
  execution_order: string;
  error: string | null;
  created_at: number;
  updated_at: number;
  finished_at: number | null;
};

type SubtaskRow = {
  session_id: string;
  id: string;
  seq: number;
  description: string;
  role: Subtask["role"];
  dependencies: string;
  status: SubtaskStatus;
  priority: number;
  attempt_count: number;
  max_retries: number;
  input_payload: string;
  output_payload: string | null;
  timeout_ms: number;
  failure_reason: FailureReason | null;
  error_message: string | null;
  progress: number;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  heartbeat_at: number | null;
};

type TransitionRow = {
  session_id: string;
  task_id: string;
  from_status: SubtaskStatus;
  to_status: SubtaskStatus;
  reason: string;
  at: number;
};

type MutableColumns = {
  status: SubtaskStatus;
  attemptCount: number;
  inputPayload: string;
  outputPayload: string | null;
  failureReason: FailureReason | null;
  errorMessage: string | null;
  progress: number;
  startedAt: number | null;
  completedAt: number | null;
  heartbeatAt: number | null;
};

/** Compute the columns a transition rewrites. */
function applyTransition(
  current: Subtask,
  next: SubtaskStatus,
  reason: string,
  now: number,
  patch?: StatusPatch,
): MutableColumns {
  const cols: MutableColumns = {
    status: next,
    attemptCount: current.attemptCount,
    inputPayload: JSON.stringify(patch?.inputPayload ?? current.inputPayload),
    outputPayload: current.outputPayload ? JSON.stringify(current.outputPayload) : null,
    failureReason: current.failureReason ?? null,
    errorMessage: current.errorMessage ?? null,
    progress: current.progress,
    startedAt: current.startedAt ?? null,
    completedAt: current.completedAt ?? null,
    heartbeatAt: current.heartbeatAt ?? null,
  };

  switch (next) {
    case "running":
      cols.startedAt = now;
      cols.heartbeatAt = now;
      cols.progress = 0;
      cols.failureReason = null;
      cols.errorMessage = null;
      break;
    case "completed":
      cols.completedAt = now;
      cols.progress = 100;
      cols.outputPayload = JSON.stringify(patch?.outputPayload ?? {});
      break;
    case "failed":
      cols.failureReason = patch?.failureReason ?? (isFailureReason(reason) ? reason : "worker_error");
      cols.errorMessage = patch?.errorMessage ?? null;
      break;
    case "retrying":
      cols.attemptCount = current.attemptCount + 1;
      break;
    case "aborted":
      cols.completedAt = now;
      cols.failureReason = patch?.failureReason ?? (isFailureReason(reason) ? reason : current.failureReason ?? null);
      if (patch?.errorMessage) cols.errorMessage = patch.errorMessage;
      break;
    default:
      break;
  }
  return cols;
}

function subtaskToRow(task: Subtask): SubtaskRow {
  return {
    session_id: task.sessionId,
    id: task.id,
    seq: task.seq,
    description: task.description,
    role: task.role,
    dependencies: JSON.stringify(task.dependencies),
    status: task.status,
    priority: task.priority,
    attempt_count: task.attemptCount,
    max_retries: task.maxRetries,
    input_payload: JSON.stringify(task.inputPayload),
    output_payload: task.outputPayload ? JSON.stringify(task.outputPayload) : null,
    timeout_ms: task.timeoutMs,
    failure_reason: task.failureReason ?? null,
    error_message: task.errorMessage ?? null,
    progress: task.progress,
    created_at: task.createdAt,
    started_at: task.startedAt ?? null,
    completed_at: task.completedAt ?? null,
    heartbeat_at: task.heartbeatAt ?? null,
  };
}

function parsePayload(raw: string): Payload {
  return parseOrThrow(PayloadSchema, JSON.parse(raw), "stored payload");
}

function parseIds(raw: string): string[] {
  const value: unknown = JSON.parse(raw);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function parseLayers(raw: string): string[][] {
  const value: unknown = JSON.parse(raw);
  return Array.isArray(value)
    ? value.map((layer) => (Array.isArray(layer) ? layer.filter((v): v is string => typeof v === "string") : []))
    : [];
}

function rowToSubtask(row: SubtaskRow): Subtask {
  return {
    id: row.id,
    sessionId: row.session_id,
    seq: row.seq,
    description: row.description,
    role: row.role,
    dependencies: parseIds(row.dependencies),
    status: row.status,
    priority: row.priority,
    attemptCount: row.attempt_count,
    maxRetries: row.max_retries,
    inputPayload: parsePayload(row.input_payload),
    outputPayload: row.output_payload === null ? undefined : parsePayload(row.output_payload),
    timeoutMs: row.timeout_ms,
    failureReason: row.failure_reason ?? undefined,
    errorMessage: row.error_message ?? undefined,
    progress: row.progress,
    createdAt: row.created_at,
    startedAt: row.started_at ?? undefined,
    completedAt: row.completed_at ?? undefined,
    heartbeatAt: row.heartbeat_at ?? undefined,
  };
}

function rowToSession(row: SessionRow): Session {
  return {
    id: row.id,
    mainTaskId: row.main_task_id,
    goal: row.goal,
    taskType: row.task_type,
    complexity: row.complexity,
    state: row.state,
    concurrencyLimit: row.concurrency_limit,
    executionOrder: parseLayers(row.execution_order),
    error: row.error ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    finishedAt: row.finished_at ?? undefined,
  };
}
