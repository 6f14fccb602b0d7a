import { ArtifactSchema, type Artifact } from "../agents/roles.js";
import { getConfig } from "../config.js";
import { topologicalSort } from "../planner/task-graph.js";
import type { FailureReason, Payload, Session, Subtask, SubtaskStatus, WorkerRole } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("aggregator");

export type AggregateStatus = "success" | "partial" | "failed";

export type ArtifactChange = Artifact & {
  taskId: string;
  priority: number;
  completedAt: number;
  seq: number;
};

export type DiscardedChange = ArtifactChange & { supersededBy: string };

/** Two or more completed subtasks touched the same artifact. Resolved, never fatal. */
export type AggregationConflict = {
  path: string;
  winner: string;
  losers: string[];
};

export type UnmetSubtask = {
  id: string;
  role: WorkerRole;
  status: SubtaskStatus;
  reason?: FailureReason;
  error?: string;
};

export type Progress = {
  total: number;
  counts: Record<SubtaskStatus, number>;
  /** Completed share, one decimal. */
  percent: number;
};

export type AggregateResult = {
  sessionId: string;
  mainTaskId: string;
  goal: string;
  status: AggregateStatus;
  /** Output payloads of completed subtasks, keyed by id, in dependency order. */
  outputs: Record<string, Payload>;
  /** Effective artifact changes, one per path. */
  artifacts: ArtifactChange[];
  discarded: DiscardedChange[];
  conflicts: AggregationConflict[];
  unmet: UnmetSubtask[];
  summary: string;
  progress: Progress;
};

export function progressOf(subtasks: readonly Subtask[]): Progress {
  const counts: Record<SubtaskStatus, number> = {
    pending: 0,
    ready: 0,
    running: 0,
    completed: 0,
    failed: 0,
    retrying: 0,
    aborted: 0,
  };
  for (const task of subtasks) counts[task.status] += 1;
  const total = subtasks.length;
  const percent = total === 0 ? 0 : Math.round((counts.completed / total) * 1000) / 10;
  return { total, counts, percent };
}

/** Positive when `a` should win the artifact over `b`. */
function compareChanges(a: ArtifactChange, b: ArtifactChange): number {
  return a.priority - b.priority || a.completedAt - b.completedAt || a.seq - b.seq;
}

/** One change per path; a later entry for the same path replaces an earlier one. */
function artifactsOf(task: Subtask): ArtifactChange[] {
  const parsed = ArtifactSchema.array().safeParse(task.outputPayload?.artifacts);
  if (!parsed.success) return [];
  const byPath = new Map<string, ArtifactChange>();
  for (const artifact of parsed.data) {
    byPath.delete(artifact.path);
    byPath.set(artifact.path, {
      ...artifact,
      taskId: task.id,
      priority: task.priority,
      completedAt: task.completedAt ?? 0,
      seq: task.seq,
    });
  }
  return [...byPath.values()];
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

function summaryLine(task: Subtask, max: number): string {
  if (task.status === "completed") {
    const summary = task.outputPayload?.summary;
    return `- ${task.id}: ${truncate(typeof summary === "string" ? summary : "completed", max)}`;
  }
  const reason = task.failureReason ? ` (${task.failureReason})` : "";
  return `- ${task.id}: ${task.status}${reason}`;
}

/**
 * Consolidate a session's subtasks into one result. Pure: the same store
 * state always yields the same result.
 */
export function aggregate(session: Session, subtasks: readonly Subtask[]): AggregateResult {
  const max = getConfig().limits.outputTruncation;
  const ordered = topologicalSort([...subtasks].sort((a, b) => a.seq - b.seq));
  const completed = ordered.filter((t) => t.status === "completed");

  const outputs: Record<string, Payload> = {};
  const byPath = new Map<string, ArtifactChange[]>();
  for (const task of completed) {
    outputs[task.id] = structuredClone(task.outputPayload ?? {});
    for (const change of artifactsOf(task)) {
      const list = byPath.get(change.path) ?? [];
      list.push(change);
      byPath.set(change.path, list);
    }
  }

  const artifacts: ArtifactChange[] = [];
  const discarded: DiscardedChange[] = [];
  const conflicts: AggregationConflict[] = [];
  for (const [path, changes] of [...byPath.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    const winner = changes.reduce((best, c) => (compareChanges(c, best) >= 0 ? c : best));
    artifacts.push(winner);
    const losers = changes.filter((c) => c !== winner);
    if (losers.length === 0) continue;

    discarded.push(...losers.map((c) => ({ ...c, supersededBy: winner.taskId })));
    const conflict = { path, winner: winner.taskId, losers: losers.map((c) => c.taskId) };
    conflicts.push(conflict);
    log.warn(`AggregationConflict on ${path}: kept ${winner.taskId}`, { discarded: conflict.losers });
  }

  const unmet: UnmetSubtask[] = ordered
    .filter((t) => t.status !== "completed")
    .map((t) => ({ id: t.id, role: t.role, status: t.status, reason: t.failureReason, error: t.errorMessage }));

  const status: AggregateStatus =
    unmet.length === 0 ? "success" : completed.length > 0 ? "partial" : "failed";

  return {
    sessionId: session.id,
    mainTaskId: session.mainTaskId,
    goal: session.goal,
    status,
    outputs,
    artifacts,
    discarded,
    conflicts,
    unmet,
    summary: ordered.length === 0 ? "No results" : ordered.map((t) => summaryLine(t, max)).join("\n"),
    progress: progressOf(subtasks),
  };
}
