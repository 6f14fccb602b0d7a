import type { FailureReason, SessionState, Subtask, SubtaskRef, WorkerRole } from "../planner/types.js";
import type { ReflexionDecision } from "../reflexion/reflexion.js";

export type DispatchOutcome =
  | { kind: "completed"; subtask: Subtask }
  | { kind: "failed"; subtask: Subtask; reason: FailureReason; error: string }
  | { kind: "aborted"; subtask: Subtask }
  /** The store refused the final write; reconciliation picks the subtask up. */
  | { kind: "lost"; ref: SubtaskRef; error: string };

/** Read-only view of one in-flight dispatch. */
export type DispatchHandle = {
  ref: SubtaskRef;
  role: WorkerRole;
  worker: string;
  /** 1-indexed dispatch number of this subtask. */
  attempt: number;
  startedAt: number;
  lastHeartbeat: number;
  progress: number;
  signal: AbortSignal;
  /** Settles once the subtask has left `running`. Never rejects. */
  done: Promise<DispatchOutcome>;
};

export type TaskCallbacks = {
  onTaskStart?: (subtask: Subtask, attempt: number) => void;
  onTaskEnd?: (outcome: DispatchOutcome) => void;
  onHeartbeat?: (ref: SubtaskRef, progress: number) => void;
  onRetry?: (subtask: Subtask, decision: ReflexionDecision) => void;
};

export type ScheduleOptions = {
  /** Overrides the session's stored concurrency limit. */
  concurrencyLimit?: number;
  pollIntervalMs?: number;
  abortDownstream?: boolean;
  cancelGraceMs?: number;
  /** Aborting it cancels the session from inside this process. */
  signal?: AbortSignal;
  callbacks?: TaskCallbacks;
};

export type ScheduleResult = {
  sessionId: string;
  state: SessionState;
  /** Total dispatches made by this run, retries included. */
  dispatches: number;
  durationMs: number;
};
