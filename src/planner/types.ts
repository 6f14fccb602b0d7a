export const WORKER_ROLES = ["researcher", "coder", "tester", "writer", "reviewer"] as const;

export type WorkerRole = (typeof WORKER_ROLES)[number];

export const SUBTASK_STATUSES = [
  "pending",
  "ready",
  "running",
  "completed",
  "failed",
  "retrying",
  "aborted",
] as const;

export type SubtaskStatus = (typeof SUBTASK_STATUSES)[number];

export const FAILURE_REASONS = [
  "timeout",
  "worker_error",
  "invalid_output",
  "no_worker",
  "worker_lost",
  "retries_exhausted",
  "dependency_aborted",
  "cancelled",
  "unschedulable",
] as const;

export type FailureReason = (typeof FAILURE_REASONS)[number];

export const COMPLEXITIES = ["simple", "medium", "complex"] as const;

export type Complexity = (typeof COMPLEXITIES)[number];

/** Opaque structured data exchanged with a worker. Its schema belongs to the role contract. */
export type Payload = Record<string, unknown>;

/** What the decomposer emits and the store accepts for a new subtask. */
export type SubtaskSpec = {
  id: string;
  description: string;
  role: WorkerRole;
  dependencies: string[];
  priority: number;
  maxRetries?: number;
  timeoutMs?: number;
  inputPayload?: Payload;
};

export type Subtask = {
  id: string;
  sessionId: string;
  /** Insertion order within the session, the stable tie-break after priority. */
  seq: number;
  description: string;
  role: WorkerRole;
  dependencies: string[];
  status: SubtaskStatus;
  priority: number;
  attemptCount: number;
  maxRetries: number;
  inputPayload: Payload;
  outputPayload?: Payload;
  timeoutMs: number;
  failureReason?: FailureReason;
  errorMessage?: string;
  progress: number;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  heartbeatAt?: number;
};

export type SubtaskRef = { sessionId: string; id: string };

export type DagSkeleton = {
  goal: string;
  taskType: string;
  complexity: Complexity;
  subtasks: SubtaskSpec[];
};

export const SESSION_STATES = [
  "pending",
  "running",
  "cancelling",
  "completed",
  "partial",
  "failed",
  "cancelled",
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export type Session = {
  id: string;
  mainTaskId: string;
  goal: string;
  taskType: string;
  complexity: Complexity;
  state: SessionState;
  concurrencyLimit: number;
  /** Cached layering of the DAG into batches that may run side by side. */
  executionOrder: string[][];
  error?: string;
  createdAt: number;
  updatedAt: number;
  finishedAt?: number;
};

/** Anything with an id and dependency edges, for the graph helpers. */
export type GraphNode = {
  id: string;
  dependencies: readonly string[];
};
