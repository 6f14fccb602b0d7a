export type ErrorCode =
  | "CYCLE_DETECTED"
  | "UNKNOWN_DEPENDENCY"
  | "SELF_DEPENDENCY"
  | "DUPLICATE_ID"
  | "EMPTY_GRAPH"
  | "INVALID_ROLE"
  | "INVALID_TRANSITION"
  | "STALE_STATE"
  | "NOT_FOUND"
  | "UNSCHEDULABLE_GRAPH"
  | "WORKER_TIMEOUT"
  | "WORKER_ERROR"
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "CONFIG_INVALID";

export class OrchestratorError extends Error {
  readonly code: ErrorCode;
  override readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
    this.code = code;
    this.cause = cause;
  }
}

/** Malformed or cyclic DAG. Fatal, raised before anything is dispatched. */
export class ConstructionError extends OrchestratorError {
  /** Node ids forming the offending cycle, when one was found. */
  readonly cycle?: string[];

  constructor(code: ErrorCode, message: string, cycle?: string[]) {
    super(code, message);
    this.name = "ConstructionError";
    this.cycle = cycle;
  }
}

export class ConflictError extends OrchestratorError {
  constructor(code: "INVALID_TRANSITION" | "STALE_STATE" | "VALIDATION_FAILED", message: string) {
    super(code, message);
    this.name = "ConflictError";
  }
}

export class NotFoundError extends OrchestratorError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class UnschedulableGraphError extends OrchestratorError {
  readonly stalled: string[];

  constructor(sessionId: string, stalled: string[]) {
    super(
      "UNSCHEDULABLE_GRAPH",
      `Session "${sessionId}" cannot make progress: ${stalled.join(", ")} pending with no runnable work`,
    );
    this.name = "UnschedulableGraph";
    this.stalled = stalled;
  }
}

export class WorkerTimeoutError extends OrchestratorError {
  readonly taskId: string;

  constructor(taskId: string, timeoutMs: number) {
    super("WORKER_TIMEOUT", `Task "${taskId}" sent no heartbeat for ${timeoutMs}ms`);
    this.name = "WorkerTimeout";
    this.taskId = taskId;
  }
}

export class WorkerError extends OrchestratorError {
  readonly taskId: string;

  constructor(taskId: string, message: string, cause?: unknown) {
    super("WORKER_ERROR", message, cause);
    this.name = "WorkerError";
    this.taskId = taskId;
  }
}

export class ValidationError extends OrchestratorError {
  constructor(code: "VALIDATION_FAILED" | "DUPLICATE_REGISTRATION", message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
