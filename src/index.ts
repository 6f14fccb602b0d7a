// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { OrchestratorConfig } from "./config.js";

// Errors
export {
  OrchestratorError,
  ConstructionError,
  ConflictError,
  NotFoundError,
  UnschedulableGraphError,
  WorkerTimeoutError,
  WorkerError,
  ValidationError,
  ConfigError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  QueueFileSchema,
  StartRequestSchema,
  SubtaskSchema,
  SessionSchema,
  WorkerRequestWireSchema,
  WorkerResponseWireSchema,
} from "./schemas.js";
export type { QueueFile, StartRequest } from "./schemas.js";

// Model
export { WORKER_ROLES, SUBTASK_STATUSES, FAILURE_REASONS, COMPLEXITIES, SESSION_STATES } from "./planner/types.js";
export type {
  WorkerRole,
  SubtaskStatus,
  FailureReason,
  Complexity,
  Payload,
  SubtaskSpec,
  Subtask,
  SubtaskRef,
  DagSkeleton,
  SessionState,
  Session,
} from "./planner/types.js";

// Planning
export { Decomposer } from "./planner/decomposer.js";
export type { GoalAnalysis, DecomposeOptions } from "./planner/decomposer.js";
export { DEFAULT_TEMPLATES, PRIORITY } from "./planner/templates.js";
export type { DecompositionTemplate, TemplateStep } from "./planner/templates.js";
export { validate as validateGraph, executionLayers, topologicalSort, findCycle } from "./planner/task-graph.js";

// Persistence
export { TaskStore } from "./persistence/task-store.js";
export type { TaskStoreOptions, NewSession, StatusPatch, Transition } from "./persistence/task-store.js";
export { canTransition, nextStatuses } from "./persistence/state-machine.js";
export { readQueueFile, writeQueueFile, queueFilePath } from "./persistence/queue-file.js";

// Execution
export { Scheduler } from "./executor/scheduler.js";
export { Dispatcher } from "./executor/dispatcher.js";
export type { DispatcherOptions } from "./executor/dispatcher.js";
export type { DispatchHandle, DispatchOutcome, ScheduleOptions, ScheduleResult, TaskCallbacks } from "./executor/types.js";

// Workers
export type { WorkerAdapter, WorkerContext, WorkerInput, WorkerOutput } from "./agents/adapter.js";
export { WorkerRegistry } from "./agents/registry.js";
export type { WorkerHealth } from "./agents/registry.js";
export { ROLE_OUTPUT_SCHEMAS, ArtifactSchema } from "./agents/roles.js";
export type { Artifact, RoleOutput } from "./agents/roles.js";
export { HttpAdapter } from "./agents/http-adapter.js";
export type { HttpAdapterOptions } from "./agents/http-adapter.js";
export { FunctionAdapter } from "./agents/function-adapter.js";
export type { WorkerFunction, FunctionAdapterOptions } from "./agents/function-adapter.js";

// Aggregation
export { aggregate, progressOf } from "./aggregator/aggregator.js";
export type {
  AggregateResult,
  AggregateStatus,
  AggregationConflict,
  ArtifactChange,
  DiscardedChange,
  Progress,
  UnmetSubtask,
} from "./aggregator/aggregator.js";
export { validateResult } from "./aggregator/validate.js";
export type { ValidationIssue, ValidationReport } from "./aggregator/validate.js";

// Reflexion
export { Reflexion } from "./reflexion/reflexion.js";
export type { ReflexionDecision } from "./reflexion/reflexion.js";
export { InMemoryErrorMemory, SqliteErrorMemory, seedRemedies } from "./reflexion/memory.js";
export type { ErrorMemory, SeedableMemory, Remedy, RemedyOutcome, MemoryRecord, MemoryEntry } from "./reflexion/memory.js";
export { categorize, signatureOf, ERROR_CATEGORIES, SUGGESTED_FIXES } from "./reflexion/signature.js";
export type { ErrorCategory } from "./reflexion/signature.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type {
  OrchestratorOptions,
  OrchestratorCallbacks,
  StartOptions,
  SessionStatus,
  SessionReport,
  TaskState,
} from "./orchestrator.js";

// Utils
export { log, createLogger, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry, backoffDelay } from "./utils/retry.js";
