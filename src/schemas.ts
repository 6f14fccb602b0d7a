import { z } from "zod";
import { ValidationError } from "./errors.js";
import {
  COMPLEXITIES,
  FAILURE_REASONS,
  SESSION_STATES,
  SUBTASK_STATUSES,
  WORKER_ROLES,
} from "./planner/types.js";

export const PayloadSchema = z.record(z.string(), z.unknown());

export const SubtaskSchema = z.object({
  id: z.string().min(1),
  sessionId: z.string().min(1),
  seq: z.number().int().nonnegative(),
  description: z.string(),
  role: z.enum(WORKER_ROLES),
  dependencies: z.array(z.string()),
  status: z.enum(SUBTASK_STATUSES),
  priority: z.number(),
  attemptCount: z.number().int().nonnegative(),
  maxRetries: z.number().int().nonnegative(),
  inputPayload: PayloadSchema,
  outputPayload: PayloadSchema.optional(),
  timeoutMs: z.number().positive(),
  failureReason: z.enum(FAILURE_REASONS).optional(),
  errorMessage: z.string().optional(),
  progress: z.number().min(0).max(100),
  createdAt: z.number(),
  startedAt: z.number().optional(),
  completedAt: z.number().optional(),
  heartbeatAt: z.number().optional(),
});

export const ConcurrencyLimitSchema = z.number().int().positive();

export const SessionSchema = z.object({
  id: z.string().min(1),
  mainTaskId: z.string().min(1),
  goal: z.string(),
  taskType: z.string(),
  complexity: z.enum(COMPLEXITIES),
  state: z.enum(SESSION_STATES),
  concurrencyLimit: ConcurrencyLimitSchema,
  executionOrder: z.array(z.array(z.string())),
  error: z.string().optional(),
  createdAt: z.number(),
  updatedAt: z.number(),
  finishedAt: z.number().optional(),
});

export const QUEUE_FILE_VERSION = "1.0";

/** The persisted queue file: session metadata, subtask map, dependency map and layering. */
export const QueueFileSchema = z.object({
  version: z.literal(QUEUE_FILE_VERSION),
  session: SessionSchema,
  tasks: z.record(z.string(), SubtaskSchema),
  dag: z.record(z.string(), z.array(z.string())),
  executionOrder: z.array(z.array(z.string())),
});

export type QueueFile = z.infer<typeof QueueFileSchema>;

/** Worker request as it travels over the wire. */
export const WorkerRequestWireSchema = z.object({
  task_id: z.string(),
  description: z.string(),
  role: z.enum(WORKER_ROLES),
  input_data: PayloadSchema,
});

/** Worker response as it travels over the wire. */
export const WorkerResponseWireSchema = z.object({
  task_id: z.string(),
  status: z.enum(["completed", "failed"]),
  output_data: PayloadSchema.default({}),
  error_message: z.string().optional(),
  execution_time: z.number().nonnegative(),
  resource_usage: z.record(z.string(), z.number()).default({}),
});

export const StartRequestSchema = z.object({
  goal: z.string().trim().min(1, "goal must not be empty"),
  taskType: z.string().trim().min(1).optional(),
  concurrencyLimit: ConcurrencyLimitSchema.optional(),
  complexity: z.enum(COMPLEXITIES).optional(),
});

export type StartRequest = z.infer<typeof StartRequestSchema>;

/** Parse `data` with `schema`, throwing a ValidationError that names `what` on failure. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${what}: ${issues}`);
  }
  return result.data;
}
