import type { Payload, WorkerRole } from "../planner/types.js";

/** What a worker receives for one dispatch. A fresh copy per attempt. */
export type WorkerInput = {
  taskId: string;
  description: string;
  role: WorkerRole;
  inputData: Payload;
};

export type WorkerOutput = {
  taskId: string;
  status: "completed" | "failed";
  outputData: Payload;
  errorMessage?: string;
  /** Wall-clock duration reported by the worker, in ms. */
  executionTime: number;
  resourceUsage: Record<string, number>;
};

/**
 * Per-dispatch context. Each handle gets its own; nothing in it is shared
 * with sibling subtasks.
 */
export type WorkerContext = {
  /** Aborted on cancellation or timeout. Workers should stop promptly once it fires. */
  signal: AbortSignal;
  /** 1-indexed dispatch number of this subtask. */
  attempt: number;
  /** Report liveness and coarse progress (0-100). */
  heartbeat(progress: number): void;
};

export interface WorkerAdapter {
  name: string;
  role: WorkerRole;
  type: "function" | "http" | string;
  description?: string;

  execute(input: WorkerInput, ctx: WorkerContext): Promise<WorkerOutput>;
  healthCheck?(): Promise<boolean>;
}
