import { errorMessage } from "../errors.js";
import type { Payload, WorkerRole } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { WorkerAdapter, WorkerContext, WorkerInput, WorkerOutput } from "./adapter.js";

const log = createLogger("function-worker");

/** In-process worker body. Resolve with the output payload; throw to fail the attempt. */
export type WorkerFunction = (input: WorkerInput, ctx: WorkerContext) => Promise<Payload>;

export type FunctionAdapterOptions = {
  name: string;
  role: WorkerRole;
  fn: WorkerFunction;
  description?: string;
};

export class FunctionAdapter implements WorkerAdapter {
  readonly name: string;
  readonly role: WorkerRole;
  readonly type = "function" as const;
  readonly description?: string;

  private fn: WorkerFunction;

  constructor(opts: FunctionAdapterOptions) {
    this.name = opts.name;
    this.role = opts.role;
    this.fn = opts.fn;
    this.description = opts.description;
  }

  async execute(input: WorkerInput, ctx: WorkerContext): Promise<WorkerOutput> {
    const start = Date.now();
    try {
      log.debug(`[${this.name}] Running "${input.taskId}"`, { attempt: ctx.attempt });
      const outputData = await this.fn(input, ctx);
      return {
        taskId: input.taskId,
        status: "completed",
        outputData,
        executionTime: Date.now() - start,
        resourceUsage: {},
      };
    } catch (err) {
      log.warn(`[${this.name}] "${input.taskId}" failed`, { error: errorMessage(err) });
      return {
        taskId: input.taskId,
        status: "failed",
        outputData: {},
        errorMessage: errorMessage(err),
        executionTime: Date.now() - start,
        resourceUsage: {},
      };
    }
  }
}
