import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { WorkerRole } from "../planner/types.js";
import { WorkerResponseWireSchema, parseOrThrow } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { WorkerAdapter, WorkerContext, WorkerInput, WorkerOutput } from "./adapter.js";

const log = createLogger("http-worker");

export type HttpAdapterOptions = {
  name: string;
  role: WorkerRole;
  url: string;
  headers?: Record<string, string>;
  description?: string;
  /** Attempts per dispatch for transport failures and 5xx responses. */
  transportAttempts?: number;
};

/** A response worth trying again: the worker was unreachable or answered 5xx. */
class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * Worker reached over HTTP. POSTs the snake_case worker request and expects
 * the snake_case worker response back.
 */
export class HttpAdapter implements WorkerAdapter {
  readonly name: string;
  readonly role: WorkerRole;
  readonly type = "http" as const;
  readonly description?: string;

  private url: string;
  private headers: Record<string, string>;
  private transportAttempts: number;

  constructor(opts: HttpAdapterOptions) {
    this.name = opts.name;
    this.role = opts.role;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.description = opts.description;
    this.transportAttempts = opts.transportAttempts ?? getConfig().retry.transportAttempts;
  }

  async execute(input: WorkerInput, ctx: WorkerContext): Promise<WorkerOutput> {
    const start = Date.now();
    const body = JSON.stringify({
      task_id: input.taskId,
      description: input.description,
      role: input.role,
      input_data: input.inputData,
    });

    try {
      const raw = await withRetry(
        async (attempt) => {
          log.debug(`[${this.name}] POST ${this.url} for "${input.taskId}"`, { attempt });
          let res: Response;
          try {
            res = await fetch(this.url, {
              method: "POST",
              headers: { "Content-Type": "application/json", ...this.headers },
              body,
              signal: ctx.signal,
            });
          } catch (err) {
            if (ctx.signal.aborted) throw err;
            throw new TransportError(errorMessage(err));
          }
          if (res.status >= 500) {
            throw new TransportError(`HTTP ${res.status}: ${await res.text()}`);
          }
          if (!res.ok) {
            throw new Error(`HTTP ${res.status}: ${await res.text()}`);
          }
          const json: unknown = await res.json();
          return json;
        },
        {
          maxAttempts: this.transportAttempts,
          signal: ctx.signal,
          shouldRetry: (err) => err instanceof TransportError,
        },
      );

      const wire = parseOrThrow(WorkerResponseWireSchema, raw, `response from ${this.name}`);
      return {
        taskId: wire.task_id,
        status: wire.status,
        outputData: wire.output_data,
        errorMessage: wire.error_message,
        executionTime: wire.execution_time,
        resourceUsage: wire.resource_usage,
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

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(getConfig().timeouts.httpHealth),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check error`, { error: errorMessage(err) });
      return false;
    }
  }
}
