import { ValidationError, errorMessage } from "../errors.js";
import { WORKER_ROLES, type WorkerRole } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { WorkerAdapter } from "./adapter.js";

const log = createLogger("registry");

export type WorkerHealth = {
  role: WorkerRole;
  name: string;
  healthy: boolean;
  lastCheck: number;
  responseTimeMs?: number;
  error?: string;
};

/** Resolves a role to the one worker bound to it. */
export class WorkerRegistry {
  private workers = new Map<WorkerRole, WorkerAdapter>();
  private healthCache = new Map<WorkerRole, WorkerHealth>();

  add(worker: WorkerAdapter): void {
    if (!WORKER_ROLES.includes(worker.role)) {
      throw new ValidationError("VALIDATION_FAILED", `Unknown role "${worker.role}" for worker "${worker.name}"`);
    }
    const existing = this.workers.get(worker.role);
    if (existing) {
      throw new ValidationError(
        "DUPLICATE_REGISTRATION",
        `Role "${worker.role}" already bound to worker "${existing.name}"`,
      );
    }
    this.workers.set(worker.role, worker);
    log.debug(`Bound ${worker.role} -> ${worker.name}`, { type: worker.type });
  }

  remove(role: WorkerRole): boolean {
    this.healthCache.delete(role);
    return this.workers.delete(role);
  }

  get(role: WorkerRole): WorkerAdapter | undefined {
    return this.workers.get(role);
  }

  has(role: WorkerRole): boolean {
    return this.workers.has(role);
  }

  list(): WorkerAdapter[] {
    return [...this.workers.values()];
  }

  roles(): WorkerRole[] {
    return [...this.workers.keys()];
  }

  async checkHealth(role: WorkerRole): Promise<WorkerHealth> {
    const worker = this.get(role);
    if (!worker) {
      return { role, name: "", healthy: false, lastCheck: Date.now(), error: "No worker bound" };
    }

    const start = Date.now();
    let result: WorkerHealth;
    try {
      // Workers without a health check are assumed healthy
      const healthy = worker.healthCheck ? await worker.healthCheck() : true;
      result = { role, name: worker.name, healthy, lastCheck: Date.now(), responseTimeMs: Date.now() - start };
    } catch (err) {
      result = {
        role,
        name: worker.name,
        healthy: false,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
        error: errorMessage(err),
      };
      log.warn(`Health check failed for ${role} worker "${worker.name}"`, { error: result.error });
    }
    this.healthCache.set(role, result);
    return result;
  }

  async checkAllHealth(): Promise<WorkerHealth[]> {
    return Promise.all(this.roles().map((role) => this.checkHealth(role)));
  }

  getCachedHealth(role: WorkerRole): WorkerHealth | undefined {
    return this.healthCache.get(role);
  }
}
