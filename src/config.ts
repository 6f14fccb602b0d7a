import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors.js";

export type OrchestratorConfig = {
  timeouts: {
    /** Heartbeat silence after which a running subtask is failed. */
    taskDefault: number;
    heartbeatCheck: number;
    cancelGrace: number;
    httpHealth: number;
  };
  retry: {
    maxRetries: number;
    transportAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    concurrencyLimit: number;
    maxSessions: number;
    outputTruncation: number;
  };
  scheduling: {
    pollIntervalMs: number;
    abortDownstream: boolean;
  };
  persistence: {
    dbPath: string;
    queueDir: string | null;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DATA_DIR = join(homedir(), ".taskgraph-orchestrator");

const DEFAULTS: OrchestratorConfig = {
  timeouts: {
    taskDefault: 5 * 60 * 1000, // 5 minutes
    heartbeatCheck: 1_000,
    cancelGrace: 5_000,
    httpHealth: 5_000,
  },
  retry: {
    maxRetries: 2,
    transportAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  limits: {
    concurrencyLimit: 4,
    maxSessions: 50,
    outputTruncation: 3_000,
  },
  scheduling: {
    pollIntervalMs: 1_000,
    abortDownstream: true,
  },
  persistence: {
    dbPath: join(DATA_DIR, "orchestrator.db"),
    queueDir: null,
  },
};

let current: OrchestratorConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function check(config: OrchestratorConfig): OrchestratorConfig {
  if (!Number.isInteger(config.limits.concurrencyLimit) || config.limits.concurrencyLimit < 1) {
    throw new ConfigError(`limits.concurrencyLimit must be a positive integer, got ${config.limits.concurrencyLimit}`);
  }
  if (!Number.isInteger(config.retry.maxRetries) || config.retry.maxRetries < 0) {
    throw new ConfigError(`retry.maxRetries must be a non-negative integer, got ${config.retry.maxRetries}`);
  }
  for (const [key, value] of Object.entries(config.timeouts)) {
    if (!(value > 0)) throw new ConfigError(`timeouts.${key} must be positive, got ${value}`);
  }
  if (!(config.scheduling.pollIntervalMs > 0)) {
    throw new ConfigError(`scheduling.pollIntervalMs must be positive, got ${config.scheduling.pollIntervalMs}`);
  }
  return config;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<OrchestratorConfig>): void {
  const merged = deepMerge(DEFAULTS, overrides);
  // deepMerge only ever replaces leaves of DEFAULTS, so the shape is preserved
  current = check(merged as OrchestratorConfig);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<OrchestratorConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<OrchestratorConfig> = Object.freeze(structuredClone(DEFAULTS));
