import type Database from "better-sqlite3";
import { WORKER_ROLES, type WorkerRole } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import { ERROR_CATEGORIES, SUGGESTED_FIXES, signatureOf } from "./signature.js";

const log = createLogger("memory");

export type Remedy = {
  signature: string;
  hints: string[];
  successes: number;
  failures: number;
};

/** `retried`: a retry was scheduled. `resolved`: a retried subtask then completed. `exhausted`: it ran out of retries. */
export type RemedyOutcome = "retried" | "resolved" | "exhausted";

export type MemoryRecord = {
  outcome: RemedyOutcome;
  sessionId?: string;
  taskId?: string;
  /** Hints that were in effect for the attempt being recorded. */
  hints?: string[];
  error?: string;
};

export type MemoryEntry = MemoryRecord & { signature: string; at: number };

/**
 * Error/fix knowledge store consulted on failure. Append-only: outcomes are
 * recorded, never rewritten.
 */
export interface ErrorMemory {
  lookup(signature: string): Promise<Remedy | undefined>;
  record(signature: string, record: MemoryRecord): Promise<void>;
}

export interface SeedableMemory extends ErrorMemory {
  /** Offer `hints` for `signature` unless that exact remedy is already known. */
  seed(signature: string, hints: string[]): Promise<void>;
}

function score(remedy: Remedy): number {
  return remedy.successes - remedy.failures;
}

/** Highest-scoring remedy, skipping those whose failures outweigh their successes. */
function best(remedies: Remedy[]): Remedy | undefined {
  return remedies
    .filter((r) => score(r) >= 0 && r.hints.length > 0)
    .sort((a, b) => score(b) - score(a))[0];
}

export class InMemoryErrorMemory implements SeedableMemory {
  private remedies = new Map<string, Remedy[]>();
  private entries: MemoryEntry[] = [];

  async lookup(signature: string): Promise<Remedy | undefined> {
    const found = best(this.remedies.get(signature) ?? []);
    return found ? { ...found, hints: [...found.hints] } : undefined;
  }

  async record(signature: string, record: MemoryRecord): Promise<void> {
    this.entries.push({ ...record, signature, at: Date.now() });
    if (!record.hints || record.hints.length === 0 || record.outcome === "retried") return;

    const remedy = this.find(signature, record.hints) ?? this.add(signature, record.hints);
    if (record.outcome === "resolved") remedy.successes += 1;
    else remedy.failures += 1;
  }

  async seed(signature: string, hints: string[]): Promise<void> {
    if (!this.find(signature, hints)) this.add(signature, hints);
  }

  history(signature?: string): MemoryEntry[] {
    return signature === undefined ? [...this.entries] : this.entries.filter((e) => e.signature === signature);
  }

  private find(signature: string, hints: string[]): Remedy | undefined {
    const key = JSON.stringify(hints);
    return this.remedies.get(signature)?.find((r) => JSON.stringify(r.hints) === key);
  }

  private add(signature: string, hints: string[]): Remedy {
    const remedy: Remedy = { signature, hints: [...hints], successes: 0, failures: 0 };
    const list = this.remedies.get(signature) ?? [];
    list.push(remedy);
    this.remedies.set(signature, list);
    return remedy;
  }
}

type RemedyRow = { signature: string; hints: string; successes: number; failures: number };

type EntryRow = {
  signature: string;
  outcome: RemedyOutcome;
  session_id: string | null;
  task_id: string | null;
  hints: string | null;
  error: string | null;
  at: number;
};

function parseHints(raw: string): string[] {
  const value: unknown = JSON.parse(raw);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

/** Error memory kept in SQLite beside the task store, so it outlives the process. */
export class SqliteErrorMemory implements SeedableMemory {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS error_memory_log (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        signature  TEXT NOT NULL,
        outcome    TEXT NOT NULL,
        session_id TEXT,
        task_id    TEXT,
        hints      TEXT,
        error      TEXT,
        at         INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_error_memory_signature ON error_memory_log(signature);
      CREATE TABLE IF NOT EXISTS error_remedies (
        signature TEXT NOT NULL,
        hints     TEXT NOT NULL,
        successes INTEGER NOT NULL DEFAULT 0,
        failures  INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (signature, hints)
      );
    `);
  }

  async lookup(signature: string): Promise<Remedy | undefined> {
    const rows = this.db
      .prepare("SELECT * FROM error_remedies WHERE signature = ? ORDER BY rowid")
      .all(signature) as RemedyRow[];
    return best(
      rows.map((r) => ({ signature: r.signature, hints: parseHints(r.hints), successes: r.successes, failures: r.failures })),
    );
  }

  async record(signature: string, record: MemoryRecord): Promise<void> {
    const hints = record.hints && record.hints.length > 0 ? JSON.stringify(record.hints) : null;
    this.db.transaction(() => {
      this.db
        .prepare(
          "INSERT INTO error_memory_log (signature, outcome, session_id, task_id, hints, error, at) VALUES (?, ?, ?, ?, ?, ?, ?)",
        )
        .run(signature, record.outcome, record.sessionId ?? null, record.taskId ?? null, hints, record.error ?? null, Date.now());
      if (hints === null || record.outcome === "retried") return;
      const column = record.outcome === "resolved" ? "successes" : "failures";
      this.db
        .prepare(
          `INSERT INTO error_remedies (signature, hints, ${column}) VALUES (?, ?, 1)
           ON CONFLICT (signature, hints) DO UPDATE SET ${column} = ${column} + 1`,
        )
        .run(signature, hints);
    })();
  }

  async seed(signature: string, hints: string[]): Promise<void> {
    this.db
      .prepare("INSERT OR IGNORE INTO error_remedies (signature, hints) VALUES (?, ?)")
      .run(signature, JSON.stringify(hints));
  }

  history(signature?: string): MemoryEntry[] {
    const rows = (signature === undefined
      ? this.db.prepare("SELECT * FROM error_memory_log ORDER BY id").all()
      : this.db.prepare("SELECT * FROM error_memory_log WHERE signature = ? ORDER BY id").all(signature)
    ) as EntryRow[];
    return rows.map((r) => ({
      signature: r.signature,
      outcome: r.outcome,
      sessionId: r.session_id ?? undefined,
      taskId: r.task_id ?? undefined,
      hints: r.hints === null ? undefined : parseHints(r.hints),
      error: r.error ?? undefined,
      at: r.at,
    }));
  }
}

/** Load the built-in fixes for every role and error category. */
export async function seedRemedies(memory: SeedableMemory, roles: readonly WorkerRole[] = WORKER_ROLES): Promise<number> {
  let seeded = 0;
  for (const role of roles) {
    for (const category of ERROR_CATEGORIES) {
      const hints = SUGGESTED_FIXES[category];
      if (hints.length === 0) continue;
      await memory.seed(signatureOf(role, category), hints);
      seeded++;
    }
  }
  log.debug(`Seeded ${seeded} remedies`);
  return seeded;
}
