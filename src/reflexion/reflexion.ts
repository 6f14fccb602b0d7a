import type { TaskStore } from "../persistence/task-store.js";
import type { Payload, Subtask, SubtaskRef } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { ErrorMemory } from "./memory.js";
import { categorize, signatureOf, type ErrorCategory } from "./signature.js";

const log = createLogger("reflexion");

export type ReflexionDecision =
  | { action: "retry"; signature: string; category: ErrorCategory; hints?: string[] }
  | { action: "abort"; signature: string; category: ErrorCategory; reason: "retries_exhausted" };

function stringList(value: unknown): string[] | undefined {
  return Array.isArray(value) && value.every((v): v is string => typeof v === "string") ? value : undefined;
}

/** Hints the last attempt ran with, when it ran under this signature. */
function hintsInEffect(payload: Payload, signature: string): string[] | undefined {
  return payload.reflexionSignature === signature ? stringList(payload.remedyHints) : undefined;
}

/**
 * Decides what happens to a failed subtask: retry with a known remedy,
 * retry unchanged, or abort once its retries are spent. Every decision is
 * recorded in the error memory.
 */
export class Reflexion {
  private store: TaskStore;
  private memory: ErrorMemory;

  constructor(store: TaskStore, memory: ErrorMemory) {
    this.store = store;
    this.memory = memory;
  }

  async handleFailure(failed: Subtask): Promise<{ decision: ReflexionDecision; subtask: Subtask }> {
    const ref: SubtaskRef = { sessionId: failed.sessionId, id: failed.id };
    const error = failed.errorMessage ?? "";
    const category = categorize(error, failed.failureReason);
    const signature = signatureOf(failed.role, category);
    const usedHints = hintsInEffect(failed.inputPayload, signature);

    if (failed.attemptCount >= failed.maxRetries) {
      const subtask = this.store.markStatus(ref, "aborted", "retries_exhausted", { expect: "failed" });
      await this.memory.record(signature, {
        outcome: "exhausted",
        sessionId: ref.sessionId,
        taskId: ref.id,
        hints: usedHints,
        error,
      });
      log.warn(`${ref.id}: retries exhausted (${signature})`, { attempts: failed.attemptCount + 1 });
      return { decision: { action: "abort", signature, category, reason: "retries_exhausted" }, subtask };
    }

    const remedy = await this.memory.lookup(signature);
    const inputPayload: Payload | undefined = remedy
      ? {
          ...failed.inputPayload,
          remedyHints: remedy.hints,
          previousError: error,
          reflexionSignature: signature,
        }
      : undefined;

    const subtask = this.store.markStatus(ref, "retrying", remedy ? "remedy_applied" : "retry", {
      expect: "failed",
      inputPayload,
    });
    await this.memory.record(signature, {
      outcome: "retried",
      sessionId: ref.sessionId,
      taskId: ref.id,
      hints: remedy?.hints,
      error,
    });
    log.info(`${ref.id}: retry ${subtask.attemptCount}/${subtask.maxRetries} (${signature})`, {
      remedy: remedy !== undefined,
    });
    return { decision: { action: "retry", signature, category, hints: remedy?.hints }, subtask };
  }

  /** A subtask completed after at least one retry; credit the remedy it ran with. */
  async recordSuccess(completed: Subtask): Promise<void> {
    if (completed.attemptCount === 0) return;
    const signature = completed.inputPayload.reflexionSignature;
    if (typeof signature !== "string") return;
    await this.memory.record(signature, {
      outcome: "resolved",
      sessionId: completed.sessionId,
      taskId: completed.id,
      hints: hintsInEffect(completed.inputPayload, signature),
    });
    log.info(`${completed.id}: resolved after ${completed.attemptCount} retries (${signature})`);
  }
}
