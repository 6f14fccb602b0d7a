import { ConflictError } from "../errors.js";
import type { FailureReason, SubtaskStatus } from "../planner/types.js";

const TRANSITIONS: Record<SubtaskStatus, readonly SubtaskStatus[]> = {
  pending: ["ready", "aborted"],
  ready: ["running", "aborted"],
  running: ["completed", "failed", "aborted"],
  failed: ["retrying", "aborted"],
  retrying: ["ready", "aborted"],
  completed: [],
  aborted: [],
};

/** Reasons that may move a pending subtask straight to aborted. */
const PENDING_ABORT_REASONS: readonly string[] = ["cancelled", "dependency_aborted", "unschedulable"];

/** `ready`, `running` and `retrying` subtasks are only aborted by cancelling the session. */
const CANCEL_ONLY: readonly SubtaskStatus[] = ["ready", "running", "retrying"];

export function canTransition(from: SubtaskStatus, to: SubtaskStatus, reason?: string): boolean {
  if (!TRANSITIONS[from].includes(to)) return false;
  if (to !== "aborted") return true;
  if (from === "pending") return reason !== undefined && PENDING_ABORT_REASONS.includes(reason);
  if (CANCEL_ONLY.includes(from)) return reason === ("cancelled" satisfies FailureReason);
  return true;
}

export function assertTransition(id: string, from: SubtaskStatus, to: SubtaskStatus, reason?: string): void {
  if (!canTransition(from, to, reason)) {
    throw new ConflictError(
      "INVALID_TRANSITION",
      `Subtask "${id}" cannot move from ${from} to ${to}${reason ? ` (${reason})` : ""}`,
    );
  }
}

export function nextStatuses(from: SubtaskStatus): readonly SubtaskStatus[] {
  return TRANSITIONS[from];
}
