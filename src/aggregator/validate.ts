import type { Subtask } from "../planner/types.js";
import type { AggregateResult } from "./aggregator.js";

export type ValidationIssue =
  | { kind: "unmet"; taskId: string; message: string }
  | { kind: "discarded"; taskId: string; path: string; message: string }
  | { kind: "rejected"; taskId: string; message: string };

export type ValidationReport = {
  ok: boolean;
  issues: ValidationIssue[];
};

/** Check an aggregate before it is reported: unmet work, dropped changes, reviewer rejections. */
export function validateResult(result: AggregateResult, subtasks: readonly Subtask[]): ValidationReport {
  const issues: ValidationIssue[] = [];

  for (const u of result.unmet) {
    const why = u.reason ? ` (${u.reason})` : "";
    issues.push({ kind: "unmet", taskId: u.id, message: `${u.id} ended ${u.status}${why}` });
  }

  for (const d of result.discarded) {
    issues.push({
      kind: "discarded",
      taskId: d.taskId,
      path: d.path,
      message: `${d.action} of ${d.path} by ${d.taskId} superseded by ${d.supersededBy}`,
    });
  }

  for (const task of subtasks) {
    if (task.role !== "reviewer" || task.status !== "completed") continue;
    if (task.outputPayload?.approved === false) {
      issues.push({ kind: "rejected", taskId: task.id, message: `${task.id} did not approve the result` });
    }
  }

  return { ok: issues.length === 0, issues };
}
