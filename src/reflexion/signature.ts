import type { FailureReason, WorkerRole } from "../planner/types.js";

export const ERROR_CATEGORIES = [
  "file_not_found",
  "module_not_found",
  "permission_denied",
  "syntax_error",
  "timeout",
  "network_error",
  "invalid_output",
  "unknown",
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

/** Checked in order; the first match wins. */
const MESSAGE_PATTERNS: ReadonlyArray<readonly [ErrorCategory, RegExp]> = [
  ["file_not_found", /filenotfound|no such file|enoent/i],
  ["module_not_found", /modulenotfound|no module named|cannot find module|err_module_not_found/i],
  ["permission_denied", /permissionerror|permission denied|eacces|eperm/i],
  ["syntax_error", /syntaxerror|unexpected token/i],
  ["timeout", /timeout|timed out/i],
  ["network_error", /connection|network|econnrefused|econnreset|fetch failed/i],
];

/** Built-in remedies offered the first time a category is seen. */
export const SUGGESTED_FIXES: Record<ErrorCategory, string[]> = {
  file_not_found: ["Check the file path", "Create the missing file", "Confirm the working directory"],
  module_not_found: ["Install the missing dependency", "Check the active environment", "Confirm the module name"],
  permission_denied: ["Check file permissions", "Close programs holding the file", "Avoid read-only locations"],
  syntax_error: ["Check the syntax", "Fix indentation", "Confirm the file encoding"],
  timeout: ["Split the work into smaller steps", "Check network reachability", "Report progress more often"],
  network_error: ["Check the network connection", "Check DNS resolution", "Check firewall settings"],
  invalid_output: ["Return output matching the role contract", "Include only the documented fields"],
  unknown: [],
};

export function categorize(message: string, reason?: FailureReason): ErrorCategory {
  if (reason === "timeout") return "timeout";
  if (reason === "invalid_output") return "invalid_output";
  for (const [category, pattern] of MESSAGE_PATTERNS) {
    if (pattern.test(message)) return category;
  }
  return "unknown";
}

/** Normalized failure key: `role:category`, e.g. `coder:syntax_error`. */
export function signatureOf(role: WorkerRole, category: ErrorCategory): string {
  return `${role}:${category}`;
}
