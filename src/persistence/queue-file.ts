import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { Session, Subtask } from "../planner/types.js";
import { parseOrThrow, QUEUE_FILE_VERSION, QueueFileSchema, type QueueFile } from "../schemas.js";

export function queueFilePath(dir: string, sessionId: string): string {
  return join(dir, `${sessionId}.queue.json`);
}

export function buildQueueFile(session: Session, subtasks: Subtask[]): QueueFile {
  return {
    version: QUEUE_FILE_VERSION,
    session,
    tasks: Object.fromEntries(subtasks.map((t) => [t.id, t])),
    dag: Object.fromEntries(subtasks.map((t) => [t.id, t.dependencies])),
    executionOrder: session.executionOrder,
  };
}

/** Write through a temp file and rename, so readers never see a half-written queue. */
export function writeQueueFile(path: string, queue: QueueFile): void {
  const tempPath = `${path}.tmp.${process.pid}.${Date.now()}`;
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(tempPath, JSON.stringify(queue, null, 2), "utf-8");
  renameSync(tempPath, path);
}

export function readQueueFile(path: string): QueueFile {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parseOrThrow(QueueFileSchema, raw, `queue file ${path}`);
}
