import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import { buildQueueFile, queueFilePath, readQueueFile, writeQueueFile } from "../src/persistence/queue-file.js";
import { createSession, makeSpec, memoryStore } from "./helpers.js";

describe("queue file", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "taskgraph-queue-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("names the file after the session", () => {
    expect(queueFilePath("/data/queues", "abc")).toBe(join("/data/queues", "abc.queue.json"));
  });

  it("maps subtasks and dependencies by id", () => {
    const store = memoryStore();
    const session = createSession(store, [makeSpec("a"), makeSpec("b", ["a"], { role: "tester" })]);
    const queue = buildQueueFile(session, store.list(session.id));

    expect(Object.keys(queue.tasks)).toEqual(["a", "b"]);
    expect(queue.tasks.b.role).toBe("tester");
    expect(queue.dag).toEqual({ a: [], b: ["a"] });
    expect(queue.executionOrder).toEqual([["a"], ["b"]]);
    store.close();
  });

  it("writes atomically and reads back what it wrote", () => {
    const store = memoryStore();
    const session = createSession(store, [makeSpec("a")]);
    const path = join(dir, "sub", queueFilePath("", session.id));

    writeQueueFile(path, store.snapshot(session.id));

    expect(readdirSync(join(dir, "sub"))).toEqual([`${session.id}.queue.json`]);
    const queue = readQueueFile(path);
    expect(queue.session.id).toBe(session.id);
    expect(queue.session.goal).toBe("test goal");
    expect(queue.tasks.a.status).toBe("pending");
    store.close();
  });

  it("rejects a file that does not match the schema", () => {
    const path = join(dir, "broken.queue.json");
    writeFileSync(path, JSON.stringify({ version: "2.0", tasks: {} }));

    let caught: unknown;
    try {
      readQueueFile(path);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: "VALIDATION_FAILED" });
    expect(String(caught)).toContain(`Invalid queue file ${path}`);
  });
});
