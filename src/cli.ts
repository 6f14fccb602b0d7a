#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { HttpAdapter } from "./agents/http-adapter.js";
import { configure } from "./config.js";
import { errorMessage } from "./errors.js";
import { Orchestrator, type SessionReport, type StartOptions } from "./orchestrator.js";
import { COMPLEXITIES, WORKER_ROLES, type Complexity, type WorkerRole } from "./planner/types.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

type GlobalOptions = {
  db?: string;
  queueDir?: string;
  worker?: WorkerBinding[];
  debug?: boolean;
  quiet?: boolean;
};

type WorkerBinding = { role: WorkerRole; url: string };

function isRole(value: string): value is WorkerRole {
  return (WORKER_ROLES as readonly string[]).includes(value);
}

function isComplexity(value: string): value is Complexity {
  return (COMPLEXITIES as readonly string[]).includes(value);
}

function parseWorker(value: string, previous: WorkerBinding[] = []): WorkerBinding[] {
  const eq = value.indexOf("=");
  const role = eq === -1 ? "" : value.slice(0, eq);
  const url = eq === -1 ? "" : value.slice(eq + 1);
  if (!isRole(role) || !url) {
    throw new InvalidArgumentError(`Expected <role>=<url> with role one of ${WORKER_ROLES.join(", ")}`);
  }
  return [...previous, { role, url }];
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer");
  return n;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer");
  return n;
}

function parseComplexity(value: string): Complexity {
  if (!isComplexity(value)) throw new InvalidArgumentError(`Expected one of ${COMPLEXITIES.join(", ")}`);
  return value;
}

const program = new Command();

program
  .name("taskgraph")
  .description("Decompose a goal into a task graph and run it on role workers")
  .version("0.1.0")
  .option("--db <path>", "SQLite database file")
  .option("--queue-dir <dir>", "Write a queue file per session into this directory")
  .option("-w, --worker <role=url>", "Bind an HTTP worker to a role (repeatable)", parseWorker)
  .option("--debug", "Enable debug logging")
  .option("-q, --quiet", "Only log errors");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<GlobalOptions>();
  if (opts.debug) setLogLevel("debug");
  else if (opts.quiet) setLogLevel("error");
  if (opts.queueDir) configure({ persistence: { queueDir: opts.queueDir } });
});

function buildOrchestrator(opts: GlobalOptions): Orchestrator {
  const orch = new Orchestrator({ dbPath: opts.db });
  for (const { role, url } of opts.worker ?? []) {
    orch.addWorker(new HttpAdapter({ name: `${role}@${url}`, role, url }));
  }
  return orch;
}

function printReport(report: SessionReport): void {
  console.log(`\nSession ${report.sessionId} (${report.mainTaskId}): ${report.state}, result ${report.status}`);
  console.log(report.summary);
  if (report.artifacts.length > 0) {
    console.log("\nArtifacts:");
    for (const a of report.artifacts) console.log(`  ${a.action} ${a.path} (${a.taskId})`);
  }
  if (report.discarded.length > 0) {
    console.log("\nDiscarded:");
    for (const d of report.discarded) console.log(`  ${d.action} ${d.path} by ${d.taskId}, kept ${d.supersededBy}`);
  }
  if (report.unmet.length > 0) {
    console.log(`\nUnmet: ${report.unmet.map((u) => `${u.id} [${u.status}]`).join(", ")}`);
  }
  if (report.error) console.log(`\nError: ${report.error}`);
  console.log(`\nProgress: ${report.progress.counts.completed}/${report.progress.total} (${report.progress.percent}%)`);
}

async function withOrchestrator(cmd: Command, fn: (orch: Orchestrator) => Promise<void>): Promise<void> {
  const orch = buildOrchestrator(cmd.optsWithGlobals<GlobalOptions>());
  try {
    await fn(orch);
  } catch (err) {
    console.error("Error:", errorMessage(err));
    process.exitCode = 1;
  } finally {
    await orch.shutdown();
  }
}

type StartFlags = { type?: string; concurrency?: number; complexity?: Complexity; retries?: number; timeout?: number };

function startOptions(flags: StartFlags): StartOptions {
  return {
    taskType: flags.type,
    concurrencyLimit: flags.concurrency,
    complexity: flags.complexity,
    maxRetries: flags.retries,
    timeoutMs: flags.timeout,
  };
}

function withStartFlags(cmd: Command): Command {
  return cmd
    .option("-t, --type <taskType>", "Task type (development, refactor, test, docs, research)")
    .option("-c, --concurrency <n>", "Max subtasks running at once", parsePositiveInt)
    .option("--complexity <level>", "Override the detected complexity", parseComplexity)
    .option("-r, --retries <n>", "Max retries per subtask", parseNonNegativeInt)
    .option("--timeout <ms>", "Heartbeat timeout per subtask", parsePositiveInt);
}

// --- run ---
withStartFlags(
  program
    .command("run")
    .description("Decompose a goal and run it to completion")
    .argument("<goal>", "The goal to accomplish"),
).action(async function (this: Command, goal: string, flags: StartFlags) {
  await withOrchestrator(this, async (orch) => {
    const report = await orch.run(goal, startOptions(flags));
    printReport(report);
    if (report.status !== "success") process.exitCode = 1;
  });
});

// --- plan ---
withStartFlags(
  program
    .command("plan")
    .description("Show the task graph a goal decomposes into, without running it")
    .argument("<goal>", "The goal to decompose"),
).action(async function (this: Command, goal: string, flags: StartFlags) {
  await withOrchestrator(this, async (orch) => {
    console.log(JSON.stringify(orch.plan(goal, startOptions(flags)), null, 2));
  });
});

// --- resume ---
program
  .command("resume")
  .description("Resume a persisted session")
  .argument("[sessionId]", "Session to resume")
  .option("-f, --queue-file <path>", "Resume from a queue file instead")
  .action(async function (this: Command, sessionId: string | undefined, flags: { queueFile?: string }) {
    await withOrchestrator(this, async (orch) => {
      let id: string;
      if (flags.queueFile) id = orch.resumeFromQueueFile(flags.queueFile);
      else if (sessionId) id = orch.resume(sessionId);
      else throw new InvalidArgumentError("Give a session id or --queue-file");
      printReport(await orch.wait(id));
    });
  });

// --- status ---
program
  .command("status")
  .description("Show per-subtask state and progress")
  .argument("<sessionId>")
  .action(async function (this: Command, sessionId: string) {
    await withOrchestrator(this, async (orch) => {
      const status = orch.status(sessionId);
      console.log(`Session ${sessionId}: ${status.state} (${status.progress.percent}%)`);
      for (const t of status.tasks) {
        const reason = t.failureReason ? ` ${t.failureReason}` : "";
        console.log(`  [${t.status}] ${t.id} (${t.role}) attempt ${t.attemptCount + 1}, ${t.progress}%${reason}`);
      }
    });
  });

// --- result ---
program
  .command("result")
  .description("Print the aggregated result, partial while the session runs")
  .argument("<sessionId>")
  .option("--json", "Print as JSON")
  .action(async function (this: Command, sessionId: string, flags: { json?: boolean }) {
    await withOrchestrator(this, async (orch) => {
      const report = orch.result(sessionId);
      if (flags.json) console.log(JSON.stringify(report, null, 2));
      else printReport(report);
    });
  });

// --- cancel ---
program
  .command("cancel")
  .description("Cancel a session")
  .argument("<sessionId>")
  .action(async function (this: Command, sessionId: string) {
    await withOrchestrator(this, async (orch) => {
      const cancelled = await orch.cancel(sessionId);
      console.log(cancelled ? `Session ${sessionId} cancelled` : `Session ${sessionId} had already finished`);
    });
  });

// --- sessions ---
program
  .command("sessions")
  .description("List recent sessions")
  .option("-n, --limit <n>", "How many", parsePositiveInt)
  .action(async function (this: Command, flags: { limit?: number }) {
    await withOrchestrator(this, async (orch) => {
      for (const s of orch.sessions(flags.limit)) {
        console.log(`${s.id}  ${s.state.padEnd(10)} ${s.taskType.padEnd(12)} ${new Date(s.createdAt).toISOString()}  ${s.goal}`);
      }
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
