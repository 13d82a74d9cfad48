import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import type { AuditEvent } from "./audit-log.js";
import { AutomationHost, type ReportRunner } from "./automation-host.js";
import type { OutputListener, ReportTaskResult, RunningReportTask } from "./report-task-runner.js";
import { ScheduleFileStore } from "./schedule-store.js";
import type { UpsertScheduleInput } from "./schedule-types.js";
import { SchedulerService } from "./scheduler-service.js";

type FakeRun = {
  running: RunningReportTask;
  onOutput?: OutputListener;
  finish: (exitCode: number | null, signal?: NodeJS.Signals | null) => void;
};

class FakeReportRunner implements ReportRunner {
  readonly starts: Array<{ task: string; runDate: string }> = [];
  readonly kills: string[] = [];
  readonly runs: FakeRun[] = [];
  failNext: Error | null = null;

  start(task: string, runDate: string, onOutput?: OutputListener): RunningReportTask {
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }
    this.starts.push({ task, runDate });
    const reportTask = {
      id: `fake-${this.starts.length}`,
      task,
      runDate,
      command: "report",
      args: [task, runDate],
      cwd: "/tmp",
      startedAt: 0,
      status: "running" as const,
    };
    let resolveDone: (result: ReportTaskResult) => void = () => undefined;
    const done = new Promise<ReportTaskResult>((resolve) => {
      resolveDone = resolve;
    });
    const running: RunningReportTask = { task: reportTask, done };
    this.runs.push({
      running,
      ...(onOutput ? { onOutput } : {}),
      finish: (exitCode, signal = null) =>
        resolveDone({ task: reportTask, stdout: "", stderr: "", timedOut: false, exitCode, signal, finishedAt: 0 }),
    });
    return running;
  }

  kill(taskId: string): boolean {
    this.kills.push(taskId);
    return true;
  }

  latest(): FakeRun {
    const run = this.runs.at(-1);
    assert.ok(run, "no run started");
    return run;
  }
}

function scheduleInput(overrides: Partial<UpsertScheduleInput> = {}): UpsertScheduleInput {
  return {
    key: "marketing_reports",
    name: "Marketing Reports",
    task: "all",
    recurrence: "daily",
    timeOfDay: "07:00",
    startDate: "2025-01-10",
    ...overrides,
  };
}

async function setup() {
  let current = new Date(2025, 0, 10, 6, 0, 0);
  const now = () => current;
  const setNow = (next: Date) => {
    current = next;
  };
  const logDir = await fs.mkdtemp(path.join(os.tmpdir(), "report-scheduler-host-"));
  const store = new ScheduleFileStore({ filePath: ":memory:", now });
  await store.load();
  const runner = new FakeReportRunner();
  const events: AuditEvent[] = [];
  const host = new AutomationHost({
    store,
    runner,
    logDir,
    now,
    audit: {
      log: async (event) => {
        events.push(event);
      },
    },
  });
  const scheduler = new SchedulerService({
    store,
    onJobDue: (schedule) => host.onScheduleDue(schedule),
    canStart: () => host.canStart(),
    now,
  });
  host.attachScheduler(scheduler);
  const cleanup = async () => {
    store.close();
    await fs.rm(logDir, { recursive: true, force: true });
  };
  return { store, runner, host, scheduler, events, logDir, setNow, cleanup };
}

test("scheduled run executes for yesterday, writes its log and reports success", async () => {
  const { store, runner, host, scheduler, events, logDir, setNow, cleanup } = await setup();
  const saved = store.upsertSchedule(scheduleInput());

  setNow(new Date(2025, 0, 10, 7, 0, 5));
  assert.equal(await scheduler.tick(), "dispatched");
  assert.deepEqual(runner.starts, [{ task: "all", runDate: "09-Jan-2025" }]);
  assert.equal(host.canStart(), false);

  const running = store.get(saved.id);
  assert.equal(running?.lastStatus, "running");
  assert.equal(running?.lastMessage, "Triggered automatically");

  const logPath = path.join(logDir, "scheduled_all_reports_20250110_070005.log");
  const status = host.status();
  assert.equal(status.running, true);
  assert.equal(status.origin, "scheduled");
  assert.equal(status.scheduleId, saved.id);
  assert.equal(status.currentLogPath, logPath);
  assert.equal(status.statusText, "Scheduled run: Running All reports for 09-Jan-2025...");

  runner.latest().onOutput?.("report row 1", "stdout");
  runner.latest().finish(0);
  await host.whenIdle();

  const completed = store.get(saved.id);
  assert.equal(completed?.lastStatus, "success");
  assert.equal(completed?.lastMessage, "completed successfully");
  assert.equal(completed?.lastLogPath, logPath);
  assert.equal(completed?.nextRun, "2025-01-11 07:00:00");
  assert.equal(scheduler.getActiveScheduleId(), null);
  assert.equal(host.status().statusText, "All reports completed successfully for 09-Jan-2025");
  assert.equal(host.status().lastLogPath, logPath);

  const content = await fs.readFile(logPath, "utf8");
  assert.equal(
    content,
    `All reports for 09-Jan-2025 (scheduled)\nStarted: 2025-01-10 07:00:05\n${"-".repeat(60)}\nreport row 1\n`,
  );
  assert.deepEqual(
    events.map((event) => event.type),
    ["run.started", "run.finished"],
  );
  await cleanup();
});

test("non-zero exit marks the scheduled run failed and still advances", async () => {
  const { store, runner, host, scheduler, setNow, cleanup } = await setup();
  const saved = store.upsertSchedule(scheduleInput({ task: "daily", runForDaysAgo: 0 }));

  setNow(new Date(2025, 0, 10, 7, 0, 5));
  await scheduler.tick();
  assert.deepEqual(runner.starts, [{ task: "daily", runDate: "10-Jan-2025" }]);
  runner.latest().finish(2);
  await host.whenIdle();

  const stored = store.get(saved.id);
  assert.equal(stored?.lastStatus, "failed");
  assert.equal(stored?.lastMessage, "finished with issues");
  assert.equal(stored?.nextRun, "2025-01-11 07:00:00");
  await cleanup();
});

test("a process that cannot start fails the schedule and frees the host", async () => {
  const { store, runner, host, scheduler, setNow, cleanup } = await setup();
  const saved = store.upsertSchedule(scheduleInput());
  runner.failNext = new Error("spawn EACCES");

  setNow(new Date(2025, 0, 10, 7, 0, 5));
  assert.equal(await scheduler.tick(), "failed");
  assert.equal(host.canStart(), true);
  assert.equal(scheduler.getActiveScheduleId(), null);

  const stored = store.get(saved.id);
  assert.equal(stored?.lastStatus, "failed");
  assert.equal(stored?.lastMessage, "Failed to start: spawn EACCES");
  assert.equal(stored?.nextRun, "2025-01-11 07:00:00");
  assert.ok(host.readLog().entries.some((entry) => entry.line === "Failed to start process: spawn EACCES"));
  await cleanup();
});

test("a due schedule is declined while a manual run is active", async () => {
  const { store, runner, host, setNow, cleanup } = await setup();
  const saved = store.upsertSchedule(scheduleInput());
  setNow(new Date(2025, 0, 10, 7, 0, 5));

  assert.deepEqual(host.runManual("daily", ""), { ok: true, message: "Started daily for 09-Jan-2025" });
  const schedule = store.get(saved.id);
  assert.ok(schedule);
  assert.equal(host.onScheduleDue(schedule), false);
  assert.ok(
    host
      .readLog()
      .entries.some((entry) => entry.line === "Scheduled job is due but another run is active. Will retry soon."),
  );
  assert.deepEqual(host.runManual("all", ""), { ok: false, reason: "busy", error: "A task is already running" });
  assert.equal(runner.starts.length, 1);

  runner.latest().finish(0);
  await host.whenIdle();
  assert.equal(store.get(saved.id)?.lastStatus, undefined);
  await cleanup();
});

test("manual runs validate the date", async () => {
  const { runner, host, cleanup } = await setup();
  assert.deepEqual(host.runManual("all", "2025-01-09"), {
    ok: false,
    reason: "invalid_date",
    error: "Invalid date format. Use DD-MMM-YYYY.",
  });
  assert.deepEqual(host.runManual("order", "15-Dec-2024"), { ok: true, message: "Started order for 15-Dec-2024" });
  assert.deepEqual(runner.starts, [{ task: "order", runDate: "15-Dec-2024" }]);
  runner.latest().finish(0);
  await host.whenIdle();
  await cleanup();
});

test("stop kills the active run and reports it as stopped", async () => {
  const { runner, host, events, cleanup } = await setup();
  assert.deepEqual(host.stop(), { ok: false, reason: "idle", error: "No task is running" });

  host.runManual("daily", "09-Jan-2025");
  assert.deepEqual(host.stop(), { ok: true, message: "Stop requested" });
  assert.equal(host.status().statusText, "Stopping run...");
  assert.deepEqual(runner.kills, ["fake-1"]);

  runner.latest().finish(null, "SIGTERM");
  await host.whenIdle();
  assert.equal(host.status().running, false);
  assert.equal(host.status().statusText, "Daily Report stopped by user for 09-Jan-2025");
  assert.deepEqual(
    events.map((event) => event.type),
    ["run.started", "run.stop_requested", "run.finished"],
  );
  await cleanup();
});

test("run-schedule-now triggers a saved schedule outside its recurrence", async () => {
  const { store, runner, host, cleanup } = await setup();
  assert.deepEqual(host.runScheduleNow("marketing_reports"), {
    ok: false,
    reason: "not_found",
    error: "No schedule configured",
  });

  store.upsertSchedule(scheduleInput({ runForDaysAgo: 2 }));
  assert.deepEqual(host.runScheduleNow("marketing_reports"), { ok: true, message: "Schedule triggered" });
  assert.deepEqual(runner.starts, [{ task: "all", runDate: "08-Jan-2025" }]);
  runner.latest().finish(0);
  await host.whenIdle();
  assert.equal(store.getByKey("marketing_reports")?.lastStatus, "success");
  await cleanup();
});

test("log feed keeps the most recent lines and supports incremental reads", async () => {
  const { host, cleanup } = await setup();
  const small = new AutomationHost({
    store: { getByKey: () => null, markRunning: () => undefined, markCompleted: () => null },
    runner: new FakeReportRunner(),
    logDir: os.tmpdir(),
    logFeedSize: 3,
  });
  const seen: string[] = [];
  const unsubscribe = small.onLog((entry) => seen.push(entry.line));
  for (const line of ["a", "b", "c", "d"]) {
    small.appendLog(line);
  }
  unsubscribe();
  small.appendLog("e");

  assert.deepEqual(seen, ["a", "b", "c", "d"]);
  const all = small.readLog();
  assert.deepEqual(
    all.entries.map((entry) => entry.line),
    ["c", "d", "e"],
  );
  assert.equal(all.lastSeq, 5);
  assert.deepEqual(
    small.readLog(4).entries.map((entry) => entry.line),
    ["e"],
  );
  assert.equal(host.readLog().lastSeq, 0);
  await cleanup();
});
