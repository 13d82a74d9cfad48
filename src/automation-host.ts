import fs from "node:fs";
import path from "node:path";
import type { AuditEvent, AuditSink } from "./audit-log.js";
import { logWarn } from "./logger.js";
import { formatTimestamp } from "./recurrence.js";
import type { ReportTaskResult, ReportTaskRunner, RunningReportTask } from "./report-task-runner.js";
import {
  buildLogFileName,
  parseRunDate,
  targetDateForSchedule,
  taskLabel,
  formatRunDate,
  type RunOrigin,
} from "./run-dates.js";
import { errorMessage } from "./schedule-errors.js";
import type { Schedule } from "./schedule-types.js";
import type { ScheduleFileStore } from "./schedule-store.js";
import type { SchedulerService } from "./scheduler-service.js";

export type ReportRunner = Pick<ReportTaskRunner, "start" | "kill">;

export type HostStore = Pick<ScheduleFileStore, "getByKey" | "markRunning" | "markCompleted">;

export type CompletionReporter = Pick<SchedulerService, "markRunComplete">;

export type LogEntry = {
  seq: number;
  at: string;
  line: string;
};

export type HostStatus = {
  running: boolean;
  statusText: string;
  currentTask?: string;
  currentDate?: string;
  origin: RunOrigin;
  scheduleId?: number;
  startedAt?: string;
  currentLogPath?: string;
  lastLogPath?: string;
};

export type HostActionResult =
  | { ok: true; message: string }
  | { ok: false; reason: "busy" | "invalid_date" | "not_found" | "idle" | "start_failed"; error: string };

export type AutomationHostOptions = {
  store: HostStore;
  runner: ReportRunner;
  logDir: string;
  audit?: AuditSink;
  logFeedSize?: number;
  now?: () => Date;
};

/** In-flight attempt. Task and date are copied at dispatch, so edits to the schedule do not reach it. */
type ActiveRun = {
  taskId: string;
  task: string;
  runDate: string;
  origin: RunOrigin;
  scheduleId?: number;
  startedAt: string;
  logPath?: string;
  logStream?: fs.WriteStream;
};

const DEFAULT_LOG_FEED_SIZE = 2_000;

function originLabel(origin: RunOrigin): string {
  return origin === "scheduled" ? "Scheduled run" : "Manual run";
}

/**
 * The execution side of the scheduler: launches one report task at a time,
 * streams its output to a per-run log file and an in-memory feed, and reports
 * scheduled outcomes back to the scheduler.
 */
export class AutomationHost {
  private readonly store: HostStore;
  private readonly runner: ReportRunner;
  private readonly logDir: string;
  private readonly audit?: AuditSink;
  private readonly logFeedSize: number;
  private readonly now: () => Date;

  private scheduler: CompletionReporter | null = null;
  private active: ActiveRun | null = null;
  private stopRequested = false;
  private lastLogPath: string | undefined;
  private lastOrigin: RunOrigin = "manual";
  private statusText = "Idle";
  private readonly feed: LogEntry[] = [];
  private nextSeq = 1;
  private readonly listeners = new Set<(entry: LogEntry) => void>();
  private readonly pendingRuns = new Set<Promise<void>>();

  constructor(options: AutomationHostOptions) {
    this.store = options.store;
    this.runner = options.runner;
    this.logDir = path.resolve(options.logDir);
    this.audit = options.audit;
    this.logFeedSize = Math.max(1, options.logFeedSize ?? DEFAULT_LOG_FEED_SIZE);
    this.now = options.now ?? (() => new Date());
  }

  attachScheduler(scheduler: CompletionReporter): void {
    this.scheduler = scheduler;
  }

  canStart(): boolean {
    return this.active === null;
  }

  /** Execution callback for the scheduler: false when another run is in progress. */
  onScheduleDue(schedule: Schedule): boolean {
    if (this.active) {
      this.appendLog("Scheduled job is due but another run is active. Will retry soon.");
      return false;
    }
    this.store.markRunning(schedule.id, "Triggered automatically");
    const runDate = formatRunDate(targetDateForSchedule(schedule.runForDaysAgo, this.now()));
    this.startRun(schedule.task, runDate, "scheduled", schedule.id);
    return true;
  }

  runManual(task: string, dateInput: string | undefined): HostActionResult {
    if (this.active) {
      return { ok: false, reason: "busy", error: "A task is already running" };
    }
    const parsed = parseRunDate(dateInput, this.now());
    if (!parsed) {
      return { ok: false, reason: "invalid_date", error: "Invalid date format. Use DD-MMM-YYYY." };
    }
    try {
      this.startRun(task, parsed.label, "manual");
    } catch (error) {
      return { ok: false, reason: "start_failed", error: errorMessage(error) };
    }
    return { ok: true, message: `Started ${task} for ${parsed.label}` };
  }

  /** Runs a saved schedule immediately, outside its recurrence; next_run still advances on completion. */
  runScheduleNow(key: string): HostActionResult {
    if (this.active) {
      return { ok: false, reason: "busy", error: "A task is already running" };
    }
    const schedule = this.store.getByKey(key);
    if (!schedule) {
      return { ok: false, reason: "not_found", error: "No schedule configured" };
    }
    try {
      this.onScheduleDue(schedule);
    } catch (error) {
      const message = `Failed to start: ${errorMessage(error)}`;
      this.reportCompletion(schedule.id, false, message, undefined);
      return { ok: false, reason: "start_failed", error: message };
    }
    return { ok: true, message: "Schedule triggered" };
  }

  stop(): HostActionResult {
    const run = this.active;
    if (!run) {
      return { ok: false, reason: "idle", error: "No task is running" };
    }
    this.stopRequested = true;
    this.setStatus("Stopping run...");
    this.appendLog("Stop requested - terminating process...");
    this.recordAudit({ type: "run.stop_requested", scheduleId: run.scheduleId, details: { task: run.task } });
    this.runner.kill(run.taskId);
    return { ok: true, message: "Stop requested" };
  }

  status(): HostStatus {
    const run = this.active;
    return {
      running: run !== null,
      statusText: this.statusText,
      origin: run?.origin ?? this.lastOrigin,
      ...(run
        ? {
            currentTask: run.task,
            currentDate: run.runDate,
            startedAt: run.startedAt,
            ...(run.scheduleId !== undefined ? { scheduleId: run.scheduleId } : {}),
            ...(run.logPath ? { currentLogPath: run.logPath } : {}),
          }
        : {}),
      ...(this.lastLogPath ? { lastLogPath: this.lastLogPath } : {}),
    };
  }

  readLog(afterSeq = 0): { entries: LogEntry[]; lastSeq: number } {
    return {
      entries: this.feed.filter((entry) => entry.seq > afterSeq),
      lastSeq: this.nextSeq - 1,
    };
  }

  onLog(listener: (entry: LogEntry) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  appendLog(line: string): void {
    const entry: LogEntry = { seq: this.nextSeq, at: formatTimestamp(this.now()), line };
    this.nextSeq += 1;
    this.feed.push(entry);
    if (this.feed.length > this.logFeedSize) {
      this.feed.splice(0, this.feed.length - this.logFeedSize);
    }
    for (const listener of this.listeners) {
      listener(entry);
    }
  }

  /** Resolves once every run started so far has finished and reported back. */
  async whenIdle(): Promise<void> {
    while (this.pendingRuns.size > 0) {
      await Promise.all([...this.pendingRuns]);
    }
  }

  private startRun(task: string, runDate: string, origin: RunOrigin, scheduleId?: number): void {
    const label = taskLabel(task);
    const startedAt = this.now();
    const logPath = this.openLogFile(origin, task, label, runDate, startedAt);

    this.stopRequested = false;
    this.lastLogPath = undefined;
    this.lastOrigin = origin;

    let running: RunningReportTask;
    try {
      running = this.runner.start(task, runDate, (line) => this.handleOutput(line));
    } catch (error) {
      this.appendLog(`Failed to start process: ${errorMessage(error)}`);
      this.setStatus("Failed to start process");
      throw error;
    }

    this.active = {
      taskId: running.task.id,
      task,
      runDate,
      origin,
      ...(scheduleId !== undefined ? { scheduleId } : {}),
      startedAt: formatTimestamp(startedAt),
      ...(logPath ? { logPath, logStream: this.createLogStream(logPath) } : {}),
    };

    this.setStatus(`${originLabel(origin)}: Running ${label} for ${runDate}...`);
    this.appendLog("=".repeat(80));
    this.appendLog(`${originLabel(origin)} - ${label} for ${runDate}`);
    this.appendLog("=".repeat(80));
    this.recordAudit({ type: "run.started", scheduleId, details: { task, runDate, origin } });

    const pending = this.watchRun(running).catch((error: unknown) => {
      logWarn(`Run completion handling failed: ${errorMessage(error)}`, "host");
    });
    this.pendingRuns.add(pending);
    void pending.finally(() => this.pendingRuns.delete(pending));
  }

  private async watchRun(running: RunningReportTask): Promise<void> {
    const result = await running.done;
    const run = this.active;
    if (!run || run.taskId !== running.task.id) {
      return;
    }
    await this.closeLogStream(run);
    this.finishRun(run, result);
  }

  private finishRun(run: ActiveRun, result: ReportTaskResult): void {
    const label = taskLabel(run.task);
    const stopped = this.stopRequested;
    const success = !stopped && !result.timedOut && result.exitCode === 0;
    const outcome = stopped ? "stopped by user" : success ? "completed successfully" : "finished with issues";

    this.appendLog(`${label} ${outcome} for ${run.runDate}`);
    this.setStatus(`${label} ${outcome} for ${run.runDate}`);

    this.active = null;
    this.stopRequested = false;
    this.lastLogPath = run.logPath;

    if (run.scheduleId !== undefined) {
      this.reportCompletion(run.scheduleId, success, outcome, run.logPath);
    }
    this.recordAudit({
      type: "run.finished",
      scheduleId: run.scheduleId,
      details: {
        task: run.task,
        runDate: run.runDate,
        origin: run.origin,
        success,
        outcome,
        exitCode: result.exitCode,
        timedOut: result.timedOut,
      },
    });
  }

  private reportCompletion(scheduleId: number, success: boolean, message: string, logPath: string | undefined): void {
    try {
      if (this.scheduler) {
        this.scheduler.markRunComplete(scheduleId, success, message, logPath);
      } else {
        this.store.markCompleted(scheduleId, success, message, logPath);
      }
    } catch (error) {
      logWarn(`Failed to record completion for schedule ${scheduleId}: ${errorMessage(error)}`, "host");
      this.appendLog(`Failed to record schedule outcome: ${errorMessage(error)}`);
    }
  }

  private handleOutput(line: string): void {
    this.appendLog(line);
    const stream = this.active?.logStream;
    if (stream && !stream.writableEnded) {
      stream.write(`${line}\n`);
    }
  }

  private openLogFile(origin: RunOrigin, task: string, label: string, runDate: string, now: Date): string | undefined {
    try {
      fs.mkdirSync(this.logDir, { recursive: true });
      const filePath = path.join(this.logDir, buildLogFileName(origin, task, now));
      const header = `${label} for ${runDate} (${origin})\nStarted: ${formatTimestamp(now)}\n${"-".repeat(60)}\n`;
      fs.writeFileSync(filePath, header, "utf8");
      return filePath;
    } catch (error) {
      logWarn(`Could not create run log file: ${errorMessage(error)}`, "host");
      return undefined;
    }
  }

  private createLogStream(logPath: string): fs.WriteStream {
    const stream = fs.createWriteStream(logPath, { flags: "a", encoding: "utf8" });
    stream.on("error", (error) => {
      logWarn(`Run log write failed (${logPath}): ${error.message}`, "host");
    });
    return stream;
  }

  private closeLogStream(run: ActiveRun): Promise<void> {
    const stream = run.logStream;
    if (!stream || stream.writableEnded) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      stream.end(() => resolve());
    });
  }

  private setStatus(text: string): void {
    this.statusText = text;
  }

  private recordAudit(event: AuditEvent): void {
    if (!this.audit) {
      return;
    }
    this.audit.log(event).catch((error: unknown) => {
      logWarn(`Audit log write failed: ${errorMessage(error)}`, "host");
    });
  }
}
