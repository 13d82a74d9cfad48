import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import path from "node:path";

export type ReportTaskStatus = "running" | "completed" | "failed" | "killed" | "timeout";

export type ReportTask = {
  id: string;
  task: string;
  runDate: string;
  command: string;
  args: string[];
  cwd: string;
  startedAt: number;
  status: ReportTaskStatus;
  pid?: number;
};

export type ReportTaskResult = {
  task: ReportTask;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  finishedAt: number;
};

export type RunningReportTask = {
  task: ReportTask;
  done: Promise<ReportTaskResult>;
};

export type ReportTaskRunnerOptions = {
  command: string;
  baseArgs?: string[];
  cwd: string;
  timeoutMs: number;
  maxStdioChars: number;
  killGraceMs?: number;
  env?: NodeJS.ProcessEnv;
};

export type OutputListener = (line: string, stream: "stdout" | "stderr") => void;

type RunningEntry = RunningReportTask & {
  child: ChildProcessWithoutNullStreams;
};

function appendTruncated(base: string, chunk: string, maxChars: number): string {
  const next = base + chunk;
  if (next.length <= maxChars) {
    return next;
  }
  return next.slice(next.length - maxChars);
}

function buildTaskId(): string {
  return `rpt-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/** Splits streamed chunks into whole lines, holding the trailing partial line back. */
function createLineSplitter(emit: (line: string) => void): { push: (chunk: string) => void; flush: () => void } {
  let pending = "";
  return {
    push(chunk) {
      pending += chunk;
      const parts = pending.split(/\r?\n/);
      pending = parts.pop() ?? "";
      for (const part of parts) {
        emit(part);
      }
    },
    flush() {
      if (pending) {
        emit(pending);
        pending = "";
      }
    },
  };
}

/**
 * Launches the external report command as a child process:
 * `<command> ...baseArgs <task> <run date>`. No shell is involved.
 */
export class ReportTaskRunner {
  private readonly running = new Map<string, RunningEntry>();
  private readonly command: string;
  private readonly baseArgs: string[];
  private readonly cwd: string;
  private readonly timeoutMs: number;
  private readonly maxStdioChars: number;
  private readonly killGraceMs: number;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ReportTaskRunnerOptions) {
    this.command = options.command;
    this.baseArgs = options.baseArgs ?? [];
    this.cwd = path.resolve(process.cwd(), options.cwd);
    this.timeoutMs = options.timeoutMs;
    this.maxStdioChars = options.maxStdioChars;
    this.killGraceMs = options.killGraceMs ?? 1_000;
    this.env = options.env ?? process.env;
  }

  listRunning(): ReportTask[] {
    return [...this.running.values()].map((item) => item.task).sort((a, b) => a.startedAt - b.startedAt);
  }

  /** SIGTERM first, SIGKILL when the process is still around after the grace period. */
  kill(taskId: string): boolean {
    const entry = this.running.get(taskId);
    if (!entry) {
      return false;
    }
    const killed = entry.child.kill("SIGTERM");
    const escalation = setTimeout(() => {
      if (this.running.has(taskId)) {
        entry.child.kill("SIGKILL");
      }
    }, this.killGraceMs);
    escalation.unref();
    return killed;
  }

  killAll(): number {
    let count = 0;
    for (const id of [...this.running.keys()]) {
      if (this.kill(id)) {
        count += 1;
      }
    }
    return count;
  }

  start(task: string, runDate: string, onOutput?: OutputListener): RunningReportTask {
    if (!task.trim()) {
      throw new Error("Missing report task name");
    }
    const args = [...this.baseArgs, task, runDate];
    const child = spawn(this.command, args, {
      cwd: this.cwd,
      shell: false,
      env: this.env,
    });

    const reportTask: ReportTask = {
      id: buildTaskId(),
      task,
      runDate,
      command: this.command,
      args,
      cwd: this.cwd,
      startedAt: Date.now(),
      status: "running",
      pid: child.pid,
    };

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const stdoutLines = createLineSplitter((line) => onOutput?.(line, "stdout"));
    const stderrLines = createLineSplitter((line) => onOutput?.(line, "stderr"));

    const timeout = setTimeout(() => {
      timedOut = true;
      reportTask.status = "timeout";
      child.kill("SIGKILL");
    }, this.timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => {
      const text = chunk.toString("utf8");
      stdout = appendTruncated(stdout, text, this.maxStdioChars);
      stdoutLines.push(text);
    });

    child.stderr.on("data", (chunk: Buffer) => {
      const text = chunk.toString("utf8");
      stderr = appendTruncated(stderr, text, this.maxStdioChars);
      stderrLines.push(text);
    });

    const done = new Promise<ReportTaskResult>((resolve) => {
      let settled = false;
      const settle = (result: Omit<ReportTaskResult, "task" | "finishedAt">) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        stdoutLines.flush();
        stderrLines.flush();
        resolve({ task: reportTask, ...result, finishedAt: Date.now() });
      };

      child.on("close", (exitCode, signal) => {
        if (!timedOut) {
          if (signal === "SIGTERM" || signal === "SIGKILL") {
            reportTask.status = "killed";
          } else if (exitCode === 0) {
            reportTask.status = "completed";
          } else {
            reportTask.status = "failed";
          }
        }
        settle({ stdout, stderr, timedOut, exitCode, signal });
      });

      child.on("error", (error) => {
        reportTask.status = "failed";
        stderr = appendTruncated(stderr, `${error.message}\n`, this.maxStdioChars);
        onOutput?.(error.message, "stderr");
        settle({ stdout, stderr, timedOut, exitCode: 1, signal: null });
      });
    }).finally(() => {
      this.running.delete(reportTask.id);
    });

    this.running.set(reportTask.id, { task: reportTask, child, done });
    return { task: reportTask, done };
  }
}
