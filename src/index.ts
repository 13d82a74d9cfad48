import process from "node:process";
import { AuditLogger } from "./audit-log.js";
import { AutomationHost } from "./automation-host.js";
import { config } from "./config.js";
import { createControlServer, listen } from "./control-server.js";
import { logError, logInfo } from "./logger.js";
import { ReportTaskRunner } from "./report-task-runner.js";
import { errorMessage } from "./schedule-errors.js";
import { ScheduleFileStore } from "./schedule-store.js";
import { SchedulerService } from "./scheduler-service.js";
import { acquireSingleInstanceLock } from "./single-instance-lock.js";

async function main(): Promise<void> {
  const releaseLock = config.schedulerEnabled ? acquireSingleInstanceLock(config.lockFile) : () => undefined;

  const store = new ScheduleFileStore({ filePath: config.storeFile });
  await store.load();

  const audit = new AuditLogger(config.auditLogPath);
  const runner = new ReportTaskRunner({
    command: config.taskCommand,
    baseArgs: config.taskArgs,
    cwd: config.taskCwd,
    timeoutMs: config.execTimeoutMs,
    maxStdioChars: config.maxStdioChars,
    env: { ...process.env, PYTHONIOENCODING: "utf-8" },
  });
  const host = new AutomationHost({ store, runner, logDir: config.logDir, audit });

  const scheduler = new SchedulerService({
    store,
    onJobDue: (schedule) => host.onScheduleDue(schedule),
    canStart: () => host.canStart(),
    log: (message) => {
      logInfo(message, "scheduler");
      host.appendLog(`[scheduler] ${message}`);
    },
    pollMs: config.pollMs,
  });
  host.attachScheduler(scheduler);

  const server = config.controlApiEnabled ? createControlServer({ store, scheduler, host, audit, token: config.controlApiToken }) : null;
  if (server) {
    const address = await listen(server, config.controlApiHost, config.controlApiPort);
    logInfo(`Control API listening on http://${address.host}:${address.port}`);
  }

  if (config.schedulerEnabled) {
    scheduler.start();
    logInfo(`Scheduler polling every ${Math.round(config.pollMs / 1000)}s (${config.storeFile})`);
  } else {
    logInfo("Scheduler disabled; manual runs only");
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logInfo(`Received ${signal}, shutting down...`);
    await scheduler.stop();
    if (host.stop().ok) {
      await host.whenIdle();
    }
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    store.close();
    releaseLock();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logError(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logError(`Report scheduler failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
