import http, { type IncomingMessage, type ServerResponse } from "node:http";
import type { AuditLogger } from "./audit-log.js";
import type { AutomationHost, HostActionResult } from "./automation-host.js";
import {
  HttpRequestError,
  isControlRequestAuthorized,
  matchPath,
  parsePositiveInteger,
  readJsonObject,
  writeJsonResponse,
} from "./control-http.js";
import { logError } from "./logger.js";
import { DEFAULT_TIME_OF_DAY, RECURRENCE_CHOICES, formatCalendarDate } from "./recurrence.js";
import { formatRunDate, targetDateForSchedule } from "./run-dates.js";
import { InvalidRecurrenceError, ScheduleInputError, StorageError, errorMessage } from "./schedule-errors.js";
import { DEFAULT_SCHEDULE_KEY, DEFAULT_TASK, parseScheduleInput } from "./schedule-types.js";
import type { ScheduleFileStore } from "./schedule-store.js";
import type { SchedulerService } from "./scheduler-service.js";

export type ControlServerDeps = {
  store: ScheduleFileStore;
  scheduler: Pick<SchedulerService, "refreshNextRun" | "getPhase" | "getActiveScheduleId" | "isStarted">;
  host: AutomationHost;
  audit?: AuditLogger;
  token?: string;
  maxBodyBytes?: number;
  now?: () => Date;
};

type RouteContext = {
  req: IncomingMessage;
  res: ServerResponse;
  url: URL;
  params: Record<string, string>;
};

type Route = {
  method: "GET" | "POST" | "DELETE";
  pattern: string;
  handle: (ctx: RouteContext) => Promise<void> | void;
};

const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

function statusForHostFailure(result: Extract<HostActionResult, { ok: false }>): number {
  switch (result.reason) {
    case "busy":
      return 409;
    case "not_found":
      return 404;
    case "invalid_date":
    case "idle":
      return 400;
    case "start_failed":
      return 500;
  }
}

function writeHostResult(res: ServerResponse, result: HostActionResult): void {
  if (result.ok) {
    writeJsonResponse(res, 200, { success: true, message: result.message });
    return;
  }
  writeJsonResponse(res, statusForHostFailure(result), { success: false, error: result.error });
}

function requireScheduleId(params: Record<string, string>): number {
  const id = parsePositiveInteger(params.id);
  if (id === undefined) {
    throw new HttpRequestError(400, "schedule id must be a positive integer");
  }
  return id;
}

function statusForError(error: unknown): number {
  if (error instanceof HttpRequestError) {
    return error.statusCode;
  }
  if (error instanceof ScheduleInputError || error instanceof InvalidRecurrenceError) {
    return 400;
  }
  return 500;
}

export function buildControlRoutes(deps: ControlServerDeps): Route[] {
  const { store, scheduler, host, audit } = deps;
  const now = deps.now ?? (() => new Date());
  const maxBodyBytes = deps.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  const recordAudit = (event: Parameters<AuditLogger["log"]>[0]): void => {
    audit?.log(event).catch((error: unknown) => {
      logError(`Audit log write failed: ${errorMessage(error)}`, "control");
    });
  };

  return [
    {
      method: "GET",
      pattern: "/api/health",
      handle: ({ res }) => writeJsonResponse(res, 200, { ok: true }),
    },
    {
      method: "GET",
      pattern: "/api/status",
      handle: ({ res }) => {
        writeJsonResponse(res, 200, {
          ...host.status(),
          scheduler: {
            started: scheduler.isStarted(),
            phase: scheduler.getPhase(),
            activeScheduleId: scheduler.getActiveScheduleId(),
          },
          schedule: store.getByKey(DEFAULT_SCHEDULE_KEY),
        });
      },
    },
    {
      method: "GET",
      pattern: "/api/schedule",
      handle: ({ res, url }) => {
        const key = url.searchParams.get("key")?.trim() || DEFAULT_SCHEDULE_KEY;
        const schedule = store.getByKey(key) ?? {
          key,
          enabled: false,
          recurrence: "daily",
          timeOfDay: DEFAULT_TIME_OF_DAY,
          startDate: formatCalendarDate(now()),
          task: DEFAULT_TASK,
          runForDaysAgo: 1,
          nextRun: null,
          lastStatus: null,
          lastRun: null,
        };
        writeJsonResponse(res, 200, { schedule, recurrenceChoices: [...RECURRENCE_CHOICES] });
      },
    },
    {
      method: "POST",
      pattern: "/api/schedule",
      handle: async ({ req, res }) => {
        const body = await readJsonObject(req, maxBodyBytes);
        const input = parseScheduleInput(body, now());
        const saved = store.upsertSchedule(input);
        scheduler.refreshNextRun(saved.id);
        const schedule = store.get(saved.id) ?? saved;
        recordAudit({
          type: "schedule.saved",
          scheduleId: schedule.id,
          details: { key: schedule.key, recurrence: schedule.recurrence, nextRun: schedule.nextRun },
        });
        writeJsonResponse(res, 200, { success: true, schedule });
      },
    },
    {
      method: "GET",
      pattern: "/api/schedules",
      handle: ({ res }) => {
        writeJsonResponse(res, 200, { schedules: store.listSchedules(), recurrenceChoices: [...RECURRENCE_CHOICES] });
      },
    },
    {
      method: "DELETE",
      pattern: "/api/schedules/:id",
      handle: ({ res, params }) => {
        const id = requireScheduleId(params);
        if (!store.deleteSchedule(id)) {
          writeJsonResponse(res, 404, { success: false, error: "Schedule not found" });
          return;
        }
        recordAudit({ type: "schedule.deleted", scheduleId: id });
        writeJsonResponse(res, 200, { success: true, message: "Schedule deleted" });
      },
    },
    {
      method: "POST",
      pattern: "/api/schedules/:id/toggle",
      handle: ({ res, params }) => {
        const id = requireScheduleId(params);
        const schedule = store.get(id);
        if (!schedule) {
          writeJsonResponse(res, 404, { success: false, error: "Schedule not found" });
          return;
        }
        const enabled = !schedule.enabled;
        store.setEnabled(id, enabled);
        recordAudit({ type: "schedule.toggled", scheduleId: id, details: { enabled } });
        writeJsonResponse(res, 200, { success: true, enabled });
      },
    },
    {
      method: "POST",
      pattern: "/api/run",
      handle: async ({ req, res }) => {
        const body = await readJsonObject(req, maxBodyBytes);
        const task = typeof body.task === "string" && body.task.trim() ? body.task.trim() : DEFAULT_TASK;
        const date = typeof body.date === "string" ? body.date : undefined;
        writeHostResult(res, host.runManual(task, date));
      },
    },
    {
      method: "POST",
      pattern: "/api/run-schedule-now",
      handle: async ({ req, res }) => {
        const body = await readJsonObject(req, maxBodyBytes);
        const key = typeof body.key === "string" && body.key.trim() ? body.key.trim() : DEFAULT_SCHEDULE_KEY;
        writeHostResult(res, host.runScheduleNow(key));
      },
    },
    {
      method: "POST",
      pattern: "/api/stop",
      handle: ({ res }) => writeHostResult(res, host.stop()),
    },
    {
      method: "GET",
      pattern: "/api/logs",
      handle: ({ res, url }) => {
        const after = parsePositiveInteger(url.searchParams.get("after") ?? "") ?? 0;
        writeJsonResponse(res, 200, host.readLog(after));
      },
    },
    {
      method: "GET",
      pattern: "/api/audit",
      handle: async ({ res, url }) => {
        const limit = parsePositiveInteger(url.searchParams.get("limit") ?? "") ?? 50;
        const events = audit ? await audit.readRecent(Math.min(limit, 500)) : [];
        writeJsonResponse(res, 200, { events });
      },
    },
    {
      method: "GET",
      pattern: "/api/previous-day",
      handle: ({ res }) => {
        writeJsonResponse(res, 200, { date: formatRunDate(targetDateForSchedule(1, now())) });
      },
    },
  ];
}

export async function handleControlRequest(
  deps: ControlServerDeps,
  routes: Route[],
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  if (!isControlRequestAuthorized(req, deps.token)) {
    writeJsonResponse(res, 401, { success: false, error: "unauthorized" });
    return;
  }
  const url = new URL(req.url ?? "/", "http://localhost");
  const method = (req.method ?? "GET").toUpperCase();
  let pathMatched = false;
  try {
    for (const route of routes) {
      const params = matchPath(route.pattern, url.pathname);
      if (!params) {
        continue;
      }
      pathMatched = true;
      if (route.method !== method) {
        continue;
      }
      await route.handle({ req, res, url, params });
      return;
    }
  } catch (error) {
    const statusCode = statusForError(error);
    if (statusCode >= 500) {
      logError(`${method} ${url.pathname} failed: ${errorMessage(error)}`, "control");
    }
    if (!res.headersSent) {
      writeJsonResponse(res, statusCode, {
        success: false,
        error: errorMessage(error),
        ...(error instanceof StorageError || error instanceof ScheduleInputError || error instanceof InvalidRecurrenceError
          ? { code: error.code }
          : {}),
      });
    }
    return;
  }
  writeJsonResponse(res, pathMatched ? 405 : 404, { success: false, error: pathMatched ? "method not allowed" : "not found" });
}

export function createControlServer(deps: ControlServerDeps): http.Server {
  const routes = buildControlRoutes(deps);
  return http.createServer((req, res) => {
    handleControlRequest(deps, routes, req, res).catch((error: unknown) => {
      logError(`Control request crashed: ${errorMessage(error)}`, "control");
      if (!res.headersSent) {
        writeJsonResponse(res, 500, { success: false, error: "internal error" });
      }
    });
  });
}

export function listen(server: http.Server, host: string, port: number): Promise<{ host: string; port: number }> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onError);
      const address = server.address();
      resolve({ host, port: typeof address === "object" && address ? address.port : port });
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}
