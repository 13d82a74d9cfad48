import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import {
  RECURRENCE_CHOICES,
  firstOccurrence,
  formatTimestamp,
  isRecurrence,
  nextOccurrence,
  parseTimestamp,
} from "./recurrence.js";
import { InvalidRecurrenceError, SchedulerError, StorageError } from "./schedule-errors.js";
import type { Schedule, ScheduleRunStatus, UpsertScheduleInput } from "./schedule-types.js";

/** Pass ":memory:" as the file path to keep schedules in process only. */
export const IN_MEMORY_STORE = ":memory:";

type ScheduleStoreOptions = {
  filePath: string;
  now?: () => Date;
};

type ScheduleStorage = {
  nextId: number;
  schedules: Schedule[];
};

type StorageBackend = {
  read: () => string;
  write: (text: string) => void;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalText(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function parseRunStatus(value: unknown): ScheduleRunStatus | undefined {
  return value === "running" || value === "success" || value === "failed" ? value : undefined;
}

function normalizeDaysAgo(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return 1;
  }
  return Math.max(0, Math.floor(value));
}

/** Entries without an id or key are dropped; an unknown recurrence is kept as stored. */
function normalizeSchedule(value: unknown): Schedule | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = Number(value.id);
  const key = typeof value.key === "string" ? value.key.trim() : "";
  if (!Number.isInteger(id) || id <= 0 || !key) {
    return null;
  }
  const nextRun = optionalText(value.nextRun);
  const lastRun = optionalText(value.lastRun);
  const lastStatus = parseRunStatus(value.lastStatus);
  const lastMessage = typeof value.lastMessage === "string" ? value.lastMessage : undefined;
  const lastLogPath = optionalText(value.lastLogPath);
  return {
    id,
    key,
    name: typeof value.name === "string" ? value.name : key,
    task: typeof value.task === "string" ? value.task : "",
    recurrence: typeof value.recurrence === "string" ? value.recurrence : "",
    timeOfDay: typeof value.timeOfDay === "string" ? value.timeOfDay : "",
    startDate: typeof value.startDate === "string" ? value.startDate : "",
    runForDaysAgo: normalizeDaysAgo(value.runForDaysAgo),
    ...(nextRun ? { nextRun } : {}),
    ...(lastRun ? { lastRun } : {}),
    ...(lastStatus ? { lastStatus } : {}),
    ...(lastMessage !== undefined ? { lastMessage } : {}),
    ...(lastLogPath ? { lastLogPath } : {}),
    enabled: value.enabled !== false,
    createdAt: typeof value.createdAt === "string" ? value.createdAt : "",
  };
}

function parseStorage(raw: string): ScheduleStorage {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed) || !Array.isArray(parsed.schedules)) {
    throw new Error("schedule file must hold an object with a schedules array");
  }
  const schedules = parsed.schedules
    .map((item) => normalizeSchedule(item))
    .filter((item): item is Schedule => item !== null);
  const highestId = schedules.reduce((max, item) => Math.max(max, item.id), 0);
  const storedNextId = typeof parsed.nextId === "number" && Number.isInteger(parsed.nextId) ? parsed.nextId : 0;
  return { nextId: Math.max(storedNextId, highestId + 1), schedules };
}

function serializeStorage(storage: ScheduleStorage): string {
  return `${JSON.stringify(storage, null, 2)}\n`;
}

const EMPTY_STORAGE = serializeStorage({ nextId: 1, schedules: [] });

function byCreation(a: Schedule, b: Schedule): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? -1 : 1;
  }
  return a.id - b.id;
}

function requireRecurrence(schedule: Schedule): void {
  if (!isRecurrence(schedule.recurrence)) {
    throw new InvalidRecurrenceError(schedule.recurrence, RECURRENCE_CHOICES);
  }
}

/**
 * JSON-file schedule definitions plus the outcome of each schedule's most
 * recent run. Every call re-reads the file and every change rewrites it, so
 * the CLI and a running service can share one file. Writes go to a temporary
 * file first and are renamed into place.
 */
export class ScheduleFileStore {
  private readonly filePath: string;
  private readonly now: () => Date;
  private backend: StorageBackend | null = null;

  constructor(options: ScheduleStoreOptions) {
    this.filePath = options.filePath === IN_MEMORY_STORE ? options.filePath : path.resolve(options.filePath);
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<void> {
    if (this.backend) {
      return;
    }
    if (this.filePath === IN_MEMORY_STORE) {
      let text = EMPTY_STORAGE;
      this.backend = {
        read: () => text,
        write: (next) => {
          text = next;
        },
      };
      return;
    }

    const filePath = this.filePath;
    try {
      await fsp.mkdir(path.dirname(filePath), { recursive: true });
      await fsp.writeFile(filePath, EMPTY_STORAGE, { encoding: "utf8", flag: "wx" });
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
        throw new StorageError("load", error);
      }
    }
    const backend: StorageBackend = {
      read: () => fs.readFileSync(filePath, "utf8"),
      write: (text) => {
        const tempPath = `${filePath}.${process.pid}.tmp`;
        fs.writeFileSync(tempPath, text, "utf8");
        fs.renameSync(tempPath, filePath);
      },
    };
    this.withStorage("load", () => parseStorage(backend.read()));
    this.backend = backend;
  }

  close(): void {
    this.backend = null;
  }

  private ensureBackend(): StorageBackend {
    if (!this.backend) {
      throw new StorageError("access", new Error("ScheduleFileStore not loaded. Call load() first."));
    }
    return this.backend;
  }

  private withStorage<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof SchedulerError) {
        throw error;
      }
      throw new StorageError(operation, error);
    }
  }

  private readStorage(operation: string): ScheduleStorage {
    const backend = this.ensureBackend();
    return this.withStorage(operation, () => parseStorage(backend.read()));
  }

  private writeStorage(operation: string, storage: ScheduleStorage): void {
    const backend = this.ensureBackend();
    this.withStorage(operation, () => backend.write(serializeStorage(storage)));
  }

  /** Reads, applies the change to the matching schedule and writes back; null when the id is unknown. */
  private updateSchedule<T>(operation: string, id: number, change: (schedule: Schedule) => T): T | null {
    const storage = this.readStorage(operation);
    const schedule = storage.schedules.find((item) => item.id === id);
    if (!schedule) {
      return null;
    }
    const result = change(schedule);
    this.writeStorage(operation, storage);
    return result;
  }

  upsertSchedule(input: UpsertScheduleInput): Schedule {
    if (!isRecurrence(input.recurrence)) {
      throw new InvalidRecurrenceError(input.recurrence, RECURRENCE_CHOICES);
    }
    const now = this.now();
    const nextRun = formatTimestamp(firstOccurrence(input.recurrence, input.timeOfDay, input.startDate, now));
    const definition = {
      name: input.name,
      task: input.task,
      recurrence: input.recurrence,
      timeOfDay: input.timeOfDay,
      startDate: input.startDate,
      runForDaysAgo: normalizeDaysAgo(input.runForDaysAgo),
      nextRun,
      enabled: input.enabled !== false,
    };

    const storage = this.readStorage("upsertSchedule");
    const existing = storage.schedules.find((item) => item.key === input.key);
    let saved: Schedule;
    if (existing) {
      Object.assign(existing, definition);
      saved = existing;
    } else {
      saved = { id: storage.nextId, key: input.key, ...definition, createdAt: formatTimestamp(now) };
      storage.nextId += 1;
      storage.schedules.push(saved);
    }
    this.writeStorage("upsertSchedule", storage);
    return { ...saved };
  }

  listSchedules(): Schedule[] {
    return this.readStorage("listSchedules").schedules.sort(byCreation);
  }

  getByKey(key: string): Schedule | null {
    return this.readStorage("getByKey").schedules.find((item) => item.key === key) ?? null;
  }

  get(id: number): Schedule | null {
    return this.readStorage("get").schedules.find((item) => item.id === id) ?? null;
  }

  setEnabled(id: number, enabled: boolean): boolean {
    const updated = this.updateSchedule("setEnabled", id, (schedule) => {
      schedule.enabled = enabled;
      return true;
    });
    return updated ?? false;
  }

  deleteSchedule(id: number): boolean {
    const storage = this.readStorage("deleteSchedule");
    const remaining = storage.schedules.filter((item) => item.id !== id);
    if (remaining.length === storage.schedules.length) {
      return false;
    }
    this.writeStorage("deleteSchedule", { ...storage, schedules: remaining });
    return true;
  }

  /**
   * Enabled schedules whose next run is at or before the reference, in id
   * order. Entries with an unknown recurrence are never due.
   */
  dueSchedules(reference: Date = this.now()): Schedule[] {
    return this.readStorage("dueSchedules")
      .schedules.filter((schedule) => {
        if (!schedule.enabled || !isRecurrence(schedule.recurrence)) {
          return false;
        }
        const nextRun = parseTimestamp(schedule.nextRun);
        return nextRun !== null && nextRun.getTime() <= reference.getTime();
      })
      .sort((a, b) => a.id - b.id);
  }

  bumpNextRun(id: number, after: Date = this.now()): string | null {
    return this.updateSchedule("bumpNextRun", id, (schedule) => {
      const next = formatTimestamp(this.advance(schedule, after));
      schedule.nextRun = next;
      return next;
    });
  }

  markRunning(id: number, message?: string): void {
    const now = formatTimestamp(this.now());
    this.updateSchedule("markRunning", id, (schedule) => {
      schedule.lastRun = now;
      schedule.lastStatus = "running";
      schedule.lastMessage = message ?? "";
    });
  }

  /** Records the outcome and always advances nextRun, failures included. */
  markCompleted(id: number, success: boolean, message?: string, logPath?: string): string | null {
    const now = this.now();
    return this.updateSchedule("markCompleted", id, (schedule) => {
      const next = formatTimestamp(this.advance(schedule, now));
      schedule.lastRun = formatTimestamp(now);
      schedule.lastStatus = success ? "success" : "failed";
      schedule.lastMessage = message ?? "";
      if (logPath) {
        schedule.lastLogPath = logPath;
      }
      schedule.nextRun = next;
      return next;
    });
  }

  private advance(schedule: Schedule, reference: Date): Date {
    requireRecurrence(schedule);
    return nextOccurrence(
      parseTimestamp(schedule.nextRun),
      schedule.recurrence,
      schedule.timeOfDay,
      schedule.startDate,
      reference,
    );
  }
}
