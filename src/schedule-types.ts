import { z } from "zod";
import { DEFAULT_TIME_OF_DAY, RECURRENCE_CHOICES, formatCalendarDate, isValidCalendarDate } from "./recurrence.js";
import { ScheduleInputError } from "./schedule-errors.js";

export type ScheduleRunStatus = "running" | "success" | "failed";

export type Schedule = {
  id: number;
  key: string;
  name: string;
  task: string;
  /** One of RECURRENCE_CHOICES when written here; a hand-edited file may hold anything. */
  recurrence: string;
  timeOfDay: string;
  startDate: string;
  runForDaysAgo: number;
  nextRun?: string;
  lastRun?: string;
  lastStatus?: ScheduleRunStatus;
  lastMessage?: string;
  lastLogPath?: string;
  enabled: boolean;
  createdAt: string;
};

/** Recurrence stays a plain string here: the store rejects unknown values itself. */
export type UpsertScheduleInput = {
  key: string;
  name: string;
  task: string;
  recurrence: string;
  timeOfDay: string;
  startDate: string;
  runForDaysAgo?: number;
  enabled?: boolean;
};

export const DEFAULT_SCHEDULE_KEY = "marketing_reports";
export const DEFAULT_SCHEDULE_NAME = "Marketing Reports";
export const DEFAULT_TASK = "all";

const timeOfDaySchema = z
  .string()
  .trim()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Invalid time format. Use HH:MM.");

const startDateSchema = z
  .string()
  .trim()
  .refine((value) => {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
    if (!match) {
      return false;
    }
    return isValidCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }, "Invalid date format. Use YYYY-MM-DD.");

export const scheduleInputSchema = z.object({
  key: z.string().trim().min(1).max(120).default(DEFAULT_SCHEDULE_KEY),
  name: z.string().trim().min(1).max(200).default(DEFAULT_SCHEDULE_NAME),
  task: z.string().trim().min(1).max(60).default(DEFAULT_TASK),
  recurrence: z.enum(RECURRENCE_CHOICES, {
    errorMap: () => ({ message: `Invalid recurrence. Use one of: ${RECURRENCE_CHOICES.join(", ")}` }),
  }).default("daily"),
  timeOfDay: z.union([z.literal(""), timeOfDaySchema]).default(DEFAULT_TIME_OF_DAY),
  startDate: z.union([z.literal(""), startDateSchema]).optional(),
  runForDaysAgo: z.coerce.number().int().min(0).max(365).default(1),
  enabled: z.boolean().default(false),
});

export type ScheduleInputPayload = z.input<typeof scheduleInputSchema>;

/**
 * Validates a caller-built schedule definition before it reaches the store.
 * Blank time and date fall back to 07:00 and the current day.
 */
export function parseScheduleInput(raw: unknown, now: Date = new Date()): UpsertScheduleInput {
  const result = scheduleInputSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ScheduleInputError(
      result.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)),
    );
  }
  const data = result.data;
  return {
    key: data.key,
    name: data.name,
    task: data.task,
    recurrence: data.recurrence,
    timeOfDay: data.timeOfDay || DEFAULT_TIME_OF_DAY,
    startDate: data.startDate || formatCalendarDate(now),
    runForDaysAgo: data.runForDaysAgo,
    enabled: data.enabled,
  };
}
