import { InvalidRecurrenceError } from "./schedule-errors.js";

export const RECURRENCE_CHOICES = ["hourly", "daily", "weekly", "every_4_days", "monthly"] as const;

export type Recurrence = (typeof RECURRENCE_CHOICES)[number];

export const DEFAULT_TIME_OF_DAY = "07:00";

const DEFAULT_HOUR = 7;
const DEFAULT_MINUTE = 0;

export type TimeOfDay = {
  hour: number;
  minute: number;
};

export type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

export function isRecurrence(value: string): value is Recurrence {
  return (RECURRENCE_CHOICES as readonly string[]).includes(value);
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Parses "HH:MM" (or a bare hour). Stored values may be anything, so
 * malformed values fall back to 07:00 instead of throwing.
 */
export function parseTimeOfDay(value: string | null | undefined): TimeOfDay {
  const match = /^\s*(\d{1,2})(?::(\d{1,2}))?\s*$/.exec(value ?? "");
  if (!match) {
    return { hour: DEFAULT_HOUR, minute: DEFAULT_MINUTE };
  }
  const hour = Number.parseInt(match[1] ?? "", 10);
  const minute = match[2] === undefined ? 0 : Number.parseInt(match[2], 10);
  if (hour > 23 || minute > 59) {
    return { hour: DEFAULT_HOUR, minute: DEFAULT_MINUTE };
  }
  return { hour, minute };
}

/** `new Date(year, ...)` reads years 0-99 as 1900-1999, so earlier years are refused. */
const MIN_YEAR = 1000;

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (year < MIN_YEAR || month < 1 || month > 12 || day < 1) {
    return false;
  }
  return day <= daysInMonth(year, month);
}

/**
 * Parses a strict "YYYY-MM-DD" date. Malformed values fall back to the
 * reference's calendar date.
 */
export function parseStartDate(value: string | null | undefined, reference: Date): CalendarDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec((value ?? "").trim());
  if (match) {
    const year = Number.parseInt(match[1] ?? "", 10);
    const month = Number.parseInt(match[2] ?? "", 10);
    const day = Number.parseInt(match[3] ?? "", 10);
    if (isValidCalendarDate(year, month, day)) {
      return { year, month, day };
    }
  }
  return { year: reference.getFullYear(), month: reference.getMonth() + 1, day: reference.getDate() };
}

/** Local "YYYY-MM-DD HH:MM[:SS]" (space or T separator); null when absent or unreadable. */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const match = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const toInt = (part: string | undefined): number => Number.parseInt(part ?? "0", 10);
  const year = toInt(match[1]);
  const month = toInt(match[2]);
  const day = toInt(match[3]);
  const hour = toInt(match[4]);
  const minute = toInt(match[5]);
  const second = toInt(match[6]);
  if (!isValidCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  return new Date(year, month - 1, day, hour, minute, second, 0);
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

export function formatCalendarDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one.
  return new Date(year, month, 0).getDate();
}

function addMonthClamped(date: Date): Date {
  const targetYear = date.getMonth() === 11 ? date.getFullYear() + 1 : date.getFullYear();
  const targetMonth = (date.getMonth() + 1) % 12;
  const day = Math.min(date.getDate(), daysInMonth(targetYear, targetMonth + 1));
  return new Date(
    targetYear,
    targetMonth,
    day,
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds(),
  );
}

function addDays(date: Date, days: number): Date {
  const next = new Date(date.getTime());
  next.setDate(next.getDate() + days);
  return next;
}

export function stepOccurrence(date: Date, recurrence: string): Date {
  switch (recurrence) {
    case "hourly":
      return new Date(date.getTime() + 60 * 60 * 1000);
    case "daily":
      return addDays(date, 1);
    case "weekly":
      return addDays(date, 7);
    case "every_4_days":
      return addDays(date, 4);
    case "monthly":
      return addMonthClamped(date);
    default:
      throw new InvalidRecurrenceError(recurrence, RECURRENCE_CHOICES);
  }
}

function advancePast(candidate: Date, recurrence: string, reference: Date): Date {
  let next = candidate;
  while (next.getTime() <= reference.getTime()) {
    next = stepOccurrence(next, recurrence);
  }
  return next;
}

/** Earliest slot on or after the start date, at the time of day, strictly after the reference. */
export function firstOccurrence(recurrence: string, timeOfDay: string, startDate: string, reference: Date): Date {
  const start = parseStartDate(startDate, reference);
  const time = parseTimeOfDay(timeOfDay || DEFAULT_TIME_OF_DAY);
  const anchor = new Date(start.year, start.month - 1, start.day, time.hour, time.minute, 0, 0);
  return advancePast(anchor, recurrence, reference);
}

/**
 * Steps forward from the current next run until it lands strictly after the
 * reference. Slots missed while offline are skipped, not queued.
 */
export function nextOccurrence(
  current: Date | null,
  recurrence: string,
  timeOfDay: string,
  startDate: string,
  reference: Date,
): Date {
  if (!current) {
    return firstOccurrence(recurrence, timeOfDay, startDate, reference);
  }
  return advancePast(current, recurrence, reference);
}
