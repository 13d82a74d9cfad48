import { isValidCalendarDate } from "./recurrence.js";

export type RunOrigin = "manual" | "scheduled";

export const TASK_LABELS: Record<string, string> = {
  all: "All reports",
  daily: "Daily Report",
  order: "Order Type Report",
};

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

export function taskLabel(task: string): string {
  return TASK_LABELS[task] ?? "Automation";
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/** "09-Jan-2025", the date format report tasks take on their command line. */
export function formatRunDate(date: Date): string {
  const month = MONTH_NAMES[date.getMonth()]?.slice(0, 3) ?? "";
  return `${pad2(date.getDate())}-${month}-${date.getFullYear()}`;
}

function resolveMonth(raw: string): number | null {
  const normalized = raw.toLowerCase();
  const index = MONTH_NAMES.findIndex(
    (name) => name.toLowerCase() === normalized || name.slice(0, 3).toLowerCase() === normalized,
  );
  return index >= 0 ? index + 1 : null;
}

export type RunDate = {
  date: Date;
  label: string;
};

/**
 * Accepts "DD-Mon-YYYY" or "DD-Month-YYYY". An empty value means yesterday;
 * anything else unreadable yields null.
 */
export function parseRunDate(input: string | null | undefined, now: Date = new Date()): RunDate | null {
  const raw = (input ?? "").trim();
  if (!raw) {
    const date = targetDateForSchedule(1, now);
    return { date, label: formatRunDate(date) };
  }
  const match = /^(\d{1,2})-([A-Za-z]+)-(\d{4})$/.exec(raw);
  if (!match) {
    return null;
  }
  const day = Number.parseInt(match[1] ?? "", 10);
  const month = resolveMonth(match[2] ?? "");
  const year = Number.parseInt(match[3] ?? "", 10);
  if (month === null || !isValidCalendarDate(year, month, day)) {
    return null;
  }
  const date = new Date(year, month - 1, day);
  return { date, label: formatRunDate(date) };
}

/** Midnight of the day N days before now. */
export function targetDateForSchedule(runForDaysAgo: number, now: Date = new Date()): Date {
  const daysAgo = Number.isFinite(runForDaysAgo) ? Math.max(0, Math.floor(runForDaysAgo)) : 1;
  const date = startOfDay(now);
  date.setDate(date.getDate() - daysAgo);
  return date;
}

export function buildLogFileName(origin: RunOrigin, task: string, now: Date = new Date()): string {
  const safeTask = taskLabel(task).replace(/ /g, "_").toLowerCase();
  const stamp =
    `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}_` +
    `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `${origin}_${safeTask}_${stamp}.log`;
}
