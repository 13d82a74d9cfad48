#!/usr/bin/env node

import process from "node:process";
import { pathToFileURL } from "node:url";
import { config } from "./config.js";
import { firstOccurrence, formatTimestamp, parseTimestamp, stepOccurrence } from "./recurrence.js";
import { errorMessage } from "./schedule-errors.js";
import { ScheduleFileStore } from "./schedule-store.js";
import { parseScheduleInput, type Schedule } from "./schedule-types.js";

type CliCommand = "list" | "show" | "save" | "enable" | "disable" | "delete" | "due" | "preview" | "help";

export type CliOptions = {
  command: CliCommand;
  positional: string[];
  flags: Record<string, string>;
  json: boolean;
};

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

type CliStore = Pick<
  ScheduleFileStore,
  "listSchedules" | "getByKey" | "upsertSchedule" | "setEnabled" | "deleteSchedule" | "dueSchedules"
>;

const COMMANDS: readonly CliCommand[] = ["list", "show", "save", "enable", "disable", "delete", "due", "preview", "help"];
const BOOLEAN_FLAGS = new Set(["json", "enabled", "disabled", "help"]);

function isCommand(value: string): value is CliCommand {
  return (COMMANDS as readonly string[]).includes(value);
}

export function usageText(): string {
  return [
    "Report scheduler CLI",
    "",
    "Usage:",
    "  report-scheduler list [--json]",
    "  report-scheduler show <key> [--json]",
    "  report-scheduler save --key <key> [--name <name>] [--task all|daily|order] --recurrence <rule>",
    "                        [--time HH:MM] [--start YYYY-MM-DD] [--days-ago <n>] [--enabled|--disabled]",
    "  report-scheduler enable <id> | disable <id> | delete <id>",
    "  report-scheduler due [--json]",
    "  report-scheduler preview --recurrence <rule> [--time HH:MM] [--start YYYY-MM-DD]",
    "                           [--from \"YYYY-MM-DD HH:MM\"] [--count <n>]",
    "",
    "Recurrence rules: hourly, daily, weekly, every_4_days, monthly",
  ].join("\n");
}

export function parseCliArgs(argv: string[]): CliOptions {
  const [first, ...rest] = argv;
  if (first === undefined || first === "--help" || first === "-h") {
    return { command: "help", positional: [], flags: {}, json: false };
  }
  if (!isCommand(first)) {
    throw new Error(`Unknown command: ${first}`);
  }
  const command = first;
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index] ?? "";
    if (!token.startsWith("--")) {
      positional.push(token);
      continue;
    }
    const name = token.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      flags[name] = "true";
      continue;
    }
    const value = rest[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for --${name}`);
    }
    flags[name] = value;
    index += 1;
  }
  return { command, positional, flags, json: flags.json === "true" };
}

function formatScheduleLine(schedule: Schedule): string {
  const state = schedule.enabled ? "on " : "off";
  const last = schedule.lastStatus ? `${schedule.lastStatus}@${schedule.lastRun ?? "?"}` : "never run";
  return `#${schedule.id} [${state}] ${schedule.key} (${schedule.task}, ${schedule.recurrence} at ${schedule.timeOfDay}) next=${schedule.nextRun ?? "-"} last=${last}`;
}

function requireId(options: CliOptions): number {
  const raw = options.positional[0] ?? "";
  const id = Number.parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || id <= 0) {
    throw new Error("Expected a positive schedule id");
  }
  return id;
}

/** Next occurrences of a rule, for checking a definition before saving it. */
export function previewOccurrences(
  recurrence: string,
  timeOfDay: string,
  startDate: string,
  from: Date,
  count: number,
): string[] {
  const out: string[] = [];
  let next = firstOccurrence(recurrence, timeOfDay, startDate, from);
  for (let index = 0; index < count; index += 1) {
    out.push(formatTimestamp(next));
    next = stepOccurrence(next, recurrence);
  }
  return out;
}

export function runCli(options: CliOptions, store: CliStore, io: CliIo, now: Date = new Date()): number {
  const print = (value: unknown, text: () => string) => io.out(options.json ? JSON.stringify(value, null, 2) : text());

  switch (options.command) {
    case "help":
      io.out(usageText());
      return 0;
    case "list": {
      const schedules = store.listSchedules();
      print(schedules, () => (schedules.length > 0 ? schedules.map(formatScheduleLine).join("\n") : "No schedules."));
      return 0;
    }
    case "show": {
      const key = options.positional[0];
      if (!key) {
        io.err("Missing schedule key");
        return 2;
      }
      const schedule = store.getByKey(key);
      if (!schedule) {
        io.err(`Schedule not found: ${key}`);
        return 1;
      }
      print(schedule, () => formatScheduleLine(schedule));
      return 0;
    }
    case "save": {
      const input = parseScheduleInput(
        {
          key: options.flags.key,
          name: options.flags.name,
          task: options.flags.task,
          recurrence: options.flags.recurrence,
          timeOfDay: options.flags.time,
          startDate: options.flags.start,
          runForDaysAgo: options.flags["days-ago"],
          enabled: options.flags.disabled !== "true",
        },
        now,
      );
      const saved = store.upsertSchedule(input);
      print(saved, () => `Saved ${formatScheduleLine(saved)}`);
      return 0;
    }
    case "enable":
    case "disable": {
      const id = requireId(options);
      if (!store.setEnabled(id, options.command === "enable")) {
        io.err(`Schedule not found: #${id}`);
        return 1;
      }
      io.out(`Schedule #${id} ${options.command}d`);
      return 0;
    }
    case "delete": {
      const id = requireId(options);
      if (!store.deleteSchedule(id)) {
        io.err(`Schedule not found: #${id}`);
        return 1;
      }
      io.out(`Schedule #${id} deleted`);
      return 0;
    }
    case "due": {
      const due = store.dueSchedules(now);
      print(due, () => (due.length > 0 ? due.map(formatScheduleLine).join("\n") : "Nothing due."));
      return 0;
    }
    case "preview": {
      const recurrence = options.flags.recurrence;
      if (!recurrence) {
        io.err("Missing --recurrence");
        return 2;
      }
      const from = options.flags.from ? parseTimestamp(options.flags.from) : now;
      if (!from) {
        io.err("Invalid --from. Use \"YYYY-MM-DD HH:MM\".");
        return 2;
      }
      const count = Math.min(50, Math.max(1, Number.parseInt(options.flags.count ?? "5", 10) || 5));
      const occurrences = previewOccurrences(
        recurrence,
        options.flags.time ?? "",
        options.flags.start ?? "",
        from,
        count,
      );
      print(occurrences, () => occurrences.join("\n"));
      return 0;
    }
  }
}

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.command === "help") {
    console.log(usageText());
    return;
  }
  const store = new ScheduleFileStore({ filePath: config.storeFile });
  await store.load();
  try {
    process.exitCode = runCli(options, store, {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    });
  } finally {
    store.close();
  }
}

const invokedPath = process.argv[1];
if (invokedPath && import.meta.url === pathToFileURL(invokedPath).href) {
  main().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(1);
  });
}
