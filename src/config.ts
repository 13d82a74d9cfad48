import dotenv from "dotenv";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

dotenv.config();

const EnvSchema = z.object({
  REPORT_SCHEDULER_STORE_FILE: z.string().trim().default("./data/schedules.json"),
  REPORT_SCHEDULER_POLL_MS: z.coerce.number().int().positive().max(3_600_000).default(30_000),
  REPORT_SCHEDULER_ENABLED: z.string().optional(),
  REPORT_SCHEDULER_LOCK_FILE: z.string().trim().optional(),
  REPORT_TASK_COMMAND: z.string().trim().min(1).default("python3"),
  REPORT_TASK_ARGS: z.string().trim().default("run_all_reports.py"),
  REPORT_TASK_CWD: z.string().trim().default("."),
  REPORT_LOG_DIR: z.string().trim().default("./logs"),
  EXEC_TIMEOUT_MS: z.coerce.number().int().positive().max(24 * 3_600_000).default(2 * 3_600_000),
  MAX_STDIO_CHARS: z.coerce.number().int().positive().max(1_000_000).default(20_000),
  CONTROL_API_ENABLED: z.string().optional(),
  CONTROL_API_HOST: z.string().trim().default("127.0.0.1"),
  CONTROL_API_PORT: z.coerce.number().int().positive().max(65535).default(5001),
  CONTROL_API_TOKEN: z.string().trim().optional(),
  AUDIT_LOG_PATH: z.string().trim().default("./logs/report-scheduler-audit.log"),
});

export function parseBooleanFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (typeof value === "undefined" || value.trim() === "") {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  throw new Error(`Invalid boolean flag value: ${value}`);
}

/** Whitespace-separated, with double quotes grouping an argument that contains spaces. */
export function splitArgs(raw: string): string[] {
  const out: string[] = [];
  const pattern = /"([^"]*)"|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(raw)) !== null) {
    out.push(match[1] ?? match[2] ?? "");
  }
  return out;
}

export type AppConfig = ReturnType<typeof buildConfig>;

export function buildConfig(source: NodeJS.ProcessEnv, cwd: string = process.cwd()) {
  const env = EnvSchema.parse(source);
  return {
    storeFile: path.resolve(cwd, env.REPORT_SCHEDULER_STORE_FILE),
    pollMs: env.REPORT_SCHEDULER_POLL_MS,
    schedulerEnabled: parseBooleanFlag(env.REPORT_SCHEDULER_ENABLED, true),
    lockFile: env.REPORT_SCHEDULER_LOCK_FILE
      ? path.resolve(cwd, env.REPORT_SCHEDULER_LOCK_FILE)
      : path.join(os.tmpdir(), "report-scheduler.lock"),
    taskCommand: env.REPORT_TASK_COMMAND,
    taskArgs: splitArgs(env.REPORT_TASK_ARGS),
    taskCwd: path.resolve(cwd, env.REPORT_TASK_CWD),
    logDir: path.resolve(cwd, env.REPORT_LOG_DIR),
    execTimeoutMs: env.EXEC_TIMEOUT_MS,
    maxStdioChars: env.MAX_STDIO_CHARS,
    controlApiEnabled: parseBooleanFlag(env.CONTROL_API_ENABLED, true),
    controlApiHost: env.CONTROL_API_HOST,
    controlApiPort: env.CONTROL_API_PORT,
    controlApiToken: env.CONTROL_API_TOKEN?.trim() || undefined,
    auditLogPath: path.resolve(cwd, env.AUDIT_LOG_PATH),
  };
}

export const config = buildConfig(process.env);
