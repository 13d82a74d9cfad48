import fs from "node:fs/promises";
import path from "node:path";

export type AuditEventType =
  | "schedule.saved"
  | "schedule.deleted"
  | "schedule.toggled"
  | "run.started"
  | "run.finished"
  | "run.stop_requested";

export type AuditEvent = {
  type: AuditEventType;
  scheduleId?: number;
  details?: Record<string, unknown>;
};

export type AuditSink = {
  log(event: AuditEvent): Promise<void>;
};

/** Append-only JSON-lines journal; the store itself keeps only the latest run. */
export class AuditLogger implements AuditSink {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(process.cwd(), filePath);
  }

  async log(event: AuditEvent): Promise<void> {
    const payload = {
      ts: new Date().toISOString(),
      ...event,
    };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${JSON.stringify(payload)}\n`, "utf8");
  }

  async readRecent(limit: number): Promise<Array<Record<string, unknown>>> {
    const max = Math.floor(limit);
    if (!Number.isFinite(max) || max <= 0) {
      return [];
    }
    let raw = "";
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }
    const out: Array<Record<string, unknown>> = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      try {
        const parsed: unknown = JSON.parse(line);
        if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
          out.push({ ...parsed });
        }
      } catch {
        continue;
      }
    }
    return out.slice(-max);
  }
}
