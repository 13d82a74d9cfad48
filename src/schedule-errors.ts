export type SchedulerErrorCode =
  | "INVALID_RECURRENCE"
  | "INVALID_SCHEDULE_INPUT"
  | "STORAGE_ERROR"
  | "CALLBACK_FAILURE";

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode;

  constructor(code: SchedulerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchedulerError";
    this.code = code;
  }
}

export class InvalidRecurrenceError extends SchedulerError {
  readonly recurrence: string;

  constructor(recurrence: string, allowed: readonly string[]) {
    super("INVALID_RECURRENCE", `recurrence must be one of ${allowed.join(", ")} (got "${recurrence}")`);
    this.name = "InvalidRecurrenceError";
    this.recurrence = recurrence;
  }
}

export class ScheduleInputError extends SchedulerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_SCHEDULE_INPUT", issues.length > 0 ? issues.join("; ") : "invalid schedule input");
    this.name = "ScheduleInputError";
    this.issues = issues;
  }
}

export class StorageError extends SchedulerError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("STORAGE_ERROR", `schedule storage failed during ${operation}: ${detail}`, { cause });
    this.name = "StorageError";
  }
}

/** Raised inside the poll loop when the host callback throws; never escapes the loop. */
export class ScheduleDispatchError extends SchedulerError {
  readonly scheduleId: number;

  constructor(scheduleId: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("CALLBACK_FAILURE", detail, { cause });
    this.name = "ScheduleDispatchError";
    this.scheduleId = scheduleId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
