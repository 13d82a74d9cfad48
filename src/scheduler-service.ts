import { ScheduleDispatchError, errorMessage } from "./schedule-errors.js";
import type { Schedule } from "./schedule-types.js";
import type { ScheduleFileStore } from "./schedule-store.js";

export type SchedulerPhase = "idle" | "polling" | "dispatching";

export type TickOutcome = "stopped" | "busy" | "blocked" | "idle" | "dispatched" | "declined" | "failed" | "error";

/** The part of the store the poll loop needs. */
export type SchedulerStore = Pick<ScheduleFileStore, "dueSchedules" | "bumpNextRun" | "markCompleted">;

export type SchedulerServiceOptions = {
  store: SchedulerStore;
  /** Launches the job; resolves true only when it actually started. */
  onJobDue: (schedule: Schedule) => boolean | Promise<boolean>;
  canStart?: () => boolean;
  log?: (message: string) => void;
  pollMs?: number;
  stopTimeoutMs?: number;
  now?: () => Date;
};

/** A hand-off to onJobDue that has not settled yet. */
type PendingDispatch = {
  scheduleId: number;
  completed: boolean;
};

export const DEFAULT_POLL_MS = 30_000;
const DEFAULT_STOP_TIMEOUT_MS = 1_000;

/**
 * Polls the store for due schedules and hands them to the host one at a
 * time. Completion arrives later through markRunComplete; until then no other
 * schedule is dispatched, including while onJobDue is still pending, even
 * across a stop() that timed out and a later start(). With several schedules due at once the first one in
 * store order wins; there is no priority between them.
 */
export class SchedulerService {
  private readonly store: SchedulerStore;
  private readonly onJobDue: SchedulerServiceOptions["onJobDue"];
  private readonly canStart?: () => boolean;
  private readonly log: (message: string) => void;
  private readonly pollMs: number;
  private readonly stopTimeoutMs: number;
  private readonly now: () => Date;

  private activeScheduleId: number | null = null;
  private pending: PendingDispatch | null = null;
  private phase: SchedulerPhase = "idle";
  private started = false;
  private stopRequested = false;
  private generation = 0;
  private loop: Promise<void> | null = null;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;

  constructor(options: SchedulerServiceOptions) {
    this.store = options.store;
    this.onJobDue = options.onJobDue;
    this.canStart = options.canStart;
    this.log = options.log ?? (() => undefined);
    this.pollMs = Math.max(1, Math.floor(options.pollMs ?? DEFAULT_POLL_MS));
    this.stopTimeoutMs = Math.max(0, Math.floor(options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS));
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.stopRequested = false;
    this.generation += 1;
    this.loop = this.runLoop(this.generation).catch((error: unknown) => {
      this.log(`Scheduler loop crashed: ${errorMessage(error)}`);
    });
  }

  async stop(): Promise<void> {
    this.stopRequested = true;
    this.started = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
    this.wake = null;

    const loop = this.loop;
    this.loop = null;
    if (!loop) {
      return;
    }
    let timeout: ReturnType<typeof setTimeout> | undefined;
    await Promise.race([
      loop,
      new Promise<void>((resolve) => {
        timeout = setTimeout(resolve, this.stopTimeoutMs);
      }),
    ]);
    if (timeout !== undefined) {
      clearTimeout(timeout);
    }
  }

  isStarted(): boolean {
    return this.started;
  }

  getPhase(): SchedulerPhase {
    return this.phase;
  }

  getActiveScheduleId(): number | null {
    return this.activeScheduleId ?? this.pending?.scheduleId ?? null;
  }

  refreshNextRun(id: number): string | null {
    return this.store.bumpNextRun(id, this.now());
  }

  markRunComplete(id: number, success: boolean, message?: string, logPath?: string): string | null {
    if (this.activeScheduleId === id) {
      this.activeScheduleId = null;
    }
    if (this.pending?.scheduleId === id) {
      this.pending.completed = true;
    }
    return this.store.markCompleted(id, success, message, logPath);
  }

  /** One poll iteration. The background loop calls this; tests drive it directly. */
  async tick(): Promise<TickOutcome> {
    if (this.stopRequested) {
      return "stopped";
    }
    if (this.activeScheduleId !== null || this.pending !== null) {
      return "busy";
    }
    this.phase = "polling";
    try {
      if (this.canStart && !this.canStart()) {
        return "blocked";
      }
      let due: Schedule[];
      try {
        due = this.store.dueSchedules(this.now());
      } catch (error) {
        this.log(`Failed to read due schedules: ${errorMessage(error)}`);
        return "error";
      }
      const schedule = due[0];
      if (!schedule) {
        return "idle";
      }
      this.phase = "dispatching";
      return await this.dispatch(schedule);
    } finally {
      this.phase = "idle";
    }
  }

  /** A run that completes before onJobDue settles leaves nothing active behind. */
  private async dispatch(schedule: Schedule): Promise<TickOutcome> {
    const pending: PendingDispatch = { scheduleId: schedule.id, completed: false };
    this.pending = pending;
    try {
      const started = await this.onJobDue(schedule);
      if (!started) {
        return "declined";
      }
      if (!pending.completed) {
        this.activeScheduleId = schedule.id;
      }
      return "dispatched";
    } catch (error) {
      const failure = new ScheduleDispatchError(schedule.id, error);
      this.log(`Failed to start scheduled job ${schedule.name}: ${failure.message}`);
      try {
        this.store.markCompleted(schedule.id, false, `Failed to start: ${failure.message}`);
      } catch (storeError) {
        this.log(`Failed to record start failure for ${schedule.name}: ${errorMessage(storeError)}`);
      }
      return "failed";
    } finally {
      if (this.pending === pending) {
        this.pending = null;
      }
    }
  }

  private async runLoop(generation: number): Promise<void> {
    const active = () => !this.stopRequested && this.generation === generation;
    while (active()) {
      try {
        await this.tick();
      } catch (error) {
        this.log(`Scheduler tick failed: ${errorMessage(error)}`);
      }
      if (!active()) {
        break;
      }
      await this.sleep();
    }
  }

  private sleep(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, this.pollMs);
    });
  }
}
