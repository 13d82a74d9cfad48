import fs from "node:fs";
import path from "node:path";

type LockPayload = {
  pid: number;
  startedAt: string;
};

export class InstanceLockedError extends Error {
  readonly pid: number;

  constructor(pid: number, lockPath: string) {
    super(`Another scheduler instance is already polling (pid ${pid}, lock ${lockPath}). Stop it before starting a new one.`);
    this.name = "InstanceLockedError";
    this.pid = pid;
  }
}

function readLockPid(lockPath: string): number | null {
  try {
    const raw = fs.readFileSync(lockPath, "utf8");
    const parsed = JSON.parse(raw) as Partial<LockPayload>;
    if (typeof parsed.pid === "number" && Number.isFinite(parsed.pid)) {
      return parsed.pid;
    }
    return null;
  } catch {
    return null;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function writeLockFile(lockPath: string): void {
  const payload: LockPayload = {
    pid: process.pid,
    startedAt: new Date().toISOString(),
  };
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });
  fs.writeFileSync(lockPath, `${JSON.stringify(payload, null, 2)}\n`, { flag: "wx" });
}

/**
 * Only one process should run the poll loop against a given schedule file, or due
 * schedules get dispatched twice. Stale locks left by dead processes are
 * replaced. Returns the release function.
 */
export function acquireSingleInstanceLock(lockPath: string): () => void {
  try {
    writeLockFile(lockPath);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err?.code !== "EEXIST") {
      throw error;
    }

    const existingPid = readLockPid(lockPath);
    if (existingPid && existingPid !== process.pid && isProcessAlive(existingPid)) {
      throw new InstanceLockedError(existingPid, lockPath);
    }

    try {
      fs.unlinkSync(lockPath);
    } catch {
      // Another process may have removed the stale lock first.
    }

    writeLockFile(lockPath);
  }

  let released = false;
  const release = () => {
    if (released) {
      return;
    }
    released = true;
    process.off("exit", release);
    try {
      if (readLockPid(lockPath) === process.pid) {
        fs.unlinkSync(lockPath);
      }
    } catch {
      // Lock file already gone.
    }
  };

  process.on("exit", release);
  return release;
}
