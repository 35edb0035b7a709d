import fs from "fs";
import path from "path";
import { CancelledError } from "../errors";

const FILE_LOCK_RETRY_MS = 100;
const FILE_LOCK_WAIT_MS = 10 * 60 * 1000;
const FILE_LOCK_STALE_MS = 10 * 60 * 1000;

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export type FileLockOptions = {
  waitMs?: number;
  staleMs?: number;
  retryMs?: number;
  signal?: AbortSignal;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isPidRunning(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return (error as NodeJS.ErrnoException).code === "EPERM";
  }
}

function readLockOwner(lockPath: string): number | undefined {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf-8"));
    if (parsed && typeof parsed === "object" && "pid" in parsed && typeof parsed.pid === "number") {
      return parsed.pid;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

// A lock whose owner is known is stale only once that process is gone; age
// decides only for a lock file nobody could finish writing.
function isStaleLock(lockPath: string, staleMs: number): boolean {
  const owner = readLockOwner(lockPath);
  if (owner !== undefined) {
    return !isPidRunning(owner);
  }
  try {
    const stats = fs.statSync(lockPath);
    return Date.now() - stats.mtimeMs > staleMs;
  } catch {
    return false;
  }
}

export async function withFileLock<T>(lockPath: string, fn: () => Promise<T>, options: FileLockOptions = {}): Promise<T> {
  const waitMs = options.waitMs ?? FILE_LOCK_WAIT_MS;
  const staleMs = options.staleMs ?? FILE_LOCK_STALE_MS;
  const start = Date.now();
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  while (true) {
    try {
      const fd = fs.openSync(lockPath, "wx");
      try {
        fs.writeFileSync(fd, JSON.stringify({ pid: process.pid, createdAt: new Date().toISOString() }), "utf-8");
      } finally {
        fs.closeSync(fd);
      }
      break;
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code !== "EEXIST") {
        throw err;
      }
      if (isStaleLock(lockPath, staleMs)) {
        fs.rmSync(lockPath, { force: true });
        continue;
      }
      if (Date.now() - start > waitMs) {
        throw new Error(`Lock ${lockPath} is held by another process. Retry shortly.`);
      }
      if (options.signal?.aborted) {
        throw new CancelledError(`Gave up waiting for ${lockPath}`);
      }
      await sleep(options.retryMs ?? FILE_LOCK_RETRY_MS);
    }
  }

  try {
    return await fn();
  } finally {
    fs.rmSync(lockPath, { force: true });
  }
}
