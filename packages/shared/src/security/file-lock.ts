/**
 * File locking for SecureStore.
 *
 * Layer 1: in-process async mutex keyed by path, serializing calls made
 *          from the same process.
 * Layer 2: O_EXCL lock file, serializing separate processes that share a
 *          credential directory.
 */
import { open, unlink, readFile } from "node:fs/promises";
import { constants } from "node:fs";

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

// ─── In-Process Mutex ───

const locks = new Map<string, Promise<unknown>>();

/**
 * Serialize async operations on the same `key` within this process.
 * Different keys run concurrently.
 */
export async function withProcessLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const previous = locks.get(key) ?? Promise.resolve();
  // Chain on the previous holder whether it resolved or rejected.
  const current = previous.then(fn, fn);
  const tail = current.then(
    () => undefined,
    () => undefined,
  );
  locks.set(key, tail);

  try {
    return await current;
  } finally {
    if (locks.get(key) === tail) {
      locks.delete(key);
    }
  }
}

// ─── Cross-Process File Lock ───

export interface FileLockOptions {
  /** Max time (ms) to wait for the lock before throwing. Default: 5000 */
  timeoutMs?: number;
  /** Age (ms) after which a lock file is considered stale. Default: 30000 */
  staleMs?: number;
  /** Initial retry interval (ms). Backs off up to 4x. Default: 50 */
  retryMs?: number;
}

interface LockPayload {
  pid: number;
  ts: number;
}

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(err) && err.code === "EPERM";
  }
}

function parseLockPayload(content: string): LockPayload | undefined {
  try {
    const value: unknown = JSON.parse(content);
    if (
      typeof value === "object" &&
      value !== null &&
      "pid" in value &&
      "ts" in value &&
      typeof value.pid === "number" &&
      typeof value.ts === "number"
    ) {
      return { pid: value.pid, ts: value.ts };
    }
    return undefined;
  } catch {
    return undefined;
  }
}

async function removeIfPresent(lockPath: string): Promise<boolean> {
  try {
    await unlink(lockPath);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
}

async function tryCleanStaleLock(lockPath: string, staleMs: number): Promise<boolean> {
  let content: string;
  try {
    content = await readFile(lockPath, "utf-8");
  } catch (err) {
    // Released between our open() and this read
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }

  const payload = parseLockPayload(content);
  if (!payload || Date.now() - payload.ts > staleMs || !isPidAlive(payload.pid)) {
    return removeIfPresent(lockPath);
  }
  return false;
}

/**
 * Acquire a cross-process file lock using O_EXCL (atomic create-or-fail).
 * Returns a `release()` function that removes the lock file.
 *
 * @throws Error if the lock cannot be acquired within `timeoutMs`.
 */
export async function acquireFileLock(
  lockPath: string,
  options?: FileLockOptions,
): Promise<() => Promise<void>> {
  const timeoutMs = options?.timeoutMs ?? 5000;
  const staleMs = options?.staleMs ?? 30000;
  const baseRetryMs = options?.retryMs ?? 50;

  const deadline = Date.now() + timeoutMs;
  let retryMs = baseRetryMs;

  const payload: LockPayload = { pid: process.pid, ts: Date.now() };

  while (true) {
    try {
      const fh = await open(lockPath, constants.O_WRONLY | constants.O_CREAT | constants.O_EXCL);
      await fh.writeFile(JSON.stringify(payload), "utf-8");
      await fh.close();

      return async () => {
        await removeIfPresent(lockPath);
      };
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "EEXIST") throw err;

      if (await tryCleanStaleLock(lockPath, staleMs)) continue;

      if (Date.now() >= deadline) {
        throw new Error(`Failed to acquire file lock: ${lockPath} (timeout ${timeoutMs}ms)`);
      }

      await new Promise<void>((r) => setTimeout(r, retryMs));
      retryMs = Math.min(retryMs * 2, baseRetryMs * 4);
    }
  }
}
