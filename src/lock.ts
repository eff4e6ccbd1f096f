import {readFileSync, unlinkSync} from "node:fs";
import {open, readFile, stat, unlink} from "node:fs/promises";
import {setTimeout as sleep} from "node:timers/promises";
import {join} from "node:path";
import {z} from "zod";
import {LockAcquisitionError, errorMessage, isErrnoException} from "./errors.js";
import {silentLogger, type Logger} from "./utils/logger.js";

export const LOCK_FILE_NAME = "wtx.lock";

const lockInfoSchema = z.object({
  pid: z.number().int(),
  startedAt: z.string(),
  command: z.string()
});

export type LockInfo = z.infer<typeof lockInfoSchema>;

export interface RepoLockOptions {
  /** Usually `<git common dir>/wtx.lock`. */
  lockPath: string;
  command: string;
  /** How long to wait for another holder; 0 fails immediately. */
  timeoutMs: number;
  pollMs?: number;
  logger?: Logger;
  /** Runs when SIGINT/SIGTERM arrives while the lock is held, before it is released. */
  beforeExit?: () => void;
}

/** A takeover marker older than this belonged to a process that died mid-takeover. */
const ABANDONED_TAKEOVER_MS = 10_000;

export function lockPathFor(commonDir: string): string {
  return join(commonDir, LOCK_FILE_NAME);
}

/** Signal 0 only checks that the pid exists; EPERM means it exists under another user. */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === "EPERM";
  }
}

export async function readLockInfo(lockPath: string): Promise<LockInfo | undefined> {
  let content: string;
  try {
    content = await readFile(lockPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return undefined;
    throw error;
  }
  try {
    const parsed = lockInfoSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : undefined;
  } catch (error) {
    // half-written by a holder that is still starting up
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
}

async function tryCreate(lockPath: string, info: LockInfo): Promise<boolean> {
  try {
    const handle = await open(lockPath, "wx", 0o600);
    try {
      await handle.writeFile(JSON.stringify(info, null, 2));
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") return false;
    throw error;
  }
}

async function unlinkIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return;
    throw error;
  }
}

async function clearAbandonedTakeover(markerPath: string): Promise<void> {
  try {
    const {mtimeMs} = await stat(markerPath);
    if (Date.now() - mtimeMs < ABANDONED_TAKEOVER_MS) return;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return;
    throw error;
  }
  await unlinkIfPresent(markerPath);
}

/**
 * Remove a lock whose holder is gone. Resolves to whether the caller should
 * retry at once.
 *
 * Takeovers are serialized through `<lock>.takeover`, and the holder is read
 * again under it: a waiter that judged the old file stale must not delete the
 * lock another waiter has created since.
 */
async function clearStaleLock(lockPath: string, logger: Logger): Promise<boolean> {
  const holder = await readLockInfo(lockPath);
  if (!holder || isProcessRunning(holder.pid)) return false;

  const markerPath = `${lockPath}.takeover`;
  const marker: LockInfo = {pid: process.pid, startedAt: new Date().toISOString(), command: "takeover"};
  if (!(await tryCreate(markerPath, marker))) {
    await clearAbandonedTakeover(markerPath);
    return false;
  }

  try {
    const current = await readLockInfo(lockPath);
    if (!current) return true;
    if (current.pid !== holder.pid || current.startedAt !== holder.startedAt || isProcessRunning(current.pid)) {
      return false;
    }
    await unlinkIfPresent(lockPath);
    logger.warn(`Removed stale lock from PID ${holder.pid} (${holder.command})`);
    return true;
  } finally {
    await unlinkIfPresent(markerPath);
  }
}

function releaseSync(lockPath: string): void {
  try {
    const holder = lockInfoSchema.safeParse(JSON.parse(readFileSync(lockPath, "utf-8")));
    if (holder.success && holder.data.pid === process.pid) {
      unlinkSync(lockPath);
    }
  } catch (error) {
    // gone already, or overwritten mid-write by the next holder
    if (isErrnoException(error) && error.code === "ENOENT") return;
    if (error instanceof SyntaxError) return;
    throw error;
  }
}

/** Release without throwing; a failed release must not replace the task's own outcome. */
function release(lockPath: string, logger: Logger): void {
  try {
    releaseSync(lockPath);
  } catch (error) {
    logger.warn(`Could not release lock ${lockPath}: ${errorMessage(error)}`);
  }
}

/**
 * Handler for SIGINT/SIGTERM while the lock is held: run `beforeExit` (which
 * stops hook processes that would otherwise outlive us), release, then exit.
 */
export function createInterruptHandler(
  lockPath: string,
  options: {logger?: Logger; beforeExit?: () => void; exit?: (code: number) => void} = {}
): (signal: NodeJS.Signals) => void {
  const logger = options.logger ?? silentLogger;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  return (signal) => {
    try {
      options.beforeExit?.();
    } catch (error) {
      logger.warn(`Cleanup on ${signal} failed: ${errorMessage(error)}`);
    }
    release(lockPath, logger);
    exit(signal === "SIGINT" ? 130 : 143);
  };
}

/**
 * Run `task` while holding the repository lock. The lock file is created
 * exclusively; a second invocation waits up to `timeoutMs` and then fails with
 * LockAcquisitionError. The lock is released when `task` settles and also when
 * the process exits or is interrupted while holding it.
 */
export async function withRepoLock<T>(options: RepoLockOptions, task: () => Promise<T>): Promise<T> {
  const logger = options.logger ?? silentLogger;
  const pollMs = options.pollMs ?? 100;
  const deadline = Date.now() + options.timeoutMs;
  const info: LockInfo = {pid: process.pid, startedAt: new Date().toISOString(), command: options.command};

  for (;;) {
    if (await tryCreate(options.lockPath, info)) break;
    if (await clearStaleLock(options.lockPath, logger)) continue;
    if (Date.now() >= deadline) {
      const holder = await readLockInfo(options.lockPath);
      throw new LockAcquisitionError(options.lockPath, holder?.pid);
    }
    await sleep(pollMs);
  }

  logger.event("lock.acquired", {path: options.lockPath});
  const onExit = (): void => release(options.lockPath, logger);
  const onSignal = createInterruptHandler(options.lockPath, {logger, beforeExit: options.beforeExit});
  process.once("exit", onExit);
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    return await task();
  } finally {
    process.removeListener("exit", onExit);
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    release(options.lockPath, logger);
    logger.event("lock.released", {path: options.lockPath});
  }
}
