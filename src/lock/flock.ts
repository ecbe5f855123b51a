/**
 * Advisory File Lock
 *
 * Exclusive flock(2) on a file with a bounded wait. fs-ext's blocking
 * flock would stall the event loop, so the lock is requested in
 * non-blocking mode and retried until the deadline.
 */

import { open, stat, type FileHandle } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import fsExt from 'fs-ext';

import { LockTimeoutError } from '../core/errors.js';

/**
 * Default wait bound for acquiring the lock
 */
export const DEFAULT_LOCK_TIMEOUT_MS = 1000;

/**
 * Default delay between non-blocking attempts
 */
export const DEFAULT_LOCK_POLL_INTERVAL_MS = 50;

/**
 * Options for acquiring a lock
 */
export interface LockOptions {
  /** Give up after this many milliseconds (default: 1000) */
  timeoutMs?: number;
  /** Delay between attempts (default: 50) */
  pollIntervalMs?: number;
}

/**
 * fs-ext flock operations used here
 */
type FlockOperation = 'exnb' | 'un';

/**
 * Promise wrapper around fs-ext's callback flock.
 */
function flock(fd: number, operation: FlockOperation): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    fsExt.flock(fd, operation, (err) => {
      if (err === undefined || err === null) {
        resolve();
      } else {
        reject(err);
      }
    });
  });
}

/**
 * One non-blocking attempt. Resolves false when someone else holds the lock.
 */
async function tryLock(fd: number): Promise<boolean> {
  try {
    await flock(fd, 'exnb');
    return true;
  } catch (error) {
    if (isWouldBlock(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Whether a flock failure means "held by someone else".
 */
export function isWouldBlock(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = (error as NodeJS.ErrnoException).code;
  return (
    code === 'EAGAIN' ||
    code === 'EWOULDBLOCK' ||
    error.message.startsWith('EAGAIN') ||
    error.message.startsWith('EWOULDBLOCK')
  );
}

/**
 * Whether `handle` still refers to the file currently at `path`.
 *
 * A rename over `path` while we waited leaves the handle on the old,
 * unlinked inode, and a lock on that inode excludes nobody.
 */
async function isCurrentFile(handle: FileHandle, path: string): Promise<boolean> {
  const [held, current] = await Promise.all([handle.stat(), stat(path).catch(() => null)]);
  return current !== null && held.dev === current.dev && held.ino === current.ino;
}

/**
 * An exclusive lock held through an open file handle.
 *
 * Closing the handle would also drop the lock; release() unlocks
 * explicitly first so the release does not depend on close ordering.
 */
export class FileLock {
  private released = false;

  private constructor(
    public readonly path: string,
    private readonly handle: FileHandle
  ) {}

  /**
   * Acquire an exclusive lock on `path`, waiting at most `timeoutMs`.
   *
   * If the file at `path` is replaced while waiting, the lock is taken
   * again on the new file within the same deadline.
   *
   * @throws LockTimeoutError if the lock is still held elsewhere at the deadline
   */
  static async acquire(path: string, options: LockOptions = {}): Promise<FileLock> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_LOCK_POLL_INTERVAL_MS;

    let handle = await open(path, 'r');
    const deadline = Date.now() + timeoutMs;

    try {
      for (;;) {
        if (await tryLock(handle.fd)) {
          if (await isCurrentFile(handle, path)) {
            return new FileLock(path, handle);
          }
          const stale = handle;
          handle = await open(path, 'r');
          await stale.close();
          continue;
        }

        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          throw new LockTimeoutError(path, timeoutMs);
        }
        await sleep(Math.min(pollIntervalMs, remaining));
      }
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  /**
   * Whether release() has run.
   */
  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Unlock and close the descriptor. Safe to call more than once.
   */
  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    try {
      await flock(this.handle.fd, 'un');
    } finally {
      await this.handle.close();
    }
  }
}

/**
 * Run `fn` while holding an exclusive lock on `path`.
 *
 * The lock is released whether `fn` resolves or rejects.
 */
export async function withExclusiveLock<T>(
  path: string,
  options: LockOptions,
  fn: (lock: FileLock) => Promise<T>
): Promise<T> {
  const lock = await FileLock.acquire(path, options);
  try {
    return await fn(lock);
  } finally {
    await lock.release();
  }
}
