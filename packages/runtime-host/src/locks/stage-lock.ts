/**
 * Crucible Runtime Host — File Stage Lock
 *
 * Implements StageLock with one lockfile per CacheKey under a lock
 * directory. Acquisition is an exclusive create (O_CREAT | O_EXCL); the
 * holder writes its pid and acquisition time into the file.
 *
 * A lock is stale when its holder pid is no longer alive, or when the file
 * cannot be parsed and is older than UNREADABLE_GRACE_MS (a holder that has
 * created the file but not yet written it is not stale).
 *
 * Breaking a stale lock happens under a second exclusive file,
 * `<lock>.break`: the breaker re-reads the lock while holding it and removes
 * the lock only if it is still stale. Two waiters that find the same dead
 * holder therefore cannot delete each other's fresh lock. Each acquisition
 * writes its own token, and release removes the file only while it still
 * carries that token.
 *
 * Waiting polls at a fixed interval until the timeout, then throws
 * LockTimeoutError.
 */

import { mkdir, open, readFile, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { LockTimeoutError, cacheKeyId } from '@crucible/kernel';
import type { CacheKey, LockHandle, StageLock } from '@crucible/kernel';
import { isNodeError } from '../adapters/fs.js';
import { ulid } from '../logging/ulid.js';

/** Stage builds can take a long time; wait up to two hours by default. */
const DEFAULT_TIMEOUT_MS = 2 * 60 * 60 * 1000;
const DEFAULT_POLL_MS = 2000;
const UNREADABLE_GRACE_MS = 5000;

export interface FileStageLockOptions {
  readonly timeoutMs?: number | undefined;
  readonly pollMs?: number | undefined;
  /** Liveness probe for a holder pid. */
  readonly isAlive?: ((pid: number) => boolean) | undefined;
}

interface LockHolder {
  readonly pid: number;
  readonly acquired_at: string;
  readonly token: string;
}

export class FileStageLock implements StageLock {
  private readonly timeoutMs: number;
  private readonly pollMs: number;
  private readonly isAlive: (pid: number) => boolean;

  constructor(private readonly lockDir: string, options: FileStageLockOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.pollMs = options.pollMs ?? DEFAULT_POLL_MS;
    this.isAlive = options.isAlive ?? processIsAlive;
  }

  lockPath(key: CacheKey): string {
    return join(this.lockDir, `${cacheKeyId(key)}.lock`);
  }

  async acquire(key: CacheKey): Promise<LockHandle> {
    await mkdir(this.lockDir, { recursive: true });
    const path = this.lockPath(key);
    const started = Date.now();

    for (;;) {
      const token = await this.tryCreate(path);
      if (token !== null) {
        return { release: () => this.release(path, token) };
      }

      if ((await this.isStale(path)) && (await this.breakStale(path))) {
        continue;
      }

      const waited = Date.now() - started;
      if (waited >= this.timeoutMs) {
        throw new LockTimeoutError(key, waited);
      }
      await sleep(this.pollMs);
    }
  }

  /** Exclusive create; returns the holder token, or null when the file exists. */
  private async tryCreate(path: string): Promise<string | null> {
    try {
      const handle = await open(path, 'wx');
      const holder: LockHolder = { pid: process.pid, acquired_at: new Date().toISOString(), token: ulid() };
      try {
        await handle.writeFile(JSON.stringify(holder), 'utf-8');
      } finally {
        await handle.close();
      }
      return holder.token;
    } catch (err: unknown) {
      if (isNodeError(err, 'EEXIST')) return null;
      throw err;
    }
  }

  /**
   * Remove a stale lock while holding its breaker file. False when another
   * waiter is breaking it, or when the lock is no longer stale.
   */
  private async breakStale(path: string): Promise<boolean> {
    const breaker = `${path}.break`;
    const token = await this.tryCreate(breaker);
    if (token === null) {
      // A breaker that died mid-break is cleared for the next round.
      if (await this.isStale(breaker)) {
        await rm(breaker, { force: true });
      }
      return false;
    }

    try {
      if (!(await this.isStale(path))) return false;
      await rm(path, { force: true });
      return true;
    } finally {
      await this.release(breaker, token);
    }
  }

  private async release(path: string, token: string): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return;
      throw err;
    }
    if (parseHolderToken(raw) === token) {
      await rm(path, { force: true });
    }
  }

  private async isStale(path: string): Promise<boolean> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err: unknown) {
      // Released between our create attempt and this read.
      if (isNodeError(err, 'ENOENT')) return false;
      throw err;
    }

    const pid = parseHolderPid(raw);
    if (pid !== null) {
      return !this.isAlive(pid);
    }

    try {
      const { mtimeMs } = await stat(path);
      return Date.now() - mtimeMs > UNREADABLE_GRACE_MS;
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return false;
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

export function parseHolderPid(raw: string): number | null {
  const pid = holderField(raw, 'pid');
  return typeof pid === 'number' && Number.isInteger(pid) && pid > 0 ? pid : null;
}

export function parseHolderToken(raw: string): string | null {
  const token = holderField(raw, 'token');
  return typeof token === 'string' && token !== '' ? token : null;
}

function holderField(raw: string, field: keyof LockHolder): unknown {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, field);
}

/** Signal 0 probes for existence; EPERM means the pid exists under another user. */
function processIsAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return isNodeError(err, 'EPERM');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
