/**
 * Advisory lock file shared by every process touching the queue.
 *
 * The file is created exclusively (O_EXCL) and holds the owner's PID and a
 * per-instance token. A lock whose owner is dead, or which is older than
 * `staleMs`, is broken and retaken.
 */

import { readFileSync, statSync, unlinkSync, writeFileSync } from "node:fs";
import { nanoid } from "nanoid";

import { LockTimeoutError } from "../../core/errors.js";
import { sleep } from "../../core/async.js";
import type { Lease } from "../../core/ports/Lease.js";
import { isErrnoException, isPidAlive } from "../runner/processUtils.js";

export interface FileLockOptions {
  /** Delay between attempts (ms). Default: 25 */
  retryMs?: number;

  /** Give up after this long (ms). Default: 10000 */
  timeoutMs?: number;

  /** Age after which a held lock is broken (ms). Default: never */
  staleMs?: number;
}

interface LockOwner {
  pid: number | null;
  token: string;
}

export class FileLock implements Lease {
  private readonly token = nanoid(10);
  private readonly retryMs: number;
  private readonly timeoutMs: number;
  private readonly staleMs: number;

  constructor(
    private readonly lockFile: string,
    options: FileLockOptions = {}
  ) {
    this.retryMs = options.retryMs ?? 25;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.staleMs = options.staleMs ?? Number.POSITIVE_INFINITY;
  }

  get path(): string {
    return this.lockFile;
  }

  /**
   * Try once.
   * Returns null when acquired, otherwise the PID of the live holder
   * (or -1 if the holder could not be identified).
   */
  tryAcquire(): number | null {
    if (this.create()) return null;

    const owner = this.readOwner();
    if (owner && this.isStale(owner)) {
      this.breakLock(owner);
      if (this.create()) return null;
    }
    return owner?.pid ?? -1;
  }

  /**
   * Acquire, retrying until `timeoutMs`.
   */
  async acquire(): Promise<void> {
    const deadline = Date.now() + this.timeoutMs;
    for (;;) {
      const holder = this.tryAcquire();
      if (holder === null) return;
      if (Date.now() >= deadline) {
        throw new LockTimeoutError(this.lockFile, holder === -1 ? null : holder);
      }
      await sleep(this.retryMs);
    }
  }

  /**
   * Release the lock if we still hold it.
   */
  release(): void {
    const owner = this.readOwner();
    if (owner?.token !== this.token) return;
    try {
      unlinkSync(this.lockFile);
    } catch (e) {
      if (!isErrnoException(e) || e.code !== "ENOENT") throw e;
    }
  }

  /**
   * Run `fn` while holding the lock.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private create(): boolean {
    try {
      writeFileSync(this.lockFile, `${process.pid}\n${this.token}\n`, { flag: "wx" });
      return true;
    } catch (e) {
      if (isErrnoException(e) && e.code === "EEXIST") return false;
      throw e;
    }
  }

  private readOwner(): LockOwner | null {
    let content: string;
    try {
      content = readFileSync(this.lockFile, "utf-8");
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return null;
      throw e;
    }
    const [pidLine = "", token = ""] = content.split("\n");
    const pid = parseInt(pidLine, 10);
    return { pid: Number.isNaN(pid) ? null : pid, token };
  }

  private isStale(owner: LockOwner): boolean {
    if (owner.pid !== null && !isPidAlive(owner.pid)) return true;
    // PID not written yet or unreadable: only age can make it stale
    if (!Number.isFinite(this.staleMs)) return false;
    try {
      return Date.now() - statSync(this.lockFile).mtimeMs > this.staleMs;
    } catch {
      return false;
    }
  }

  private breakLock(stale: LockOwner): void {
    // Only remove the file if it still belongs to the holder we judged stale
    const current = this.readOwner();
    if (!current || current.token !== stale.token || current.pid !== stale.pid) return;
    try {
      unlinkSync(this.lockFile);
    } catch (e) {
      if (!isErrnoException(e) || e.code !== "ENOENT") throw e;
    }
  }
}
