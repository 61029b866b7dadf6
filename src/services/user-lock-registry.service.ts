import { Inject, Injectable } from '@nestjs/common';
import { LockTimeoutError } from '../errors/lock-timeout.error';
import type { ResolvedSessionOptions } from '../interfaces/session-module-options.interface';
import { SESSION_MODULE_OPTIONS } from '../session.constants';

interface LockWaiter {
  grant: () => void;
  timer: ReturnType<typeof setTimeout>;
}

class UserLock {
  private held = false;
  private readonly waiters: LockWaiter[] = [];

  get isHeld(): boolean {
    return this.held;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(userKey: string, timeoutMs: number): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: LockWaiter = {
        grant: () => {
          clearTimeout(waiter.timer);
          resolve();
        },
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new LockTimeoutError(userKey, timeoutMs));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Hands ownership straight to the oldest waiter, if any. */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.grant();
      return;
    }
    this.held = false;
  }
}

/**
 * Process-wide registry of per-user FIFO locks. Entries are created on first
 * use and kept for the lifetime of the process.
 */
@Injectable()
export class UserLockRegistry {
  private readonly locks = new Map<string, UserLock>();

  constructor(
    @Inject(SESSION_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedSessionOptions, 'lockTimeoutMs'>,
  ) {}

  async withLock<T>(
    userKey: string,
    fn: () => Promise<T>,
    timeoutMs: number = this.options.lockTimeoutMs,
  ): Promise<T> {
    const lock = this.getLock(userKey);
    await lock.acquire(userKey, timeoutMs);
    try {
      return await fn();
    } finally {
      lock.release();
    }
  }

  isLocked(userKey: string): boolean {
    return this.locks.get(userKey)?.isHeld ?? false;
  }

  /** Number of callers queued behind the current holder. */
  queueLength(userKey: string): number {
    return this.locks.get(userKey)?.pending ?? 0;
  }

  get size(): number {
    return this.locks.size;
  }

  private getLock(userKey: string): UserLock {
    const existing = this.locks.get(userKey);
    if (existing) return existing;

    const created = new UserLock();
    this.locks.set(userKey, created);
    return created;
  }
}
