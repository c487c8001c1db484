/**
 * Per-target deployment locks.
 *
 * At most one deployment holds a target at a time. A second request either
 * fails immediately (fail-fast) or queues behind the holder for a bounded,
 * abortable wait (block). Waiters are served in arrival order.
 */

import { LockMode } from '../config';
import { TargetBusyError } from '../domain/errors';
import { abortReason } from '../util/abort';

export interface AcquireOptions {
  mode?: LockMode;
  /** Recorded as the lock holder (usually the run id). */
  holder?: string;
  signal?: AbortSignal;
  /** Bound on the wait in block mode. */
  waitTimeoutMs?: number;
}

export interface TargetLease {
  targetId: string;
  holder: string;
  acquiredAt: string;
  /** Idempotent. */
  release: () => void;
}

interface Holding {
  holder: string;
  acquiredAt: string;
  token: symbol;
}

interface Waiter {
  holder: string;
  grant: (lease: TargetLease) => void;
}

export class TargetLockManager {
  private held = new Map<string, Holding>();
  private waiters = new Map<string, Waiter[]>();

  constructor(private defaults: { mode: LockMode; waitTimeoutMs: number } = { mode: 'fail-fast', waitTimeoutMs: 300_000 }) {}

  /** Take the lock without waiting, or return null when it is held. */
  tryAcquire(targetId: string, holder = 'anonymous'): TargetLease | null {
    if (this.held.has(targetId)) return null;
    return this.take(targetId, holder);
  }

  async acquire(targetId: string, options: AcquireOptions = {}): Promise<TargetLease> {
    const holder = options.holder ?? 'anonymous';
    const signal = options.signal;
    if (signal?.aborted) throw abortReason(signal);

    const lease = this.tryAcquire(targetId, holder);
    if (lease) return lease;

    const mode = options.mode ?? this.defaults.mode;
    if (mode === 'fail-fast') {
      throw new TargetBusyError(targetId, this.holder(targetId));
    }

    const waitTimeoutMs = options.waitTimeoutMs ?? this.defaults.waitTimeoutMs;
    return new Promise<TargetLease>((resolve, reject) => {
      const queue = this.waiters.get(targetId) ?? [];
      this.waiters.set(targetId, queue);

      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = queue.indexOf(waiter);
        if (index >= 0) queue.splice(index, 1);
        if (queue.length === 0 && this.waiters.get(targetId) === queue) this.waiters.delete(targetId);
      };
      const waiter: Waiter = {
        holder,
        grant: (granted) => {
          cleanup();
          resolve(granted);
        },
      };
      const onAbort = () => {
        cleanup();
        if (signal) reject(abortReason(signal));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new TargetBusyError(targetId, this.holder(targetId)));
      }, waitTimeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      queue.push(waiter);
    });
  }

  isLocked(targetId: string): boolean {
    return this.held.has(targetId);
  }

  holder(targetId: string): string | undefined {
    return this.held.get(targetId)?.holder;
  }

  /** Number of requests queued behind the holder. */
  waiting(targetId: string): number {
    return this.waiters.get(targetId)?.length ?? 0;
  }

  private take(targetId: string, holder: string): TargetLease {
    const holding: Holding = { holder, acquiredAt: new Date().toISOString(), token: Symbol(targetId) };
    this.held.set(targetId, holding);

    let released = false;
    return {
      targetId,
      holder,
      acquiredAt: holding.acquiredAt,
      release: () => {
        if (released) return;
        released = true;
        this.release(targetId, holding.token);
      },
    };
  }

  private release(targetId: string, token: symbol): void {
    if (this.held.get(targetId)?.token !== token) return;
    this.held.delete(targetId);

    const next = this.waiters.get(targetId)?.[0];
    if (next) {
      next.grant(this.take(targetId, next.holder));
    }
  }
}
