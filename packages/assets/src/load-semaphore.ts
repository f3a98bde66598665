/**
 * Counting semaphore that caps concurrent loader invocations.
 *
 * Waiters are served by priority (lower value first), FIFO within a
 * priority. A waiter whose signal aborts leaves the queue without taking
 * a slot.
 */

import { LoadPriority } from './types.js';

export type ReleaseSlot = () => void;

interface Waiter {
  readonly priority: LoadPriority;
  readonly grant: (release: ReleaseSlot) => void;
}

export class LoadSemaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    this.available = capacity;
  }

  /** Slots currently taken. */
  get active(): number {
    return this.capacity - this.available;
  }

  /** Loads waiting for a slot. */
  get queued(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a slot. The returned function gives the slot back and may be
   * called more than once.
   */
  acquire(priority: LoadPriority = LoadPriority.Normal, signal?: AbortSignal): Promise<ReleaseSlot> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.available > 0 && this.waiters.length === 0) {
      this.available -= 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<ReleaseSlot>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        priority,
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };

      this.insert(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private insert(waiter: Waiter): void {
    let index = this.waiters.length;
    while (
      index > 0 &&
      (this.waiters[index - 1]?.priority ?? LoadPriority.Immediate) > waiter.priority
    ) {
      index -= 1;
    }
    this.waiters.splice(index, 0, waiter);
  }

  private createRelease(): ReleaseSlot {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand the slot straight to the next waiter.
        next.grant(this.createRelease());
      } else {
        this.available += 1;
      }
    };
  }
}
