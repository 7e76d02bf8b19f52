import { AbortError } from '../utils/abort.js';

interface Waiter {
  grant: () => void;
  onAbort: () => void;
}

export type Release = () => void;

/**
 * FIFO counting semaphore. Slot counts change synchronously, so the number
 * of holders never exceeds `limit`.
 */
export class ConcurrencyGate {
  private active = 0;
  private waiters: Waiter[] = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a slot. Rejects with AbortError if `signal` aborts first.
   */
  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new AbortError());
    }

    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', waiter.onAbort);
          resolve(this.createRelease());
        },
        onAbort: () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          reject(new AbortError());
        },
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Slot passes straight to the next waiter
        next.grant();
      } else {
        this.active--;
      }
    };
  }
}
