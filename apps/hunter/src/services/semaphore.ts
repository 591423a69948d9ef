/**
 * Counting semaphore bounding the number of in-flight port lifecycles
 */
export class Semaphore {
  private capacity: number;
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.available = capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Take a permit, waiting for one to be released if none is free.
   * Resolves false, without a permit, if the signal aborts first.
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    if (this.available > 0) {
      this.available--;
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const grant = () => {
        signal?.removeEventListener("abort", cancel);
        resolve(true);
      };
      const cancel = () => {
        this.waiters = this.waiters.filter((waiter) => waiter !== grant);
        resolve(false);
      };

      this.waiters.push(grant);
      signal?.addEventListener("abort", cancel, { once: true });
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
      return;
    }

    if (this.available >= this.capacity) {
      throw new Error("Semaphore released more times than acquired");
    }
    this.available++;
  }
}
