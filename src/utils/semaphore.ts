/**
 * Counting semaphore for outbound call slots.
 *
 * One instance is shared by every batch of a campaign run, so pipelined or
 * overlapping batches still never exceed `permits` in-flight calls.
 * Waiters are served FIFO; an aborted waiter leaves the queue without
 * consuming a permit.
 */

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class Semaphore {
  private available: number;
  private waitQueue: Waiter[] = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortError());
    }

    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.waitQueue = this.waitQueue.filter((w) => w !== waiter);
          reject(abortError());
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.waitQueue.push(waiter);
    });
  }

  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      // Permit passes straight to the next waiter
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener("abort", next.onAbort);
      }
      next.resolve();
      return;
    }

    if (this.available >= this.permits) {
      throw new Error("Semaphore released more times than acquired");
    }
    this.available++;
  }

  /**
   * Run `fn` while holding one permit
   */
  async withPermit<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get availablePermits(): number {
    return this.available;
  }

  get pendingCount(): number {
    return this.waitQueue.length;
  }
}

function abortError(): Error {
  const error = new Error("Semaphore acquire aborted");
  error.name = "AbortError";
  return error;
}
