/**
 * Counting semaphore bounding how many sub-agent sessions run at once.
 * Waiters are served FIFO; a waiter whose signal aborts leaves the queue
 * without consuming a permit.
 */
export class Semaphore {
  private permits: number;
  private readonly max: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error("Semaphore permits must be >= 1");
    }
    this.permits = permits;
    this.max = permits;
  }

  /**
   * Acquire a permit. Blocks if no permits available.
   * Rejects with the signal's reason if it aborts before a permit is granted.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw signal.reason;
    }
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const waiter = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      const onAbort = () => {
        this.waiting = this.waiting.filter((w) => w !== waiter);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiting.push(waiter);
    });
  }

  /**
   * Release a permit. Wakes up a waiting acquirer if any.
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    if (this.permits >= this.max) {
      throw new Error(
        `Semaphore over-release: already at max permits (${this.max})`,
      );
    }
    this.permits++;
  }

  /**
   * Number of permits currently available.
   */
  get available(): number {
    return this.permits;
  }

  /** Number of acquirers blocked on a permit. */
  get queued(): number {
    return this.waiting.length;
  }
}
