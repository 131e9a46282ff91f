import { EngineError } from "./errors.js";

interface Waiter<T> {
  resolve(message: T): void;
  reject(reason: unknown): void;
}

/**
 * Unbounded FIFO mailbox with a single consumer. `next()` suspends until a
 * message arrives; nothing polls.
 */
export class Inbox<T> {
  private messages: T[] = [];
  private waiting: Array<Waiter<T>> = [];
  private closed = false;

  push(message: T): void {
    if (this.closed) {
      throw new EngineError("INBOX_CLOSED", "Inbox is closed");
    }
    const waiter = this.waiting.shift();
    if (waiter) waiter.resolve(message);
    else this.messages.push(message);
  }

  /**
   * Take the next message. Rejects with the signal's reason on abort, and
   * with INBOX_CLOSED once the inbox is closed and drained.
   */
  async next(signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    if (this.messages.length > 0) {
      const [message, ...rest] = this.messages;
      this.messages = rest;
      if (message !== undefined) return message;
    }
    if (this.closed) throw new EngineError("INBOX_CLOSED", "Inbox is closed");

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.waiting = this.waiting.filter((w) => w !== waiter);
        reject(signal?.reason);
      };
      const waiter: Waiter<T> = {
        resolve: (message) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(message);
        },
        reject: (reason) => {
          signal?.removeEventListener("abort", onAbort);
          reject(reason);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiting.push(waiter);
    });
  }

  /** Stop accepting messages. Blocked consumers reject with INBOX_CLOSED. */
  close(): void {
    this.closed = true;
    const waiting = this.waiting;
    this.waiting = [];
    for (const waiter of waiting) {
      waiter.reject(new EngineError("INBOX_CLOSED", "Inbox is closed"));
    }
  }

  get size(): number {
    return this.messages.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
