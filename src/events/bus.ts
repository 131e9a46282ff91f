import { isFatal } from "../engine/errors.js";
import type {
  BusEvent,
  BusEventType,
  EventOf,
  Handler,
} from "./types.js";

function isType<K extends BusEventType>(
  event: BusEvent,
  type: K,
): event is EventOf<K> {
  return event.type === type;
}

/**
 * In-process pub/sub for domain events and UI intents.
 *
 * Delivery is queued: an event published from inside a handler is delivered
 * after the current event has reached every subscriber. That keeps each
 * publisher's events in publish order for every subscriber.
 */
export class EventBus {
  private subscribers = new Set<Handler<BusEvent>>();
  private queue: BusEvent[] = [];
  private draining = false;

  publish(event: BusEvent): void {
    this.queue.push(Object.freeze(event));
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        this.deliver(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  subscribe<K extends BusEventType>(
    type: K,
    handler: Handler<EventOf<K>>,
  ): () => void {
    return this.subscribeAll((event) => {
      if (isType(event, type)) handler(event);
    });
  }

  subscribeAll(handler: Handler<BusEvent>): () => void {
    // Wrap so the same function can be subscribed twice and removed independently.
    const entry: Handler<BusEvent> = (event) => handler(event);
    this.subscribers.add(entry);
    return () => {
      this.subscribers.delete(entry);
    };
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  private deliver(event: BusEvent): void {
    for (const handler of [...this.subscribers]) {
      try {
        handler(event);
      } catch (err) {
        if (isFatal(err)) {
          this.queue = [];
          throw err;
        }
        console.error(`[bus] handler for '${event.type}' threw:`, err);
      }
    }
  }
}
