/**
 * Notification Hub: fans fleet events out to subscribers without ever
 * blocking the publisher.
 *
 * Each subscriber owns a bounded buffer. When a slow subscriber's buffer is
 * full, the oldest buffered event is dropped and a `subscriber.overrun`
 * marker carrying the number of dropped events is delivered ahead of
 * whatever remains, so the subscriber knows to resync from the registry.
 *
 * Every published event is stamped with a hub-wide sequence number and the
 * publish time. Delivery to any one subscriber follows publish order.
 *
 * Usage:
 *   const sub = hub.subscribe();
 *   for await (const event of sub) { ... }   // ends when sub.close() is called
 */

import type { Logger } from "pino";
import {
  generateId,
  type FleetEvent,
  type FleetEventInput,
  type HubDelivery,
  type SubscriberOverrunEvent,
} from "@fleetdeck/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Default per-subscriber buffer capacity */
export const DEFAULT_HUB_BUFFER_SIZE = 256;

export interface NotificationHubOptions {
  logger: Logger;
  /** Per-subscriber buffer capacity (default: 256) */
  bufferSize?: number;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export interface SubscribeOptions {
  /** Overrides the hub's buffer capacity for this subscriber */
  bufferSize?: number;
  /**
   * Only events passing the filter are buffered. Evaluated at publish time,
   * so a filter that reads mutable state follows that state.
   */
  filter?: (event: FleetEvent) => boolean;
}

/**
 * One subscriber's view of the event stream. Iterating it yields every event
 * published after subscribe() until close() is called.
 */
export interface Subscription extends AsyncIterable<HubDelivery> {
  readonly id: string;
  readonly closed: boolean;
  /** Buffered deliveries not yet taken (an outstanding overrun marker counts as one) */
  pending(): number;
  /** Wait for the next delivery; resolves null once the subscription is closed */
  next(): Promise<HubDelivery | null>;
  /** Take everything buffered right now without waiting */
  drain(): HubDelivery[];
  /** Stop receiving events; pending next() calls resolve null */
  close(): void;
}

interface SubscriberState {
  id: string;
  capacity: number;
  filter?: (event: FleetEvent) => boolean;
  buffer: FleetEvent[];
  /** Events dropped since the last overrun marker was taken */
  dropped: number;
  waiters: Array<(delivery: HubDelivery | null) => void>;
  closed: boolean;
}

// ---------------------------------------------------------------------------
// Hub
// ---------------------------------------------------------------------------

export class NotificationHub {
  private readonly logger: Logger;
  private readonly bufferSize: number;
  private readonly now: () => Date;
  private readonly subscribers = new Map<string, SubscriberState>();
  private seq = 0;

  constructor(options: NotificationHubOptions) {
    this.logger = options.logger.child({ component: "notification-hub" });
    this.bufferSize = options.bufferSize ?? DEFAULT_HUB_BUFFER_SIZE;
    this.now = options.now ?? (() => new Date());
    if (!Number.isInteger(this.bufferSize) || this.bufferSize < 1) {
      throw new RangeError(`Hub buffer size must be a positive integer, got ${this.bufferSize}`);
    }
  }

  /** Number of open subscriptions */
  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /** Sequence number of the most recently published event (0 before the first) */
  get lastSeq(): number {
    return this.seq;
  }

  /**
   * Stamp and deliver an event to every open subscriber. Never blocks and
   * never throws because of a subscriber.
   */
  publish(input: FleetEventInput): FleetEvent {
    this.seq += 1;
    const event: FleetEvent = { ...input, seq: this.seq, at: this.now().toISOString() };

    for (const state of this.subscribers.values()) {
      if (!this.accepts(state, event)) continue;
      this.deliver(state, event);
    }

    return event;
  }

  /** A filter that throws is logged, and the subscriber misses that event */
  private accepts(state: SubscriberState, event: FleetEvent): boolean {
    if (!state.filter) return true;
    try {
      return state.filter(event);
    } catch (err) {
      this.logger.error(
        { err, subscriberId: state.id, seq: event.seq, type: event.type },
        "Subscriber filter threw; event skipped for this subscriber",
      );
      return false;
    }
  }

  subscribe(options: SubscribeOptions = {}): Subscription {
    const state: SubscriberState = {
      id: generateId(),
      capacity: options.bufferSize ?? this.bufferSize,
      filter: options.filter,
      buffer: [],
      dropped: 0,
      waiters: [],
      closed: false,
    };
    this.subscribers.set(state.id, state);
    this.logger.debug({ subscriberId: state.id }, "Subscriber added");

    const take = (): HubDelivery | undefined => this.take(state);
    const close = (): void => this.closeSubscriber(state);

    return {
      id: state.id,
      get closed() {
        return state.closed;
      },
      pending: () => state.buffer.length + (state.dropped > 0 ? 1 : 0),
      next: () => {
        const ready = take();
        if (ready) return Promise.resolve(ready);
        if (state.closed) return Promise.resolve(null);
        return new Promise((resolve) => state.waiters.push(resolve));
      },
      drain: () => {
        const out: HubDelivery[] = [];
        for (let delivery = take(); delivery; delivery = take()) {
          out.push(delivery);
        }
        return out;
      },
      close,
      async *[Symbol.asyncIterator]() {
        while (true) {
          const ready = take();
          if (ready) {
            yield ready;
            continue;
          }
          if (state.closed) return;
          const delivery = await new Promise<HubDelivery | null>((resolve) =>
            state.waiters.push(resolve),
          );
          if (delivery === null) return;
          yield delivery;
        }
      },
    };
  }

  /** Close every subscription (engine shutdown) */
  close(): void {
    for (const state of [...this.subscribers.values()]) {
      this.closeSubscriber(state);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private deliver(state: SubscriberState, event: FleetEvent): void {
    // A waiting reader with nothing buffered takes the event directly
    const waiter = state.buffer.length === 0 && state.dropped === 0 ? state.waiters.shift() : undefined;
    if (waiter) {
      waiter(event);
      return;
    }

    if (state.buffer.length >= state.capacity) {
      state.buffer.shift();
      state.dropped += 1;
      if (state.dropped === 1) {
        this.logger.warn(
          { subscriberId: state.id, capacity: state.capacity },
          "Subscriber buffer full, dropping oldest events",
        );
      }
    }
    state.buffer.push(event);
  }

  /** Next delivery for a subscriber: the overrun marker first, then buffered events */
  private take(state: SubscriberState): HubDelivery | undefined {
    if (state.dropped > 0) {
      const marker: SubscriberOverrunEvent = {
        type: "subscriber.overrun",
        dropped: state.dropped,
        at: this.now().toISOString(),
      };
      state.dropped = 0;
      return marker;
    }
    return state.buffer.shift();
  }

  private closeSubscriber(state: SubscriberState): void {
    if (state.closed) return;
    state.closed = true;
    state.buffer = [];
    state.dropped = 0;
    this.subscribers.delete(state.id);
    for (const waiter of state.waiters.splice(0)) {
      waiter(null);
    }
    this.logger.debug({ subscriberId: state.id }, "Subscriber closed");
  }
}
