/**
 * Tests for notification-hub.ts: non-blocking fan-out with bounded,
 * drop-oldest subscriber buffers.
 *
 * Tests cover:
 *   1. Sequence numbers and publish timestamps
 *   2. Subscribers only see events published after they subscribed
 *   3. Overrun: oldest events dropped, marker delivered first
 *   4. next() waits for the next event; close() releases waiters
 *   5. Async iteration ends when the subscription closes
 *   6. Per-subscriber filters
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import pino from "pino";
import type { FleetEventInput, HubDelivery } from "@fleetdeck/shared";
import { NotificationHub } from "../notification-hub.js";

/** Silent logger for tests: suppresses all output */
const silentLogger = pino({ level: "silent" });

function removed(deviceId: string): FleetEventInput {
  return { type: "device.removed", source: "registry", device_id: deviceId };
}

/** Device ids of removal events, or the overrun marker's drop count */
function summarize(deliveries: HubDelivery[]): Array<string | number> {
  return deliveries.map((d) => {
    if (d.type === "subscriber.overrun") return d.dropped;
    if (d.type === "device.removed") return d.device_id;
    return d.type;
  });
}

describe("NotificationHub", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-03-01T12:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("stamps events with increasing seq and the publish time", () => {
    const hub = new NotificationHub({ logger: silentLogger });
    const first = hub.publish(removed("a"));
    const second = hub.publish(removed("b"));

    expect(first.seq).toBe(1);
    expect(second.seq).toBe(2);
    expect(first.at).toBe("2025-03-01T12:00:00.000Z");
    expect(hub.lastSeq).toBe(2);
  });

  test("subscribers only receive events published after subscribe", () => {
    const hub = new NotificationHub({ logger: silentLogger });
    hub.publish(removed("before"));
    const sub = hub.subscribe();
    hub.publish(removed("after"));

    expect(summarize(sub.drain())).toEqual(["after"]);
  });

  test("each subscriber gets its own independent sequence", () => {
    const hub = new NotificationHub({ logger: silentLogger });
    const a = hub.subscribe();
    hub.publish(removed("one"));
    const b = hub.subscribe();
    hub.publish(removed("two"));

    expect(summarize(a.drain())).toEqual(["one", "two"]);
    expect(summarize(b.drain())).toEqual(["two"]);
  });

  test("a full buffer drops the oldest events and reports the loss first", () => {
    const hub = new NotificationHub({ logger: silentLogger, bufferSize: 3 });
    const slow = hub.subscribe();
    for (const id of ["e1", "e2", "e3", "e4", "e5"]) {
      hub.publish(removed(id));
    }

    expect(slow.pending()).toBe(4);
    expect(summarize(slow.drain())).toEqual([2, "e3", "e4", "e5"]);
    expect(slow.pending()).toBe(0);
  });

  test("an overrun on one subscriber does not affect another", () => {
    const hub = new NotificationHub({ logger: silentLogger, bufferSize: 10 });
    const slow = hub.subscribe({ bufferSize: 1 });
    const fast = hub.subscribe();
    hub.publish(removed("x"));
    hub.publish(removed("y"));

    expect(summarize(slow.drain())).toEqual([1, "y"]);
    expect(summarize(fast.drain())).toEqual(["x", "y"]);
  });

  test("next() resolves with the next published event", async () => {
    const hub = new NotificationHub({ logger: silentLogger });
    const sub = hub.subscribe();
    const waiting = sub.next();
    hub.publish(removed("dev-9"));

    const delivery = await waiting;
    expect(delivery?.type).toBe("device.removed");
  });

  test("close() resolves pending next() calls with null and unsubscribes", async () => {
    const hub = new NotificationHub({ logger: silentLogger });
    const sub = hub.subscribe();
    const waiting = sub.next();
    sub.close();

    expect(await waiting).toBeNull();
    expect(sub.closed).toBe(true);
    expect(hub.subscriberCount).toBe(0);
    expect(await sub.next()).toBeNull();
  });

  test("async iteration yields buffered events and ends on close", async () => {
    const hub = new NotificationHub({ logger: silentLogger });
    const sub = hub.subscribe();
    hub.publish(removed("a"));
    hub.publish(removed("b"));

    const seen: HubDelivery[] = [];
    const reading = (async () => {
      for await (const delivery of sub) {
        seen.push(delivery);
        if (seen.length === 3) sub.close();
      }
    })();

    await Promise.resolve();
    hub.publish(removed("c"));
    await reading;

    expect(summarize(seen)).toEqual(["a", "b", "c"]);
  });

  test("filters are applied before buffering", () => {
    const hub = new NotificationHub({ logger: silentLogger, bufferSize: 1 });
    const sub = hub.subscribe({
      filter: (event) => event.type === "device.removed" && event.device_id === "keep",
    });
    hub.publish(removed("skip"));
    hub.publish(removed("keep"));
    hub.publish(removed("skip"));

    expect(summarize(sub.drain())).toEqual(["keep"]);
  });

  test("a throwing filter skips the event for that subscriber only", () => {
    const hub = new NotificationHub({ logger: silentLogger });
    const broken = hub.subscribe({
      filter: (event) => {
        if (event.type === "device.removed" && event.device_id === "bad") {
          throw new Error("filter bug");
        }
        return true;
      },
    });
    const healthy = hub.subscribe();

    expect(() => hub.publish(removed("bad"))).not.toThrow();
    hub.publish(removed("good"));

    expect(summarize(broken.drain())).toEqual(["good"]);
    expect(summarize(healthy.drain())).toEqual(["bad", "good"]);
  });

  test("hub.close() closes every subscription", () => {
    const hub = new NotificationHub({ logger: silentLogger });
    const a = hub.subscribe();
    const b = hub.subscribe();
    hub.close();

    expect(a.closed).toBe(true);
    expect(b.closed).toBe(true);
    expect(hub.subscriberCount).toBe(0);
  });

  test("rejects a non-positive buffer size", () => {
    expect(() => new NotificationHub({ logger: silentLogger, bufferSize: 0 })).toThrow(RangeError);
  });
});
