/**
 * Tests for `fleetdeck watch` against an in-process operator feed.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { HubDelivery } from "@fleetdeck/shared";
import type { WsClient } from "../../lib/ws-client.js";
import { stripAnsi } from "../../lib/formatters.js";
import { startWatch } from "../watch.js";
import { startFakeFeed, waitFor, type FakeFeed } from "../../__tests__/helpers.js";

let feed: FakeFeed;
let client: WsClient | null = null;
let lines: string[];
let statusLines: string[];

beforeEach(async () => {
  feed = await startFakeFeed();
  lines = [];
  statusLines = [];
});

afterEach(async () => {
  client?.destroy();
  client = null;
  await feed.close();
});

async function watch(opts: { device?: string; json?: boolean } = {}): Promise<WsClient> {
  client = await startWatch(opts, {
    baseUrl: feed.url,
    write: (line) => lines.push(stripAnsi(line)),
    status: (line) => statusLines.push(stripAnsi(line)),
    reconnect: { baseReconnectDelay: 10, reconnectJitter: 0 },
  });
  return client;
}

const removed: HubDelivery = {
  type: "device.removed",
  source: "registry",
  seq: 4,
  at: "2026-03-01T10:00:05.000Z",
  device_id: "dev-1",
};

describe("startWatch", () => {
  it("subscribes to the whole fleet and prints events", async () => {
    await watch();
    await waitFor(() => feed.received.length === 1);
    expect(feed.received).toEqual([{ type: "subscribe", scope: "all" }]);
    expect(statusLines).toEqual([`Connected to ${feed.url}`]);

    feed.broadcast({ type: "fleet.event", event: removed });

    await waitFor(() => lines.length === 1);
    expect(lines).toEqual(["10:00:05 - dev-1 removed"]);
  });

  it("subscribes to one device with --device", async () => {
    await watch({ device: "dev-1" });
    await waitFor(() => feed.received.length === 1);
    expect(feed.received).toEqual([{ type: "subscribe", device_id: "dev-1" }]);
  });

  it("prints one JSON object per event with --json", async () => {
    await watch({ json: true });
    await waitFor(() => feed.received.length === 1);

    feed.broadcast({ type: "fleet.event", event: removed });

    await waitFor(() => lines.length === 1);
    expect(lines).toEqual([JSON.stringify(removed)]);
  });

  it("prints a resync hint on overrun", async () => {
    await watch();
    await waitFor(() => feed.received.length === 1);

    feed.broadcast({
      type: "fleet.event",
      event: { type: "subscriber.overrun", dropped: 12, at: "2026-03-01T10:00:06.000Z" },
    });

    await waitFor(() => lines.length === 1);
    expect(lines).toEqual(["10:00:06 ! missed 12 events; run 'fleetdeck devices' to resync"]);
  });

  it("reports the drop and resubscribes after reconnecting", async () => {
    await watch({ device: "dev-1" });
    await waitFor(() => feed.received.length === 1);

    feed.sockets[0].terminate();

    await waitFor(() => feed.received.length === 2);
    expect(feed.received[1]).toEqual({ type: "subscribe", device_id: "dev-1" });
    await waitFor(() => statusLines.length === 4);
    expect(statusLines).toEqual([
      `Connected to ${feed.url}`,
      "Disconnected: code 1006",
      "Reconnecting (attempt 1) in 10ms...",
      `Connected to ${feed.url}`,
    ]);
  });

  it("fails when the server is unreachable", async () => {
    await expect(
      startWatch({}, { baseUrl: "http://127.0.0.1:1", write: () => undefined, status: () => undefined }),
    ).rejects.toThrow();
  });
});
