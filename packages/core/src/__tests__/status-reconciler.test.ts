/**
 * Tests for status-reconciler.ts: telemetry ingestion.
 *
 * Tests cover:
 *   1. Rejections: malformed telemetry, unknown and removed devices
 *   2. Freshness: stale reports are discarded
 *   3. Connectivity policy: online restores, offline is a strike,
 *      unknown never overwrites
 */

import { describe, expect, test } from "vitest";
import pino from "pino";
import { DeviceRegistry } from "../device-registry.js";
import { NotificationHub } from "../notification-hub.js";
import { StatusReconciler } from "../status-reconciler.js";

/** Silent logger for tests: suppresses all output */
const silentLogger = pino({ level: "silent" });

function setup() {
  const hub = new NotificationHub({ logger: silentLogger });
  const registry = new DeviceRegistry({ hub, logger: silentLogger });
  const reconciler = new StatusReconciler({ registry, logger: silentLogger });
  registry.register({ id: "dev-1", name: "Pixel 8", os: "Android 14" });
  return { hub, registry, reconciler };
}

describe("StatusReconciler.ingest", () => {
  test("rejects malformed telemetry", () => {
    const { reconciler } = setup();
    const result = reconciler.ingest("dev-1", { reported_at: "yesterday", battery_percent: 150 });

    expect(result.status).toBe("rejected");
    if (result.status === "rejected") {
      expect(result.reason).toBe("invalid");
      expect(result.detail).toContain("reported_at");
    }
  });

  test("rejects telemetry for unregistered or removed devices", () => {
    const { reconciler, registry } = setup();
    const telemetry = { reported_at: "2025-03-01T12:00:00Z", connectivity: "online" };

    expect(reconciler.ingest("ghost", telemetry)).toEqual({
      status: "rejected",
      reason: "unknown_device",
    });

    registry.remove("dev-1");
    expect(reconciler.ingest("dev-1", telemetry)).toEqual({
      status: "rejected",
      reason: "unknown_device",
    });
    expect(registry.get("dev-1")).toBeUndefined();
  });

  test("applies fresh telemetry and brings the device online", () => {
    const { reconciler } = setup();
    const result = reconciler.ingest("dev-1", {
      reported_at: "2025-03-01T12:00:00.000Z",
      connectivity: "online",
      battery_percent: 85,
      location: "Berlin office",
    });

    expect(result).toMatchObject({
      status: "applied",
      changed: ["battery_percent", "location", "connectivity"],
      device: {
        connectivity: "online",
        battery_percent: 85,
        location: "Berlin office",
        last_seen_at: "2025-03-01T12:00:00.000Z",
      },
    });
  });

  test("discards reports older than the last one", () => {
    const { reconciler, registry } = setup();
    reconciler.ingest("dev-1", { reported_at: "2025-03-01T12:05:00.000Z", battery_percent: 60 });

    const result = reconciler.ingest("dev-1", {
      reported_at: "2025-03-01T12:00:00.000Z",
      battery_percent: 99,
    });

    expect(result.status).toBe("stale");
    expect(registry.get("dev-1")?.battery_percent).toBe(60);
  });

  test("offline reports count as strikes: online -> unknown -> offline", () => {
    const { reconciler, registry } = setup();
    reconciler.ingest("dev-1", { reported_at: "2025-03-01T12:00:00.000Z", connectivity: "online" });

    const first = reconciler.ingest("dev-1", {
      reported_at: "2025-03-01T12:01:00.000Z",
      connectivity: "offline",
    });
    expect(first).toMatchObject({ status: "applied", changed: ["connectivity"] });
    expect(registry.get("dev-1")?.connectivity).toBe("unknown");

    reconciler.ingest("dev-1", { reported_at: "2025-03-01T12:02:00.000Z", connectivity: "offline" });
    expect(registry.get("dev-1")?.connectivity).toBe("offline");
  });

  test("an offline report that also changes a field publishes one event", () => {
    const { hub, reconciler, registry } = setup();
    reconciler.ingest("dev-1", {
      reported_at: "2025-03-01T12:00:00.000Z",
      connectivity: "online",
      battery_percent: 80,
    });
    const feed = hub.subscribe();

    const result = reconciler.ingest("dev-1", {
      reported_at: "2025-03-01T12:01:00.000Z",
      connectivity: "offline",
      battery_percent: 50,
    });

    expect(result).toMatchObject({
      status: "applied",
      changed: ["battery_percent", "connectivity"],
    });
    const events = feed.drain();
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "device.changed",
      changed: ["battery_percent", "connectivity"],
      device: { battery_percent: 50, connectivity: "unknown" },
    });
    expect(registry.strikes("dev-1")).toBe(1);
  });

  test("one fresh online report restores an offline device", () => {
    const { reconciler, registry } = setup();
    registry.upsert("dev-1", { connectivity: "offline" });
    registry.recordMissedDeadline("dev-1");

    const result = reconciler.ingest("dev-1", {
      reported_at: "2025-03-01T12:03:00.000Z",
      connectivity: "online",
    });

    expect(result).toMatchObject({ status: "applied", changed: ["connectivity"] });
    expect(registry.get("dev-1")?.connectivity).toBe("online");
    expect(registry.strikes("dev-1")).toBe(0);
  });

  test("unknown connectivity never overwrites a known value", () => {
    const { reconciler, registry } = setup();
    reconciler.ingest("dev-1", { reported_at: "2025-03-01T12:00:00.000Z", connectivity: "online" });

    const result = reconciler.ingest("dev-1", {
      reported_at: "2025-03-01T12:00:00.000Z",
      connectivity: "unknown",
    });

    expect(result.status).toBe("unchanged");
    expect(registry.get("dev-1")?.connectivity).toBe("online");
  });
});
