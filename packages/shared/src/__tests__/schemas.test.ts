/**
 * Tests for Zod schemas: device registration and edits, telemetry, command
 * issuance and acks, and the WebSocket message unions.
 *
 * Validates both the happy path (valid data parses) and error path
 * (invalid data is rejected).
 */

import { describe, expect, test } from "vitest";
import {
  clientMessageSchema,
  commandAckSchema,
  deviceEditSchema,
  deviceSchema,
  gatewayDeviceMessageSchema,
  issueCommandSchema,
  registerDeviceSchema,
  telemetrySchema,
} from "../schemas/index.js";

// ---------------------------------------------------------------------------
// Device schemas
// ---------------------------------------------------------------------------

describe("registerDeviceSchema", () => {
  test("accepts a minimal registration", () => {
    const result = registerDeviceSchema.safeParse({ name: "Pixel 8", os: "Android 14" });
    expect(result.success).toBe(true);
  });

  test("accepts a caller id, coordinates and metadata", () => {
    const result = registerDeviceSchema.safeParse({
      id: "dev-1",
      name: "Pixel 8",
      os: "Android 14",
      location: { lat: 52.52, lng: 13.405 },
      battery_percent: 100,
      metadata: { owner: "field-ops" },
    });
    expect(result.success).toBe(true);
  });

  test("rejects missing name and out-of-range battery", () => {
    expect(registerDeviceSchema.safeParse({ os: "Android 14" }).success).toBe(false);
    expect(
      registerDeviceSchema.safeParse({ name: "A", os: "B", battery_percent: -1 }).success,
    ).toBe(false);
    expect(
      registerDeviceSchema.safeParse({ name: "A", os: "B", battery_percent: 50.5 }).success,
    ).toBe(false);
  });

  test("rejects coordinates outside their range", () => {
    const result = registerDeviceSchema.safeParse({
      name: "A",
      os: "B",
      location: { lat: 91, lng: 0 },
    });
    expect(result.success).toBe(false);
  });
});

describe("deviceEditSchema", () => {
  test("only carries operator-editable fields", () => {
    const result = deviceEditSchema.parse({ name: "Renamed", connectivity: "online" });
    expect(result).toEqual({ name: "Renamed" });
  });
});

describe("deviceSchema", () => {
  test("accepts a full snapshot with nulls for unknown values", () => {
    const result = deviceSchema.safeParse({
      id: "dev-1",
      name: "Pixel 8",
      os: "Android 14",
      battery_percent: null,
      location: null,
      connectivity: "unknown",
      registered_at: "2025-03-01T12:00:00.000Z",
      last_seen_at: null,
      metadata: {},
    });
    expect(result.success).toBe(true);
  });
});

describe("telemetrySchema", () => {
  test("requires an ISO timestamp", () => {
    expect(telemetrySchema.safeParse({ battery_percent: 10 }).success).toBe(false);
    expect(telemetrySchema.safeParse({ reported_at: "12:00" }).success).toBe(false);
    expect(telemetrySchema.safeParse({ reported_at: "2025-03-01T12:00:00+02:00" }).success).toBe(
      true,
    );
  });

  test("rejects an unknown connectivity value", () => {
    const result = telemetrySchema.safeParse({
      reported_at: "2025-03-01T12:00:00Z",
      connectivity: "sleeping",
    });
    expect(result.success).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Command schemas
// ---------------------------------------------------------------------------

describe("issueCommandSchema", () => {
  test("accepts every command kind", () => {
    for (const kind of ["wipe", "lock", "alert", "fetch_logs"]) {
      expect(issueCommandSchema.safeParse({ kind }).success).toBe(true);
    }
  });

  test("rejects an unknown kind", () => {
    expect(issueCommandSchema.safeParse({ kind: "reboot" }).success).toBe(false);
  });
});

describe("commandAckSchema", () => {
  test("success may carry a result", () => {
    expect(commandAckSchema.parse({ ok: true, result: { lines: 3 } })).toEqual({
      ok: true,
      result: { lines: 3 },
    });
  });

  test("failure requires an error message", () => {
    expect(commandAckSchema.safeParse({ ok: false }).success).toBe(false);
    expect(commandAckSchema.safeParse({ ok: false, error: "denied" }).success).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// WebSocket messages
// ---------------------------------------------------------------------------

describe("clientMessageSchema", () => {
  test("parses both subscribe forms", () => {
    expect(clientMessageSchema.parse({ type: "subscribe", scope: "all" })).toEqual({
      type: "subscribe",
      scope: "all",
    });
    expect(clientMessageSchema.parse({ type: "subscribe", device_id: "dev-1" })).toEqual({
      type: "subscribe",
      device_id: "dev-1",
    });
  });

  test("rejects a subscribe without a target", () => {
    expect(clientMessageSchema.safeParse({ type: "subscribe" }).success).toBe(false);
  });
});

describe("gatewayDeviceMessageSchema", () => {
  test("parses acks and telemetry", () => {
    expect(
      gatewayDeviceMessageSchema.safeParse({ type: "ack", command_id: "c1", ok: true }).success,
    ).toBe(true);
    expect(
      gatewayDeviceMessageSchema.safeParse({
        type: "telemetry",
        telemetry: { reported_at: "2025-03-01T12:00:00Z", battery_percent: 30 },
      }).success,
    ).toBe(true);
  });

  test("rejects unknown message types", () => {
    expect(gatewayDeviceMessageSchema.safeParse({ type: "reboot" }).success).toBe(false);
  });
});
