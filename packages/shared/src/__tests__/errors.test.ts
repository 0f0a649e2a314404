/**
 * Tests for the FleetError hierarchy: codes, context and JSON shape.
 */

import { describe, expect, test } from "vitest";
import {
  ChannelUnavailableError,
  CommandAlreadyInFlightError,
  DeviceOfflineError,
  FleetError,
  UnknownDeviceError,
  ValidationError,
} from "../errors.js";
import { generateId, isValidUlid } from "../ulid.js";

describe("FleetError hierarchy", () => {
  test("subclasses carry their code and stay instanceof FleetError", () => {
    const err = new UnknownDeviceError("dev-1");
    expect(err).toBeInstanceOf(FleetError);
    expect(err.code).toBe("DEVICE_UNKNOWN");
    expect(err.message).toBe("Device not found: dev-1");
    expect(err.name).toBe("UnknownDeviceError");
  });

  test("toJSON exposes name, code, message and context", () => {
    const err = new CommandAlreadyInFlightError("dev-1", "wipe", "01ABC");
    expect(err.toJSON()).toEqual({
      name: "CommandAlreadyInFlightError",
      code: "COMMAND_IN_FLIGHT",
      message: "A wipe command is already in flight for dev-1",
      context: { deviceId: "dev-1", kind: "wipe", activeCommandId: "01ABC" },
    });
  });

  test("offline errors merge extra context", () => {
    const err = new DeviceOfflineError("dev-2", { channel: "no socket" });
    expect(err.context).toEqual({ deviceId: "dev-2", channel: "no socket" });
  });

  test("channel errors include the detail in the message", () => {
    expect(new ChannelUnavailableError("dev-3").message).toBe("Channel unavailable for dev-3");
    expect(new ChannelUnavailableError("dev-3", "closed").message).toBe(
      "Channel unavailable for dev-3: closed",
    );
  });

  test("category errors default their code", () => {
    expect(new ValidationError("bad").code).toBe("VALIDATION_ERROR");
  });
});

describe("ULID helpers", () => {
  test("generated ids are valid and strictly increasing", () => {
    const ids = Array.from({ length: 20 }, () => generateId());
    for (const id of ids) expect(isValidUlid(id)).toBe(true);
    expect([...ids].sort()).toEqual(ids);
    expect(new Set(ids).size).toBe(20);
  });

  test("rejects malformed ids", () => {
    expect(isValidUlid("not-a-ulid")).toBe(false);
    expect(isValidUlid("01ARZ3NDEKTSV4RRFFQ69G5FAI")).toBe(false);
  });
});
