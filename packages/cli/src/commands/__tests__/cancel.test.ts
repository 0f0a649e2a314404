/**
 * Tests for `fleetdeck cancel <command-id>`.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import type { Command } from "@fleetdeck/shared";
import { FleetApiClient } from "../../lib/api-client.js";
import { runCancel } from "../cancel.js";
import {
  captureOutput,
  startMockServer,
  type CapturedOutput,
  type MockServer,
} from "../../__tests__/helpers.js";

let server: MockServer;
let output: CapturedOutput;

beforeAll(async () => {
  server = await startMockServer();
});

afterAll(async () => {
  await server.close();
});

beforeEach(() => {
  server.reset();
  output = captureOutput();
});

afterEach(() => {
  output.restore();
  process.exitCode = undefined;
});

function api(): FleetApiClient {
  return new FleetApiClient({ baseUrl: server.url, timeout: 5000 });
}

function makeCommand(overrides: Partial<Command> = {}): Command {
  return {
    id: "C1",
    device_id: "dev-1",
    kind: "wipe",
    state: "failed",
    issued_at: "2026-03-01T10:00:00.000Z",
    sent_at: "2026-03-01T10:00:00.000Z",
    resolved_at: "2026-03-01T10:00:05.000Z",
    reason: "cancelled",
    result: null,
    error: null,
    ...overrides,
  };
}

describe("runCancel", () => {
  it("confirms a cancellation", async () => {
    server.route("POST", "/api/commands/C1/cancel", {
      status: 200,
      body: {
        transition: { success: true, previous_state: "sent", new_state: "failed" },
        command: makeCommand(),
      },
    });

    await runCancel("C1", {}, api());

    expect(output.stdout()).toBe("Cancelled wipe -> dev-1 (C1)\n");
    expect(process.exitCode).toBeUndefined();
  });

  it("says when the command already resolved", async () => {
    server.route("POST", "/api/commands/C1/cancel", {
      status: 200,
      body: {
        transition: {
          success: false,
          previous_state: "acked",
          new_state: "acked",
          reason: "Command already acked",
        },
        command: makeCommand({ state: "acked", reason: null }),
      },
    });

    await runCancel("C1", {}, api());

    expect(output.stdout()).toBe("Nothing to cancel: C1 is already ✓ ACKED\n");
  });

  it("reports an unknown command", async () => {
    server.route("POST", "/api/commands/C9/cancel", {
      status: 404,
      body: { error: "Command not found: C9", code: "COMMAND_UNKNOWN" },
    });

    await runCancel("C9", {}, api());

    expect(output.errors()).toEqual(["Not found: Command not found: C9"]);
    expect(process.exitCode).toBe(1);
  });
});
