/**
 * Tests for GET /api/health.
 */

import { describe, test, expect, afterEach } from "vitest";
import { startApiHarness, type ApiHarness } from "../../__tests__/helpers.js";

describe("GET /api/health", () => {
  let api: ApiHarness | null = null;

  afterEach(async () => {
    await api?.close();
    api = null;
  });

  test("reports engine counters and connection counts", async () => {
    api = await startApiHarness({ getWsClientCount: () => 3 });
    api.engine.registry.register({ id: "dev-1", name: "Pixel 8", os: "Android 14" });
    api.engine.registry.register({ id: "dev-2", name: "ThinkPad", os: "Linux" });
    api.engine.dispatcher.issue("dev-1", "lock");

    const res = await api.request<Record<string, unknown>>("GET", "/api/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: "ok",
      devices: 2,
      in_flight: 1,
      ws_clients: 3,
      device_connections: 0,
      version: "0.1.0",
    });
    expect(typeof res.body.uptime).toBe("number");
  });
});
