/**
 * Tests for the global error handler: status mapping per error code and
 * what the response body exposes in development and production.
 */

import { describe, test, expect, afterEach } from "vitest";
import express from "express";
import type { Server as HttpServer } from "node:http";
import { z } from "zod";
import {
  ConfigError,
  DeviceOfflineError,
  FleetError,
  NetworkError,
  StorageError,
  UnknownDeviceError,
  ValidationError,
} from "@fleetdeck/shared";
import { createErrorHandler, mapFleetErrorToStatus } from "../error-handler.js";
import { closeHttpServer, silentLogger, startHttpServer } from "../../__tests__/helpers.js";

describe("mapFleetErrorToStatus", () => {
  test.each([
    ["DEVICE_UNKNOWN", 404],
    ["COMMAND_UNKNOWN", 404],
    ["DEVICE_EXISTS", 409],
    ["COMMAND_DEVICE_OFFLINE", 409],
    ["COMMAND_IN_FLIGHT", 409],
    ["CHANNEL_UNAVAILABLE", 503],
    ["DISPATCHER_DISPOSED", 503],
    ["VALIDATION_COMMAND_KIND", 400],
    ["NETWORK_TIMEOUT", 502],
    ["STORAGE_WRITE", 503],
    ["CONFIG_INVALID", 500],
    ["SOMETHING_ELSE", 500],
  ])("%s maps to %i", (code, status) => {
    expect(mapFleetErrorToStatus(code)).toBe(status);
  });
});

describe("createErrorHandler", () => {
  let httpServer: HttpServer | null = null;

  afterEach(async () => {
    if (httpServer) await closeHttpServer(httpServer);
    httpServer = null;
  });

  /** Serve one route that throws the given error */
  async function respondTo(
    error: unknown,
    production = false,
  ): Promise<{ status: number; body: Record<string, unknown> }> {
    if (httpServer) await closeHttpServer(httpServer);
    const app = express();
    app.get("/boom", () => {
      throw error;
    });
    app.use(createErrorHandler(silentLogger(), production));

    const started = await startHttpServer(app);
    httpServer = started.httpServer;
    const res = await fetch(`http://127.0.0.1:${started.port}/boom`);
    const body: Record<string, unknown> = JSON.parse(await res.text());
    return { status: res.status, body };
  }

  test("fleet errors carry their code and context", async () => {
    const { status, body } = await respondTo(new UnknownDeviceError("dev-9"));
    expect(status).toBe(404);
    expect(body).toMatchObject({
      error: "Device not found: dev-9",
      code: "DEVICE_UNKNOWN",
      context: { deviceId: "dev-9" },
    });
    expect(typeof body.stack).toBe("string");
  });

  test("stacks are omitted in production", async () => {
    const { status, body } = await respondTo(new DeviceOfflineError("dev-1"), true);
    expect(status).toBe(409);
    expect(body).toEqual({
      error: "Device is offline: dev-1",
      code: "COMMAND_DEVICE_OFFLINE",
      context: { deviceId: "dev-1" },
    });
  });

  test("each error category gets its status", async () => {
    expect((await respondTo(new ValidationError("bad"))).status).toBe(400);
    expect((await respondTo(new NetworkError("down", "NETWORK_REFUSED"))).status).toBe(502);
    expect((await respondTo(new StorageError("disk", "STORAGE_WRITE"))).status).toBe(503);
    expect((await respondTo(new ConfigError("oops"))).status).toBe(500);
    expect((await respondTo(new FleetError("stopped", "DISPATCHER_DISPOSED"))).status).toBe(503);
  });

  test("zod errors become 400 with issue details", async () => {
    const parsed = z.object({ kind: z.string() }).safeParse({});
    if (parsed.success) throw new Error("expected a parse failure");

    const { status, body } = await respondTo(parsed.error);
    expect(status).toBe(400);
    expect(body.error).toBe("Validation failed");
    expect(body.details).toEqual([
      {
        code: "invalid_type",
        expected: "string",
        received: "undefined",
        path: ["kind"],
        message: "Required",
      },
    ]);
  });

  test("client errors with a status pass through", async () => {
    const error = Object.assign(new Error("request entity too large"), { status: 413 });
    const { status, body } = await respondTo(error);
    expect(status).toBe(413);
    expect(body).toEqual({ error: "request entity too large" });
  });

  test("anything else is an opaque 500", async () => {
    const { status, body } = await respondTo(new Error("secret detail"), true);
    expect(status).toBe(500);
    expect(body).toEqual({ error: "Internal server error" });
  });

  test("non-Error throwables are wrapped", async () => {
    const { status } = await respondTo("plain string");
    expect(status).toBe(500);
  });
});
