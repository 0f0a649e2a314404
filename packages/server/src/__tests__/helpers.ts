/**
 * Shared helpers for the server's integration tests: a silent logger, an
 * HTTP server on an ephemeral port, a queued WebSocket client wrapper and
 * an API harness around createApp.
 */

import { createServer, type RequestListener, type Server as HttpServer } from "node:http";
import WebSocket from "ws";
import pino from "pino";
import { createFleetEngine, type FleetEngine } from "@fleetdeck/core";
import type { CommandDelivery } from "@fleetdeck/shared";
import { createApp } from "../app.js";

/** Logger that writes nothing */
export function silentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

/** Start a real HTTP server on a random port, return its address */
export function startHttpServer(
  handler?: RequestListener,
): Promise<{ httpServer: HttpServer; port: number }> {
  return new Promise((resolve) => {
    const httpServer = handler ? createServer(handler) : createServer();
    httpServer.listen(0, "127.0.0.1", () => {
      const addr = httpServer.address();
      const port = typeof addr === "object" && addr ? addr.port : 0;
      resolve({ httpServer, port });
    });
  });
}

export function closeHttpServer(httpServer: HttpServer): Promise<void> {
  return new Promise((resolve) => {
    httpServer.closeAllConnections();
    httpServer.close(() => resolve());
  });
}

/**
 * A ws client with a persistent message queue. A single `on("message")`
 * handler feeds the queue; nextMessage() takes from it in order.
 */
export interface QueuedClient<T extends { type: string }> {
  ws: WebSocket;
  /** Wait for the next message, with optional timeout */
  nextMessage(timeoutMs?: number): Promise<T>;
  /** Wait for the next message of a given type, discarding others */
  nextOfType<K extends T["type"]>(type: K, timeoutMs?: number): Promise<Extract<T, { type: K }>>;
  /** Drain all queued messages without waiting */
  drain(): T[];
  send(msg: unknown): void;
}

export interface WrapOptions {
  /** Answer server pings with pong instead of queueing them */
  autoPong?: boolean;
}

export function wrapClient<T extends { type: string }>(
  ws: WebSocket,
  opts: WrapOptions = {},
): QueuedClient<T> {
  const queue: T[] = [];
  let waiter: { resolve: (msg: T) => void; timer: ReturnType<typeof setTimeout> } | null = null;

  ws.on("message", (data) => {
    const msg: T = JSON.parse(data.toString());

    if (opts.autoPong && msg.type === "ping") {
      ws.send(JSON.stringify({ type: "pong" }));
      return;
    }

    if (waiter) {
      const w = waiter;
      waiter = null;
      clearTimeout(w.timer);
      w.resolve(msg);
    } else {
      queue.push(msg);
    }
  });

  const nextMessage = (timeoutMs = 2000): Promise<T> => {
    const queued = queue.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        waiter = null;
        reject(new Error("Timed out waiting for message"));
      }, timeoutMs);
      waiter = { resolve, timer };
    });
  };

  function isType<K extends T["type"]>(msg: T, type: K): msg is Extract<T, { type: K }> {
    return msg.type === type;
  }

  return {
    ws,
    nextMessage,

    async nextOfType(type, timeoutMs = 2000) {
      const deadline = Date.now() + timeoutMs;
      for (;;) {
        const msg = await nextMessage(Math.max(1, deadline - Date.now()));
        if (isType(msg, type)) return msg;
      }
    },

    drain(): T[] {
      const msgs = [...queue];
      queue.length = 0;
      return msgs;
    },

    send(msg: unknown): void {
      ws.send(typeof msg === "string" ? msg : JSON.stringify(msg));
    },
  };
}

/** Open a ws connection and wrap it once open */
export function connectClient<T extends { type: string }>(
  url: string,
  opts?: WrapOptions,
): Promise<QueuedClient<T>> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);
    // Wrap before "open" so messages sent right after the handshake are queued
    const client = wrapClient<T>(ws, opts);
    ws.on("open", () => resolve(client));
    ws.on("error", reject);
  });
}

/** Wait for close event on a WebSocket, return { code, reason } */
export function waitForClose(
  ws: WebSocket,
  timeoutMs = 3000,
): Promise<{ code: number; reason: string }> {
  return new Promise((resolve, reject) => {
    if (ws.readyState === WebSocket.CLOSED) {
      resolve({ code: 1006, reason: "" });
      return;
    }
    const timer = setTimeout(() => reject(new Error("Timed out waiting for close")), timeoutMs);
    ws.on("close", (code, reason) => {
      clearTimeout(timer);
      resolve({ code, reason: reason.toString() });
    });
  });
}

/** Small delay helper */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until a condition holds */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await delay(5);
  }
}

// ---------------------------------------------------------------------------
// HTTP API harness
// ---------------------------------------------------------------------------

export interface ApiHarness {
  engine: FleetEngine;
  /** Deliveries the recording channel received, in order */
  deliveries: CommandDelivery[];
  baseUrl: string;
  /** Send a JSON request; the parsed response body is typed by the caller */
  request<T = unknown>(method: string, path: string, body?: unknown): Promise<{ status: number; body: T }>;
  close(): Promise<void>;
}

/**
 * A real engine behind a recording channel, served by createApp on an
 * ephemeral port.
 */
export async function startApiHarness(
  options: { getWsClientCount?: () => number; production?: boolean } = {},
): Promise<ApiHarness> {
  const logger = silentLogger();
  const deliveries: CommandDelivery[] = [];
  const engine = createFleetEngine({
    logger,
    channel: {
      send(delivery) {
        deliveries.push(delivery);
      },
    },
  });
  const app = createApp({
    engine,
    logger,
    production: options.production,
    getWsClientCount: options.getWsClientCount,
  });
  const { httpServer, port } = await startHttpServer(app);
  const baseUrl = `http://127.0.0.1:${port}`;

  return {
    engine,
    deliveries,
    baseUrl,

    async request<T = unknown>(method: string, path: string, body?: unknown) {
      const res = await fetch(`${baseUrl}${path}`, {
        method,
        headers: body === undefined ? {} : { "Content-Type": "application/json" },
        body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
      });
      const text = await res.text();
      const parsed: T = JSON.parse(text.length > 0 ? text : "null");
      return { status: res.status, body: parsed };
    },

    async close() {
      await engine.stop();
      await closeHttpServer(httpServer);
    },
  };
}
