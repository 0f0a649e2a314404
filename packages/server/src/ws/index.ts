/**
 * Operator feed WebSocket server (/api/ws).
 *
 * Runs in `noServer` mode; the upgrade router hands it requests for
 * /api/ws. Each connection gets its own hub subscription, filtered by the
 * client's subscription set, and a pump that forwards deliveries.
 *
 * Connection lifecycle:
 *   1. Client connects to /api/ws
 *   2. Server assigns a ULID client ID and opens a hub subscription
 *   3. Client sends subscribe/unsubscribe/pong messages
 *   4. Server sends fleet.event/ping/error/subscribed/unsubscribed messages
 *   5. Ping/pong keepalive: 30s interval, 10s pong timeout (40s total)
 *   6. On close: subscription closed, client removed
 */

import { WebSocketServer, WebSocket } from "ws";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import type { Logger } from "pino";
import { clientMessageSchema, generateId } from "@fleetdeck/shared";
import type { NotificationHub } from "@fleetdeck/core";

import type { ClientMessage, ConnectedClient, ServerMessage } from "./types.js";
import { pumpClientFeed, subscriptionsMatch } from "./broadcaster.js";

// ---------------------------------------------------------------------------
// Configuration constants
// ---------------------------------------------------------------------------

/** Interval between server-initiated ping messages (ms) */
const PING_INTERVAL_MS = 30_000;

/** Time after ping before a non-responsive client is terminated (ms) */
const PONG_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

/** Options for creating the operator feed server */
export interface WsServerOptions {
  /** Source of fleet events */
  hub: NotificationHub;
  /** Pino logger instance */
  logger: Logger;
  /** Override ping interval for testing (ms) */
  pingIntervalMs?: number;
  /** Override pong timeout for testing (ms) */
  pongTimeoutMs?: number;
}

/** Handle returned by createWsServer for integration and shutdown */
export interface WsServerHandle {
  /** Upgrade handler for the upgrade router */
  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void;
  /** Current number of connected clients */
  getClientCount(): number;
  /** Graceful shutdown: close all connections, clear intervals, close WSS */
  shutdown(): Promise<void>;
}

// ---------------------------------------------------------------------------
// WS server implementation
// ---------------------------------------------------------------------------

export function createWsServer(options: WsServerOptions): WsServerHandle {
  const { hub } = options;
  const log = options.logger.child({ component: "operator-feed" });
  const pingIntervalMs = options.pingIntervalMs ?? PING_INTERVAL_MS;
  const pongTimeoutMs = options.pongTimeoutMs ?? PONG_TIMEOUT_MS;

  /** All currently connected clients */
  const clients = new Map<string, ConnectedClient>();

  const wss = new WebSocketServer({ noServer: true });

  // -------------------------------------------------------------------------
  // Connection handling
  // -------------------------------------------------------------------------

  wss.on("connection", (ws: WebSocket) => {
    const clientId = generateId();
    const subscriptions = new Set<string>();
    const client: ConnectedClient = {
      id: clientId,
      ws,
      subscriptions,
      feed: hub.subscribe({ filter: (event) => subscriptionsMatch(subscriptions, event) }),
      isAlive: true,
    };

    clients.set(clientId, client);
    log.info({ clientId }, "WebSocket client connected");

    void pumpClientFeed(client, log).then(() => {
      log.debug({ clientId }, "Feed pump stopped");
    });

    // --- Message handling ---
    ws.on("message", (data) => {
      let json: unknown;
      try {
        json = JSON.parse(data.toString());
      } catch {
        sendMessage(ws, { type: "error", message: "Invalid JSON" });
        return;
      }

      const parsed = clientMessageSchema.safeParse(json);
      if (!parsed.success) {
        sendMessage(ws, { type: "error", message: "Invalid message" });
        return;
      }
      handleClientMessage(client, parsed.data);
    });

    // --- Close handling ---
    ws.on("close", () => {
      client.feed.close();
      clients.delete(clientId);
      log.info({ clientId }, "WebSocket client disconnected");
    });

    // --- Error handling ---
    ws.on("error", (err) => {
      log.error({ clientId, error: err.message }, "WebSocket client error");
      ws.close();
    });
  });

  // -------------------------------------------------------------------------
  // Client message dispatch
  // -------------------------------------------------------------------------

  function handleClientMessage(client: ConnectedClient, msg: ClientMessage): void {
    switch (msg.type) {
      case "subscribe": {
        const subscription = "scope" in msg ? "all" : `device:${msg.device_id}`;
        client.subscriptions.add(subscription);
        sendMessage(client.ws, { type: "subscribed", subscription });
        break;
      }
      case "unsubscribe":
        handleUnsubscribe(client, msg.device_id);
        break;
      case "pong":
        client.isAlive = true;
        break;
    }
  }

  function handleUnsubscribe(client: ConnectedClient, deviceId: string | undefined): void {
    if (deviceId) {
      const subscription = `device:${deviceId}`;
      client.subscriptions.delete(subscription);
      sendMessage(client.ws, { type: "unsubscribed", subscription });
      return;
    }

    // No specific target: clear all subscriptions
    const subs = [...client.subscriptions];
    client.subscriptions.clear();
    for (const sub of subs) {
      sendMessage(client.ws, { type: "unsubscribed", subscription: sub });
    }
  }

  // -------------------------------------------------------------------------
  // Ping/pong keepalive
  // -------------------------------------------------------------------------

  /**
   * Every pingIntervalMs, mark all clients as not-alive and send ping; after
   * pongTimeoutMs, terminate the ones that did not answer.
   */
  const pingInterval = setInterval(() => {
    for (const client of clients.values()) {
      client.isAlive = false;
      sendMessage(client.ws, { type: "ping" });
    }

    setTimeout(() => {
      for (const [id, client] of clients.entries()) {
        if (!client.isAlive) {
          log.info({ clientId: id }, "WebSocket client stale: terminating");
          client.feed.close();
          client.ws.terminate();
          clients.delete(id);
        }
      }
    }, pongTimeoutMs).unref();
  }, pingIntervalMs);

  // Don't let the ping interval prevent process exit during shutdown
  pingInterval.unref();

  // -------------------------------------------------------------------------
  // Utilities
  // -------------------------------------------------------------------------

  /** Send a JSON control message; failures are logged, not thrown */
  function sendMessage(ws: WebSocket, msg: ServerMessage): void {
    if (ws.readyState !== WebSocket.OPEN) return;

    try {
      ws.send(JSON.stringify(msg), (err) => {
        if (err) {
          log.warn({ error: err.message }, "Failed to send WebSocket message");
        }
      });
    } catch (err) {
      log.warn(
        { error: err instanceof Error ? err.message : String(err) },
        "WebSocket send threw synchronously",
      );
    }
  }

  // -------------------------------------------------------------------------
  // Public handle
  // -------------------------------------------------------------------------

  return {
    handleUpgrade(req, socket, head) {
      wss.handleUpgrade(req, socket, head, (ws) => {
        wss.emit("connection", ws, req);
      });
    },

    getClientCount(): number {
      return clients.size;
    },

    async shutdown(): Promise<void> {
      clearInterval(pingInterval);

      for (const client of clients.values()) {
        client.feed.close();
        client.ws.close(1001, "Server shutting down");
      }
      clients.clear();

      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });

      log.info("WebSocket server shut down");
    },
  };
}

export type { ConnectedClient } from "./types.js";
