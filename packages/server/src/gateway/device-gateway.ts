/**
 * Device gateway (/api/devices/connect?device_id=<id>).
 *
 * The concrete Device Channel Provider and push Telemetry Source. Each
 * registered device holds at most one socket; a newer connection replaces
 * the older one.
 *
 *   Server -> Device: { type: "command", command_id, kind, deadline_ms }, ping
 *   Device -> Server: { type: "ack", ... }, { type: "telemetry", telemetry }, pong
 *
 * Connecting reports the device online; a closed socket counts as one
 * offline report (a strike, see the reconciler's downgrade rule).
 *
 * The gateway is created before the engine (the engine needs its channel)
 * and bound to it afterwards with bind().
 */

import { WebSocketServer, WebSocket } from "ws";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import type { Logger } from "pino";
import {
  ChannelUnavailableError,
  FleetError,
  gatewayDeviceMessageSchema,
  type CommandAck,
  type CommandDelivery,
  type GatewayDeviceMessage,
  type GatewayServerMessage,
} from "@fleetdeck/shared";
import type { DeviceChannelProvider, FleetEngine } from "@fleetdeck/core";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const PING_INTERVAL_MS = 30_000;
const PONG_TIMEOUT_MS = 10_000;

/** Close code for a missing or unregistered device id */
export const CLOSE_UNKNOWN_DEVICE = 4004;
/** Close code for a socket superseded by a newer connection */
export const CLOSE_REPLACED = 4009;
/** Close code sent when the device is removed from the registry */
export const CLOSE_DEVICE_REMOVED = 4010;

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export interface DeviceGatewayOptions {
  logger: Logger;
  /** Override ping interval for testing (ms) */
  pingIntervalMs?: number;
  /** Override pong timeout for testing (ms) */
  pongTimeoutMs?: number;
  now?: () => Date;
}

export interface DeviceGateway {
  /** Channel handed to createFleetEngine */
  channel: DeviceChannelProvider;
  /** Attach the engine; connections before this are refused */
  bind(engine: FleetEngine): void;
  /** Upgrade handler for the upgrade router */
  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void;
  /** Number of devices with an open socket */
  getConnectionCount(): number;
  isConnected(deviceId: string): boolean;
  /** Close a device's socket, if any */
  disconnect(deviceId: string, code?: number, reason?: string): boolean;
  shutdown(): Promise<void>;
}

interface DeviceConnection {
  deviceId: string;
  ws: WebSocket;
  isAlive: boolean;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createDeviceGateway(options: DeviceGatewayOptions): DeviceGateway {
  const log = options.logger.child({ component: "device-gateway" });
  const pingIntervalMs = options.pingIntervalMs ?? PING_INTERVAL_MS;
  const pongTimeoutMs = options.pongTimeoutMs ?? PONG_TIMEOUT_MS;
  const now = options.now ?? (() => new Date());

  const connections = new Map<string, DeviceConnection>();
  const wss = new WebSocketServer({ noServer: true });

  let engine: FleetEngine | null = null;
  let detachRemoval: (() => void) | null = null;

  // -------------------------------------------------------------------------
  // Channel provider
  // -------------------------------------------------------------------------

  const channel: DeviceChannelProvider = {
    send(delivery: CommandDelivery): Promise<void> {
      const conn = connections.get(delivery.device_id);
      if (!conn || conn.ws.readyState !== WebSocket.OPEN) {
        throw new ChannelUnavailableError(delivery.device_id, "no open connection");
      }

      const msg: GatewayServerMessage = {
        type: "command",
        command_id: delivery.command_id,
        kind: delivery.kind,
        deadline_ms: delivery.deadline_ms,
      };
      return new Promise<void>((resolve, reject) => {
        conn.ws.send(JSON.stringify(msg), (err) => {
          if (err) {
            reject(new ChannelUnavailableError(delivery.device_id, err.message));
          } else {
            resolve();
          }
        });
      });
    },
  };

  // -------------------------------------------------------------------------
  // Connection handling
  // -------------------------------------------------------------------------

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const deviceId = readDeviceId(req);
    const bound = engine;

    if (!bound || !deviceId || !bound.registry.has(deviceId)) {
      log.warn({ deviceId }, "Device connection refused: unknown device");
      ws.close(CLOSE_UNKNOWN_DEVICE, "Unknown device");
      return;
    }

    const previous = connections.get(deviceId);
    if (previous) {
      log.info({ deviceId }, "Replacing existing device connection");
      connections.delete(deviceId);
      previous.ws.close(CLOSE_REPLACED, "Replaced by new connection");
    }

    const conn: DeviceConnection = { deviceId, ws, isAlive: true };
    connections.set(deviceId, conn);
    log.info({ deviceId }, "Device connected");

    report(bound, deviceId, "online");

    ws.on("message", (data) => {
      let json: unknown;
      try {
        json = JSON.parse(data.toString());
      } catch {
        sendMessage(ws, { type: "error", message: "Invalid JSON" });
        return;
      }

      const parsed = gatewayDeviceMessageSchema.safeParse(json);
      if (!parsed.success) {
        sendMessage(ws, { type: "error", message: "Invalid message" });
        return;
      }
      handleDeviceMessage(bound, conn, parsed.data);
    });

    ws.on("close", () => {
      // A replaced socket closes after its successor registered
      if (connections.get(deviceId) !== conn) return;
      connections.delete(deviceId);
      log.info({ deviceId }, "Device disconnected");
      if (bound.registry.has(deviceId)) {
        report(bound, deviceId, "offline");
      }
    });

    ws.on("error", (err) => {
      log.error({ deviceId, error: err.message }, "Device socket error");
      ws.close();
    });
  });

  function handleDeviceMessage(
    bound: FleetEngine,
    conn: DeviceConnection,
    msg: GatewayDeviceMessage,
  ): void {
    switch (msg.type) {
      case "ack": {
        const command = bound.dispatcher.get(msg.command_id);
        if (!command || command.device_id !== conn.deviceId) {
          log.warn({ deviceId: conn.deviceId, commandId: msg.command_id }, "Ack for foreign command");
          sendMessage(conn.ws, { type: "error", message: `Unknown command: ${msg.command_id}` });
          return;
        }
        const ack: CommandAck = msg.ok
          ? { ok: true, result: msg.result }
          : { ok: false, error: msg.error ?? "Device reported failure" };
        bound.dispatcher.onAck(msg.command_id, ack);
        break;
      }
      case "telemetry": {
        const result = bound.reconciler.ingest(conn.deviceId, msg.telemetry);
        if (result.status === "rejected") {
          sendMessage(conn.ws, {
            type: "error",
            message: result.detail ?? `Telemetry rejected: ${result.reason}`,
          });
        }
        break;
      }
      case "pong":
        conn.isAlive = true;
        break;
    }
  }

  function report(bound: FleetEngine, deviceId: string, connectivity: "online" | "offline"): void {
    const result = bound.reconciler.ingest(deviceId, {
      reported_at: now().toISOString(),
      connectivity,
    });
    log.debug({ deviceId, connectivity, status: result.status }, "Connection state reported");
  }

  // -------------------------------------------------------------------------
  // Keepalive
  // -------------------------------------------------------------------------

  const pingInterval = setInterval(() => {
    for (const conn of connections.values()) {
      conn.isAlive = false;
      sendMessage(conn.ws, { type: "ping" });
    }

    setTimeout(() => {
      for (const conn of [...connections.values()]) {
        if (!conn.isAlive) {
          log.info({ deviceId: conn.deviceId }, "Device socket stale: terminating");
          conn.ws.terminate();
        }
      }
    }, pongTimeoutMs).unref();
  }, pingIntervalMs);
  pingInterval.unref();

  // -------------------------------------------------------------------------
  // Utilities
  // -------------------------------------------------------------------------

  function sendMessage(ws: WebSocket, msg: GatewayServerMessage): void {
    if (ws.readyState !== WebSocket.OPEN) return;
    ws.send(JSON.stringify(msg), (err) => {
      if (err) {
        log.warn({ error: err.message }, "Failed to send gateway message");
      }
    });
  }

  function disconnect(deviceId: string, code = 1000, reason = "Disconnected"): boolean {
    const conn = connections.get(deviceId);
    if (!conn) return false;
    conn.ws.close(code, reason);
    return true;
  }

  // -------------------------------------------------------------------------
  // Public handle
  // -------------------------------------------------------------------------

  return {
    channel,

    bind(target: FleetEngine): void {
      if (engine) {
        throw new FleetError("Device gateway is already bound", "GATEWAY_BOUND");
      }
      engine = target;
      detachRemoval = target.registry.onRemoved((deviceId) => {
        disconnect(deviceId, CLOSE_DEVICE_REMOVED, "Device removed");
      });
    },

    handleUpgrade(req, socket, head) {
      wss.handleUpgrade(req, socket, head, (ws) => {
        wss.emit("connection", ws, req);
      });
    },

    getConnectionCount(): number {
      return connections.size;
    },

    isConnected(deviceId: string): boolean {
      return connections.has(deviceId);
    },

    disconnect,

    async shutdown(): Promise<void> {
      clearInterval(pingInterval);
      detachRemoval?.();

      // Drop the map first so close handlers don't report devices offline
      const open = [...connections.values()];
      connections.clear();
      for (const conn of open) {
        conn.ws.close(1001, "Server shutting down");
      }

      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
      log.info("Device gateway shut down");
    },
  };
}

/** Read ?device_id= from the upgrade request */
function readDeviceId(req: IncomingMessage): string | null {
  const url = new URL(req.url ?? "/", "http://localhost");
  const deviceId = url.searchParams.get("device_id");
  return deviceId && deviceId.length > 0 ? deviceId : null;
}
