/**
 * WebSocket client for the operator feed (/api/ws).
 *
 * Manages subscriptions and auto-reconnects on disconnect with exponential
 * backoff. `fleetdeck watch` uses it to stream fleet events.
 *
 * Events emitted by WsClient:
 *   'event'        → (event: HubDelivery) => void
 *   'connected'    → () => void
 *   'disconnected' → (reason: string) => void
 *   'reconnecting' → (attempt: number, delay: number) => void
 *   'error'        → (error: Error) => void
 */

import WebSocket from "ws";
import { EventEmitter } from "node:events";
import type { ClientMessage, ServerMessage } from "@fleetdeck/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WsClientOptions {
  /** HTTP base URL of the server (e.g., http://localhost:3000) */
  baseUrl: string;
  /** Whether to auto-reconnect on unexpected disconnect (default: true) */
  reconnect?: boolean;
  /** Maximum number of reconnect attempts before giving up (default: 10) */
  maxReconnectAttempts?: number;
  /** First backoff step in milliseconds (default: 1000) */
  baseReconnectDelay?: number;
  /** Maximum backoff delay in milliseconds (default: 30000) */
  maxReconnectDelay?: number;
  /** Upper bound of the random jitter added to each delay (default: 500) */
  reconnectJitter?: number;
}

export type WsConnectionState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "reconnecting";

/** What to subscribe to: the whole fleet or one device */
export type WsSubscription = { scope: "all" } | { device_id: string };

// ---------------------------------------------------------------------------
// WsClient implementation
// ---------------------------------------------------------------------------

export class WsClient extends EventEmitter {
  private ws: WebSocket | null = null;
  private _state: WsConnectionState = "disconnected";
  private reconnectAttempt = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  /**
   * Subscriptions re-sent on reconnect.
   * Key format: "all" or "device:<id>"
   */
  private subscriptions = new Map<string, ClientMessage>();
  private intentionalClose = false;
  private options: Required<WsClientOptions>;

  constructor(options: WsClientOptions) {
    super();
    this.options = {
      baseUrl: options.baseUrl,
      reconnect: options.reconnect ?? true,
      maxReconnectAttempts: options.maxReconnectAttempts ?? 10,
      baseReconnectDelay: options.baseReconnectDelay ?? 1000,
      maxReconnectDelay: options.maxReconnectDelay ?? 30_000,
      reconnectJitter: options.reconnectJitter ?? 500,
    };
  }

  /**
   * Open the connection. Resolves once the socket is open; rejects if it
   * errors or closes first.
   */
  async connect(): Promise<void> {
    if (this._state === "connected") return;
    if (this._state === "connecting") {
      throw new Error("Connection already in progress");
    }

    return new Promise<void>((resolve, reject) => {
      this.intentionalClose = false;
      this._state = "connecting";

      const ws = new WebSocket(this.buildWsUrl());
      this.ws = ws;
      let settled = false;
      let opened = false;

      ws.on("open", () => {
        settled = true;
        opened = true;
        this._state = "connected";
        this.reconnectAttempt = 0;
        this.emit("connected");
        this.resubscribe();
        resolve();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        this.handleMessage(data);
      });

      ws.on("close", (code: number, reason: Buffer) => {
        const reasonStr = reason.toString() || `code ${code}`;
        this._state = "disconnected";
        this.ws = null;

        if (!settled) {
          settled = true;
          reject(new Error(`WebSocket closed before open: ${reasonStr}`));
          return;
        }

        // Failed attempts are retried by scheduleReconnect; disconnect() already cleaned up
        if (!opened || this.intentionalClose) return;

        this.emit("disconnected", reasonStr);
        if (this.options.reconnect) {
          this.scheduleReconnect();
        }
      });

      ws.on("error", (err: Error) => {
        if (!settled) {
          settled = true;
          this._state = "disconnected";
          this.ws = null;
          reject(err);
          return;
        }
        // The close handler takes care of reconnecting
        this.emit("error", err);
      });
    });
  }

  /** Intentionally close the connection. Suppresses auto-reconnect. */
  disconnect(): void {
    this.intentionalClose = true;

    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }

    this._state = "disconnected";
  }

  get connected(): boolean {
    return this._state === "connected";
  }

  get state(): WsConnectionState {
    return this._state;
  }

  // ---------------------------------------------------------------------------
  // Subscription management
  // ---------------------------------------------------------------------------

  /** Subscribe to every event, or to one device's events. Kept across reconnects. */
  subscribe(opts: WsSubscription): void {
    let key: string;
    let msg: ClientMessage;

    if ("scope" in opts) {
      key = "all";
      msg = { type: "subscribe", scope: "all" };
    } else {
      key = `device:${opts.device_id}`;
      msg = { type: "subscribe", device_id: opts.device_id };
    }

    this.subscriptions.set(key, msg);
    this.send(msg);
  }

  /** With no device id, clears all subscriptions */
  unsubscribe(deviceId?: string): void {
    if (deviceId === undefined) {
      this.subscriptions.clear();
      this.send({ type: "unsubscribe" });
      return;
    }
    this.subscriptions.delete(`device:${deviceId}`);
    this.send({ type: "unsubscribe", device_id: deviceId });
  }

  /** Disconnect, remove all listeners and forget subscriptions */
  destroy(): void {
    this.disconnect();
    this.subscriptions.clear();
    this.removeAllListeners();
  }

  // ---------------------------------------------------------------------------
  // Private methods
  // ---------------------------------------------------------------------------

  /** http → ws, https → wss, then /api/ws */
  private buildWsUrl(): string {
    const base = this.options.baseUrl
      .replace(/\/+$/, "")
      .replace(/^https:/, "wss:")
      .replace(/^http:/, "ws:");
    return `${base}/api/ws`;
  }

  /**
   * Parse an incoming message and dispatch it. Answers pings; unknown types
   * are ignored.
   */
  private handleMessage(data: WebSocket.RawData): void {
    let msg: ServerMessage | null;
    try {
      msg = JSON.parse(data.toString());
    } catch {
      this.emit("error", new Error("Invalid JSON received from WebSocket server"));
      return;
    }

    if (msg === null || typeof msg !== "object" || typeof msg.type !== "string") {
      return;
    }

    switch (msg.type) {
      case "fleet.event":
        this.emit("event", msg.event);
        break;
      case "ping":
        this.send({ type: "pong" });
        break;
      case "error":
        this.emit("error", new Error(msg.message));
        break;
      case "subscribed":
      case "unsubscribed":
        break;
      default:
        break;
    }
  }

  /**
   * Backoff: min(base * 2^attempt, maxReconnectDelay) + random(0, jitter)
   */
  private scheduleReconnect(): void {
    if (this.reconnectAttempt >= this.options.maxReconnectAttempts) {
      this.emit(
        "error",
        new Error(`Max reconnection attempts (${this.options.maxReconnectAttempts}) reached`),
      );
      return;
    }

    const delay =
      Math.min(
        this.options.baseReconnectDelay * Math.pow(2, this.reconnectAttempt),
        this.options.maxReconnectDelay,
      ) +
      Math.random() * this.options.reconnectJitter;

    this._state = "reconnecting";
    this.reconnectAttempt++;
    this.emit("reconnecting", this.reconnectAttempt, delay);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch(() => {
        // Pre-open failures never reach the close handler's reconnect path
        if (!this.intentionalClose && this.options.reconnect && this.reconnectTimer === null) {
          this.scheduleReconnect();
        }
      });
    }, delay);
  }

  private resubscribe(): void {
    for (const msg of this.subscriptions.values()) {
      this.send(msg);
    }
  }

  /** No-op unless the socket is open */
  private send(message: ClientMessage): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      return;
    }
    this.ws.send(JSON.stringify(message), (err) => {
      if (err) this.emit("error", err);
    });
  }
}
