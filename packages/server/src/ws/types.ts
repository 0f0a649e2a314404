/**
 * Server-internal WebSocket types.
 *
 * ConnectedClient tracks the state of a single operator feed connection:
 * its unique ID, subscription set, hub subscription and keepalive status.
 * The feed server keeps a Map<string, ConnectedClient> of all connections.
 */

import type WebSocket from "ws";
import type { Subscription } from "@fleetdeck/core";

// Re-export shared WS types so server code can import from one place
export type {
  ClientMessage,
  ServerMessage,
  ClientSubscribeMessage,
  ClientUnsubscribeMessage,
  ServerFleetEventMessage,
  GatewayServerMessage,
  GatewayDeviceMessage,
} from "@fleetdeck/shared";

/**
 * Server-side representation of a connected operator client.
 *
 * Each connection owns one hub subscription whose filter reads
 * `subscriptions`, so subscribing or unsubscribing takes effect for the
 * next published event.
 */
export interface ConnectedClient {
  /** ULID assigned on connection, used for logging */
  id: string;
  /** The underlying WebSocket connection */
  ws: WebSocket;
  /** Active subscriptions: "all" or "device:<id>" */
  subscriptions: Set<string>;
  /** This client's view of the notification hub */
  feed: Subscription;
  /** Tracks whether the client has responded to the latest ping */
  isAlive: boolean;
}
