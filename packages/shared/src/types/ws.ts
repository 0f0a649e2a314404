/**
 * Shared WebSocket message types.
 *
 * Two sockets exist:
 *   - Operator feed (/api/ws): live fleet events for consoles
 *       Client -> Server: subscribe, unsubscribe, pong
 *       Server -> Client: fleet.event, ping, error, subscribed, unsubscribed
 *   - Device gateway (/api/devices/connect): the channel to device agents
 *       Server -> Device: command, ping
 *       Device -> Server: ack, telemetry, pong
 *
 * Server, CLI and device agents all import from here to stay in sync.
 */

import type { CommandKind } from "./command.js";
import type { HubDelivery } from "./hub.js";
import type { Telemetry } from "./device.js";

// ---------------------------------------------------------------------------
// Operator feed: client -> server
// ---------------------------------------------------------------------------

/** Subscribe to every event, or only to events about one device */
export type ClientSubscribeMessage =
  | { type: "subscribe"; scope: "all" }
  | { type: "subscribe"; device_id: string };

/** Unsubscribe from one device, or clear all subscriptions */
export interface ClientUnsubscribeMessage {
  type: "unsubscribe";
  device_id?: string;
}

/** Pong response to server ping (keepalive) */
export interface ClientPongMessage {
  type: "pong";
}

/** Union of all messages an operator client can send */
export type ClientMessage =
  | ClientSubscribeMessage
  | ClientUnsubscribeMessage
  | ClientPongMessage;

// ---------------------------------------------------------------------------
// Operator feed: server -> client
// ---------------------------------------------------------------------------

/** A hub event matching the client's subscriptions */
export interface ServerFleetEventMessage {
  type: "fleet.event";
  event: HubDelivery;
}

/** Server ping: client must respond with pong within timeout */
export interface ServerPingMessage {
  type: "ping";
}

/** Error message sent to the client */
export interface ServerErrorMessage {
  type: "error";
  message: string;
}

/** Acknowledgement that a subscription was added */
export interface ServerSubscribedMessage {
  type: "subscribed";
  subscription: string;
}

/** Acknowledgement that a subscription was removed */
export interface ServerUnsubscribedMessage {
  type: "unsubscribed";
  subscription: string;
}

/** Union of all messages the server sends to operator clients */
export type ServerMessage =
  | ServerFleetEventMessage
  | ServerPingMessage
  | ServerErrorMessage
  | ServerSubscribedMessage
  | ServerUnsubscribedMessage;

// ---------------------------------------------------------------------------
// Device gateway
// ---------------------------------------------------------------------------

/** A command delivered to a device agent */
export interface GatewayCommandMessage {
  type: "command";
  command_id: string;
  kind: CommandKind;
  deadline_ms: number;
}

/** Messages the server sends to device agents */
export type GatewayServerMessage =
  | GatewayCommandMessage
  | ServerPingMessage
  | ServerErrorMessage;

/** A device's answer to a command */
export interface DeviceAckMessage {
  type: "ack";
  command_id: string;
  ok: boolean;
  result?: unknown;
  error?: string;
}

/** A telemetry report pushed by a device */
export interface DeviceTelemetryMessage {
  type: "telemetry";
  telemetry: Telemetry;
}

/** Messages device agents send to the server */
export type GatewayDeviceMessage =
  | DeviceAckMessage
  | DeviceTelemetryMessage
  | ClientPongMessage;
