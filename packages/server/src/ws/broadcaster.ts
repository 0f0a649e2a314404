/**
 * Operator feed broadcaster: forwards hub deliveries to one client.
 *
 * Every connected client owns a hub subscription. pumpClientFeed() reads it
 * and writes each delivery to the socket, waiting for each write to flush
 * before taking the next. A client that cannot keep up therefore backs up
 * into its hub buffer, where the hub drops the oldest events and sends a
 * subscriber.overrun marker instead of stalling publishers.
 *
 * Subscription matching:
 *   - "all"         : client receives everything
 *   - "device:<id>" : client receives device and command events for that device
 */

import { WebSocket } from "ws";
import type { Logger } from "pino";
import type { FleetEvent } from "@fleetdeck/shared";
import type { ConnectedClient, ServerMessage } from "./types.js";

/** The device an event is about */
export function eventDeviceId(event: FleetEvent): string {
  switch (event.type) {
    case "device.added":
    case "device.changed":
      return event.device.id;
    case "device.removed":
      return event.device_id;
    case "command.result":
      return event.command.device_id;
  }
}

/** Whether a set of subscriptions covers an event */
export function subscriptionsMatch(subscriptions: ReadonlySet<string>, event: FleetEvent): boolean {
  if (subscriptions.has("all")) return true;
  return subscriptions.has(`device:${eventDeviceId(event)}`);
}

/** Write one message and resolve once it is flushed (or rejected) */
function sendAndWait(ws: WebSocket, msg: ServerMessage): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.send(JSON.stringify(msg), (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Forward a client's hub deliveries until the subscription closes or the
 * socket stops accepting writes. Never rejects.
 */
export async function pumpClientFeed(client: ConnectedClient, logger: Logger): Promise<void> {
  for await (const event of client.feed) {
    if (client.ws.readyState !== WebSocket.OPEN) break;

    try {
      await sendAndWait(client.ws, { type: "fleet.event", event });
    } catch (err) {
      logger.warn(
        { clientId: client.id, error: err instanceof Error ? err.message : String(err) },
        "Failed to send WebSocket message: closing feed",
      );
      break;
    }
  }
  client.feed.close();
}
