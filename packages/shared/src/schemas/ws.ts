/**
 * Zod schemas for inbound WebSocket messages.
 *
 * Both sockets parse untrusted JSON; these schemas turn it into the typed
 * messages from types/ws.ts or reject it.
 */

import { z } from "zod";
import { telemetrySchema } from "./device.js";

/** Messages an operator client may send on /api/ws */
export const clientMessageSchema = z.union([
  z.object({ type: z.literal("subscribe"), scope: z.literal("all") }),
  z.object({ type: z.literal("subscribe"), device_id: z.string().min(1) }),
  z.object({ type: z.literal("unsubscribe"), device_id: z.string().min(1).optional() }),
  z.object({ type: z.literal("pong") }),
]);

/** Messages a device agent may send on /api/devices/connect */
export const gatewayDeviceMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("ack"),
    command_id: z.string().min(1),
    ok: z.boolean(),
    result: z.unknown().optional(),
    error: z.string().max(2000).optional(),
  }),
  z.object({ type: z.literal("telemetry"), telemetry: telemetrySchema }),
  z.object({ type: z.literal("pong") }),
]);
