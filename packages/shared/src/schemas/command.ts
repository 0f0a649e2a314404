/**
 * Zod schemas for command issuance and acknowledgement.
 */

import { z } from "zod";
import { COMMAND_KINDS } from "../types/command.js";

export const commandKindSchema = z.enum(COMMAND_KINDS);

/** Body of POST /devices/:id/commands */
export const issueCommandSchema = z.object({
  kind: commandKindSchema,
});

/** A device's answer: success with an optional payload, or a failure message */
export const commandAckSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), result: z.unknown().optional() }),
  z.object({ ok: z.literal(false), error: z.string().min(1).max(2000) }),
]);
