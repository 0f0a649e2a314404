/**
 * Zod schemas for device registration, operator edits and telemetry.
 *
 * Used by:
 *   - Server routes to validate request bodies
 *   - Status Reconciler to validate telemetry before it touches the registry
 *   - Device gateway to validate telemetry pushed over the socket
 */

import { z } from "zod";
import { CONNECTIVITY_STATES } from "../types/device.js";

/** ISO-8601 timestamp; offsets other than Z are accepted */
export const isoTimestampSchema = z.string().datetime({ offset: true });

/** Battery level: integer percent 0-100 */
export const batteryPercentSchema = z.number().int().min(0).max(100);

/** A place name or a coordinate pair in decimal degrees */
export const deviceLocationSchema = z.union([
  z.string().min(1).max(200),
  z.object({
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
  }),
]);

export const connectivitySchema = z.enum(CONNECTIVITY_STATES);

/** Free-form device metadata */
export const deviceMetadataSchema = z.record(z.unknown());

/** Body of POST /devices */
export const registerDeviceSchema = z.object({
  /** Optional caller-chosen id; generated when omitted */
  id: z.string().min(1).max(128).optional(),
  name: z.string().min(1).max(64),
  os: z.string().min(1).max(64),
  location: deviceLocationSchema.nullable().optional(),
  battery_percent: batteryPercentSchema.nullable().optional(),
  metadata: deviceMetadataSchema.optional(),
});

/** Body of PATCH /devices/:id: operator-editable fields only */
export const deviceEditSchema = z.object({
  name: z.string().min(1).max(64).optional(),
  os: z.string().min(1).max(64).optional(),
  location: deviceLocationSchema.nullable().optional(),
  metadata: deviceMetadataSchema.optional(),
});

/** Full patch accepted by Registry.upsert */
export const devicePatchSchema = deviceEditSchema.extend({
  battery_percent: batteryPercentSchema.nullable().optional(),
  connectivity: connectivitySchema.optional(),
  last_seen_at: isoTimestampSchema.optional(),
});

/** A telemetry report (gateway push, HTTP push or poll result) */
export const telemetrySchema = z.object({
  reported_at: isoTimestampSchema,
  connectivity: connectivitySchema.optional(),
  battery_percent: batteryPercentSchema.nullable().optional(),
  location: deviceLocationSchema.nullable().optional(),
  name: z.string().min(1).max(64).optional(),
  os: z.string().min(1).max(64).optional(),
});

/** A full device snapshot (persistence files, API responses) */
export const deviceSchema = z.object({
  id: z.string().min(1).max(128),
  name: z.string().min(1).max(64),
  os: z.string().min(1).max(64),
  battery_percent: batteryPercentSchema.nullable(),
  location: deviceLocationSchema.nullable(),
  connectivity: connectivitySchema,
  registered_at: isoTimestampSchema,
  last_seen_at: isoTimestampSchema.nullable(),
  metadata: deviceMetadataSchema,
});
