/**
 * Device type definitions.
 *
 * A Device is a remote handset or laptop linked to the operator console.
 * The Device Registry owns every record; everything else sees immutable
 * snapshots with the shape below (the same shape the server returns and
 * the persistence hook stores).
 */

/** Reachability of a device as last reconciled */
export type Connectivity = "online" | "offline" | "unknown";

/** Runtime array of all Connectivity values (used by zod enums) */
export const CONNECTIVITY_STATES = [
  "online",
  "offline",
  "unknown",
] as const satisfies readonly Connectivity[];

/** A geocoordinate pair in decimal degrees */
export interface GeoPoint {
  lat: number;
  lng: number;
}

/** Free-form place name ("Berlin office") or a coordinate pair */
export type DeviceLocation = string | GeoPoint;

/**
 * Device snapshot: the stable contract shared by the presentation layer,
 * the HTTP API and the persistence hook.
 */
export interface Device {
  /** Opaque identifier, immutable once created */
  id: string;
  /** Human-readable name */
  name: string;
  /** OS / platform descriptor (e.g., "Android 14") */
  os: string;
  /** Battery level 0-100, null until the first report */
  battery_percent: number | null;
  /** Last reported location, null when never reported */
  location: DeviceLocation | null;
  /** Current reachability */
  connectivity: Connectivity;
  /** When the device was registered */
  registered_at: string;
  /** Most recent telemetry or successful command ack, null before first contact */
  last_seen_at: string | null;
  /** Arbitrary operator/device metadata, merged key-by-key on update */
  metadata: Record<string, unknown>;
}

/** Device fields whose changes are published to subscribers */
export type ObservableDeviceField =
  | "name"
  | "os"
  | "battery_percent"
  | "location"
  | "connectivity"
  | "metadata";

/**
 * Partial device state accepted by Registry.upsert.
 *
 * `null` battery/location and "unknown" connectivity mean "not known" and
 * never overwrite a value the registry already has.
 */
export interface DevicePatch {
  name?: string;
  os?: string;
  battery_percent?: number | null;
  location?: DeviceLocation | null;
  connectivity?: Connectivity;
  last_seen_at?: string;
  metadata?: Record<string, unknown>;
}

/** Input for registering a new device */
export interface RegisterDeviceInput {
  /** Caller-chosen id; a ULID is generated when omitted */
  id?: string;
  name: string;
  os: string;
  location?: DeviceLocation | null;
  battery_percent?: number | null;
  metadata?: Record<string, unknown>;
}

/**
 * A telemetry report from a device (pushed over the gateway or derived from
 * a poll). `reported_at` orders reports: an older report than the registry's
 * `last_seen_at` is stale and discarded.
 */
export interface Telemetry {
  reported_at: string;
  connectivity?: Connectivity;
  battery_percent?: number | null;
  location?: DeviceLocation | null;
  name?: string;
  os?: string;
}
