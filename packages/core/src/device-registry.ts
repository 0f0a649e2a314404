/**
 * Device Registry: the authoritative in-memory table of known devices.
 *
 * Responsibilities:
 *   1. Own every Device record; hand out copies, never the records themselves
 *   2. Merge partial updates under the freshness rule (older last_seen_at = stale)
 *   3. Apply the two-strikes connectivity downgrade for missed deadlines
 *   4. Publish device.added / device.changed / device.removed to the hub
 *   5. Notify removal listeners so in-flight commands can be failed
 *   6. Forward writes to the persistence hook, serialized per device
 *
 * Every mutation funnels through commit(), which is synchronous. Node runs it
 * to completion before any other write can start, so two concurrent writers
 * to one device always see each other's result.
 */

import { isDeepStrictEqual } from "node:util";
import type { Logger } from "pino";
import {
  DeviceAlreadyRegisteredError,
  ValidationError,
  devicePatchSchema,
  deviceSchema,
  generateId,
  registerDeviceSchema,
  type Connectivity,
  type Device,
  type DeviceLocation,
  type DevicePatch,
  type ObservableDeviceField,
  type RegisterDeviceInput,
} from "@fleetdeck/shared";
import type { NotificationHub } from "./notification-hub.js";
import type { FleetPersistence } from "./persistence.js";
import { createKeyedQueue, type KeyedQueue } from "./keyed-queue.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DeviceRegistryOptions {
  hub: NotificationHub;
  logger: Logger;
  /** Optional persistence hook; writes are fire-and-forget */
  persistence?: FleetPersistence;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/** Outcome of Registry.upsert */
export type UpsertResult =
  | { status: "created"; device: Device }
  | { status: "updated"; device: Device; changed: ObservableDeviceField[] }
  | { status: "unchanged"; device: Device }
  | { status: "stale"; device: Device };

/** Outcome of a strike applied by recordMissedDeadline */
export interface StrikeResult {
  device: Device;
  /** Strikes since the last contact, including this one */
  strikes: number;
  previous: Connectivity;
}

export interface UpsertOptions {
  /** Count one strike in the same write (an "offline" report) */
  strike?: boolean;
}

export type DeviceRemovedListener = (deviceId: string) => void;

interface DeviceRecord {
  device: Device;
  /** Missed deadlines / offline reports since the last contact */
  strikes: number;
}

/** Higher rank = more reachable. A downgrade never raises the rank. */
const CONNECTIVITY_RANK: Record<Connectivity, number> = {
  offline: 0,
  unknown: 1,
  online: 2,
};

// ---------------------------------------------------------------------------
// Snapshot helpers
// ---------------------------------------------------------------------------

function copyLocation(location: DeviceLocation | null): DeviceLocation | null {
  return location !== null && typeof location === "object" ? { ...location } : location;
}

/** Detached copy of a device: callers can never reach a live record */
export function cloneDevice(device: Device): Device {
  return {
    ...device,
    location: copyLocation(device.location),
    metadata: structuredClone(device.metadata),
  };
}

/** Longest default name taken from a device id */
const DEFAULT_NAME_MAX = 64;

/**
 * Connectivity after a strike: one strike since the last contact means
 * "unknown", two mean "offline". Never raises connectivity.
 */
function downgrade(current: Connectivity, strikes: number): Connectivity {
  const target: Connectivity = strikes >= 2 ? "offline" : "unknown";
  return CONNECTIVITY_RANK[target] < CONNECTIVITY_RANK[current] ? target : current;
}

function isNewer(candidate: string, current: string | null): boolean {
  return current === null || Date.parse(candidate) > Date.parse(current);
}

/**
 * Merge a patch into a device. Known values are never replaced by unknown
 * ones: null battery/location and "unknown" connectivity are ignored.
 */
export function mergeDevicePatch(
  current: Device,
  patch: DevicePatch,
): { next: Device; changed: ObservableDeviceField[]; touched: boolean } {
  const next: Device = { ...current };
  const changed: ObservableDeviceField[] = [];

  if (patch.name !== undefined && patch.name !== current.name) {
    next.name = patch.name;
    changed.push("name");
  }
  if (patch.os !== undefined && patch.os !== current.os) {
    next.os = patch.os;
    changed.push("os");
  }
  if (
    patch.battery_percent !== undefined &&
    patch.battery_percent !== null &&
    patch.battery_percent !== current.battery_percent
  ) {
    next.battery_percent = patch.battery_percent;
    changed.push("battery_percent");
  }
  if (
    patch.location !== undefined &&
    patch.location !== null &&
    !isDeepStrictEqual(patch.location, current.location)
  ) {
    next.location = copyLocation(patch.location);
    changed.push("location");
  }
  if (
    patch.connectivity !== undefined &&
    patch.connectivity !== "unknown" &&
    patch.connectivity !== current.connectivity
  ) {
    next.connectivity = patch.connectivity;
    changed.push("connectivity");
  }
  if (patch.metadata !== undefined) {
    const merged = { ...current.metadata, ...structuredClone(patch.metadata) };
    if (!isDeepStrictEqual(merged, current.metadata)) {
      next.metadata = merged;
      changed.push("metadata");
    }
  }

  let touched = changed.length > 0;
  if (patch.last_seen_at !== undefined && isNewer(patch.last_seen_at, current.last_seen_at)) {
    next.last_seen_at = patch.last_seen_at;
    touched = true;
  }

  return { next, changed, touched };
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class DeviceRegistry {
  private readonly hub: NotificationHub;
  private readonly logger: Logger;
  private readonly persistence?: FleetPersistence;
  private readonly now: () => Date;
  private readonly writes: KeyedQueue = createKeyedQueue();
  /** Insertion order of this map is registration order */
  private readonly records = new Map<string, DeviceRecord>();
  private readonly removedListeners = new Set<DeviceRemovedListener>();

  constructor(options: DeviceRegistryOptions) {
    this.hub = options.hub;
    this.logger = options.logger.child({ component: "device-registry" });
    this.persistence = options.persistence;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.records.size;
  }

  has(deviceId: string): boolean {
    return this.records.has(deviceId);
  }

  /** Snapshot of one device, or undefined when it is not registered */
  get(deviceId: string): Device | undefined {
    const record = this.records.get(deviceId);
    return record ? cloneDevice(record.device) : undefined;
  }

  /**
   * Lazy, restartable view of all devices in registration order. Each
   * iteration snapshots the table when it starts, so writes made while
   * iterating are not observed by that iteration.
   */
  list(): Iterable<Device> {
    const records = this.records;
    return {
      *[Symbol.iterator]() {
        const snapshot = [...records.values()].map((record) => record.device);
        for (const device of snapshot) {
          yield cloneDevice(device);
        }
      },
    };
  }

  /**
   * Register a new device with connectivity "unknown".
   *
   * @throws ValidationError for malformed input
   * @throws DeviceAlreadyRegisteredError when the id is taken
   */
  register(input: RegisterDeviceInput): Device {
    const parsed = registerDeviceSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Invalid device registration", "VALIDATION_DEVICE", {
        issues: parsed.error.issues,
      });
    }

    const data = parsed.data;
    const id = data.id ?? generateId();
    if (this.records.has(id)) {
      throw new DeviceAlreadyRegisteredError(id);
    }

    const device: Device = {
      id,
      name: data.name,
      os: data.os,
      battery_percent: data.battery_percent ?? null,
      location: data.location ?? null,
      connectivity: "unknown",
      registered_at: this.now().toISOString(),
      last_seen_at: null,
      metadata: data.metadata ?? {},
    };
    this.insert(device);
    return cloneDevice(device);
  }

  /**
   * Merge a partial state into a device, creating it when absent.
   * A patch older than the record's last_seen_at is discarded as stale.
   * With `strike`, the two-strikes downgrade is applied in the same write,
   * so the update publishes at most one device.changed.
   *
   * @throws ValidationError for malformed patches, or when the created
   *         device would not be a valid snapshot
   */
  upsert(deviceId: string, patch: DevicePatch, options: UpsertOptions = {}): UpsertResult {
    const parsed = devicePatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new ValidationError("Invalid device update", "VALIDATION_DEVICE_PATCH", {
        deviceId,
        issues: parsed.error.issues,
      });
    }
    const data = parsed.data;

    const record = this.records.get(deviceId);
    if (!record) {
      // The id doubles as the name until one is reported
      const created = deviceSchema.safeParse({
        id: deviceId,
        name: data.name ?? deviceId.slice(0, DEFAULT_NAME_MAX),
        os: data.os ?? "unknown",
        battery_percent: data.battery_percent ?? null,
        location: data.location ?? null,
        connectivity: data.connectivity ?? "unknown",
        registered_at: this.now().toISOString(),
        last_seen_at: data.last_seen_at ?? null,
        metadata: data.metadata ?? {},
      });
      if (!created.success) {
        throw new ValidationError("Invalid device", "VALIDATION_DEVICE", {
          deviceId,
          issues: created.error.issues,
        });
      }
      const device = created.data;
      if (options.strike) {
        device.connectivity = downgrade(device.connectivity, 1);
      }
      this.insert(device, options.strike ? 1 : 0);
      return { status: "created", device: cloneDevice(device) };
    }

    const current = record.device;
    if (
      data.last_seen_at !== undefined &&
      current.last_seen_at !== null &&
      Date.parse(data.last_seen_at) < Date.parse(current.last_seen_at)
    ) {
      this.logger.debug(
        { deviceId, reportedAt: data.last_seen_at, lastSeenAt: current.last_seen_at },
        "Stale update discarded",
      );
      return { status: "stale", device: cloneDevice(current) };
    }

    const { next, changed, touched: merged } = mergeDevicePatch(current, data);
    let touched = merged;
    // A device confirmed online has made contact; earlier strikes no longer count
    let strikes = data.connectivity === "online" ? 0 : record.strikes;

    if (options.strike) {
      strikes = record.strikes + 1;
      const connectivity = downgrade(next.connectivity, strikes);
      if (connectivity !== next.connectivity) {
        this.logger.info(
          { deviceId, strikes, from: next.connectivity, to: connectivity },
          "Device connectivity downgraded",
        );
        next.connectivity = connectivity;
        changed.push("connectivity");
        touched = true;
      }
    }

    if (!touched) {
      record.strikes = strikes;
      return { status: "unchanged", device: cloneDevice(current) };
    }

    this.commit(deviceId, next, changed, strikes);
    return { status: "updated", device: cloneDevice(next), changed };
  }

  /**
   * A successful exchange with the device: refresh last_seen_at when fresher
   * and clear the strike counter. Connectivity is left alone.
   */
  recordContact(deviceId: string, at: Date = this.now()): Device | undefined {
    const record = this.records.get(deviceId);
    if (!record) return undefined;

    const seenAt = at.toISOString();
    if (!isNewer(seenAt, record.device.last_seen_at)) {
      record.strikes = 0;
      return cloneDevice(record.device);
    }

    const next: Device = { ...record.device, last_seen_at: seenAt };
    this.commit(deviceId, next, [], 0);
    return cloneDevice(next);
  }

  /**
   * Two-strikes downgrade: the first strike since the last contact moves
   * the device to "unknown", the second to "offline". A downgrade never
   * raises connectivity (an offline device stays offline).
   */
  recordMissedDeadline(deviceId: string): StrikeResult | undefined {
    const record = this.records.get(deviceId);
    if (!record) return undefined;

    const strikes = record.strikes + 1;
    const previous = record.device.connectivity;
    const connectivity = downgrade(previous, strikes);

    if (connectivity === previous) {
      record.strikes = strikes;
      return { device: cloneDevice(record.device), strikes, previous };
    }

    const next: Device = { ...record.device, connectivity };
    this.commit(deviceId, next, ["connectivity"], strikes);
    this.logger.info(
      { deviceId, strikes, from: previous, to: connectivity },
      "Device connectivity downgraded",
    );
    return { device: cloneDevice(next), strikes, previous };
  }

  /** Strikes recorded since the last contact (0 for unknown devices) */
  strikes(deviceId: string): number {
    return this.records.get(deviceId)?.strikes ?? 0;
  }

  /**
   * Remove a device. Idempotent: returns false when nothing was removed.
   * Removal listeners run synchronously before this returns.
   */
  remove(deviceId: string): boolean {
    if (!this.records.delete(deviceId)) {
      return false;
    }

    this.logger.info({ deviceId }, "Device removed");
    for (const listener of this.removedListeners) {
      try {
        listener(deviceId);
      } catch (err) {
        this.logger.error({ err, deviceId }, "Device removal listener failed");
      }
    }
    this.hub.publish({ type: "device.removed", source: "registry", device_id: deviceId });

    if (this.persistence) {
      const persistence = this.persistence;
      this.schedule(deviceId, () => persistence.deleteDevice(deviceId));
    }
    return true;
  }

  /** Subscribe to device removals. Returns an unsubscribe function. */
  onRemoved(listener: DeviceRemovedListener): () => void {
    this.removedListeners.add(listener);
    return () => {
      this.removedListeners.delete(listener);
    };
  }

  /**
   * Load devices from the persistence hook. Devices already in memory win
   * over stored ones. Publishes nothing.
   */
  async hydrate(): Promise<number> {
    if (!this.persistence) return 0;

    const stored = await this.persistence.loadDevices();
    let loaded = 0;
    for (const device of stored) {
      if (this.records.has(device.id)) continue;
      this.records.set(device.id, { device: cloneDevice(device), strikes: 0 });
      loaded++;
    }
    this.logger.info({ loaded }, "Registry hydrated from persistence");
    return loaded;
  }

  /** Resolves once every queued persistence write has settled */
  flush(): Promise<void> {
    return this.writes.idle();
  }

  // -------------------------------------------------------------------------
  // Write path
  // -------------------------------------------------------------------------

  private insert(device: Device, strikes = 0): void {
    this.records.set(device.id, { device, strikes });
    this.logger.info({ deviceId: device.id, name: device.name }, "Device added");
    this.hub.publish({ type: "device.added", source: "registry", device: cloneDevice(device) });
    this.persist(device);
  }

  /** The single write path for existing records */
  private commit(
    deviceId: string,
    next: Device,
    changed: ObservableDeviceField[],
    strikes: number,
  ): void {
    this.records.set(deviceId, { device: next, strikes });

    if (changed.length > 0) {
      this.logger.debug({ deviceId, changed }, "Device changed");
      this.hub.publish({
        type: "device.changed",
        source: "registry",
        device: cloneDevice(next),
        changed,
      });
    }
    this.persist(next);
  }

  private persist(device: Device): void {
    if (!this.persistence) return;
    const persistence = this.persistence;
    const snapshot = cloneDevice(device);
    this.schedule(device.id, () => persistence.saveDevice(snapshot));
  }

  private schedule(deviceId: string, write: () => Promise<void>): void {
    void this.writes.run(deviceId, write).catch((err: unknown) => {
      this.logger.error({ err, deviceId }, "Persistence write failed");
    });
  }
}
