/**
 * Persistence hook for the Device Registry.
 *
 * The registry keeps all state in memory and forwards writes here
 * fire-and-forget. createJsonFilePersistence() is the bundled
 * implementation: one JSON snapshot file, rewritten atomically (temp file
 * + rename) after every change.
 *
 * Snapshot format (stable):
 *   { "version": 1, "updated_at": "<iso>", "devices": { "<id>": Device } }
 *
 * A device entry that fails validation on load is logged and left out; the
 * rest of the fleet still loads.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "pino";
import { z } from "zod";
import { StorageError, deviceSchema, type Device } from "@fleetdeck/shared";

export interface FleetPersistence {
  /** All stored devices, in the order they were first saved */
  loadDevices(): Promise<Device[]>;
  saveDevice(device: Device): Promise<void>;
  deleteDevice(deviceId: string): Promise<void>;
}

export const fleetSnapshotSchema = z.object({
  version: z.literal(1),
  updated_at: z.string(),
  devices: z.record(deviceSchema),
});

export type FleetSnapshot = z.infer<typeof fleetSnapshotSchema>;

/** The snapshot envelope; entries are checked one by one */
const snapshotEnvelopeSchema = fleetSnapshotSchema.extend({
  devices: z.record(z.unknown()),
});

export interface JsonFilePersistenceOptions {
  logger: Logger;
  now?: () => Date;
}

/**
 * Persistence backed by a single JSON file. Loads lazily on first use;
 * file writes are serialized so renames never interleave.
 */
export function createJsonFilePersistence(
  filePath: string,
  options: JsonFilePersistenceOptions,
): FleetPersistence {
  const { logger } = options;
  const now = options.now ?? (() => new Date());
  let devices: Map<string, Device> | null = null;
  let writeChain: Promise<void> = Promise.resolve();

  async function readSnapshot(): Promise<Map<string, Device>> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return new Map();
      }
      throw new StorageError(`Failed to read fleet snapshot: ${String(err)}`, "STORAGE_READ", {
        path: filePath,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new StorageError("Fleet snapshot is not valid JSON", "STORAGE_CORRUPT", {
        path: filePath,
      });
    }

    const parsed = snapshotEnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError("Fleet snapshot failed validation", "STORAGE_CORRUPT", {
        path: filePath,
        issues: parsed.error.issues,
      });
    }

    const table = new Map<string, Device>();
    for (const [key, entry] of Object.entries(parsed.data.devices)) {
      const device = deviceSchema.safeParse(entry);
      if (!device.success || device.data.id !== key) {
        logger.warn(
          { path: filePath, deviceId: key, issues: device.success ? [] : device.error.issues },
          "Skipping invalid device in fleet snapshot",
        );
        continue;
      }
      table.set(key, device.data);
    }
    return table;
  }

  async function load(): Promise<Map<string, Device>> {
    if (devices === null) {
      devices = await readSnapshot();
    }
    return devices;
  }

  async function writeSnapshot(table: Map<string, Device>): Promise<void> {
    const snapshot: FleetSnapshot = {
      version: 1,
      updated_at: now().toISOString(),
      devices: Object.fromEntries(table),
    };
    const tmpPath = `${filePath}.tmp`;
    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(snapshot, null, 2) + "\n", { mode: 0o600 });
      await rename(tmpPath, filePath);
    } catch (err) {
      throw new StorageError(`Failed to write fleet snapshot: ${String(err)}`, "STORAGE_WRITE", {
        path: filePath,
      });
    }
  }

  /** Apply a mutation to the table and rewrite the file, one at a time */
  function enqueue(mutate: (table: Map<string, Device>) => void): Promise<void> {
    const run = writeChain.then(async () => {
      const table = await load();
      mutate(table);
      await writeSnapshot(table);
    });
    // Keep the chain alive after a failed write; the caller sees the failure through `run`
    writeChain = run.catch(() => undefined);
    return run;
  }

  return {
    async loadDevices() {
      await writeChain;
      return [...(await load()).values()];
    },
    saveDevice(device) {
      return enqueue((table) => {
        table.set(device.id, device);
      });
    },
    deleteDevice(deviceId) {
      return enqueue((table) => {
        table.delete(deviceId);
      });
    },
  };
}
