/**
 * Status Reconciler: the single entry point for device-originated state.
 *
 * Telemetry pushed over the device gateway, posted over HTTP or produced by
 * a poll is validated here and merged into the registry under the
 * freshness rule. Connectivity policy:
 *   - "online" telemetry restores the device immediately and clears strikes
 *   - "offline" telemetry counts as one strike (two strikes = offline)
 *   - "unknown" telemetry never overwrites a known value
 */

import type { Logger } from "pino";
import {
  telemetrySchema,
  type Device,
  type DevicePatch,
  type ObservableDeviceField,
} from "@fleetdeck/shared";
import type { DeviceRegistry } from "./device-registry.js";

export type IngestResult =
  | { status: "applied"; device: Device; changed: ObservableDeviceField[] }
  | { status: "unchanged"; device: Device }
  | { status: "stale"; device: Device }
  | { status: "rejected"; reason: "unknown_device" | "invalid"; detail?: string };

export interface StatusReconcilerOptions {
  registry: DeviceRegistry;
  logger: Logger;
}

export class StatusReconciler {
  private readonly registry: DeviceRegistry;
  private readonly logger: Logger;

  constructor(options: StatusReconcilerOptions) {
    this.registry = options.registry;
    this.logger = options.logger.child({ component: "status-reconciler" });
  }

  /**
   * Merge one telemetry report. Reports for unregistered (or removed)
   * devices are rejected rather than recreating the device.
   */
  ingest(deviceId: string, telemetry: unknown): IngestResult {
    const parsed = telemetrySchema.safeParse(telemetry);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      this.logger.warn({ deviceId, detail }, "Invalid telemetry rejected");
      return { status: "rejected", reason: "invalid", detail };
    }

    if (!this.registry.has(deviceId)) {
      this.logger.debug({ deviceId }, "Telemetry for unknown device rejected");
      return { status: "rejected", reason: "unknown_device" };
    }

    const report = parsed.data;
    const patch: DevicePatch = {
      last_seen_at: report.reported_at,
      name: report.name,
      os: report.os,
      battery_percent: report.battery_percent,
      location: report.location,
      connectivity: report.connectivity === "online" ? "online" : undefined,
    };

    // An offline report is one strike, applied in the same write as the merge
    const result = this.registry.upsert(deviceId, patch, {
      strike: report.connectivity === "offline",
    });
    if (result.status === "stale") {
      return { status: "stale", device: result.device };
    }

    if (result.status === "unchanged") {
      return { status: "unchanged", device: result.device };
    }

    const changed: ObservableDeviceField[] = result.status === "updated" ? result.changed : [];
    this.logger.debug({ deviceId, changed }, "Telemetry applied");
    return { status: "applied", device: result.device, changed };
  }
}
