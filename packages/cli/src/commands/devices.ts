/**
 * `fleetdeck devices` and `fleetdeck device <id>` commands.
 *
 *   - `devices`    : table of every device: name, id, os, battery, connectivity, last seen
 *   - `device <id>`: one device with its in-flight and recent commands
 *
 * Both support --json for machine-readable output.
 */

import { Command } from "commander";
import type { Device } from "@fleetdeck/shared";
import { FleetApiClient, type DeviceDetailResponse } from "../lib/api-client.js";
import {
  formatDeviceDetail,
  formatDeviceList,
  formatError,
  outputResult,
} from "../lib/formatters.js";

// ---------------------------------------------------------------------------
// Data Layer
// ---------------------------------------------------------------------------

/** Devices in registration order, as the server lists them */
export async function fetchDevices(api: FleetApiClient): Promise<Device[]> {
  return api.listDevices();
}

export async function fetchDeviceDetail(
  api: FleetApiClient,
  deviceId: string,
): Promise<DeviceDetailResponse> {
  return api.getDevice(deviceId);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function createDevicesCommand(): Command {
  return new Command("devices")
    .description("List every device in the fleet")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      await runDevicesList(opts);
    });
}

export function createDeviceDetailCommand(): Command {
  return new Command("device")
    .description("Show one device with its commands")
    .argument("<id>", "Device id")
    .option("--json", "Output as JSON")
    .action(async (id: string, opts: { json?: boolean }) => {
      await runDeviceDetail(id, opts);
    });
}

export function registerDevicesCommands(program: Command): void {
  program.addCommand(createDevicesCommand());
  program.addCommand(createDeviceDetailCommand());
}

// ---------------------------------------------------------------------------
// Command Runners (separated for testability)
// ---------------------------------------------------------------------------

export async function runDevicesList(
  opts: { json?: boolean },
  api?: FleetApiClient,
): Promise<void> {
  try {
    const client = api ?? FleetApiClient.fromConfig();
    const devices = await fetchDevices(client);
    outputResult(devices, {
      json: opts.json,
      format: (list) =>
        formatDeviceList(list, { maxWidth: process.stdout.isTTY ? process.stdout.columns : undefined }),
    });
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}

export async function runDeviceDetail(
  deviceId: string,
  opts: { json?: boolean },
  api?: FleetApiClient,
): Promise<void> {
  try {
    const client = api ?? FleetApiClient.fromConfig();
    const detail = await fetchDeviceDetail(client, deviceId);
    outputResult(detail, {
      json: opts.json,
      format: (d) => formatDeviceDetail(d),
    });
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}
