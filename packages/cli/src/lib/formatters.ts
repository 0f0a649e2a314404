/**
 * Output formatting utilities for the fleetdeck CLI.
 *
 * Terminal-friendly formatting for relative times, battery levels,
 * connectivity, command states, fleet events and tables. All color output
 * uses picocolors.
 */

import pc from "picocolors";
import type {
  Command,
  CommandState,
  Connectivity,
  Device,
  DeviceLocation,
  HubDelivery,
  ObservableDeviceField,
} from "@fleetdeck/shared";
import { ApiError, ApiConnectionError, type DeviceDetailResponse } from "./api-client.js";

// ---------------------------------------------------------------------------
// ANSI Utilities
// ---------------------------------------------------------------------------

/** Regex to match ANSI escape sequences (colors, cursor movement, etc.) */
const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

/** Strip all ANSI escape codes from a string */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, "");
}

/** Visible width of a string, ignoring ANSI codes */
function displayWidth(str: string): number {
  return stripAnsi(str).length;
}

// ---------------------------------------------------------------------------
// Relative Time Formatting
// ---------------------------------------------------------------------------

/**
 * Format an ISO-8601 timestamp relative to `now`.
 *
 * Bands:
 *   - < 60s:     "just now"
 *   - < 60m:     "Nm ago"
 *   - < 24h:     "Nh ago"
 *   - < 7d:      "Nd ago"
 *   - otherwise: the date, "YYYY-MM-DD"
 */
export function formatRelativeTime(iso: string | null | undefined, now: Date = new Date()): string {
  if (!iso) return "-";

  const date = new Date(iso);
  const diffSec = Math.floor((now.getTime() - date.getTime()) / 1000);
  const diffMin = Math.floor(diffSec / 60);
  const diffHr = Math.floor(diffMin / 60);
  const diffDays = Math.floor(diffHr / 24);

  if (diffSec < 60) return "just now";
  if (diffMin < 60) return `${diffMin}m ago`;
  if (diffHr < 24) return `${diffHr}h ago`;
  if (diffDays < 7) return `${diffDays}d ago`;
  return date.toISOString().slice(0, 10);
}

/** "HH:MM:SS" (UTC) of an ISO timestamp, for the event stream */
function formatClock(iso: string): string {
  return new Date(iso).toISOString().slice(11, 19);
}

// ---------------------------------------------------------------------------
// Device Field Formatting
// ---------------------------------------------------------------------------

interface StateStyle {
  icon: string;
  label: string;
  color: (s: string) => string;
}

const CONNECTIVITY_STYLES: Record<Connectivity, StateStyle> = {
  online:  { icon: "●", label: "online",  color: pc.green },
  unknown: { icon: "◐", label: "unknown", color: pc.yellow },
  offline: { icon: "○", label: "offline", color: pc.red },
};

/** Colored icon and label, e.g. green("● online") */
export function formatConnectivity(connectivity: Connectivity): string {
  const style = CONNECTIVITY_STYLES[connectivity];
  return style.color(`${style.icon} ${style.label}`);
}

/** "-" before the first report; red at 15% or less, yellow at 40% or less */
export function formatBattery(percent: number | null): string {
  if (percent === null) return "-";
  const text = `${percent}%`;
  if (percent <= 15) return pc.red(text);
  if (percent <= 40) return pc.yellow(text);
  return text;
}

/** Place names as given; coordinates to four decimals */
export function formatLocation(location: DeviceLocation | null): string {
  if (location === null) return "-";
  if (typeof location === "string") return location;
  return `${location.lat.toFixed(4)}, ${location.lng.toFixed(4)}`;
}

// ---------------------------------------------------------------------------
// Command Formatting
// ---------------------------------------------------------------------------

const COMMAND_STATE_STYLES: Record<CommandState, StateStyle> = {
  pending:   { icon: "○", label: "PENDING",   color: pc.dim },
  sent:      { icon: "◐", label: "SENT",      color: pc.cyan },
  acked:     { icon: "✓", label: "ACKED",     color: pc.green },
  failed:    { icon: "✗", label: "FAILED",    color: pc.red },
  timed_out: { icon: "⧖", label: "TIMED OUT", color: pc.red },
};

/** Colored icon and label, e.g. green("✓ ACKED") */
export function formatCommandState(state: CommandState): string {
  const style = COMMAND_STATE_STYLES[state];
  return style.color(`${style.icon} ${style.label}`);
}

/** Why a command ended where it did: the device's error, or the failure reason */
export function formatCommandOutcome(command: Command): string {
  if (command.error) return command.error;
  if (command.reason) return command.reason.replace(/_/g, " ");
  return "";
}

/** Table row: [id, kind, state, issued, outcome] */
export function formatCommandRow(command: Command, now?: Date): string[] {
  return [
    command.id,
    command.kind,
    formatCommandState(command.state),
    formatRelativeTime(command.issued_at, now),
    formatCommandOutcome(command) || pc.dim("-"),
  ];
}

// ---------------------------------------------------------------------------
// Text Truncation
// ---------------------------------------------------------------------------

/**
 * Truncate a string to maxLen characters, appending "..." if exceeded.
 * Measures visible width, not byte length.
 */
export function truncate(text: string, maxLen: number): string {
  if (displayWidth(text) <= maxLen) return text;
  if (maxLen <= 3) return "...".slice(0, maxLen);

  const plain = stripAnsi(text);
  return plain.slice(0, maxLen - 3) + "...";
}

// ---------------------------------------------------------------------------
// Table Rendering
// ---------------------------------------------------------------------------

interface ColumnDef {
  header: string;
  /** Minimum column width (defaults to header length) */
  minWidth?: number;
  align?: "left" | "right";
}

/**
 * Render rows as an aligned, auto-sized table.
 *
 * Columns are sized to their widest cell (ANSI codes ignored) and separated
 * by 2 spaces. With maxWidth, the widest columns are truncated first.
 */
export function renderTable(opts: {
  columns: ColumnDef[];
  rows: string[][];
  maxWidth?: number;
}): string {
  const { columns, rows, maxWidth } = opts;
  const colGap = 2;
  const numCols = columns.length;

  if (rows.length === 0) {
    return columns.map((c) => c.header).join(" ".repeat(colGap));
  }

  const colWidths: number[] = columns.map((col, i) => {
    const headerWidth = displayWidth(col.header);
    const minWidth = col.minWidth ?? headerWidth;
    let maxCellWidth = 0;
    for (const row of rows) {
      const cellWidth = displayWidth(row[i] ?? "");
      if (cellWidth > maxCellWidth) maxCellWidth = cellWidth;
    }
    return Math.max(minWidth, headerWidth, maxCellWidth);
  });

  if (maxWidth) {
    const totalGap = colGap * (numCols - 1);
    let totalWidth = colWidths.reduce((a, b) => a + b, 0) + totalGap;

    while (totalWidth > maxWidth) {
      const maxIdx = colWidths.indexOf(Math.max(...colWidths));
      const shrinkBy = Math.min(totalWidth - maxWidth, colWidths[maxIdx] - 3);
      if (shrinkBy <= 0) break;
      colWidths[maxIdx] -= shrinkBy;
      totalWidth -= shrinkBy;
    }
  }

  function formatCell(value: string, colIdx: number): string {
    const width = colWidths[colIdx];
    const visWidth = displayWidth(value);
    if (visWidth > width) {
      return truncate(value, width);
    }
    const padding = " ".repeat(width - visWidth);
    return columns[colIdx].align === "right" ? padding + value : value + padding;
  }

  const headerLine = columns
    .map((col, i) => formatCell(pc.dim(col.header), i))
    .join(" ".repeat(colGap));

  const dataLines = rows.map((row) =>
    columns.map((_col, i) => formatCell(row[i] ?? "", i)).join(" ".repeat(colGap)).trimEnd(),
  );

  return [headerLine.trimEnd(), ...dataLines].join("\n");
}

// ---------------------------------------------------------------------------
// Device Views
// ---------------------------------------------------------------------------

export const DEVICE_COLUMNS: ColumnDef[] = [
  { header: "NAME" },
  { header: "ID" },
  { header: "OS" },
  { header: "BATTERY", align: "right" },
  { header: "CONNECTIVITY" },
  { header: "LAST SEEN" },
];

/** Table row: [name, id, os, battery, connectivity, last seen] */
export function formatDeviceRow(device: Device, now?: Date): string[] {
  return [
    device.name,
    device.id,
    device.os,
    formatBattery(device.battery_percent),
    formatConnectivity(device.connectivity),
    formatRelativeTime(device.last_seen_at, now),
  ];
}

/** The device table, or an empty-state line */
export function formatDeviceList(
  devices: Device[],
  opts: { now?: Date; maxWidth?: number } = {},
): string {
  if (devices.length === 0) return formatEmpty("devices");
  return renderTable({
    columns: DEVICE_COLUMNS,
    rows: devices.map((d) => formatDeviceRow(d, opts.now)),
    maxWidth: opts.maxWidth,
  });
}

const COMMAND_COLUMNS: ColumnDef[] = [
  { header: "ID" },
  { header: "KIND" },
  { header: "STATE" },
  { header: "ISSUED" },
  { header: "OUTCOME" },
];

/** Key/value header for one device, then its in-flight and recent commands */
export function formatDeviceDetail(detail: DeviceDetailResponse, now?: Date): string {
  const { device } = detail;
  const lines: string[] = [
    pc.bold(device.name),
    `  ${pc.dim("ID:")}           ${device.id}`,
    `  ${pc.dim("OS:")}           ${device.os}`,
    `  ${pc.dim("Connectivity:")} ${formatConnectivity(device.connectivity)}`,
    `  ${pc.dim("Battery:")}      ${formatBattery(device.battery_percent)}`,
    `  ${pc.dim("Location:")}     ${formatLocation(device.location)}`,
    `  ${pc.dim("Last seen:")}    ${formatRelativeTime(device.last_seen_at, now)}`,
    `  ${pc.dim("Registered:")}   ${formatRelativeTime(device.registered_at, now)}`,
  ];

  const metadataKeys = Object.keys(device.metadata);
  if (metadataKeys.length > 0) {
    lines.push(`  ${pc.dim("Metadata:")}`);
    for (const key of metadataKeys) {
      lines.push(`    ${key}: ${JSON.stringify(device.metadata[key])}`);
    }
  }

  lines.push("", pc.bold("In flight"));
  lines.push(
    detail.in_flight.length === 0
      ? pc.dim("  (none)")
      : renderTable({ columns: COMMAND_COLUMNS, rows: detail.in_flight.map((c) => formatCommandRow(c, now)) }),
  );

  lines.push("", pc.bold("Recent commands"));
  lines.push(
    detail.recent_commands.length === 0
      ? pc.dim("  (none)")
      : renderTable({
          columns: COMMAND_COLUMNS,
          rows: detail.recent_commands.map((c) => formatCommandRow(c, now)),
        }),
  );

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Fleet Event Stream
// ---------------------------------------------------------------------------

function describeField(device: Device, field: ObservableDeviceField): string {
  switch (field) {
    case "battery_percent":
      return `battery ${stripAnsi(formatBattery(device.battery_percent))}`;
    case "connectivity":
      return `connectivity ${device.connectivity}`;
    case "location":
      return `location ${formatLocation(device.location)}`;
    case "metadata":
      return "metadata";
    case "name":
      return `name ${device.name}`;
    case "os":
      return `os ${device.os}`;
  }
}

/** One line per hub delivery, for `fleetdeck watch` */
export function formatFleetEvent(event: HubDelivery): string {
  const time = pc.dim(formatClock(event.at));

  switch (event.type) {
    case "device.added":
      return `${time} ${pc.green("+")} ${event.device.name} (${event.device.id}) registered`;
    case "device.changed":
      return `${time} ${pc.cyan("~")} ${event.device.name} (${event.device.id}) ${event.changed
        .map((field) => describeField(event.device, field))
        .join(", ")}`;
    case "device.removed":
      return `${time} ${pc.red("-")} ${event.device_id} removed`;
    case "command.result": {
      const { command } = event;
      const outcome = formatCommandOutcome(command);
      return (
        `${time} ${pc.bold(command.kind)} -> ${command.device_id}: ${formatCommandState(command.state)}` +
        (outcome ? ` (${outcome})` : "")
      );
    }
    case "subscriber.overrun":
      return (
        `${time} ${pc.yellow("!")} missed ${event.dropped} event${event.dropped === 1 ? "" : "s"}; ` +
        `run 'fleetdeck devices' to resync`
      );
  }
}

// ---------------------------------------------------------------------------
// Empty State and Error Formatting
// ---------------------------------------------------------------------------

/** Dimmed "No {entity} found." */
export function formatEmpty(entity: string): string {
  return pc.dim(`No ${entity} found.`);
}

/**
 * Format an error for user-facing display. Command rejections (409) read
 * as "Rejected: <reason>".
 */
export function formatError(error: unknown): string {
  if (error instanceof ApiError) {
    if (error.statusCode === 404) {
      return pc.red(`Not found: ${error.message}`);
    }
    if (error.statusCode === 409) {
      return pc.red(`Rejected: ${error.message}`);
    }
    return pc.red(`API error (${error.statusCode}): ${error.message}`);
  }

  if (error instanceof ApiConnectionError) {
    return pc.red(`Connection failed: ${error.message}`);
  }

  if (error instanceof Error) {
    return pc.red(`Error: ${error.message}`);
  }

  return pc.red(`Error: ${String(error)}`);
}

// ---------------------------------------------------------------------------
// Output Result Helper
// ---------------------------------------------------------------------------

/**
 * Write data to stdout as 2-space JSON when json=true, otherwise through
 * the format function.
 */
export function outputResult<T>(
  data: T,
  opts: { json?: boolean; format: (data: T) => string },
): void {
  if (opts.json) {
    process.stdout.write(JSON.stringify(data, null, 2) + "\n");
  } else {
    process.stdout.write(opts.format(data) + "\n");
  }
}
