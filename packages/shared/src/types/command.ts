/**
 * Command type definitions.
 *
 * A Command is one operator-issued instruction to one device. The Command
 * Dispatcher owns every record and moves it along:
 *
 *   pending -> sent -> acked | failed | timed_out
 *      \
 *       +-> failed   (cancelled, device removed or channel failure before delivery)
 */

/** Instructions an operator can send to a device */
export type CommandKind = "wipe" | "lock" | "alert" | "fetch_logs";

/** Runtime array of all CommandKind values */
export const COMMAND_KINDS = [
  "wipe",
  "lock",
  "alert",
  "fetch_logs",
] as const satisfies readonly CommandKind[];

/** Lifecycle state of a command */
export type CommandState = "pending" | "sent" | "acked" | "failed" | "timed_out";

/** States a command never leaves */
export const TERMINAL_COMMAND_STATES: readonly CommandState[] = [
  "acked",
  "failed",
  "timed_out",
];

/** Why a command ended in `failed` or `timed_out` */
export type CommandFailureReason =
  | "device_reported"
  | "device_removed"
  | "cancelled"
  | "channel_unavailable"
  | "timed_out";

/** Command snapshot as returned by the dispatcher and the HTTP API */
export interface Command {
  /** ULID, unique per issuance */
  id: string;
  /** Target device */
  device_id: string;
  kind: CommandKind;
  state: CommandState;
  /** When the operator issued the command */
  issued_at: string;
  /** When the command was handed to the device channel */
  sent_at: string | null;
  /** When the command reached a terminal state */
  resolved_at: string | null;
  /** Set for failed and timed_out commands */
  reason: CommandFailureReason | null;
  /** Payload returned with a successful ack (e.g., fetched logs) */
  result: unknown;
  /** Device-reported failure message */
  error: string | null;
}

/** A device's answer to a delivered command */
export type CommandAck =
  | { ok: true; result?: unknown }
  | { ok: false; error: string };

/** What the dispatcher hands to a device channel */
export interface CommandDelivery {
  command_id: string;
  device_id: string;
  kind: CommandKind;
  /** Milliseconds the dispatcher waits for an ack */
  deadline_ms: number;
  issued_at: string;
}

/** Outcome of attempting a command state transition */
export interface TransitionResult {
  success: boolean;
  previous_state: CommandState | null;
  new_state: CommandState | null;
  reason?: string;
}
