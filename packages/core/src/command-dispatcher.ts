/**
 * Command Dispatcher: validates operator commands, routes them to the
 * device channel and tracks them until they resolve.
 *
 * Flow for one command:
 *   1. issue() checks kind, device, connectivity and the (device, kind) slot
 *   2. The command joins its device's outbox; commands for one device are
 *      handed to the channel strictly in issuance order
 *   3. Delivery moves it to "sent" and arms the per-kind deadline
 *   4. onAck(), the deadline, cancel() or device removal resolves it; the
 *      first of these wins and the rest are no-ops
 *   5. The terminal command is published to the hub as command.result and
 *      kept in the device's history
 *
 * A channel whose send() returns a promise holds the device's outbox until
 * the promise settles, so a slow transport cannot reorder commands.
 */

import type { Logger } from "pino";
import {
  ChannelUnavailableError,
  CommandAlreadyInFlightError,
  DeviceOfflineError,
  FleetError,
  UnknownCommandError,
  UnknownDeviceError,
  ValidationError,
  commandKindSchema,
  generateId,
  type Command,
  type CommandAck,
  type CommandDelivery,
  type CommandFailureReason,
  type CommandKind,
  type CommandState,
  type TransitionResult,
} from "@fleetdeck/shared";
import { isActive, isValidTransition } from "./command-lifecycle.js";
import type { DeviceRegistry } from "./device-registry.js";
import type { NotificationHub } from "./notification-hub.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Delivers commands to devices. Implementations throw (or reject with)
 * ChannelUnavailableError when they have no route to the device. A returned
 * promise holds back the device's next command until it settles.
 */
export interface DeviceChannelProvider {
  send(delivery: CommandDelivery): void | Promise<void>;
}

export interface DispatcherConfig {
  /** Ack deadline for kinds without an override (default: 30s) */
  defaultDeadlineMs: number;
  /** Per-kind deadline overrides */
  deadlines: Partial<Record<CommandKind, number>>;
  /** Resolved commands kept per device (default: 50) */
  historyLimit: number;
}

export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfig = {
  defaultDeadlineMs: 30_000,
  deadlines: {},
  historyLimit: 50,
};

export interface CommandDispatcherOptions {
  registry: DeviceRegistry;
  hub: NotificationHub;
  channel: DeviceChannelProvider;
  logger: Logger;
  config?: Partial<DispatcherConfig>;
  /** Clock, injectable for tests */
  now?: () => Date;
}

interface CommandRecord {
  command: Command;
  deadline: ReturnType<typeof setTimeout> | null;
}

/** Fields set when a command resolves */
interface Resolution {
  reason?: CommandFailureReason;
  result?: unknown;
  error?: string;
}

function slotKey(deviceId: string, kind: CommandKind): string {
  return `${deviceId}\u0000${kind}`;
}

function copyCommand(command: Command): Command {
  return { ...command };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export class CommandDispatcher {
  private readonly registry: DeviceRegistry;
  private readonly hub: NotificationHub;
  private readonly channel: DeviceChannelProvider;
  private readonly logger: Logger;
  private readonly config: DispatcherConfig;
  private readonly now: () => Date;

  /** Non-terminal commands by id, in issuance order */
  private readonly active = new Map<string, CommandRecord>();
  /** (device, kind) -> id of the command occupying that slot */
  private readonly slots = new Map<string, string>();
  /** device id -> ids of pending commands awaiting delivery, FIFO */
  private readonly outboxes = new Map<string, string[]>();
  /** Devices whose channel send is still in progress */
  private readonly delivering = new Set<string>();
  /** device id -> resolved commands, newest first */
  private readonly histories = new Map<string, Command[]>();
  private readonly resolvedById = new Map<string, Command>();
  private disposed = false;

  constructor(options: CommandDispatcherOptions) {
    this.registry = options.registry;
    this.hub = options.hub;
    this.channel = options.channel;
    this.logger = options.logger.child({ component: "command-dispatcher" });
    this.config = {
      ...DEFAULT_DISPATCHER_CONFIG,
      ...options.config,
      deadlines: { ...DEFAULT_DISPATCHER_CONFIG.deadlines, ...options.config?.deadlines },
    };
    this.now = options.now ?? (() => new Date());
  }

  /** Deadline applied to a command kind */
  deadlineFor(kind: CommandKind): number {
    return this.config.deadlines[kind] ?? this.config.defaultDeadlineMs;
  }

  /**
   * Issue a command. Returns the command in "pending" (queued behind an
   * earlier command for the device) or "sent".
   *
   * @throws ValidationError for an unknown kind
   * @throws UnknownDeviceError when the device is not registered
   * @throws DeviceOfflineError when the device is offline or the channel
   *         refused the command synchronously
   * @throws CommandAlreadyInFlightError when the (device, kind) slot is taken
   */
  issue(deviceId: string, kind: string): Command {
    if (this.disposed) {
      throw new FleetError("Dispatcher is shut down", "DISPATCHER_DISPOSED");
    }

    const parsedKind = commandKindSchema.safeParse(kind);
    if (!parsedKind.success) {
      throw new ValidationError(`Unknown command kind: ${kind}`, "VALIDATION_COMMAND_KIND", {
        kind,
      });
    }
    const commandKind = parsedKind.data;

    const device = this.registry.get(deviceId);
    if (!device) {
      throw new UnknownDeviceError(deviceId);
    }
    if (device.connectivity === "offline") {
      throw new DeviceOfflineError(deviceId);
    }

    const key = slotKey(deviceId, commandKind);
    const occupant = this.slots.get(key);
    if (occupant !== undefined) {
      throw new CommandAlreadyInFlightError(deviceId, commandKind, occupant);
    }

    const record: CommandRecord = {
      command: {
        id: generateId(),
        device_id: deviceId,
        kind: commandKind,
        state: "pending",
        issued_at: this.now().toISOString(),
        sent_at: null,
        resolved_at: null,
        reason: null,
        result: null,
        error: null,
      },
      deadline: null,
    };
    const commandId = record.command.id;
    this.active.set(commandId, record);
    this.slots.set(key, commandId);

    const outbox = this.outboxes.get(deviceId) ?? [];
    outbox.push(commandId);
    this.outboxes.set(deviceId, outbox);

    this.logger.info({ commandId, deviceId, kind: commandKind }, "Command issued");

    // Nothing ahead of it: deliver now, so a synchronous channel refusal
    // reaches the caller as a rejection instead of a failed command
    if (outbox.length === 1 && !this.delivering.has(deviceId)) {
      outbox.shift();
      this.outboxes.delete(deviceId);
      this.deliver(record, true);
    }

    return copyCommand(record.command);
  }

  /**
   * A device answered a delivered command. Unknown or already-resolved
   * commands are logged and left alone.
   */
  onAck(commandId: string, ack: CommandAck): TransitionResult {
    const record = this.active.get(commandId);
    if (!record) {
      const resolved = this.resolvedById.get(commandId);
      if (resolved) {
        this.logger.debug(
          { commandId, state: resolved.state },
          "Ack for resolved command ignored",
        );
        return {
          success: false,
          previous_state: resolved.state,
          new_state: resolved.state,
          reason: `Command already ${resolved.state}`,
        };
      }
      this.logger.warn({ commandId }, "Ack for unknown command ignored");
      return { success: false, previous_state: null, new_state: null, reason: "Command not found" };
    }

    const { command } = record;
    if (command.state !== "sent") {
      this.logger.warn({ commandId, state: command.state }, "Ack for undelivered command ignored");
      return {
        success: false,
        previous_state: command.state,
        new_state: command.state,
        reason: `Command is in state '${command.state}', expected 'sent'`,
      };
    }

    if (ack.ok) {
      const result = this.resolve(record, "acked", { result: ack.result ?? null });
      this.registry.recordContact(command.device_id, this.now());
      return result;
    }
    return this.resolve(record, "failed", { reason: "device_reported", error: ack.error });
  }

  /**
   * Cancel a pending or sent command. A command that already resolved (for
   * example acked a moment earlier) stays as it is.
   *
   * @throws UnknownCommandError when the id was never issued or aged out of history
   */
  cancel(commandId: string): TransitionResult {
    const record = this.active.get(commandId);
    if (record) {
      return this.resolve(record, "failed", { reason: "cancelled" });
    }

    const resolved = this.resolvedById.get(commandId);
    if (!resolved) {
      throw new UnknownCommandError(commandId);
    }
    return {
      success: false,
      previous_state: resolved.state,
      new_state: resolved.state,
      reason: `Command already ${resolved.state}`,
    };
  }

  /**
   * Fail every outstanding command of a removed device, then forget its
   * history. The failures still reach subscribers as command.result events;
   * afterwards `get` no longer knows the device's commands, and a device
   * registered again under the same id starts with an empty history.
   */
  handleDeviceRemoved(deviceId: string): number {
    let failed = 0;
    for (const record of [...this.active.values()]) {
      if (record.command.device_id !== deviceId) continue;
      this.resolve(record, "failed", { reason: "device_removed" });
      failed++;
    }
    this.outboxes.delete(deviceId);
    this.clearHistory(deviceId);
    if (failed > 0) {
      this.logger.info({ deviceId, failed }, "Failed in-flight commands of removed device");
    }
    return failed;
  }

  get(commandId: string): Command | undefined {
    const record = this.active.get(commandId);
    if (record) return copyCommand(record.command);
    const resolved = this.resolvedById.get(commandId);
    return resolved ? copyCommand(resolved) : undefined;
  }

  /** Pending and sent commands in issuance order, optionally for one device */
  inFlight(deviceId?: string): Command[] {
    const out: Command[] = [];
    for (const { command } of this.active.values()) {
      if (deviceId === undefined || command.device_id === deviceId) {
        out.push(copyCommand(command));
      }
    }
    return out;
  }

  /** Resolved commands for a device, newest first */
  history(deviceId: string, limit?: number): Command[] {
    const entries = this.histories.get(deviceId) ?? [];
    return entries.slice(0, limit ?? entries.length).map(copyCommand);
  }

  /** Forget resolved commands for one device, or for all devices */
  clearHistory(deviceId?: string): void {
    const devices = deviceId === undefined ? [...this.histories.keys()] : [deviceId];
    for (const id of devices) {
      for (const command of this.histories.get(id) ?? []) {
        this.resolvedById.delete(command.id);
      }
      this.histories.delete(id);
    }
  }

  /** Cancel everything outstanding and refuse further commands */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const record of [...this.active.values()]) {
      this.resolve(record, "failed", { reason: "cancelled" });
    }
    this.outboxes.clear();
    this.delivering.clear();
  }

  // -------------------------------------------------------------------------
  // Delivery
  // -------------------------------------------------------------------------

  /**
   * Hand a pending command to the channel. On the immediate path (called
   * from issue) a synchronous failure is rolled back and thrown; otherwise
   * the command fails with channel_unavailable.
   */
  private deliver(record: CommandRecord, immediate: boolean): void {
    const { id: commandId, device_id: deviceId, kind, issued_at } = record.command;
    const deadlineMs = this.deadlineFor(kind);

    this.transition(record, "sent", {});
    record.command.sent_at = this.now().toISOString();
    record.deadline = setTimeout(() => this.expire(commandId), deadlineMs);

    const delivery: CommandDelivery = {
      command_id: commandId,
      device_id: deviceId,
      kind,
      deadline_ms: deadlineMs,
      issued_at,
    };

    let pending: void | Promise<void>;
    try {
      pending = this.channel.send(delivery);
    } catch (err) {
      if (immediate) {
        this.rollback(record);
        this.logger.warn({ commandId, deviceId, err: describeError(err) }, "Channel refused command");
        throw err instanceof ChannelUnavailableError || err instanceof DeviceOfflineError
          ? new DeviceOfflineError(deviceId, { channel: err.message })
          : err;
      }
      this.failDelivery(commandId, err);
      return;
    }

    this.logger.debug({ commandId, deviceId, deadlineMs }, "Command sent");

    if (pending instanceof Promise) {
      this.delivering.add(deviceId);
      void pending.then(
        () => this.settleDelivery(deviceId),
        (err: unknown) => {
          this.failDelivery(commandId, err);
          this.settleDelivery(deviceId);
        },
      );
    }
  }

  private settleDelivery(deviceId: string): void {
    this.delivering.delete(deviceId);
    this.pump(deviceId);
  }

  /** Deliver queued commands for a device until one is in progress or the outbox is empty */
  private pump(deviceId: string): void {
    while (!this.delivering.has(deviceId)) {
      const outbox = this.outboxes.get(deviceId);
      const commandId = outbox?.shift();
      if (commandId === undefined) {
        this.outboxes.delete(deviceId);
        return;
      }
      const record = this.active.get(commandId);
      if (record && record.command.state === "pending") {
        this.deliver(record, false);
      }
    }
  }

  private failDelivery(commandId: string, err: unknown): void {
    const record = this.active.get(commandId);
    if (!record) return;
    this.logger.warn(
      { commandId, deviceId: record.command.device_id, err: describeError(err) },
      "Command delivery failed",
    );
    this.resolve(record, "failed", { reason: "channel_unavailable", error: describeError(err) });
  }

  /** Undo an immediate delivery that never reached the channel */
  private rollback(record: CommandRecord): void {
    const { command } = record;
    if (record.deadline) clearTimeout(record.deadline);
    this.active.delete(command.id);
    this.releaseSlot(command);
  }

  private expire(commandId: string): void {
    const record = this.active.get(commandId);
    if (!record || record.command.state !== "sent") return;

    record.deadline = null;
    this.resolve(record, "timed_out", { reason: "timed_out" });
    this.registry.recordMissedDeadline(record.command.device_id);
  }

  // -------------------------------------------------------------------------
  // State changes
  // -------------------------------------------------------------------------

  private transition(record: CommandRecord, to: CommandState, fields: Resolution): TransitionResult {
    const from = record.command.state;
    if (!isValidTransition(from, to)) {
      return {
        success: false,
        previous_state: from,
        new_state: from,
        reason: `Invalid transition: ${from} -> ${to}`,
      };
    }
    record.command = {
      ...record.command,
      state: to,
      reason: fields.reason ?? record.command.reason,
      result: fields.result !== undefined ? fields.result : record.command.result,
      error: fields.error ?? record.command.error,
    };
    return { success: true, previous_state: from, new_state: to };
  }

  /** Move an active command to a terminal state and publish the result */
  private resolve(record: CommandRecord, to: CommandState, fields: Resolution): TransitionResult {
    const transition = this.transition(record, to, fields);
    if (!transition.success) return transition;

    const command = record.command;
    command.resolved_at = this.now().toISOString();
    if (record.deadline) {
      clearTimeout(record.deadline);
      record.deadline = null;
    }

    this.active.delete(command.id);
    this.releaseSlot(command);
    if (transition.previous_state === "pending") {
      const outbox = this.outboxes.get(command.device_id);
      const index = outbox?.indexOf(command.id) ?? -1;
      if (outbox && index >= 0) outbox.splice(index, 1);
    }
    this.remember(command);

    this.logger.info(
      { commandId: command.id, deviceId: command.device_id, state: command.state, reason: command.reason },
      "Command resolved",
    );
    this.hub.publish({ type: "command.result", source: "dispatcher", command: copyCommand(command) });
    return transition;
  }

  private releaseSlot(command: Command): void {
    const key = slotKey(command.device_id, command.kind);
    if (this.slots.get(key) === command.id) {
      this.slots.delete(key);
    }
  }

  private remember(command: Command): void {
    if (!isActive(command.state) && this.config.historyLimit > 0) {
      const entries = this.histories.get(command.device_id) ?? [];
      entries.unshift(command);
      for (const dropped of entries.splice(this.config.historyLimit)) {
        this.resolvedById.delete(dropped.id);
      }
      this.histories.set(command.device_id, entries);
      this.resolvedById.set(command.id, command);
    }
  }
}
