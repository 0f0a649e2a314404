/**
 * Structured error hierarchy for fleetdeck.
 *
 * All fleetdeck errors extend FleetError, which adds:
 *   - `code`: Machine-readable error code (e.g., "COMMAND_IN_FLIGHT")
 *   - `context`: Arbitrary metadata for debugging (logged, not shown to user)
 *   - JSON serialization via toJSON()
 *
 * Error categories:
 *   - Fleet errors:    synchronous command/registry rejections (unknown device,
 *                      offline device, command already in flight, ...)
 *   - ConfigError:     config file or environment issues
 *   - NetworkError:    HTTP/WebSocket failures (timeouts, connection refused)
 *   - ValidationError: Zod schema validation failures
 *   - StorageError:    persistence hook failures
 *
 * Stale updates, overruns, cancellations and timeouts are outcomes reported
 * through results and hub events, never thrown.
 */

/**
 * Base error class for all fleetdeck errors.
 * Adds a machine-readable code and structured context for debugging.
 */
export class FleetError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** Structured debugging context: never exposed to end users */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "FleetError";
    this.code = code;
    this.context = context;
  }

  /** Serialize to a plain object for JSON logging and API error responses */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

// ---------------------------------------------------------------------------
// Registry / dispatcher rejections
// ---------------------------------------------------------------------------

/** The device id is not in the registry (never registered, or removed) */
export class UnknownDeviceError extends FleetError {
  constructor(deviceId: string) {
    super(`Device not found: ${deviceId}`, "DEVICE_UNKNOWN", { deviceId });
    this.name = "UnknownDeviceError";
  }
}

/** register() was called with an id that already exists */
export class DeviceAlreadyRegisteredError extends FleetError {
  constructor(deviceId: string) {
    super(`Device already registered: ${deviceId}`, "DEVICE_EXISTS", { deviceId });
    this.name = "DeviceAlreadyRegisteredError";
  }
}

/**
 * The device is offline. Commands to offline devices are rejected, not
 * queued, so the console can show the outcome immediately.
 */
export class DeviceOfflineError extends FleetError {
  constructor(deviceId: string, context: Record<string, unknown> = {}) {
    super(`Device is offline: ${deviceId}`, "COMMAND_DEVICE_OFFLINE", { deviceId, ...context });
    this.name = "DeviceOfflineError";
  }
}

/**
 * Thrown by a device channel provider when it has no route to the device.
 * The dispatcher treats it like an offline device.
 */
export class ChannelUnavailableError extends FleetError {
  constructor(deviceId: string, detail?: string) {
    super(
      detail ? `Channel unavailable for ${deviceId}: ${detail}` : `Channel unavailable for ${deviceId}`,
      "CHANNEL_UNAVAILABLE",
      { deviceId },
    );
    this.name = "ChannelUnavailableError";
  }
}

/** A command of the same kind is already pending or sent to this device */
export class CommandAlreadyInFlightError extends FleetError {
  constructor(deviceId: string, kind: string, activeCommandId: string) {
    super(
      `A ${kind} command is already in flight for ${deviceId}`,
      "COMMAND_IN_FLIGHT",
      { deviceId, kind, activeCommandId },
    );
    this.name = "CommandAlreadyInFlightError";
  }
}

/** The command id is not tracked by the dispatcher */
export class UnknownCommandError extends FleetError {
  constructor(commandId: string) {
    super(`Command not found: ${commandId}`, "COMMAND_UNKNOWN", { commandId });
    this.name = "UnknownCommandError";
  }
}

// ---------------------------------------------------------------------------
// Infrastructure categories
// ---------------------------------------------------------------------------

/**
 * Configuration errors: config file missing, corrupted, or invalid.
 * Code prefix: CONFIG_*
 *
 * @example
 *   throw new ConfigError("Config file not found", "CONFIG_MISSING", { path: "~/.fleetdeck/config.yaml" })
 */
export class ConfigError extends FleetError {
  constructor(
    message: string,
    code: string = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

/**
 * Network errors: HTTP failures, timeouts, connection refused.
 * Code prefix: NETWORK_*
 */
export class NetworkError extends FleetError {
  constructor(
    message: string,
    code: string = "NETWORK_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "NetworkError";
  }
}

/**
 * Validation errors: Zod schema failures, invalid input data.
 * Code prefix: VALIDATION_*
 *
 * @example
 *   throw new ValidationError("Unknown command kind", "VALIDATION_COMMAND_KIND", { kind: "reboot" })
 */
export class ValidationError extends FleetError {
  constructor(
    message: string,
    code: string = "VALIDATION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/**
 * Storage errors: persistence hook failures.
 * Code prefix: STORAGE_*
 */
export class StorageError extends FleetError {
  constructor(
    message: string,
    code: string = "STORAGE_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "StorageError";
  }
}
