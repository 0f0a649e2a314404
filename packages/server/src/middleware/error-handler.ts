/**
 * Global Express error handler for fleetdeck.
 *
 * Catches all errors thrown or passed via next(err) in the middleware chain
 * and maps them to HTTP responses:
 *
 *   - ZodError    → 400 with validation details
 *   - FleetError  → status from its code (see mapFleetErrorToStatus)
 *   - Everything else → 500 Internal Server Error
 *
 * Full error details (including stack traces) are always logged at error level.
 * Stack traces are never sent to clients in production.
 */

import type { ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { FleetError } from "@fleetdeck/shared";

/**
 * Map a FleetError code to an HTTP status code.
 *
 * @param code - The machine-readable error code (e.g., "COMMAND_IN_FLIGHT")
 */
export function mapFleetErrorToStatus(code: string): number {
  switch (code) {
    case "DEVICE_UNKNOWN":
    case "COMMAND_UNKNOWN":
      return 404;
    case "DEVICE_EXISTS":
    case "COMMAND_DEVICE_OFFLINE":
    case "COMMAND_IN_FLIGHT":
      return 409;
    case "CHANNEL_UNAVAILABLE":
    case "DISPATCHER_DISPOSED":
      return 503;
  }
  if (code.startsWith("VALIDATION_")) return 400;
  if (code.startsWith("NETWORK_")) return 502;
  if (code.startsWith("STORAGE_")) return 503;
  // CONFIG_* and unknown prefixes
  return 500;
}

/**
 * Create the error-handling middleware. Express recognizes it by its four
 * parameters, so `_next` must stay in the signature.
 */
export function createErrorHandler(logger: Logger, production: boolean): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    const error = err instanceof Error ? err : new Error(String(err));
    const code = error instanceof FleetError ? error.code : undefined;

    if (code === undefined || mapFleetErrorToStatus(code) >= 500) {
      logger.error({ err: error, code }, `Request error: ${error.message}`);
    } else {
      logger.debug({ code, context: error instanceof FleetError ? error.context : undefined }, error.message);
    }

    // --- Zod validation errors → 400 with structured details ---
    if (error instanceof ZodError) {
      res.status(400).json({
        error: "Validation failed",
        details: error.issues,
      });
      return;
    }

    // --- FleetError → HTTP status based on code ---
    if (error instanceof FleetError) {
      res.status(mapFleetErrorToStatus(error.code)).json({
        error: error.message,
        code: error.code,
        context: error.context,
        ...(production ? {} : { stack: error.stack }),
      });
      return;
    }

    // --- Express body-parser errors carry their own status (e.g. 400 malformed JSON, 413 too large) ---
    const status = "status" in error && typeof error.status === "number" ? error.status : 500;
    if (status >= 400 && status < 500) {
      res.status(status).json({ error: error.message });
      return;
    }

    res.status(500).json({
      error: "Internal server error",
      ...(production ? {} : { stack: error.stack }),
    });
  };
}
