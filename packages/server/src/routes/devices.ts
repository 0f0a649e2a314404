/**
 * Device API endpoints for fleetdeck.
 *
 *   - GET    /devices                : all devices, registration order
 *   - POST   /devices                : register a device
 *   - GET    /devices/:id            : detail with in-flight and recent commands
 *   - PATCH  /devices/:id            : operator edit (name, os, location, metadata)
 *   - DELETE /devices/:id            : remove (idempotent)
 *   - POST   /devices/:id/telemetry  : push or poll result for the reconciler
 *
 * Every handler reads from or writes to the engine; nothing here keeps state.
 */

import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import {
  UnknownDeviceError,
  deviceEditSchema,
  registerDeviceSchema,
} from "@fleetdeck/shared";
import type { FleetEngine } from "@fleetdeck/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Dependencies injected into the devices router for testability */
export interface DevicesRouterDeps {
  engine: Pick<FleetEngine, "registry" | "dispatcher" | "reconciler">;
  logger: Logger;
}

/** Recent commands shown on the detail endpoint */
const RECENT_COMMANDS_LIMIT = 10;

// ---------------------------------------------------------------------------
// Router factory
// ---------------------------------------------------------------------------

/**
 * Create the devices router with injected dependencies.
 *
 * @returns Express Router with device endpoints mounted at /devices/*
 */
export function createDevicesRouter(deps: DevicesRouterDeps): Router {
  const { engine, logger } = deps;
  const { registry, dispatcher, reconciler } = engine;
  const router = Router();

  // =========================================================================
  // GET /devices: list in registration order
  // =========================================================================
  router.get("/devices", (_req: Request, res: Response) => {
    res.json({ devices: [...registry.list()] });
  });

  // =========================================================================
  // POST /devices: register
  // =========================================================================
  router.post("/devices", (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = registerDeviceSchema.parse(req.body);
      const device = registry.register(input);
      logger.info({ deviceId: device.id }, "Device registered via API");
      res.status(201).json({ device });
    } catch (err) {
      next(err);
    }
  });

  // =========================================================================
  // GET /devices/:id: detail
  // =========================================================================
  router.get("/devices/:id", (req: Request, res: Response, next: NextFunction) => {
    try {
      const device = registry.get(req.params.id);
      if (!device) throw new UnknownDeviceError(req.params.id);

      res.json({
        device,
        in_flight: dispatcher.inFlight(device.id),
        recent_commands: dispatcher.history(device.id, RECENT_COMMANDS_LIMIT),
      });
    } catch (err) {
      next(err);
    }
  });

  // =========================================================================
  // PATCH /devices/:id: operator edit
  // =========================================================================
  router.patch("/devices/:id", (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = req.params.id;
      if (!registry.has(id)) throw new UnknownDeviceError(id);

      const edit = deviceEditSchema.parse(req.body);
      const result = registry.upsert(id, edit);
      res.json({ device: result.device });
    } catch (err) {
      next(err);
    }
  });

  // =========================================================================
  // DELETE /devices/:id: remove (idempotent)
  // =========================================================================
  router.delete("/devices/:id", (req: Request, res: Response) => {
    const removed = registry.remove(req.params.id);
    if (removed) {
      logger.info({ deviceId: req.params.id }, "Device removed via API");
    }
    res.status(204).end();
  });

  // =========================================================================
  // POST /devices/:id/telemetry: reconcile a report
  // =========================================================================
  router.post("/devices/:id/telemetry", (req: Request, res: Response) => {
    const result = reconciler.ingest(req.params.id, req.body);

    if (result.status === "rejected") {
      const status = result.reason === "unknown_device" ? 404 : 400;
      res.status(status).json({
        error: result.reason === "unknown_device" ? `Device not found: ${req.params.id}` : "Invalid telemetry",
        status: result.status,
        reason: result.reason,
        ...(result.detail ? { detail: result.detail } : {}),
      });
      return;
    }

    res.status(202).json({ status: result.status, device: result.device });
  });

  return router;
}
