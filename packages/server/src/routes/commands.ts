/**
 * Command API endpoints for fleetdeck.
 *
 *   - POST /devices/:id/commands : issue { kind }; 202 with the command
 *   - GET  /devices/:id/commands : in-flight commands, then history (newest first)
 *   - GET  /commands/:id         : one command
 *   - POST /commands/:id/ack     : device answer, for transports that call back over HTTP
 *   - POST /commands/:id/cancel  : cancel a pending or sent command
 *
 * Issuance rejections (unknown device, offline, in flight, bad kind) are
 * thrown by the dispatcher and mapped to status codes by the error handler.
 */

import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import {
  UnknownCommandError,
  UnknownDeviceError,
  commandAckSchema,
  issueCommandSchema,
} from "@fleetdeck/shared";
import type { FleetEngine } from "@fleetdeck/core";

export interface CommandsRouterDeps {
  engine: Pick<FleetEngine, "registry" | "dispatcher">;
  logger: Logger;
}

export function createCommandsRouter(deps: CommandsRouterDeps): Router {
  const { engine, logger } = deps;
  const { registry, dispatcher } = engine;
  const router = Router();

  // =========================================================================
  // POST /devices/:id/commands: issue
  // =========================================================================
  router.post("/devices/:id/commands", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { kind } = issueCommandSchema.parse(req.body);
      const command = dispatcher.issue(req.params.id, kind);
      res.status(202).json({ command });
    } catch (err) {
      next(err);
    }
  });

  // =========================================================================
  // GET /devices/:id/commands: in-flight then history
  // =========================================================================
  router.get("/devices/:id/commands", (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = req.params.id;
      if (!registry.has(id)) throw new UnknownDeviceError(id);
      res.json({ commands: [...dispatcher.inFlight(id), ...dispatcher.history(id)] });
    } catch (err) {
      next(err);
    }
  });

  // =========================================================================
  // GET /commands/:id
  // =========================================================================
  router.get("/commands/:id", (req: Request, res: Response, next: NextFunction) => {
    try {
      const command = dispatcher.get(req.params.id);
      if (!command) throw new UnknownCommandError(req.params.id);
      res.json({ command });
    } catch (err) {
      next(err);
    }
  });

  // =========================================================================
  // POST /commands/:id/ack: device answer over HTTP
  // =========================================================================
  router.post("/commands/:id/ack", (req: Request, res: Response, next: NextFunction) => {
    try {
      const ack = commandAckSchema.parse(req.body);
      const id = req.params.id;
      if (!dispatcher.get(id)) throw new UnknownCommandError(id);

      const transition = dispatcher.onAck(id, ack);
      if (!transition.success) {
        logger.debug({ commandId: id, reason: transition.reason }, "Ack had no effect");
      }
      res.json({ transition, command: dispatcher.get(id) });
    } catch (err) {
      next(err);
    }
  });

  // =========================================================================
  // POST /commands/:id/cancel
  // =========================================================================
  router.post("/commands/:id/cancel", (req: Request, res: Response, next: NextFunction) => {
    try {
      const transition = dispatcher.cancel(req.params.id);
      res.json({ transition, command: dispatcher.get(req.params.id) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
