/**
 * Health check endpoint for the fleetdeck server.
 *
 * GET /api/health: engine counters plus live connection counts. The engine
 * lives in memory, so a process that can answer is healthy.
 */

import { Router } from "express";
import type { FleetEngine } from "@fleetdeck/core";

/** The server version reported in health check responses */
const VERSION = "0.1.0";

export interface HealthRouterDeps {
  engine: Pick<FleetEngine, "registry" | "dispatcher">;
  /** Connected operator feed clients */
  getWsClientCount?: () => number;
  /** Connected device agents */
  getDeviceConnectionCount?: () => number;
  /** Process start, for uptime (default: module load time) */
  startedAt?: number;
}

const moduleLoadedAt = Date.now();

/**
 * Create the health check router.
 *
 * @returns Express Router with GET / (mounted at /api/health)
 */
export function createHealthRouter(deps: HealthRouterDeps): Router {
  const router = Router();
  const startedAt = deps.startedAt ?? moduleLoadedAt;

  router.get("/", (_req, res) => {
    res.json({
      status: "ok",
      devices: deps.engine.registry.size,
      in_flight: deps.engine.dispatcher.inFlight().length,
      ws_clients: deps.getWsClientCount?.() ?? 0,
      device_connections: deps.getDeviceConnectionCount?.() ?? 0,
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      version: VERSION,
    });
  });

  return router;
}
