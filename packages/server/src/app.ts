/**
 * Express application factory for the fleetdeck server.
 *
 * Separated from index.ts so integration tests can create an app instance
 * via createApp() and listen on an ephemeral port.
 *
 * Middleware stack (order matters):
 *   1. express.json()   : parse JSON bodies (1MB limit)
 *   2. helmet()         : security headers
 *   3. cors()           : operator consoles on other origins may call the API
 *   4. pino-http        : request/response logging
 *   5. Routes           : /api/health, /api/devices/*, /api/commands/*
 *   6. Error handler    : must be last (catches thrown errors and next(err))
 */

import express from "express";
import cors from "cors";
import helmet from "helmet";
import { pinoHttp } from "pino-http";
import type { Logger } from "pino";
import type { FleetEngine } from "@fleetdeck/core";

import { createErrorHandler } from "./middleware/error-handler.js";
import { createHealthRouter } from "./routes/health.js";
import { createDevicesRouter } from "./routes/devices.js";
import { createCommandsRouter } from "./routes/commands.js";

/** Dependencies injected into createApp for testability */
export interface AppDeps {
  engine: FleetEngine;
  logger: Logger;
  /** Omit error stacks from responses */
  production?: boolean;
  /** Connected operator feed clients, reported by /api/health */
  getWsClientCount?: () => number;
  /** Connected device agents, reported by /api/health */
  getDeviceConnectionCount?: () => number;
}

/**
 * Create and configure the Express app with the full middleware stack.
 */
export function createApp(deps: AppDeps): express.Express {
  const { engine, logger } = deps;
  const app = express();

  // --- 1. Body parsing with size limit ---
  app.use(express.json({ limit: "1mb" }));

  // --- 2. Security headers ---
  app.use(helmet());

  // --- 3. CORS ---
  app.use(cors());

  // --- 4. Request/response logging via pino-http ---
  // Bodies are not logged (telemetry carries locations).
  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === "/api/health",
      },
    }),
  );

  // --- 5. Routes ---
  app.use(
    "/api/health",
    createHealthRouter({
      engine,
      getWsClientCount: deps.getWsClientCount,
      getDeviceConnectionCount: deps.getDeviceConnectionCount,
    }),
  );
  app.use("/api", createDevicesRouter({ engine, logger }));
  app.use("/api", createCommandsRouter({ engine, logger }));

  // --- 6. Error handler: MUST be registered last ---
  app.use(createErrorHandler(logger, deps.production ?? false));

  return app;
}
