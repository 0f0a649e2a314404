/**
 * Server entry point for fleetdeck.
 *
 * Startup sequence (order matters):
 *   1. Load env vars (dotenv) and validate the configuration
 *   2. Create loggers
 *   3. Create the device gateway (the engine's channel)
 *   4. Create the fleet engine, bind the gateway, hydrate from persistence
 *   5. Create the Express app and HTTP server
 *   6. Route WebSocket upgrades: /api/ws (operators), /api/devices/connect (devices)
 *   7. Start listening
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Stop accepting new connections
 *   2. Close operator feed and device gateway sockets
 *   3. Stop the engine (cancels timers, closes subscriptions, flushes persistence)
 *   4. Exit 0 (or force exit after 30s timeout)
 */

import "dotenv/config";
import { createServer } from "node:http";
import { ConfigError } from "@fleetdeck/shared";
import { createFleetEngine, createJsonFilePersistence } from "@fleetdeck/core";

import { createApp } from "./app.js";
import { loadServerConfig, type ServerConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createDeviceGateway } from "./gateway/device-gateway.js";
import { createWsServer } from "./ws/index.js";
import { attachUpgradeRouter } from "./ws/upgrade.js";

/** Graceful shutdown timeout: force exit if cleanup takes longer than this */
const SHUTDOWN_TIMEOUT_MS = 30_000;

function readConfig(): ServerConfig {
  try {
    return loadServerConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      const bootLogger = createLogger("server", "server.log");
      bootLogger.error({ code: err.code, context: err.context }, err.message);
      process.exit(1);
    }
    throw err;
  }
}

/**
 * Main server startup function.
 */
async function main(): Promise<void> {
  const startMs = performance.now();

  // --- Step 1: Configuration ---
  const config = readConfig();

  // --- Step 2: Loggers (the gateway gets its own file for isolated inspection) ---
  const loggerOptions = {
    level: config.logLevel,
    logDir: config.logDir,
    production: config.production,
  };
  const logger = createLogger("server", "server.log", loggerOptions);
  const gatewayLogger = createLogger("gateway", "gateway.log", loggerOptions);

  // --- Step 3-4: Gateway and engine ---
  const persistence = config.statePath
    ? createJsonFilePersistence(config.statePath, { logger })
    : undefined;
  const gateway = createDeviceGateway({ logger: gatewayLogger });
  const engine = createFleetEngine({
    logger,
    channel: gateway.channel,
    persistence,
    config: config.engine,
  });
  gateway.bind(engine);
  await engine.start();

  // --- Step 5: Express app + HTTP server ---
  // The feed server is created after the app; the count callback is a lazy
  // wrapper that reads it once available.
  let wsClientCountFn: (() => number) | undefined;
  const app = createApp({
    engine,
    logger,
    production: config.production,
    getWsClientCount: () => wsClientCountFn?.() ?? 0,
    getDeviceConnectionCount: () => gateway.getConnectionCount(),
  });
  const httpServer = createServer(app);

  // --- Step 6: WebSocket upgrades ---
  const wsServer = createWsServer({ hub: engine.hub, logger });
  wsClientCountFn = () => wsServer.getClientCount();
  attachUpgradeRouter(httpServer, {
    "/api/ws": wsServer.handleUpgrade,
    "/api/devices/connect": gateway.handleUpgrade,
  });

  // --- Step 7: Listen ---
  httpServer.listen(config.port, () => {
    const elapsedMs = Math.round(performance.now() - startMs);
    logger.info(
      {
        elapsed_ms: elapsedMs,
        port: config.port,
        devices: engine.registry.size,
        persistence: config.statePath ?? null,
      },
      `Server started in ${elapsedMs}ms. Devices: ${engine.registry.size}. Port: ${config.port}.`,
    );
  });

  // --- Graceful shutdown ---
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    // Prevent double-shutdown from multiple signals
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, "Shutting down...");

    const forceExitTimer = setTimeout(() => {
      logger.error("Graceful shutdown timed out: forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    try {
      // 1. Stop accepting new HTTP connections (resolves once open sockets end)
      const closed = new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });

      // 2. Close WebSocket connections so the HTTP server can finish closing
      await wsServer.shutdown();
      await gateway.shutdown();
      await closed;

      // 3. Stop the engine
      await engine.stop();

      logger.info("Shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("Unhandled startup error", err);
  process.exit(1);
});
