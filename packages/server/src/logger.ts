/**
 * Centralized pino logger factory for the fleetdeck server.
 *
 * Provides multi-transport logging: pretty-printed to stdout (dev) + JSON to
 * log files (always). Each server component gets its own log file:
 *
 *   - server.log  : Express server, routes, middleware, startup/shutdown
 *   - gateway.log : device connections, command delivery, acks, telemetry
 *
 * Configuration:
 *   - LOG_LEVEL env var controls the log level (default: "info")
 *   - NODE_ENV=production disables pretty printing (JSON only)
 *   - LOG_DIR env var overrides the default log directory ({project_root}/logs)
 */

import pino from "pino";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

/** packages/server/src -> project root */
const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "..");

export interface LoggerOptions {
  level?: string;
  logDir?: string;
  /** JSON to stdout instead of pino-pretty */
  production?: boolean;
}

/** The directory log files are written to */
export function resolveLogDir(logDir?: string): string {
  return logDir || process.env.LOG_DIR || join(PROJECT_ROOT, "logs");
}

/**
 * Create a pino logger that writes to both stdout and a JSON log file.
 *
 * In production: JSON to stdout + JSON to file.
 * In development: pretty-printed to stdout + JSON to file.
 *
 * The file transport uses pino/file with mkdir:true, so the logs/ directory
 * is created on first write.
 *
 * @param name     - Logger name (appears in log entries)
 * @param filename - Log filename (e.g. "server.log"), written to the log dir
 */
export function createLogger(
  name: string,
  filename: string,
  options: LoggerOptions = {},
): pino.Logger {
  const level = options.level || process.env.LOG_LEVEL || "info";
  const production = options.production ?? process.env.NODE_ENV === "production";
  const filePath = join(resolveLogDir(options.logDir), filename);

  return pino({
    name,
    level,
    transport: {
      targets: [
        production
          ? { target: "pino/file", options: { destination: 1 }, level }
          : {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "HH:MM:ss",
                ignore: "pid,hostname",
              },
              level,
            },
        // JSON to log file (always)
        {
          target: "pino/file",
          options: { destination: filePath, mkdir: true },
          level,
        },
      ],
    },
  });
}
