/**
 * Server configuration loaded from environment variables.
 *
 * `dotenv/config` is imported by index.ts before this runs, so a .env file
 * in the working directory is honoured. Every value is validated with zod;
 * an invalid value aborts startup with a ConfigError listing each problem.
 *
 * Environment variables:
 *   PORT                          - HTTP port (default: 3000)
 *   LOG_LEVEL                     - pino level (default: info)
 *   LOG_DIR                       - log file directory (default: {project_root}/logs)
 *   NODE_ENV                      - "production" disables pretty logs and error stacks
 *   COMMAND_DEADLINE_MS           - default ack deadline (default: 30000)
 *   COMMAND_DEADLINE_<KIND>_MS    - per-kind override, e.g. COMMAND_DEADLINE_WIPE_MS
 *   HUB_BUFFER_SIZE               - per-subscriber event buffer (default: 256)
 *   COMMAND_HISTORY_LIMIT         - resolved commands kept per device (default: 50)
 *   FLEET_STATE_PATH              - JSON snapshot file; persistence is off when unset
 */

import { z } from "zod";
import { COMMAND_KINDS, ConfigError, type CommandKind } from "@fleetdeck/shared";
import type { EngineConfig } from "@fleetdeck/core";

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_DIR: z.string().min(1).optional(),
  NODE_ENV: z.string().default("development"),
  COMMAND_DEADLINE_MS: positiveInt.default(30_000),
  HUB_BUFFER_SIZE: positiveInt.default(256),
  COMMAND_HISTORY_LIMIT: z.coerce.number().int().min(0).default(50),
  FLEET_STATE_PATH: z.string().min(1).optional(),
});

export interface ServerConfig {
  port: number;
  logLevel: string;
  logDir?: string;
  production: boolean;
  statePath?: string;
  engine: EngineConfig;
}

/** Environment variable holding the deadline override for a kind */
export function deadlineEnvVar(kind: CommandKind): string {
  return `COMMAND_DEADLINE_${kind.toUpperCase()}_MS`;
}

/**
 * Parse and validate the server configuration.
 *
 * @throws ConfigError when any variable is invalid
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const issues: string[] = [];

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      issues.push(`${issue.path.join(".")}: ${issue.message}`);
    }
  }

  const deadlines: Partial<Record<CommandKind, number>> = {};
  for (const kind of COMMAND_KINDS) {
    const name = deadlineEnvVar(kind);
    const raw = env[name];
    if (raw === undefined || raw === "") continue;
    const value = positiveInt.safeParse(raw);
    if (value.success) {
      deadlines[kind] = value.data;
    } else {
      issues.push(`${name}: must be a positive integer`);
    }
  }

  if (!parsed.success || issues.length > 0) {
    throw new ConfigError(`Invalid server configuration: ${issues.join("; ")}`, "CONFIG_INVALID", {
      issues,
    });
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    logLevel: data.LOG_LEVEL,
    logDir: data.LOG_DIR,
    production: data.NODE_ENV === "production",
    statePath: data.FLEET_STATE_PATH,
    engine: {
      defaultDeadlineMs: data.COMMAND_DEADLINE_MS,
      deadlines,
      historyLimit: data.COMMAND_HISTORY_LIMIT,
      hubBufferSize: data.HUB_BUFFER_SIZE,
    },
  };
}
