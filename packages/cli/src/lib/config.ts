/**
 * Configuration file management for the fleetdeck CLI.
 *
 * Manages ~/.fleetdeck/config.yaml. All config operations are synchronous:
 * the config is read once per command and only written by `init`.
 *
 * Directory layout:
 *   ~/.fleetdeck/
 *     config.yaml      : backend URL and output preferences
 *
 * FLEETDECK_URL overrides backend.url, and works without a config file.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as crypto from "node:crypto";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "@fleetdeck/shared";

// ---------------------------------------------------------------------------
// Path constants
// ---------------------------------------------------------------------------

/** Root config directory under the user's home */
export const CONFIG_DIR = path.join(os.homedir(), ".fleetdeck");

/** Path to the main YAML config file */
export const CONFIG_PATH = path.join(CONFIG_DIR, "config.yaml");

/** Environment variable overriding backend.url */
export const URL_ENV_VAR = "FLEETDECK_URL";

/** Backend URL written by `init` when none is given */
export const DEFAULT_BACKEND_URL = "http://localhost:3000";

// ---------------------------------------------------------------------------
// Zod schema for config validation
// ---------------------------------------------------------------------------

const backendUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), "must be an http(s) URL");

const FleetdeckConfigSchema = z.object({
  backend: z.object({
    /** Origin of the fleetdeck server (e.g., http://localhost:3000) */
    url: backendUrlSchema,
    /** HTTP timeout (ms) for API calls */
    timeout_ms: z.number().int().positive().default(10_000),
  }),
});

/** Strongly-typed config structure, matching the YAML layout 1:1 */
export type FleetdeckConfig = z.infer<typeof FleetdeckConfigSchema>;

// ---------------------------------------------------------------------------
// Path overrides for tests
// ---------------------------------------------------------------------------

let _configDirOverride: string | undefined;
let _configPathOverride: string | undefined;

/** Get the active config directory (respects test overrides) */
export function getConfigDir(): string {
  return _configDirOverride ?? CONFIG_DIR;
}

/** Get the active config file path (respects test overrides) */
export function getConfigPath(): string {
  return _configPathOverride ?? CONFIG_PATH;
}

/**
 * Override config paths: for tests only.
 * Pass `undefined` to reset back to real paths.
 */
export function overrideConfigPaths(baseDir: string | undefined): void {
  _configDirOverride = baseDir;
  _configPathOverride = baseDir ? path.join(baseDir, "config.yaml") : undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Whether the config file exists on disk (contents are not validated) */
export function configExists(): boolean {
  return fs.existsSync(getConfigPath());
}

/**
 * Validate a backend URL given on the command line or in the environment.
 *
 * @throws ConfigError CONFIG_INVALID_URL
 */
export function parseBackendUrl(value: string): string {
  const result = backendUrlSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid backend URL: ${value}`, "CONFIG_INVALID_URL", { url: value });
  }
  return result.data.replace(/\/+$/, "");
}

/**
 * Load and validate the config file.
 *
 * @throws ConfigError CONFIG_NOT_FOUND: file does not exist
 * @throws ConfigError CONFIG_CORRUPTED: file exists but is not valid YAML
 * @throws ConfigError CONFIG_INVALID: YAML parses but fails schema validation
 */
export function loadConfig(): FleetdeckConfig {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found at ${configPath}. Run 'fleetdeck init' or set ${URL_ENV_VAR}.`,
      "CONFIG_NOT_FOUND",
      { path: configPath },
    );
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Config file at ${configPath} is not valid YAML.`, "CONFIG_CORRUPTED", {
      path: configPath,
      parseError: String(err),
    });
  }

  const result = FleetdeckConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `Config file at ${configPath} has invalid structure: ${result.error.message}`,
      "CONFIG_INVALID",
      { path: configPath, zodErrors: result.error.issues },
    );
  }

  return result.data;
}

/**
 * Resolve the effective config: FLEETDECK_URL wins over the file's
 * backend.url, and is enough on its own when no file exists.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): FleetdeckConfig {
  const override = env[URL_ENV_VAR];
  if (override) {
    const url = parseBackendUrl(override);
    const base = configExists() ? loadConfig() : null;
    return { backend: { url, timeout_ms: base?.backend.timeout_ms ?? 10_000 } };
  }
  return loadConfig();
}

/**
 * Persist config to disk with an atomic write (tmp file + rename), mode 0o600.
 */
export function saveConfig(config: FleetdeckConfig): void {
  const configPath = getConfigPath();
  const configDir = getConfigDir();

  fs.mkdirSync(configDir, { recursive: true });

  const yamlContent =
    "# fleetdeck CLI configuration\n" +
    "# Generated by 'fleetdeck init'. Edit with care.\n\n" +
    stringifyYaml(config, { lineWidth: 120 });

  // Same directory as the target so the rename stays on one filesystem
  const tmpPath = path.join(configDir, `.config.yaml.tmp.${crypto.randomBytes(4).toString("hex")}`);

  try {
    fs.writeFileSync(tmpPath, yamlContent, { mode: 0o600 });
    fs.renameSync(tmpPath, configPath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}
