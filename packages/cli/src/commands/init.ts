/**
 * `fleetdeck init` command.
 *
 * Writes ~/.fleetdeck/config.yaml pointing the CLI at a fleetdeck server.
 *
 * Flow:
 *   1. Check if already initialized (skip unless --force)
 *   2. Resolve the backend URL: --url > FLEETDECK_URL > http://localhost:3000
 *   3. Write config atomically
 *   4. Test server connectivity (warn-only on failure)
 */

import { Command } from "commander";
import {
  configExists,
  getConfigPath,
  parseBackendUrl,
  saveConfig,
  DEFAULT_BACKEND_URL,
  URL_ENV_VAR,
  type FleetdeckConfig,
} from "../lib/config.js";
import { FleetApiClient } from "../lib/api-client.js";
import { formatError } from "../lib/formatters.js";

export interface InitOptions {
  url?: string;
  force?: boolean;
}

export function createInitCommand(): Command {
  return new Command("init")
    .description("Point the CLI at a fleetdeck server")
    .option("--url <url>", `Server URL (or set ${URL_ENV_VAR})`)
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: InitOptions) => {
      await runInit(opts);
    });
}

/**
 * Core init logic, separate from Commander for testing.
 */
export async function runInit(opts: InitOptions): Promise<void> {
  if (configExists() && !opts.force) {
    console.log("Already initialized. Use --force to re-initialize.");
    return;
  }

  let url: string;
  try {
    url = parseBackendUrl(opts.url ?? process.env[URL_ENV_VAR] ?? DEFAULT_BACKEND_URL);
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }

  const config: FleetdeckConfig = { backend: { url, timeout_ms: 10_000 } };
  saveConfig(config);

  const reachable = await new FleetApiClient({ baseUrl: url, timeout: 5000 }).health();

  console.log("");
  console.log("fleetdeck initialized.");
  console.log("");
  console.log(`  Config:      ${getConfigPath()}`);
  console.log(`  Server URL:  ${url}`);
  console.log("");
  console.log(
    reachable
      ? "  Server connectivity: OK"
      : "  Server connectivity: FAILED (config written, but the server is unreachable)",
  );
  console.log("");
}
