/**
 * `fleetdeck watch` command.
 *
 * Streams fleet events from the operator feed until interrupted, one line
 * per event (or one JSON object per line with --json). Reconnects with
 * backoff when the server goes away; subscriptions are restored on
 * reconnect. An overrun marker means events were dropped and the device
 * list should be re-read.
 */

import { Command } from "commander";
import pc from "picocolors";
import type { HubDelivery } from "@fleetdeck/shared";
import { resolveConfig } from "../lib/config.js";
import { WsClient, type WsClientOptions } from "../lib/ws-client.js";
import { formatError, formatFleetEvent } from "../lib/formatters.js";

export interface WatchOptions {
  device?: string;
  json?: boolean;
}

export interface WatchDeps {
  /** Server origin; read from config when omitted */
  baseUrl?: string;
  /** Where event lines go (default: stdout) */
  write?: (line: string) => void;
  /** Where status lines go (default: stderr) */
  status?: (line: string) => void;
  /** Reconnect tuning, for tests */
  reconnect?: Omit<WsClientOptions, "baseUrl">;
}

/**
 * Connect, subscribe and start printing. Resolves with the client once
 * connected; the caller owns its lifetime.
 */
export async function startWatch(opts: WatchOptions, deps: WatchDeps = {}): Promise<WsClient> {
  const write = deps.write ?? ((line: string) => process.stdout.write(line + "\n"));
  const status = deps.status ?? ((line: string) => process.stderr.write(line + "\n"));
  const baseUrl = deps.baseUrl ?? resolveConfig().backend.url;

  const client = new WsClient({ baseUrl, ...deps.reconnect });

  client.on("event", (event: HubDelivery) => {
    write(opts.json ? JSON.stringify(event) : formatFleetEvent(event));
  });
  client.on("connected", () => {
    status(pc.dim(`Connected to ${baseUrl}`));
  });
  client.on("disconnected", (reason: string) => {
    status(pc.yellow(`Disconnected: ${reason}`));
  });
  client.on("reconnecting", (attempt: number, delay: number) => {
    status(pc.dim(`Reconnecting (attempt ${attempt}) in ${Math.round(delay)}ms...`));
  });
  client.on("error", (err: Error) => {
    status(formatError(err));
  });

  client.subscribe(opts.device ? { device_id: opts.device } : { scope: "all" });
  await client.connect();
  return client;
}

export function createWatchCommand(): Command {
  return new Command("watch")
    .description("Stream live fleet events")
    .option("--device <id>", "Only events about this device")
    .option("--json", "One JSON event per line")
    .action(async (opts: WatchOptions) => {
      await runWatch(opts);
    });
}

/** Runs until SIGINT or SIGTERM */
export async function runWatch(opts: WatchOptions): Promise<void> {
  let client: WsClient;
  try {
    client = await startWatch(opts);
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }

  await new Promise<void>((resolve) => {
    const stop = (): void => {
      client.destroy();
      resolve();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  });
}
