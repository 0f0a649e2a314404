/**
 * `fleetdeck send <device-id> <kind>` command.
 *
 * Issues one command. Rejections (unknown device, offline device, a command
 * of the same kind already in flight) are printed with the server's reason.
 * With --wait, polls the command until it resolves.
 */

import { Command as CommanderCommand } from "commander";
import pc from "picocolors";
import {
  COMMAND_KINDS,
  TERMINAL_COMMAND_STATES,
  commandKindSchema,
  type Command,
  type CommandKind,
} from "@fleetdeck/shared";
import { FleetApiClient } from "../lib/api-client.js";
import {
  formatCommandOutcome,
  formatCommandState,
  formatError,
  outputResult,
} from "../lib/formatters.js";

export interface SendOptions {
  json?: boolean;
  wait?: boolean;
  /** Give up waiting after this many ms (default: 60000) */
  timeout?: number;
  /** Poll interval while waiting (default: 500) */
  interval?: number;
}

// ---------------------------------------------------------------------------
// Data Layer
// ---------------------------------------------------------------------------

export function parseCommandKind(value: string): CommandKind {
  const result = commandKindSchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Unknown command kind "${value}". Expected one of: ${COMMAND_KINDS.join(", ")}`);
  }
  return result.data;
}

function isTerminal(command: Command): boolean {
  return TERMINAL_COMMAND_STATES.includes(command.state);
}

/**
 * Poll until the command reaches a terminal state. Returns the last
 * snapshot seen, terminal or not, when the timeout passes.
 */
export async function waitForResolution(
  api: FleetApiClient,
  command: Command,
  opts: { timeoutMs: number; intervalMs: number },
): Promise<Command> {
  const deadline = Date.now() + opts.timeoutMs;
  let current = command;
  while (!isTerminal(current) && Date.now() < deadline) {
    await new Promise((resolve) => setTimeout(resolve, opts.intervalMs));
    current = await api.getCommand(command.id);
  }
  return current;
}

// ---------------------------------------------------------------------------
// Presentation
// ---------------------------------------------------------------------------

export function formatCommandSummary(command: Command): string {
  const outcome = formatCommandOutcome(command);
  return [
    `${pc.bold(command.kind)} -> ${command.device_id}  ${formatCommandState(command.state)}`,
    `  ${pc.dim("Command ID:")} ${command.id}`,
    ...(outcome ? [`  ${pc.dim("Outcome:")}    ${outcome}`] : []),
    ...(command.result !== null && command.result !== undefined
      ? [`  ${pc.dim("Result:")}     ${JSON.stringify(command.result)}`]
      : []),
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function createSendCommand(): CommanderCommand {
  return new CommanderCommand("send")
    .description(`Send a command to a device (${COMMAND_KINDS.join(", ")})`)
    .argument("<device-id>", "Target device id")
    .argument("<kind>", "Command kind")
    .option("--json", "Output as JSON")
    .option("--wait", "Wait for the device to answer", false)
    .option("--timeout <ms>", "How long --wait waits", (v) => parseInt(v, 10), 60_000)
    .action(async (deviceId: string, kind: string, opts: SendOptions) => {
      await runSend(deviceId, kind, opts);
    });
}

// ---------------------------------------------------------------------------
// Command Runner
// ---------------------------------------------------------------------------

export async function runSend(
  deviceId: string,
  kindArg: string,
  opts: SendOptions,
  api?: FleetApiClient,
): Promise<void> {
  try {
    const kind = parseCommandKind(kindArg);
    const client = api ?? FleetApiClient.fromConfig();

    let command = await client.issueCommand(deviceId, kind);
    if (opts.wait) {
      command = await waitForResolution(client, command, {
        timeoutMs: opts.timeout ?? 60_000,
        intervalMs: opts.interval ?? 500,
      });
    }

    outputResult(command, { json: opts.json, format: formatCommandSummary });

    if (command.state === "failed" || command.state === "timed_out") {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}
