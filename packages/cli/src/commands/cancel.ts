/**
 * `fleetdeck cancel <command-id>` command.
 *
 * Cancels a pending or sent command. Cancelling a command that already
 * resolved changes nothing and says so.
 */

import { Command } from "commander";
import pc from "picocolors";
import { FleetApiClient, type CommandTransitionResponse } from "../lib/api-client.js";
import { formatCommandState, formatError, outputResult } from "../lib/formatters.js";

export function formatCancelResult(res: CommandTransitionResponse): string {
  const { transition, command } = res;
  if (transition.success) {
    return `${pc.green("Cancelled")} ${command.kind} -> ${command.device_id} (${command.id})`;
  }
  return `Nothing to cancel: ${command.id} is already ${formatCommandState(command.state)}`;
}

export function createCancelCommand(): Command {
  return new Command("cancel")
    .description("Cancel an in-flight command")
    .argument("<command-id>", "Command id")
    .option("--json", "Output as JSON")
    .action(async (commandId: string, opts: { json?: boolean }) => {
      await runCancel(commandId, opts);
    });
}

export async function runCancel(
  commandId: string,
  opts: { json?: boolean },
  api?: FleetApiClient,
): Promise<void> {
  try {
    const client = api ?? FleetApiClient.fromConfig();
    const res = await client.cancelCommand(commandId);
    outputResult(res, { json: opts.json, format: formatCancelResult });
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}
