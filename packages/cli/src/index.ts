#!/usr/bin/env tsx

/**
 * fleetdeck CLI entry point.
 *
 * Operator console for a fleetdeck server. Uses Commander for argument
 * parsing and subcommand routing.
 *
 * Available commands:
 *   init       : Point the CLI at a server
 *   devices    : List the fleet
 *   device     : One device with its commands
 *   send       : Issue a command to a device
 *   cancel     : Cancel an in-flight command
 *   watch      : Stream live fleet events
 */

import { Command } from "commander";
import pino from "pino";
import { createInitCommand } from "./commands/init.js";
import { registerDevicesCommands } from "./commands/devices.js";
import { createSendCommand } from "./commands/send.js";
import { createCancelCommand } from "./commands/cancel.js";
import { createWatchCommand } from "./commands/watch.js";

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

/** Logs to stderr so stdout stays clean for output. Set LOG_LEVEL=debug for more. */
const logger = pino(
  { name: "fleetdeck", level: process.env.LOG_LEVEL ?? "warn" },
  pino.destination(2),
);

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("fleetdeck")
  .description("Device fleet operator console")
  .version("0.1.0");

program.addCommand(createInitCommand());
registerDevicesCommands(program);
program.addCommand(createSendCommand());
program.addCommand(createCancelCommand());
program.addCommand(createWatchCommand());

program.hook("preAction", (_thisCommand, actionCommand) => {
  logger.debug({ command: actionCommand.name(), args: actionCommand.args }, "Running command");
});

// ---------------------------------------------------------------------------
// Global error handling
// ---------------------------------------------------------------------------

process.on("unhandledRejection", (reason) => {
  logger.fatal({ err: reason }, "Unhandled rejection");
  process.exit(1);
});

process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "Uncaught exception");
  process.exit(1);
});

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal({ err }, "CLI execution failed");
  process.exit(1);
});
