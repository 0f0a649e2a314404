/**
 * Barrel re-export for all type definitions.
 * Import from "@fleetdeck/shared" to access these.
 */
export * from "./device.js";
export * from "./command.js";
export * from "./hub.js";
export * from "./ws.js";
