/**
 * Barrel re-export for all Zod schemas.
 */
export * from "./device.js";
export * from "./command.js";
export * from "./ws.js";
