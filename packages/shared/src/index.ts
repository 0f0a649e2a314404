/**
 * @fleetdeck/shared: the contract layer for the fleetdeck monorepo.
 *
 * Every other package imports from here. Contains:
 *   - TypeScript types for devices, commands, hub events and socket messages
 *   - Zod validation schemas for request bodies, telemetry and socket messages
 *   - ULID generation and validation utilities
 *   - Structured error hierarchy
 */

// Type definitions for all domain entities
export * from "./types/index.js";

// Zod schemas for validation
export * from "./schemas/index.js";

// ULID generation and validation
export * from "./ulid.js";

// Structured error classes
export * from "./errors.js";
