/**
 * @fleetdeck/core: the fleet state and command-dispatch engine.
 *
 * Pure domain logic with injected dependencies (logger, device channel,
 * persistence hook, clock). No HTTP, no WebSocket, no terminal knowledge.
 */

export { TRANSITIONS, isValidTransition, isTerminal, isActive } from "./command-lifecycle.js";

export { createKeyedQueue } from "./keyed-queue.js";
export type { KeyedQueue } from "./keyed-queue.js";

export { NotificationHub, DEFAULT_HUB_BUFFER_SIZE } from "./notification-hub.js";
export type { NotificationHubOptions, SubscribeOptions, Subscription } from "./notification-hub.js";

export { DeviceRegistry, cloneDevice, mergeDevicePatch } from "./device-registry.js";
export type {
  DeviceRegistryOptions,
  UpsertOptions,
  UpsertResult,
  StrikeResult,
  DeviceRemovedListener,
} from "./device-registry.js";

export { CommandDispatcher, DEFAULT_DISPATCHER_CONFIG } from "./command-dispatcher.js";
export type {
  DeviceChannelProvider,
  DispatcherConfig,
  CommandDispatcherOptions,
} from "./command-dispatcher.js";

export { StatusReconciler } from "./status-reconciler.js";
export type { IngestResult, StatusReconcilerOptions } from "./status-reconciler.js";

export { createJsonFilePersistence, fleetSnapshotSchema } from "./persistence.js";
export type { FleetPersistence, FleetSnapshot, JsonFilePersistenceOptions } from "./persistence.js";

export { createFleetEngine, DEFAULT_ENGINE_CONFIG } from "./fleet-engine.js";
export type { EngineConfig, FleetEngine, FleetEngineOptions } from "./fleet-engine.js";
