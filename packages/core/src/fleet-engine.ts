/**
 * Fleet engine wiring.
 *
 * Builds the hub, registry, dispatcher and reconciler around one clock and
 * one logger, and connects registry removals to the dispatcher so a removed
 * device's outstanding commands fail with "device_removed".
 *
 * Usage:
 *   const engine = createFleetEngine({ logger, channel });
 *   await engine.start();      // hydrate from persistence, if configured
 *   engine.registry.register({ name: "Pixel 8", os: "Android 14" });
 *   await engine.stop();
 */

import type { Logger } from "pino";
import {
  CommandDispatcher,
  DEFAULT_DISPATCHER_CONFIG,
  type DeviceChannelProvider,
  type DispatcherConfig,
} from "./command-dispatcher.js";
import { DeviceRegistry } from "./device-registry.js";
import { DEFAULT_HUB_BUFFER_SIZE, NotificationHub } from "./notification-hub.js";
import type { FleetPersistence } from "./persistence.js";
import { StatusReconciler } from "./status-reconciler.js";

export interface EngineConfig extends DispatcherConfig {
  /** Per-subscriber hub buffer capacity */
  hubBufferSize: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  ...DEFAULT_DISPATCHER_CONFIG,
  hubBufferSize: DEFAULT_HUB_BUFFER_SIZE,
};

export interface FleetEngineOptions {
  logger: Logger;
  channel: DeviceChannelProvider;
  persistence?: FleetPersistence;
  config?: Partial<EngineConfig>;
  now?: () => Date;
}

export interface FleetEngine {
  registry: DeviceRegistry;
  dispatcher: CommandDispatcher;
  reconciler: StatusReconciler;
  hub: NotificationHub;
  /** Hydrate the registry from persistence */
  start(): Promise<void>;
  /** Cancel outstanding commands, close subscriptions and flush persistence */
  stop(): Promise<void>;
}

export function createFleetEngine(options: FleetEngineOptions): FleetEngine {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
  const logger = options.logger.child({ module: "fleet-engine" });
  const { now } = options;

  const hub = new NotificationHub({ logger, bufferSize: config.hubBufferSize, now });
  const registry = new DeviceRegistry({
    hub,
    logger,
    persistence: options.persistence,
    now,
  });
  const dispatcher = new CommandDispatcher({
    registry,
    hub,
    channel: options.channel,
    logger,
    config: {
      defaultDeadlineMs: config.defaultDeadlineMs,
      deadlines: config.deadlines,
      historyLimit: config.historyLimit,
    },
    now,
  });
  const reconciler = new StatusReconciler({ registry, logger });

  const detach = registry.onRemoved((deviceId) => {
    dispatcher.handleDeviceRemoved(deviceId);
  });

  let stopped = false;

  return {
    registry,
    dispatcher,
    reconciler,
    hub,

    async start() {
      const loaded = await registry.hydrate();
      logger.info({ devices: registry.size, loaded }, "Fleet engine started");
    },

    async stop() {
      if (stopped) return;
      stopped = true;
      detach();
      dispatcher.dispose();
      hub.close();
      await registry.flush();
      logger.info("Fleet engine stopped");
    },
  };
}
