/**
 * Notification Hub event types.
 *
 * Every state change the engine makes visible is published as a FleetEvent.
 * Events carry a hub-wide sequence number and the component that produced
 * them; ordering is guaranteed per source, not across sources.
 */

import type { Command } from "./command.js";
import type { Device, ObservableDeviceField } from "./device.js";

/** Component that produced an event */
export type FleetEventSource = "registry" | "dispatcher";

interface FleetEventBase {
  /** Hub-wide sequence number, assigned at publish time */
  seq: number;
  /** ISO-8601 publish time */
  at: string;
}

/** A device was registered */
export interface DeviceAddedEvent extends FleetEventBase {
  type: "device.added";
  source: "registry";
  device: Device;
}

/** One or more observable fields of a device changed */
export interface DeviceChangedEvent extends FleetEventBase {
  type: "device.changed";
  source: "registry";
  device: Device;
  changed: ObservableDeviceField[];
}

/** A device was removed from the registry */
export interface DeviceRemovedEvent extends FleetEventBase {
  type: "device.removed";
  source: "registry";
  device_id: string;
}

/** A command reached a terminal state */
export interface CommandResultEvent extends FleetEventBase {
  type: "command.result";
  source: "dispatcher";
  command: Command;
}

/**
 * Marker delivered to a subscriber whose buffer overflowed. `dropped` events
 * were discarded (oldest first); the subscriber should resync via the
 * device list.
 */
export interface SubscriberOverrunEvent {
  type: "subscriber.overrun";
  dropped: number;
  at: string;
}

/** Events producers publish (seq and at are assigned by the hub) */
export type FleetEvent =
  | DeviceAddedEvent
  | DeviceChangedEvent
  | DeviceRemovedEvent
  | CommandResultEvent;

/** Everything a subscriber can receive */
export type HubDelivery = FleetEvent | SubscriberOverrunEvent;

/** Distributes `Omit` over a union so each member keeps its own fields */
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A FleetEvent before the hub stamps it */
export type FleetEventInput = DistributiveOmit<FleetEvent, "seq" | "at">;
