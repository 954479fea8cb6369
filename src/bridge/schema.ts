/**
 * Bridge Module - Schemas and Types
 */
import type { Result } from "neverthrow";

import type { MqttError } from "../mqtt/index.js";
import type { Availability } from "../topics/index.js";

export type BridgeConfig = Readonly<{
  pollIntervalMs: number;
  /** Skip status publishes whose payload did not change */
  deduplicate: boolean;
  /** Poll right after an acknowledged command */
  refreshAfterCommand: boolean;
  publishAvailability: boolean;
  publishAggregate: boolean;
  /** Retain flag for status publishes */
  retain: boolean;
  /** Longest stop() waits on each broker call or in-flight cycle */
  shutdownTimeoutMs: number;
}>;

export type Publication = Readonly<{
  topic: string;
  payload: string;
}>;

export type BridgeState = Readonly<{
  /** Last payload published per status topic */
  lastPublished: ReadonlyMap<string, string>;
  availability: Availability | null;
  lastAggregate: string | null;
  running: boolean;
}>;

export const INITIAL_BRIDGE_STATE: BridgeState = {
  lastPublished: new Map(),
  availability: null,
  lastAggregate: null,
  running: false,
};

export type Bridge = Readonly<{
  /** Subscribes to command topics, polls once, then keeps polling */
  start: () => Promise<Result<void, MqttError>>;
  /** Stops polling and waits for in-flight work */
  stop: () => Promise<void>;
  pollOnce: () => Promise<void>;
  handleMessage: (topic: string, payload: Buffer | string) => Promise<void>;
  getState: () => BridgeState;
}>;
