/**
 * Device Module - Schemas and Types
 *
 * Shapes for talking to one ventilation unit over UDP.
 */
import type { Result } from "neverthrow";

import type {
  Parameter,
  ParameterReading,
  ParameterValue,
  RejectedEntry,
} from "../protocol/index.js";
import type { DeviceError } from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export type DeviceAddress = Readonly<{
  host: string;
  port: number;
}>;

export type DeviceClientConfig = DeviceAddress &
  Readonly<{
    deviceId: string;
    password: string;
    /** How long one attempt waits for a reply */
    timeoutMs: number;
    /** Attempts per transaction before the unit counts as unreachable */
    maxAttempts: number;
  }>;

// =============================================================================
// Transport
// =============================================================================

export type DatagramListener = (datagram: Uint8Array) => void;

/**
 * A datagram channel to one peer. Only datagrams from that peer reach the
 * listeners.
 */
export type DatagramTransport = Readonly<{
  send: (datagram: Uint8Array) => Promise<void>;
  /** Returns a function that removes the listener */
  onMessage: (listener: DatagramListener) => () => void;
  close: () => Promise<void>;
}>;

// =============================================================================
// Client
// =============================================================================

/**
 * One read-all answer from the unit.
 */
export type DeviceSnapshot = Readonly<{
  /** Id the unit reported, which differs from the configured one when that is the default id */
  deviceId: string;
  readings: ReadonlyArray<ParameterReading>;
  unsupported: ReadonlyArray<Parameter>;
  rejected: ReadonlyArray<RejectedEntry>;
}>;

export type DeviceClient = Readonly<{
  query: () => Promise<Result<DeviceSnapshot, DeviceError>>;
  /** Resolves with the value the unit acknowledged */
  setParameter: (
    parameter: Parameter,
    value: ParameterValue,
  ) => Promise<Result<ParameterValue, DeviceError>>;
  close: () => Promise<void>;
}>;
