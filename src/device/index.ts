/**
 * Device Module - Public API
 */

// Types
export type {
  DatagramListener,
  DatagramTransport,
  DeviceAddress,
  DeviceClient,
  DeviceClientConfig,
  DeviceSnapshot,
} from "./schema.js";

export type { DeviceError, TransportError } from "./errors.js";
export { formatDeviceError, formatTransportError } from "./errors.js";

// Service
export { createDeviceClient } from "./service.js";
export type { DeviceClientDeps } from "./service.js";
export { openUdpTransport } from "./transport.js";
export { Mutex } from "./mutex.js";
