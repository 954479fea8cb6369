/**
 * MQTT Module - Public API
 */

// Types
export type {
  LastWill,
  MessageHandler,
  MqttConnectionConfig,
  PublishOptions,
  PubSubClient,
} from "./schema.js";

export type { MqttError } from "./errors.js";
export { formatMqttError } from "./errors.js";

// Service functions
export { brokerUrl, connectMqtt } from "./service.js";
export type { ConnectOptions } from "./service.js";
