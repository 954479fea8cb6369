/**
 * MQTT Module - Schemas and Types
 *
 * The slice of an MQTT client the bridge depends on.
 */
import type { Result } from "neverthrow";

import type { MqttError } from "./errors.js";

export type MqttConnectionConfig = Readonly<{
  host: string;
  port: number;
  username: string | undefined;
  password: string | undefined;
}>;

/**
 * Message the broker publishes for us if the connection drops.
 */
export type LastWill = Readonly<{
  topic: string;
  payload: string;
  retain: boolean;
}>;

export type PublishOptions = Readonly<{
  retain: boolean;
}>;

export type MessageHandler = (topic: string, payload: Buffer) => void;

export type PubSubClient = Readonly<{
  publish: (
    topic: string,
    payload: string,
    options: PublishOptions,
  ) => Promise<Result<void, MqttError>>;
  subscribe: (filter: string) => Promise<Result<void, MqttError>>;
  unsubscribe: (filter: string) => Promise<Result<void, MqttError>>;
  /** Returns a function that removes the handler */
  onMessage: (handler: MessageHandler) => () => void;
  close: () => Promise<void>;
}>;
