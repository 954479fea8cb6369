/**
 * MQTT Module - Service Layer
 *
 * MQTT client management. Connects to the broker and exposes the
 * publish/subscribe surface the bridge uses. Reconnection after the first
 * successful connect is left to MQTT.js.
 */
import mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import type { MqttError } from "./errors.js";
import { connectionFailed, publishFailed, subscribeFailed } from "./errors.js";
import type {
  LastWill,
  MessageHandler,
  MqttConnectionConfig,
  PubSubClient,
} from "./schema.js";

/** Granted QoS the broker returns for a refused subscription */
const SUBSCRIPTION_REFUSED = 128;

export type ConnectOptions = Readonly<{
  will?: LastWill;
}>;

export function brokerUrl(config: MqttConnectionConfig): string {
  return `mqtt://${config.host}:${config.port}`;
}

/**
 * Set up MQTT client event handlers.
 */
function setupClientHandlers(client: MqttClient, log: Logger): void {
  client.on("connect", () => {
    log.info("Reconnected to MQTT broker");
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });
}

/**
 * Connect to the broker.
 *
 * Fails if the first connection attempt fails; later drops are retried by
 * the client every five seconds and subscriptions are restored.
 */
export async function connectMqtt(
  config: MqttConnectionConfig,
  options: ConnectOptions,
  log: Logger,
): Promise<Result<PubSubClient, MqttError>> {
  const url = brokerUrl(config);

  log.info({ broker: url }, "Connecting to MQTT broker...");

  const clientOptions: IClientOptions = {
    username: config.username,
    password: config.password,
    reconnectPeriod: 5000, // Reconnect every 5 seconds
    connectTimeout: 10000, // 10 second connection timeout
  };
  if (options.will) {
    clientOptions.will = {
      topic: options.will.topic,
      payload: Buffer.from(options.will.payload),
      qos: 1,
      retain: options.will.retain,
    };
  }

  let client: MqttClient;
  try {
    client = await mqtt.connectAsync(url, clientOptions, false);
  } catch (error) {
    return err(connectionFailed(url, error));
  }

  log.info("Connected to MQTT broker");
  setupClientHandlers(client, log);

  const handlers = new Set<MessageHandler>();
  client.on("message", (topic, payload) => {
    for (const handler of handlers) {
      handler(topic, payload);
    }
  });

  return ok({
    // MQTT.js holds offline packets until a reconnect, so these fail fast instead
    publish: async (topic, payload, publishOptions) => {
      if (!client.connected) {
        return err(publishFailed(topic, "Not connected to broker"));
      }
      try {
        await client.publishAsync(topic, payload, {
          qos: 1,
          retain: publishOptions.retain,
        });
        log.debug({ topic, payload }, "Published");
        return ok(undefined);
      } catch (error) {
        return err(publishFailed(topic, error));
      }
    },

    subscribe: async (filter) => {
      try {
        const grants = await client.subscribeAsync(filter, { qos: 1 });
        if (grants.some((grant) => grant.qos === SUBSCRIPTION_REFUSED)) {
          return err(subscribeFailed(filter, "Broker refused the subscription"));
        }
        log.debug({ topic: filter }, "Subscribed to topic");
        return ok(undefined);
      } catch (error) {
        return err(subscribeFailed(filter, error));
      }
    },

    unsubscribe: async (filter) => {
      if (!client.connected) {
        return err(subscribeFailed(filter, "Not connected to broker"));
      }
      try {
        await client.unsubscribeAsync(filter);
        return ok(undefined);
      } catch (error) {
        return err(subscribeFailed(filter, error));
      }
    },

    onMessage: (handler) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },

    close: async () => {
      log.info("Disconnecting MQTT client...");
      handlers.clear();
      // Nothing queued offline can be delivered any more
      await client.endAsync(!client.connected);
    },
  });
}
