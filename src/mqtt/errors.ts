/**
 * MQTT Module - Error Types
 */

export type MqttError =
  | {
      readonly type: "CONNECTION_FAILED";
      readonly url: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "PUBLISH_FAILED";
      readonly topic: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "SUBSCRIBE_FAILED";
      readonly topic: string;
      readonly message: string;
      readonly cause?: Error;
    };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function connectionFailed(url: string, error: unknown): MqttError {
  const cause = toError(error);
  return { type: "CONNECTION_FAILED", url, message: cause.message, cause };
}

export function publishFailed(topic: string, error: unknown): MqttError {
  const cause = toError(error);
  return { type: "PUBLISH_FAILED", topic, message: cause.message, cause };
}

export function subscribeFailed(topic: string, error: unknown): MqttError {
  const cause = toError(error);
  return { type: "SUBSCRIBE_FAILED", topic, message: cause.message, cause };
}

/**
 * Format an MqttError for logging.
 */
export function formatMqttError(error: MqttError): string {
  switch (error.type) {
    case "CONNECTION_FAILED":
      return `Cannot connect to ${error.url}: ${error.message}`;
    case "PUBLISH_FAILED":
      return `Publish to ${error.topic} failed: ${error.message}`;
    case "SUBSCRIBE_FAILED":
      return `Subscription to ${error.topic} failed: ${error.message}`;
  }
}
