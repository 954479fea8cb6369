/**
 * Topics Module - Error Types
 */

export type TopicError =
  | {
      readonly type: "INVALID_BASE";
      readonly base: string;
      readonly message: string;
    }
  | {
      readonly type: "DUPLICATE_TOPIC";
      readonly topic: string;
      readonly message: string;
    };

export function invalidBase(base: string, message: string): TopicError {
  return { type: "INVALID_BASE", base, message };
}

export function duplicateTopic(topic: string): TopicError {
  return {
    type: "DUPLICATE_TOPIC",
    topic,
    message: `Topic ${topic} is bound to more than one parameter`,
  };
}

export function formatTopicError(error: TopicError): string {
  switch (error.type) {
    case "INVALID_BASE":
      return `Invalid base topic "${error.base}": ${error.message}`;
    case "DUPLICATE_TOPIC":
      return error.message;
  }
}

/**
 * An inbound command payload that does not fit its parameter.
 */
export type PayloadError = {
  readonly type: "INVALID_PAYLOAD";
  readonly parameter: string;
  readonly payload: string;
  readonly message: string;
};

export function invalidPayload(
  parameter: string,
  payload: string,
  message: string,
): PayloadError {
  return { type: "INVALID_PAYLOAD", parameter, payload, message };
}

export function formatPayloadError(error: PayloadError): string {
  return `Invalid payload "${error.payload}" for ${error.parameter}: ${error.message}`;
}
