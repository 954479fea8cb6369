/**
 * Topics Module - Public API
 */

export type { TopicBinding, TopicMapper } from "./schema.js";
export { Availability, DEFAULT_BASE_TOPIC } from "./schema.js";

export type { PayloadError, TopicError } from "./errors.js";
export { formatPayloadError, formatTopicError } from "./errors.js";

export {
  createTopicMapper,
  decodePayload,
  encodePayload,
} from "./transform.js";
