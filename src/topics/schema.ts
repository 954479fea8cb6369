/**
 * Topics Module - Schemas and Types
 *
 * MQTT naming for the parameter registry:
 *
 *   <base>/<name>/set     commands, writable parameters only
 *   <base>/<name>/state   status, every parameter
 *   <base>/service        availability
 *   <base>/status         aggregate JSON status
 */
import type { Parameter } from "../protocol/index.js";

export const DEFAULT_BASE_TOPIC = "blauberg-vento";

export const COMMAND_SUFFIX = "set";
export const STATUS_SUFFIX = "state";
export const AVAILABILITY_LEVEL = "service";
export const AGGREGATE_LEVEL = "status";

/**
 * Availability payloads published on `<base>/service`.
 */
export const Availability = {
  ONLINE: "Online",
  TIMEOUT: "TimeOut",
  SERVICE_DOWN: "Service Down",
} as const;

export type Availability = (typeof Availability)[keyof typeof Availability];

export type TopicBinding = Readonly<{
  parameter: Parameter;
  statusTopic: string;
  /** Null for read-only parameters */
  commandTopic: string | null;
}>;

export type TopicMapper = Readonly<{
  base: string;
  bindings: ReadonlyArray<TopicBinding>;
  /** Wildcard filter matching every command topic */
  commandSubscription: string;
  availabilityTopic: string;
  aggregateTopic: string;
  topicForCommand: (parameter: Parameter) => string | null;
  topicForStatus: (parameter: Parameter) => string;
  parameterForCommandTopic: (topic: string) => Parameter | null;
}>;
