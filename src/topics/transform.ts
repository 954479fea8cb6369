/**
 * Topics Module - Pure Transformations
 *
 * Topic naming and payload text conversion. No side effects.
 */
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

import type {
  EnumParameter,
  IntegerParameter,
  Parameter,
  ParameterValue,
} from "../protocol/index.js";
import { PARAMETERS, isWritable } from "../protocol/index.js";
import type { PayloadError, TopicError } from "./errors.js";
import { duplicateTopic, invalidBase, invalidPayload } from "./errors.js";
import type { TopicBinding, TopicMapper } from "./schema.js";
import {
  AGGREGATE_LEVEL,
  AVAILABILITY_LEVEL,
  COMMAND_SUFFIX,
  STATUS_SUFFIX,
} from "./schema.js";

// =============================================================================
// Topic Mapper
// =============================================================================

function validateBase(base: string): Result<string, TopicError> {
  if (base.length === 0) {
    return err(invalidBase(base, "must not be empty"));
  }
  if (base.includes("+") || base.includes("#")) {
    return err(invalidBase(base, "must not contain wildcards"));
  }
  if (base.endsWith("/")) {
    return err(invalidBase(base, "must not end with a slash"));
  }
  return ok(base);
}

/**
 * Build the topic bindings for a parameter registry.
 *
 * Fails when the base is not a usable topic prefix or when two parameters
 * would share a topic.
 *
 * @example
 * const mapper = createTopicMapper("blauberg-vento");
 * mapper.topicForCommand(fanSpeed); // "blauberg-vento/fan-speed/set"
 */
export function createTopicMapper(
  base: string,
  parameters: ReadonlyArray<Parameter> = PARAMETERS,
): Result<TopicMapper, TopicError> {
  const validated = validateBase(base);
  if (validated.isErr()) return err(validated.error);

  const topicForStatus = (parameter: Parameter): string =>
    `${base}/${parameter.name}/${STATUS_SUFFIX}`;

  const topicForCommand = (parameter: Parameter): string | null =>
    isWritable(parameter) ? `${base}/${parameter.name}/${COMMAND_SUFFIX}` : null;

  const availabilityTopic = `${base}/${AVAILABILITY_LEVEL}`;
  const aggregateTopic = `${base}/${AGGREGATE_LEVEL}`;

  const taken = new Set<string>([availabilityTopic, aggregateTopic]);
  const byCommandTopic = new Map<string, Parameter>();
  const bindings: TopicBinding[] = [];

  for (const parameter of parameters) {
    const statusTopic = topicForStatus(parameter);
    const commandTopic = topicForCommand(parameter);

    for (const topic of [statusTopic, commandTopic]) {
      if (topic === null) continue;
      if (taken.has(topic)) return err(duplicateTopic(topic));
      taken.add(topic);
    }

    if (commandTopic !== null) {
      byCommandTopic.set(commandTopic, parameter);
    }
    bindings.push({ parameter, statusTopic, commandTopic });
  }

  return ok({
    base,
    bindings,
    commandSubscription: `${base}/+/${COMMAND_SUFFIX}`,
    availabilityTopic,
    aggregateTopic,
    topicForCommand,
    topicForStatus,
    parameterForCommandTopic: (topic) => byCommandTopic.get(topic) ?? null,
  });
}

// =============================================================================
// Payloads
// =============================================================================

const BooleanPayloadSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(
    z.enum(["on", "off", "1", "0", "true", "false"], {
      errorMap: () => ({ message: "expected ON or OFF" }),
    }),
  )
  .transform((word) => word === "on" || word === "1" || word === "true");

function integerPayloadSchema(parameter: IntegerParameter) {
  return z
    .string()
    .trim()
    .regex(/^-?\d+$/, "expected a decimal integer")
    .transform(Number)
    .pipe(
      z
        .number()
        .int()
        .min(parameter.min, `must be at least ${parameter.min}`)
        .max(parameter.max, `must be at most ${parameter.max}`),
    );
}

function enumPayloadSchema(parameter: EnumParameter) {
  const labels = parameter.options.map((option) => option.label).join(", ");

  return z
    .string()
    .trim()
    .transform((text, ctx) => {
      const lowered = text.toLowerCase();
      const option =
        parameter.options.find((o) => o.label.toLowerCase() === lowered) ??
        (/^\d+$/.test(text)
          ? parameter.options.find((o) => o.code === Number(text))
          : undefined);

      if (option === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected one of ${labels}`,
        });
        return z.NEVER;
      }
      return option.code;
    });
}

function payloadSchema(parameter: Parameter): z.ZodType<ParameterValue, z.ZodTypeDef, string> {
  switch (parameter.type) {
    case "boolean":
      return BooleanPayloadSchema;
    case "integer":
      return integerPayloadSchema(parameter);
    case "enum":
      return enumPayloadSchema(parameter);
  }
}

/**
 * Parse an inbound command payload for a parameter.
 *
 * Booleans take ON/OFF, 1/0 or true/false in any case; integers decimal
 * text within range; enums a label in any case or the numeric code.
 */
export function decodePayload(
  parameter: Parameter,
  payload: string | Uint8Array,
): Result<ParameterValue, PayloadError> {
  const text =
    typeof payload === "string" ? payload : Buffer.from(payload).toString("utf8");

  const parsed = payloadSchema(parameter).safeParse(text);
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? "invalid payload";
    return err(invalidPayload(parameter.name, text, message));
  }
  return ok(parsed.data);
}

/**
 * Render a value as the text published on its status topic.
 */
export function encodePayload(parameter: Parameter, value: ParameterValue): string {
  switch (parameter.type) {
    case "boolean":
      return value === true ? "ON" : "OFF";
    case "integer":
      return String(value);
    case "enum": {
      const option = parameter.options.find((o) => o.code === value);
      return option === undefined ? String(value) : option.label;
    }
  }
}
