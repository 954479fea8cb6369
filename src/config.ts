/**
 * Typed configuration - command-line flags with environment fallbacks,
 * parsed with Zod at startup. Invalid configuration stops the bridge
 * before anything connects.
 *
 * The result is a plain object handed to each module's factory; nothing
 * reads configuration from module scope.
 */
import { Command, CommanderError } from "commander";
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

import type { BridgeConfig } from "./bridge/index.js";
import type { DeviceClientConfig } from "./device/index.js";
import type { LoggingOptions } from "./logger.js";
import { LOG_LEVELS } from "./logger.js";
import type { MqttConnectionConfig } from "./mqtt/index.js";
import {
  DEFAULT_DEVICE_ID,
  DEFAULT_DEVICE_PASSWORD,
  DEFAULT_DEVICE_PORT,
} from "./protocol/index.js";
import { DEFAULT_BASE_TOPIC } from "./topics/index.js";

// =============================================================================
// Errors
// =============================================================================

export type ConfigError =
  | {
      readonly type: "INVALID_CONFIG";
      readonly issues: ReadonlyArray<string>;
      readonly message: string;
    }
  | {
      /** commander finished the run itself: --help, --version or a usage error */
      readonly type: "CLI_EXIT";
      readonly exitCode: number;
      readonly message: string;
    };

export function formatConfigError(error: ConfigError): string {
  switch (error.type) {
    case "INVALID_CONFIG":
      return `${error.message}:\n  - ${error.issues.join("\n  - ")}`;
    case "CLI_EXIT":
      return error.message;
  }
}

// =============================================================================
// Schema
// =============================================================================

/**
 * Custom boolean parser for flag and environment values.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

const required = (name: string, flag: string) =>
  z
    .string({ required_error: `${name} (${flag}) is required` })
    .trim()
    .min(1, `${name} (${flag}) is required`);

const port = (defaultValue: number) =>
  z.coerce.number().int().min(1).max(65535).default(defaultValue);

const ConfigSchema = z.object({
  // ==========================================================================
  // Ventilation Unit
  // ==========================================================================
  VENTO_HOST: required("VENTO_HOST", "--vento-host").describe(
    "Host name or IP address of the unit",
  ),
  VENTO_PORT: port(DEFAULT_DEVICE_PORT).describe("UDP port of the unit"),
  VENTO_DEVICE_ID: z
    .string()
    .min(1)
    .max(255)
    .default(DEFAULT_DEVICE_ID)
    .describe("Device id; the default id reaches any unit"),
  VENTO_PASSWORD: z
    .string()
    .max(255)
    .default(DEFAULT_DEVICE_PASSWORD)
    .describe("Device password"),
  VENTO_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(2000)
    .describe("Reply timeout per attempt (ms)"),
  VENTO_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1)
    .max(10)
    .default(3)
    .describe("Attempts per transaction"),

  // ==========================================================================
  // MQTT Broker
  // ==========================================================================
  MQTT_HOST: required("MQTT_HOST", "--mqtt-host").describe("MQTT broker host"),
  MQTT_PORT: port(1883).describe("MQTT broker port"),
  MQTT_USER: z.string().optional().describe("MQTT user name"),
  MQTT_PASS: z.string().optional().describe("MQTT password"),
  MQTT_TOPIC: z
    .string()
    .default(DEFAULT_BASE_TOPIC)
    .describe("Base topic for every published and subscribed topic"),

  // ==========================================================================
  // Bridge
  // ==========================================================================
  POLL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30000)
    .describe("Status poll interval (ms)"),
  DEDUPE: envBoolean(true).describe("Skip status publishes that did not change"),
  REFRESH_AFTER_COMMAND: envBoolean(false).describe(
    "Poll immediately after an acknowledged command",
  ),
  PUBLISH_AVAILABILITY: envBoolean(true).describe(
    "Publish Online/TimeOut/Service Down on <base>/service",
  ),
  PUBLISH_AGGREGATE: envBoolean(false).describe(
    "Publish a JSON object of all readings on <base>/status",
  ),
  RETAIN: envBoolean(true).describe("Retain status publishes"),
  SHUTDOWN_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(2000)
    .describe("Longest wait per broker call during shutdown (ms)"),

  // ==========================================================================
  // Logging
  // ==========================================================================
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info").describe("Pino log level"),
  LOG_FILE: z.string().optional().describe("Write JSON logs to this file"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment; development logs through pino-pretty"),
});

type ParsedConfig = z.output<typeof ConfigSchema>;

export type AppConfig = Readonly<{
  device: DeviceClientConfig;
  mqtt: MqttConnectionConfig;
  topics: Readonly<{ base: string }>;
  bridge: BridgeConfig;
  logging: LoggingOptions;
}>;

function toAppConfig(parsed: ParsedConfig): AppConfig {
  return {
    device: {
      host: parsed.VENTO_HOST,
      port: parsed.VENTO_PORT,
      deviceId: parsed.VENTO_DEVICE_ID,
      password: parsed.VENTO_PASSWORD,
      timeoutMs: parsed.VENTO_TIMEOUT_MS,
      maxAttempts: parsed.VENTO_ATTEMPTS,
    },
    mqtt: {
      host: parsed.MQTT_HOST,
      port: parsed.MQTT_PORT,
      username: parsed.MQTT_USER,
      password: parsed.MQTT_PASS,
    },
    topics: { base: parsed.MQTT_TOPIC },
    bridge: {
      pollIntervalMs: parsed.POLL_INTERVAL_MS,
      deduplicate: parsed.DEDUPE,
      refreshAfterCommand: parsed.REFRESH_AFTER_COMMAND,
      publishAvailability: parsed.PUBLISH_AVAILABILITY,
      publishAggregate: parsed.PUBLISH_AGGREGATE,
      retain: parsed.RETAIN,
      shutdownTimeoutMs: parsed.SHUTDOWN_TIMEOUT_MS,
    },
    logging: {
      level: parsed.LOG_LEVEL,
      pretty: parsed.NODE_ENV === "development" && parsed.LOG_FILE === undefined,
      file: parsed.LOG_FILE,
    },
  };
}

// =============================================================================
// Command Line
// =============================================================================

function createProgram(): Command {
  return new Command()
    .name("vento-mqtt")
    .description("Bridge a Blauberg Vento ventilation unit to MQTT")
    .option("--vento-host <host>", "unit host name or IP address [VENTO_HOST]")
    .option("--vento-port <port>", "unit UDP port (default 4000) [VENTO_PORT]")
    .option("--device-id <id>", "unit device id [VENTO_DEVICE_ID]")
    .option("--device-password <password>", "unit password [VENTO_PASSWORD]")
    .option("--mqtt-host <host>", "MQTT broker host [MQTT_HOST]")
    .option("--mqtt-port <port>", "MQTT broker port (default 1883) [MQTT_PORT]")
    .option("--mqtt-user <user>", "MQTT user name [MQTT_USER]")
    .option("--mqtt-pass <password>", "MQTT password [MQTT_PASS]")
    .option("--mqtt-topic <base>", `base topic (default ${DEFAULT_BASE_TOPIC}) [MQTT_TOPIC]`)
    .option("--poll-interval <ms>", "status poll interval (default 30000) [POLL_INTERVAL_MS]")
    .option("--timeout <ms>", "reply timeout per attempt (default 2000) [VENTO_TIMEOUT_MS]")
    .option("--attempts <n>", "attempts per transaction (default 3) [VENTO_ATTEMPTS]")
    .option("--no-dedupe", "publish every reading on every poll [DEDUPE]")
    .option("--refresh-after-command", "poll right after a command [REFRESH_AFTER_COMMAND]")
    .option("--no-availability", "do not publish <base>/service [PUBLISH_AVAILABILITY]")
    .option("--aggregate", "publish all readings as JSON on <base>/status [PUBLISH_AGGREGATE]")
    .option("--no-retain", "publish status without the retain flag [RETAIN]")
    .option("--log <file>", "write JSON logs to a file [LOG_FILE]")
    .option("--debug", "log at debug level [LOG_LEVEL]")
    .exitOverride();
}

/**
 * Parse command-line arguments, falling back to environment variables.
 *
 * @param argv - Arguments after the executable and script path
 * @param env - Environment, usually process.env
 *
 * @example
 * const config = parseConfig(process.argv.slice(2), process.env);
 */
export function parseConfig(
  argv: ReadonlyArray<string>,
  env: NodeJS.ProcessEnv,
): Result<AppConfig, ConfigError> {
  const program = createProgram();

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return err({
        type: "CLI_EXIT",
        exitCode: error.exitCode,
        message: error.message,
      });
    }
    throw error;
  }

  const fromEnv = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === "" ? undefined : value;
  };

  const pick = (option: string, envName: string): string | undefined =>
    program.getOptionValueSource(option) === "cli"
      ? String(program.getOptionValue(option))
      : fromEnv(envName);

  // Values stay strings here; the schema coerces them
  const raw: Record<keyof ParsedConfig, string | undefined> = {
    VENTO_HOST: pick("ventoHost", "VENTO_HOST"),
    VENTO_PORT: pick("ventoPort", "VENTO_PORT"),
    VENTO_DEVICE_ID: pick("deviceId", "VENTO_DEVICE_ID"),
    VENTO_PASSWORD: pick("devicePassword", "VENTO_PASSWORD"),
    VENTO_TIMEOUT_MS: pick("timeout", "VENTO_TIMEOUT_MS"),
    VENTO_ATTEMPTS: pick("attempts", "VENTO_ATTEMPTS"),
    MQTT_HOST: pick("mqttHost", "MQTT_HOST"),
    MQTT_PORT: pick("mqttPort", "MQTT_PORT"),
    MQTT_USER: pick("mqttUser", "MQTT_USER"),
    MQTT_PASS: pick("mqttPass", "MQTT_PASS"),
    MQTT_TOPIC: pick("mqttTopic", "MQTT_TOPIC"),
    POLL_INTERVAL_MS: pick("pollInterval", "POLL_INTERVAL_MS"),
    DEDUPE: pick("dedupe", "DEDUPE"),
    REFRESH_AFTER_COMMAND: pick("refreshAfterCommand", "REFRESH_AFTER_COMMAND"),
    PUBLISH_AVAILABILITY: pick("availability", "PUBLISH_AVAILABILITY"),
    PUBLISH_AGGREGATE: pick("aggregate", "PUBLISH_AGGREGATE"),
    RETAIN: pick("retain", "RETAIN"),
    SHUTDOWN_TIMEOUT_MS: fromEnv("SHUTDOWN_TIMEOUT_MS"),
    LOG_FILE: pick("log", "LOG_FILE"),
    LOG_LEVEL:
      program.getOptionValueSource("debug") === "cli"
        ? "debug"
        : fromEnv("LOG_LEVEL"),
    NODE_ENV: fromEnv("NODE_ENV"),
  };

  const parsed = ConfigSchema.safeParse(raw);

  if (!parsed.success) {
    return err({
      type: "INVALID_CONFIG",
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
      message: "Invalid configuration",
    });
  }

  return ok(toAppConfig(parsed.data));
}
