/**
 * Configuration Tests
 */
import { describe, expect, it, vi } from "vitest";

import { formatConfigError, parseConfig } from "../config.js";

const REQUIRED = ["--vento-host", "192.0.2.10", "--mqtt-host", "broker.local"];

describe("parseConfig", () => {
  // ===========================================================================
  // Defaults
  // ===========================================================================

  it("fills every optional setting with its default", () => {
    const config = parseConfig(REQUIRED, {})._unsafeUnwrap();

    expect(config).toEqual({
      device: {
        host: "192.0.2.10",
        port: 4000,
        deviceId: "DEFAULT_DEVICEID",
        password: "1111",
        timeoutMs: 2000,
        maxAttempts: 3,
      },
      mqtt: {
        host: "broker.local",
        port: 1883,
        username: undefined,
        password: undefined,
      },
      topics: { base: "blauberg-vento" },
      bridge: {
        pollIntervalMs: 30000,
        deduplicate: true,
        refreshAfterCommand: false,
        publishAvailability: true,
        publishAggregate: false,
        retain: true,
        shutdownTimeoutMs: 2000,
      },
      logging: { level: "info", pretty: true, file: undefined },
    });
  });

  // ===========================================================================
  // Flags
  // ===========================================================================

  it("reads connection flags", () => {
    const config = parseConfig(
      [
        ...REQUIRED,
        "--vento-port",
        "4001",
        "--device-id",
        "0123456789ABCDEF",
        "--device-password",
        "test-secret",
        "--mqtt-port",
        "8883",
        "--mqtt-user",
        "bridge",
        "--mqtt-pass",
        "test-secret",
        "--mqtt-topic",
        "home/vento",
      ],
      {},
    )._unsafeUnwrap();

    expect(config.device).toMatchObject({
      port: 4001,
      deviceId: "0123456789ABCDEF",
      password: "test-secret",
    });
    expect(config.mqtt).toEqual({
      host: "broker.local",
      port: 8883,
      username: "bridge",
      password: "test-secret",
    });
    expect(config.topics.base).toBe("home/vento");
  });

  it("reads timing and behaviour flags", () => {
    const config = parseConfig(
      [
        ...REQUIRED,
        "--poll-interval",
        "10000",
        "--timeout",
        "500",
        "--attempts",
        "5",
        "--no-dedupe",
        "--refresh-after-command",
        "--aggregate",
        "--no-retain",
        "--no-availability",
      ],
      {},
    )._unsafeUnwrap();

    expect(config.device.timeoutMs).toBe(500);
    expect(config.device.maxAttempts).toBe(5);
    expect(config.bridge).toEqual({
      pollIntervalMs: 10000,
      deduplicate: false,
      refreshAfterCommand: true,
      publishAvailability: false,
      publishAggregate: true,
      retain: false,
      shutdownTimeoutMs: 2000,
    });
  });

  it("logs at debug level to a file without pretty printing", () => {
    const config = parseConfig(
      [...REQUIRED, "--debug", "--log", "/var/log/vento.log"],
      {},
    )._unsafeUnwrap();

    expect(config.logging).toEqual({
      level: "debug",
      pretty: false,
      file: "/var/log/vento.log",
    });
  });

  // ===========================================================================
  // Environment
  // ===========================================================================

  it("falls back to environment variables", () => {
    const config = parseConfig([], {
      VENTO_HOST: "vento.local",
      MQTT_HOST: "mqtt.local",
      MQTT_PORT: "1884",
      DEDUPE: "false",
      PUBLISH_AGGREGATE: "TRUE",
      LOG_LEVEL: "warn",
      NODE_ENV: "production",
      SHUTDOWN_TIMEOUT_MS: "500",
    })._unsafeUnwrap();

    expect(config.device.host).toBe("vento.local");
    expect(config.mqtt.port).toBe(1884);
    expect(config.bridge.deduplicate).toBe(false);
    expect(config.bridge.publishAggregate).toBe(true);
    expect(config.bridge.shutdownTimeoutMs).toBe(500);
    expect(config.logging).toEqual({ level: "warn", pretty: false, file: undefined });
  });

  it("prefers flags over environment variables", () => {
    const config = parseConfig([...REQUIRED, "--vento-port", "4001", "--debug"], {
      VENTO_HOST: "vento.local",
      VENTO_PORT: "5000",
      LOG_LEVEL: "error",
    })._unsafeUnwrap();

    expect(config.device.host).toBe("192.0.2.10");
    expect(config.device.port).toBe(4001);
    expect(config.logging.level).toBe("debug");
  });

  it("treats blank environment variables as unset", () => {
    const config = parseConfig(REQUIRED, { MQTT_PORT: "  ", MQTT_TOPIC: "" })._unsafeUnwrap();

    expect(config.mqtt.port).toBe(1883);
    expect(config.topics.base).toBe("blauberg-vento");
  });

  // ===========================================================================
  // Errors
  // ===========================================================================

  it("requires the unit and broker hosts", () => {
    const error = parseConfig([], { VENTO_HOST: " " })._unsafeUnwrapErr();

    expect(error.type).toBe("INVALID_CONFIG");
    if (error.type === "INVALID_CONFIG") {
      expect(error.issues).toEqual([
        "VENTO_HOST: VENTO_HOST (--vento-host) is required",
        "MQTT_HOST: MQTT_HOST (--mqtt-host) is required",
      ]);
    }
  });

  it("rejects ports that are not numbers or out of range", () => {
    const error = parseConfig(
      [...REQUIRED, "--mqtt-port", "abc", "--vento-port", "70000"],
      {},
    )._unsafeUnwrapErr();

    expect(error.type).toBe("INVALID_CONFIG");
    if (error.type === "INVALID_CONFIG") {
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^VENTO_PORT: /);
      expect(error.issues[1]).toMatch(/^MQTT_PORT: /);
    }
  });

  it("rejects an unknown log level", () => {
    const error = parseConfig(REQUIRED, { LOG_LEVEL: "verbose" })._unsafeUnwrapErr();

    expect(error.type).toBe("INVALID_CONFIG");
  });

  it("returns the exit code commander chose for usage errors", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const error = parseConfig([...REQUIRED, "--bogus"], {})._unsafeUnwrapErr();
    stderr.mockRestore();

    expect(error).toMatchObject({ type: "CLI_EXIT", exitCode: 1 });
  });

  it("returns exit code 0 after printing help", () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    const error = parseConfig(["--help"], {})._unsafeUnwrapErr();
    stdout.mockRestore();

    expect(error).toMatchObject({ type: "CLI_EXIT", exitCode: 0 });
  });
});

describe("formatConfigError", () => {
  it("lists each issue on its own line", () => {
    expect(
      formatConfigError({
        type: "INVALID_CONFIG",
        issues: ["MQTT_HOST: required", "MQTT_PORT: too big"],
        message: "Invalid configuration",
      }),
    ).toBe("Invalid configuration:\n  - MQTT_HOST: required\n  - MQTT_PORT: too big");
  });
});
