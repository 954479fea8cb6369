#!/usr/bin/env node
/**
 * Vento MQTT Bridge - Application Entry Point
 *
 * Parses configuration, opens the UDP channel to the unit, connects to the
 * broker and runs the bridge until SIGINT or SIGTERM.
 */
import type { Logger } from "pino";

import { createBridge } from "./bridge/index.js";
import { formatConfigError, parseConfig } from "./config.js";
import {
  createDeviceClient,
  formatTransportError,
  openUdpTransport,
} from "./device/index.js";
import { createLogger, createRootLogger } from "./logger.js";
import { connectMqtt, formatMqttError } from "./mqtt/index.js";
import { Availability, createTopicMapper, formatTopicError } from "./topics/index.js";

function waitForSignal(log: Logger): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      log.info({ signal }, `${signal} received. Shutting down gracefully...`);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

function flush(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    logger.flush(() => resolve());
  });
}

async function main(): Promise<number> {
  const configResult = parseConfig(process.argv.slice(2), process.env);
  if (configResult.isErr()) {
    const error = configResult.error;
    // commander has already printed help and usage errors
    if (error.type === "INVALID_CONFIG") {
      console.error(formatConfigError(error));
    }
    return error.type === "CLI_EXIT" ? error.exitCode : 2;
  }
  const config = configResult.value;

  const root = createRootLogger(config.logging);
  const log = createLogger(root, "config");

  // ===========================================================================
  // STARTUP BANNER
  // ===========================================================================

  // Configuration summary (non-sensitive values only)
  log.info(
    {
      unit: `${config.device.host}:${config.device.port}`,
      deviceId: config.device.deviceId,
      broker: `${config.mqtt.host}:${config.mqtt.port}`,
      baseTopic: config.topics.base,
      pollIntervalMs: config.bridge.pollIntervalMs,
      timeoutMs: config.device.timeoutMs,
      attempts: config.device.maxAttempts,
    },
    "Vento MQTT bridge starting",
  );

  const mapperResult = createTopicMapper(config.topics.base);
  if (mapperResult.isErr()) {
    log.fatal(formatTopicError(mapperResult.error));
    await flush(root);
    return 1;
  }
  const mapper = mapperResult.value;

  const transportResult = await openUdpTransport(
    config.device,
    createLogger(root, "device"),
  );
  if (transportResult.isErr()) {
    log.fatal(formatTransportError(transportResult.error));
    await flush(root);
    return 1;
  }

  const device = createDeviceClient(config.device, {
    transport: transportResult.value,
    logger: createLogger(root, "device"),
  });

  const pubsubResult = await connectMqtt(
    config.mqtt,
    config.bridge.publishAvailability
      ? {
          will: {
            topic: mapper.availabilityTopic,
            payload: Availability.SERVICE_DOWN,
            retain: true,
          },
        }
      : {},
    createLogger(root, "mqtt"),
  );
  if (pubsubResult.isErr()) {
    log.fatal(formatMqttError(pubsubResult.error));
    await device.close();
    await flush(root);
    return 1;
  }
  const pubsub = pubsubResult.value;

  const bridge = createBridge(config.bridge, {
    device,
    pubsub,
    mapper,
    logger: createLogger(root, "bridge"),
  });

  const signal = waitForSignal(log);

  const started = await bridge.start();
  if (started.isErr()) {
    log.fatal(formatMqttError(started.error));
    await Promise.all([bridge.stop(), device.close()]);
    await pubsub.close();
    await flush(root);
    return 1;
  }

  await signal;

  // ===========================================================================
  // GRACEFUL SHUTDOWN
  // ===========================================================================

  // Closing the device abandons a transaction still waiting on the unit
  await Promise.all([bridge.stop(), device.close()]);
  await pubsub.close();

  log.info("Shutdown complete");
  await flush(root);
  return 0;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error("Fatal error during startup", error);
    process.exit(1);
  });
