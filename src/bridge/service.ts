/**
 * Bridge Module - Service Layer
 *
 * Drives the device from MQTT commands and publishes its state back.
 *
 * Command path: <base>/<name>/set -> decode payload -> setParameter ->
 * publish the acknowledged value on <base>/<name>/state.
 *
 * Poll path: query every pollIntervalMs, publish changed readings. The
 * next poll is scheduled when the previous one finishes, so cycles never
 * overlap.
 */
import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import type { DeviceClient } from "../device/index.js";
import { formatDeviceError } from "../device/index.js";
import { logOperationFailed } from "../logger.js";
import type { MqttError, PubSubClient } from "../mqtt/index.js";
import { formatMqttError } from "../mqtt/index.js";
import type { TopicMapper } from "../topics/index.js";
import {
  Availability,
  decodePayload,
  encodePayload,
  formatPayloadError,
} from "../topics/index.js";
import type { Bridge, BridgeConfig, BridgeState } from "./schema.js";
import { INITIAL_BRIDGE_STATE } from "./schema.js";
import {
  buildAggregatePayload,
  nextAvailability,
  rememberPublication,
  selectPublications,
} from "./transform.js";

export type BridgeDeps = Readonly<{
  device: DeviceClient;
  pubsub: PubSubClient;
  mapper: TopicMapper;
  logger: Logger;
}>;

export function createBridge(config: BridgeConfig, deps: BridgeDeps): Bridge {
  const { device, pubsub, mapper, logger: log } = deps;

  // ===========================================================================
  // State
  // ===========================================================================

  let state: BridgeState = INITIAL_BRIDGE_STATE;
  let pollTimer: ReturnType<typeof setTimeout> | null = null;
  let inFlightPoll: Promise<void> | null = null;
  let removeMessageHandler: (() => void) | null = null;
  const pendingCommands = new Set<Promise<void>>();

  // ===========================================================================
  // Publishing
  // ===========================================================================

  async function publishStatus(topic: string, payload: string): Promise<void> {
    const result = await pubsub.publish(topic, payload, { retain: config.retain });
    if (result.isErr()) {
      // Not remembered, so the next poll publishes it again
      log.warn({ topic }, formatMqttError(result.error));
      return;
    }
    state = {
      ...state,
      lastPublished: rememberPublication(state.lastPublished, { topic, payload }),
    };
  }

  async function announceAvailability(availability: Availability): Promise<void> {
    const result = await pubsub.publish(mapper.availabilityTopic, availability, {
      retain: true,
    });
    if (result.isErr()) {
      log.warn({ availability }, formatMqttError(result.error));
      return;
    }
    log.info({ availability }, "Availability changed");
    state = { ...state, availability };
  }

  async function updateAvailability(reachable: boolean): Promise<void> {
    if (!config.publishAvailability) return;
    const next = nextAvailability(state.availability, reachable);
    if (next !== null) {
      await announceAvailability(next);
    }
  }

  // ===========================================================================
  // Poll Path
  // ===========================================================================

  async function pollOnce(): Promise<void> {
    const result = await device.query();

    if (result.isErr()) {
      if (result.error.type === "CLIENT_CLOSED") return;
      log.warn({ error: result.error.type }, formatDeviceError(result.error));
      await updateAvailability(false);
      return;
    }

    await updateAvailability(true);

    const { readings } = result.value;
    const publications = selectPublications(
      readings,
      mapper,
      state.lastPublished,
      config.deduplicate,
    );
    for (const { topic, payload } of publications) {
      await publishStatus(topic, payload);
    }
    log.debug(
      { readings: readings.length, published: publications.length },
      "Poll complete",
    );

    if (config.publishAggregate) {
      const aggregate = buildAggregatePayload(readings);
      if (aggregate !== state.lastAggregate) {
        const published = await pubsub.publish(mapper.aggregateTopic, aggregate, {
          retain: config.retain,
        });
        if (published.isOk()) {
          state = { ...state, lastAggregate: aggregate };
        } else {
          log.warn(formatMqttError(published.error));
        }
      }
    }
  }

  async function runCycle(): Promise<void> {
    const cycle = pollOnce().catch((error: unknown) => {
      logOperationFailed(log, "poll", error);
    });
    inFlightPoll = cycle;
    await cycle;
    inFlightPoll = null;
  }

  function scheduleNextPoll(): void {
    if (!state.running) return;
    pollTimer = setTimeout(() => {
      pollTimer = null;
      void runCycle().then(scheduleNextPoll);
    }, config.pollIntervalMs);
  }

  // ===========================================================================
  // Command Path
  // ===========================================================================

  async function handleMessage(
    topic: string,
    payload: Buffer | string,
  ): Promise<void> {
    const parameter = mapper.parameterForCommandTopic(topic);
    if (parameter === null) {
      log.debug({ topic }, "Ignoring message on unbound topic");
      return;
    }

    const value = decodePayload(parameter, payload);
    if (value.isErr()) {
      log.warn({ topic }, formatPayloadError(value.error));
      return;
    }

    log.info({ topic, value: value.value }, "Command received");

    const acknowledged = await device.setParameter(parameter, value.value);
    if (acknowledged.isErr()) {
      log.warn(
        { topic, error: acknowledged.error.type },
        formatDeviceError(acknowledged.error),
      );
      return;
    }

    // Always published, even when unchanged: it confirms the command
    await publishStatus(
      mapper.topicForStatus(parameter),
      encodePayload(parameter, acknowledged.value),
    );

    if (config.refreshAfterCommand) {
      await pollOnce();
    }
  }

  function trackCommand(topic: string, payload: Buffer): void {
    const command = handleMessage(topic, payload).catch((error: unknown) => {
      logOperationFailed(log, "command", error, { topic });
    });
    pendingCommands.add(command);
    void command.finally(() => {
      pendingCommands.delete(command);
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /** Resolves with the task's value, or undefined once shutdownTimeoutMs passes */
  function withinShutdownDeadline<T>(
    task: Promise<T>,
    waitingFor: string,
  ): Promise<T | undefined> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => {
        log.warn(
          { waitingFor, timeoutMs: config.shutdownTimeoutMs },
          "Stopped waiting during shutdown",
        );
        resolve(undefined);
      }, config.shutdownTimeoutMs);
    });
    return Promise.race([task, deadline]).finally(() => {
      clearTimeout(timer);
    });
  }

  async function start(): Promise<Result<void, MqttError>> {
    if (state.running) return ok(undefined);
    state = { ...state, running: true };

    removeMessageHandler = pubsub.onMessage(trackCommand);
    const subscribed = await pubsub.subscribe(mapper.commandSubscription);
    if (subscribed.isErr()) {
      removeMessageHandler();
      removeMessageHandler = null;
      state = { ...state, running: false };
      return err(subscribed.error);
    }

    log.info(
      { subscription: mapper.commandSubscription, pollIntervalMs: config.pollIntervalMs },
      "Bridge started",
    );

    await runCycle();
    scheduleNextPoll();
    return ok(undefined);
  }

  async function stop(): Promise<void> {
    if (!state.running) return;
    state = { ...state, running: false };

    if (pollTimer) {
      clearTimeout(pollTimer);
      pollTimer = null;
    }
    removeMessageHandler?.();
    removeMessageHandler = null;

    const unsubscribed = await withinShutdownDeadline(
      pubsub.unsubscribe(mapper.commandSubscription),
      "unsubscribe",
    );
    if (unsubscribed !== undefined && unsubscribed.isErr()) {
      log.warn(formatMqttError(unsubscribed.error));
    }

    await withinShutdownDeadline(
      Promise.all([inFlightPoll, ...pendingCommands]),
      "in-flight work",
    );

    // The broker's last will covers a Service Down that cannot be sent
    if (config.publishAvailability) {
      await withinShutdownDeadline(
        announceAvailability(Availability.SERVICE_DOWN),
        "availability",
      );
    }
    log.info("Bridge stopped");
  }

  return {
    start,
    stop,
    pollOnce,
    handleMessage,
    getState: () => state,
  };
}
