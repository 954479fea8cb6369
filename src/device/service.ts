/**
 * Device Module - Service Layer
 *
 * Request/response transactions with one unit over an unreliable datagram
 * channel. One transaction is in flight at a time; each attempt waits
 * `timeoutMs` for a matching reply and the transaction gives up after
 * `maxAttempts`.
 */
import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import { logOperationComplete, logOperationStart } from "../logger.js";
import type { Frame, FrameEntry, Parameter, ParameterValue } from "../protocol/index.js";
import {
  FunctionCode,
  PARAMETERS,
  decodeResponse,
  decodeValue,
  encodeCommand,
  formatDecodeError,
  interpretEntries,
} from "../protocol/index.js";
import type { DeviceError } from "./errors.js";
import {
  clientClosed,
  deviceUnreachable,
  formatDeviceError,
  fromEncodingError,
  invalidResponse,
  unsupportedParameter,
} from "./errors.js";
import { Mutex } from "./mutex.js";
import type {
  DatagramTransport,
  DeviceClient,
  DeviceClientConfig,
  DeviceSnapshot,
} from "./schema.js";

export type DeviceClientDeps = Readonly<{
  transport: DatagramTransport;
  logger: Logger;
}>;

/**
 * Outcome of one send-and-wait attempt.
 */
type Attempt<T> =
  | { readonly kind: "matched"; readonly value: T }
  | { readonly kind: "timeout" }
  | { readonly kind: "invalid"; readonly reason: string }
  | { readonly kind: "send-failed"; readonly reason: string }
  | { readonly kind: "closed" };

/** Picks the reply to the pending request, or undefined to keep waiting */
type ReplyMatcher<T> = (frame: Frame) => T | undefined;

const QUERY_IDS = new Set(PARAMETERS.map((parameter) => parameter.id));

/**
 * A read-all reply lists every requested parameter, as a value or as
 * unsupported. Anything shorter is a stray write acknowledgement.
 */
function answersQuery(frame: Frame): boolean {
  const answered = new Set(
    frame.entries
      .filter((entry) => entry.kind !== "request")
      .map((entry) => entry.parameterId),
  );
  for (const id of QUERY_IDS) {
    if (!answered.has(id)) return false;
  }
  return true;
}

/**
 * Create a client for one unit.
 *
 * The client owns the transport and closes it on `close()`.
 *
 * @example
 * const transport = await openUdpTransport({ host, port }, log);
 * const device = createDeviceClient(config, { transport: transport.value, logger: log });
 * const snapshot = await device.query();
 */
export function createDeviceClient(
  config: DeviceClientConfig,
  deps: DeviceClientDeps,
): DeviceClient {
  const { transport, logger: log } = deps;
  const mutex = new Mutex();
  const shutdown = new AbortController();
  let closed = false;

  // ===========================================================================
  // Transactions
  // ===========================================================================

  function attemptExchange<T>(
    request: Uint8Array,
    match: ReplyMatcher<T>,
  ): Promise<Attempt<T>> {
    return new Promise((resolve) => {
      let settled = false;

      const finish = (attempt: Attempt<T>) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        unsubscribe();
        shutdown.signal.removeEventListener("abort", onAbort);
        resolve(attempt);
      };

      const onAbort = () => {
        finish({ kind: "closed" });
      };

      const timer = setTimeout(() => {
        finish({ kind: "timeout" });
      }, config.timeoutMs);

      const unsubscribe = transport.onMessage((datagram) => {
        const decoded = decodeResponse(datagram, { deviceId: config.deviceId });
        if (decoded.isErr()) {
          const reason = formatDecodeError(decoded.error);
          log.debug({ reason }, "Discarding undecodable reply");
          finish({ kind: "invalid", reason });
          return;
        }

        const value = match(decoded.value);
        if (value === undefined) {
          log.debug(
            { entries: decoded.value.entries.length },
            "Ignoring reply to another request",
          );
          return;
        }

        finish({ kind: "matched", value });
      });

      shutdown.signal.addEventListener("abort", onAbort);

      void transport.send(request).catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        finish({ kind: "send-failed", reason });
      });
    });
  }

  function transact<T>(
    operation: string,
    request: Uint8Array,
    match: ReplyMatcher<T>,
  ): Promise<Result<T, DeviceError>> {
    return mutex.runExclusive(async (): Promise<Result<T, DeviceError>> => {
      let lastReason = "no attempt made";

      for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
        if (shutdown.signal.aborted) {
          return err(clientClosed());
        }

        const outcome = await attemptExchange(request, match);
        switch (outcome.kind) {
          case "matched":
            return ok(outcome.value);
          case "closed":
            return err(clientClosed());
          case "timeout":
            lastReason = `no reply within ${config.timeoutMs}ms`;
            break;
          case "invalid":
          case "send-failed":
            lastReason = outcome.reason;
            break;
        }

        log.debug(
          { operation, attempt, maxAttempts: config.maxAttempts, reason: lastReason },
          "Attempt failed",
        );
      }

      return err(deviceUnreachable(operation, config.maxAttempts, lastReason));
    });
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  async function query(): Promise<Result<DeviceSnapshot, DeviceError>> {
    if (closed) return err(clientClosed());

    const request = encodeCommand({
      deviceId: config.deviceId,
      password: config.password,
      functionCode: FunctionCode.READ,
    });
    if (request.isErr()) {
      return err(fromEncodingError(request.error));
    }

    const result = await transact("query", request.value, (frame) =>
      answersQuery(frame) ? frame : undefined,
    );

    return result.map((frame): DeviceSnapshot => {
      const { readings, unsupported, rejected } = interpretEntries(frame.entries);
      for (const entry of rejected) {
        log.warn(
          {
            parameter: entry.parameter.name,
            raw: Buffer.from(entry.raw).toString("hex"),
          },
          "Unit reported a value outside the parameter's range",
        );
      }
      log.debug(
        { deviceId: frame.deviceId, readings: readings.length },
        "Query answered",
      );
      return { deviceId: frame.deviceId, readings, unsupported, rejected };
    });
  }

  async function setParameter(
    parameter: Parameter,
    value: ParameterValue,
  ): Promise<Result<ParameterValue, DeviceError>> {
    if (closed) return err(clientClosed());

    const request = encodeCommand({
      deviceId: config.deviceId,
      password: config.password,
      functionCode: FunctionCode.WRITE_WITH_RESPONSE,
      parameter,
      value,
    });
    if (request.isErr()) {
      return err(fromEncodingError(request.error));
    }

    const operation = `set ${parameter.name}`;
    const startTime = Date.now();
    logOperationStart(log, operation, { value });

    const result = await transact(
      operation,
      request.value,
      // A late read-all reply also carries the parameter, with the old value
      (frame): FrameEntry | undefined =>
        answersQuery(frame)
          ? undefined
          : frame.entries.find(
              (entry) =>
                entry.parameterId === parameter.id && entry.kind !== "request",
            ),
    );

    const acknowledged = result.andThen(
      (entry): Result<ParameterValue, DeviceError> => {
        switch (entry.kind) {
          case "unsupported":
            return err(unsupportedParameter(parameter.name));
          case "value": {
            const reported = decodeValue(parameter, entry.value);
            if (reported === null) {
              return err(
                invalidResponse(
                  parameter.name,
                  `unit acknowledged with 0x${Buffer.from(entry.value).toString("hex")}`,
                ),
              );
            }
            return ok(reported);
          }
          case "request":
            return err(invalidResponse(parameter.name, "unit echoed the request"));
        }
      },
    );

    if (acknowledged.isOk()) {
      logOperationComplete(log, operation, startTime, {
        value: acknowledged.value,
      });
    } else {
      log.warn(
        { operation, error: acknowledged.error.type },
        formatDeviceError(acknowledged.error),
      );
    }

    return acknowledged;
  }

  async function close(): Promise<void> {
    if (closed) return;
    closed = true;
    shutdown.abort();
    // Let the in-flight transaction observe the abort before the socket goes
    await mutex.runExclusive(async () => undefined);
    await transport.close();
    log.info("Device client closed");
  }

  return { query, setParameter, close };
}
