/**
 * Device Module - Service Tests
 *
 * Transactions against an in-process fake unit.
 */
import { pino } from "pino";
import { describe, expect, it } from "vitest";

import type { FrameEntry, Parameter } from "../../protocol/index.js";
import {
  DEFAULT_DEVICE_ID,
  PARAMETERS,
  getParameterByName,
} from "../../protocol/index.js";
import type { DeviceClientConfig } from "../schema.js";
import { createDeviceClient } from "../service.js";
import { FakeDevice, UNIT_ID } from "./fakeDevice.js";

const logger = pino({ level: "silent" });

const BASE_CONFIG: DeviceClientConfig = {
  host: "127.0.0.1",
  port: 4000,
  deviceId: DEFAULT_DEVICE_ID,
  password: "1111",
  timeoutMs: 30,
  maxAttempts: 3,
};

function setup(overrides: Partial<DeviceClientConfig> = {}) {
  const device = new FakeDevice();
  const client = createDeviceClient(
    { ...BASE_CONFIG, ...overrides },
    { transport: device, logger },
  );
  return { device, client };
}

function param(name: string): Parameter {
  const parameter = getParameterByName(name);
  if (parameter === undefined) {
    throw new Error(`Unknown parameter ${name}`);
  }
  return parameter;
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// =============================================================================
// query
// =============================================================================

describe("query", () => {
  it("reads every parameter and interprets the reply", async () => {
    const { device, client } = setup();
    device.values.set(0x01, Uint8Array.of(1));
    device.values.set(0x02, Uint8Array.of(2));
    device.values.set(0x4a, Uint8Array.of(0xb0, 0x04));

    const result = await client.query();

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.deviceId).toBe(UNIT_ID);
      expect(result.value.readings).toEqual([
        { parameter: param("power"), value: true },
        { parameter: param("fan-speed"), value: 2 },
        { parameter: param("fan1-speed"), value: 1200 },
      ]);
      expect(result.value.unsupported).toHaveLength(PARAMETERS.length - 3);
      expect(result.value.rejected).toEqual([]);
    }
    expect(device.requests).toHaveLength(1);
    expect(device.requests[0]?.entries).toHaveLength(PARAMETERS.length);
  });

  it("reports out-of-range values as rejected", async () => {
    const { device, client } = setup();
    device.values.set(0x25, Uint8Array.of(150));

    const result = await client.query();

    expect(result._unsafeUnwrap().rejected).toEqual([
      { parameter: param("humidity"), raw: Uint8Array.of(150) },
    ]);
  });

  it("retries after lost datagrams", async () => {
    const { device, client } = setup();
    device.dropNext(2);

    const result = await client.query();

    expect(result.isOk()).toBe(true);
    expect(device.requests).toHaveLength(3);
  });

  it("gives up after maxAttempts", async () => {
    const { device, client } = setup();
    device.dropNext(3);

    const result = await client.query();

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "DEVICE_UNREACHABLE",
      operation: "query",
      attempts: 3,
      message: "No valid reply after 3 attempts (last: no reply within 30ms)",
    });
    expect(device.requests).toHaveLength(3);
  });

  it("starts a new attempt after an undecodable reply", async () => {
    const { device, client } = setup();
    device.prependToNextReply(Uint8Array.of(1, 2, 3));

    const result = await client.query();

    expect(result.isOk()).toBe(true);
    expect(device.requests).toHaveLength(2);
  });

  it("ignores a stray write acknowledgement", async () => {
    const { device, client } = setup();
    device.prependToNextReply(
      device.response([
        { kind: "value", parameterId: 0x01, value: Uint8Array.of(1) },
      ]),
    );

    const result = await client.query();

    expect(result.isOk()).toBe(true);
    expect(device.requests).toHaveLength(1);
  });

  it("treats replies from another unit as failed attempts", async () => {
    const { device, client } = setup({ deviceId: "FEDCBA9876543210" });

    const result = await client.query();

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "DEVICE_UNREACHABLE",
      message:
        "No valid reply after 3 attempts (last: Frame from device 0123456789ABCDEF, expected FEDCBA9876543210)",
    });
    expect(device.requests).toHaveLength(3);
  });

  it("reports send failures as unreachable", async () => {
    const { device, client } = setup();
    device.sendError = new Error("EHOSTUNREACH");

    const result = await client.query();

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "DEVICE_UNREACHABLE",
      message: "No valid reply after 3 attempts (last: EHOSTUNREACH)",
    });
  });
});

// =============================================================================
// setParameter
// =============================================================================

describe("setParameter", () => {
  it("writes with response and returns the acknowledged value", async () => {
    const { device, client } = setup();

    const result = await client.setParameter(param("fan-speed"), 3);

    expect(result._unsafeUnwrap()).toBe(3);
    expect(device.requests).toEqual([
      {
        deviceId: DEFAULT_DEVICE_ID,
        password: "1111",
        functionCode: 3,
        entries: [
          { kind: "value", parameterId: 0x02, value: Uint8Array.of(3) },
        ],
      },
    ]);
    expect(device.values.get(0x02)).toEqual(Uint8Array.of(3));
  });

  it("refuses invalid values without sending", async () => {
    const { device, client } = setup();

    const result = await client.setParameter(param("humidity-threshold"), 90);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "INVALID_VALUE",
      parameter: "humidity-threshold",
    });
    expect(device.requests).toHaveLength(0);
  });

  it("refuses read-only parameters", async () => {
    const { client } = setup();

    const result = await client.setParameter(param("humidity"), 50);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_VALUE",
      parameter: "humidity",
      message: "Parameter humidity is read-only",
    });
  });

  it("reports parameters the unit does not support", async () => {
    const { device, client } = setup();
    device.unsupported.add(0x44);

    const result = await client.setParameter(param("manual-speed"), 100);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "UNSUPPORTED_PARAMETER",
      parameter: "manual-speed",
    });
  });

  it("waits past replies that do not carry the written parameter", async () => {
    const { device, client } = setup();
    device.prependToNextReply(
      device.response([
        { kind: "value", parameterId: 0x02, value: Uint8Array.of(1) },
      ]),
    );

    const result = await client.setParameter(param("power"), true);

    expect(result._unsafeUnwrap()).toBe(true);
    expect(device.requests).toHaveLength(1);
  });

  it("does not take a late read-all reply for the acknowledgement", async () => {
    const { device, client } = setup();
    const staleQueryReply = device.response(
      PARAMETERS.map((parameter): FrameEntry =>
        parameter.id === 0x01
          ? { kind: "value", parameterId: 0x01, value: Uint8Array.of(0) }
          : { kind: "unsupported", parameterId: parameter.id },
      ),
    );
    device.prependToNextReply(staleQueryReply);

    const result = await client.setParameter(param("power"), true);

    expect(result._unsafeUnwrap()).toBe(true);
    expect(device.values.get(0x01)).toEqual(Uint8Array.of(1));
    expect(device.requests).toHaveLength(1);
  });

  it("retries a lost acknowledgement", async () => {
    const { device, client } = setup();
    device.dropNext(1);

    const result = await client.setParameter(param("boost-delay"), 15);

    expect(result._unsafeUnwrap()).toBe(15);
    expect(device.requests).toHaveLength(2);
  });

  it("succeeds when only the last attempt is answered", async () => {
    const { device, client } = setup();
    device.dropNext(2);

    const result = await client.setParameter(param("boost-delay"), 25);

    expect(result._unsafeUnwrap()).toBe(25);
    expect(device.requests).toHaveLength(3);
  });

  it("gives up on a write once every attempt is lost", async () => {
    const { device, client } = setup();
    device.dropNext(3);

    const result = await client.setParameter(param("boost-delay"), 25);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "DEVICE_UNREACHABLE",
      attempts: 3,
    });
    expect(device.requests).toHaveLength(3);
  });
});

// =============================================================================
// Serialisation and shutdown
// =============================================================================

describe("transactions", () => {
  it("never interleaves concurrent calls", async () => {
    const { device, client } = setup();

    const [queried, written] = await Promise.all([
      client.query(),
      client.setParameter(param("power"), false),
    ]);

    expect(queried.isOk()).toBe(true);
    expect(written.isOk()).toBe(true);
    expect(device.timeline).toEqual(["send:1", "reply", "send:3", "reply"]);
  });

  it("abandons the pending wait on close", async () => {
    const { device, client } = setup({ timeoutMs: 1000 });
    device.dropNext(5);

    const pending = client.query();
    await nextTurn();
    const started = Date.now();
    await client.close();

    expect((await pending)._unsafeUnwrapErr().type).toBe("CLIENT_CLOSED");
    expect(Date.now() - started).toBeLessThan(500);
    expect(device.closed).toBe(true);
    expect(device.requests).toHaveLength(1);
  });

  it("fails every call after close", async () => {
    const { client } = setup();
    await client.close();

    const queried = await client.query();
    const written = await client.setParameter(param("power"), true);

    expect(queried._unsafeUnwrapErr().type).toBe("CLIENT_CLOSED");
    expect(written._unsafeUnwrapErr().type).toBe("CLIENT_CLOSED");
  });
});
