/**
 * UDP Transport Tests
 *
 * node:dgram is mocked at the module boundary; no socket is opened.
 */
import { EventEmitter } from "node:events";

import { pino } from "pino";
import { beforeEach, describe, expect, test, vi } from "vitest";

class FakeSocket extends EventEmitter {
  connectError: Error | null = null;
  sent: Uint8Array[] = [];

  connect = vi.fn((_port: number, _host: string, callback: (error?: Error) => void) => {
    const error = this.connectError;
    setImmediate(() => {
      if (error) {
        callback(error);
      } else {
        callback();
      }
    });
  });

  remoteAddress = vi.fn(() => ({ address: "192.0.2.10", family: "IPv4", port: 4000 }));

  send = vi.fn((datagram: Uint8Array, callback: (error: Error | null) => void) => {
    this.sent.push(datagram);
    callback(null);
  });

  close = vi.fn((callback?: () => void) => {
    callback?.();
  });
}

const { sockets } = vi.hoisted(() => {
  const queued: FakeSocket[] = [];
  return { sockets: queued };
});

vi.mock("node:dgram", () => ({
  default: {
    createSocket: () => {
      const socket = sockets.shift();
      if (socket === undefined) {
        throw new Error("No fake socket queued");
      }
      return socket;
    },
  },
}));

// Import after mocks
import { openUdpTransport } from "../transport.js";

const logger = pino({ level: "silent" });

describe("openUdpTransport", () => {
  let socket: FakeSocket;

  beforeEach(() => {
    socket = new FakeSocket();
    sockets.length = 0;
    sockets.push(socket);
  });

  test("returns TRANSPORT_FAILED and closes the socket when the host does not resolve", async () => {
    socket.connectError = new Error("getaddrinfo ENOTFOUND vento.invalid");

    const result = await openUdpTransport({ host: "vento.invalid", port: 4000 }, logger);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "TRANSPORT_FAILED",
      host: "vento.invalid",
      port: 4000,
      message: "getaddrinfo ENOTFOUND vento.invalid",
    });
    expect(socket.close).toHaveBeenCalledTimes(1);
    expect(socket.remoteAddress).not.toHaveBeenCalled();
  });

  test("returns TRANSPORT_FAILED when the socket emits an error while connecting", async () => {
    socket.connect.mockImplementationOnce(() => {
      setImmediate(() => socket.emit("error", new Error("EADDRINUSE")));
    });

    const result = await openUdpTransport({ host: "192.0.2.10", port: 4000 }, logger);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "TRANSPORT_FAILED",
      message: "EADDRINUSE",
    });
  });

  test("sends datagrams and fans received ones out to listeners", async () => {
    const transport = (
      await openUdpTransport({ host: "192.0.2.10", port: 4000 }, logger)
    )._unsafeUnwrap();
    const received: Uint8Array[] = [];
    const unsubscribe = transport.onMessage((datagram) => received.push(datagram));

    await transport.send(Uint8Array.of(0xfd, 0xfd));
    socket.emit("message", Buffer.from([1, 2, 3]));
    unsubscribe();
    socket.emit("message", Buffer.from([4]));

    expect(socket.sent).toEqual([Uint8Array.of(0xfd, 0xfd)]);
    expect(received).toEqual([Uint8Array.of(1, 2, 3)]);
  });

  test("refuses to send once closed", async () => {
    const transport = (
      await openUdpTransport({ host: "192.0.2.10", port: 4000 }, logger)
    )._unsafeUnwrap();

    await transport.close();
    await transport.close();

    expect(socket.close).toHaveBeenCalledTimes(1);
    await expect(transport.send(Uint8Array.of(1))).rejects.toThrow("Socket is closed");
  });
});
