/**
 * Device Module - UDP Transport
 *
 * A connected udp4 socket: the kernel resolves the host once and drops
 * datagrams from any other peer.
 */
import dgram from "node:dgram";

import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import type { TransportError } from "./errors.js";
import { transportFailed } from "./errors.js";
import type {
  DatagramListener,
  DatagramTransport,
  DeviceAddress,
} from "./schema.js";

/**
 * Open a UDP channel to the unit.
 *
 * Fails when the host cannot be resolved or the socket cannot be bound.
 */
export async function openUdpTransport(
  address: DeviceAddress,
  logger: Logger,
): Promise<Result<DatagramTransport, TransportError>> {
  const socket = dgram.createSocket("udp4");

  const connected = await new Promise<Result<void, Error>>((resolve) => {
    const onError = (error: Error) => {
      resolve(err(error));
    };
    socket.once("error", onError);
    // A failed host lookup arrives here, not as an "error" event
    socket.connect(address.port, address.host, (error?: Error) => {
      socket.off("error", onError);
      resolve(error ? err(error) : ok(undefined));
    });
  });

  if (connected.isErr()) {
    socket.close();
    return err(
      transportFailed(
        address.host,
        address.port,
        connected.error.message,
        connected.error,
      ),
    );
  }

  const remote = socket.remoteAddress();
  logger.info(
    { host: address.host, address: remote.address, port: remote.port },
    "UDP socket connected",
  );

  const listeners = new Set<DatagramListener>();
  let closed = false;

  socket.on("message", (message) => {
    logger.trace({ bytes: message.toString("hex") }, "Datagram received");
    const datagram = Uint8Array.from(message);
    for (const listener of listeners) {
      listener(datagram);
    }
  });

  // Async send failures (e.g. ICMP port unreachable) land here
  socket.on("error", (error) => {
    logger.warn({ error: error.message }, "UDP socket error");
  });

  return ok({
    send: (datagram) =>
      new Promise<void>((resolve, reject) => {
        if (closed) {
          reject(new Error("Socket is closed"));
          return;
        }
        logger.trace({ bytes: Buffer.from(datagram).toString("hex") }, "Datagram sent");
        socket.send(datagram, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      }),

    onMessage: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    close: () =>
      new Promise<void>((resolve) => {
        if (closed) {
          resolve();
          return;
        }
        closed = true;
        listeners.clear();
        socket.close(() => {
          logger.info("UDP socket closed");
          resolve();
        });
      }),
  });
}
