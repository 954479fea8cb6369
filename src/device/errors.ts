/**
 * Device Module - Error Types
 *
 * Typed error unions for device transactions and the UDP transport.
 */
import type { EncodingError } from "../protocol/index.js";
import { formatEncodingError } from "../protocol/index.js";

/**
 * Errors that can occur during a device transaction.
 */
export type DeviceError =
  | {
      readonly type: "DEVICE_UNREACHABLE";
      readonly operation: string;
      readonly attempts: number;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_VALUE";
      readonly parameter: string;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_REQUEST";
      readonly message: string;
    }
  | {
      readonly type: "UNSUPPORTED_PARAMETER";
      readonly parameter: string;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly parameter: string;
      readonly message: string;
    }
  | {
      readonly type: "CLIENT_CLOSED";
      readonly message: string;
    };

/**
 * Create a DEVICE_UNREACHABLE error.
 */
export function deviceUnreachable(
  operation: string,
  attempts: number,
  lastReason: string,
): DeviceError {
  return {
    type: "DEVICE_UNREACHABLE",
    operation,
    attempts,
    message: `No valid reply after ${attempts} attempts (last: ${lastReason})`,
  };
}

export function clientClosed(): DeviceError {
  return { type: "CLIENT_CLOSED", message: "Device client is closed" };
}

export function unsupportedParameter(parameter: string): DeviceError {
  return {
    type: "UNSUPPORTED_PARAMETER",
    parameter,
    message: `Unit does not support ${parameter}`,
  };
}

export function invalidResponse(parameter: string, message: string): DeviceError {
  return { type: "INVALID_RESPONSE", parameter, message };
}

/**
 * Map a codec rejection onto the device error it surfaces as.
 */
export function fromEncodingError(error: EncodingError): DeviceError {
  switch (error.type) {
    case "INVALID_VALUE":
    case "NOT_WRITABLE":
    case "MISSING_VALUE":
      return {
        type: "INVALID_VALUE",
        parameter: error.parameter,
        message: formatEncodingError(error),
      };
    case "INVALID_FIELD":
      return { type: "INVALID_REQUEST", message: formatEncodingError(error) };
  }
}

/**
 * Format a DeviceError for logging.
 */
export function formatDeviceError(error: DeviceError): string {
  switch (error.type) {
    case "DEVICE_UNREACHABLE":
      return `Device unreachable during ${error.operation}: ${error.message}`;
    case "INVALID_VALUE":
    case "INVALID_REQUEST":
    case "UNSUPPORTED_PARAMETER":
    case "CLIENT_CLOSED":
      return error.message;
    case "INVALID_RESPONSE":
      return `Invalid response for ${error.parameter}: ${error.message}`;
  }
}

// =============================================================================
// Transport
// =============================================================================

export type TransportError = {
  readonly type: "TRANSPORT_FAILED";
  readonly host: string;
  readonly port: number;
  readonly message: string;
  readonly cause?: Error;
};

export function transportFailed(
  host: string,
  port: number,
  message: string,
  cause?: Error,
): TransportError {
  if (cause) {
    return { type: "TRANSPORT_FAILED", host, port, message, cause };
  }
  return { type: "TRANSPORT_FAILED", host, port, message };
}

export function formatTransportError(error: TransportError): string {
  return `UDP transport to ${error.host}:${error.port} failed: ${error.message}`;
}
