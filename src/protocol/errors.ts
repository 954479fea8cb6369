/**
 * Protocol Module - Error Types
 *
 * Typed error unions for frame encoding and decoding.
 * Errors are values, not exceptions: a garbled datagram is an expected
 * event on UDP and the caller decides whether to retry.
 */

// =============================================================================
// Encoding
// =============================================================================

export type EncodingError =
  | {
      readonly type: "INVALID_VALUE";
      readonly parameter: string;
      readonly message: string;
    }
  | {
      readonly type: "NOT_WRITABLE";
      readonly parameter: string;
      readonly message: string;
    }
  | {
      readonly type: "MISSING_VALUE";
      readonly parameter: string;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_FIELD";
      readonly field: string;
      readonly message: string;
    };

export function invalidValue(parameter: string, message: string): EncodingError {
  return { type: "INVALID_VALUE", parameter, message };
}

export function notWritable(parameter: string): EncodingError {
  return {
    type: "NOT_WRITABLE",
    parameter,
    message: `Parameter ${parameter} is read-only`,
  };
}

export function missingValue(parameter: string): EncodingError {
  return {
    type: "MISSING_VALUE",
    parameter,
    message: `Writing ${parameter} needs a value`,
  };
}

export function invalidField(field: string, message: string): EncodingError {
  return { type: "INVALID_FIELD", field, message };
}

export function formatEncodingError(error: EncodingError): string {
  switch (error.type) {
    case "INVALID_VALUE":
      return `Invalid value for ${error.parameter}: ${error.message}`;
    case "NOT_WRITABLE":
    case "MISSING_VALUE":
      return error.message;
    case "INVALID_FIELD":
      return `Invalid ${error.field}: ${error.message}`;
  }
}

// =============================================================================
// Decoding
// =============================================================================

export type DecodeError =
  | {
      readonly type: "TRUNCATED";
      readonly expected: number;
      readonly actual: number;
      readonly message: string;
    }
  | { readonly type: "BAD_HEADER"; readonly message: string }
  | {
      readonly type: "UNSUPPORTED_PROTOCOL";
      readonly protocolType: number;
      readonly message: string;
    }
  | {
      readonly type: "CHECKSUM_MISMATCH";
      readonly expected: number;
      readonly actual: number;
      readonly message: string;
    }
  | {
      readonly type: "UNKNOWN_FUNCTION";
      readonly functionCode: number;
      readonly message: string;
    }
  | {
      readonly type: "MALFORMED_DATA";
      readonly offset: number;
      readonly message: string;
    }
  | {
      readonly type: "UNEXPECTED_FUNCTION";
      readonly functionCode: number;
      readonly message: string;
    }
  | {
      readonly type: "WRONG_DEVICE";
      readonly expected: string;
      readonly actual: string;
      readonly message: string;
    };

export function truncated(expected: number, actual: number): DecodeError {
  return {
    type: "TRUNCATED",
    expected,
    actual,
    message: `Frame needs at least ${expected} bytes, got ${actual}`,
  };
}

export function badHeader(): DecodeError {
  return { type: "BAD_HEADER", message: "Frame does not start with 0xFDFD" };
}

export function unsupportedProtocol(protocolType: number): DecodeError {
  return {
    type: "UNSUPPORTED_PROTOCOL",
    protocolType,
    message: `Protocol type 0x${hex(protocolType)} is not supported`,
  };
}

export function checksumMismatch(expected: number, actual: number): DecodeError {
  return {
    type: "CHECKSUM_MISMATCH",
    expected,
    actual,
    message: `Checksum 0x${hex(actual, 4)} does not match computed 0x${hex(expected, 4)}`,
  };
}

export function unknownFunction(functionCode: number): DecodeError {
  return {
    type: "UNKNOWN_FUNCTION",
    functionCode,
    message: `Function code 0x${hex(functionCode)} is unknown`,
  };
}

export function malformedData(offset: number, message: string): DecodeError {
  return { type: "MALFORMED_DATA", offset, message };
}

export function unexpectedFunction(functionCode: number): DecodeError {
  return {
    type: "UNEXPECTED_FUNCTION",
    functionCode,
    message: `Expected a response frame, got function 0x${hex(functionCode)}`,
  };
}

export function wrongDevice(expected: string, actual: string): DecodeError {
  return {
    type: "WRONG_DEVICE",
    expected,
    actual,
    message: `Frame from device ${actual}, expected ${expected}`,
  };
}

export function formatDecodeError(error: DecodeError): string {
  switch (error.type) {
    case "MALFORMED_DATA":
      return `Malformed data at byte ${error.offset}: ${error.message}`;
    default:
      return error.message;
  }
}

function hex(value: number, width = 2): string {
  return value.toString(16).toUpperCase().padStart(width, "0");
}
