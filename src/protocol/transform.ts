/**
 * Protocol Module - Pure Transformations
 *
 * Frame encoding and decoding for the Vento UDP protocol.
 * No side effects, no I/O - bytes in, values out.
 *
 * Frame layout:
 *
 *   FD FD | 02 | idLen id... | pwdLen pwd... | func | data... | sumLo sumHi
 *
 * The checksum is the sum of every byte from the protocol type through the
 * end of the data block, modulo 2^16, little-endian.
 */
import { type Result, err, ok } from "neverthrow";

import type { DecodeError, EncodingError } from "./errors.js";
import {
  badHeader,
  checksumMismatch,
  invalidField,
  invalidValue,
  malformedData,
  missingValue,
  notWritable,
  truncated,
  unexpectedFunction,
  unknownFunction,
  unsupportedProtocol,
  wrongDevice,
} from "./errors.js";
import { PARAMETERS, getParameterById, isWritable } from "./parameters.js";
import type {
  CommandInput,
  Frame,
  FrameEntry,
  Interpretation,
  Parameter,
  ParameterReading,
  ParameterValue,
  RejectedEntry,
} from "./schema.js";
import {
  CHECKSUM_LENGTH,
  DEFAULT_DEVICE_ID,
  DataMarker,
  FRAME_HEADER,
  FUNCTION_CODES,
  FunctionCode,
  MAX_FIELD_LENGTH,
  MIN_FRAME_LENGTH,
  PROTOCOL_TYPE,
} from "./schema.js";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Sum of bytes modulo 2^16.
 */
export function checksum(bytes: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < bytes.length; i++) {
    sum = (sum + bytes[i]) & 0xffff;
  }
  return sum;
}

export function toFunctionCode(byte: number): FunctionCode | null {
  return FUNCTION_CODES.find((code) => code === byte) ?? null;
}

/**
 * Read, increment and decrement frames list parameter numbers without
 * values.
 */
function carriesRequests(functionCode: FunctionCode): boolean {
  return (
    functionCode === FunctionCode.READ ||
    functionCode === FunctionCode.INCREMENT ||
    functionCode === FunctionCode.DECREMENT
  );
}

function isPrintableAscii(byte: number): boolean {
  return byte >= 0x20 && byte <= 0x7e;
}

function toHex(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, "0");
}

function encodeAsciiField(
  field: string,
  text: string,
): Result<Uint8Array, EncodingError> {
  const bytes = Buffer.from(text, "latin1");
  if (bytes.length !== text.length || !bytes.every(isPrintableAscii)) {
    return err(invalidField(field, "must be printable ASCII"));
  }
  if (bytes.length > MAX_FIELD_LENGTH) {
    return err(
      invalidField(field, `must be at most ${MAX_FIELD_LENGTH} characters`),
    );
  }
  return ok(bytes);
}

function toLittleEndian(value: number, size: number): Uint8Array {
  const bytes = new Uint8Array(size);
  for (let i = 0; i < size; i++) {
    bytes[i] = Math.floor(value / 256 ** i) % 256;
  }
  return bytes;
}

function fromLittleEndian(bytes: Uint8Array): number {
  let value = 0;
  for (let i = 0; i < bytes.length; i++) {
    value += bytes[i] * 256 ** i;
  }
  return value;
}

// =============================================================================
// Value Encoding
// =============================================================================

/**
 * Encode a native value into its wire bytes.
 *
 * Booleans are one byte 0/1, integers little-endian in the parameter's
 * width, enums one byte holding the option code.
 */
export function encodeValue(
  parameter: Parameter,
  value: ParameterValue,
): Result<Uint8Array, EncodingError> {
  switch (parameter.type) {
    case "boolean":
      if (typeof value !== "boolean") {
        return err(invalidValue(parameter.name, "expected a boolean"));
      }
      return ok(Uint8Array.of(value ? 1 : 0));

    case "integer":
      if (typeof value !== "number" || !Number.isInteger(value)) {
        return err(invalidValue(parameter.name, "expected an integer"));
      }
      if (value < parameter.min || value > parameter.max) {
        return err(
          invalidValue(
            parameter.name,
            `${value} is outside ${parameter.min}..${parameter.max}`,
          ),
        );
      }
      return ok(toLittleEndian(value, parameter.size));

    case "enum": {
      const option =
        typeof value === "number"
          ? parameter.options.find((candidate) => candidate.code === value)
          : undefined;
      if (option === undefined) {
        const codes = parameter.options.map((o) => o.code).join(", ");
        return err(
          invalidValue(parameter.name, `${String(value)} is not one of ${codes}`),
        );
      }
      return ok(Uint8Array.of(option.code));
    }
  }
}

/**
 * Decode wire bytes into a native value.
 *
 * @returns The value, or null if the bytes do not fit the parameter
 */
export function decodeValue(
  parameter: Parameter,
  raw: Uint8Array,
): ParameterValue | null {
  switch (parameter.type) {
    case "boolean":
      if (raw.length !== 1 || raw[0] > 1) return null;
      return raw[0] === 1;

    case "integer": {
      if (raw.length !== parameter.size) return null;
      const value = fromLittleEndian(raw);
      return value >= parameter.min && value <= parameter.max ? value : null;
    }

    case "enum": {
      if (raw.length !== 1) return null;
      const code = raw[0];
      return parameter.options.some((option) => option.code === code)
        ? code
        : null;
    }
  }
}

// =============================================================================
// Frame Encoding
// =============================================================================

function encodeData(
  functionCode: FunctionCode,
  entries: ReadonlyArray<FrameEntry>,
): Result<number[], EncodingError> {
  const data: number[] = [];
  const requestsOnly = carriesRequests(functionCode);
  let page = 0;

  for (const entry of entries) {
    const { parameterId } = entry;
    if (
      !Number.isInteger(parameterId) ||
      parameterId < 0 ||
      parameterId > 0xffff ||
      (parameterId & 0xff) >= DataMarker.FUNCTION
    ) {
      return err(
        invalidField("parameterId", `${parameterId} is not addressable`),
      );
    }
    if (requestsOnly !== (entry.kind === "request")) {
      return err(
        invalidField(
          "entries",
          `${entry.kind} entry cannot be sent with function 0x${toHex(functionCode)}`,
        ),
      );
    }

    const entryPage = parameterId >> 8;
    const number = parameterId & 0xff;
    if (entryPage !== page) {
      data.push(DataMarker.PAGE, entryPage);
      page = entryPage;
    }

    switch (entry.kind) {
      case "request":
        data.push(number);
        break;
      case "unsupported":
        data.push(DataMarker.UNSUPPORTED, number);
        break;
      case "value":
        if (entry.value.length === 0 || entry.value.length > MAX_FIELD_LENGTH) {
          return err(
            invalidField("value", `size ${entry.value.length} is not encodable`),
          );
        }
        if (entry.value.length === 1) {
          data.push(number, entry.value[0]);
        } else {
          data.push(DataMarker.SIZE, entry.value.length, number, ...entry.value);
        }
        break;
    }
  }

  return ok(data);
}

/**
 * Encode a frame into a datagram.
 */
export function encodeFrame(frame: Frame): Result<Uint8Array, EncodingError> {
  const deviceId = encodeAsciiField("deviceId", frame.deviceId);
  if (deviceId.isErr()) return err(deviceId.error);
  if (deviceId.value.length === 0) {
    return err(invalidField("deviceId", "must not be empty"));
  }

  const password = encodeAsciiField("password", frame.password);
  if (password.isErr()) return err(password.error);

  const data = encodeData(frame.functionCode, frame.entries);
  if (data.isErr()) return err(data.error);

  const body = [
    PROTOCOL_TYPE,
    deviceId.value.length,
    ...deviceId.value,
    password.value.length,
    ...password.value,
    frame.functionCode,
    ...data.value,
  ];
  const sum = checksum(body);

  return ok(Uint8Array.from([...FRAME_HEADER, ...body, sum & 0xff, sum >> 8]));
}

function buildCommandEntries(
  input: CommandInput,
): Result<FrameEntry[], EncodingError> {
  const { functionCode, parameter, value } = input;

  if (
    functionCode !== FunctionCode.READ &&
    functionCode !== FunctionCode.WRITE &&
    functionCode !== FunctionCode.WRITE_WITH_RESPONSE
  ) {
    return err(
      invalidField("functionCode", "commands are read, write or write with response"),
    );
  }

  if (functionCode === FunctionCode.READ) {
    if (parameter === undefined) {
      return ok(
        PARAMETERS.map(
          (p): FrameEntry => ({ kind: "request", parameterId: p.id }),
        ),
      );
    }
    return ok([{ kind: "request", parameterId: parameter.id }]);
  }

  if (parameter === undefined) {
    return err(invalidField("parameter", "write commands need a parameter"));
  }
  if (!isWritable(parameter)) {
    return err(notWritable(parameter.name));
  }
  if (value === undefined) {
    return err(missingValue(parameter.name));
  }

  return encodeValue(parameter, value).map((bytes): FrameEntry[] => [
    { kind: "value", parameterId: parameter.id, value: bytes },
  ]);
}

/**
 * Encode a command to the unit.
 *
 * A read without a parameter reads every registered parameter. Writes are
 * checked against the parameter's access, type and range.
 *
 * @example
 * encodeCommand({
 *   deviceId: DEFAULT_DEVICE_ID,
 *   password: "1111",
 *   functionCode: FunctionCode.WRITE_WITH_RESPONSE,
 *   parameter: getParameterByName("fan-speed"),
 *   value: 3,
 * });
 */
export function encodeCommand(
  input: CommandInput,
): Result<Uint8Array, EncodingError> {
  return buildCommandEntries(input).andThen((entries) =>
    encodeFrame({
      deviceId: input.deviceId,
      password: input.password,
      functionCode: input.functionCode,
      entries,
    }),
  );
}

// =============================================================================
// Frame Decoding
// =============================================================================

function decodeData(
  functionCode: FunctionCode,
  data: Uint8Array,
  baseOffset: number,
): Result<FrameEntry[], DecodeError> {
  const entries: FrameEntry[] = [];
  let requestsOnly = carriesRequests(functionCode);
  let page = 0;
  let i = 0;

  while (i < data.length) {
    const byte = data[i];
    const offset = baseOffset + i;

    if (byte === DataMarker.PAGE) {
      if (i + 1 >= data.length) {
        return err(malformedData(offset, "page marker without a page"));
      }
      page = data[i + 1];
      i += 2;
      continue;
    }

    // Entries after the marker belong to the new function
    if (byte === DataMarker.FUNCTION) {
      if (i + 1 >= data.length) {
        return err(malformedData(offset, "function marker without a code"));
      }
      const code = toFunctionCode(data[i + 1]);
      if (code === null) {
        return err(unknownFunction(data[i + 1]));
      }
      requestsOnly = carriesRequests(code);
      i += 2;
      continue;
    }

    if (requestsOnly) {
      if (byte >= DataMarker.FUNCTION) {
        return err(
          malformedData(offset, `marker 0x${toHex(byte)} in a request list`),
        );
      }
      entries.push({ kind: "request", parameterId: (page << 8) | byte });
      i += 1;
      continue;
    }

    if (byte === DataMarker.UNSUPPORTED) {
      if (i + 1 >= data.length) {
        return err(
          malformedData(offset, "unsupported marker without a parameter"),
        );
      }
      const number = data[i + 1];
      if (number >= DataMarker.FUNCTION) {
        return err(malformedData(offset + 1, "reserved parameter number"));
      }
      entries.push({ kind: "unsupported", parameterId: (page << 8) | number });
      i += 2;
      continue;
    }

    if (byte === DataMarker.SIZE) {
      if (i + 2 >= data.length) {
        return err(malformedData(offset, "size marker without size and parameter"));
      }
      const size = data[i + 1];
      const number = data[i + 2];
      if (size === 0) {
        return err(malformedData(offset + 1, "zero value size"));
      }
      if (number >= DataMarker.FUNCTION) {
        return err(malformedData(offset + 2, "reserved parameter number"));
      }
      const start = i + 3;
      if (start + size > data.length) {
        return err(
          malformedData(offset, `value of ${size} bytes runs past the data block`),
        );
      }
      entries.push({
        kind: "value",
        parameterId: (page << 8) | number,
        value: data.slice(start, start + size),
      });
      i = start + size;
      continue;
    }

    if (i + 1 >= data.length) {
      return err(malformedData(offset, "parameter without a value"));
    }
    entries.push({
      kind: "value",
      parameterId: (page << 8) | byte,
      value: data.slice(i + 1, i + 2),
    });
    i += 2;
  }

  return ok(entries);
}

function decodeAscii(
  bytes: Uint8Array,
  offset: number,
  field: string,
): Result<string, DecodeError> {
  if (!bytes.every(isPrintableAscii)) {
    return err(malformedData(offset, `${field} is not printable ASCII`));
  }
  return ok(Buffer.from(bytes).toString("latin1"));
}

/**
 * Decode a datagram into a frame.
 *
 * Every length is checked before it is used: a truncated or garbled
 * datagram yields a DecodeError, never an out-of-bounds read.
 */
export function decodeFrame(bytes: Uint8Array): Result<Frame, DecodeError> {
  if (bytes.length < MIN_FRAME_LENGTH) {
    return err(truncated(MIN_FRAME_LENGTH, bytes.length));
  }
  if (bytes[0] !== FRAME_HEADER[0] || bytes[1] !== FRAME_HEADER[1]) {
    return err(badHeader());
  }
  if (bytes[2] !== PROTOCOL_TYPE) {
    return err(unsupportedProtocol(bytes[2]));
  }

  const end = bytes.length - CHECKSUM_LENGTH;

  // id length, id, password length
  const idLength = bytes[3];
  const passwordLengthAt = 4 + idLength;
  // password, function code
  if (passwordLengthAt + 2 > end) {
    return err(truncated(passwordLengthAt + 2 + CHECKSUM_LENGTH, bytes.length));
  }
  const passwordLength = bytes[passwordLengthAt];
  const functionAt = passwordLengthAt + 1 + passwordLength;
  if (functionAt + 1 > end) {
    return err(truncated(functionAt + 1 + CHECKSUM_LENGTH, bytes.length));
  }

  const expected = checksum(bytes.subarray(2, end));
  const actual = bytes[end] | (bytes[end + 1] << 8);
  if (expected !== actual) {
    return err(checksumMismatch(expected, actual));
  }

  const functionCode = toFunctionCode(bytes[functionAt]);
  if (functionCode === null) {
    return err(unknownFunction(bytes[functionAt]));
  }

  const deviceId = decodeAscii(bytes.subarray(4, passwordLengthAt), 4, "device id");
  if (deviceId.isErr()) return err(deviceId.error);

  const password = decodeAscii(
    bytes.subarray(passwordLengthAt + 1, functionAt),
    passwordLengthAt + 1,
    "password",
  );
  if (password.isErr()) return err(password.error);

  return decodeData(
    functionCode,
    bytes.subarray(functionAt + 1, end),
    functionAt + 1,
  ).map(
    (entries): Frame => ({
      deviceId: deviceId.value,
      password: password.value,
      functionCode,
      entries,
    }),
  );
}

/**
 * Decode a datagram expected to answer one of our commands.
 *
 * Besides being well-formed it must be a response, and come from the
 * configured device unless that is the default id every unit answers to.
 */
export function decodeResponse(
  bytes: Uint8Array,
  expected: Readonly<{ deviceId: string }>,
): Result<Frame, DecodeError> {
  return decodeFrame(bytes).andThen((frame): Result<Frame, DecodeError> => {
    if (frame.functionCode !== FunctionCode.RESPONSE) {
      return err(unexpectedFunction(frame.functionCode));
    }
    if (
      expected.deviceId !== DEFAULT_DEVICE_ID &&
      frame.deviceId !== expected.deviceId
    ) {
      return err(wrongDevice(expected.deviceId, frame.deviceId));
    }
    return ok(frame);
  });
}

// =============================================================================
// Interpretation
// =============================================================================

/**
 * Map decoded entries through the parameter registry.
 *
 * Unknown parameters are skipped. Values that do not fit their parameter
 * are reported as rejected rather than guessed at.
 */
export function interpretEntries(
  entries: ReadonlyArray<FrameEntry>,
): Interpretation {
  const readings: ParameterReading[] = [];
  const unsupported: Parameter[] = [];
  const rejected: RejectedEntry[] = [];

  for (const entry of entries) {
    const parameter = getParameterById(entry.parameterId);
    if (parameter === undefined) continue;

    switch (entry.kind) {
      case "unsupported":
        unsupported.push(parameter);
        break;
      case "value": {
        const value = decodeValue(parameter, entry.value);
        if (value === null) {
          rejected.push({ parameter, raw: entry.value });
        } else {
          readings.push({ parameter, value });
        }
        break;
      }
      case "request":
        break;
    }
  }

  return { readings, unsupported, rejected };
}
