/**
 * Protocol Module - Public API
 *
 * Vento UDP frame codec and parameter registry.
 */

// Types
export type {
  BooleanParameter,
  CommandInput,
  EnumOption,
  EnumParameter,
  Frame,
  FrameEntry,
  IntegerParameter,
  Interpretation,
  Parameter,
  ParameterAccess,
  ParameterReading,
  ParameterValue,
  RejectedEntry,
} from "./schema.js";

export {
  DEFAULT_DEVICE_ID,
  DEFAULT_DEVICE_PASSWORD,
  DEFAULT_DEVICE_PORT,
  FunctionCode,
} from "./schema.js";

// Registry
export {
  PARAMETERS,
  getParameterById,
  getParameterByName,
  isWritable,
} from "./parameters.js";

// Errors
export type { DecodeError, EncodingError } from "./errors.js";
export { formatDecodeError, formatEncodingError } from "./errors.js";

// Codec
export {
  checksum,
  decodeFrame,
  decodeResponse,
  decodeValue,
  encodeCommand,
  encodeFrame,
  encodeValue,
  interpretEntries,
} from "./transform.js";
