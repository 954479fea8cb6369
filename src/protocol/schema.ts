/**
 * Protocol Module - Schemas and Types
 *
 * Data shapes of the Blauberg Vento UDP control protocol: frame layout
 * constants, function codes, the parameter model and decoded frames.
 */

// =============================================================================
// Wire Constants
// =============================================================================

/** Every frame starts with these two bytes. */
export const FRAME_HEADER = [0xfd, 0xfd] as const;

/** Protocol type byte following the header. */
export const PROTOCOL_TYPE = 0x02;

/** Header, type, two length bytes, function code and checksum. */
export const MIN_FRAME_LENGTH = 8;

export const CHECKSUM_LENGTH = 2;

/** Largest value a one-byte length prefix can carry. */
export const MAX_FIELD_LENGTH = 0xff;

/** UDP port the unit listens on. */
export const DEFAULT_DEVICE_PORT = 4000;

/**
 * Device id understood by every unit. A unit addressed this way answers
 * with its own id.
 */
export const DEFAULT_DEVICE_ID = "DEFAULT_DEVICEID";

export const DEFAULT_DEVICE_PASSWORD = "1111";

// =============================================================================
// Function Codes
// =============================================================================

export const FunctionCode = {
  READ: 0x01,
  WRITE: 0x02,
  WRITE_WITH_RESPONSE: 0x03,
  INCREMENT: 0x04,
  DECREMENT: 0x05,
  RESPONSE: 0x06,
} as const;

export type FunctionCode = (typeof FunctionCode)[keyof typeof FunctionCode];

export const FUNCTION_CODES: ReadonlyArray<FunctionCode> =
  Object.values(FunctionCode);

/**
 * Reserved bytes inside a data block. Parameter numbers never use them.
 */
export const DataMarker = {
  /** Following entries belong to another function code */
  FUNCTION: 0xfc,
  /** Next byte is a parameter the unit does not support */
  UNSUPPORTED: 0xfd,
  /** Next bytes are a value size and a parameter with a non-default size */
  SIZE: 0xfe,
  /** Next byte selects the parameter page */
  PAGE: 0xff,
} as const;

// =============================================================================
// Parameters
// =============================================================================

export type ParameterAccess = "read" | "readwrite";

type ParameterBase = Readonly<{
  /** Page in the high byte, number within the page in the low byte */
  id: number;
  /** kebab-case name, also the MQTT topic segment */
  name: string;
  access: ParameterAccess;
  description: string;
  unit?: string;
}>;

export type BooleanParameter = ParameterBase & Readonly<{ type: "boolean" }>;

export type IntegerParameter = ParameterBase &
  Readonly<{
    type: "integer";
    min: number;
    max: number;
    /** Little-endian width on the wire */
    size: 1 | 2 | 3 | 4;
  }>;

export type EnumOption = Readonly<{ code: number; label: string }>;

export type EnumParameter = ParameterBase &
  Readonly<{
    type: "enum";
    options: ReadonlyArray<EnumOption>;
  }>;

export type Parameter = BooleanParameter | IntegerParameter | EnumParameter;

/** Native value of a parameter; enums carry their wire code. */
export type ParameterValue = boolean | number;

export type ParameterReading = Readonly<{
  parameter: Parameter;
  value: ParameterValue;
}>;

// =============================================================================
// Frames
// =============================================================================

export type FrameEntry =
  | Readonly<{ kind: "request"; parameterId: number }>
  | Readonly<{ kind: "value"; parameterId: number; value: Uint8Array }>
  | Readonly<{ kind: "unsupported"; parameterId: number }>;

/**
 * A command or response frame. Read, increment and decrement frames carry
 * request entries; every other function carries values. A function marker
 * in the data block changes the kind for the entries after it.
 */
export type Frame = Readonly<{
  deviceId: string;
  password: string;
  functionCode: FunctionCode;
  entries: ReadonlyArray<FrameEntry>;
}>;

export type CommandInput = Readonly<{
  deviceId: string;
  password: string;
  functionCode: FunctionCode;
  /** Omitted on a read: read every known parameter */
  parameter?: Parameter;
  value?: ParameterValue;
}>;

export type RejectedEntry = Readonly<{
  parameter: Parameter;
  raw: Uint8Array;
}>;

/**
 * Frame entries mapped through the parameter registry.
 */
export type Interpretation = Readonly<{
  readings: ReadonlyArray<ParameterReading>;
  unsupported: ReadonlyArray<Parameter>;
  /** Values that do not fit the parameter's declared type or range */
  rejected: ReadonlyArray<RejectedEntry>;
}>;
