/**
 * Scalar wire codecs
 */

import { WireFormatError } from "./errors.js";

export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | WireObject;

export interface WireObject {
  [key: string]: WireValue;
}

export interface ScalarTypes {
  bool: boolean;
  int32: number;
  uint32: number;
  int64: bigint;
  uint64: bigint;
  float32: number;
  float64: number;
  string: string;
  binary: Uint8Array;
  timestamp: Date;
}

export type ScalarKind = keyof ScalarTypes;

export interface ScalarCodec<T> {
  encode(value: T): WireValue;
  decode(wire: WireValue, field: string): T;
}

const INTEGER_TEXT = /^-?\d+$/;

function mismatch(field: string, expected: string, wire: WireValue): WireFormatError {
  return new WireFormatError(
    `Field "${field}" expected ${expected}, got ${JSON.stringify(wire)}`,
  );
}

function boundedInteger(min: number, max: number, label: string): ScalarCodec<number> {
  return {
    encode: (value) => value,
    decode(wire, field) {
      if (typeof wire !== "number" || !Number.isInteger(wire) || wire < min || wire > max) {
        throw mismatch(field, label, wire);
      }
      return wire;
    },
  };
}

function bigInteger(min: bigint, max: bigint, label: string): ScalarCodec<bigint> {
  return {
    // JSON numbers lose precision past 2^53, so larger values travel as text
    encode(value) {
      const asNumber = Number(value);
      return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
    },
    decode(wire, field) {
      let value: bigint;
      if (typeof wire === "number" && Number.isInteger(wire)) {
        value = BigInt(wire);
      } else if (typeof wire === "string" && INTEGER_TEXT.test(wire)) {
        value = BigInt(wire);
      } else {
        throw mismatch(field, label, wire);
      }
      if (value < min || value > max) {
        throw mismatch(field, label, wire);
      }
      return value;
    },
  };
}

const floating: ScalarCodec<number> = {
  encode: (value) => value,
  decode(wire, field) {
    if (typeof wire !== "number") {
      throw mismatch(field, "a number", wire);
    }
    return wire;
  },
};

/**
 * Format a timestamp as `YYYY-MM-DDTHH:MM:SSZ`
 */
export function formatTimestamp(value: Date): string {
  return value.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export const SCALAR_CODECS: { [K in ScalarKind]: ScalarCodec<ScalarTypes[K]> } = {
  bool: {
    encode: (value) => value,
    decode(wire, field) {
      if (typeof wire !== "boolean") {
        throw mismatch(field, "a boolean", wire);
      }
      return wire;
    },
  },
  int32: boundedInteger(-2147483648, 2147483647, "a 32-bit integer"),
  uint32: boundedInteger(0, 4294967295, "an unsigned 32-bit integer"),
  int64: bigInteger(-(2n ** 63n), 2n ** 63n - 1n, "a 64-bit integer"),
  uint64: bigInteger(0n, 2n ** 64n - 1n, "an unsigned 64-bit integer"),
  float32: floating,
  float64: floating,
  string: {
    encode: (value) => value,
    decode(wire, field) {
      if (typeof wire !== "string") {
        throw mismatch(field, "a string", wire);
      }
      return wire;
    },
  },
  binary: {
    encode: (value) => Buffer.from(value).toString("base64"),
    decode(wire, field) {
      if (typeof wire !== "string") {
        throw mismatch(field, "base64 text", wire);
      }
      return new Uint8Array(Buffer.from(wire, "base64"));
    },
  },
  timestamp: {
    encode: formatTimestamp,
    decode(wire, field) {
      if (typeof wire !== "string") {
        throw mismatch(field, "a timestamp", wire);
      }
      const value = new Date(wire);
      if (Number.isNaN(value.getTime())) {
        throw mismatch(field, "a timestamp", wire);
      }
      return value;
    },
  },
};

export function encodeScalar<K extends ScalarKind>(kind: K, value: ScalarTypes[K]): WireValue {
  const codec: ScalarCodec<ScalarTypes[K]> = SCALAR_CODECS[kind];
  return codec.encode(value);
}

export function decodeScalar<K extends ScalarKind>(
  kind: K,
  wire: WireValue,
  field: string,
): ScalarTypes[K] {
  const codec: ScalarCodec<ScalarTypes[K]> = SCALAR_CODECS[kind];
  return codec.decode(wire, field);
}

export function isWireObject(wire: WireValue): wire is WireObject {
  return typeof wire === "object" && wire !== null && !Array.isArray(wire);
}
