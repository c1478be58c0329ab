/**
 * Reads entries of one wire object
 */

import { WireFormatError } from "./errors.js";
import { TAG_FIELD } from "./object-writer.js";
import {
  decodeScalar,
  isWireObject,
  type ScalarKind,
  type ScalarTypes,
  type WireObject,
  type WireValue,
} from "./scalars.js";

export type Decoder<T> = (reader: ObjectReader) => T;

export class ObjectReader {
  constructor(private readonly entries: WireObject) {}

  /**
   * Wrap a wire value. A bare string is shorthand for a tag-only object,
   * which is how void union variants are often written.
   */
  static from(wire: WireValue, context: string): ObjectReader {
    if (typeof wire === "string") {
      return new ObjectReader({ [TAG_FIELD]: wire });
    }
    if (!isWireObject(wire)) {
      throw new WireFormatError(`Expected an object for "${context}", got ${JSON.stringify(wire)}`);
    }
    return new ObjectReader(wire);
  }

  /**
   * Present and not null
   */
  hasField(name: string): boolean {
    const value = this.entries[name];
    return value !== undefined && value !== null;
  }

  getField<K extends ScalarKind>(name: string, kind: K): ScalarTypes[K] {
    return decodeScalar(kind, this.require(name), name);
  }

  getFieldObject<T>(name: string, decode: Decoder<T>): T {
    return decode(ObjectReader.from(this.require(name), name));
  }

  getFieldList<K extends ScalarKind>(name: string, kind: K): ScalarTypes[K][] {
    return this.requireList(name).map((item) => decodeScalar(kind, item, name));
  }

  getFieldObjectList<T>(name: string, decode: Decoder<T>): T[] {
    return this.requireList(name).map((item) => decode(ObjectReader.from(item, name)));
  }

  /**
   * Tag of the variant or family member this object encodes
   */
  getUnionName(): string {
    return this.getField(TAG_FIELD, "string");
  }

  private require(name: string): WireValue {
    const value = this.entries[name];
    if (value === undefined || value === null) {
      throw new WireFormatError(`Missing required field "${name}"`);
    }
    return value;
  }

  private requireList(name: string): WireValue[] {
    const value = this.require(name);
    if (!Array.isArray(value)) {
      throw new WireFormatError(`Field "${name}" expected a list, got ${JSON.stringify(value)}`);
    }
    return value;
  }
}

/**
 * Decode a value from its wire form
 */
export function deserialize<T>(wire: WireValue, decode: Decoder<T>): T {
  return decode(ObjectReader.from(wire, "value"));
}
