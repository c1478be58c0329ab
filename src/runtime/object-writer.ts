/**
 * Builds the wire object for one composite value
 */

import { encodeScalar, type ScalarKind, type ScalarTypes, type WireObject } from "./scalars.js";

/** Reserved entry carrying the tag of a tagged family member or union variant */
export const TAG_FIELD = ".tag";

export type Encoder<T> = (value: T, writer: ObjectWriter) => void;

export class ObjectWriter {
  private readonly entries: WireObject = {};

  addTag(tag: string): void {
    this.entries[TAG_FIELD] = tag;
  }

  addField<K extends ScalarKind>(name: string, kind: K, value: ScalarTypes[K]): void {
    this.entries[name] = encodeScalar(kind, value);
  }

  addFieldObject<T>(name: string, value: T, encode: Encoder<T>): void {
    this.entries[name] = serialize(value, encode);
  }

  addFieldList<K extends ScalarKind>(
    name: string,
    kind: K,
    values: readonly ScalarTypes[K][],
  ): void {
    this.entries[name] = values.map((value) => encodeScalar(kind, value));
  }

  addFieldObjectList<T>(name: string, values: readonly T[], encode: Encoder<T>): void {
    this.entries[name] = values.map((value) => serialize(value, encode));
  }

  toWire(): WireObject {
    return { ...this.entries };
  }
}

/**
 * Encode a value into a fresh wire object
 */
export function serialize<T>(value: T, encode: Encoder<T>): WireObject {
  const writer = new ObjectWriter();
  encode(value, writer);
  return writer.toWire();
}
