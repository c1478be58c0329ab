/**
 * Predicates and derived views over the type model
 */

import type {
  CompositeRef,
  DataType,
  Field,
  ListType,
  ModeledType,
  NullableType,
  NumericType,
  Struct,
  Union,
} from "../../types/type-model.js";

const NUMERIC_KINDS = new Set<string>([
  "int32",
  "uint32",
  "int64",
  "uint64",
  "float32",
  "float64",
]);

export function isNullable(type: ModeledType): type is NullableType {
  return type.kind === "nullable";
}

/**
 * Strip the nullable layer, if any
 */
export function unwrapNullable(type: ModeledType): ModeledType {
  return type.kind === "nullable" ? type.innerType : type;
}

/**
 * Timestamps directly or as list elements; the wire keeps whole seconds only
 */
export function holdsTimestamp(type: ModeledType): boolean {
  const inner = unwrapNullable(type);
  return inner.kind === "timestamp" || (inner.kind === "list" && inner.elementType.kind === "timestamp");
}

export function isNumericType(type: ModeledType): type is NumericType {
  return NUMERIC_KINDS.has(type.kind);
}

export function isListType(type: ModeledType): type is ListType {
  return type.kind === "list";
}

export function isCompositeType(type: ModeledType): type is CompositeRef {
  return type.kind === "composite";
}

export function isStructRef(type: ModeledType): type is CompositeRef & { readonly target: Struct } {
  return type.kind === "composite" && type.target.kind === "struct";
}

export function isUnionRef(type: ModeledType): type is CompositeRef & { readonly target: Union } {
  return type.kind === "composite" && type.target.kind === "union";
}

/**
 * Types whose values are references in the generated code and may therefore
 * arrive as null from an untyped caller
 */
export function couldBeNull(type: ModeledType): boolean {
  return isCompositeType(type) || type.kind === "string" || isListType(type);
}

export function hasEnumeratedSubtypes(struct: Struct): boolean {
  return struct.subtypes !== undefined && struct.subtypes.length > 0;
}

/**
 * Parent fields first, then own fields, in declaration order
 */
export function allFields(struct: Struct): readonly Field[] {
  if (!struct.parent) {
    return struct.fields;
  }
  return [...allFields(struct.parent), ...struct.fields];
}

export function qualifiedName(dataType: DataType): string {
  return `${dataType.namespace}.${dataType.name}`;
}
