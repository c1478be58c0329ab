/**
 * Type model consumed by the synthesizers
 *
 * Built once per run by the schema loader and never mutated afterwards.
 */

export type NumericKind =
  | "int32"
  | "uint32"
  | "int64"
  | "uint64"
  | "float32"
  | "float64";

export interface VoidType {
  readonly kind: "void";
}

export interface BooleanType {
  readonly kind: "bool";
}

export interface NumericType {
  readonly kind: NumericKind;
  readonly minValue?: number | bigint;
  readonly maxValue?: number | bigint;
}

export interface StringType {
  readonly kind: "string";
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
}

export interface BinaryType {
  readonly kind: "binary";
}

export interface TimestampType {
  readonly kind: "timestamp";
}

export interface ListType {
  readonly kind: "list";
  readonly elementType: ModeledType;
  readonly minItems?: number;
  readonly maxItems?: number;
}

/** At most one nullable layer wraps a field type. */
export interface NullableType {
  readonly kind: "nullable";
  readonly innerType: ModeledType;
}

export interface CompositeRef {
  readonly kind: "composite";
  readonly target: DataType;
}

export type ModeledType =
  | VoidType
  | BooleanType
  | NumericType
  | StringType
  | BinaryType
  | TimestampType
  | ListType
  | NullableType
  | CompositeRef;

export type LiteralValue = boolean | number | bigint | string;

export type DefaultValue =
  | { readonly kind: "literal"; readonly value: LiteralValue }
  | { readonly kind: "tag"; readonly union: Union; readonly tag: string };

export interface Field {
  readonly name: string;
  readonly type: ModeledType;
  readonly default?: DefaultValue;
  readonly doc?: string;
}

export interface UnionField {
  readonly name: string;
  readonly type: ModeledType;
  readonly doc?: string;
}

export interface StructSubtype {
  readonly tag: string;
  readonly struct: Struct;
}

export interface Struct {
  readonly kind: "struct";
  readonly name: string;
  readonly namespace: string;
  readonly doc?: string;
  /** Own fields only; see allFields() for the inherited view. */
  readonly fields: readonly Field[];
  readonly parent?: Struct;
  /** Present only on the root of a tagged family. */
  readonly subtypes?: readonly StructSubtype[];
  readonly isCatchAll: boolean;
}

export interface Union {
  readonly kind: "union";
  readonly name: string;
  readonly namespace: string;
  readonly doc?: string;
  readonly fields: readonly UnionField[];
  readonly catchAllField?: UnionField;
}

export type DataType = Struct | Union;

export interface Namespace {
  readonly name: string;
  readonly doc?: string;
  readonly dataTypes: readonly DataType[];
}

export interface Api {
  readonly namespaces: readonly Namespace[];
}
