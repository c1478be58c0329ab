/**
 * Loader module types - the on-disk type model document
 */

export type Bound = number | string;

export interface TypeConstraints {
  min?: Bound;
  max?: Bound;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  minItems?: number;
  maxItems?: number;
}

/**
 * `Int32`, `List(String)`, `Nullable(geometry.Point)`, or the object form
 * when an inner type needs constraints of its own
 */
export type TypeSpec = string | TypeSpecObject;

export interface TypeSpecObject extends TypeConstraints {
  type: string;
  of?: TypeSpec;
}

export interface FieldDocument extends TypeConstraints {
  name: string;
  type: TypeSpec;
  doc?: string;
  default?: boolean | number | string;
}

export interface SubtypeDocument {
  tag: string;
  type: string;
}

export interface StructDocument {
  kind: "struct";
  name: string;
  doc?: string;
  extends?: string;
  fields?: FieldDocument[];
  subtypes?: SubtypeDocument[];
  /** The root itself or one of its subtypes */
  catchAll?: string;
}

export interface VariantDocument {
  name: string;
  /** Omitted for void variants */
  type?: TypeSpec;
  doc?: string;
}

export interface UnionDocument {
  kind: "union";
  name: string;
  doc?: string;
  variants: VariantDocument[];
  /** Name of a void variant */
  catchAll?: string;
}

export interface NamespaceDocument {
  name: string;
  doc?: string;
  types: (StructDocument | UnionDocument)[];
}

export interface TypeModelDocument {
  namespaces: NamespaceDocument[];
}

export type DocumentFormat = "json" | "yaml";
