/**
 * Tagged-hierarchy resolver
 *
 * A family is a root struct with enumerated subtypes. Each subtype carries
 * the tag its parent recorded for it, except the catch-all member (the root
 * itself or one subtype), which absorbs every tag the family does not know.
 */

import type { Struct, Union, UnionField } from "../../types/type-model.js";
import { hasEnumeratedSubtypes } from "../model/index.js";
import { assertContract } from "../../utils/errors.js";

/** Tag written on the wire by a catch-all member */
export const CATCH_ALL_TAG = "";

export type StructTag =
  | { readonly kind: "none" }
  | { readonly kind: "fixed"; readonly tag: string }
  | { readonly kind: "catch-all" };

/**
 * Tag of a struct within its family
 * @throws SchemaContractError when the parent does not enumerate the struct
 */
export function structTag(struct: Struct): StructTag {
  if (hasEnumeratedSubtypes(struct)) {
    return struct.isCatchAll ? { kind: "catch-all" } : { kind: "none" };
  }

  const parent = struct.parent;
  if (!parent) {
    return { kind: "none" };
  }

  assertContract(
    hasEnumeratedSubtypes(parent),
    `Struct "${struct.name}" extends "${parent.name}", which declares no subtypes`,
  );
  if (struct.isCatchAll) {
    return { kind: "catch-all" };
  }

  const entry = parent.subtypes?.find((subtype) => subtype.struct === struct);
  assertContract(
    entry !== undefined,
    `Struct "${struct.name}" is not listed among the subtypes of "${parent.name}"`,
  );
  return { kind: "fixed", tag: entry.tag };
}

/**
 * Root of the family a struct belongs to, if any
 */
export function familyRoot(struct: Struct): Struct | undefined {
  if (hasEnumeratedSubtypes(struct)) {
    assertFlatFamily(struct);
    return struct;
  }
  if (struct.parent && hasEnumeratedSubtypes(struct.parent)) {
    return familyRoot(struct.parent);
  }
  return undefined;
}

/**
 * Concrete members of a family: the root first when it is the catch-all,
 * then the subtypes in declaration order
 */
export function familyMembers(root: Struct): readonly Struct[] {
  assertFlatFamily(root);
  const subtypes = (root.subtypes ?? []).map((subtype) => subtype.struct);
  return root.isCatchAll ? [root, ...subtypes] : subtypes;
}

/**
 * Subtypes that own a fixed tag, paired with it
 */
export function taggedSubtypes(root: Struct): readonly { tag: string; struct: Struct }[] {
  return (root.subtypes ?? []).filter((subtype) => !subtype.struct.isCatchAll);
}

export function catchAllMember(root: Struct): Struct | undefined {
  if (root.isCatchAll) {
    return root;
  }
  return root.subtypes?.find((subtype) => subtype.struct.isCatchAll)?.struct;
}

/**
 * Open families accept tags they do not know
 */
export function isOpenFamily(root: Struct): boolean {
  return catchAllMember(root) !== undefined;
}

export function isOpenUnion(union: Union): boolean {
  return union.catchAllField !== undefined;
}

/**
 * Wire tag of a union variant: the raw field name
 */
export function variantTag(field: UnionField): string {
  return field.name;
}

function assertFlatFamily(root: Struct): void {
  assertContract(
    root.parent === undefined,
    `Family root "${root.name}" cannot extend "${root.parent?.name}"`,
  );
  for (const subtype of root.subtypes ?? []) {
    assertContract(
      !hasEnumeratedSubtypes(subtype.struct),
      `Nested families are not supported: "${subtype.struct.name}" declares subtypes of its own`,
      { root: root.name },
    );
    assertContract(
      subtype.struct.parent === root,
      `Subtype "${subtype.struct.name}" of "${root.name}" names a different parent`,
    );
  }
}
