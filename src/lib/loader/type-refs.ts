/**
 * Type reference resolution for loaded documents
 */

import type { DataType, ModeledType, NumericType } from "../../types/type-model.js";
import { isNumericType } from "../model/index.js";
import { ValidationError } from "../../utils/errors.js";
import type { Bound, TypeConstraints, TypeSpec } from "./types.js";

const PRIMITIVES: Readonly<Record<string, ModeledType>> = {
  Void: { kind: "void" },
  Boolean: { kind: "bool" },
  Int32: { kind: "int32" },
  UInt32: { kind: "uint32" },
  Int64: { kind: "int64" },
  UInt64: { kind: "uint64" },
  Float32: { kind: "float32" },
  Float64: { kind: "float64" },
  String: { kind: "string" },
  Bytes: { kind: "binary" },
  Timestamp: { kind: "timestamp" },
};

const WRAPPER = /^(List|Nullable)\((.+)\)$/;

const CONSTRAINT_KEYS = [
  "min",
  "max",
  "minLength",
  "maxLength",
  "pattern",
  "minItems",
  "maxItems",
] as const;

/**
 * Finds a struct or union by `Name` (current namespace) or `ns.Name`
 */
export type CompositeLookup = (ref: string) => DataType | undefined;

export function resolveTypeSpec(spec: TypeSpec, lookup: CompositeLookup, where: string): ModeledType {
  if (typeof spec === "string") {
    return parseTypeRef(spec, lookup, where);
  }

  let type: ModeledType;
  if (spec.type === "List" || spec.type === "Nullable") {
    if (spec.of === undefined) {
      throw new ValidationError(`${where}: "${spec.type}" needs an "of" type`);
    }
    const inner = resolveTypeSpec(spec.of, lookup, where);
    type =
      spec.type === "List"
        ? { kind: "list", elementType: inner }
        : { kind: "nullable", innerType: inner };
  } else {
    if (spec.of !== undefined) {
      throw new ValidationError(`${where}: "of" only applies to List and Nullable`);
    }
    type = parseTypeRef(spec.type, lookup, where);
  }

  return applyConstraints(type, spec, where);
}

export function parseTypeRef(ref: string, lookup: CompositeLookup, where: string): ModeledType {
  const wrapped = WRAPPER.exec(ref);
  if (wrapped) {
    const [, wrapper, argument] = wrapped;
    const inner = parseTypeRef(argument, lookup, where);
    return wrapper === "List"
      ? { kind: "list", elementType: inner }
      : { kind: "nullable", innerType: inner };
  }

  const primitive = PRIMITIVES[ref];
  if (primitive) {
    return primitive;
  }

  const target = lookup(ref);
  if (!target) {
    throw new ValidationError(`${where}: unknown type "${ref}"`);
  }
  return { kind: "composite", target };
}

function hasConstraints(constraints: TypeConstraints): boolean {
  return CONSTRAINT_KEYS.some((key) => constraints[key] !== undefined);
}

function notApplicable(where: string, key: string, type: ModeledType): ValidationError {
  return new ValidationError(`${where}: "${key}" does not apply to type "${type.kind}"`);
}

function toBound(value: Bound, type: NumericType, where: string): number | bigint {
  const integral = type.kind !== "float32" && type.kind !== "float64";
  if (type.kind === "int64" || type.kind === "uint64") {
    if (typeof value === "number" && !Number.isInteger(value)) {
      throw new ValidationError(`${where}: bound ${value} is not an integer`);
    }
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new ValidationError(
        `${where}: bound ${value} lost precision when parsed; write 64-bit values as decimal text`,
      );
    }
    return BigInt(value);
  }
  const bound = typeof value === "number" ? value : Number(value);
  if (integral && !Number.isInteger(bound)) {
    throw new ValidationError(`${where}: bound ${value} is not an integer`);
  }
  return bound;
}

/**
 * Attach constraints to a type; the nullable layer, if any, is looked through
 */
export function applyConstraints(type: ModeledType, constraints: TypeConstraints, where: string): ModeledType {
  if (!hasConstraints(constraints)) {
    return type;
  }
  if (type.kind === "nullable") {
    return { kind: "nullable", innerType: applyConstraints(type.innerType, constraints, where) };
  }

  for (const key of CONSTRAINT_KEYS) {
    if (constraints[key] === undefined) {
      continue;
    }
    const applies =
      ((key === "min" || key === "max") && isNumericType(type)) ||
      ((key === "minLength" || key === "maxLength" || key === "pattern") && type.kind === "string") ||
      ((key === "minItems" || key === "maxItems") && type.kind === "list");
    if (!applies) {
      throw notApplicable(where, key, type);
    }
  }

  if (isNumericType(type)) {
    const minValue = constraints.min === undefined ? type.minValue : toBound(constraints.min, type, where);
    const maxValue = constraints.max === undefined ? type.maxValue : toBound(constraints.max, type, where);
    if (minValue !== undefined && maxValue !== undefined && minValue > maxValue) {
      throw new ValidationError(`${where}: min ${minValue} is greater than max ${maxValue}`);
    }
    return { kind: type.kind, minValue, maxValue };
  }

  if (type.kind === "string") {
    const { minLength = type.minLength, maxLength = type.maxLength, pattern = type.pattern } = constraints;
    if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
      throw new ValidationError(`${where}: minLength ${minLength} is greater than maxLength ${maxLength}`);
    }
    if (pattern !== undefined) {
      try {
        new RegExp(pattern);
      } catch (error) {
        throw new ValidationError(`${where}: invalid pattern ${JSON.stringify(pattern)}`, undefined, {
          cause: error,
        });
      }
    }
    return { kind: "string", minLength, maxLength, pattern };
  }

  if (type.kind === "list") {
    const { minItems = type.minItems, maxItems = type.maxItems } = constraints;
    if (minItems !== undefined && maxItems !== undefined && minItems > maxItems) {
      throw new ValidationError(`${where}: minItems ${minItems} is greater than maxItems ${maxItems}`);
    }
    return { kind: "list", elementType: type.elementType, minItems, maxItems };
  }

  return type;
}
