/**
 * Loader module - reads a type model document and resolves it into the
 * read-only model the synthesizers consume
 */

import { readFile } from "fs/promises";
import { extname } from "path";
import { parse as parseYaml } from "yaml";
import type {
  Api,
  DataType,
  DefaultValue,
  Field,
  ModeledType,
  Namespace,
  StructSubtype,
  Union,
  UnionField,
} from "../../types/type-model.js";
import { allFields, isNumericType, unwrapNullable } from "../model/index.js";
import { NameResolver } from "../naming/index.js";
import { SchemaValidator } from "../validator/index.js";
import { FileIOError, ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { applyConstraints, resolveTypeSpec, type CompositeLookup } from "./type-refs.js";
import type {
  DocumentFormat,
  FieldDocument,
  NamespaceDocument,
  StructDocument,
  TypeModelDocument,
  UnionDocument,
} from "./types.js";
import typeModelSchema from "./type-model.schema.json" with { type: "json" };

export * from "./types.js";
export { parseTypeRef, resolveTypeSpec, applyConstraints } from "./type-refs.js";

/**
 * Mutable counterparts of the model types, filled in over several passes.
 * They satisfy the read-only interfaces once resolution is complete.
 */
interface StructDraft {
  kind: "struct";
  name: string;
  namespace: string;
  doc?: string;
  fields: Field[];
  parent?: StructDraft;
  subtypes?: StructSubtype[];
  isCatchAll: boolean;
}

interface UnionDraft {
  kind: "union";
  name: string;
  namespace: string;
  doc?: string;
  fields: UnionField[];
  catchAllField?: UnionField;
}

type Draft = StructDraft | UnionDraft;

interface Entry<D extends Draft, S> {
  draft: D;
  source: S;
}

const INTEGER_TEXT = /^-?\d+$/;

let documentValidator: SchemaValidator<TypeModelDocument> | undefined;

function getDocumentValidator(): SchemaValidator<TypeModelDocument> {
  documentValidator ??= new SchemaValidator<TypeModelDocument>(typeModelSchema);
  return documentValidator;
}

export function detectFormat(filePath: string): DocumentFormat {
  const extension = extname(filePath).toLowerCase();
  if (extension === ".yaml" || extension === ".yml") {
    return "yaml";
  }
  if (extension === ".json") {
    return "json";
  }
  throw new ValidationError(
    `Unsupported type model format: ${filePath}. Must be .json, .yaml, or .yml`,
  );
}

/**
 * Read, validate and resolve a type model file
 */
export async function loadTypeModel(filePath: string): Promise<Api> {
  const format = detectFormat(filePath);

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read type model: ${filePath}`, { filePath }, { cause: error });
  }

  logger.info("Loading type model", { filePath, format });
  return parseTypeModel(content, format, filePath);
}

/**
 * Parse and resolve a type model from text
 */
export function parseTypeModel(content: string, format: DocumentFormat, origin = "type model"): Api {
  let document: unknown;
  try {
    document = format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Failed to parse ${origin}`, undefined, { cause: error });
  }
  return resolveTypeModel(document, origin);
}

/**
 * Check a parsed document against the type model schema and resolve it
 *
 * @throws ValidationError listing the schema violations, or naming the first
 * semantic problem found
 */
export function resolveTypeModel(document: unknown, origin = "type model"): Api {
  const validator = getDocumentValidator();
  if (!validator.validate(document)) {
    const violations = validator.getErrors();
    throw new ValidationError(`${origin} does not match the type model schema`, { violations });
  }

  const api = new ModelResolver(document).resolve();
  logger.debug("Type model resolved", {
    namespaces: api.namespaces.length,
    types: api.namespaces.reduce((total, namespace) => total + namespace.dataTypes.length, 0),
  });
  return api;
}

class ModelResolver {
  private readonly names = new NameResolver();
  private readonly types = new Map<string, Draft>();
  private readonly structs: Entry<StructDraft, StructDocument>[] = [];
  private readonly unions: Entry<UnionDraft, UnionDocument>[] = [];

  constructor(private readonly document: TypeModelDocument) {}

  resolve(): Api {
    this.checkDistinct(
      this.document.namespaces.map((namespace) => namespace.name),
      "namespaces",
    );
    const namespaces = this.document.namespaces.map((namespace) => this.declare(namespace));

    for (const entry of this.unions) {
      this.resolveUnion(entry);
    }
    for (const entry of this.structs) {
      this.resolveParent(entry);
    }
    for (const entry of this.structs) {
      this.resolveSubtypes(entry);
    }
    for (const entry of this.structs) {
      this.checkFamily(entry.draft);
    }
    for (const entry of this.structs) {
      this.resolveFields(entry);
    }
    for (const entry of this.structs) {
      this.checkDistinct(
        allFields(entry.draft).map((field) => field.name),
        `fields of struct "${entry.draft.name}"`,
      );
    }

    return { namespaces };
  }

  /**
   * First pass: register every type so references can be resolved in any order
   */
  private declare(source: NamespaceDocument): Namespace {
    const dataTypes: DataType[] = [];

    this.checkDistinct(
      source.types.map((type) => type.name),
      `types of namespace "${source.name}"`,
    );

    for (const type of source.types) {
      const key = `${source.name}.${type.name}`;
      let draft: Draft;
      if (type.kind === "struct") {
        const struct: StructDraft = {
          kind: "struct",
          name: type.name,
          namespace: source.name,
          doc: type.doc,
          fields: [],
          isCatchAll: false,
        };
        this.structs.push({ draft: struct, source: type });
        draft = struct;
      } else {
        const union: UnionDraft = {
          kind: "union",
          name: type.name,
          namespace: source.name,
          doc: type.doc,
          fields: [],
        };
        this.unions.push({ draft: union, source: type });
        draft = union;
      }
      this.types.set(key, draft);
      dataTypes.push(draft);
    }

    return { name: source.name, doc: source.doc, dataTypes };
  }

  private find(ref: string, namespace: string): Draft | undefined {
    return this.types.get(ref.includes(".") ? ref : `${namespace}.${ref}`);
  }

  private lookupFrom(namespace: string): CompositeLookup {
    return (ref) => this.find(ref, namespace);
  }

  private requireStruct(ref: string, namespace: string, where: string): StructDraft {
    const target = this.find(ref, namespace);
    if (!target) {
      throw new ValidationError(`${where}: unknown type "${ref}"`);
    }
    if (target.kind !== "struct") {
      throw new ValidationError(`${where}: "${ref}" is a union, not a struct`);
    }
    return target;
  }

  private resolveUnion({ draft, source }: Entry<UnionDraft, UnionDocument>): void {
    const lookup = this.lookupFrom(draft.namespace);

    this.checkDistinct(
      source.variants.map((variant) => variant.name),
      `variants of union "${draft.name}"`,
    );

    for (const variant of source.variants) {
      const where = `${draft.namespace}.${draft.name}.${variant.name}`;
      const type: ModeledType =
        variant.type === undefined ? { kind: "void" } : resolveTypeSpec(variant.type, lookup, where);

      if (type.kind === "nullable") {
        throw new ValidationError(`${where}: union variants cannot be nullable`);
      }
      this.checkValueType(type, where);
      draft.fields.push({ name: variant.name, type, doc: variant.doc });
    }

    if (source.catchAll !== undefined) {
      const catchAll = draft.fields.find((field) => field.name === source.catchAll);
      if (!catchAll) {
        throw new ValidationError(
          `${draft.namespace}.${draft.name}: catch-all "${source.catchAll}" is not a variant`,
        );
      }
      if (catchAll.type.kind !== "void") {
        throw new ValidationError(
          `${draft.namespace}.${draft.name}: catch-all "${source.catchAll}" must be void`,
        );
      }
      draft.catchAllField = catchAll;
    }
  }

  private resolveParent({ draft, source }: Entry<StructDraft, StructDocument>): void {
    if (source.extends === undefined) {
      return;
    }
    const where = `${draft.namespace}.${draft.name}`;
    draft.parent = this.requireStruct(source.extends, draft.namespace, where);

    const seen = new Set<StructDraft>([draft]);
    for (let current: StructDraft | undefined = draft.parent; current; current = current.parent) {
      if (seen.has(current)) {
        throw new ValidationError(`${where}: circular inheritance through "${current.name}"`);
      }
      seen.add(current);
    }
  }

  private resolveSubtypes({ draft, source }: Entry<StructDraft, StructDocument>): void {
    const where = `${draft.namespace}.${draft.name}`;
    const listed = source.subtypes ?? [];

    if (listed.length === 0 && source.catchAll === undefined) {
      return;
    }

    this.checkDistinct(
      listed.map((subtype) => subtype.tag),
      `subtype tags of struct "${draft.name}"`,
      false,
    );

    const subtypes: StructSubtype[] = listed.map((subtype) => ({
      tag: subtype.tag,
      struct: this.requireStruct(subtype.type, draft.namespace, where),
    }));

    if (source.catchAll !== undefined) {
      const catchAll = this.requireStruct(source.catchAll, draft.namespace, where);
      if (subtypes.some((subtype) => subtype.struct === catchAll)) {
        throw new ValidationError(`${where}: catch-all "${source.catchAll}" must not also carry a tag`);
      }
      catchAll.isCatchAll = true;
      if (catchAll !== draft) {
        subtypes.push({ tag: "", struct: catchAll });
      }
    }

    if (subtypes.length === 0) {
      throw new ValidationError(`${where}: a catch-all root needs at least one tagged subtype`);
    }

    for (const subtype of subtypes) {
      if (subtype.struct.parent !== draft) {
        throw new ValidationError(
          `${where}: subtype "${subtype.struct.name}" does not extend "${draft.name}"`,
        );
      }
    }
    draft.subtypes = subtypes;
  }

  /**
   * Families are one level deep and every child is enumerated by its parent
   */
  private checkFamily(struct: StructDraft): void {
    const where = `${struct.namespace}.${struct.name}`;
    const parent = struct.parent;
    if (!parent) {
      return;
    }
    if (!parent.subtypes || parent.subtypes.length === 0) {
      throw new ValidationError(`${where}: parent "${parent.name}" does not enumerate subtypes`);
    }
    if (!parent.subtypes.some((subtype) => subtype.struct === struct)) {
      throw new ValidationError(`${where}: "${parent.name}" does not list it as a subtype`);
    }
    if (struct.subtypes && struct.subtypes.length > 0) {
      throw new ValidationError(`${where}: nested families are not supported`);
    }
  }

  private resolveFields({ draft, source }: Entry<StructDraft, StructDocument>): void {
    const lookup = this.lookupFrom(draft.namespace);
    for (const field of source.fields ?? []) {
      draft.fields.push(this.resolveField(field, lookup, `${draft.namespace}.${draft.name}.${field.name}`));
    }
  }

  private resolveField(source: FieldDocument, lookup: CompositeLookup, where: string): Field {
    const type = applyConstraints(resolveTypeSpec(source.type, lookup, where), source, where);

    if (type.kind === "void") {
      throw new ValidationError(`${where}: struct fields cannot be void`);
    }
    if (type.kind === "nullable" && type.innerType.kind === "nullable") {
      throw new ValidationError(`${where}: nullable types cannot be nested`);
    }
    this.checkValueType(unwrapNullable(type), where);

    return {
      name: source.name,
      type,
      default: source.default === undefined ? undefined : this.resolveDefault(source.default, type, where),
      doc: source.doc,
    };
  }

  /**
   * Lists hold scalars or composites only
   */
  private checkValueType(type: ModeledType, where: string): void {
    if (type.kind !== "list") {
      return;
    }
    const element = type.elementType.kind;
    if (element === "list" || element === "nullable" || element === "void") {
      throw new ValidationError(`${where}: lists cannot hold "${element}" elements`);
    }
  }

  private resolveDefault(value: boolean | number | string, fieldType: ModeledType, where: string): DefaultValue {
    const type = unwrapNullable(fieldType);

    switch (type.kind) {
      case "composite": {
        const target = type.target;
        if (target.kind === "struct") {
          throw new ValidationError(`${where}: struct-typed fields cannot declare a default`);
        }
        if (typeof value !== "string") {
          throw new ValidationError(`${where}: the default of a union field must name a variant`);
        }
        return { kind: "tag", union: target, tag: this.checkDefaultTag(target, value, where) };
      }
      case "list":
      case "binary":
      case "timestamp":
      case "void":
        throw new ValidationError(`${where}: "${type.kind}" fields cannot declare a default`);
      case "bool":
        if (typeof value !== "boolean") {
          throw new ValidationError(`${where}: default must be a boolean`);
        }
        return { kind: "literal", value };
      case "string":
        if (typeof value !== "string") {
          throw new ValidationError(`${where}: default must be a string`);
        }
        return { kind: "literal", value };
      default:
        return { kind: "literal", value: this.numericDefault(value, type, where) };
    }
  }

  private checkDefaultTag(union: Union, tag: string, where: string): string {
    const variant = union.fields.find((field) => field.name === tag);
    if (!variant) {
      throw new ValidationError(`${where}: "${tag}" is not a variant of union "${union.name}"`);
    }
    if (variant.type.kind !== "void") {
      throw new ValidationError(`${where}: default variant "${tag}" carries a value`);
    }
    return tag;
  }

  private numericDefault(value: boolean | number | string, type: ModeledType, where: string): number | bigint {
    const mismatch = new ValidationError(`${where}: default ${String(value)} does not match type "${type.kind}"`);
    if (!isNumericType(type)) {
      throw mismatch;
    }

    if (type.kind === "int64" || type.kind === "uint64") {
      if (typeof value === "string" && INTEGER_TEXT.test(value)) {
        return BigInt(value);
      }
      if (typeof value === "number" && Number.isInteger(value)) {
        if (!Number.isSafeInteger(value)) {
          throw new ValidationError(
            `${where}: default ${value} lost precision when parsed; write 64-bit values as decimal text`,
          );
        }
        return BigInt(value);
      }
      throw mismatch;
    }

    if (typeof value !== "number") {
      throw mismatch;
    }
    if ((type.kind === "int32" || type.kind === "uint32") && !Number.isInteger(value)) {
      throw mismatch;
    }
    return value;
  }

  /**
   * Raw names that differ but would generate the same identifier
   */
  private checkDistinct(rawNames: readonly string[], what: string, segmentNames = true): void {
    const seen = new Map<string, string>();
    for (const raw of rawNames) {
      const key = segmentNames ? this.names.publicName(raw) : raw;
      const previous = seen.get(key);
      if (previous !== undefined) {
        throw new ValidationError(
          previous === raw
            ? `Duplicate name "${raw}" among ${what}`
            : `"${previous}" and "${raw}" among ${what} produce the same identifier "${key}"`,
        );
      }
      seen.set(key, raw);
    }
  }
}
