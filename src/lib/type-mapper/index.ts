/**
 * Type mapper - modeled types to TypeScript type expressions
 */

import type {
  DataType,
  LiteralValue,
  ModeledType,
  NumericKind,
} from "../../types/type-model.js";
import type { ScalarKind } from "../../runtime/scalars.js";
import { hasEnumeratedSubtypes, isNumericType } from "../model/index.js";
import { NameResolver, NameScope } from "../naming/index.js";
import { SchemaContractError } from "../../utils/errors.js";
import { ImportSet } from "./imports.js";

export * from "./imports.js";

/**
 * Where a type expression will appear. Lists are mutable arrays when stored
 * and any iterable when accepted as an argument; void is only representable
 * as a value through the runtime's Empty placeholder.
 */
export type TypeUsage = "property" | "parameter" | "value";

/**
 * Call-local state for the unit being generated
 */
export interface EmitContext {
  /** Raw name of the namespace that owns the unit */
  readonly namespace: string;
  /** Public name of the unit's own type */
  readonly moduleName: string;
  readonly scope: NameScope;
  readonly imports: ImportSet;
}

export function createEmitContext(namespace: string, moduleName: string): EmitContext {
  return {
    namespace,
    moduleName,
    scope: NameScope.EMPTY,
    imports: new ImportSet(),
  };
}

/**
 * Same unit, with extra locally declared names in scope
 */
export function withLocalNames(ctx: EmitContext, names: Iterable<string>): EmitContext {
  return { ...ctx, scope: ctx.scope.with(names) };
}

const NUMERIC_TYPE_NAMES: Record<NumericKind, string> = {
  int32: "number",
  uint32: "number",
  int64: "bigint",
  uint64: "bigint",
  float32: "number",
  float64: "number",
};

/**
 * Suffix that pins a literal to its numeric kind
 */
const LITERAL_SUFFIXES: Record<NumericKind, string> = {
  int32: "",
  uint32: "",
  int64: "n",
  uint64: "n",
  float32: "",
  float64: "",
};

export class TypeMapper {
  constructor(private readonly names: NameResolver) {}

  /**
   * Type expression for a modeled type, registering any imports it needs
   */
  typeName(type: ModeledType, ctx: EmitContext, usage: TypeUsage = "property"): string {
    switch (type.kind) {
      case "nullable": {
        const inner = this.typeName(type.innerType, ctx, usage);
        // stored lists are never null
        if (type.innerType.kind === "list" && usage === "property") {
          return inner;
        }
        return `${inner} | null`;
      }
      case "composite":
        return this.compositeName(type.target, ctx, "type");
      case "list": {
        const element = this.typeName(type.elementType, ctx, "property");
        if (usage === "parameter") {
          return `Iterable<${element}>`;
        }
        return element.includes(" ") ? `(${element})[]` : `${element}[]`;
      }
      case "string":
        return "string";
      case "binary":
        return "Uint8Array";
      case "timestamp":
        return "Date";
      case "bool":
        return "boolean";
      case "void":
        return usage === "value" ? "$rt.Empty" : "void";
      default:
        return NUMERIC_TYPE_NAMES[type.kind];
    }
  }

  /**
   * Expression naming the class or namespace that carries a composite's
   * encode/decode functions
   */
  valueRef(dataType: DataType, ctx: EmitContext): string {
    return this.qualify(dataType, this.names.publicName(dataType.name), ctx, "value");
  }

  /**
   * Short type name: a family root is referred to through its variant union
   */
  compositeName(dataType: DataType, ctx: EmitContext, usage: "type" | "value"): string {
    const publicName = this.names.publicName(dataType.name);
    const shortName =
      dataType.kind === "struct" && hasEnumeratedSubtypes(dataType)
        ? `${publicName}Variant`
        : publicName;
    return this.qualify(dataType, shortName, ctx, usage);
  }

  /**
   * Another export of a composite's module, such as a family root's shared
   * field interface
   */
  exportRef(dataType: DataType, exportName: string, ctx: EmitContext, usage: "type" | "value"): string {
    return this.qualify(dataType, exportName, ctx, usage);
  }

  /**
   * Alias under which a namespace barrel is imported
   */
  namespaceAlias(namespace: string): string {
    return `$${this.names.argName(namespace)}`;
  }

  wireKind(type: ModeledType): ScalarKind {
    switch (type.kind) {
      case "bool":
      case "string":
      case "binary":
      case "timestamp":
      case "int32":
      case "uint32":
      case "int64":
      case "uint64":
      case "float32":
      case "float64":
        return type.kind;
      default:
        throw new SchemaContractError(`Type "${type.kind}" has no scalar wire kind`);
    }
  }

  literalSuffix(type: ModeledType): string {
    return isNumericType(type) ? LITERAL_SUFFIXES[type.kind] : "";
  }

  /**
   * Render a default or bound so that it is typed unambiguously
   */
  formatLiteral(value: LiteralValue, type: ModeledType): string {
    if (type.kind === "nullable") {
      return this.formatLiteral(value, type.innerType);
    }
    if (type.kind === "bool" && typeof value === "boolean") {
      return value ? "true" : "false";
    }
    if (type.kind === "string" && typeof value === "string") {
      return JSON.stringify(value);
    }
    if (isNumericType(type) && (typeof value === "number" || typeof value === "bigint")) {
      return `${value}${this.literalSuffix(type)}`;
    }
    throw new SchemaContractError(
      `Literal ${String(value)} cannot be rendered as type "${type.kind}"`,
    );
  }

  /**
   * Value a field holds before decoding fills it in, when one exists
   */
  zeroValue(type: ModeledType): string | undefined {
    if (type.kind === "nullable") {
      return type.innerType.kind === "list" ? "[]" : "null";
    }
    if (type.kind === "list") {
      return "[]";
    }
    return undefined;
  }

  private qualify(
    dataType: DataType,
    shortName: string,
    ctx: EmitContext,
    usage: "type" | "value",
  ): string {
    if (dataType.namespace !== ctx.namespace) {
      const alias = this.namespaceAlias(dataType.namespace);
      ctx.imports.addNamespace(alias, `../${dataType.namespace}/index.js`);
      return `${alias}.${shortName}`;
    }

    if (ctx.scope.has(shortName)) {
      const alias = this.namespaceAlias(ctx.namespace);
      ctx.imports.addNamespace(alias, "./index.js");
      return `${alias}.${shortName}`;
    }

    const moduleName = this.names.publicName(dataType.name);
    if (moduleName !== ctx.moduleName) {
      ctx.imports.addNamed(moduleName, shortName, usage);
    }
    return shortName;
  }
}
