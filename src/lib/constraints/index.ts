/**
 * Constraint & default compiler
 *
 * Each field is compiled once into a FieldPlan that does not depend on the
 * unit being generated; the plan is then applied inside a constructor, or
 * inside checkFields for the shared fields of a family root.
 */

import type { Field, LiteralValue, ModeledType, Union } from "../../types/type-model.js";
import { couldBeNull, isNumericType, isUnionRef, unwrapNullable } from "../model/index.js";
import type { NameResolver } from "../naming/index.js";
import type { EmitContext, TypeMapper } from "../type-mapper/index.js";
import type { CodeWriter } from "../emitter/code-writer.js";
import { SchemaContractError, assertContract } from "../../utils/errors.js";

export interface UnionDefault {
  readonly union: Union;
  readonly tag: string;
}

export interface FieldPlan {
  readonly field: Field;
  readonly paramName: string;
  readonly memberName: string;
  readonly nullable: boolean;
  /** Reject null with ArgumentNullError before any range check */
  readonly nullCheck: boolean;
  /** Local holding the copied list, when the field is a list */
  readonly listCopy?: string;
  /** Conditions that each mean the value is out of range */
  readonly violations: readonly string[];
  /** Literal used as the parameter default */
  readonly literalDefault?: string;
  readonly unionDefault?: UnionDefault;
  /** Expression stored in the property once validation passes */
  readonly storedValue: string;
}

export class ConstraintCompiler {
  constructor(
    private readonly names: NameResolver,
    private readonly mapper: TypeMapper,
  ) {}

  compileFieldPlan(field: Field): FieldPlan {
    const paramName = this.names.argName(field.name);
    const nullable = field.type.kind === "nullable";
    const type = unwrapNullable(field.type);

    let literalDefault: string | undefined;
    let unionDefault: UnionDefault | undefined;
    if (field.default) {
      if (field.default.kind === "tag") {
        unionDefault = this.checkUnionDefault(field, type, field.default.union, field.default.tag);
      } else {
        literalDefault = this.checkLiteralDefault(field, type, field.default.value);
      }
    }

    // Generator locals start with `$`; a suffix keeps copies out of that space
    const listCopy = type.kind === "list" ? `${paramName}$list` : undefined;
    const subject = listCopy ?? paramName;

    return {
      field,
      paramName,
      memberName: this.names.memberName(field.name),
      nullable,
      nullCheck: !nullable && field.default === undefined && couldBeNull(type),
      listCopy,
      violations: this.violations(subject, type),
      literalDefault,
      unionDefault,
      storedValue: subject,
    };
  }

  /**
   * Emit the checks for one field. Parameters with a union default are
   * reassigned before anything else reads them.
   */
  emitFieldValidation(writer: CodeWriter, plan: FieldPlan, ctx: EmitContext): void {
    const { paramName } = plan;
    let emitted = false;

    if (plan.unionDefault) {
      const fallback = this.unionDefaultValue(plan.unionDefault, ctx);
      writer.line(`if (${paramName} == null) ${paramName} = ${fallback};`);
      emitted = true;
    }

    if (plan.listCopy) {
      writer.line(`const ${plan.listCopy} = Array.from(${paramName} ?? []);`);
      emitted = true;
    }

    const branches: [string, string][] = [];
    if (plan.nullCheck) {
      branches.push([
        `${paramName} == null`,
        `throw new $rt.ArgumentNullError(${JSON.stringify(paramName)});`,
      ]);
    }
    if (plan.violations.length > 0) {
      const checks = plan.violations.join(" || ");
      branches.push([
        plan.nullable ? `${paramName} != null && (${checks})` : checks,
        `throw new $rt.ArgumentOutOfRangeError(${JSON.stringify(paramName)});`,
      ]);
    }

    branches.forEach(([condition, statement], index) => {
      writer.line(`${index === 0 ? "if" : "} else if"} (${condition}) {`);
      writer.indented(() => writer.line(statement));
    });
    if (branches.length > 0) {
      writer.line("}");
      emitted = true;
    }

    if (emitted) {
      writer.line();
    }
  }

  /**
   * Value a field starts with when an instance is created for decoding
   */
  emptyValue(plan: FieldPlan, ctx: EmitContext): string | undefined {
    if (plan.unionDefault) {
      return this.unionDefaultValue(plan.unionDefault, ctx);
    }
    if (plan.literalDefault !== undefined) {
      return plan.literalDefault;
    }
    return this.mapper.zeroValue(plan.field.type);
  }

  private unionDefaultValue(value: UnionDefault, ctx: EmitContext): string {
    return `${this.mapper.valueRef(value.union, ctx)}.${this.names.publicName(value.tag)}.instance`;
  }

  private violations(subject: string, type: ModeledType): string[] {
    const checks: string[] = [];

    if (isNumericType(type)) {
      if (type.minValue !== undefined) {
        checks.push(`${subject} < ${this.mapper.formatLiteral(type.minValue, type)}`);
      }
      if (type.maxValue !== undefined) {
        checks.push(`${subject} > ${this.mapper.formatLiteral(type.maxValue, type)}`);
      }
    } else if (type.kind === "string") {
      if (type.minLength !== undefined) {
        checks.push(`${subject}.length < ${type.minLength}`);
      }
      if (type.maxLength !== undefined) {
        checks.push(`${subject}.length > ${type.maxLength}`);
      }
      if (type.pattern !== undefined) {
        checks.push(`!new RegExp(${JSON.stringify(type.pattern)}).test(${subject})`);
      }
    } else if (type.kind === "list") {
      if (type.minItems !== undefined) {
        checks.push(`${subject}.length < ${type.minItems}`);
      }
      if (type.maxItems !== undefined) {
        checks.push(`${subject}.length > ${type.maxItems}`);
      }
    }

    return checks;
  }

  private checkUnionDefault(field: Field, type: ModeledType, union: Union, tag: string): UnionDefault {
    assertContract(
      isUnionRef(type) && type.target === union,
      `Field "${field.name}" has a tag default but is not of union type "${union.name}"`,
    );
    const variant = union.fields.find((candidate) => candidate.name === tag);
    assertContract(
      variant !== undefined && variant.type.kind === "void",
      `Default "${tag}" of field "${field.name}" is not a void variant of "${union.name}"`,
    );
    return { union, tag };
  }

  private checkLiteralDefault(field: Field, type: ModeledType, value: LiteralValue): string {
    switch (type.kind) {
      case "composite":
        throw new SchemaContractError(
          `Field "${field.name}" declares a literal default on composite type "${type.target.name}"`,
        );
      case "list":
      case "binary":
      case "timestamp":
      case "void":
        throw new SchemaContractError(
          `Field "${field.name}" declares a default, which type "${type.kind}" does not support`,
        );
      default:
        return this.mapper.formatLiteral(value, type);
    }
  }
}
