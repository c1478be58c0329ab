/**
 * Struct synthesizer
 *
 * Emits one class per struct. Members of a tagged family share their
 * parent's fields by composition: the root module exports the shared field
 * interface, the variant union and a checkFields() validator that every
 * member's constructor calls.
 */

import type { Struct } from "../../types/type-model.js";
import { allFields, holdsTimestamp } from "../model/index.js";
import { familyRoot, structTag, catchAllMember, taggedSubtypes, CATCH_ALL_TAG } from "../hierarchy/index.js";
import type { FieldPlan } from "../constraints/index.js";
import type { EmitContext } from "../type-mapper/index.js";
import { CodeWriter } from "../emitter/code-writer.js";
import { TIMESTAMP_PRECISION_NOTE, decodeExpression, encodeStatement } from "./fields.js";
import { renderSignature } from "./signature.js";
import type { SynthesisTools } from "./types.js";
import { assertContract } from "../../utils/errors.js";

/**
 * Role of a struct within its family, resolved once per unit
 */
type FamilyRole =
  | { readonly kind: "plain" }
  | { readonly kind: "root"; readonly instantiable: boolean }
  | { readonly kind: "member"; readonly root: Struct; readonly tag: string };

export class StructSynthesizer {
  constructor(private readonly tools: SynthesisTools) {}

  synthesize(struct: Struct, ctx: EmitContext, related: readonly string[]): string {
    const writer = new CodeWriter();
    const role = this.resolveRole(struct);
    const className = this.tools.names.publicName(struct.name);
    const plans = allFields(struct).map((field) => this.tools.constraints.compileFieldPlan(field));

    if (role.kind === "root") {
      this.emitFamilyDeclarations(writer, struct, ctx, plans);
    }

    const docLines = [struct.doc ?? `The ${this.tools.names.nameWords(struct.name)} object`];
    if (related.length > 0) {
      docLines.push("", ...related.map((name) => `@see ${name}`));
    }
    writer.docComment(docLines);

    let declaration = `export class ${className}`;
    if (role.kind === "root") {
      declaration += ` implements ${className}Fields`;
    } else if (role.kind === "member") {
      declaration += ` implements ${this.rootExport(role.root, "Fields", ctx, "type")}`;
    }

    writer.block(declaration, () => {
      this.emitConstructor(writer, struct, role, plans, ctx);

      if (plans.length > 0 && !(role.kind === "root" && !role.instantiable)) {
        writer.line();
        this.emitCreateEmpty(writer, className, plans, ctx);
      }

      if (role.kind === "root") {
        this.emitSubtypeHelpers(writer, struct, ctx);
      }

      const tag = this.memberTag(role);
      if (tag !== undefined) {
        writer.line();
        writer.docComment(["Discriminant of this family member"]);
        writer.block(`get $tag(): ${JSON.stringify(tag)}`, () => {
          writer.line(`return ${JSON.stringify(tag)};`);
        });
      }

      for (const plan of plans) {
        writer.line();
        writer.docComment([
          plan.field.doc ??
            `The ${this.tools.names.nameWords(plan.field.name)} of the ${this.tools.names.nameWords(struct.name)}`,
          ...(holdsTimestamp(plan.field.type) ? ["", TIMESTAMP_PRECISION_NOTE] : []),
        ]);
        writer.line(`${plan.memberName}: ${this.tools.mapper.typeName(plan.field.type, ctx, "property")};`);
      }

      writer.line();
      writer.line("// #region Encoding");
      writer.line();
      this.emitEncode(writer, struct, role, plans, ctx);
      writer.line();
      this.emitDecode(writer, struct, role, plans, ctx);
      writer.line();
      writer.line("// #endregion");
    });

    return writer.toString();
  }

  private resolveRole(struct: Struct): FamilyRole {
    const root = familyRoot(struct);
    if (!root) {
      assertContract(!struct.isCatchAll, `Struct "${struct.name}" is a catch-all outside any family`);
      return { kind: "plain" };
    }
    if (root === struct) {
      return { kind: "root", instantiable: struct.isCatchAll };
    }

    const tag = structTag(struct);
    assertContract(tag.kind !== "none", `Struct "${struct.name}" has no tag within its family`);
    return { kind: "member", root, tag: tag.kind === "fixed" ? tag.tag : CATCH_ALL_TAG };
  }

  private memberTag(role: FamilyRole): string | undefined {
    if (role.kind === "member") {
      return role.tag;
    }
    if (role.kind === "root" && role.instantiable) {
      return CATCH_ALL_TAG;
    }
    return undefined;
  }

  private rootExport(root: Struct, suffix: string, ctx: EmitContext, usage: "type" | "value"): string {
    return this.tools.mapper.exportRef(root, `${this.tools.names.publicName(root.name)}${suffix}`, ctx, usage);
  }

  /**
   * Shared field interface and the union of concrete members
   */
  private emitFamilyDeclarations(
    writer: CodeWriter,
    root: Struct,
    ctx: EmitContext,
    plans: readonly FieldPlan[],
  ): void {
    const className = this.tools.names.publicName(root.name);
    const words = this.tools.names.nameWords(root.name);

    writer.docComment([`Fields shared by every member of the ${words} family`]);
    writer.block(`export interface ${className}Fields`, () => {
      for (const plan of plans) {
        writer.line(`${plan.memberName}: ${this.tools.mapper.typeName(plan.field.type, ctx, "property")};`);
      }
    });
    writer.line();

    const members: string[] = [];
    if (root.isCatchAll) {
      members.push(className);
    }
    for (const subtype of root.subtypes ?? []) {
      members.push(this.tools.mapper.compositeName(subtype.struct, ctx, "value"));
    }
    writer.docComment([`Concrete members of the ${words} family`]);
    writer.line(`export type ${className}Variant = ${members.join(" | ")};`);
    writer.line();
  }

  private parameterList(plans: readonly FieldPlan[], ctx: EmitContext): string[] {
    return plans.map((plan) => {
      const type = this.tools.mapper.typeName(plan.field.type, ctx, "parameter");
      if (plan.unionDefault) {
        return plan.nullable ? `${plan.paramName}: ${type} = null` : `${plan.paramName}: ${type} | null = null`;
      }
      if (plan.literalDefault !== undefined) {
        return `${plan.paramName}: ${type} = ${plan.literalDefault}`;
      }
      if (plan.nullable) {
        return `${plan.paramName}: ${type} = null`;
      }
      return `${plan.paramName}: ${type}`;
    });
  }

  private paramDocs(plans: readonly FieldPlan[]): string[] {
    return plans.map(
      (plan) => `@param ${plan.paramName} ${plan.field.doc ?? `The ${this.tools.names.nameWords(plan.field.name)}`}`,
    );
  }

  private emitConstructor(
    writer: CodeWriter,
    struct: Struct,
    role: FamilyRole,
    plans: readonly FieldPlan[],
    ctx: EmitContext,
  ): void {
    const className = this.tools.names.publicName(struct.name);
    const access = role.kind === "root" && !role.instantiable ? "protected " : "";

    writer.docComment([
      `Initializes a new instance of the {@link ${className}} class`,
      ...(plans.length > 0 ? ["", ...this.paramDocs(plans)] : []),
    ]);

    const signature = renderSignature(`${access}constructor`, this.parameterList(plans, ctx));

    if (role.kind === "plain") {
      writer.block(signature, () => {
        for (const plan of plans) {
          this.tools.constraints.emitFieldValidation(writer, plan, ctx);
        }
        for (const plan of plans) {
          writer.line(`this.${plan.memberName} = ${plan.storedValue};`);
        }
      });
      return;
    }

    const root = role.kind === "root" ? struct : role.root;
    const sharedCount = root.fields.length;
    const shared = plans.slice(0, sharedCount);
    const own = plans.slice(sharedCount);
    const checkFields = role.kind === "root" ? className : this.rootExport(root, "", ctx, "value");

    if (plans.length === 0) {
      writer.line(`${signature} {}`);
      return;
    }

    writer.block(signature, () => {
      if (shared.length > 0) {
        const args = shared.map((plan) => plan.paramName).join(", ");
        writer.line(`const $parent = ${checkFields}.checkFields(${args});`);
        writer.line();
      }
      for (const plan of own) {
        this.tools.constraints.emitFieldValidation(writer, plan, ctx);
      }
      for (const plan of shared) {
        writer.line(`this.${plan.memberName} = $parent.${plan.memberName};`);
      }
      for (const plan of own) {
        writer.line(`this.${plan.memberName} = ${plan.storedValue};`);
      }
    });

    if (role.kind === "root") {
      writer.line();
      this.emitCheckFields(writer, struct, plans, ctx);
    }
  }

  /**
   * Validates the shared fields once for whichever member is being built
   */
  private emitCheckFields(
    writer: CodeWriter,
    root: Struct,
    plans: readonly FieldPlan[],
    ctx: EmitContext,
  ): void {
    const className = this.tools.names.publicName(root.name);
    writer.docComment([
      `Validates the fields shared by the ${this.tools.names.nameWords(root.name)} family`,
      "",
      ...this.paramDocs(plans),
      "@returns The validated fields, with lists copied",
    ]);
    const signature = renderSignature("static checkFields", this.parameterList(plans, ctx));
    writer.block(`${signature}: ${className}Fields`, () => {
      for (const plan of plans) {
        this.tools.constraints.emitFieldValidation(writer, plan, ctx);
      }
      const entries = plans.map((plan) =>
        plan.storedValue === plan.memberName ? plan.memberName : `${plan.memberName}: ${plan.storedValue}`,
      );
      writer.line(`return { ${entries.join(", ")} };`);
    });
  }

  private emitCreateEmpty(
    writer: CodeWriter,
    className: string,
    plans: readonly FieldPlan[],
    ctx: EmitContext,
  ): void {
    writer.docComment([
      `Creates a {@link ${className}} without running the constructor's checks`,
      "",
      "Defaulted fields hold their default, lists are empty and nullable fields",
      "are null. Everything else is left for the decoder to fill in.",
    ]);
    writer.block(`static createEmpty(): ${className}`, () => {
      writer.line(`const instance: ${className} = Object.create(${className}.prototype);`);
      for (const plan of plans) {
        const value = this.tools.constraints.emptyValue(plan, ctx);
        if (value !== undefined) {
          writer.line(`instance.${plan.memberName} = ${value};`);
        }
      }
      writer.line("return instance;");
    });
  }

  /**
   * isX/asX helpers for each subtype of a family root
   */
  private emitSubtypeHelpers(writer: CodeWriter, root: Struct, ctx: EmitContext): void {
    const className = this.tools.names.publicName(root.name);
    const variant = `${className}Variant`;

    for (const subtype of root.subtypes ?? []) {
      const subtypeName = this.tools.names.publicName(subtype.struct.name);
      const ref = this.tools.mapper.compositeName(subtype.struct, ctx, "value");
      const tag = subtype.struct.isCatchAll ? CATCH_ALL_TAG : subtype.tag;

      writer.line();
      writer.docComment([`Whether the value is a {@link ${subtypeName}}`]);
      writer.block(`static is${subtypeName}(value: ${variant}): value is ${ref}`, () => {
        writer.line(`return value.$tag === ${JSON.stringify(tag)};`);
      });
      writer.line();
      writer.docComment([`The value as a {@link ${subtypeName}}, or null`]);
      writer.block(`static as${subtypeName}(value: ${variant}): ${ref} | null`, () => {
        writer.line(`return ${className}.is${subtypeName}(value) ? value : null;`);
      });
    }
  }

  private emitFieldEncoders(writer: CodeWriter, plans: readonly FieldPlan[], ctx: EmitContext): void {
    for (const plan of plans) {
      const { field } = plan;
      const accessor = `value.${plan.memberName}`;
      const statement = encodeStatement(this.tools, ctx, field.name, field.type, accessor);

      if (field.type.kind === "list" || (field.type.kind === "nullable" && field.type.innerType.kind === "list")) {
        writer.block(`if (${accessor}.length > 0)`, () => writer.line(statement));
      } else if (plan.nullable) {
        writer.block(`if (${accessor} != null)`, () => writer.line(statement));
      } else {
        writer.line(statement);
      }
    }
  }

  private emitFieldDecoders(writer: CodeWriter, plans: readonly FieldPlan[], ctx: EmitContext): void {
    for (const plan of plans) {
      const { field } = plan;
      const assignment = `instance.${plan.memberName} = ${decodeExpression(this.tools, ctx, field.name, field.type)};`;
      const isList =
        field.type.kind === "list" || (field.type.kind === "nullable" && field.type.innerType.kind === "list");

      if (plan.nullable || field.default !== undefined || isList) {
        writer.block(`if (reader.hasField(${JSON.stringify(field.name)}))`, () => writer.line(assignment));
      } else {
        writer.line(assignment);
      }
    }
  }

  /**
   * Statements that decode every field into a fresh instance and return it
   */
  private emitDecodeInstance(writer: CodeWriter, className: string, plans: readonly FieldPlan[], ctx: EmitContext): void {
    if (plans.length === 0) {
      writer.line(`return new ${className}();`);
      return;
    }
    writer.line(`const instance = ${className}.createEmpty();`);
    this.emitFieldDecoders(writer, plans, ctx);
    writer.line("return instance;");
  }

  private emitEncode(
    writer: CodeWriter,
    struct: Struct,
    role: FamilyRole,
    plans: readonly FieldPlan[],
    ctx: EmitContext,
  ): void {
    const className = this.tools.names.publicName(struct.name);
    const words = this.tools.names.nameWords(struct.name);
    const valueType = role.kind === "root" ? `${className}Variant` : className;

    writer.docComment([`Encodes a ${words} using the supplied writer`]);
    writer.block(`static encode(value: ${valueType}, writer: $rt.ObjectWriter): void`, () => {
      if (role.kind === "plain") {
        this.emitFieldEncoders(writer, plans, ctx);
        return;
      }
      if (role.kind === "member") {
        writer.line(`writer.addTag(${JSON.stringify(role.tag)});`);
        this.emitFieldEncoders(writer, plans, ctx);
        return;
      }

      writer.block("switch (value.$tag)", () => {
        for (const subtype of struct.subtypes ?? []) {
          const tag = subtype.struct.isCatchAll ? CATCH_ALL_TAG : subtype.tag;
          writer.line(`case ${JSON.stringify(tag)}:`);
          writer.indented(() => {
            writer.line(`${this.tools.mapper.valueRef(subtype.struct, ctx)}.encode(value, writer);`);
            writer.line("break;");
          });
        }
        writer.line("default:");
        writer.indented(() => {
          if (role.instantiable) {
            writer.line(`writer.addTag(${JSON.stringify(CATCH_ALL_TAG)});`);
            this.emitFieldEncoders(writer, plans, ctx);
            writer.line("break;");
          } else {
            writer.line(
              `throw new $rt.InvalidOperationError(${JSON.stringify(`Value is not a member of the ${className} family`)});`,
            );
          }
        });
      });
    });
  }

  private emitDecode(
    writer: CodeWriter,
    struct: Struct,
    role: FamilyRole,
    plans: readonly FieldPlan[],
    ctx: EmitContext,
  ): void {
    const className = this.tools.names.publicName(struct.name);
    const words = this.tools.names.nameWords(struct.name);

    if (role.kind !== "root") {
      writer.docComment([`Decodes a ${words} from the supplied reader`]);
      writer.block(`static decode(reader: $rt.ObjectReader): ${className}`, () => {
        this.emitDecodeInstance(writer, className, plans, ctx);
      });
      return;
    }

    writer.docComment([
      `Decodes a member of the ${words} family, chosen by the tag on the wire`,
      "",
      "@throws InvalidOperationError when the tag is unknown and the family is closed",
    ]);
    writer.block(`static decode(reader: $rt.ObjectReader): ${className}Variant`, () => {
      writer.line("const tag = reader.getUnionName();");
      writer.block("switch (tag)", () => {
        for (const subtype of taggedSubtypes(struct)) {
          writer.line(`case ${JSON.stringify(subtype.tag)}:`);
          writer.indented(() => {
            writer.line(`return ${this.tools.mapper.valueRef(subtype.struct, ctx)}.decode(reader);`);
          });
        }

        const catchAll = catchAllMember(struct);
        if (catchAll === struct) {
          writer.block("default:", () => this.emitDecodeInstance(writer, className, plans, ctx));
        } else if (catchAll) {
          writer.line("default:");
          writer.indented(() => {
            writer.line(`return ${this.tools.mapper.valueRef(catchAll, ctx)}.decode(reader);`);
          });
        } else {
          writer.line("default:");
          writer.indented(() => {
            writer.line(
              `throw new $rt.InvalidOperationError(\`Unknown tag "\${tag}" for the ${className} family\`);`,
            );
          });
        }
      });
    });
  }
}
