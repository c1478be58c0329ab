/**
 * Union synthesizer
 *
 * A union becomes a discriminated union type plus a companion namespace
 * holding one class per variant and the encode/decode dispatchers. The
 * variant class names are in scope for the whole namespace, so composite
 * references that share a name with a variant go through the namespace
 * barrel instead.
 */

import type { Union, UnionField } from "../../types/type-model.js";
import { hasEnumeratedSubtypes, holdsTimestamp, isStructRef } from "../model/index.js";
import { isOpenUnion, variantTag } from "../hierarchy/index.js";
import { withLocalNames, type EmitContext } from "../type-mapper/index.js";
import { CodeWriter } from "../emitter/code-writer.js";
import { TIMESTAMP_PRECISION_NOTE, decodeExpression, encodeStatement } from "./fields.js";
import type { SynthesisTools } from "./types.js";
import { assertContract } from "../../utils/errors.js";

export class UnionSynthesizer {
  constructor(private readonly tools: SynthesisTools) {}

  synthesize(union: Union, ctx: EmitContext): string {
    const { names } = this.tools;
    const writer = new CodeWriter();
    const unionName = names.publicName(union.name);

    assertContract(union.fields.length > 0, `Union "${union.name}" declares no variants`);
    for (const field of union.fields) {
      assertContract(
        field.type.kind !== "nullable",
        `Variant "${field.name}" of union "${union.name}" is nullable`,
      );
    }
    if (union.catchAllField) {
      assertContract(
        union.catchAllField.type.kind === "void",
        `Catch-all variant "${union.catchAllField.name}" of union "${union.name}" must be void`,
      );
    }

    const variantNames = union.fields.map((field) => names.publicName(field.name));
    const local = withLocalNames(ctx, variantNames);

    writer.docComment([union.doc ?? `The ${names.nameWords(union.name)} union`]);
    writer.line(
      `export type ${unionName} = ${variantNames.map((name) => `${unionName}.${name}`).join(" | ")};`,
    );
    writer.line();

    writer.docComment([`Variants of the {@link ${unionName}} union`]);
    writer.block(`export namespace ${unionName}`, () => {
      for (const field of union.fields) {
        this.emitVariant(writer, union, field, local);
        writer.line();
      }

      this.emitHelpers(writer, union, local);
      writer.line();
      this.emitEncode(writer, union, local);
      writer.line();
      this.emitDecode(writer, union, local);
    });

    return writer.toString();
  }

  private emitVariant(writer: CodeWriter, union: Union, field: UnionField, ctx: EmitContext): void {
    const { names, mapper } = this.tools;
    const className = names.publicName(field.name);
    const tag = JSON.stringify(variantTag(field));
    const unionName = names.publicName(union.name);

    writer.docComment([field.doc ?? `The ${names.nameWords(field.name)} object`]);
    writer.block(`export class ${className}`, () => {
      if (field.type.kind === "void") {
        writer.line("private constructor() {}");
        writer.line();
        writer.docComment([`The only instance of {@link ${className}}`]);
        writer.line(`static readonly instance = new ${className}();`);
      } else {
        writer.docComment([
          `Initializes a new instance of the {@link ${className}} class`,
          "",
          "@param value The value",
        ]);
        writer.block(`constructor(value: ${mapper.typeName(field.type, ctx, "parameter")})`, () => {
          writer.line(field.type.kind === "list" ? "this.value = Array.from(value);" : "this.value = value;");
        });
        writer.line();
        writer.docComment([
          "The value of this instance",
          ...(holdsTimestamp(field.type) ? ["", TIMESTAMP_PRECISION_NOTE] : []),
        ]);
        writer.line(`value: ${mapper.typeName(field.type, ctx, "property")};`);
      }

      writer.line();
      writer.block(`get $tag(): ${tag}`, () => writer.line(`return ${tag};`));

      writer.line();
      writer.docComment([`Encodes the ${names.nameWords(field.name)} variant using the supplied writer`]);
      writer.block(`static encode(value: ${className}, writer: $rt.ObjectWriter): void`, () => {
        writer.line(`writer.addTag(${tag});`);
        if (field.type.kind === "void") {
          return;
        }
        if (this.isInlineStruct(field)) {
          writer.line(`${this.valueRef(field, ctx)}.encode(value.value, writer);`);
        } else {
          writer.line(encodeStatement(this.tools, ctx, field.name, field.type, "value.value"));
        }
      });

      writer.line();
      writer.docComment([
        `Always throws: a {@link ${className}} is decoded through {@link ${unionName}.decode}`,
      ]);
      writer.block(`static decode(reader: $rt.ObjectReader): ${className}`, () => {
        writer.line(
          `throw new $rt.InvalidOperationError(${JSON.stringify(`Decoding happens through the ${unionName} union`)});`,
        );
      });
    });
  }

  /**
   * Plain structs share the union's wire object; everything else is nested
   * under an entry named after the variant
   */
  private isInlineStruct(field: UnionField): boolean {
    const { type } = field;
    return isStructRef(type) && !hasEnumeratedSubtypes(type.target) && type.target.parent === undefined;
  }

  private valueRef(field: UnionField, ctx: EmitContext): string {
    assertContract(field.type.kind === "composite", `Variant "${field.name}" does not hold a composite`);
    return this.tools.mapper.valueRef(field.type.target, ctx);
  }

  private emitHelpers(writer: CodeWriter, union: Union, ctx: EmitContext): void {
    const { names, mapper } = this.tools;
    const unionType = mapper.compositeName(union, ctx, "type");

    union.fields.forEach((field, index) => {
      const className = names.publicName(field.name);
      if (index > 0) {
        writer.line();
      }
      writer.docComment([`Whether the value is the {@link ${className}} variant`]);
      writer.block(`export function is${className}(value: ${unionType}): value is ${className}`, () => {
        writer.line(`return value.$tag === ${JSON.stringify(variantTag(field))};`);
      });
      writer.line();
      writer.docComment([`The value as a {@link ${className}}, or null`]);
      writer.block(`export function as${className}(value: ${unionType}): ${className} | null`, () => {
        writer.line(`return is${className}(value) ? value : null;`);
      });
    });
  }

  private emitEncode(writer: CodeWriter, union: Union, ctx: EmitContext): void {
    const { names, mapper } = this.tools;
    const unionName = names.publicName(union.name);
    const unionType = mapper.compositeName(union, ctx, "type");

    writer.docComment([`Encodes a ${names.nameWords(union.name)} using the supplied writer`]);
    writer.block(`export function encode(value: ${unionType}, writer: $rt.ObjectWriter): void`, () => {
      writer.block("switch (value.$tag)", () => {
        for (const field of union.fields) {
          if (field === union.catchAllField) {
            continue;
          }
          writer.line(`case ${JSON.stringify(variantTag(field))}:`);
          writer.indented(() => {
            writer.line(`${names.publicName(field.name)}.encode(value, writer);`);
            writer.line("break;");
          });
        }
        writer.line("default:");
        writer.indented(() => {
          if (union.catchAllField) {
            writer.line(`${names.publicName(union.catchAllField.name)}.encode(value, writer);`);
            writer.line("break;");
          } else {
            writer.line(
              `throw new $rt.InvalidOperationError(${JSON.stringify(`Value is not a variant of the ${unionName} union`)});`,
            );
          }
        });
      });
    });
  }

  private emitDecode(writer: CodeWriter, union: Union, ctx: EmitContext): void {
    const { names, mapper } = this.tools;
    const unionName = names.publicName(union.name);
    const unionType = mapper.compositeName(union, ctx, "type");

    writer.docComment([
      `Decodes a ${names.nameWords(union.name)}, chosen by the tag on the wire`,
      "",
      isOpenUnion(union)
        ? `Unknown tags decode to {@link ${names.publicName(union.catchAllField?.name ?? "")}}.`
        : "@throws InvalidOperationError when the tag is unknown",
    ]);
    writer.block(`export function decode(reader: $rt.ObjectReader): ${unionType}`, () => {
      writer.line("const tag = reader.getUnionName();");
      writer.block("switch (tag)", () => {
        for (const field of union.fields) {
          if (field === union.catchAllField) {
            continue;
          }
          writer.line(`case ${JSON.stringify(variantTag(field))}:`);
          writer.indented(() => writer.line(`return ${this.decodeVariant(field, ctx)};`));
        }
        writer.line("default:");
        writer.indented(() => {
          if (union.catchAllField) {
            writer.line(`return ${names.publicName(union.catchAllField.name)}.instance;`);
          } else {
            writer.line(
              `throw new $rt.InvalidOperationError(\`Unknown tag "\${tag}" for the ${unionName} union\`);`,
            );
          }
        });
      });
    });
  }

  private decodeVariant(field: UnionField, ctx: EmitContext): string {
    const className = this.tools.names.publicName(field.name);
    if (field.type.kind === "void") {
      return `${className}.instance`;
    }
    if (this.isInlineStruct(field)) {
      return `new ${className}(${this.valueRef(field, ctx)}.decode(reader))`;
    }
    return `new ${className}(${decodeExpression(this.tools, ctx, field.name, field.type)})`;
  }
}
