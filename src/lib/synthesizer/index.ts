/**
 * Synthesizer module - transforms a type model into TypeScript emission units
 */

import type { Api, DataType, Namespace } from "../../types/type-model.js";
import { allFields, isStructRef, qualifiedName, unwrapNullable } from "../model/index.js";
import { NameResolver } from "../naming/index.js";
import { TypeMapper, createEmitContext } from "../type-mapper/index.js";
import { ConstraintCompiler } from "../constraints/index.js";
import type { EmissionUnit } from "../emitter/types.js";
import { StructSynthesizer } from "./struct.js";
import { UnionSynthesizer } from "./union.js";
import type { SynthesisResult, SynthesisTools, SynthesizerOptions } from "./types.js";
import { SchemaContractError, assertContract } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export { StructSynthesizer } from "./struct.js";
export { UnionSynthesizer } from "./union.js";

export const DEFAULT_RUNTIME_MODULE = "bindsmith/runtime";

const AUTO_GENERATED_HEADER = [
  "// <auto-generated>",
  "// Generated by bindsmith from the type model. Changes made by hand are lost",
  "// the next time the bindings are generated.",
  "// </auto-generated>",
];

/**
 * Default synthesizer options
 */
const DEFAULT_OPTIONS: Required<SynthesizerOptions> = {
  runtimeModule: DEFAULT_RUNTIME_MODULE,
  header: true,
};

export function createSynthesisTools(): SynthesisTools {
  const names = new NameResolver();
  const mapper = new TypeMapper(names);
  return {
    names,
    mapper,
    constraints: new ConstraintCompiler(names, mapper),
  };
}

/**
 * Types each struct should point readers at: its parent and subtypes, and
 * the structs that hold it in a field
 */
export function computeRelatedTypes(
  namespace: Namespace,
  names: NameResolver,
): Map<DataType, readonly string[]> {
  const related = new Map<DataType, Set<string>>();
  const link = (from: DataType, to: DataType) => {
    let entries = related.get(from);
    if (!entries) {
      entries = new Set();
      related.set(from, entries);
    }
    entries.add(names.publicName(to.name));
  };

  for (const dataType of namespace.dataTypes) {
    if (dataType.kind !== "struct") {
      continue;
    }
    if (dataType.parent) {
      link(dataType.parent, dataType);
      link(dataType, dataType.parent);
    }
    for (const field of allFields(dataType)) {
      const type = unwrapNullable(field.type);
      const held = type.kind === "list" ? type.elementType : type;
      if (isStructRef(held) && held.target !== dataType) {
        link(held.target, dataType);
      }
    }
  }

  const result = new Map<DataType, readonly string[]>();
  for (const [dataType, entries] of related) {
    result.set(dataType, [...entries].sort());
  }
  return result;
}

/**
 * Names a unit exports; used to catch clashes before the barrel re-exports them
 */
function exportedNames(dataType: DataType, names: NameResolver): string[] {
  const publicName = names.publicName(dataType.name);
  if (dataType.kind === "struct" && dataType.subtypes && dataType.subtypes.length > 0) {
    return [publicName, `${publicName}Fields`, `${publicName}Variant`];
  }
  return [publicName];
}

/**
 * Banner, imports and body, separated by blank lines
 */
function assembleUnit(header: boolean, imports: readonly string[], body: string): string {
  const sections: string[] = [];
  if (header) {
    sections.push(AUTO_GENERATED_HEADER.join("\n"));
  }
  if (imports.length > 0) {
    sections.push(imports.join("\n"));
  }
  sections.push(body);
  return sections.join("\n\n");
}

class Synthesizer {
  private readonly tools: SynthesisTools;
  private readonly structs: StructSynthesizer;
  private readonly unions: UnionSynthesizer;

  constructor(private readonly options: Required<SynthesizerOptions>) {
    this.tools = createSynthesisTools();
    this.structs = new StructSynthesizer(this.tools);
    this.unions = new UnionSynthesizer(this.tools);
  }

  run(api: Api): SynthesisResult {
    const units: EmissionUnit[] = [];
    let structs = 0;
    let unions = 0;

    for (const namespace of api.namespaces) {
      const barrel: string[] = [];
      const exported = new Set<string>();
      const related = computeRelatedTypes(namespace, this.tools.names);

      assertContract(
        this.tools.mapper.namespaceAlias(namespace.name) !== "$rt",
        `Namespace "${namespace.name}" clashes with the runtime import alias`,
      );

      for (const dataType of namespace.dataTypes) {
        for (const name of exportedNames(dataType, this.tools.names)) {
          assertContract(
            !exported.has(name),
            `Namespace "${namespace.name}" exports "${name}" more than once`,
          );
          exported.add(name);
        }

        units.push(this.synthesizeType(namespace, dataType, related.get(dataType) ?? []));
        barrel.push(`export * from "./${this.tools.names.publicName(dataType.name)}.js";`);
        if (dataType.kind === "struct") {
          structs++;
        } else {
          unions++;
        }
      }

      units.push({
        path: `${namespace.name}/index.ts`,
        code: assembleUnit(this.options.header, [], barrel.map((line) => `${line}\n`).join("")),
      });
    }

    const rootIndex = api.namespaces.map(
      (namespace) =>
        `export * as ${this.tools.names.argName(namespace.name)} from "./${namespace.name}/index.js";\n`,
    );
    units.push({
      path: "index.ts",
      code: assembleUnit(this.options.header, [], rootIndex.join("")),
    });

    logger.info("Synthesized bindings", {
      namespaces: api.namespaces.length,
      structs,
      unions,
      units: units.length,
    });

    return {
      units,
      metadata: { namespaces: api.namespaces.length, structs, unions },
    };
  }

  private synthesizeType(
    namespace: Namespace,
    dataType: DataType,
    related: readonly string[],
  ): EmissionUnit {
    const publicName = this.tools.names.publicName(dataType.name);
    const ctx = createEmitContext(namespace.name, publicName);

    let body: string;
    try {
      body =
        dataType.kind === "struct"
          ? this.structs.synthesize(dataType, ctx, related)
          : this.unions.synthesize(dataType, ctx);
    } catch (error) {
      if (error instanceof SchemaContractError) {
        throw new SchemaContractError(
          `Cannot generate ${qualifiedName(dataType)}: ${error.message}`,
          error.details,
          { cause: error },
        );
      }
      throw error;
    }

    logger.debug("Synthesized unit", { type: qualifiedName(dataType), kind: dataType.kind });

    return {
      path: `${namespace.name}/${publicName}.ts`,
      code: assembleUnit(this.options.header, ctx.imports.render(this.options.runtimeModule), body),
    };
  }
}

/**
 * Generate one unit per composite type, a barrel per namespace and a root
 * index, in declaration order
 *
 * @throws SchemaContractError on the first type the model cannot support
 */
export function synthesize(api: Api, options: SynthesizerOptions = {}): SynthesisResult {
  const resolved: Required<SynthesizerOptions> = {
    runtimeModule: options.runtimeModule ?? DEFAULT_OPTIONS.runtimeModule,
    header: options.header ?? DEFAULT_OPTIONS.header,
  };
  return new Synthesizer(resolved).run(api);
}
