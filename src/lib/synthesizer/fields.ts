/**
 * Per-field encode and decode fragments
 */

import type { ModeledType } from "../../types/type-model.js";
import { unwrapNullable } from "../model/index.js";
import type { EmitContext } from "../type-mapper/index.js";
import type { SynthesisTools } from "./types.js";
import { assertContract } from "../../utils/errors.js";

/** Appended to the docs of members that hold timestamps */
export const TIMESTAMP_PRECISION_NOTE =
  "Encoded to whole seconds: milliseconds do not survive a round trip.";

/**
 * Element types a list may carry on the wire
 */
function checkListElement(wireName: string, elementType: ModeledType): void {
  assertContract(
    elementType.kind !== "list" && elementType.kind !== "nullable" && elementType.kind !== "void",
    `List "${wireName}" has unsupported element type "${elementType.kind}"`,
  );
}

/**
 * Writer call that stores `expr` under `wireName`. Absence handling is the
 * caller's concern.
 */
export function encodeStatement(
  tools: SynthesisTools,
  ctx: EmitContext,
  wireName: string,
  type: ModeledType,
  expr: string,
): string {
  const name = JSON.stringify(wireName);
  const inner = unwrapNullable(type);

  switch (inner.kind) {
    case "composite":
      return `writer.addFieldObject(${name}, ${expr}, ${tools.mapper.valueRef(inner.target, ctx)}.encode);`;
    case "list": {
      const element = inner.elementType;
      checkListElement(wireName, element);
      if (element.kind === "composite") {
        const ref = tools.mapper.valueRef(element.target, ctx);
        return `writer.addFieldObjectList(${name}, ${expr}, ${ref}.encode);`;
      }
      return `writer.addFieldList(${name}, "${tools.mapper.wireKind(element)}", ${expr});`;
    }
    default:
      return `writer.addField(${name}, "${tools.mapper.wireKind(inner)}", ${expr});`;
  }
}

/**
 * Reader expression producing the value stored under `wireName`
 */
export function decodeExpression(
  tools: SynthesisTools,
  ctx: EmitContext,
  wireName: string,
  type: ModeledType,
): string {
  const name = JSON.stringify(wireName);
  const inner = unwrapNullable(type);

  switch (inner.kind) {
    case "composite":
      return `reader.getFieldObject(${name}, ${tools.mapper.valueRef(inner.target, ctx)}.decode)`;
    case "list": {
      const element = inner.elementType;
      checkListElement(wireName, element);
      if (element.kind === "composite") {
        const ref = tools.mapper.valueRef(element.target, ctx);
        return `reader.getFieldObjectList(${name}, ${ref}.decode)`;
      }
      return `reader.getFieldList(${name}, "${tools.mapper.wireKind(element)}")`;
    }
    default:
      return `reader.getField(${name}, "${tools.mapper.wireKind(inner)}")`;
  }
}
