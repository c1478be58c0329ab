/**
 * Synthesizer module types
 */

import type { EmissionUnit } from "../emitter/types.js";
import type { NameResolver } from "../naming/index.js";
import type { TypeMapper } from "../type-mapper/index.js";
import type { ConstraintCompiler } from "../constraints/index.js";

export interface SynthesizerOptions {
  /** Module specifier generated code imports the runtime from */
  runtimeModule?: string;
  /** Prepend the auto-generated banner to every unit */
  header?: boolean;
}

export interface SynthesisResult {
  units: EmissionUnit[];
  metadata: {
    namespaces: number;
    structs: number;
    unions: number;
  };
}

/**
 * Collaborators shared by every unit of one run
 */
export interface SynthesisTools {
  names: NameResolver;
  mapper: TypeMapper;
  constraints: ConstraintCompiler;
}
