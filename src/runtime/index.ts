/**
 * Runtime support imported by generated bindings
 *
 * @packageDocumentation
 */

export * from "./errors.js";
export * from "./scalars.js";
export * from "./object-writer.js";
export * from "./object-reader.js";

/** Stand-in for a void value where a type argument or return value is required */
export type Empty = Record<string, never>;
