/**
 * Emitter module - text building and writing generated units to disk
 */
export * from "./types.js";
export * from "./code-writer.js";
export * from "./file-writer.js";
