/**
 * bindsmith: schema-driven TypeScript data classes with wire encode/decode logic
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/model/index.js";
export * from "./lib/naming/index.js";
export * from "./lib/type-mapper/index.js";
export * from "./lib/constraints/index.js";
export * from "./lib/hierarchy/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/loader/index.js";
export * from "./lib/validator/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
