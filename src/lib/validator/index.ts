/**
 * Validator module - JSON Schema checks for input documents
 */
export * from "./schema-validator.js";
