/**
 * Core type definitions
 */

export * from "./type-model.js";
export * from "./config.js";
