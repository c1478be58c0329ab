/**
 * Configuration loader for the generate command
 */

import {
  DEFAULT_GENERATE_CONFIG,
  type GenerateConfig,
  type GenerateConfigSection,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * CLI options that map onto the generate section
 */
export interface GenerateCliOptions {
  schema?: string;
  out?: string;
  runtimeModule?: string;
  header?: boolean;
}

/**
 * Load generate configuration from CLI options and config file
 *
 * @param cliOptions - Flags the user actually passed
 * @param configFile - Optional `generate` section of the config file
 * @returns Merged configuration with defaults applied
 *
 * @example
 * const config = loadGenerateConfig(
 *   { schema: "api.yaml", out: "gen" },
 *   { outDir: "src/generated", header: false }
 * );
 * // Returns: outDir "gen" (CLI takes precedence), header false (from file)
 */
export function loadGenerateConfig(
  cliOptions: GenerateCliOptions = {},
  configFile: GenerateConfigSection = {},
): GenerateConfig {
  const schema = cliOptions.schema ?? configFile.schema;
  const outDir = cliOptions.out ?? configFile.outDir;

  if (schema === undefined) {
    throw new ConfigError("No type model given: pass --schema or set generate.schema");
  }
  if (outDir === undefined) {
    throw new ConfigError("No output directory given: pass --out or set generate.outDir");
  }

  // Build config with precedence: CLI > config file > defaults
  const config: GenerateConfig = {
    schema,
    outDir,
    runtimeModule:
      cliOptions.runtimeModule ??
      configFile.runtimeModule ??
      DEFAULT_GENERATE_CONFIG.runtimeModule,
    header: cliOptions.header ?? configFile.header ?? DEFAULT_GENERATE_CONFIG.header,
  };

  validateGenerateConfig(config);

  logger.debug("Generate config loaded", {
    schema: config.schema,
    outDir: config.outDir,
    runtimeModule: config.runtimeModule,
    header: config.header,
  });

  return config;
}

/**
 * Validate generate configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateGenerateConfig(config: GenerateConfig): void {
  if (config.schema.trim() === "") {
    throw new ConfigError("Type model path must not be empty");
  }

  if (config.outDir.trim() === "") {
    throw new ConfigError("Output directory must not be empty");
  }

  if (config.runtimeModule.trim() === "" || /\s/.test(config.runtimeModule)) {
    throw new ConfigError(
      `Runtime module must be a non-empty module specifier, got "${config.runtimeModule}"`,
    );
  }
}
