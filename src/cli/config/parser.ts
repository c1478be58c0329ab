/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { BindsmithConfig } from "../../types/config.js";
import { SchemaValidator } from "../../lib/validator/index.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import configSchema from "./config.schema.json" with { type: "json" };

const configValidator = new SchemaValidator<BindsmithConfig>(configSchema);

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): BindsmithConfig {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let raw: unknown;
  try {
    raw = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // An empty YAML file parses to null
  const config = raw ?? {};
  if (!configValidator.validate(config)) {
    throw new ConfigError(`Invalid config file: ${filePath}`, {
      violations: configValidator.getErrors(),
    });
  }

  logger.info("Configuration file parsed successfully", {
    hasGenerateConfig: !!config.generate,
    hasValidateConfig: !!config.validate,
  });

  return config;
}

/**
 * Validate required fields are present
 */
export function validateConfigSection<T extends object, K extends keyof T & string>(
  section: Partial<T> | undefined,
  requiredFields: K[],
  sectionName: string,
): asserts section is Partial<T> & Required<Pick<T, K>> {
  if (!section) {
    throw new ConfigError(`Missing required config section: ${sectionName}`);
  }

  const missingFields = requiredFields.filter(
    (field) => !(field in section) || section[field] === undefined,
  );

  if (missingFields.length > 0) {
    throw new ConfigError(
      `Missing required fields in ${sectionName}: ${missingFields.join(", ")}`,
    );
  }
}
