/**
 * Configuration types for bindsmith
 */

/**
 * Fully resolved settings for one generation run
 */
export interface GenerateConfig {
  /** Path to the type model document */
  schema: string;
  /** Directory the generated units are written below */
  outDir: string;
  runtimeModule: string;
  header: boolean;
}

/**
 * `generate` section of a config file; every key is optional because the
 * CLI may supply it
 */
export interface GenerateConfigSection {
  schema?: string;
  outDir?: string;
  runtimeModule?: string;
  header?: boolean;
}

export interface ValidateConfigSection {
  schema?: string;
}

/**
 * Config file layout (JSON or YAML)
 */
export interface BindsmithConfig {
  logLevel?: string;
  generate?: GenerateConfigSection;
  validate?: ValidateConfigSection;
}

export const DEFAULT_GENERATE_CONFIG: Pick<GenerateConfig, "runtimeModule" | "header"> = {
  runtimeModule: "bindsmith/runtime",
  header: true,
};
