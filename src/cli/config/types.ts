/**
 * CLI command options (from commander)
 */

export type GenerateCommandOptions = {
  schema?: string;
  out?: string;
  runtimeModule?: string;
  header: boolean;
  config?: string;
};

export type ValidateCommandOptions = {
  schema?: string;
  config?: string;
};

export type GlobalOptions = {
  logLevel: string;
};
