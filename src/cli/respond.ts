/**
 * Shared CLI output helpers
 */

import { BindsmithError, ConfigError, ErrorCode } from "../utils/errors.js";
import { isLogLevel, logger } from "../utils/logger.js";

/**
 * Wrap anything thrown by a command into a BindsmithError
 */
export function asBindsmithError(error: unknown): BindsmithError {
  if (error instanceof BindsmithError) {
    return error;
  }
  return new BindsmithError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}

/**
 * Print the error response for a failed phase and exit
 */
export function failCommand(error: unknown, phase: string): never {
  const bindsmithError = asBindsmithError(error);
  logger.error(`${phase} failed`, { code: bindsmithError.code });
  console.error(JSON.stringify(bindsmithError.toResponse(phase), null, 2));
  process.exit(1);
}

/**
 * Apply a log level given on the command line or in a config file
 * @throws ConfigError for an unknown level
 */
export function applyLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new ConfigError(`Unknown log level "${level}": expected error, warn, info or debug`);
  }
  logger.setLevel(level);
}
