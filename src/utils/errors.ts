/**
 * Standard error classes for bindsmith
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  SCHEMA_CONTRACT_ERROR = "SCHEMA_CONTRACT_ERROR",
  SYNTHESIS_ERROR = "SYNTHESIS_ERROR",
}

export class BindsmithError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "BindsmithError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends BindsmithError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends BindsmithError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class ValidationError extends BindsmithError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

/**
 * Raised at generation time when the type model breaks an assumption the
 * synthesizers rely on. Generation of the affected unit must stop.
 */
export class SchemaContractError extends BindsmithError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_CONTRACT_ERROR, message, details, options);
    this.name = "SchemaContractError";
  }
}

/**
 * Throw a SchemaContractError unless the condition holds
 */
export function assertContract(
  condition: unknown,
  message: string,
  details?: unknown,
): asserts condition {
  if (!condition) {
    throw new SchemaContractError(message, details);
  }
}
