/**
 * Errors raised by generated bindings at run time
 */

export enum BindingErrorCode {
  ARGUMENT_NULL = "ARGUMENT_NULL",
  ARGUMENT_OUT_OF_RANGE = "ARGUMENT_OUT_OF_RANGE",
  INVALID_OPERATION = "INVALID_OPERATION",
  WIRE_FORMAT = "WIRE_FORMAT",
}

export class BindingError extends Error {
  constructor(
    public readonly code: BindingErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "BindingError";
  }
}

/**
 * A required constructor argument was null or undefined
 */
export class ArgumentNullError extends BindingError {
  constructor(public readonly paramName: string) {
    super(BindingErrorCode.ARGUMENT_NULL, `Value cannot be null: ${paramName}`);
    this.name = "ArgumentNullError";
  }
}

/**
 * A constructor argument broke a declared bound, length, pattern or item count
 */
export class ArgumentOutOfRangeError extends BindingError {
  constructor(public readonly paramName: string) {
    super(
      BindingErrorCode.ARGUMENT_OUT_OF_RANGE,
      `Value is out of the declared range: ${paramName}`,
    );
    this.name = "ArgumentOutOfRangeError";
  }
}

/**
 * Dispatch reached a branch the type model rules out, such as an unknown
 * tag in a closed family
 */
export class InvalidOperationError extends BindingError {
  constructor(message = "Operation is not valid in the current state") {
    super(BindingErrorCode.INVALID_OPERATION, message);
    this.name = "InvalidOperationError";
  }
}

/**
 * Encoded data does not match the shape the bindings expect
 */
export class WireFormatError extends BindingError {
  constructor(message: string, options?: ErrorOptions) {
    super(BindingErrorCode.WIRE_FORMAT, message, options);
    this.name = "WireFormatError";
  }
}
