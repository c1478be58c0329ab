import { describe, it, expect } from 'vitest';
import {
  ArgumentNullError,
  ArgumentOutOfRangeError,
  BindingError,
  BindingErrorCode,
  InvalidOperationError,
  WireFormatError,
} from '../../../src/runtime/index.js';

describe('Runtime errors', () => {
  it('should name the offending parameter', () => {
    const nullError = new ArgumentNullError('code');
    expect(nullError.paramName).toBe('code');
    expect(nullError.code).toBe(BindingErrorCode.ARGUMENT_NULL);
    expect(nullError.message).toBe('Value cannot be null: code');

    const rangeError = new ArgumentOutOfRangeError('score');
    expect(rangeError.paramName).toBe('score');
    expect(rangeError.name).toBe('ArgumentOutOfRangeError');
  });

  it('should share the BindingError base', () => {
    expect(new InvalidOperationError()).toBeInstanceOf(BindingError);
    expect(new InvalidOperationError().message).toBe('Operation is not valid in the current state');
    expect(new WireFormatError('bad').code).toBe(BindingErrorCode.WIRE_FORMAT);
  });
});
