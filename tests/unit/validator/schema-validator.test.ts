/**
 * Unit tests for schema validator
 */

import { describe, it, expect } from 'vitest';
import { SchemaValidator } from '../../../src/lib/validator/schema-validator.js';

interface TestDoc {
  id: string;
  name: string;
  age?: number;
}

describe('SchemaValidator', () => {
  const testSchema = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    title: 'TestDoc',
    properties: {
      id: { type: 'string' },
      name: { type: 'string' },
      age: { type: 'number' },
    },
    required: ['id', 'name'],
    additionalProperties: true,
  };

  describe('validate()', () => {
    it('should validate a conforming document', () => {
      const validator = new SchemaValidator<TestDoc>(testSchema);
      const validDoc: unknown = { id: '123', name: 'Test', age: 30 };
      expect(validator.validate(validDoc)).toBe(true);
      expect(validator.getErrors()).toEqual([]);
    });

    it('should reject a non-conforming document', () => {
      const validator = new SchemaValidator<TestDoc>(testSchema);
      expect(validator.validate({ id: '123', name: 42 })).toBe(false);
    });
  });

  describe('getErrors()', () => {
    it('should point at missing required properties', () => {
      const validator = new SchemaValidator<TestDoc>(testSchema);
      validator.validate({ id: '123' });
      expect(validator.getErrors()).toEqual([
        {
          path: '/name',
          message: "must have required property 'name' (keyword: required)",
        },
      ]);
    });

    it('should report every violation at once', () => {
      const validator = new SchemaValidator<TestDoc>(testSchema);
      validator.validate({ id: 7, name: 'Test', age: 'old' });
      expect(validator.getErrors()).toEqual([
        { path: '/id', message: 'must be string (keyword: type)' },
        { path: '/age', message: 'must be number (keyword: type)' },
      ]);
    });

    it('should use the root path for top-level violations', () => {
      const validator = new SchemaValidator<TestDoc>(testSchema);
      validator.validate('not an object');
      expect(validator.getErrors()[0].path).toBe('/');
    });
  });
});
