/**
 * Document validation using Ajv
 */

import AjvModule, { type SchemaObject, type ValidateFunction } from "ajv";

const Ajv = AjvModule.default;

export interface SchemaViolation {
  path: string;
  message: string;
}

/**
 * Validator for one JSON Schema, narrowing documents that pass to `T`
 */
export class SchemaValidator<T> {
  private readonly validateFn: ValidateFunction<T>;

  constructor(schema: SchemaObject) {
    const ajv = new Ajv({
      strict: false,
      allErrors: true, // Collect all validation errors
    });
    this.validateFn = ajv.compile<T>(schema);
  }

  validate(document: unknown): document is T {
    return this.validateFn(document);
  }

  /**
   * Violations found by the last call to validate()
   */
  getErrors(): SchemaViolation[] {
    if (!this.validateFn.errors) {
      return [];
    }

    return this.validateFn.errors.map((error) => {
      // For missing required properties, Ajv includes the field name in params
      const path =
        error.keyword === "required" && typeof error.params.missingProperty === "string"
          ? `${error.instancePath}/${error.params.missingProperty}`
          : error.instancePath || "/";

      return {
        path,
        message: `${error.message ?? "is invalid"} (keyword: ${error.keyword})`,
      };
    });
  }
}
