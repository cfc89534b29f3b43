import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';

/**
 * JSON Schema Validator
 *
 * Checks built records against their JSON schema before anything is written
 */

// ajv is CommonJS; under NodeNext the class sits on the default export
const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false,
});

/**
 * Validation Result
 */
export interface ValidationResult {
  valid: boolean;
  errors?: ErrorObject[];
}

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  private validators: Map<string, ValidateFunction> = new Map();

  /**
   * Compile and cache a schema validator
   * @param schemaId Unique identifier for the schema
   * @param schema JSON schema object
   */
  compileSchema(schemaId: string, schema: object): ValidateFunction {
    const cached = this.validators.get(schemaId);
    if (cached) {
      return cached;
    }

    const compiled = ajv.compile(schema);
    this.validators.set(schemaId, compiled);
    return compiled;
  }

  /**
   * Validate data against a schema
   * @param schemaId Schema identifier (must be compiled first)
   */
  validate(schemaId: string, data: unknown): ValidationResult {
    const compiled = this.validators.get(schemaId);

    if (!compiled) {
      throw new Error(
        `Schema '${schemaId}' not found. Call compileSchema() first.`
      );
    }

    const valid = compiled(data);

    return {
      valid,
      errors: compiled.errors || undefined,
    };
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        const params = JSON.stringify(error.params);
        return `  • ${path}: ${message} ${params}`;
      })
      .join('\n');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();
