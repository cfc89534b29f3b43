import { CLASSIFICATION_LABEL, DATA_SOURCE } from '../config/dataset.js';
import { validator } from '../utils/validators.js';
import { ALL_ISSUE_CATEGORIES } from './issueCategories.js';
import { CLASSIFICATION_RECORD_FIELDS } from './types.js';

export const CLASSIFICATION_RECORDS_SCHEMA_ID = 'classification-records';

const nullableString = { type: ['string', 'null'] };

/**
 * JSON schema for the serialized classification dictionary
 */
export const classificationRecordsSchema = {
  type: 'array',
  items: {
    type: 'object',
    required: [...CLASSIFICATION_RECORD_FIELDS],
    additionalProperties: false,
    properties: {
      state: { type: 'string', minLength: 1 },
      bill_number: nullableString,
      year: { type: 'integer', minimum: 1000, maximum: 9999 },
      state_full: { type: 'string', minLength: 1 },
      bill_number_raw: nullableString,
      status: nullableString,
      status_detail: nullableString,
      issues_raw: nullableString,
      issue_categories: {
        type: 'array',
        minItems: 1,
        uniqueItems: true,
        items: { enum: [...ALL_ISSUE_CATEGORIES] },
      },
      label: { const: CLASSIFICATION_LABEL },
      source: { const: DATA_SOURCE },
      legiscan_bill_id: { type: ['integer', 'null'] },
      legiscan_text_url: nullableString,
    },
  },
};

/**
 * Validate a record collection, throwing with the formatted ajv errors
 */
export function assertValidClassificationRecords(records: unknown): void {
  validator.compileSchema(CLASSIFICATION_RECORDS_SCHEMA_ID, classificationRecordsSchema);
  const result = validator.validate(CLASSIFICATION_RECORDS_SCHEMA_ID, records);

  if (!result.valid) {
    throw new Error(
      `Classification records failed schema validation:\n${validator.formatErrors(result.errors)}`
    );
  }
}
