/**
 * JSON Schema validator for structure documents
 * Uses Ajv for validation with helpful error messages
 */

import { Ajv, type ErrorObject } from 'ajv';
import type { StructureDescriptor } from '../naming/types.js';

/**
 * Schema of a structure document:
 * { "name": "MyPlaylist", "fields": [{ "name": "track_list", "rename": "tracks" }] }
 */
export const STRUCTURE_DOCUMENT_SCHEMA = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    fields: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          rename: { type: 'string' },
        },
        required: ['name'],
        additionalProperties: false,
      },
    },
  },
  required: ['name', 'fields'],
  additionalProperties: false,
} as const;

export type DocumentValidationResult =
  | { valid: true; document: StructureDescriptor }
  | { valid: false; errors: string[] };

const ajv = new Ajv({
  allErrors: true,
  strict: false,
});

const validateStructure = ajv.compile<StructureDescriptor>(STRUCTURE_DOCUMENT_SCHEMA);

/**
 * Validate a parsed JSON value as a structure document
 */
export function validateStructureDocument(value: unknown): DocumentValidationResult {
  if (validateStructure(value)) {
    return { valid: true, document: value };
  }

  return {
    valid: false,
    errors: formatValidationErrors(validateStructure.errors || []),
  };
}

/**
 * Format Ajv validation errors into human-readable messages
 */
function formatValidationErrors(errors: ErrorObject[]): string[] {
  return errors.map((error) => {
    const path = error.instancePath || '(root)';

    switch (error.keyword) {
      case 'required':
        return `Missing required property: '${error.params.missingProperty}'`;

      case 'type':
        return `Property '${path}' must be of type ${error.params.type}`;

      case 'additionalProperties':
        return `Unknown property: '${error.params.additionalProperty}'`;

      default:
        // Fallback to error message
        return `${path}: ${error.message || 'Validation failed'}`;
    }
  });
}
