/**
 * Settings Validator
 *
 * Validates settings data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';

import type { ReclaimSettings } from './types.js';
import { settingsSchema } from './schema.js';

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with settings or failure with errors
 */
export type ValidationResult =
  | { valid: true; settings: ReclaimSettings }
  | { valid: false; errors: ValidationError[] };

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
});

// Compile the schema once
const validate = ajv.compile<ReclaimSettings>(settingsSchema);

/**
 * Describe an Ajv error, naming the offending key for additionalProperties.
 */
function describeError(error: ErrorObject): string {
  if (error.keyword === 'additionalProperties') {
    const extra: unknown = error.params['additionalProperty'];
    if (typeof extra === 'string') {
      return `unknown setting "${extra}"`;
    }
  }
  if (error.keyword === 'enum') {
    const allowed: unknown = error.params['allowedValues'];
    if (Array.isArray(allowed)) {
      return `must be one of: ${allowed.join(', ')}`;
    }
  }
  return error.message ?? 'Unknown validation error';
}

/**
 * Validate settings data against the JSON Schema.
 *
 * `null`/`undefined` (an empty settings file) validates as empty settings.
 *
 * @param data - Parsed YAML data to validate
 * @returns Validation result with either the typed settings or detailed errors
 */
export function validateSettings(data: unknown): ValidationResult {
  const input = data === null || data === undefined ? {} : data;

  if (!validate(input)) {
    const errors: ValidationError[] = (validate.errors ?? []).map((error: ErrorObject) => ({
      path: error.instancePath || '/',
      message: describeError(error),
      params: { ...error.params },
    }));

    return { valid: false, errors };
  }

  return { valid: true, settings: input };
}

/**
 * Format validation errors into human-readable messages.
 *
 * @param errors - Array of validation errors
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((error) => {
      const path = error.path || '/';
      return `  - ${path}: ${error.message}`;
    })
    .join('\n');
}
