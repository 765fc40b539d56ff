/**
 * Input validation utilities for MCP tool parameters
 * Validates required parameters, types and allowed values
 * Returns structured validation errors
 */

import type { ErrorResponse } from '@rtf-composer/core';

/**
 * Validation error details
 */
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a value to one of the allowed strings
 */
export function oneOf<T extends string>(allowedValues: readonly T[], value: unknown): T | undefined {
  return allowedValues.find((allowed) => allowed === value);
}

export type FieldValidator = (
  value: unknown,
  fieldName: string,
  required?: boolean
) => ValidationError | null;

/**
 * Validate that a required parameter is present and not empty
 */
export function validateRequired(
  value: unknown,
  fieldName: string
): ValidationError | null {
  if (value === undefined || value === null) {
    return {
      field: fieldName,
      message: `${fieldName} is required`,
    };
  }

  if (typeof value === 'string' && value.trim() === '') {
    return {
      field: fieldName,
      message: `${fieldName} cannot be empty`,
      value,
    };
  }

  return null;
}

/**
 * Build a validator that skips absent optional values, runs the
 * presence check on required ones, then applies `accepts`.
 */
function fieldValidator(
  expected: string,
  accepts: (value: unknown) => boolean
): FieldValidator {
  return (value, fieldName, required = true) => {
    if (!required && (value === undefined || value === null)) {
      return null;
    }

    const requiredError = required ? validateRequired(value, fieldName) : null;
    if (requiredError) return requiredError;

    return accepts(value)
      ? null
      : { field: fieldName, message: `${fieldName} must be ${expected}`, value };
  };
}

export const validateString = fieldValidator('a string', (v) => typeof v === 'string');

export const validateBoolean = fieldValidator('a boolean', (v) => typeof v === 'boolean');

export const validateArray = fieldValidator('an array', Array.isArray);

export const validateObject = fieldValidator('an object', isRecord);

/**
 * A length literal: a string such as "2.5cm" or a whole number of twips
 */
export const validateLength = fieldValidator(
  'a string or a number',
  (v) => typeof v === 'string' || typeof v === 'number'
);

const PATH_CHARACTERS = /[\\/\0]/;

/**
 * A bare file name: no directory part, so the file stays in the output folder
 */
export const validateFileName = fieldValidator(
  'a file name without path separators',
  (v) => typeof v === 'string' && !PATH_CHARACTERS.test(v) && v !== '.' && v !== '..'
);

/**
 * Validate that a value is one of the allowed enum values
 */
export function validateEnum<T extends string>(
  value: unknown,
  fieldName: string,
  allowedValues: readonly T[],
  required: boolean = true
): ValidationError | null {
  const validate = fieldValidator(
    `one of: ${allowedValues.join(', ')}`,
    (v) => oneOf(allowedValues, v) !== undefined
  );
  return validate(value, fieldName, required);
}

/**
 * Report every key of `value` that is not in `allowedKeys`.
 * Non-objects produce no errors; validateObject reports those.
 */
export function validateKnownKeys(
  value: unknown,
  fieldName: string,
  allowedKeys: readonly string[]
): ValidationError[] {
  if (!isRecord(value)) {
    return [];
  }

  return Object.keys(value)
    .filter((key) => !allowedKeys.includes(key))
    .map((key) => ({
      field: fieldName ? `${fieldName}.${key}` : key,
      message: `Unknown parameter "${key}"${fieldName ? ` in ${fieldName}` : ''}`,
      value: value[key],
    }));
}

/**
 * Collect all validation errors from multiple validators
 */
export function collectValidationErrors(
  validators: Array<() => ValidationError | null>
): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const validator of validators) {
    const error = validator();
    if (error) {
      errors.push(error);
    }
  }

  return errors;
}

/**
 * Create a validation error response
 */
export function createValidationErrorResponse(
  errors: ValidationError[]
): ErrorResponse {
  const firstError = errors[0];

  return {
    error: 'VALIDATION_ERROR',
    message: errors.length === 1
      ? firstError.message
      : `${errors.length} validation errors found`,
    context: {
      errors: errors.map(e => ({
        field: e.field,
        message: e.message,
        value: e.value,
      })),
    },
    suggestions: [
      'Check the input parameters match the expected types and formats',
      'Refer to the tool documentation for parameter requirements',
    ],
  };
}
