/**
 * Validator Utilities
 *
 * Turns zod results into field-level validation results, and validates the
 * personal-info block the way the resume form does.
 */

import { z } from 'zod';
import { ErrorHandler } from '../errors';
import type { PersonalInfo, ResumeSnapshot } from '../types';
import { ValidationResult, ValidationError } from './types';
import {
  EmailSchema,
  LinkedInSchema,
  PhoneSchema,
  ResumeSnapshotSchema,
  UrlSchema
} from './schemas';

function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));
}

/**
 * Validate an unknown value against a schema, reporting every failing field
 */
export function validateWithSchema(schema: z.ZodTypeAny, input: unknown): ValidationResult {
  const result = schema.safeParse(input);
  if (result.success) {
    return { isValid: true, errors: [] };
  }
  return { isValid: false, errors: toValidationErrors(result.error) };
}

/**
 * Parse an unknown value, throwing a VALIDATION AppError listing the failing fields
 */
export function parseWithSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  label: string
): T {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const errors = toValidationErrors(result.error);
  const summary = errors
    .map(err => (err.field ? `${err.field}: ${err.message}` : err.message))
    .join('; ');
  throw ErrorHandler.createValidationError(
    `Invalid ${label}: ${summary}`,
    result.error.message,
    { errors }
  );
}

export function validateResumeSnapshot(input: unknown): ValidationResult {
  return validateWithSchema(ResumeSnapshotSchema, input);
}

export function parseResumeSnapshot(input: unknown): ResumeSnapshot {
  return parseWithSchema(ResumeSnapshotSchema, input, 'resume data');
}

/**
 * Validate the contact block. Empty optional fields are skipped; the
 * required fields (name, email, phone, location) are reported when blank.
 */
export function validatePersonalInfo(info: PersonalInfo): ValidationResult {
  const errors: ValidationError[] = [];

  const required: Array<keyof PersonalInfo> = ['name', 'email', 'phone', 'location'];
  for (const field of required) {
    const value = info[field];
    if (!value || !value.trim()) {
      errors.push({ field, message: `${field} is required` });
    }
  }

  const checks: Array<[keyof PersonalInfo, z.ZodTypeAny]> = [
    ['email', EmailSchema],
    ['phone', PhoneSchema],
    ['linkedin', LinkedInSchema],
    ['portfolio', UrlSchema]
  ];
  for (const [field, schema] of checks) {
    const value = info[field];
    if (!value || !value.trim()) continue;
    const result = schema.safeParse(value.trim());
    if (!result.success) {
      errors.push({ field, message: result.error.errors[0]?.message ?? 'Invalid value' });
    }
  }

  return { isValid: errors.length === 0, errors };
}
