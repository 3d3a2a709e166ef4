/**
 * Smart Constructors Module - Validated object creation with Result pattern
 *
 * Validates input data and returns Result types instead of throwing exceptions.
 */

import { ADMIN_ACTOR } from '../constants.js';
import type { Actor } from '../types.js';

// ============================================================================
// Type Definitions
// ============================================================================

/** Validation issue with field name and error message */
export interface ValidationIssue {
  /** Field that failed validation */
  field: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Result type for operations that can fail
 *
 * Discriminated union type representing success or failure, following Railway Oriented Programming pattern.
 *
 * @example
 * ```typescript
 * const result = createStakeholderActor(input);
 * if (result.success) {
 *   console.log(result.value);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */
export type Result<T, E = ValidationIssue> = { success: true; value: T } | { success: false; errors: E[] };

/** Creates a successful Result */
export const success = <T>(value: T): Result<T, never> => ({
  success: true,
  value,
});

/** Creates a failed Result */
export const failure = <E = ValidationIssue>(errors: E[]): Result<never, E> => ({
  success: false,
  errors,
});

/** Raw stakeholder login input */
export interface StakeholderInput {
  name?: string;
  email?: string;
  agency?: string;
}

/** @internal Validates that a string field is non-empty */
const validateNonEmptyStringField = (value: string | undefined, fieldName: string, errors: ValidationIssue[]): void => {
  if (!value || value.trim() === '') {
    errors.push({
      field: fieldName,
      message: `${fieldName} cannot be empty`,
    });
  }
};

/**
 * Creates a validated stakeholder Actor
 *
 * Collects every validation issue and returns them together. Names and emails are
 * trimmed; the agency is kept verbatim since it has to match the master table exactly.
 *
 * @example
 * ```typescript
 * const result = createStakeholderActor({ name: 'Jane', email: 'jane@example.org', agency: 'WHO' });
 * // => { success: true, value: { name: 'Jane', email: 'jane@example.org', agency: 'WHO', role: 'stakeholder' } }
 *
 * createStakeholderActor({ name: 'Jane' });
 * // => { success: false, errors: [{ field: 'email', ... }, { field: 'agency', ... }] }
 * ```
 */
export const createStakeholderActor = (input: StakeholderInput): Result<Actor> => {
  const validationErrors: ValidationIssue[] = [];

  validateNonEmptyStringField(input.name, 'name', validationErrors);
  validateNonEmptyStringField(input.email, 'email', validationErrors);
  validateNonEmptyStringField(input.agency, 'agency', validationErrors);

  if (validationErrors.length > 0 || !input.name || !input.email || !input.agency) {
    return failure(validationErrors);
  }

  return success({
    name: input.name.trim(),
    email: input.email.trim(),
    agency: input.agency,
    role: 'stakeholder',
  });
};

/** Creates the admin Actor */
export const createAdminActor = (): Actor => ({ ...ADMIN_ACTOR });
