import { ok, err, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from './errors.js';
import { ISO_DATE_PATTERN } from './types.js';

/**
 * Trims a required text field. Absent and whitespace-only values are rejected.
 */
export const requireText = (
  field: string,
  label: string,
  value: string | undefined
): Result<string, ValidationError> => {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') {
    return err(createValidationError(field, `${label} is required`));
  }
  return ok(trimmed);
};

/**
 * Trims an optional text field; blank becomes null.
 */
export const optionalText = (value: string | undefined): string | null => {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
};

/**
 * Accepts a safe integer no smaller than `min`. Larger values would be stored as REAL.
 */
export const requireIntegerAtLeast = (
  field: string,
  value: number,
  min: number
): Result<number, ValidationError> => {
  if (!Number.isSafeInteger(value) || value < min) {
    return err(
      createValidationError(field, `${field} must be an integer of at least ${String(min)}`)
    );
  }
  return ok(value);
};

/**
 * Checks a `YYYY-MM-DD` string names a real calendar date.
 */
export const isIsoDate = (value: string): boolean => {
  if (!ISO_DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

/**
 * Formats a date as `YYYY-MM-DD` in local time.
 */
export const formatLocalDate = (date: Date): string => {
  const year = String(date.getFullYear());
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
};

/**
 * Picks the submitted choice, else the first existing value, else the first fallback.
 */
export const pickChoice = (
  submitted: string | undefined,
  existing: readonly string[],
  fallback: readonly string[]
): string | undefined => {
  const trimmed = submitted?.trim() ?? '';
  if (trimmed !== '') {
    return trimmed;
  }
  return existing[0] ?? fallback[0];
};

/**
 * Existing values when there are any, otherwise the built-in defaults.
 */
export const choicesOrDefaults = (existing: string[], fallback: readonly string[]): string[] => {
  return existing.length > 0 ? existing : [...fallback];
};
