/**
 * VibeCoder Validation
 *
 * Limits, patterns and field validators shared by the models. Validators
 * return a ValidationFieldError (or null) so callers can collect every
 * violation before deciding to throw.
 */

import type { ValidationFieldError } from './errors.js';

// ============================================================================
// VALIDATION CONSTANTS
// ============================================================================

export const ValidationLimits = {
  // Content items
  CONTENT_MAX_LENGTH: 10000,
  ID_MAX_LENGTH: 100,
  PREVIEW_DEFAULT_LINES: 5,
  NOTEPAD_PREVIEW_DEFAULT_LINES: 10,

  // Agent settings
  TEMPERATURE_MIN: 0.0,
  TEMPERATURE_MAX: 2.0,
  MAX_TOKENS_MIN: 100,
  MAX_TOKENS_MAX: 32000,
  DEFAULT_TEMPERATURE: 0.7,
  DEFAULT_MAX_TOKENS: 4000,

  // Layout
  PANEL_MIN_WIDTH: 200,
  PANEL_MAX_WIDTH: 500,

  // Clock tolerance when checking timestamps against "now"
  CLOCK_SKEW_MS: 1000,
} as const;

// ============================================================================
// VALIDATION PATTERNS
// ============================================================================

export const ValidationPatterns = {
  /** 8-4-4-4-12 hex, any version */
  UUID: /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,

  /** Markup and URL schemes that must never reach a renderer */
  DANGEROUS_CONTENT: /<script|javascript:|data:|vbscript:/i,

  /** ASCII control characters except tab, newline and carriage return */
  CONTROL_CHARACTERS: /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g,

  /** File-name-safe persistence key */
  STORAGE_KEY: /^[A-Za-z0-9][A-Za-z0-9_.-]*$/,
} as const;

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: ValidationFieldError[];
}

export function toValidationResult(errors: Array<ValidationFieldError | null>): ValidationResult {
  const collected = errors.filter((e): e is ValidationFieldError => e !== null);
  return { valid: collected.length === 0, errors: collected };
}

/**
 * Check content against the storage rules: non-empty, within the length
 * cap and free of dangerous patterns. Does not sanitize.
 */
export function validateContent(value: string, field = 'content'): ValidationFieldError | null {
  if (value.length === 0) {
    return { field, message: 'Content cannot be empty', code: 'CONTENT_EMPTY' };
  }
  if (value.length > ValidationLimits.CONTENT_MAX_LENGTH) {
    return {
      field,
      message: `Content exceeds ${ValidationLimits.CONTENT_MAX_LENGTH} characters`,
      code: 'CONTENT_TOO_LONG',
    };
  }
  if (ValidationPatterns.DANGEROUS_CONTENT.test(value)) {
    return { field, message: 'Content contains disallowed markup', code: 'CONTENT_DANGEROUS' };
  }
  return null;
}

/**
 * Strip control characters, cap the length and trim surrounding whitespace.
 * Applying it twice gives the same result as applying it once.
 */
export function sanitizeContent(value: string): string {
  return value
    .replace(ValidationPatterns.CONTROL_CHARACTERS, '')
    .slice(0, ValidationLimits.CONTENT_MAX_LENGTH)
    .trim();
}

export function validateId(value: string, field = 'id'): ValidationFieldError | null {
  if (value.length === 0 || value.length > ValidationLimits.ID_MAX_LENGTH) {
    return { field, message: 'Invalid id length', code: 'INVALID_ID_LENGTH', value };
  }
  if (!ValidationPatterns.UUID.test(value)) {
    return { field, message: 'Invalid UUID format', code: 'INVALID_UUID', value };
  }
  return null;
}

export function validateRequired(value: string | undefined, field: string, message: string): ValidationFieldError | null {
  if (value === undefined || value.trim().length === 0) {
    return { field, message, code: 'MISSING_REQUIRED_FIELD', value };
  }
  return null;
}

export function validateRange(
  value: number,
  min: number,
  max: number,
  field: string,
  message: string
): ValidationFieldError | null {
  if (!Number.isFinite(value) || value < min || value > max) {
    return { field, message, code: 'OUT_OF_RANGE', value };
  }
  return null;
}

export function validateUrl(value: string, field: string): ValidationFieldError | null {
  try {
    new URL(value);
    return null;
  } catch {
    return { field, message: `Invalid URL format: ${value}`, code: 'INVALID_URL', value };
  }
}

export function validateStorageKey(value: string, field = 'id'): ValidationFieldError | null {
  if (!ValidationPatterns.STORAGE_KEY.test(value) || value.includes('..')) {
    return { field, message: 'Identifier cannot be used as a file name', code: 'INVALID_STORAGE_KEY', value };
  }
  return null;
}

/**
 * Boolean checks for callers that only need a yes/no answer. Callers
 * raise their own error on `false`.
 */
export const ContentValidator = {
  validateContent: (value: string): boolean => validateContent(value) === null,
  sanitizeContent,
  validateId: (value: string): boolean => validateId(value) === null,
} as const;
