/**
 * Input Validation Utilities
 *
 * Type predicates for record fields and parsing of console input.
 */

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

// ============================================================================
// TYPE VALIDATORS
// ============================================================================

/**
 * Validates that a value is a whole-number score in [0, 100]
 */
export function isValidScore(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_SCORE &&
    value <= MAX_SCORE
  );
}

/**
 * Validates that a value can be used as a student ID
 */
export function isValidStudentId(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value);
}

/**
 * Validates that a value is a zero-based subject index
 */
export function isValidSubjectIndex(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Sanitises a string for safe logging/output
 */
export function sanitizeString(value: unknown, maxLength = 100): string {
  if (typeof value !== 'string') return String(value);
  // Remove null bytes and control characters
  let sanitized = value.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');
  if (sanitized.length > maxLength) {
    sanitized = sanitized.substring(0, maxLength) + '...';
  }
  return sanitized;
}

// ============================================================================
// CONSOLE INPUT
// ============================================================================

export type ParseResult =
  | { valid: true; value: number }
  | { valid: false; error: string };

/**
 * Parses a whole number typed at a prompt, optionally bounded
 */
export function parseIntegerInput(
  raw: string,
  paramName = 'value',
  min?: number,
  max?: number
): ParseResult {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return { valid: false, error: `Invalid ${paramName}. Must be a whole number.` };
  }

  const num = Number(trimmed);
  if (!Number.isSafeInteger(num)) {
    return { valid: false, error: `Invalid ${paramName}. Number is too large.` };
  }

  if (min !== undefined && num < min) {
    return { valid: false, error: `${capitalize(paramName)} must be at least ${min}.` };
  }
  if (max !== undefined && num > max) {
    return { valid: false, error: `${capitalize(paramName)} must be at most ${max}.` };
  }

  return { valid: true, value: num };
}

function capitalize(s: string): string {
  return s.length === 0 ? s : s[0].toUpperCase() + s.slice(1);
}
