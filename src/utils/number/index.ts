/**
 * Strict number parsing
 *
 * parseInt/parseFloat accept trailing garbage ("12abc" -> 12) and Number()
 * accepts empty strings and hex. These helpers only accept the plain forms a
 * person or the controller writes.
 */

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const COMMA_DECIMAL_PATTERN = /^[+-]?(\d+,\d*|,\d+)$/;
const UNSIGNED_INTEGER_PATTERN = /^\d+$/;

// Any decimal with at most this many significant digits maps to a distinct double
const MAX_EXACT_DIGITS = 15;

function significantDigits(decimal: string): number {
  const mantissa = decimal.replace(/^[+-]/, '').replace(/[eE].*$/, '').replace('.', '');
  return mantissa.replace(/^0+/, '').replace(/0+$/, '').length;
}

/**
 * Check if a value is a finite number (no coercion)
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer (no coercion)
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Parse a decimal number written with a dot, or with a single comma as the
 * decimal separator ("21,5"). Text is expected to be trimmed already.
 * Decimals with more than 15 significant digits are not converted, since
 * two different ones could round to the same number.
 *
 * @returns The number, or null when the text is not a plain decimal or
 *   would lose digits as a number
 */
export function parseDecimal(text: string): number | null {
  let candidate = text;

  if (!DECIMAL_PATTERN.test(candidate)) {
    if (!COMMA_DECIMAL_PATTERN.test(candidate)) {
      return null;
    }
    candidate = candidate.replace(',', '.');
  }

  if (significantDigits(candidate) > MAX_EXACT_DIGITS) {
    return null;
  }

  const value = Number(candidate);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a non-negative integer made of digits only
 *
 * @returns The integer, or null for anything else (signs, fractions, blanks)
 */
export function parseUnsignedInteger(text: string): number | null {
  if (!UNSIGNED_INTEGER_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}
