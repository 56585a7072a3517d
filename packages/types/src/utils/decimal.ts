import { Decimal } from 'decimal.js';

export { Decimal };

export const ZERO = new Decimal('0.0');

// Underscores may group digits ("1_000.50"), but only between two digits.
const DIGITS = String.raw`\d+(?:_\d+)*`;
const DECIMAL_PATTERN = new RegExp(
  `^[+-]?(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`,
);

/**
 * Parse an amount string as an exact decimal.
 *
 * Returns zero for anything that is not a finite plain number (empty cells,
 * thousands separators, currency symbols, NaN) instead of throwing.
 */
export function parseToDecimal(numberStr: string): Decimal {
  const trimmed = numberStr.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return ZERO;
  }
  return new Decimal(trimmed.replaceAll('_', ''));
}
