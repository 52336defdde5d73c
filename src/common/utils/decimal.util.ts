import Decimal from 'decimal.js';

// Configure Decimal.js globally for display precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export const PRICE_DECIMAL_PLACES = 4;

/**
 * Converts any number-like value to Decimal.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/** Inserts thousands separators into the integer part of a plain decimal string */
export function groupThousands(fixed: string): string {
  const [integerPart, fractionPart] = fixed.split('.');
  const grouped = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return fractionPart === undefined ? grouped : `${grouped}.${fractionPart}`;
}

/**
 * Formats a price for table output: 4 decimal places, thousands separators.
 * 1234567.891 -> "1,234,567.8910"
 */
export function formatPrice(value: number | string | Decimal): string {
  return groupThousands(toDecimal(value).toFixed(PRICE_DECIMAL_PLACES));
}
