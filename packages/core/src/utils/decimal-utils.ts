import { Decimal } from 'decimal.js';

// Settlement amounts carry two fractional digits; rates up to six
Decimal.set({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9,
  toExpPos: 21,
});

export const ZERO = new Decimal(0);

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(value: string | number | Decimal | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (!decimal.isFinite()) return false;
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal with fallback to zero
 */
export function parseDecimal(value: string | number | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Fixed-point rendering used by every serialized output, so that identical
 * input always yields identical bytes.
 */
export function formatDecimal(value: Decimal, decimalPlaces = 2): string {
  return value.toFixed(decimalPlaces, Decimal.ROUND_HALF_UP);
}

/**
 * Shortest plain-notation string for a decimal (no exponent).
 */
export function decimalToString(value: Decimal): string {
  return value.toFixed();
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}
