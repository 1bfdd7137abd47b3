import Decimal from 'decimal.js';
import { CellValue } from '../interfaces/tabular.interface';

// Every operation rounds to 20 significant digits, half up; plain notation throughout.
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

// Holds the sum of two 20-digit operands up to ~980 orders of magnitude apart without rounding.
const ExactDecimal = Decimal.clone({ precision: 1000 });

/**
 * Reads a spreadsheet cell as a Decimal.
 * Accepts thousands separators ("1,200.50"); blanks and text yield null.
 */
export function toDecimalOrNull(value: CellValue | undefined): Decimal | null {
  if (value === null || value === undefined || typeof value === 'boolean' || value instanceof Date) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(value) : null;
  }

  const cleaned = value.replace(/,/g, '').trim();
  if (cleaned === '' || !/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(cleaned)) {
    return null;
  }
  return new Decimal(cleaned);
}

/**
 * Converts Decimal back to JavaScript number without rounding.
 * Used where values cross into JSON or a spreadsheet cell.
 */
export function toNumber(value: Decimal): number {
  return value.toNumber();
}

export function toNumberOrNull(value: Decimal | null): number | null {
  return value === null ? null : value.toNumber();
}

/** Sign flip that keeps zero positive */
export function negate(value: Decimal): Decimal {
  return value.isZero() ? new Decimal(0) : value.negated();
}

/** Restricts value to the closed interval [min, max] */
export function clamp(value: Decimal, min: Decimal, max: Decimal): Decimal {
  return Decimal.min(Decimal.max(value, min), max);
}

/**
 * a + b without rounding to the configured precision.
 * The result may carry more than 20 digits, so (a + b) - a gives back b exactly.
 */
export function exactSum(a: Decimal, b: Decimal): Decimal {
  return new Decimal(new ExactDecimal(a).plus(b));
}
