/**
 * Decimal configuration shared by every module that touches prices,
 * quantities or cash.
 */

import { Decimal } from "decimal.js";

/** Significant digits kept by every Decimal operation. */
export const DECIMAL_PRECISION = 28;

Decimal.set({
  precision: DECIMAL_PRECISION,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -28,
  toExpPos: 28,
});

export type DecimalInput = number | string | Decimal;

export const ZERO = new Decimal(0);

export function toDecimal(value: DecimalInput): Decimal {
  return value instanceof Decimal ? value : new Decimal(value);
}

/** Zero-padded counter id, e.g. `ORD-00000042`. */
export function formatId(prefix: string, counter: number): string {
  return `${prefix}-${counter.toString().padStart(8, "0")}`;
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const v of values) {
    total = total.plus(v);
  }
  return total;
}
