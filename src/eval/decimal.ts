import DecimalJs from 'decimal.js';
import { InvalidInputError } from './errors';

/**
 * Decimal context for all money math: 28 significant digits, banker's rounding.
 * Plain-notation output up to 1e40 so serialized amounts never switch to exponents.
 */
export const Decimal = DecimalJs.clone({
  precision: 28,
  rounding: DecimalJs.ROUND_HALF_EVEN,
  toExpNeg: -40,
  toExpPos: 40,
});
export type Decimal = DecimalJs;

// Wide contexts for intermediates that must bound a result from one side
export const DecimalDown = DecimalJs.clone({ precision: 80, rounding: DecimalJs.ROUND_DOWN });
export const DecimalUp = DecimalJs.clone({ precision: 80, rounding: DecimalJs.ROUND_UP });

export type DecimalInput = DecimalJs | string | number;

export const ZERO = new Decimal(0);
export const ONE = new Decimal(1);
export const HUNDRED = new Decimal(100);

export function toDecimal(value: DecimalInput, label = 'value'): Decimal {
  let d: Decimal;
  try {
    d = new Decimal(value);
  } catch {
    throw new InvalidInputError(`${label} is not a decimal number: ${String(value)}`);
  }
  if (!d.isFinite()) {
    throw new InvalidInputError(`${label} must be finite, got ${d.toString()}`);
  }
  return d;
}
