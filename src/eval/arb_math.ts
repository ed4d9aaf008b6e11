/**
 * Constant-product (x * y = k) pool math
 */

import { Decimal, DecimalDown, DecimalInput, DecimalUp, ONE, ZERO, HUNDRED, toDecimal } from './decimal';
import { InvalidInputError } from './errors';
import { ReservePair, SwapQuote, SwapResult } from './types';

type PoolArgs = {
  amountIn: Decimal;
  reserveIn: Decimal;
  reserveOut: Decimal;
  fee: Decimal;
};

function validatePool(
  amountIn: DecimalInput,
  reserveIn: DecimalInput,
  reserveOut: DecimalInput,
  fee: DecimalInput
): PoolArgs {
  const a = toDecimal(amountIn, 'amountIn');
  const rIn = toDecimal(reserveIn, 'reserveIn');
  const rOut = toDecimal(reserveOut, 'reserveOut');
  const f = toDecimal(fee, 'fee');

  if (rIn.lte(0)) throw new InvalidInputError(`reserveIn must be > 0, got ${rIn.toString()}`);
  if (rOut.lte(0)) throw new InvalidInputError(`reserveOut must be > 0, got ${rOut.toString()}`);
  if (a.lt(0)) throw new InvalidInputError(`amountIn must be >= 0, got ${a.toString()}`);
  if (f.lt(0) || f.gte(1)) throw new InvalidInputError(`fee must be in [0, 1), got ${f.toString()}`);

  return { amountIn: a, reserveIn: rIn, reserveOut: rOut, fee: f };
}

function amountOutOf({ amountIn, reserveIn, reserveOut, fee }: PoolArgs): Decimal {
  if (amountIn.isZero()) return ZERO;
  const afterFee = amountIn.times(ONE.minus(fee));
  // Numerator rounds down and denominator up, so the quotient never reaches reserveOut
  const numerator = new DecimalDown(afterFee).times(reserveOut);
  const denominator = new DecimalUp(reserveIn).plus(afterFee);
  return new Decimal(numerator.div(denominator).toSignificantDigits(Decimal.precision, Decimal.ROUND_DOWN));
}

function impactOf(args: PoolArgs, amountOut: Decimal): Decimal {
  if (args.amountIn.isZero()) return ZERO;
  const spot = args.reserveOut.div(args.reserveIn);
  const execution = amountOut.div(args.amountIn);
  return spot.minus(execution).div(spot).times(HUNDRED);
}

/**
 * Output of one swap: amountOut = a(1-f) * Rout / (Rin + a(1-f)).
 * Truncated to the working precision, so always strictly below reserveOut;
 * zero only for a zero input.
 */
export function getAmountOut(
  amountIn: DecimalInput,
  reserveIn: DecimalInput,
  reserveOut: DecimalInput,
  fee: DecimalInput
): Decimal {
  return amountOutOf(validatePool(amountIn, reserveIn, reserveOut, fee));
}

/**
 * Percentage gap between the pre-trade spot price and the realized execution price.
 */
export function getPriceImpact(
  amountIn: DecimalInput,
  reserveIn: DecimalInput,
  reserveOut: DecimalInput,
  fee: DecimalInput
): Decimal {
  const args = validatePool(amountIn, reserveIn, reserveOut, fee);
  return impactOf(args, amountOutOf(args));
}

export function getSpotPrice(reserveIn: DecimalInput, reserveOut: DecimalInput): Decimal {
  const rIn = toDecimal(reserveIn, 'reserveIn');
  const rOut = toDecimal(reserveOut, 'reserveOut');
  if (rIn.lte(0) || rOut.lte(0)) {
    throw new InvalidInputError('reserves must be > 0');
  }
  return rOut.div(rIn);
}

export function quoteSwap(amountIn: DecimalInput, pair: ReservePair, defaultFee: DecimalInput): SwapQuote {
  const args = validatePool(amountIn, pair.reserveIn, pair.reserveOut, pair.fee ?? defaultFee);
  const amountOut = amountOutOf(args);
  return {
    amountIn: args.amountIn,
    amountOut,
    spotPrice: args.reserveOut.div(args.reserveIn),
    executionPrice: args.amountIn.isZero() ? ZERO : amountOut.div(args.amountIn),
    priceImpactPct: impactOf(args, amountOut),
  };
}

/**
 * Executes a swap against a pool snapshot and returns the reserves after it.
 * The full input (fee included) stays in the pool.
 */
export function applySwap(pair: ReservePair, amountIn: DecimalInput, defaultFee: DecimalInput): SwapResult {
  const args = validatePool(amountIn, pair.reserveIn, pair.reserveOut, pair.fee ?? defaultFee);
  const amountOut = amountOutOf(args);
  return {
    amountOut,
    next: {
      reserveIn: args.reserveIn.plus(args.amountIn),
      reserveOut: args.reserveOut.minus(amountOut),
      fee: args.fee,
    },
  };
}

/** Same pool, traded in the opposite direction. */
export function reversePair(pair: ReservePair): ReservePair {
  return { reserveIn: pair.reserveOut, reserveOut: pair.reserveIn, fee: pair.fee };
}
