/**
 * Flashloan premiums charged by lending providers, in basis points of the borrowed amount
 */

import { env } from '../config/env';
import { Decimal, DecimalInput, toDecimal } from './decimal';
import { InvalidInputError } from './errors';

const BPS = new Decimal(10000);

export const FLASHLOAN_PROVIDER_FEE_BPS: ReadonlyMap<string, number> = new Map([
  ['aave_v3', 5],
  ['balancer', 0],
  ['balancer_v2', 0],
]);

export interface FlashloanOptions {
  provider?: string;                 // key of FLASHLOAN_PROVIDER_FEE_BPS
  feeBps?: DecimalInput;             // explicit premium, wins over the provider schedule
}

/**
 * Premium in basis points: explicit feeBps, else the provider's published rate,
 * else FLASHLOAN_FEE_BPS.
 */
export function resolveFlashloanFeeBps(options: FlashloanOptions = {}): Decimal {
  const known = options.provider !== undefined ? FLASHLOAN_PROVIDER_FEE_BPS.get(options.provider) : undefined;
  const bps = toDecimal(options.feeBps ?? known ?? env.FLASHLOAN_FEE_BPS, 'flashloanFeeBps');
  if (bps.lt(0) || bps.gte(BPS)) {
    throw new InvalidInputError(`flashloan fee must be in [0, 10000) bps, got ${bps.toString()}`);
  }
  return bps;
}

export function estimateFlashloanFee(amount: DecimalInput, feeBps: DecimalInput): Decimal {
  return toDecimal(amount, 'amount').times(toDecimal(feeBps, 'flashloanFeeBps')).div(BPS);
}
