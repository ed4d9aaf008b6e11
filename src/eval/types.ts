// Strong types for constant-product evaluation. Amounts are decimal.js values, never floats.

import type { Decimal, DecimalInput } from './decimal';

export type ReservePair = {
  reserveIn: DecimalInput;           // reserve of the token being sold into the pool
  reserveOut: DecimalInput;          // reserve of the token being bought
  fee?: DecimalInput;                // fraction, e.g. 0.003; engine default when absent
};

export type SwapQuote = {
  amountIn: Decimal;
  amountOut: Decimal;
  spotPrice: Decimal;                // reserveOut / reserveIn before the trade
  executionPrice: Decimal;           // amountOut / amountIn, fee included
  priceImpactPct: Decimal;           // (spot - execution) / spot * 100
};

export type SwapResult = {
  amountOut: Decimal;
  next: { reserveIn: Decimal; reserveOut: Decimal; fee: Decimal };
};

export type HopDetail = {
  reserveIn: Decimal;
  reserveOut: Decimal;
  fee: Decimal;
  input: Decimal;
  output: Decimal;
};

export type ArbPathResult = {
  amountIn: Decimal;
  grossOutput: Decimal;              // last hop output
  grossProfit: Decimal;              // grossOutput - amountIn
  netProfit: Decimal;                // grossProfit - gasCost - flashloanFee
  profitPercentage: Decimal;         // netProfit / amountIn * 100
  gasCost: Decimal;
  flashloanFee: Decimal;             // amountIn * flashloanFeeBps / 10000
  isProfitable: boolean;
  hops: readonly HopDetail[];
};

export type PathCosts = {
  flashloanFeeBps?: DecimalInput;    // premium on amountIn when the input is borrowed
};

export type OptimizeOptions = PathCosts & {
  gasCost?: DecimalInput;
  minInput?: DecimalInput;
  iterations?: number;
};

export type OptimizationResult = {
  amountIn: Decimal;
  result: ArbPathResult;
  iterations: number;
  foundProfitable: boolean;
};

export type EngineOptions = {
  minProfitThreshold?: DecimalInput; // fraction of amountIn, 0.001 == 0.1%
  defaultFee?: DecimalInput;
};
