/**
 * Pairwise round-trip detection across venues quoting the same token pair
 */

import { env } from '../config/env';
import { isVenueEnabled, VenueRegistry } from '../config/venues';
import { getPriceImpact, reversePair } from '../eval/arb_math';
import { Decimal, DecimalInput, toDecimal } from '../eval/decimal';
import { InvalidInputError } from '../eval/errors';
import { FlashloanOptions, resolveFlashloanFeeBps } from '../eval/flashloan';
import { ArbitrageMathEngine } from '../eval/model';
import { ArbPathResult, ReservePair } from '../eval/types';

export interface VenueReserveSnapshot {
  venue: string;
  token0: string;
  token1: string;
  reserve0: DecimalInput;
  reserve1: DecimalInput;
  fee?: DecimalInput;
  poolAddress?: string;
  blockNumber?: number;
}

export interface OpportunityRecord {
  readonly id: string;
  readonly dex1: string;                 // venue bought on
  readonly dex2: string;                 // venue sold back on
  readonly tokenIn: string;
  readonly tokenOut: string;
  readonly amountIn: Decimal;
  readonly grossOutput: Decimal;
  readonly expectedProfit: Decimal;      // net of gas
  readonly profitPercentage: Decimal;
  readonly isProfitable: boolean;
  readonly gasCost: Decimal;
  readonly flashloanFee: Decimal;        // zero unless the scan borrows the input
  readonly priceImpactPct: Decimal;      // first hop
  readonly liquidityDepth: Decimal;      // tokenIn reserves across both venues
  readonly riskLevel: RiskLevel;
  readonly path: readonly ReservePair[];
  readonly timestamp: number;            // ms
}

export type RiskLevel = 'low' | 'medium' | 'high';

export interface DetectOptions {
  amountIn?: DecimalInput;
  gasCost?: DecimalInput;
  flashloan?: FlashloanOptions;          // input is borrowed; premium counts against profit
  optimize?: { maxInput: DecimalInput; minInput?: DecimalInput; iterations?: number };
  venues?: VenueRegistry;
  now?: () => number;
}

type Candidate = {
  dex1: string;
  dex2: string;
  tokenIn: string;
  tokenOut: string;
  path: ReservePair[];
};

// Process-wide, so scans sharing a clock tick never reuse an id
let sequence = 0;

function pairKey(s: VenueReserveSnapshot): string {
  return JSON.stringify([s.token0, s.token1].sort());
}

function forwardPair(s: VenueReserveSnapshot, tokenIn: string): ReservePair {
  return s.token0 === tokenIn
    ? { reserveIn: s.reserve0, reserveOut: s.reserve1, fee: s.fee }
    : { reserveIn: s.reserve1, reserveOut: s.reserve0, fee: s.fee };
}

const HIGH_RISK_IMPACT_PCT = new Decimal(2);
const MEDIUM_RISK_IMPACT_PCT = new Decimal(1);
const HIGH_RISK_DEPTH = new Decimal(10_000);
const MEDIUM_RISK_DEPTH = new Decimal(100_000);

export function assessRisk(priceImpactPct: Decimal, liquidityDepth: Decimal): RiskLevel {
  if (priceImpactPct.gt(HIGH_RISK_IMPACT_PCT) || liquidityDepth.lt(HIGH_RISK_DEPTH)) return 'high';
  if (priceImpactPct.gt(MEDIUM_RISK_IMPACT_PCT) || liquidityDepth.lt(MEDIUM_RISK_DEPTH)) return 'medium';
  return 'low';
}

function candidatesFor(a: VenueReserveSnapshot, b: VenueReserveSnapshot): Candidate[] {
  const tokenIn = a.token0;
  const tokenOut = a.token1;
  const onA = forwardPair(a, tokenIn);
  const onB = forwardPair(b, tokenIn);
  return [
    { dex1: a.venue, dex2: b.venue, tokenIn, tokenOut, path: [onA, reversePair(onB)] },
    { dex1: b.venue, dex2: a.venue, tokenIn, tokenOut, path: [onB, reversePair(onA)] },
  ];
}

/**
 * Evaluates every venue pair quoting the same tokens in both directions and
 * keeps the profitable round trips, best first. Each call is an independent
 * scan; an empty result is a normal outcome.
 */
export function detectOpportunities(
  engine: ArbitrageMathEngine,
  snapshots: readonly VenueReserveSnapshot[],
  options: DetectOptions = {}
): OpportunityRecord[] {
  const timestamp = (options.now ?? Date.now)();
  const amountIn = toDecimal(options.amountIn ?? env.DEFAULT_TRADE_SIZE, 'amountIn');
  const gasCost = toDecimal(options.gasCost ?? env.DEFAULT_GAS_COST, 'gasCost');
  const flashloanFeeBps = options.flashloan ? resolveFlashloanFeeBps(options.flashloan) : undefined;

  const groups = new Map<string, VenueReserveSnapshot[]>();
  for (const s of snapshots) {
    if (s.token0 === s.token1) {
      throw new InvalidInputError(`snapshot for ${s.venue} quotes ${s.token0} against itself`);
    }
    if (options.venues && !isVenueEnabled(options.venues, s.venue)) continue;
    const key = pairKey(s);
    const group = groups.get(key);
    if (group) group.push(s);
    else groups.set(key, [s]);
  }

  const evaluate = (path: ReservePair[]): ArbPathResult => {
    if (!options.optimize) return engine.evaluatePath(amountIn, path, gasCost, { flashloanFeeBps });
    return engine.optimizeInputAmount(path, options.optimize.maxInput, {
      gasCost,
      flashloanFeeBps,
      minInput: options.optimize.minInput,
      iterations: options.optimize.iterations,
    }).result;
  };

  const records: OpportunityRecord[] = [];
  for (const group of groups.values()) {
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) {
        if (group[i].venue === group[j].venue) continue;
        for (const c of candidatesFor(group[i], group[j])) {
          const result = evaluate(c.path);
          if (!result.isProfitable) continue;
          const first = result.hops[0];
          const priceImpactPct = getPriceImpact(first.input, first.reserveIn, first.reserveOut, first.fee);
          const liquidityDepth = first.reserveIn.plus(result.hops[result.hops.length - 1].reserveOut);
          records.push(Object.freeze({
            id: `opp-${timestamp}-${sequence++}`,
            dex1: c.dex1,
            dex2: c.dex2,
            tokenIn: c.tokenIn,
            tokenOut: c.tokenOut,
            amountIn: result.amountIn,
            grossOutput: result.grossOutput,
            expectedProfit: result.netProfit,
            profitPercentage: result.profitPercentage,
            isProfitable: result.isProfitable,
            gasCost: result.gasCost,
            flashloanFee: result.flashloanFee,
            priceImpactPct,
            liquidityDepth,
            riskLevel: assessRisk(priceImpactPct, liquidityDepth),
            path: Object.freeze(result.hops.map((h) => Object.freeze({ reserveIn: h.reserveIn, reserveOut: h.reserveOut, fee: h.fee }))),
            timestamp,
          }));
        }
      }
    }
  }

  return records.sort((x, y) => y.expectedProfit.comparedTo(x.expectedProfit));
}
