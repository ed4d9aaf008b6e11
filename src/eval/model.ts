import { env } from '../config/env';
import { Decimal, DecimalInput, HUNDRED, toDecimal } from './decimal';
import { InvalidInputError, InvalidPathError } from './errors';
import { getAmountOut, quoteSwap } from './arb_math';
import { estimateFlashloanFee } from './flashloan';
import {
  ArbPathResult,
  EngineOptions,
  HopDetail,
  OptimizationResult,
  OptimizeOptions,
  PathCosts,
  ReservePair,
  SwapQuote,
} from './types';

// Re-export types for external use
export type { ArbPathResult, OptimizationResult, PathCosts, ReservePair, SwapQuote } from './types';

const THREE = new Decimal(3);
const TWO = new Decimal(2);

/**
 * Multi-hop constant-product evaluator. Thresholds are fixed at construction;
 * every call is pure and safe to share between callers.
 */
export class ArbitrageMathEngine {
  readonly minProfitThreshold: Decimal;
  readonly defaultFee: Decimal;

  constructor(options: EngineOptions = {}) {
    this.minProfitThreshold = toDecimal(options.minProfitThreshold ?? env.MIN_PROFIT_THRESHOLD, 'minProfitThreshold');
    this.defaultFee = toDecimal(options.defaultFee ?? env.DEFAULT_POOL_FEE, 'defaultFee');
    if (this.minProfitThreshold.lt(0)) {
      throw new InvalidInputError('minProfitThreshold must be >= 0');
    }
    if (this.defaultFee.lt(0) || this.defaultFee.gte(1)) {
      throw new InvalidInputError('defaultFee must be in [0, 1)');
    }
  }

  quote(amountIn: DecimalInput, pair: ReservePair): SwapQuote {
    return quoteSwap(amountIn, pair, this.defaultFee);
  }

  /**
   * Threads amountIn through every hop in order. Closure of the path back to the
   * starting asset is the caller's concern. A flashloan premium, when given, is
   * charged on amountIn next to gas.
   */
  evaluatePath(
    amountIn: DecimalInput,
    path: readonly ReservePair[],
    gasCost: DecimalInput = 0,
    costs: PathCosts = {}
  ): ArbPathResult {
    const input = toDecimal(amountIn, 'amountIn');
    if (input.lte(0)) {
      throw new InvalidInputError(`amountIn must be > 0, got ${input.toString()}`);
    }
    if (path.length < 2) {
      throw new InvalidPathError(`arbitrage path needs at least 2 hops, got ${path.length}`);
    }
    const gas = toDecimal(gasCost, 'gasCost');
    if (gas.lt(0)) {
      throw new InvalidInputError(`gasCost must be >= 0, got ${gas.toString()}`);
    }
    const flashloanFee = estimateFlashloanFee(input, costs.flashloanFeeBps ?? 0);
    if (flashloanFee.lt(0)) {
      throw new InvalidInputError(`flashloanFeeBps must be >= 0, got ${String(costs.flashloanFeeBps)}`);
    }

    const hops: HopDetail[] = [];
    let current = input;
    for (const hop of path) {
      const fee = toDecimal(hop.fee ?? this.defaultFee, 'fee');
      const output = getAmountOut(current, hop.reserveIn, hop.reserveOut, fee);
      hops.push(Object.freeze({
        reserveIn: toDecimal(hop.reserveIn, 'reserveIn'),
        reserveOut: toDecimal(hop.reserveOut, 'reserveOut'),
        fee,
        input: current,
        output,
      }));
      current = output;
    }

    const grossProfit = current.minus(input);
    const netProfit = grossProfit.minus(gas).minus(flashloanFee);
    const profitPercentage = netProfit.div(input).times(HUNDRED);
    const isProfitable = netProfit.gt(0) && netProfit.div(input).gte(this.minProfitThreshold);

    return Object.freeze({
      amountIn: input,
      grossOutput: current,
      grossProfit,
      netProfit,
      profitPercentage,
      gasCost: gas,
      flashloanFee,
      isProfitable,
      hops: Object.freeze(hops),
    });
  }

  /**
   * Ternary search for the input size maximizing net profit on [minInput, maxInput].
   * Net profit of a round trip rises then falls with size, so the search converges
   * on the peak. Returns the best evaluated point even when nothing is profitable.
   */
  optimizeInputAmount(
    path: readonly ReservePair[],
    maxInput: DecimalInput,
    options: OptimizeOptions = {}
  ): OptimizationResult {
    const hi0 = toDecimal(maxInput, 'maxInput');
    const lo0 = toDecimal(options.minInput ?? env.OPTIMIZER_MIN_INPUT, 'minInput');
    const iterations = options.iterations ?? env.OPTIMIZER_ITERATIONS;
    const gasCost = options.gasCost ?? 0;
    const costs: PathCosts = { flashloanFeeBps: options.flashloanFeeBps };

    if (hi0.lte(0)) throw new InvalidInputError('maxInput must be > 0');
    if (lo0.lte(0)) throw new InvalidInputError('minInput must be > 0');
    if (lo0.gt(hi0)) throw new InvalidInputError('minInput must not exceed maxInput');
    if (!Number.isInteger(iterations) || iterations < 1) {
      throw new InvalidInputError('iterations must be a positive integer');
    }

    let best = this.evaluatePath(lo0, path, gasCost, costs);
    const consider = (r: ArbPathResult) => {
      if (r.netProfit.gt(best.netProfit)) best = r;
      return r;
    };
    consider(this.evaluatePath(hi0, path, gasCost, costs));

    let lo = lo0;
    let hi = hi0;
    for (let i = 0; i < iterations; i++) {
      const third = hi.minus(lo).div(THREE);
      if (third.isZero()) break;
      const m1 = consider(this.evaluatePath(lo.plus(third), path, gasCost, costs));
      const m2 = consider(this.evaluatePath(hi.minus(third), path, gasCost, costs));
      if (m1.netProfit.lt(m2.netProfit)) lo = m1.amountIn;
      else hi = m2.amountIn;
    }
    consider(this.evaluatePath(lo.plus(hi).div(TWO), path, gasCost, costs));

    return {
      amountIn: best.amountIn,
      result: best,
      iterations,
      foundProfitable: best.isProfitable,
    };
  }
}
