import { describe, it, expect } from 'vitest';
import { applySwap, getAmountOut, getPriceImpact, getSpotPrice, quoteSwap, reversePair } from '../src/eval/arb_math';
import { Decimal } from '../src/eval/decimal';
import { InvalidInputError } from '../src/eval/errors';

// Reference values were traced with 28-digit arithmetic, swap outputs truncated.

describe('getAmountOut', () => {
  it('matches the constant-product formula with fee', () => {
    const out = getAmountOut('1000', '500000', '500000', '0.003');
    expect(out.toString()).toBe('995.015938219190933279041591');
  });

  it('stays strictly between zero and the output reserve', () => {
    const reserves: Array<[string, string]> = [['500000', '500000'], ['3', '7'], ['1000', '2000'], ['100000', '300000']];
    const amounts = ['0.000001', '1', '1000', '1000000000000'];
    for (const [rIn, rOut] of reserves) {
      for (const a of amounts) {
        for (const fee of ['0', '0.003', '0.3']) {
          const out = getAmountOut(a, rIn, rOut, fee);
          expect(out.gt(0)).toBe(true);
          expect(out.lt(rOut)).toBe(true);
        }
      }
    }
  });

  it('stays below the output reserve for inputs far larger than the pool', () => {
    for (const a of ['1e28', '1e30', '1e60']) {
      const out = getAmountOut(a, '1', '1', '0');
      expect(out.toString()).toBe('0.9999999999999999999999999999');
      expect(out.lt(1)).toBe(true);
    }
  });

  it('never drains a pool, so the reverse hop still quotes', () => {
    const { amountOut, next } = applySwap({ reserveIn: '1', reserveOut: '1' }, '1e30', 0);
    expect(amountOut.lt(1)).toBe(true);
    expect(next.reserveOut.toString()).toBe('0.0000000000000000000000000001');
    expect(getAmountOut('1', next.reserveOut, next.reserveIn, 0).gt(0)).toBe(true);
  });

  it('is non-decreasing in amountIn', () => {
    let prev = new Decimal(0);
    for (const a of ['0', '1', '10', '100', '1000', '10000', '100000', '1000000']) {
      const out = getAmountOut(a, '500000', '500000', '0.003');
      expect(out.gte(prev)).toBe(true);
      prev = out;
    }
  });

  it('returns exactly zero for a zero input', () => {
    expect(getAmountOut(0, 100, 100, '0.003').isZero()).toBe(true);
  });

  it('rejects invalid reserves, amounts and fees', () => {
    expect(() => getAmountOut(1, 0, 100, '0.003')).toThrow(InvalidInputError);
    expect(() => getAmountOut(1, 100, -5, '0.003')).toThrow(InvalidInputError);
    expect(() => getAmountOut(-1, 100, 100, '0.003')).toThrow(InvalidInputError);
    expect(() => getAmountOut(1, 100, 100, 1)).toThrow(InvalidInputError);
    expect(() => getAmountOut(1, 100, 100, '-0.1')).toThrow(InvalidInputError);
    expect(() => getAmountOut('abc', 100, 100, 0)).toThrow(InvalidInputError);
    expect(() => getAmountOut(Number.NaN, 100, 100, 0)).toThrow(InvalidInputError);
  });
});

describe('getPriceImpact', () => {
  it('includes the fee in the execution price', () => {
    expect(getPriceImpact('1000', '500000', '500000', '0.003').toFixed(10)).toBe('0.4984061781');
  });

  it('reflects curve impact alone when fee is zero', () => {
    expect(getPriceImpact('1000', '500000', '500000', '0').toFixed(10)).toBe('0.1996007984');
  });

  it('grows with trade size', () => {
    const small = getPriceImpact('10', '500000', '500000', '0.003');
    const large = getPriceImpact('50000', '500000', '500000', '0.003');
    expect(large.gt(small)).toBe(true);
  });

  it('is zero for a zero input', () => {
    expect(getPriceImpact(0, '500000', '500000', '0.003').isZero()).toBe(true);
  });
});

describe('pool helpers', () => {
  it('quotes spot and execution prices', () => {
    const q = quoteSwap('1000', { reserveIn: '500000', reserveOut: '500000' }, '0.003');
    expect(q.spotPrice.toString()).toBe('1');
    expect(q.amountOut.toString()).toBe('995.015938219190933279041591');
    expect(q.executionPrice.eq(q.amountOut.div(1000))).toBe(true);
    expect(q.priceImpactPct.toFixed(10)).toBe('0.4984061781');
  });

  it('spot price needs positive reserves', () => {
    expect(getSpotPrice('200', '100').toString()).toBe('0.5');
    expect(() => getSpotPrice('0', '100')).toThrow(InvalidInputError);
  });

  it('applySwap keeps the whole input in the pool', () => {
    const { amountOut, next } = applySwap({ reserveIn: '1000', reserveOut: '2000', fee: '0.003' }, '100', '0.003');
    expect(next.reserveIn.toString()).toBe('1100');
    expect(next.reserveOut.eq(new Decimal(2000).minus(amountOut))).toBe(true);
  });

  it('cannot profit from swapping straight back without fees', () => {
    const cases: Array<[string, string, string]> = [['1000', '500000', '500000'], ['1', '3', '7'], ['123.456', '1000', '2000'], ['50000', '100000', '300000']];
    for (const [a, rIn, rOut] of cases) {
      const first = applySwap({ reserveIn: rIn, reserveOut: rOut }, a, 0);
      const back = getAmountOut(first.amountOut, first.next.reserveOut, first.next.reserveIn, 0);
      expect(back.lte(a)).toBe(true);
    }
  });

  it('reversePair swaps orientation and keeps the fee', () => {
    expect(reversePair({ reserveIn: 1, reserveOut: 2, fee: '0.01' })).toEqual({ reserveIn: 2, reserveOut: 1, fee: '0.01' });
  });
});
