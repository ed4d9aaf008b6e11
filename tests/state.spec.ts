import { describe, it, expect } from 'vitest';
import { State } from '../src/api/state';
import { detectOpportunities, VenueReserveSnapshot } from '../src/core/opportunities';
import { ArbitrageMathEngine } from '../src/eval/model';

const engine = new ArbitrageMathEngine({ minProfitThreshold: '0.001', defaultFee: '0.003' });
const snapshots: VenueReserveSnapshot[] = [
  { venue: 'uniswap_v3', token0: 'WETH', token1: 'USDC', reserve0: '500000', reserve1: '500000' },
  { venue: 'sushiswap', token0: 'WETH', token1: 'USDC', reserve0: '505000', reserve1: '495000' },
];

describe('State', () => {
  it('finds each of two scans recorded within the same millisecond', () => {
    const now = () => 42;
    const first = detectOpportunities(engine, snapshots, { amountIn: '1000', gasCost: '5', now });
    const second = detectOpportunities(engine, snapshots, { amountIn: '2000', gasCost: '5', now });
    State.recordScan(first);
    State.recordScan(second);

    expect(State.findOpportunity(first[0].id)).toBe(first[0]);
    expect(State.findOpportunity(second[0].id)).toBe(second[0]);
    expect(State.findOpportunity(second[0].id)?.amountIn.toString()).toBe('2000');
  });

  it('returns the newest record when an id was stored twice', () => {
    const [opp] = detectOpportunities(engine, snapshots, { amountIn: '1000', gasCost: '5', now: () => 7 });
    const newer = { ...opp, dex1: 'quickswap' };
    State.recordScan([opp]);
    State.recordScan([newer]);
    expect(State.findOpportunity(opp.id)).toBe(newer);
  });

  it('lists recent opportunities newest first', () => {
    const recent = State.getRecentOpportunities(2);
    expect(recent).toHaveLength(2);
    expect(recent[0].dex1).toBe('quickswap');
  });
});
