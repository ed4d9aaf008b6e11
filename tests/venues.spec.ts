import { describe, it, expect } from 'vitest';
import {
  createVenueRegistry,
  getEnabledVenues,
  getFlashloanVenues,
  getVenueStatistics,
  isVenueEnabled,
  loadDefaultVenues,
  setVenueEnabled,
} from '../src/config/venues';
import { InvalidInputError } from '../src/eval/errors';

describe('default venue registry', () => {
  const registry = loadDefaultVenues();

  it('loads every configured venue enabled', () => {
    expect(getVenueStatistics(registry)).toEqual({
      totalSources: 35,
      enabledSources: 35,
      disabledSources: 0,
      sourcesByChain: { polygon: 20, ethereum: 10, bsc: 1, arbitrum: 3, optimism: 1 },
      flashloanSources: 4,
      averageLatencyMs: 100,
    });
  });

  it('orders by priority then id and honors maxSources', () => {
    const ids = getEnabledVenues(registry, { maxSources: 3 }).map((v) => v.id);
    expect(ids).toEqual(['balancer_v2', 'balancer_v2_eth', 'uniswap_v3']);
  });

  it('filters by chain and minimum priority', () => {
    expect(getEnabledVenues(registry, { chain: 'bsc' }).map((v) => v.id)).toEqual(['pancake_v3']);
    expect(getEnabledVenues(registry, { chain: 'arbitrum' }).map((v) => v.id)).toEqual(['camelot', 'traderjoe', 'zyberswap']);
    expect(getEnabledVenues(registry, { chain: 'ethereum', minPriority: 10 }).map((v) => v.id)).toEqual([
      'balancer_v2_eth',
      'uniswap_v3_eth',
    ]);
  });

  it('lists flashloan venues', () => {
    expect(getFlashloanVenues(registry).map((v) => v.id)).toEqual(['balancer_v2', 'balancer_v2_eth', 'dodo', 'dodo_eth']);
  });
});

describe('setVenueEnabled', () => {
  it('returns a new registry and leaves the original untouched', () => {
    const registry = loadDefaultVenues();
    const { registry: next, unknown } = setVenueEnabled(registry, ['uniswap_v3', 'nowhere'], false);

    expect(unknown).toEqual(['nowhere']);
    expect(isVenueEnabled(next, 'uniswap_v3')).toBe(false);
    expect(isVenueEnabled(registry, 'uniswap_v3')).toBe(true);

    const stats = getVenueStatistics(next);
    expect(stats.enabledSources).toBe(34);
    expect(stats.disabledSources).toBe(1);
    expect(stats.sourcesByChain.polygon).toBe(19);
    expect(getEnabledVenues(next, { maxSources: 2 }).map((v) => v.id)).toEqual(['balancer_v2', 'balancer_v2_eth']);

    const { registry: restored } = setVenueEnabled(next, ['uniswap_v3'], true);
    expect(isVenueEnabled(restored, 'uniswap_v3')).toBe(true);
  });

  it('treats unknown ids as disabled', () => {
    expect(isVenueEnabled(loadDefaultVenues(), 'nowhere')).toBe(false);
  });
});

describe('createVenueRegistry', () => {
  it('fills defaults for optional fields', () => {
    const registry = createVenueRegistry([{ id: 'local', name: 'Local AMM', chain: 'polygon' }]);
    expect(registry.get('local')).toEqual({
      id: 'local',
      name: 'Local AMM',
      chain: 'polygon',
      enabled: true,
      priority: 1,
      supportsFlashloan: false,
      averageLatencyMs: 100,
    });
  });

  it('rejects duplicates and malformed entries', () => {
    const entry = { id: 'local', name: 'Local AMM', chain: 'polygon' } as const;
    expect(() => createVenueRegistry([entry, entry])).toThrow(InvalidInputError);
    expect(() => createVenueRegistry([{ id: '', name: 'x', chain: 'polygon' }])).toThrow(InvalidInputError);
    expect(() => createVenueRegistry([{ ...entry, routerAddress: '0x1234' }])).toThrow(InvalidInputError);
  });

  it('reports zero latency for an empty registry', () => {
    expect(getVenueStatistics(createVenueRegistry([])).averageLatencyMs).toBe(0);
  });
});
