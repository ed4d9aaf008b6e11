/**
 * Venue (DEX source) configuration.
 *
 * A registry is a plain read-only value owned by the caller and passed to the
 * scanner; toggling a venue produces a new registry.
 */

import { z } from 'zod';
import { InvalidInputError } from '../eval/errors';
import defaultVenues from '../../config/venues.json';

export const ChainSchema = z.enum(['polygon', 'ethereum', 'arbitrum', 'optimism', 'bsc']);
export type Chain = z.infer<typeof ChainSchema>;

export const VenueConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  chain: ChainSchema,
  enabled: z.boolean().default(true),
  priority: z.number().int().min(0).default(1),    // higher is scanned first
  supportsFlashloan: z.boolean().default(false),
  averageLatencyMs: z.number().nonnegative().default(100),
  routerAddress: z.string().regex(/^0x[0-9a-fA-F]{40}$/).optional(),
});

export type VenueConfig = z.infer<typeof VenueConfigSchema>;
export type VenueConfigInput = z.input<typeof VenueConfigSchema>;
export type VenueRegistry = ReadonlyMap<string, Readonly<VenueConfig>>;

export interface VenueFilter {
  chain?: Chain;
  minPriority?: number;
  maxSources?: number;
}

export interface VenueStatistics {
  totalSources: number;
  enabledSources: number;
  disabledSources: number;
  sourcesByChain: Partial<Record<Chain, number>>;
  flashloanSources: number;
  averageLatencyMs: number;
}

export function createVenueRegistry(entries: readonly VenueConfigInput[]): VenueRegistry {
  const registry = new Map<string, Readonly<VenueConfig>>();
  for (const [i, entry] of entries.entries()) {
    const parsed = VenueConfigSchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new InvalidInputError(`venue #${i}: ${issue.path.join('.')} ${issue.message}`);
    }
    if (registry.has(parsed.data.id)) {
      throw new InvalidInputError(`duplicate venue id: ${parsed.data.id}`);
    }
    registry.set(parsed.data.id, Object.freeze(parsed.data));
  }
  return registry;
}

const VenueFileSchema = z.object({ venues: z.array(VenueConfigSchema) });

/** Registry seeded from config/venues.json. */
export function loadDefaultVenues(): VenueRegistry {
  const parsed = VenueFileSchema.safeParse(defaultVenues);
  if (!parsed.success) {
    throw new InvalidInputError(`config/venues.json: ${parsed.error.message}`);
  }
  return createVenueRegistry(parsed.data.venues);
}

export function getEnabledVenues(registry: VenueRegistry, filter: VenueFilter = {}): Readonly<VenueConfig>[] {
  const venues = [...registry.values()]
    .filter((v) => v.enabled)
    .filter((v) => !filter.chain || v.chain === filter.chain)
    .filter((v) => filter.minPriority === undefined || v.priority >= filter.minPriority)
    .sort((a, b) => b.priority - a.priority || a.id.localeCompare(b.id));
  return filter.maxSources !== undefined ? venues.slice(0, filter.maxSources) : venues;
}

export function isVenueEnabled(registry: VenueRegistry, id: string): boolean {
  return registry.get(id)?.enabled === true;
}

/**
 * Returns a copy of the registry with the given venues switched on or off.
 * Ids the registry does not know are listed in `unknown`.
 */
export function setVenueEnabled(
  registry: VenueRegistry,
  ids: readonly string[],
  enabled: boolean
): { registry: VenueRegistry; unknown: string[] } {
  const next = new Map(registry);
  const unknown: string[] = [];
  for (const id of ids) {
    const venue = next.get(id);
    if (!venue) {
      unknown.push(id);
      continue;
    }
    next.set(id, Object.freeze({ ...venue, enabled }));
  }
  return { registry: next, unknown };
}

export function getFlashloanVenues(registry: VenueRegistry): Readonly<VenueConfig>[] {
  return getEnabledVenues(registry).filter((v) => v.supportsFlashloan);
}

export function getVenueStatistics(registry: VenueRegistry): VenueStatistics {
  const all = [...registry.values()];
  const enabled = all.filter((v) => v.enabled);
  const sourcesByChain: Partial<Record<Chain, number>> = {};
  for (const v of enabled) {
    sourcesByChain[v.chain] = (sourcesByChain[v.chain] ?? 0) + 1;
  }
  const latency = enabled.reduce((sum, v) => sum + v.averageLatencyMs, 0);

  return {
    totalSources: all.length,
    enabledSources: enabled.length,
    disabledSources: all.length - enabled.length,
    sourcesByChain,
    flashloanSources: enabled.filter((v) => v.supportsFlashloan).length,
    averageLatencyMs: enabled.length ? latency / enabled.length : 0,
  };
}
