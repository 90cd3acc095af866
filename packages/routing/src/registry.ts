/**
 * @relaygate/routing - ProviderRegistry
 *
 * Catalogue of backend descriptors keyed by id. Produces the ordered
 * candidate set the Router selects from. Pure reads; the descriptor list is
 * swapped wholesale when configuration is reloaded.
 */

import { createLogger, type Logger, type ProviderDescriptor, type RoutingConstraints } from '@relaygate/core';

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

function roleRank(provider: ProviderDescriptor): number {
  if (provider.role === 'fallback') return 2;
  if (provider.role === 'primary') return 0;
  return 1;
}

/**
 * Candidate ordering: `fallback` role last regardless of priority, then
 * descending priority, then `primary` above unset. Returns 0 for providers
 * the registry cannot tell apart.
 */
export function compareProviders(a: ProviderDescriptor, b: ProviderDescriptor): number {
  const aFallback = a.role === 'fallback' ? 1 : 0;
  const bFallback = b.role === 'fallback' ? 1 : 0;
  if (aFallback !== bFallback) return aFallback - bFallback;

  if (a.priority !== b.priority) return b.priority - a.priority;

  return roleRank(a) - roleRank(b);
}

export function isAnswerProvider(provider: ProviderDescriptor): boolean {
  return (provider.kind ?? 'answer') === 'answer';
}

// ---------------------------------------------------------------------------
// ProviderRegistry
// ---------------------------------------------------------------------------

export class ProviderRegistry {
  private providers = new Map<string, ProviderDescriptor>();
  private readonly log: Logger;

  constructor(providers: readonly ProviderDescriptor[] = [], options?: { logger?: Logger }) {
    this.log = options?.logger ?? createLogger('relaygate:routing:registry');
    this.replace(providers);
  }

  /**
   * Swap the whole catalogue. Later ids win on duplicates.
   */
  replace(providers: readonly ProviderDescriptor[]): void {
    const next = new Map<string, ProviderDescriptor>();
    for (const provider of providers) {
      next.set(provider.id, Object.freeze({ ...provider }));
    }
    this.providers = next;
    this.log.debug({ providers: [...next.keys()] }, 'Provider catalogue loaded');
  }

  get(id: string): ProviderDescriptor | undefined {
    return this.providers.get(id);
  }

  has(id: string): boolean {
    return this.providers.has(id);
  }

  /** Every descriptor, answer providers and judges, in catalogue order. */
  list(): ProviderDescriptor[] {
    return [...this.providers.values()];
  }

  /**
   * Active answer providers matching `constraints`, best first.
   * Returns an empty array when nothing matches.
   */
  listCandidates(constraints: RoutingConstraints = {}): ProviderDescriptor[] {
    const { providerId, intent, minTier } = constraints;

    return this.list()
      .filter((p) => p.active && isAnswerProvider(p))
      .filter((p) => providerId === undefined || p.id === providerId)
      .filter((p) => intent === undefined || p.intents === undefined || p.intents.includes(intent))
      .filter((p) => minTier === undefined || p.tier >= minTier)
      .sort(compareProviders);
  }
}
