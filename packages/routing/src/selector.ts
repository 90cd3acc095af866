/**
 * @relaygate/routing - Router
 *
 * Picks the initial backend for a request and walks the escalation ladder.
 * Escalation is a fixed ladder, not a search: if the next rung cannot serve,
 * the sequence ends instead of skipping ahead.
 */

import {
  NoProviderAvailableError,
  createLogger,
  type Logger,
  type ProviderDescriptor,
  type RoutingConstraints,
} from '@relaygate/core';
import type { EscalationChain } from './escalation-chain.js';
import type { HealthView } from './health.js';
import { compareProviders, isAnswerProvider, type ProviderRegistry } from './registry.js';

export type ExhaustionReason = 'top_of_ladder' | 'not_in_chain' | 'circuit_open' | 'inactive';

export type NextSelection =
  | { kind: 'next'; provider: ProviderDescriptor }
  | { kind: 'exhausted'; reason: ExhaustionReason; providerId?: string };

export interface SelectionRequest {
  id?: string;
  intent?: string;
  constraints?: RoutingConstraints;
}

export interface RouterOptions {
  registry: ProviderRegistry;
  health: HealthView;
  chain: EscalationChain;
  logger?: Logger;
}

export class Router {
  private registry: ProviderRegistry;
  private chain: EscalationChain;
  private readonly health: HealthView;
  private readonly log: Logger;

  constructor(options: RouterOptions) {
    this.registry = options.registry;
    this.health = options.health;
    this.chain = options.chain;
    this.log = options.logger ?? createLogger('relaygate:routing:router');
  }

  /** Swap catalogue and ladder after a configuration reload. */
  update(registry: ProviderRegistry, chain: EscalationChain): void {
    this.registry = registry;
    this.chain = chain;
  }

  /**
   * Highest-ranked candidate whose circuit is not open. `half_open` is
   * eligible. Equal-ranked candidates are ordered by lower mean latency,
   * then id.
   *
   * @throws NoProviderAvailableError when nothing is eligible
   */
  selectInitial(request: SelectionRequest = {}): ProviderDescriptor {
    const constraints: RoutingConstraints = {
      ...request.constraints,
      intent: request.constraints?.intent ?? request.intent,
    };

    const eligible = this.registry
      .listCandidates(constraints)
      .filter((p) => this.health.getState(p.id) !== 'open')
      .sort((a, b) => compareProviders(a, b) || this.latencyOf(a) - this.latencyOf(b) || a.id.localeCompare(b.id));

    const selected = eligible[0];
    if (!selected) {
      this.log.warn({ requestId: request.id, constraints }, 'No provider available');
      throw new NoProviderAvailableError(
        constraints.providerId
          ? `Provider "${constraints.providerId}" is not available`
          : 'No provider is available to serve this request',
        request.id,
      );
    }

    this.log.debug({ requestId: request.id, providerId: selected.id }, 'Initial provider selected');
    return selected;
  }

  /**
   * Next rung above `currentProviderId`, or the reason the ladder ends here.
   */
  selectNext(currentProviderId: string): NextSelection {
    const step = this.chain.next(currentProviderId);

    switch (step.kind) {
      case 'top':
        return { kind: 'exhausted', reason: 'top_of_ladder' };
      case 'not_in_chain':
        return { kind: 'exhausted', reason: 'not_in_chain' };
      case 'next': {
        const provider = this.registry.get(step.providerId);
        if (!provider || !provider.active || !isAnswerProvider(provider)) {
          return { kind: 'exhausted', reason: 'inactive', providerId: step.providerId };
        }
        if (this.health.getState(provider.id) === 'open') {
          return { kind: 'exhausted', reason: 'circuit_open', providerId: provider.id };
        }
        return { kind: 'next', provider };
      }
    }
  }

  private latencyOf(provider: ProviderDescriptor): number {
    return this.health.getRecord(provider.id)?.latency?.meanMs ?? Number.POSITIVE_INFINITY;
  }
}
