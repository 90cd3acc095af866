/**
 * @relaygate/routing - EscalationChain
 *
 * Fixed next-pointer ladder from a weaker backend to the next stronger one.
 * `null` marks the top of the ladder. The mapping is frozen on construction
 * and must be acyclic.
 */

import { EscalationChainError, findChainCycle } from '@relaygate/core';

export type ChainStep =
  | { kind: 'next'; providerId: string }
  | { kind: 'top' }
  | { kind: 'not_in_chain' };

export class EscalationChain {
  private readonly links: ReadonlyMap<string, string | null>;

  constructor(mapping: Readonly<Record<string, string | null>>) {
    const cycle = findChainCycle(mapping);
    if (cycle) {
      throw new EscalationChainError(`Escalation chain contains a cycle: ${cycle.join(' -> ')}`);
    }
    this.links = new Map(Object.entries(mapping));
  }

  next(providerId: string): ChainStep {
    if (!this.links.has(providerId)) {
      return { kind: 'not_in_chain' };
    }
    const next = this.links.get(providerId);
    return next === null || next === undefined ? { kind: 'top' } : { kind: 'next', providerId: next };
  }

  /**
   * The ladder starting at `providerId`, inclusive.
   */
  ladderFrom(providerId: string): string[] {
    const ladder = [providerId];
    let step = this.next(providerId);
    while (step.kind === 'next') {
      ladder.push(step.providerId);
      step = this.next(step.providerId);
    }
    return ladder;
  }

  toJSON(): Record<string, string | null> {
    return Object.fromEntries(this.links);
  }
}
