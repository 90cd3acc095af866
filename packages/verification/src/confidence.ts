/**
 * @relaygate/verification - ConfidenceScorer
 */

import {
  createLogger,
  type ConfidenceResult,
  type JudgeConfig,
  type Logger,
  type RecommendedAction,
  type Thresholds,
} from '@relaygate/core';
import type { ExecutionClient, ProviderRegistry } from '@relaygate/routing';
import { callJudge, type JudgeCall, type JudgeCallContext } from './judge.js';
import { parseConfidenceReply, type ParseSource } from './parsing.js';
import { buildConfidencePrompt, type JudgePromptInput } from './prompts.js';

export type ConfidenceOutcome =
  | { ok: true; result: ConfidenceResult; source: ParseSource; call: Extract<JudgeCall, { ok: true }> }
  | { ok: false; result: ConfidenceResult; call: Extract<JudgeCall, { ok: false }> };

/**
 * Thresholds decide the action; whatever the judge recommends is ignored.
 *
 *   score <  confidenceCritical  -> reject
 *   score <  confidenceAccept    -> escalate
 *   otherwise                    -> accept
 */
export function recommendedActionFor(score: number, thresholds: Thresholds): RecommendedAction {
  if (score < thresholds.confidenceCritical) return 'reject';
  if (score < thresholds.confidenceAccept) return 'escalate';
  return 'accept';
}

export function failedConfidence(reason: string): ConfidenceResult {
  return Object.freeze({
    confidenceScore: 0,
    reasoning: `Confidence scoring failed: ${reason}`,
    recommendedAction: 'reject',
  });
}

export interface ConfidenceScorerOptions {
  executor: ExecutionClient;
  registry: ProviderRegistry;
  judge: JudgeConfig;
  thresholds: Thresholds;
  logger?: Logger;
}

export class ConfidenceScorer {
  private readonly executor: ExecutionClient;
  private readonly registry: ProviderRegistry;
  private readonly judge: JudgeConfig;
  private readonly thresholds: Thresholds;
  private readonly log: Logger;

  constructor(options: ConfidenceScorerOptions) {
    this.executor = options.executor;
    this.registry = options.registry;
    this.judge = options.judge;
    this.thresholds = options.thresholds;
    this.log = options.logger ?? createLogger('relaygate:verification:confidence');
  }

  async score(input: JudgePromptInput, ctx: JudgeCallContext = {}): Promise<ConfidenceOutcome> {
    const call = await callJudge(
      { executor: this.executor, registry: this.registry, judge: this.judge },
      buildConfidencePrompt(input),
      ctx,
    );

    if (!call.ok) {
      this.log.warn({ requestId: ctx.requestId, judge: this.judge.providerId, error: call.error }, 'Confidence judge failed');
      return { ok: false, result: failedConfidence(call.error), call };
    }

    const parsed = parseConfidenceReply(call.text);
    if (parsed.source === 'heuristic') {
      this.log.warn({ requestId: ctx.requestId, judge: this.judge.providerId }, 'Confidence reply unparseable, using heuristics');
    }

    const result: ConfidenceResult = Object.freeze({
      confidenceScore: parsed.confidenceScore,
      reasoning: parsed.reasoning,
      recommendedAction: recommendedActionFor(parsed.confidenceScore, this.thresholds),
    });

    return { ok: true, result, source: parsed.source, call };
  }
}
