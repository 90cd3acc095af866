/**
 * @relaygate/verification - VerificationPipeline
 *
 * Safety judge, then confidence judge, then a closed Verdict. Fails closed:
 * any judge failure is a reject with reason `judge_failure`, and a failed
 * safety call skips the confidence call.
 */

import {
  createLogger,
  type ConfidenceResult,
  type ExecutionAttempt,
  type JudgeConfig,
  type Logger,
  type RejectionReason,
  type Thresholds,
  type VerificationResult,
} from '@relaygate/core';
import type { ExecutionClient, ProviderRegistry } from '@relaygate/routing';
import { ConfidenceScorer, failedConfidence } from './confidence.js';
import { SafetyVerifier, isEffectivelySafe } from './safety.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Verdict =
  | { kind: 'accept' }
  | { kind: 'escalate' }
  | { kind: 'reject'; reason: RejectionReason };

export interface VerificationInput {
  prompt: string;
  answer: string;
  /** Provider that produced the answer. */
  providerId: string;
  requestId?: string;
  signal?: AbortSignal;
  context?: Record<string, unknown>;
}

export interface VerificationOutcome {
  verification: VerificationResult;
  confidence: ConfidenceResult;
  verdict: Verdict;
  /** True when either judge was answered by heuristics. */
  heuristic: boolean;
  /** True when a judge call ended because the request was cancelled. */
  cancelled: boolean;
  judgeAttempts: ExecutionAttempt[];
}

export interface VerificationPipelineOptions {
  executor: ExecutionClient;
  registry: ProviderRegistry;
  judges: { safety: JudgeConfig; confidence: JudgeConfig };
  thresholds: Thresholds;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Decision
// ---------------------------------------------------------------------------

/**
 * Safety dominates: an unsafe answer is rejected whatever its confidence.
 */
export function decide(
  verification: VerificationResult,
  confidence: ConfidenceResult,
  thresholds: Thresholds,
): Verdict {
  if (!isEffectivelySafe(verification, thresholds)) {
    return { kind: 'reject', reason: 'unsafe' };
  }
  if (confidence.confidenceScore < thresholds.confidenceCritical) {
    return { kind: 'reject', reason: 'low_confidence' };
  }
  if (confidence.confidenceScore < thresholds.confidenceAccept) {
    return { kind: 'escalate' };
  }
  return { kind: 'accept' };
}

// ---------------------------------------------------------------------------
// VerificationPipeline
// ---------------------------------------------------------------------------

export class VerificationPipeline {
  private safety: SafetyVerifier;
  private confidence: ConfidenceScorer;
  private thresholds: Thresholds;
  private readonly executor: ExecutionClient;
  private readonly log: Logger;

  constructor(options: VerificationPipelineOptions) {
    this.executor = options.executor;
    this.log = options.logger ?? createLogger('relaygate:verification:pipeline');
    this.thresholds = options.thresholds;
    this.safety = new SafetyVerifier({ executor: this.executor, registry: options.registry, judge: options.judges.safety });
    this.confidence = new ConfidenceScorer({
      executor: this.executor,
      registry: options.registry,
      judge: options.judges.confidence,
      thresholds: options.thresholds,
    });
  }

  /** Rebuild both judges after a configuration reload. */
  update(
    registry: ProviderRegistry,
    judges: { safety: JudgeConfig; confidence: JudgeConfig },
    thresholds: Thresholds,
  ): void {
    this.thresholds = thresholds;
    this.safety = new SafetyVerifier({ executor: this.executor, registry, judge: judges.safety });
    this.confidence = new ConfidenceScorer({ executor: this.executor, registry, judge: judges.confidence, thresholds });
  }

  async verify(input: VerificationInput): Promise<VerificationOutcome> {
    const ctx = { requestId: input.requestId, signal: input.signal };
    const judgeInput = {
      prompt: input.prompt,
      answer: input.answer,
      providerId: input.providerId,
      context: input.context,
    };

    const safety = await this.safety.verify(judgeInput, ctx);

    if (!safety.ok) {
      return this.finish(input, {
        verification: safety.result,
        confidence: failedConfidence('not scored because safety verification failed'),
        verdict: { kind: 'reject', reason: 'judge_failure' },
        heuristic: false,
        cancelled: safety.call.cancelled,
        judgeAttempts: safety.call.attempt ? [safety.call.attempt] : [],
      });
    }

    const confidence = await this.confidence.score(judgeInput, ctx);
    const judgeAttempts = [safety.call.attempt];

    if (!confidence.ok) {
      if (confidence.call.attempt) judgeAttempts.push(confidence.call.attempt);
      return this.finish(input, {
        verification: safety.result,
        confidence: confidence.result,
        verdict: { kind: 'reject', reason: 'judge_failure' },
        heuristic: safety.source === 'heuristic',
        cancelled: confidence.call.cancelled,
        judgeAttempts,
      });
    }

    judgeAttempts.push(confidence.call.attempt);
    return this.finish(input, {
      verification: safety.result,
      confidence: confidence.result,
      verdict: decide(safety.result, confidence.result, this.thresholds),
      heuristic: safety.source === 'heuristic' || confidence.source === 'heuristic',
      cancelled: false,
      judgeAttempts,
    });
  }

  private finish(input: VerificationInput, outcome: VerificationOutcome): VerificationOutcome {
    this.log.info(
      {
        requestId: input.requestId,
        providerId: input.providerId,
        safetyScore: outcome.verification.safetyScore,
        isSafe: outcome.verification.isSafe,
        confidenceScore: outcome.confidence.confidenceScore,
        verdict: outcome.verdict.kind,
        reason: outcome.verdict.kind === 'reject' ? outcome.verdict.reason : undefined,
      },
      'Answer verified',
    );
    return outcome;
  }
}
