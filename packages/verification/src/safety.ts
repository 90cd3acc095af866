/**
 * @relaygate/verification - SafetyVerifier
 */

import {
  createLogger,
  type JudgeConfig,
  type Logger,
  type Thresholds,
  type VerificationResult,
} from '@relaygate/core';
import type { ExecutionClient, ProviderRegistry } from '@relaygate/routing';
import { callJudge, type JudgeCall, type JudgeCallContext } from './judge.js';
import { parseSafetyReply, type ParseSource } from './parsing.js';
import { buildSafetyPrompt, type JudgePromptInput } from './prompts.js';

export type SafetyOutcome =
  | { ok: true; result: VerificationResult; source: ParseSource; call: Extract<JudgeCall, { ok: true }> }
  | { ok: false; result: VerificationResult; call: Extract<JudgeCall, { ok: false }> };

export const VERIFICATION_ERROR_ISSUE = 'verification_error';

/** Result recorded when the safety judge could not give an answer. */
export function failedVerification(reason: string): VerificationResult {
  return Object.freeze({
    safetyScore: 0,
    isSafe: false,
    issues: Object.freeze([VERIFICATION_ERROR_ISSUE]),
    explanation: `Safety verification failed: ${reason}`,
  });
}

/**
 * `is_safe = false` is authoritative; a score under `safetyMin` or a critical
 * issue tag also makes the answer unsafe whatever the flag says.
 */
export function isEffectivelySafe(result: VerificationResult, thresholds: Thresholds): boolean {
  if (!result.isSafe) return false;
  if (result.safetyScore < thresholds.safetyMin) return false;
  return !result.issues.some((issue) => thresholds.criticalIssues.includes(issue));
}

export interface SafetyVerifierOptions {
  executor: ExecutionClient;
  registry: ProviderRegistry;
  judge: JudgeConfig;
  logger?: Logger;
}

export class SafetyVerifier {
  private readonly executor: ExecutionClient;
  private readonly registry: ProviderRegistry;
  private readonly judge: JudgeConfig;
  private readonly log: Logger;

  constructor(options: SafetyVerifierOptions) {
    this.executor = options.executor;
    this.registry = options.registry;
    this.judge = options.judge;
    this.log = options.logger ?? createLogger('relaygate:verification:safety');
  }

  async verify(input: JudgePromptInput, ctx: JudgeCallContext = {}): Promise<SafetyOutcome> {
    const call = await callJudge(
      { executor: this.executor, registry: this.registry, judge: this.judge },
      buildSafetyPrompt(input),
      ctx,
    );

    if (!call.ok) {
      this.log.warn({ requestId: ctx.requestId, judge: this.judge.providerId, error: call.error }, 'Safety judge failed');
      return { ok: false, result: failedVerification(call.error), call };
    }

    const parsed = parseSafetyReply(call.text);
    if (parsed.source === 'heuristic') {
      this.log.warn({ requestId: ctx.requestId, judge: this.judge.providerId }, 'Safety reply unparseable, using heuristics');
    }

    const result: VerificationResult = Object.freeze({
      safetyScore: parsed.safetyScore,
      isSafe: parsed.isSafe,
      issues: Object.freeze([...parsed.issues]),
      explanation: parsed.explanation,
    });

    return { ok: true, result, source: parsed.source, call };
  }
}
