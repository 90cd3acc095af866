/**
 * @relaygate/verification - Judge invocation
 *
 * Runs one judge prompt through the Execution Client against the judge's
 * fixed backend. The judge backend is never part of the escalation ladder.
 */

import type { ExecutionAttempt, JudgeConfig, ProviderDescriptor } from '@relaygate/core';
import type { ExecutionClient, ProviderRegistry } from '@relaygate/routing';

export interface JudgeCallContext {
  requestId?: string;
  /** The owning request's scope. */
  signal?: AbortSignal;
  sequence?: number;
}

export type JudgeCall =
  | { ok: true; text: string; attempt: ExecutionAttempt }
  | { ok: false; error: string; attempt: ExecutionAttempt | null; cancelled: boolean };

export interface JudgeDeps {
  executor: ExecutionClient;
  registry: ProviderRegistry;
  judge: JudgeConfig;
}

function resolveJudge(registry: ProviderRegistry, judge: JudgeConfig): ProviderDescriptor | string {
  const provider = registry.get(judge.providerId);
  if (!provider) return `Judge provider "${judge.providerId}" is not registered`;
  if (!provider.active) return `Judge provider "${judge.providerId}" is inactive`;
  return provider;
}

export async function callJudge(deps: JudgeDeps, prompt: string, ctx: JudgeCallContext): Promise<JudgeCall> {
  const provider = resolveJudge(deps.registry, deps.judge);
  if (typeof provider === 'string') {
    return { ok: false, error: provider, attempt: null, cancelled: false };
  }

  const attempt = await deps.executor.execute(
    provider,
    { prompt, parameters: { maxTokens: deps.judge.maxTokens, temperature: 0 } },
    {
      timeoutMs: deps.judge.timeoutMs,
      purpose: 'judge',
      signal: ctx.signal,
      requestId: ctx.requestId,
      sequence: ctx.sequence,
    },
  );

  if (attempt.outcome !== 'success' || attempt.output === null) {
    return {
      ok: false,
      error: `${attempt.outcome}: ${attempt.error ?? 'no output'}`,
      attempt,
      cancelled: attempt.outcome === 'cancelled',
    };
  }

  return { ok: true, text: attempt.output, attempt };
}
