/**
 * @relaygate/routing - ExecutionClient
 *
 * Wraps exactly one adapter call with a hard timeout, classifies whatever the
 * adapter throws into an AttemptOutcome, measures latency on every path and
 * reports one metric per call. Never retries and never throws for provider
 * failures.
 */

import {
  AdapterError,
  HttpError,
  TimeoutReason,
  classifyHttpStatus,
  createLogger,
  errorMessage,
  runWithTimeout,
  type AttemptOutcome,
  type CompletionAdapter,
  type CompletionParameters,
  type CompletionResult,
  type ExecutionAttempt,
  type ExecutionPurpose,
  type Logger,
  type ProviderDescriptor,
} from '@relaygate/core';
import type { MetricsAggregator } from './metrics.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExecutionPayload {
  prompt: string;
  parameters?: CompletionParameters;
}

export interface ExecuteOptions {
  timeoutMs: number;
  purpose: ExecutionPurpose;
  /** Cancellation scope of the owner (a request, or a probe job run). */
  signal?: AbortSignal;
  requestId?: string;
  sequence?: number;
}

/** Resolves the adapter that talks to a provider's backend. */
export type AdapterLookup = (provider: ProviderDescriptor) => CompletionAdapter | undefined;

export interface ExecutionClientOptions {
  adapters: AdapterLookup;
  metrics?: MetricsAggregator;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

function isAbortLike(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

/**
 * Map a thrown value onto the attempt taxonomy. `ownerSignal` is the caller's
 * scope: its abort means cancellation, any other abort is the deadline.
 */
export function classifyFailure(err: unknown, ownerSignal?: AbortSignal): AttemptOutcome {
  if (ownerSignal?.aborted) return 'cancelled';
  if (err instanceof TimeoutReason) return 'timeout';
  if (err instanceof AdapterError) return err.kind;
  if (err instanceof HttpError) return classifyHttpStatus(err.statusCode);
  if (isAbortLike(err)) return 'timeout';
  return 'transport_error';
}

function describeFailure(err: unknown, outcome: AttemptOutcome): string {
  if (err instanceof TimeoutReason) return `Timed out after ${err.timeoutMs}ms`;
  if (outcome === 'cancelled') return 'Cancelled by caller';
  return errorMessage(err);
}

// ---------------------------------------------------------------------------
// ExecutionClient
// ---------------------------------------------------------------------------

export class ExecutionClient {
  private readonly adapters: AdapterLookup;
  private readonly metrics?: MetricsAggregator;
  private readonly log: Logger;

  constructor(options: ExecutionClientOptions) {
    this.adapters = options.adapters;
    this.metrics = options.metrics;
    this.log = options.logger ?? createLogger('relaygate:routing:executor');
  }

  async execute(
    provider: ProviderDescriptor,
    payload: ExecutionPayload,
    options: ExecuteOptions,
  ): Promise<ExecutionAttempt> {
    const startedAt = new Date();
    const start = performance.now();
    const parameters = payload.parameters ?? {};

    let result: CompletionResult | null = null;
    let outcome: AttemptOutcome;
    let error: string | null = null;

    const adapter = this.adapters(provider);
    if (!adapter) {
      outcome = 'transport_error';
      error = `No adapter configured for provider "${provider.id}"`;
    } else {
      try {
        result = await runWithTimeout(
          (signal) => adapter.complete(payload.prompt, parameters, { timeoutMs: options.timeoutMs, signal }),
          options.timeoutMs,
          options.signal,
        );
        if (result.text.trim().length === 0) {
          outcome = 'malformed_response';
          error = 'Provider returned an empty completion';
        } else {
          outcome = 'success';
        }
      } catch (err) {
        outcome = classifyFailure(err, options.signal);
        error = describeFailure(err, outcome);
      }
    }

    const latencyMs = Math.round(performance.now() - start);
    const tokenUsage = result?.tokenUsage ?? null;

    const attempt: ExecutionAttempt = {
      sequence: options.sequence ?? 0,
      providerId: provider.id,
      purpose: options.purpose,
      startedAt,
      endedAt: new Date(),
      latencyMs,
      outcome,
      output: outcome === 'success' && result ? result.text : null,
      error,
      tokenUsage,
      cost: tokenUsage ? tokenUsage.totalTokens * provider.costPerUnit : null,
    };

    const logFields = {
      providerId: provider.id,
      requestId: options.requestId,
      purpose: options.purpose,
      attempt: attempt.sequence,
      outcome,
      latencyMs,
    };
    if (outcome === 'success') {
      this.log.debug(logFields, 'Provider call succeeded');
    } else {
      this.log.warn({ ...logFields, error }, 'Provider call failed');
    }

    this.metrics?.record(attempt, options.requestId);
    return attempt;
  }
}
