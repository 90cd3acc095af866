/**
 * @relaygate/escalation - EscalationController
 *
 * Drives one RoutingRequest from `running` to exactly one terminal state.
 * Attempts are strictly sequential: an answer and both of its judge calls
 * finish before the next step is decided. Real answer calls are bounded by
 * `maxEscalations + 1`.
 */

import {
  RequestCancelledError,
  assertNever,
  createLogger,
  type AttemptOutcome,
  type ConfidenceResult,
  type EscalationSettings,
  type ExecutionAttempt,
  type Logger,
  type ProviderDescriptor,
  type RejectionReason,
  type RequestState,
  type RoutingRequest,
  type TerminalState,
  type VerificationResult,
} from '@relaygate/core';
import type { ExecutionClient, ExhaustionReason, Router } from '@relaygate/routing';
import type { Verdict, VerificationPipeline } from '@relaygate/verification';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AttemptDecision = Verdict | { kind: 'failed'; outcome: AttemptOutcome };

export interface AttemptRecord {
  attempt: ExecutionAttempt;
  /** Null when the answer call itself failed and was never judged. */
  verification: VerificationResult | null;
  confidence: ConfidenceResult | null;
  decision: AttemptDecision;
  judgeAttempts: readonly ExecutionAttempt[];
}

export interface RouteRejection {
  reason: RejectionReason;
  providerId: string;
  message: string;
}

export interface RouteResult {
  requestId: string;
  terminalState: TerminalState;
  /** Never the content of a rejected answer. */
  finalAnswer: string | null;
  finalProvider: string | null;
  attemptHistory: readonly AttemptRecord[];
  escalated: boolean;
  originalProvider: string;
  verification: VerificationResult | null;
  confidence: ConfidenceResult | null;
  /** True when the answer is the best of an exhausted ladder. */
  bestEffort: boolean;
  exhaustion?: ExhaustionReason | 'max_escalations';
  rejection?: RouteRejection;
}

export interface EscalationControllerOptions {
  router: Router;
  executor: ExecutionClient;
  pipeline: VerificationPipeline;
  settings: EscalationSettings;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Request lifecycle
// ---------------------------------------------------------------------------

/**
 * `running` moves to exactly one terminal state and never leaves it.
 */
export class RequestLifecycle {
  private current: RequestState = 'running';

  constructor(readonly requestId: string) {}

  get state(): RequestState {
    return this.current;
  }

  get terminal(): boolean {
    return this.current !== 'running';
  }

  finish(state: TerminalState): void {
    if (this.current !== 'running') {
      throw new Error(`Request "${this.requestId}" is already ${this.current}`);
    }
    this.current = state;
  }
}

/**
 * Highest confidence among judged attempts, latest on a tie.
 */
export function bestAttempt(history: readonly AttemptRecord[]): AttemptRecord | null {
  let best: AttemptRecord | null = null;
  for (const record of history) {
    if (!record.confidence || record.attempt.output === null || record.decision.kind !== 'escalate') continue;
    if (!best || !best.confidence || record.confidence.confidenceScore >= best.confidence.confidenceScore) {
      best = record;
    }
  }
  return best;
}

// ---------------------------------------------------------------------------
// EscalationController
// ---------------------------------------------------------------------------

export class EscalationController {
  private readonly router: Router;
  private readonly executor: ExecutionClient;
  private readonly pipeline: VerificationPipeline;
  private settings: EscalationSettings;
  private readonly log: Logger;

  constructor(options: EscalationControllerOptions) {
    this.router = options.router;
    this.executor = options.executor;
    this.pipeline = options.pipeline;
    this.settings = options.settings;
    this.log = options.logger ?? createLogger('relaygate:escalation:controller');
  }

  updateSettings(settings: EscalationSettings): void {
    this.settings = settings;
  }

  /**
   * @throws NoProviderAvailableError before any execution when nothing can serve
   * @throws RequestCancelledError when `signal` aborts
   */
  async run(request: RoutingRequest, signal?: AbortSignal): Promise<RouteResult> {
    const lifecycle = new RequestLifecycle(request.id);
    const history: AttemptRecord[] = [];
    const { maxEscalations, attemptTimeoutMs } = this.settings;

    this.throwIfCancelled(request, signal);

    let provider: ProviderDescriptor = this.router.selectInitial(request);
    const originalProvider = provider.id;
    let escalations = 0;

    for (;;) {
      const attempt = await this.executor.execute(
        provider,
        { prompt: request.prompt, parameters: request.parameters },
        {
          timeoutMs: attemptTimeoutMs,
          purpose: 'answer',
          signal,
          requestId: request.id,
          sequence: history.length,
        },
      );
      if (attempt.outcome === 'cancelled') this.throwIfCancelled(request, signal, true);

      let record: AttemptRecord;
      if (attempt.outcome !== 'success' || attempt.output === null) {
        record = {
          attempt,
          verification: null,
          confidence: null,
          decision: { kind: 'failed', outcome: attempt.outcome },
          judgeAttempts: [],
        };
      } else {
        const outcome = await this.pipeline.verify({
          prompt: request.prompt,
          answer: attempt.output,
          providerId: provider.id,
          requestId: request.id,
          signal,
          context: request.context,
        });
        if (outcome.cancelled) this.throwIfCancelled(request, signal, true);

        record = {
          attempt,
          verification: outcome.verification,
          confidence: outcome.confidence,
          decision: outcome.verdict,
          judgeAttempts: outcome.judgeAttempts,
        };
      }
      history.push(record);

      const decision = record.decision;
      switch (decision.kind) {
        case 'accept':
          lifecycle.finish('accepted');
          return this.accepted(request, record, history, originalProvider, escalations);

        case 'reject':
          lifecycle.finish('rejected');
          return this.rejected(request, record, decision.reason, history, originalProvider, escalations);

        case 'escalate':
        case 'failed':
          break;

        default:
          assertNever(decision, 'attempt decision');
      }

      this.log.info(
        {
          requestId: request.id,
          providerId: provider.id,
          attempt: attempt.sequence,
          decision: decision.kind,
          outcome: attempt.outcome,
          confidenceScore: record.confidence?.confidenceScore,
        },
        'Attempt not accepted, escalating',
      );

      if (escalations >= maxEscalations) {
        lifecycle.finish('exhausted');
        return this.exhausted(request, history, originalProvider, escalations, 'max_escalations');
      }

      const next = this.router.selectNext(provider.id);
      if (next.kind === 'exhausted') {
        lifecycle.finish('exhausted');
        return this.exhausted(request, history, originalProvider, escalations, next.reason);
      }

      this.log.info({ requestId: request.id, from: provider.id, to: next.provider.id }, 'Escalating to next provider');
      provider = next.provider;
      escalations++;
    }
  }

  // -----------------------------------------------------------------------
  // Terminal results
  // -----------------------------------------------------------------------

  private accepted(
    request: RoutingRequest,
    record: AttemptRecord,
    history: AttemptRecord[],
    originalProvider: string,
    escalations: number,
  ): RouteResult {
    this.log.info({ requestId: request.id, providerId: record.attempt.providerId, escalations }, 'Request accepted');
    return {
      requestId: request.id,
      terminalState: 'accepted',
      finalAnswer: record.attempt.output,
      finalProvider: record.attempt.providerId,
      attemptHistory: history,
      escalated: escalations > 0,
      originalProvider,
      verification: record.verification,
      confidence: record.confidence,
      bestEffort: false,
    };
  }

  private rejected(
    request: RoutingRequest,
    record: AttemptRecord,
    reason: RejectionReason,
    history: AttemptRecord[],
    originalProvider: string,
    escalations: number,
  ): RouteResult {
    const message =
      reason === 'unsafe'
        ? 'The answer failed safety verification'
        : reason === 'low_confidence'
          ? 'The answer was rated too unreliable to return'
          : 'The answer could not be verified';

    this.log.warn({ requestId: request.id, providerId: record.attempt.providerId, reason }, 'Request rejected');
    return {
      requestId: request.id,
      terminalState: 'rejected',
      finalAnswer: null,
      finalProvider: null,
      attemptHistory: history,
      escalated: escalations > 0,
      originalProvider,
      verification: record.verification,
      confidence: record.confidence,
      bestEffort: false,
      rejection: { reason, providerId: record.attempt.providerId, message },
    };
  }

  private exhausted(
    request: RoutingRequest,
    history: AttemptRecord[],
    originalProvider: string,
    escalations: number,
    reason: ExhaustionReason | 'max_escalations',
  ): RouteResult {
    const best = bestAttempt(history);
    this.log.info(
      { requestId: request.id, reason, attempts: history.length, bestProvider: best?.attempt.providerId ?? null },
      'Escalation exhausted',
    );
    return {
      requestId: request.id,
      terminalState: 'exhausted',
      finalAnswer: best?.attempt.output ?? null,
      finalProvider: best?.attempt.providerId ?? null,
      attemptHistory: history,
      escalated: escalations > 0,
      originalProvider,
      verification: best?.verification ?? null,
      confidence: best?.confidence ?? null,
      bestEffort: true,
      exhaustion: reason,
    };
  }

  private throwIfCancelled(request: RoutingRequest, signal?: AbortSignal, force = false): void {
    if (force || signal?.aborted) {
      this.log.info({ requestId: request.id }, 'Request cancelled');
      throw new RequestCancelledError(request.id);
    }
  }
}
