/**
 * @relaygate/routing - MetricsAggregator
 *
 * Receives one record per Execution Client call (answers, judges and probes)
 * and one summary per finished routing request. Keeps a bounded recent
 * history and cumulative totals per provider, forwards records to an
 * optional persistent sink, and re-emits them for the Health Prober.
 *
 * Events:
 *   - `attempt` (metric: AttemptMetric, attempt: ExecutionAttempt)
 *   - `request` (summary: RequestSummary)
 */

import { EventEmitter } from 'node:events';
import {
  createLogger,
  errorMessage,
  type AttemptOutcome,
  type ExecutionAttempt,
  type ExecutionPurpose,
  type Logger,
  type TerminalState,
} from '@relaygate/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AttemptMetric {
  requestId: string | null;
  providerId: string;
  purpose: ExecutionPurpose;
  outcome: AttemptOutcome;
  latencyMs: number;
  cost: number | null;
  totalTokens: number | null;
  at: Date;
}

export interface RequestSummary {
  requestId: string;
  intent: string;
  originalProvider: string | null;
  finalProvider: string | null;
  terminalState: TerminalState | 'failed';
  attempts: number;
  escalated: boolean;
  error: string | null;
  at: Date;
}

export interface ProviderTotals {
  calls: number;
  successes: number;
  failures: Partial<Record<AttemptOutcome, number>>;
  totalCost: number;
  totalTokens: number;
  meanLatencyMs: number | null;
}

/** Persistent destination for metric records. */
export interface MetricsSink {
  insertAttempt(metric: AttemptMetric): void;
  insertRequest(summary: RequestSummary): void;
  /** Keep the newest `retainPerProvider` attempt rows per provider. Returns rows deleted. */
  prune(retainPerProvider: number): number;
  close(): void;
}

export interface MetricsAggregatorOptions {
  retentionPerProvider?: number;
  sink?: MetricsSink;
  logger?: Logger;
}

interface Accumulator {
  calls: number;
  successes: number;
  failures: Partial<Record<AttemptOutcome, number>>;
  totalCost: number;
  totalTokens: number;
  latencySum: number;
}

// ---------------------------------------------------------------------------
// MetricsAggregator
// ---------------------------------------------------------------------------

export class MetricsAggregator extends EventEmitter {
  private readonly recent = new Map<string, AttemptMetric[]>();
  private readonly totals = new Map<string, Accumulator>();
  private retention: number;
  private readonly sink?: MetricsSink;
  private readonly log: Logger;

  constructor(options: MetricsAggregatorOptions = {}) {
    super();
    this.retention = options.retentionPerProvider ?? 1000;
    this.sink = options.sink;
    this.log = options.logger ?? createLogger('relaygate:routing:metrics');
  }

  setRetention(retentionPerProvider: number): void {
    this.retention = retentionPerProvider;
    for (const [providerId, list] of this.recent) {
      this.recent.set(providerId, list.slice(-retentionPerProvider));
    }
  }

  /**
   * Record one Execution Client call.
   */
  record(attempt: ExecutionAttempt, requestId?: string): AttemptMetric {
    const metric: AttemptMetric = {
      requestId: requestId ?? null,
      providerId: attempt.providerId,
      purpose: attempt.purpose,
      outcome: attempt.outcome,
      latencyMs: attempt.latencyMs,
      cost: attempt.cost,
      totalTokens: attempt.tokenUsage?.totalTokens ?? null,
      at: attempt.endedAt,
    };

    const list = this.recent.get(metric.providerId) ?? [];
    list.push(metric);
    if (list.length > this.retention) {
      list.splice(0, list.length - this.retention);
    }
    this.recent.set(metric.providerId, list);

    const acc = this.totals.get(metric.providerId) ?? {
      calls: 0,
      successes: 0,
      failures: {},
      totalCost: 0,
      totalTokens: 0,
      latencySum: 0,
    };
    acc.calls++;
    acc.latencySum += metric.latencyMs;
    acc.totalCost += metric.cost ?? 0;
    acc.totalTokens += metric.totalTokens ?? 0;
    if (metric.outcome === 'success') {
      acc.successes++;
    } else {
      acc.failures[metric.outcome] = (acc.failures[metric.outcome] ?? 0) + 1;
    }
    this.totals.set(metric.providerId, acc);

    if (this.sink) {
      try {
        this.sink.insertAttempt(metric);
      } catch (err) {
        this.log.warn({ providerId: metric.providerId, error: errorMessage(err) }, 'Failed to persist attempt metric');
      }
    }

    this.emit('attempt', metric, attempt);
    return metric;
  }

  /**
   * Record the outcome of a finished routing request.
   */
  recordRequest(summary: RequestSummary): void {
    if (this.sink) {
      try {
        this.sink.insertRequest(summary);
      } catch (err) {
        this.log.warn({ requestId: summary.requestId, error: errorMessage(err) }, 'Failed to persist request summary');
      }
    }
    this.emit('request', summary);
  }

  /**
   * Most recent metrics for a provider, oldest first.
   */
  getRecent(providerId: string, limit?: number): AttemptMetric[] {
    const list = this.recent.get(providerId) ?? [];
    return limit === undefined ? [...list] : list.slice(-limit);
  }

  getTotals(providerId: string): ProviderTotals {
    const acc = this.totals.get(providerId);
    if (!acc) {
      return { calls: 0, successes: 0, failures: {}, totalCost: 0, totalTokens: 0, meanLatencyMs: null };
    }
    return {
      calls: acc.calls,
      successes: acc.successes,
      failures: { ...acc.failures },
      totalCost: acc.totalCost,
      totalTokens: acc.totalTokens,
      meanLatencyMs: Math.round(acc.latencySum / acc.calls),
    };
  }

  /**
   * Trim the persistent sink to the retention limit. Returns rows deleted.
   */
  prune(): number {
    if (!this.sink) return 0;
    const deleted = this.sink.prune(this.retention);
    this.log.debug({ deleted, retentionPerProvider: this.retention }, 'Pruned persisted metrics');
    return deleted;
  }

  close(): void {
    this.sink?.close();
  }
}
