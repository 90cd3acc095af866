/**
 * @relaygate/routing - HealthProber
 *
 * Owns one CircuitBreaker per provider. Probes every active provider
 * (answer providers and judges) on its own recurring job through the same
 * Execution Client used for real traffic, and folds traffic outcomes into
 * the same rolling window. Probe jobs run under the JobSupervisor's own
 * cancellation scope, never a request's.
 *
 * Events:
 *   - `transition` (transition: Transition)
 */

import { EventEmitter } from 'node:events';
import {
  createLogger,
  type CircuitState,
  type ExecutionAttempt,
  type HealthRecord,
  type HealthSettings,
  type JobSupervisor,
  type Logger,
} from '@relaygate/core';
import { CircuitBreaker, type SampleSource, type Transition } from './circuit-breaker.js';
import type { ExecutionClient } from './executor.js';
import type { ProviderRegistry } from './registry.js';

export const PROBE_JOB_PREFIX = 'probe:';

export interface HealthProberOptions {
  registry: ProviderRegistry;
  executor: ExecutionClient;
  settings: HealthSettings;
  supervisor: JobSupervisor;
  logger?: Logger;
  now?: () => Date;
}

/** Read side consumed by the Router and the status surface. */
export interface HealthView {
  getState(providerId: string): CircuitState;
  getRecord(providerId: string): HealthRecord | undefined;
}

export class HealthProber extends EventEmitter implements HealthView {
  private registry: ProviderRegistry;
  private readonly executor: ExecutionClient;
  private settings: HealthSettings;
  private readonly supervisor: JobSupervisor;
  private readonly log: Logger;
  private readonly now: () => Date;

  private readonly breakers = new Map<string, CircuitBreaker>();
  /** Registered probe job id -> its interval. */
  private readonly probeJobs = new Map<string, number>();
  private readonly trialsInFlight = new Set<string>();
  private started = false;

  constructor(options: HealthProberOptions) {
    super();
    this.registry = options.registry;
    this.executor = options.executor;
    this.settings = options.settings;
    this.supervisor = options.supervisor;
    this.log = options.logger ?? createLogger('relaygate:routing:prober');
    this.now = options.now ?? (() => new Date());
  }

  // -----------------------------------------------------------------------
  // Read side
  // -----------------------------------------------------------------------

  getRecord(providerId: string): HealthRecord | undefined {
    if (!this.registry.has(providerId)) return undefined;
    return this.breaker(providerId).snapshot;
  }

  getState(providerId: string): CircuitState {
    return this.breakers.get(providerId)?.state ?? 'closed';
  }

  snapshot(): HealthRecord[] {
    return this.registry.list().map((p) => this.breaker(p.id).snapshot);
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Register one probe job per active provider with the supervisor.
   */
  start(): void {
    this.started = true;
    this.syncJobs();
    this.log.info({ providers: [...this.probeJobs.keys()], intervalMs: this.settings.probeIntervalMs }, 'Health prober started');
  }

  stop(): void {
    for (const jobId of this.probeJobs.keys()) {
      this.supervisor.unregister(jobId);
    }
    this.probeJobs.clear();
    this.started = false;
    this.log.info('Health prober stopped');
  }

  get running(): boolean {
    return this.started;
  }

  /**
   * Apply a new catalogue and settings. Breakers of removed providers are
   * dropped; surviving breakers keep their state.
   */
  reconfigure(registry: ProviderRegistry, settings: HealthSettings): void {
    this.registry = registry;
    this.settings = settings;

    for (const [id, breaker] of this.breakers) {
      if (!registry.has(id)) {
        this.breakers.delete(id);
      } else {
        breaker.updateSettings(settings);
      }
    }

    if (this.started) {
      this.syncJobs();
    }
  }

  // -----------------------------------------------------------------------
  // Probing
  // -----------------------------------------------------------------------

  /**
   * Probe one provider now. An open circuit is only probed once its
   * cool-down has elapsed, and that probe is the half-open trial.
   */
  async probeOnce(providerId: string, signal?: AbortSignal): Promise<HealthRecord | undefined> {
    const provider = this.registry.get(providerId);
    if (!provider) return undefined;

    const breaker = this.breaker(providerId);

    if (this.trialsInFlight.has(providerId)) {
      return breaker.snapshot;
    }

    if (breaker.state === 'open') {
      const trial = breaker.beginTrial();
      if (!trial) {
        return breaker.snapshot;
      }
      this.announce(trial);
    }

    const isTrial = breaker.state === 'half_open';
    if (isTrial) this.trialsInFlight.add(providerId);

    try {
      const attempt = await this.executor.execute(
        provider,
        { prompt: this.settings.probePrompt, parameters: { maxTokens: 8, temperature: 0 } },
        { timeoutMs: this.settings.probeTimeoutMs, purpose: 'probe', signal },
      );
      this.apply(attempt, 'probe');
    } finally {
      if (isTrial) this.trialsInFlight.delete(providerId);
    }

    return this.breaker(providerId).snapshot;
  }

  /**
   * Fold a real-traffic attempt (answer or judge call) into the provider's
   * rolling window.
   */
  recordOutcome(attempt: ExecutionAttempt): void {
    if (!this.registry.has(attempt.providerId)) return;
    this.apply(attempt, 'traffic');
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private apply(attempt: ExecutionAttempt, source: SampleSource): void {
    if (attempt.outcome === 'cancelled') return;

    const transition = this.breaker(attempt.providerId).record({
      ok: attempt.outcome === 'success',
      latencyMs: attempt.latencyMs,
      source,
      error: attempt.error,
    });

    if (transition) {
      this.announce(transition);
    }
  }

  private announce(transition: Transition): void {
    const fields = {
      providerId: transition.providerId,
      from: transition.from,
      to: transition.to,
      consecutiveFailures: transition.record.consecutiveFailures,
      successRate: transition.record.successRate,
      coolDownUntil: transition.record.coolDownUntil?.toISOString() ?? null,
    };
    if (transition.to === 'open') {
      this.log.warn(fields, 'Circuit opened');
    } else {
      this.log.info(fields, `Circuit ${transition.to}`);
    }
    this.emit('transition', transition);
  }

  private breaker(providerId: string): CircuitBreaker {
    let breaker = this.breakers.get(providerId);
    if (!breaker) {
      breaker = new CircuitBreaker(providerId, this.settings, this.now);
      this.breakers.set(providerId, breaker);
    }
    return breaker;
  }

  private syncJobs(): void {
    const wanted = new Set(
      this.registry
        .list()
        .filter((p) => p.active)
        .map((p) => `${PROBE_JOB_PREFIX}${p.id}`),
    );

    for (const jobId of this.probeJobs.keys()) {
      if (!wanted.has(jobId)) {
        this.supervisor.unregister(jobId);
        this.probeJobs.delete(jobId);
      }
    }

    // Jobs already on the current interval keep running; re-registering
    // would abort a probe in flight.
    const everyMs = this.settings.probeIntervalMs;
    for (const jobId of wanted) {
      if (this.probeJobs.get(jobId) === everyMs) continue;

      const providerId = jobId.slice(PROBE_JOB_PREFIX.length);
      this.supervisor.register({
        id: jobId,
        schedule: { everyMs },
        runOnStart: true,
        run: async (signal) => {
          await this.probeOnce(providerId, signal);
        },
      });
      this.probeJobs.set(jobId, everyMs);
    }
  }
}
