/**
 * @relaygate/routing - CircuitBreaker
 *
 * Per-provider circuit state with a rolling outcome window and latency
 * samples. Every mutation builds a new frozen HealthRecord and swaps it in
 * one assignment, so readers only ever see a complete snapshot.
 *
 *   closed    -> open       failure rate over a full window above threshold,
 *                           or K consecutive failures
 *   open      -> half_open  `beginTrial()` once the cool-down has elapsed
 *   half_open -> closed     successful trial probe
 *   half_open -> open       failed trial probe, next backoff step
 */

import { percentile, type CircuitState, type HealthRecord, type HealthSettings, type LatencyStats } from '@relaygate/core';

export type BreakerSettings = Pick<
  HealthSettings,
  | 'windowSize'
  | 'failureRateThreshold'
  | 'consecutiveFailureThreshold'
  | 'coolDownMs'
  | 'backoffMultiplier'
  | 'maxCoolDownMs'
  | 'latencyWindow'
>;

export type SampleSource = 'probe' | 'traffic';

export interface OutcomeSample {
  ok: boolean;
  latencyMs: number;
  source: SampleSource;
  error?: string | null;
}

export interface Transition {
  providerId: string;
  from: CircuitState;
  to: CircuitState;
  record: HealthRecord;
}

/**
 * Cool-down for the n-th consecutive trip (1-based), capped at maxCoolDownMs.
 */
export function coolDownFor(tripCount: number, settings: BreakerSettings): number {
  const raw = settings.coolDownMs * Math.pow(settings.backoffMultiplier, Math.max(0, tripCount - 1));
  return Math.min(raw, settings.maxCoolDownMs);
}

function latencyStats(samples: readonly number[]): LatencyStats | null {
  if (samples.length === 0) return null;
  const sum = samples.reduce((acc, v) => acc + v, 0);
  return {
    samples: samples.length,
    meanMs: Math.round(sum / samples.length),
    p50Ms: percentile(samples, 50),
    p95Ms: percentile(samples, 95),
  };
}

export class CircuitBreaker {
  readonly providerId: string;
  private settings: BreakerSettings;
  private readonly now: () => Date;

  private window: boolean[] = [];
  private latencies: number[] = [];
  private current: HealthRecord;

  constructor(providerId: string, settings: BreakerSettings, now: () => Date = () => new Date()) {
    this.providerId = providerId;
    this.settings = settings;
    this.now = now;
    this.current = Object.freeze({
      providerId,
      state: 'closed',
      successRate: null,
      sampleCount: 0,
      consecutiveFailures: 0,
      latency: null,
      lastProbeAt: null,
      lastTransitionAt: now(),
      tripCount: 0,
      coolDownUntil: null,
      lastError: null,
    });
  }

  get snapshot(): HealthRecord {
    return this.current;
  }

  get state(): CircuitState {
    return this.current.state;
  }

  updateSettings(settings: BreakerSettings): void {
    this.settings = settings;
    this.window = this.window.slice(-settings.windowSize);
    this.latencies = this.latencies.slice(-settings.latencyWindow);
    this.commit({});
  }

  /** True when the circuit is open and its cool-down has elapsed. */
  trialDue(): boolean {
    const { state, coolDownUntil } = this.current;
    return state === 'open' && (coolDownUntil === null || coolDownUntil.getTime() <= this.now().getTime());
  }

  /**
   * open -> half_open. Returns the transition, or null when no trial is due.
   */
  beginTrial(): Transition | null {
    if (!this.trialDue()) return null;
    return this.transition('half_open', { coolDownUntil: null });
  }

  /**
   * Fold one outcome into the window and apply the transition rules.
   * Returns the transition it caused, if any.
   */
  record(sample: OutcomeSample): Transition | null {
    const at = this.now();

    this.window = [...this.window, sample.ok].slice(-this.settings.windowSize);
    if (sample.ok) {
      this.latencies = [...this.latencies, sample.latencyMs].slice(-this.settings.latencyWindow);
    }

    const consecutiveFailures = sample.ok ? 0 : this.current.consecutiveFailures + 1;
    const base: Partial<Mutable<HealthRecord>> = {
      consecutiveFailures,
      lastError: sample.ok ? this.current.lastError : (sample.error ?? 'unknown error'),
      ...(sample.source === 'probe' ? { lastProbeAt: at } : {}),
    };

    switch (this.current.state) {
      case 'closed':
        if (!sample.ok && this.shouldTrip(consecutiveFailures)) {
          return this.trip(base);
        }
        this.commit(base);
        return null;

      case 'half_open':
        if (sample.source !== 'probe') {
          this.commit(base);
          return null;
        }
        if (sample.ok) {
          this.window = [true];
          return this.transition('closed', { ...base, tripCount: 0, coolDownUntil: null });
        }
        return this.trip(base);

      case 'open':
        this.commit(base);
        return null;
    }
  }

  private shouldTrip(consecutiveFailures: number): boolean {
    if (consecutiveFailures >= this.settings.consecutiveFailureThreshold) return true;
    if (this.window.length < this.settings.windowSize) return false;
    const failures = this.window.filter((ok) => !ok).length;
    return failures / this.window.length > this.settings.failureRateThreshold;
  }

  private trip(base: Partial<Mutable<HealthRecord>>): Transition {
    const tripCount = this.current.tripCount + 1;
    const coolDownUntil = new Date(this.now().getTime() + coolDownFor(tripCount, this.settings));
    return this.transition('open', { ...base, tripCount, coolDownUntil });
  }

  private transition(to: CircuitState, patch: Partial<Mutable<HealthRecord>>): Transition {
    const from = this.current.state;
    this.commit({ ...patch, state: to, lastTransitionAt: this.now() });
    return { providerId: this.providerId, from, to, record: this.current };
  }

  private commit(patch: Partial<Mutable<HealthRecord>>): void {
    const successes = this.window.filter(Boolean).length;
    this.current = Object.freeze({
      ...this.current,
      ...patch,
      successRate: this.window.length === 0 ? null : successes / this.window.length,
      sampleCount: this.window.length,
      latency: latencyStats(this.latencies),
    });
  }
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };
