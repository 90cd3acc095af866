/**
 * Unit Tests for CircuitBreaker
 *
 * Tests trip rules, cool-down backoff, half-open trials and snapshot
 * immutability against an injected clock.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitBreaker, coolDownFor, type BreakerSettings, type OutcomeSample } from '@relaygate/routing';

const SETTINGS: BreakerSettings = {
  windowSize: 5,
  failureRateThreshold: 0.5,
  consecutiveFailureThreshold: 3,
  coolDownMs: 1000,
  backoffMultiplier: 2,
  maxCoolDownMs: 3000,
  latencyWindow: 20,
};

const T0 = 1_700_000_000_000;

function fail(source: OutcomeSample['source'] = 'probe'): OutcomeSample {
  return { ok: false, latencyMs: 10, source, error: 'connection refused' };
}

function ok(latencyMs = 10, source: OutcomeSample['source'] = 'probe'): OutcomeSample {
  return { ok: true, latencyMs, source };
}

describe('CircuitBreaker', () => {
  let clock: number;
  const now = (): Date => new Date(clock);

  function breaker(overrides: Partial<BreakerSettings> = {}): CircuitBreaker {
    return new CircuitBreaker('gemma', { ...SETTINGS, ...overrides }, now);
  }

  beforeEach(() => {
    clock = T0;
  });

  // ---------------------------------------------------------------------------
  // Initial state
  // ---------------------------------------------------------------------------
  it('starts closed with no samples', () => {
    const cb = breaker();

    expect(cb.snapshot).toEqual({
      providerId: 'gemma',
      state: 'closed',
      successRate: null,
      sampleCount: 0,
      consecutiveFailures: 0,
      latency: null,
      lastProbeAt: null,
      lastTransitionAt: new Date(T0),
      tripCount: 0,
      coolDownUntil: null,
      lastError: null,
    });
  });

  // ---------------------------------------------------------------------------
  // Tripping
  // ---------------------------------------------------------------------------
  describe('closed -> open', () => {
    it('trips on K consecutive failures', () => {
      const cb = breaker();

      expect(cb.record(fail())).toBeNull();
      expect(cb.record(fail())).toBeNull();
      const transition = cb.record(fail());

      expect(transition?.from).toBe('closed');
      expect(transition?.to).toBe('open');
      expect(cb.snapshot.tripCount).toBe(1);
      expect(cb.snapshot.consecutiveFailures).toBe(3);
      expect(cb.snapshot.coolDownUntil).toEqual(new Date(T0 + 1000));
      expect(cb.snapshot.lastError).toBe('connection refused');
    });

    it('trips when a full window exceeds the failure rate', () => {
      const cb = breaker();

      cb.record(ok());
      cb.record(fail());
      cb.record(ok());
      expect(cb.record(fail())).toBeNull();
      const transition = cb.record(fail());

      expect(transition?.to).toBe('open');
      expect(cb.snapshot.successRate).toBe(0.4);
      expect(cb.snapshot.consecutiveFailures).toBe(2);
    });

    it('does not apply the rate rule before the window is full', () => {
      const cb = breaker({ consecutiveFailureThreshold: 10 });

      cb.record(fail());
      cb.record(fail());
      cb.record(fail());

      expect(cb.state).toBe('closed');
      expect(cb.snapshot.successRate).toBe(0);
    });

    it('does not trip at exactly the failure rate', () => {
      const cb = breaker({ windowSize: 4 });

      cb.record(ok());
      cb.record(fail());
      cb.record(ok());
      cb.record(fail());

      expect(cb.state).toBe('closed');
      expect(cb.snapshot.successRate).toBe(0.5);
    });

    it('resets the consecutive count on success', () => {
      const cb = breaker();

      cb.record(fail());
      cb.record(fail());
      cb.record(ok());
      cb.record(fail());

      expect(cb.state).toBe('closed');
      expect(cb.snapshot.consecutiveFailures).toBe(1);
    });

    it('trips on traffic failures as well as probes', () => {
      const cb = breaker();

      cb.record(fail('traffic'));
      cb.record(fail('traffic'));
      cb.record(fail('traffic'));

      expect(cb.state).toBe('open');
      expect(cb.snapshot.lastProbeAt).toBeNull();
    });
  });

  // ---------------------------------------------------------------------------
  // Recovery
  // ---------------------------------------------------------------------------
  describe('open -> half_open -> closed', () => {
    function tripped(): CircuitBreaker {
      const cb = breaker();
      cb.record(fail());
      cb.record(fail());
      cb.record(fail());
      return cb;
    }

    it('refuses a trial before the cool-down elapses', () => {
      const cb = tripped();
      clock += 999;

      expect(cb.trialDue()).toBe(false);
      expect(cb.beginTrial()).toBeNull();
      expect(cb.state).toBe('open');
    });

    it('enters half_open once the cool-down elapses', () => {
      const cb = tripped();
      clock += 1000;

      const transition = cb.beginTrial();

      expect(transition).toMatchObject({ from: 'open', to: 'half_open' });
      expect(cb.snapshot.coolDownUntil).toBeNull();
    });

    it('closes on a successful trial probe and resets the window', () => {
      const cb = tripped();
      clock += 1000;
      cb.beginTrial();

      const transition = cb.record(ok(42));

      expect(transition).toMatchObject({ from: 'half_open', to: 'closed' });
      expect(cb.snapshot.tripCount).toBe(0);
      expect(cb.snapshot.sampleCount).toBe(1);
      expect(cb.snapshot.successRate).toBe(1);
      expect(cb.snapshot.consecutiveFailures).toBe(0);
    });

    it('ignores traffic outcomes while half_open', () => {
      const cb = tripped();
      clock += 1000;
      cb.beginTrial();

      expect(cb.record(ok(10, 'traffic'))).toBeNull();
      expect(cb.record(fail('traffic'))).toBeNull();
      expect(cb.state).toBe('half_open');
    });

    it('stays open on outcomes recorded while open', () => {
      const cb = tripped();

      expect(cb.record(ok(10, 'traffic'))).toBeNull();
      expect(cb.state).toBe('open');
    });

    it('backs off exponentially on failed trials, capped at maxCoolDownMs', () => {
      const cb = tripped();

      clock += 1000;
      cb.beginTrial();
      expect(cb.record(fail())).toMatchObject({ from: 'half_open', to: 'open' });
      expect(cb.snapshot.tripCount).toBe(2);
      expect(cb.snapshot.coolDownUntil).toEqual(new Date(clock + 2000));

      clock += 2000;
      cb.beginTrial();
      cb.record(fail());
      expect(cb.snapshot.tripCount).toBe(3);
      expect(cb.snapshot.coolDownUntil).toEqual(new Date(clock + 3000));
    });
  });

  // ---------------------------------------------------------------------------
  // Latency and snapshots
  // ---------------------------------------------------------------------------
  it('computes latency from successful samples only', () => {
    const cb = breaker();

    cb.record(ok(100));
    cb.record(ok(300));
    cb.record({ ok: false, latencyMs: 5000, source: 'probe' });

    expect(cb.snapshot.latency).toEqual({ samples: 2, meanMs: 200, p50Ms: 100, p95Ms: 300 });
  });

  it('sets lastProbeAt only for probe samples', () => {
    const cb = breaker();

    cb.record(ok(10, 'traffic'));
    expect(cb.snapshot.lastProbeAt).toBeNull();

    clock += 5;
    cb.record(ok());
    expect(cb.snapshot.lastProbeAt).toEqual(new Date(T0 + 5));
  });

  it('publishes frozen snapshots that later writes do not mutate', () => {
    const cb = breaker();
    const before = cb.snapshot;

    cb.record(fail());

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.consecutiveFailures).toBe(0);
    expect(cb.snapshot).not.toBe(before);
    expect(cb.snapshot.consecutiveFailures).toBe(1);
  });

  it('trims the window when settings shrink', () => {
    const cb = breaker();
    cb.record(fail());
    cb.record(ok());
    cb.record(ok());

    cb.updateSettings({ ...SETTINGS, windowSize: 2 });

    expect(cb.snapshot.sampleCount).toBe(2);
    expect(cb.snapshot.successRate).toBe(1);
  });
});

describe('coolDownFor', () => {
  it('grows by the multiplier per consecutive trip', () => {
    expect(coolDownFor(1, SETTINGS)).toBe(1000);
    expect(coolDownFor(2, SETTINGS)).toBe(2000);
  });

  it('caps at maxCoolDownMs', () => {
    expect(coolDownFor(3, SETTINGS)).toBe(3000);
    expect(coolDownFor(10, SETTINGS)).toBe(3000);
  });
});
