/**
 * Unit Tests for JobSupervisor
 *
 * Interval schedules run under fake timers.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { JobSupervisor, isValidCron } from '@relaygate/core';

describe('JobSupervisor', () => {
  let supervisor: JobSupervisor;

  beforeEach(() => {
    vi.useFakeTimers();
    supervisor = new JobSupervisor();
  });

  afterEach(async () => {
    await supervisor.stop();
    vi.useRealTimers();
  });

  // ---------------------------------------------------------------------------
  // Scheduling
  // ---------------------------------------------------------------------------
  it('runs interval jobs on every tick once started', async () => {
    const run = vi.fn(async () => {});
    supervisor.register({ id: 'tick', schedule: { everyMs: 1000 }, run });

    await vi.advanceTimersByTimeAsync(3000);
    expect(run).not.toHaveBeenCalled();

    supervisor.start();
    await vi.advanceTimersByTimeAsync(3000);

    expect(run).toHaveBeenCalledTimes(3);
    expect(supervisor.getJob('tick')?.runs).toBe(3);
  });

  it('fires runOnStart jobs immediately', () => {
    const run = vi.fn(async () => {});
    supervisor.register({ id: 'probe:gemma', schedule: { everyMs: 30000 }, run, runOnStart: true });

    supervisor.start();

    expect(run).toHaveBeenCalledTimes(1);
  });

  it('schedules jobs registered after start', async () => {
    const run = vi.fn(async () => {});
    supervisor.start();

    supervisor.register({ id: 'late', schedule: { everyMs: 500 }, run });
    await vi.advanceTimersByTimeAsync(500);

    expect(run).toHaveBeenCalledTimes(1);
  });

  it('skips a tick while the previous run is in flight', async () => {
    let release: () => void = () => {};
    const run = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        }),
    );
    const skipped = vi.fn();
    supervisor.on('job-skipped', skipped);
    supervisor.register({ id: 'slow', schedule: { everyMs: 100 }, run });
    supervisor.start();

    await vi.advanceTimersByTimeAsync(100);
    await vi.advanceTimersByTimeAsync(100);

    expect(run).toHaveBeenCalledTimes(1);
    expect(skipped).toHaveBeenCalledWith('slow');
    expect(supervisor.getJob('slow')?.running).toBe(true);

    release();
    await supervisor.runNow('slow');
    await vi.advanceTimersByTimeAsync(100);
    expect(run).toHaveBeenCalledTimes(2);
  });

  // ---------------------------------------------------------------------------
  // Outcomes
  // ---------------------------------------------------------------------------
  it('runs a job on demand', async () => {
    const run = vi.fn(async () => {});
    const completed = vi.fn();
    supervisor.on('job-completed', completed);
    supervisor.register({ id: 'prune', schedule: { cron: '0 * * * *' }, run });

    await supervisor.runNow('prune');

    expect(run).toHaveBeenCalledTimes(1);
    expect(completed).toHaveBeenCalledWith('prune', 0);
    expect(supervisor.getJob('prune')).toMatchObject({ runs: 1, failures: 0, lastError: null, running: false });
  });

  it('records failures without throwing', async () => {
    const failed = vi.fn();
    supervisor.on('job-failed', failed);
    supervisor.register({
      id: 'broken',
      schedule: { everyMs: 1000 },
      run: async () => {
        throw new Error('nope');
      },
    });

    await supervisor.runNow('broken');

    expect(failed).toHaveBeenCalledWith('broken', 'nope');
    expect(supervisor.getJob('broken')).toMatchObject({ runs: 1, failures: 1, lastError: 'nope' });
  });

  it('aborts in-flight runs on stop and waits for them', async () => {
    const seen: AbortSignal[] = [];
    supervisor.register({
      id: 'probe:phi3',
      schedule: { everyMs: 1000 },
      runOnStart: true,
      run: (signal) =>
        new Promise<void>((resolve) => {
          seen.push(signal);
          signal.addEventListener('abort', () => resolve(), { once: true });
        }),
    });
    const stopped = vi.fn();
    supervisor.on('stopped', stopped);
    supervisor.start();

    await supervisor.stop();

    expect(seen.map((s) => s.aborted)).toEqual([true]);
    expect(stopped).toHaveBeenCalledTimes(1);
    expect(supervisor.isRunning).toBe(false);
  });

  it('gives each run its own signal', async () => {
    const signals: AbortSignal[] = [];
    supervisor.register({
      id: 'each',
      schedule: { everyMs: 1000 },
      run: async (signal) => {
        signals.push(signal);
      },
    });

    await supervisor.runNow('each');
    await supervisor.runNow('each');

    expect(signals).toHaveLength(2);
    expect(signals[0]).not.toBe(signals[1]);
  });

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------
  it('rejects invalid schedules', () => {
    expect(() => supervisor.register({ id: 'bad', schedule: { cron: 'nope' }, run: async () => {} })).toThrow(
      'Invalid cron expression: "nope"',
    );
    expect(() => supervisor.register({ id: 'bad', schedule: { everyMs: 0 }, run: async () => {} })).toThrow(
      'Job "bad" interval must be positive',
    );
  });

  it('unregisters jobs', () => {
    supervisor.register({ id: 'x', schedule: { everyMs: 1000 }, run: async () => {} });

    expect(supervisor.unregister('x')).toBe(true);
    expect(supervisor.unregister('x')).toBe(false);
    expect(supervisor.listJobs()).toEqual([]);
  });

  it('throws for unknown jobs on runNow', async () => {
    await expect(supervisor.runNow('ghost')).rejects.toThrow('No job registered with id "ghost"');
  });
});

describe('isValidCron', () => {
  it('accepts five-field expressions and rejects garbage', () => {
    expect(isValidCron('0 * * * *')).toBe(true);
    expect(isValidCron('*/5 * * * *')).toBe(true);
    expect(isValidCron('every hour')).toBe(false);
  });
});
