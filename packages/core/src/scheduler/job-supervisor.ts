/**
 * @relaygate/core - Job Supervisor
 *
 * Runs named recurring jobs, each on a fixed interval (`everyMs`) or a
 * node-cron expression (`cron`). Every run receives its own AbortSignal so a
 * job never shares cancellation scope with request traffic; `stop()` aborts
 * in-flight runs. A tick that fires while the previous run of the same job is
 * still in flight is skipped.
 *
 * Events:
 *   - `job-running`   (id)
 *   - `job-completed` (id, durationMs)
 *   - `job-failed`    (id, error)
 *   - `job-skipped`   (id)
 */

import cron, { type ScheduledTask } from 'node-cron';
import { EventEmitter } from 'node:events';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type JobSchedule = { everyMs: number } | { cron: string };

export interface JobDefinition {
  id: string;
  schedule: JobSchedule;
  run: (signal: AbortSignal) => Promise<void>;
  /** Fire once immediately when the job starts (interval jobs only). */
  runOnStart?: boolean;
}

export interface JobStatus {
  id: string;
  schedule: JobSchedule;
  running: boolean;
  lastRunAt: number | null;
  lastDurationMs: number | null;
  lastError: string | null;
  runs: number;
  failures: number;
}

interface JobEntry {
  definition: JobDefinition;
  status: JobStatus;
  timer: ReturnType<typeof setInterval> | null;
  cronTask: ScheduledTask | null;
  inFlight: AbortController | null;
  current: Promise<void> | null;
}

/**
 * Validate a cron expression (5 or 6 fields).
 */
export function isValidCron(expression: string): boolean {
  return cron.validate(expression);
}

// ---------------------------------------------------------------------------
// JobSupervisor
// ---------------------------------------------------------------------------

export class JobSupervisor extends EventEmitter {
  private readonly jobs = new Map<string, JobEntry>();
  private running = false;

  /**
   * Register (or replace) a job. Starts it immediately if the supervisor is running.
   */
  register(definition: JobDefinition): void {
    if ('cron' in definition.schedule && !isValidCron(definition.schedule.cron)) {
      throw new Error(`Invalid cron expression: "${definition.schedule.cron}"`);
    }
    if ('everyMs' in definition.schedule && definition.schedule.everyMs <= 0) {
      throw new Error(`Job "${definition.id}" interval must be positive`);
    }

    this.unregister(definition.id);

    const entry: JobEntry = {
      definition,
      status: {
        id: definition.id,
        schedule: definition.schedule,
        running: false,
        lastRunAt: null,
        lastDurationMs: null,
        lastError: null,
        runs: 0,
        failures: 0,
      },
      timer: null,
      cronTask: null,
      inFlight: null,
      current: null,
    };

    this.jobs.set(definition.id, entry);

    if (this.running) {
      this.schedule(entry);
    }
  }

  /**
   * Remove a job, cancelling its schedule and aborting any in-flight run.
   */
  unregister(id: string): boolean {
    const entry = this.jobs.get(id);
    if (!entry) return false;

    this.unschedule(entry);
    entry.inFlight?.abort();
    this.jobs.delete(id);
    return true;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    for (const entry of this.jobs.values()) {
      this.schedule(entry);
    }

    this.emit('started');
  }

  /**
   * Stop every schedule and abort in-flight runs. Resolves once they settle.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    const pending: Promise<void>[] = [];
    for (const entry of this.jobs.values()) {
      this.unschedule(entry);
      entry.inFlight?.abort();
      if (entry.current) pending.push(entry.current);
    }

    await Promise.allSettled(pending);
    this.emit('stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run a job now, outside its schedule. Resolves when the run settles;
   * resolves immediately if a run is already in flight.
   */
  async runNow(id: string): Promise<void> {
    const entry = this.jobs.get(id);
    if (!entry) {
      throw new Error(`No job registered with id "${id}"`);
    }
    await this.tick(entry);
  }

  listJobs(): JobStatus[] {
    return [...this.jobs.values()].map((entry) => ({ ...entry.status }));
  }

  getJob(id: string): JobStatus | undefined {
    const entry = this.jobs.get(id);
    return entry ? { ...entry.status } : undefined;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private schedule(entry: JobEntry): void {
    const { schedule } = entry.definition;

    if ('everyMs' in schedule) {
      entry.timer = setInterval(() => {
        void this.tick(entry);
      }, schedule.everyMs);
      entry.timer.unref();

      if (entry.definition.runOnStart) {
        void this.tick(entry);
      }
    } else {
      entry.cronTask = cron.schedule(schedule.cron, () => {
        void this.tick(entry);
      });
    }
  }

  private unschedule(entry: JobEntry): void {
    if (entry.timer) {
      clearInterval(entry.timer);
      entry.timer = null;
    }
    if (entry.cronTask) {
      entry.cronTask.stop();
      entry.cronTask = null;
    }
  }

  private tick(entry: JobEntry): Promise<void> {
    if (entry.current) {
      this.emit('job-skipped', entry.definition.id);
      return entry.current;
    }

    const controller = new AbortController();
    entry.inFlight = controller;
    entry.status.running = true;

    const startedAt = Date.now();
    entry.status.lastRunAt = startedAt;
    this.emit('job-running', entry.definition.id);

    entry.current = this.execute(entry, controller.signal, startedAt).finally(() => {
      entry.inFlight = null;
      entry.current = null;
      entry.status.running = false;
    });

    return entry.current;
  }

  private async execute(entry: JobEntry, signal: AbortSignal, startedAt: number): Promise<void> {
    try {
      await entry.definition.run(signal);
      const durationMs = Date.now() - startedAt;
      entry.status.runs++;
      entry.status.lastDurationMs = durationMs;
      entry.status.lastError = null;
      this.emit('job-completed', entry.definition.id, durationMs);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      entry.status.runs++;
      entry.status.failures++;
      entry.status.lastDurationMs = Date.now() - startedAt;
      entry.status.lastError = message;
      this.emit('job-failed', entry.definition.id, message);
    }
  }
}
