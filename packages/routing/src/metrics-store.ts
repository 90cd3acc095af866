/**
 * @relaygate/routing - SQLite metrics store
 *
 * Persistent sink for the MetricsAggregator.
 * Tables: attempt_metrics (one row per Execution Client call),
 * routing_requests (one row per finished request).
 *
 * DB location: RELAYGATE_STATE_DIR/data/metrics.db unless configured.
 */

import { dirname } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import Database from 'better-sqlite3';
import { createLogger, type AttemptOutcome, type ExecutionPurpose } from '@relaygate/core';
import type { AttemptMetric, MetricsSink, RequestSummary } from './metrics.js';

const logger = createLogger('relaygate:routing:metrics-store');

interface AttemptRow {
  id: number;
  request_id: string | null;
  provider_id: string;
  purpose: string;
  outcome: string;
  latency_ms: number;
  cost: number | null;
  total_tokens: number | null;
  at: string;
}

const PURPOSES: readonly ExecutionPurpose[] = ['answer', 'judge', 'probe'];
const OUTCOMES: readonly AttemptOutcome[] = [
  'success',
  'timeout',
  'auth_error',
  'rate_limit',
  'transport_error',
  'malformed_response',
  'cancelled',
];

function isPurpose(value: string): value is ExecutionPurpose {
  return PURPOSES.some((purpose) => purpose === value);
}

function isOutcome(value: string): value is AttemptOutcome {
  return OUTCOMES.some((outcome) => outcome === value);
}

function rowToMetric(row: AttemptRow): AttemptMetric {
  return {
    requestId: row.request_id,
    providerId: row.provider_id,
    purpose: isPurpose(row.purpose) ? row.purpose : 'answer',
    outcome: isOutcome(row.outcome) ? row.outcome : 'transport_error',
    latencyMs: row.latency_ms,
    cost: row.cost,
    totalTokens: row.total_tokens,
    at: new Date(row.at),
  };
}

// ---------------------------------------------------------------------------
// SqliteMetricsStore
// ---------------------------------------------------------------------------

export class SqliteMetricsStore implements MetricsSink {
  private readonly db: Database.Database;

  /**
   * @param dbPath - file path, or `:memory:`
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
    logger.info({ dbPath }, 'SqliteMetricsStore initialized');
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS attempt_metrics (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        request_id   TEXT,
        provider_id  TEXT NOT NULL,
        purpose      TEXT NOT NULL,
        outcome      TEXT NOT NULL,
        latency_ms   INTEGER NOT NULL,
        cost         REAL,
        total_tokens INTEGER,
        at           TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS routing_requests (
        request_id        TEXT PRIMARY KEY,
        intent            TEXT NOT NULL,
        original_provider TEXT,
        final_provider    TEXT,
        terminal_state    TEXT NOT NULL,
        attempts          INTEGER NOT NULL,
        escalated         INTEGER NOT NULL,
        error             TEXT,
        at                TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_attempt_metrics_provider ON attempt_metrics(provider_id, id);
      CREATE INDEX IF NOT EXISTS idx_routing_requests_at      ON routing_requests(at);
    `);
  }

  insertAttempt(metric: AttemptMetric): void {
    this.db
      .prepare(
        `INSERT INTO attempt_metrics (request_id, provider_id, purpose, outcome, latency_ms, cost, total_tokens, at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        metric.requestId,
        metric.providerId,
        metric.purpose,
        metric.outcome,
        Math.round(metric.latencyMs),
        metric.cost,
        metric.totalTokens,
        metric.at.toISOString(),
      );
  }

  insertRequest(summary: RequestSummary): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO routing_requests
           (request_id, intent, original_provider, final_provider, terminal_state, attempts, escalated, error, at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        summary.requestId,
        summary.intent,
        summary.originalProvider,
        summary.finalProvider,
        summary.terminalState,
        summary.attempts,
        summary.escalated ? 1 : 0,
        summary.error,
        summary.at.toISOString(),
      );
  }

  /**
   * Newest attempt rows for a provider, oldest first.
   */
  listAttempts(providerId: string, limit = 100): AttemptMetric[] {
    const rows = this.db
      .prepare<[string, number], AttemptRow>(
        `SELECT * FROM attempt_metrics WHERE provider_id = ? ORDER BY id DESC LIMIT ?`,
      )
      .all(providerId, limit);
    return rows.reverse().map(rowToMetric);
  }

  countAttempts(providerId?: string): number {
    const row =
      providerId === undefined
        ? this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM attempt_metrics`).get()
        : this.db
            .prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM attempt_metrics WHERE provider_id = ?`)
            .get(providerId);
    return row?.n ?? 0;
  }

  countRequests(): number {
    const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM routing_requests`).get();
    return row?.n ?? 0;
  }

  prune(retainPerProvider: number): number {
    const result = this.db
      .prepare(
        `DELETE FROM attempt_metrics WHERE id IN (
           SELECT id FROM (
             SELECT id, ROW_NUMBER() OVER (PARTITION BY provider_id ORDER BY id DESC) AS rn
             FROM attempt_metrics
           ) WHERE rn > ?
         )`,
      )
      .run(retainPerProvider);
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}
