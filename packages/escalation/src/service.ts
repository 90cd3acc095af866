/**
 * @relaygate/escalation - RoutingService
 *
 * Composition root for the routing core. Builds the registry, Health Prober,
 * Router, Execution Client, Verification Pipeline and Escalation Controller
 * from one RelaygateConfig and exposes the external surface:
 *
 *   - `route(input)`             one request through the escalation ladder
 *   - `getProviderStatus(id)`    frozen health snapshot plus metric totals
 *   - `getHealthReport()`        every provider plus an overall rollup
 *   - `start()` / `stop()`       probe and prune jobs
 *   - `applyConfig(config)`      hot reload
 */

import {
  EscalationChainError,
  JobSupervisor,
  RelaygateError,
  buildPaths,
  createLogger,
  errorMessage,
  generateId,
  type CompletionParameters,
  type ExecutionAttempt,
  type HealthRecord,
  type Logger,
  type ProviderDescriptor,
  type RelaygateConfig,
  type RoutingConstraints,
  type RoutingRequest,
} from '@relaygate/core';
import {
  EscalationChain,
  ExecutionClient,
  HealthProber,
  MetricsAggregator,
  ProviderRegistry,
  Router,
  SqliteMetricsStore,
  type AdapterLookup,
  type MetricsSink,
  type ProviderTotals,
} from '@relaygate/routing';
import { VerificationPipeline } from '@relaygate/verification';
import { EscalationController, type RouteResult } from './controller.js';
import { detectIntent, systemPromptFor } from './intent.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RouteInput {
  prompt: string;
  intent?: string;
  constraints?: RoutingConstraints;
  parameters?: CompletionParameters;
  context?: Record<string, unknown>;
  signal?: AbortSignal;
  requestId?: string;
}

export interface ProviderStatus extends HealthRecord {
  readonly displayName: string;
  readonly tier: number;
  readonly active: boolean;
  readonly kind: 'answer' | 'judge';
  readonly metrics: ProviderTotals;
}

export type OverallStatus = 'healthy' | 'degraded' | 'down';

export interface HealthReport {
  overallStatus: OverallStatus;
  providers: ProviderStatus[];
  generatedAt: Date;
}

export interface RoutingServiceOptions {
  config: RelaygateConfig;
  adapters: AdapterLookup;
  supervisor?: JobSupervisor;
  /** Overrides the SQLite sink built from `metrics.persist`. */
  metricsSink?: MetricsSink;
  logger?: Logger;
  now?: () => Date;
}

export const PRUNE_JOB_ID = 'metrics:prune';

// ---------------------------------------------------------------------------
// RoutingService
// ---------------------------------------------------------------------------

export class RoutingService {
  readonly registry: ProviderRegistry;
  readonly metrics: MetricsAggregator;
  readonly executor: ExecutionClient;
  readonly prober: HealthProber;
  readonly router: Router;
  readonly pipeline: VerificationPipeline;
  readonly controller: EscalationController;
  readonly supervisor: JobSupervisor;

  private config: RelaygateConfig;
  private readonly hasSink: boolean;
  private readonly log: Logger;
  private started = false;

  constructor(options: RoutingServiceOptions) {
    const { config } = options;
    this.config = config;
    this.log = options.logger ?? createLogger('relaygate:escalation:service');
    this.supervisor = options.supervisor ?? new JobSupervisor();

    const sink =
      options.metricsSink ??
      (config.metrics.persist ? new SqliteMetricsStore(config.metrics.dbPath ?? buildPaths().metricsDb) : undefined);
    this.hasSink = sink !== undefined;

    this.registry = new ProviderRegistry(config.providers);
    this.metrics = new MetricsAggregator({ retentionPerProvider: config.metrics.retentionPerProvider, sink });
    this.executor = new ExecutionClient({ adapters: options.adapters, metrics: this.metrics });
    this.prober = new HealthProber({
      registry: this.registry,
      executor: this.executor,
      settings: config.health,
      supervisor: this.supervisor,
      now: options.now,
    });
    this.router = new Router({
      registry: this.registry,
      health: this.prober,
      chain: new EscalationChain(config.escalationChain),
    });
    this.pipeline = new VerificationPipeline({
      executor: this.executor,
      registry: this.registry,
      judges: config.judges,
      thresholds: config.thresholds,
    });
    this.controller = new EscalationController({
      router: this.router,
      executor: this.executor,
      pipeline: this.pipeline,
      settings: config.escalation,
    });

    // Traffic outcomes feed the same rolling windows as probes.
    this.metrics.on('attempt', (_metric: unknown, attempt: ExecutionAttempt) => {
      if (attempt.purpose !== 'probe') {
        this.prober.recordOutcome(attempt);
      }
    });
  }

  // -----------------------------------------------------------------------
  // Requests
  // -----------------------------------------------------------------------

  async route(input: RouteInput): Promise<RouteResult> {
    if (input.prompt.trim().length === 0) {
      throw new RelaygateError('Prompt must not be empty', 'INVALID_REQUEST');
    }

    const intent = input.intent ?? detectIntent(input.prompt);
    const request: RoutingRequest = {
      id: input.requestId ?? generateId('req'),
      prompt: input.prompt,
      intent,
      constraints: input.constraints ?? {},
      parameters: { ...input.parameters, system: input.parameters?.system ?? systemPromptFor(intent) },
      context: input.context,
      createdAt: new Date(),
    };

    try {
      const result = await this.controller.run(request, input.signal);
      this.metrics.recordRequest({
        requestId: request.id,
        intent,
        originalProvider: result.originalProvider,
        finalProvider: result.finalProvider,
        terminalState: result.terminalState,
        attempts: result.attemptHistory.length,
        escalated: result.escalated,
        error: result.rejection?.reason ?? null,
        at: new Date(),
      });
      return result;
    } catch (err) {
      this.metrics.recordRequest({
        requestId: request.id,
        intent,
        originalProvider: null,
        finalProvider: null,
        terminalState: 'failed',
        attempts: 0,
        escalated: false,
        error: errorMessage(err),
        at: new Date(),
      });
      throw err;
    }
  }

  // -----------------------------------------------------------------------
  // Status
  // -----------------------------------------------------------------------

  getProviderStatus(providerId: string): ProviderStatus | undefined {
    const provider = this.registry.get(providerId);
    const record = this.prober.getRecord(providerId);
    if (!provider || !record) return undefined;
    return this.statusOf(provider, record);
  }

  getHealthReport(): HealthReport {
    const providers: ProviderStatus[] = [];
    for (const provider of this.registry.list()) {
      const record = this.prober.getRecord(provider.id);
      if (record) providers.push(this.statusOf(provider, record));
    }

    return {
      overallStatus: deriveOverallStatus(providers),
      providers,
      generatedAt: new Date(),
    };
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  start(): void {
    if (this.started) return;
    this.started = true;

    this.prober.start();
    this.syncPruneJob();
    this.supervisor.start();
    this.log.info({ providers: this.registry.list().length }, 'Routing service started');
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;

    this.prober.stop();
    this.supervisor.unregister(PRUNE_JOB_ID);
    await this.supervisor.stop();
    this.metrics.close();
    this.log.info('Routing service stopped');
  }

  get currentConfig(): RelaygateConfig {
    return this.config;
  }

  /**
   * Swap in a reloaded configuration. Requests already running keep their
   * current attempt; later escalation steps consult the new ladder.
   */
  applyConfig(config: RelaygateConfig): void {
    let chain: EscalationChain;
    try {
      chain = new EscalationChain(config.escalationChain);
    } catch (err) {
      if (err instanceof EscalationChainError) {
        this.log.error({ error: err.message }, 'Rejected configuration reload');
      }
      throw err;
    }

    this.config = config;
    this.registry.replace(config.providers);
    this.router.update(this.registry, chain);
    this.pipeline.update(this.registry, config.judges, config.thresholds);
    this.controller.updateSettings(config.escalation);
    this.prober.reconfigure(this.registry, config.health);
    this.metrics.setRetention(config.metrics.retentionPerProvider);
    if (this.started) this.syncPruneJob();

    this.log.info({ providers: config.providers.map((p) => p.id) }, 'Configuration applied');
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private statusOf(provider: ProviderDescriptor, record: HealthRecord): ProviderStatus {
    return Object.freeze({
      ...record,
      displayName: provider.displayName,
      tier: provider.tier,
      active: provider.active,
      kind: provider.kind ?? 'answer',
      metrics: this.metrics.getTotals(provider.id),
    });
  }

  private syncPruneJob(): void {
    if (!this.hasSink) return;
    this.supervisor.register({
      id: PRUNE_JOB_ID,
      schedule: { cron: this.config.metrics.pruneCron },
      run: async () => {
        this.metrics.prune();
      },
    });
  }
}

// ---------------------------------------------------------------------------
// Status derivation
// ---------------------------------------------------------------------------

/**
 * - down    : no active answer provider has a circuit that is not open
 * - degraded: some active provider's circuit is not closed
 * - healthy : otherwise
 */
export function deriveOverallStatus(providers: readonly ProviderStatus[]): OverallStatus {
  const active = providers.filter((p) => p.active);
  const serving = active.filter((p) => p.kind === 'answer' && p.state !== 'open');

  if (serving.length === 0) return 'down';
  if (active.some((p) => p.state !== 'closed')) return 'degraded';
  return 'healthy';
}
