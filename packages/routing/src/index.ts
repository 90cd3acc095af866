/**
 * @relaygate/routing - Provider selection, health and execution
 *
 * Provides:
 *   - A provider registry with deterministic candidate ordering
 *   - Per-provider circuit breakers driven by a background Health Prober
 *   - The fixed escalation ladder and the Router that walks it
 *   - A timeout-bound Execution Client with a typed failure taxonomy
 *   - In-memory metrics aggregation with an optional SQLite sink
 *
 * @packageDocumentation
 */

// Registry
export { ProviderRegistry, compareProviders, isAnswerProvider } from './registry.js';

// Circuit breaker & health
export {
  CircuitBreaker,
  coolDownFor,
  type BreakerSettings,
  type OutcomeSample,
  type SampleSource,
  type Transition,
} from './circuit-breaker.js';
export { HealthProber, PROBE_JOB_PREFIX, type HealthProberOptions, type HealthView } from './health.js';

// Escalation ladder & selection
export { EscalationChain, type ChainStep } from './escalation-chain.js';
export {
  Router,
  type RouterOptions,
  type NextSelection,
  type ExhaustionReason,
  type SelectionRequest,
} from './selector.js';

// Execution
export {
  ExecutionClient,
  classifyFailure,
  type AdapterLookup,
  type ExecuteOptions,
  type ExecutionClientOptions,
  type ExecutionPayload,
} from './executor.js';

// Metrics
export {
  MetricsAggregator,
  type AttemptMetric,
  type MetricsAggregatorOptions,
  type MetricsSink,
  type ProviderTotals,
  type RequestSummary,
} from './metrics.js';
export { SqliteMetricsStore } from './metrics-store.js';
