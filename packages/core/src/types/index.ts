/**
 * @relaygate/core - Type definitions using TypeBox schemas
 *
 * Provider descriptors, health records, routing requests, execution attempts
 * and judge results shared by every package.
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export const ProviderRoleSchema = Type.Union([Type.Literal('primary'), Type.Literal('fallback')]);
export type ProviderRole = Static<typeof ProviderRoleSchema>;

export const ProviderKindSchema = Type.Union([Type.Literal('answer'), Type.Literal('judge')]);
export type ProviderKind = Static<typeof ProviderKindSchema>;

export const AdapterTypeSchema = Type.Union([Type.Literal('ollama'), Type.Literal('openai')]);
export type AdapterType = Static<typeof AdapterTypeSchema>;

export const AdapterSettingsSchema = Type.Object({
  type: AdapterTypeSchema,
  model: Type.String({ minLength: 1 }),
  baseUrl: Type.Optional(Type.String()),
  apiKey: Type.Optional(Type.String({ description: 'Literal key or $env:NAME reference' })),
});
export type AdapterSettings = Static<typeof AdapterSettingsSchema>;

export const ProviderDescriptorSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  displayName: Type.String(),
  tier: Type.Integer({ minimum: 0, description: 'Capability rank, higher = more capable' }),
  costPerUnit: Type.Number({ minimum: 0, default: 0, description: 'Cost per token' }),
  priority: Type.Integer({ default: 0, description: 'Higher = preferred' }),
  role: Type.Optional(ProviderRoleSchema),
  active: Type.Boolean({ default: true }),
  kind: Type.Optional(ProviderKindSchema),
  intents: Type.Optional(Type.Array(Type.String())),
  adapter: AdapterSettingsSchema,
});
export type ProviderDescriptor = Static<typeof ProviderDescriptorSchema>;

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export const CircuitStateSchema = Type.Union([
  Type.Literal('closed'),
  Type.Literal('open'),
  Type.Literal('half_open'),
]);
export type CircuitState = Static<typeof CircuitStateSchema>;

export interface LatencyStats {
  samples: number;
  meanMs: number;
  p50Ms: number;
  p95Ms: number;
}

/** Immutable snapshot of one provider's health. Replaced wholesale on every write. */
export interface HealthRecord {
  readonly providerId: string;
  readonly state: CircuitState;
  /** Success rate over the rolling window, null before the first sample. */
  readonly successRate: number | null;
  readonly sampleCount: number;
  readonly consecutiveFailures: number;
  readonly latency: LatencyStats | null;
  readonly lastProbeAt: Date | null;
  readonly lastTransitionAt: Date;
  /** Number of consecutive trips without a successful recovery. */
  readonly tripCount: number;
  readonly coolDownUntil: Date | null;
  readonly lastError: string | null;
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export type AttemptOutcome =
  | 'success'
  | 'timeout'
  | 'auth_error'
  | 'rate_limit'
  | 'transport_error'
  | 'malformed_response'
  | 'cancelled';

export type ExecutionPurpose = 'answer' | 'judge' | 'probe';

export interface TokenUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens: number;
}

export interface CompletionParameters {
  system?: string;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stop?: string[];
}

export interface CompletionResult {
  text: string;
  tokenUsage?: TokenUsage;
}

export interface CompletionCallOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * The contract every model backend exposes: one blocking completion call.
 * Implementations throw the adapter errors from `@relaygate/core` errors.
 */
export interface CompletionAdapter {
  complete(
    prompt: string,
    parameters: CompletionParameters,
    options: CompletionCallOptions,
  ): Promise<CompletionResult>;
}

export interface ExecutionAttempt {
  /** 0-based within its owner (request attempts, or a single probe/judge call). */
  sequence: number;
  providerId: string;
  purpose: ExecutionPurpose;
  startedAt: Date;
  endedAt: Date;
  latencyMs: number;
  outcome: AttemptOutcome;
  output: string | null;
  error: string | null;
  tokenUsage: TokenUsage | null;
  cost: number | null;
}

// ---------------------------------------------------------------------------
// Routing request
// ---------------------------------------------------------------------------

export interface RoutingConstraints {
  /** Explicit provider override. */
  providerId?: string;
  intent?: string;
  minTier?: number;
}

export interface RoutingRequest {
  id: string;
  prompt: string;
  intent: string;
  constraints: RoutingConstraints;
  parameters: CompletionParameters;
  context?: Record<string, unknown>;
  createdAt: Date;
}

// ---------------------------------------------------------------------------
// Judges
// ---------------------------------------------------------------------------

export const RecommendedActionSchema = Type.Union([
  Type.Literal('accept'),
  Type.Literal('escalate'),
  Type.Literal('reject'),
]);
export type RecommendedAction = Static<typeof RecommendedActionSchema>;

export interface VerificationResult {
  readonly safetyScore: number;
  readonly isSafe: boolean;
  readonly issues: readonly string[];
  readonly explanation: string;
}

export interface ConfidenceResult {
  readonly confidenceScore: number;
  readonly reasoning: string;
  readonly recommendedAction: RecommendedAction;
}

// ---------------------------------------------------------------------------
// Terminal states
// ---------------------------------------------------------------------------

export type TerminalState = 'accepted' | 'rejected' | 'exhausted';
export type RequestState = 'running' | TerminalState;
