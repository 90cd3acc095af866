/**
 * @relaygate/core - Full TypeBox schema for relaygate.json configuration
 *
 * Sections: providers, escalationChain, judges, thresholds, escalation,
 * health, metrics, logging
 */

import { Type, type Static } from '@sinclair/typebox';
import { ProviderDescriptorSchema } from '../types/index.js';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const EscalationChainSchema = Type.Record(Type.String(), Type.Union([Type.String(), Type.Null()]), {
  description: 'providerId -> next providerId, null marks the top of the ladder',
});

const JudgeSchema = Type.Object({
  providerId: Type.String({ minLength: 1 }),
  timeoutMs: Type.Integer({ minimum: 1, default: 20000 }),
  maxTokens: Type.Integer({ minimum: 1, default: 256 }),
});

const JudgesSchema = Type.Object({
  safety: JudgeSchema,
  confidence: JudgeSchema,
});

const ThresholdsSchema = Type.Object({
  safetyMin: Type.Number({ minimum: 0, maximum: 1, default: 0.7 }),
  confidenceCritical: Type.Number({ minimum: 0, maximum: 1, default: 0.4 }),
  confidenceAccept: Type.Number({ minimum: 0, maximum: 1, default: 0.65 }),
  criticalIssues: Type.Array(Type.String(), { default: ['harmful_content', 'hallucination'] }),
});

const EscalationSchema = Type.Object({
  maxEscalations: Type.Integer({ minimum: 0, default: 2 }),
  attemptTimeoutMs: Type.Integer({ minimum: 1, default: 60000 }),
});

const HealthSchema = Type.Object({
  probeIntervalMs: Type.Integer({ minimum: 100, default: 30000 }),
  probeTimeoutMs: Type.Integer({ minimum: 1, default: 10000 }),
  probePrompt: Type.String({ default: 'Reply with the single word: ok' }),
  windowSize: Type.Integer({ minimum: 1, default: 5 }),
  failureRateThreshold: Type.Number({ minimum: 0, maximum: 1, default: 0.5 }),
  consecutiveFailureThreshold: Type.Integer({ minimum: 1, default: 3 }),
  coolDownMs: Type.Integer({ minimum: 0, default: 30000 }),
  backoffMultiplier: Type.Number({ minimum: 1, default: 2 }),
  maxCoolDownMs: Type.Integer({ minimum: 0, default: 600000 }),
  latencyWindow: Type.Integer({ minimum: 1, default: 20 }),
});

const MetricsSchema = Type.Object({
  retentionPerProvider: Type.Integer({ minimum: 1, default: 1000 }),
  persist: Type.Boolean({ default: false }),
  dbPath: Type.Optional(Type.String()),
  pruneCron: Type.String({ default: '0 * * * *' }),
});

const LoggingSchema = Type.Object({
  level: Type.String({ default: 'info' }),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const RelaygateConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  providers: Type.Array(ProviderDescriptorSchema, { default: [] }),
  escalationChain: EscalationChainSchema,
  judges: JudgesSchema,
  thresholds: ThresholdsSchema,
  escalation: EscalationSchema,
  health: HealthSchema,
  metrics: MetricsSchema,
  logging: LoggingSchema,
});

export type RelaygateConfig = Static<typeof RelaygateConfigSchema>;
export type JudgeConfig = Static<typeof JudgeSchema>;
export type Thresholds = Static<typeof ThresholdsSchema>;
export type EscalationSettings = Static<typeof EscalationSchema>;
export type HealthSettings = Static<typeof HealthSchema>;
export type MetricsSettings = Static<typeof MetricsSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_THRESHOLDS: Thresholds = {
  safetyMin: 0.7,
  confidenceCritical: 0.4,
  confidenceAccept: 0.65,
  criticalIssues: ['harmful_content', 'hallucination'],
};

export const DEFAULT_HEALTH: HealthSettings = {
  probeIntervalMs: 30000,
  probeTimeoutMs: 10000,
  probePrompt: 'Reply with the single word: ok',
  windowSize: 5,
  failureRateThreshold: 0.5,
  consecutiveFailureThreshold: 3,
  coolDownMs: 30000,
  backoffMultiplier: 2,
  maxCoolDownMs: 600000,
  latencyWindow: 20,
};

export const DEFAULT_CONFIG: RelaygateConfig = {
  version: 1,
  providers: [
    {
      id: 'gemma',
      displayName: 'Gemma 2B',
      tier: 1,
      costPerUnit: 0,
      priority: 30,
      role: 'primary',
      active: true,
      adapter: { type: 'ollama', model: 'gemma:2b' },
    },
    {
      id: 'phi3',
      displayName: 'Phi-3 3.8B',
      tier: 2,
      costPerUnit: 0,
      priority: 20,
      active: true,
      adapter: { type: 'ollama', model: 'phi3:3.8b' },
    },
    {
      id: 'qwen',
      displayName: 'Qwen 2.5 3B',
      tier: 3,
      costPerUnit: 0,
      priority: 10,
      active: true,
      adapter: { type: 'ollama', model: 'qwen2.5:3b' },
    },
    {
      id: 'mistral',
      displayName: 'Mistral 7B',
      tier: 4,
      costPerUnit: 0,
      priority: 0,
      role: 'fallback',
      active: true,
      adapter: { type: 'ollama', model: 'mistral:7b' },
    },
    {
      id: 'safety-judge',
      displayName: 'Llama 3.2 3B Instruct (safety)',
      tier: 2,
      costPerUnit: 0,
      priority: 0,
      active: true,
      kind: 'judge',
      adapter: { type: 'ollama', model: 'llama3.2:3b-instruct' },
    },
    {
      id: 'confidence-judge',
      displayName: 'Phi-3 3.8B (confidence)',
      tier: 2,
      costPerUnit: 0,
      priority: 0,
      active: true,
      kind: 'judge',
      adapter: { type: 'ollama', model: 'phi3:3.8b' },
    },
  ],
  escalationChain: {
    gemma: 'phi3',
    phi3: 'qwen',
    qwen: 'mistral',
    mistral: null,
  },
  judges: {
    safety: { providerId: 'safety-judge', timeoutMs: 20000, maxTokens: 256 },
    confidence: { providerId: 'confidence-judge', timeoutMs: 20000, maxTokens: 256 },
  },
  thresholds: DEFAULT_THRESHOLDS,
  escalation: {
    maxEscalations: 2,
    attemptTimeoutMs: 60000,
  },
  health: DEFAULT_HEALTH,
  metrics: {
    retentionPerProvider: 1000,
    persist: false,
    pruneCron: '0 * * * *',
  },
  logging: {
    level: 'info',
  },
};
