/**
 * @relaygate/core - Configuration validator
 *
 * Validates a RelaygateConfig object using TypeBox, then applies business
 * rules: unique provider ids, escalation chain integrity (known providers,
 * acyclic), judge references and threshold ordering.
 */

import { Value } from '@sinclair/typebox/value';
import { RelaygateConfigSchema, type RelaygateConfig } from './schema.js';
import { isValidCron } from '../scheduler/job-supervisor.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** The decoded config, or null when the schema check itself failed. */
  config: RelaygateConfig | null;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Walk the chain from every entry and return the first cycle found, as the
 * list of provider ids that form it (first id repeated at the end), or null.
 */
export function findChainCycle(chain: Record<string, string | null>): string[] | null {
  const settled = new Set<string>();

  for (const start of Object.keys(chain)) {
    if (settled.has(start)) continue;

    const path: string[] = [];
    const onPath = new Set<string>();
    let current: string | null | undefined = start;

    while (current !== null && current !== undefined && !settled.has(current)) {
      if (onPath.has(current)) {
        return [...path.slice(path.indexOf(current)), current];
      }
      onPath.add(current);
      path.push(current);
      current = chain[current];
    }

    for (const id of path) settled.add(id);
  }

  return null;
}

/**
 * Validate and normalise a config object.
 *
 * 1. TypeBox schema check (after applying schema defaults)
 * 2. Unique provider ids
 * 3. Escalation chain references answer providers and is acyclic
 * 4. Judges reference providers of kind "judge"
 * 5. Threshold ordering and cron expression
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // ----- TypeBox schema validation -----
  const withDefaults = Value.Default(RelaygateConfigSchema, Value.Clone(raw));

  if (!Value.Check(RelaygateConfigSchema, withDefaults)) {
    for (const err of Value.Errors(RelaygateConfigSchema, withDefaults)) {
      errors.push({ path: err.path, message: err.message });
    }
    return { valid: false, errors, warnings, config: null };
  }

  const config = withDefaults;

  // ----- Providers -----
  const byId = new Map<string, RelaygateConfig['providers'][number]>();
  config.providers.forEach((provider, i) => {
    if (byId.has(provider.id)) {
      errors.push({ path: `/providers/${i}/id`, message: `Duplicate provider id "${provider.id}"` });
      return;
    }
    byId.set(provider.id, provider);
  });

  const answerProviders = config.providers.filter((p) => (p.kind ?? 'answer') === 'answer');
  if (!answerProviders.some((p) => p.active)) {
    warnings.push({ path: '/providers', message: 'No active answer provider is configured' });
  }

  // ----- Escalation chain -----
  for (const [from, to] of Object.entries(config.escalationChain)) {
    for (const id of to === null ? [from] : [from, to]) {
      const provider = byId.get(id);
      if (!provider) {
        errors.push({
          path: `/escalationChain/${from}`,
          message: `Escalation chain references unknown provider "${id}"`,
        });
      } else if (provider.kind === 'judge') {
        errors.push({
          path: `/escalationChain/${from}`,
          message: `Judge provider "${id}" cannot be part of the escalation chain`,
        });
      }
    }

    const current = byId.get(from);
    const next = to === null ? undefined : byId.get(to);
    if (current && next && next.tier <= current.tier) {
      warnings.push({
        path: `/escalationChain/${from}`,
        message: `Escalation "${from}" -> "${to}" does not increase capability tier (${current.tier} -> ${next.tier})`,
      });
    }
  }

  const cycle = findChainCycle(config.escalationChain);
  if (cycle) {
    errors.push({
      path: '/escalationChain',
      message: `Escalation chain contains a cycle: ${cycle.join(' -> ')}`,
    });
  }

  // ----- Judges -----
  for (const role of ['safety', 'confidence'] as const) {
    const judge = config.judges[role];
    const provider = byId.get(judge.providerId);
    if (!provider) {
      errors.push({
        path: `/judges/${role}/providerId`,
        message: `Judge references unknown provider "${judge.providerId}"`,
      });
    } else if (provider.kind !== 'judge') {
      errors.push({
        path: `/judges/${role}/providerId`,
        message: `Provider "${judge.providerId}" must have kind "judge" to act as the ${role} judge`,
      });
    } else if (!provider.active) {
      warnings.push({
        path: `/judges/${role}/providerId`,
        message: `Judge provider "${judge.providerId}" is inactive; every verification will fail closed`,
      });
    }
  }

  // ----- Thresholds -----
  if (config.thresholds.confidenceCritical >= config.thresholds.confidenceAccept) {
    errors.push({
      path: '/thresholds',
      message: `confidenceCritical (${config.thresholds.confidenceCritical}) must be below confidenceAccept (${config.thresholds.confidenceAccept})`,
    });
  }

  if (config.health.maxCoolDownMs < config.health.coolDownMs) {
    warnings.push({
      path: '/health/maxCoolDownMs',
      message: `maxCoolDownMs (${config.health.maxCoolDownMs}) is below coolDownMs (${config.health.coolDownMs}), cool-downs will be capped at ${config.health.maxCoolDownMs}`,
    });
  }

  // ----- Metrics -----
  if (!isValidCron(config.metrics.pruneCron)) {
    errors.push({
      path: '/metrics/pruneCron',
      message: `Invalid cron expression "${config.metrics.pruneCron}"`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}
