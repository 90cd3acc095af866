/**
 * @relaygate/core - Configuration loader
 *
 * Loads relaygate.json from RELAYGATE_HOME, merges with defaults, resolves
 * $env: secret references and validates.
 */

import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { DEFAULT_CONFIG, type RelaygateConfig } from './schema.js';
import { validateConfig, type ValidationResult } from './validator.js';
import { ensureDirectories } from './paths.js';
import { ConfigValidationError, errorMessage } from '../errors/index.js';
import { isPlainObject } from '../utils/index.js';

const SECRET_PREFIX = '$env:';

/**
 * Secret resolver contract. Credential storage lives outside this system;
 * the default resolver reads process environment variables.
 */
export interface SecretResolver {
  resolve(name: string): Promise<string | undefined>;
}

export const envSecretResolver: SecretResolver = {
  resolve: async (name: string) => process.env[name],
};

export interface LoadConfigOptions {
  /** Explicit config path; defaults to RELAYGATE_HOME/relaygate.json. */
  path?: string;
  secrets?: SecretResolver;
}

/**
 * Deep-merge two plain objects. Arrays are replaced (not concatenated).
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const key of Object.keys(override)) {
    const overVal = override[key];
    const baseVal = result[key];

    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

/**
 * Recursively walk a value and resolve any string beginning with "$env:".
 * Unresolvable references are kept verbatim.
 */
async function resolveSecretRefs(value: unknown, secrets: SecretResolver): Promise<unknown> {
  if (typeof value === 'string' && value.startsWith(SECRET_PREFIX)) {
    const resolved = await secrets.resolve(value.slice(SECRET_PREFIX.length));
    return resolved ?? value;
  }

  if (Array.isArray(value)) {
    return Promise.all(value.map((item) => resolveSecretRefs(item, secrets)));
  }

  if (isPlainObject(value)) {
    const entries = await Promise.all(
      Object.entries(value).map(async ([k, v]) => [k, await resolveSecretRefs(v, secrets)] as const),
    );
    return Object.fromEntries(entries);
  }

  return value;
}

function readRawConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2), 'utf-8');
    return {};
  }

  const text = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error(`Failed to parse ${configPath}: ${errorMessage(err)}`);
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Failed to parse ${configPath}: top-level value must be an object`);
  }
  return parsed;
}

/**
 * Merge a partial user config over the defaults. Providers and the
 * escalation chain are replaced as a whole when the user supplies them.
 */
export function mergeWithDefaults(raw: Record<string, unknown>): Record<string, unknown> {
  const merged = deepMerge({ ...DEFAULT_CONFIG }, raw);
  if (isPlainObject(raw['escalationChain'])) {
    merged['escalationChain'] = raw['escalationChain'];
  }
  return merged;
}

/**
 * Load the configuration.
 *
 * 1. Read RELAYGATE_HOME/relaygate.json (create with defaults if missing)
 * 2. Deep-merge with DEFAULT_CONFIG
 * 3. Resolve $env: references
 * 4. Validate (schema defaults + business rules)
 *
 * Throws ConfigValidationError when the result is not usable.
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<{ config: RelaygateConfig; validation: ValidationResult }> {
  const configPath = options.path ?? ensureDirectories().config;
  const secrets = options.secrets ?? envSecretResolver;

  const merged = mergeWithDefaults(readRawConfig(configPath));
  const resolved = await resolveSecretRefs(merged, secrets);
  const validation = validateConfig(resolved);

  if (!validation.valid || !validation.config) {
    throw new ConfigValidationError(
      `Invalid configuration in ${configPath}: ${validation.errors.map((e) => `${e.path} ${e.message}`).join('; ')}`,
      validation.errors,
    );
  }

  return { config: validation.config, validation };
}
