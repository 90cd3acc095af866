export {
  RelaygateConfigSchema,
  DEFAULT_CONFIG,
  DEFAULT_THRESHOLDS,
  DEFAULT_HEALTH,
  type RelaygateConfig,
  type JudgeConfig,
  type Thresholds,
  type EscalationSettings,
  type HealthSettings,
  type MetricsSettings,
} from './schema.js';
export {
  loadConfig,
  mergeWithDefaults,
  deepMerge,
  envSecretResolver,
  type LoadConfigOptions,
  type SecretResolver,
} from './loader.js';
export { validateConfig, findChainCycle, type ValidationResult, type ValidationIssue } from './validator.js';
export { ConfigWatcher, type ConfigWatcherOptions } from './watcher.js';
export {
  resolveRelaygateHome,
  resolveStateDir,
  buildPaths,
  ensureDirectories,
  SUBDIR_NAMES,
  type RelaygatePaths,
  type SubdirName,
} from './paths.js';
