/**
 * relaygate - Bootstrap
 *
 *   1. Ensure directories and load configuration
 *   2. Build the routing service with HTTP adapters
 *   3. Start probe and prune jobs
 *   4. Watch the configuration file for hot reload
 *   5. Stop everything on SIGINT / SIGTERM
 */

import {
  ConfigWatcher,
  createLogger,
  ensureDirectories,
  errorMessage,
  loadConfig,
  setDefaultLogLevel,
  type RelaygateConfig,
  type SecretResolver,
  type ValidationResult,
} from '@relaygate/core';
import { RoutingService } from '@relaygate/escalation';
import type { AdapterLookup } from '@relaygate/routing';
import { createAdapterLookup } from './models/index.js';

export interface BootstrapOptions {
  /** Config file path; defaults to RELAYGATE_HOME/relaygate.json. */
  configPath?: string;
  secrets?: SecretResolver;
  adapters?: AdapterLookup;
  /** Watch the config file for changes (default true). */
  watch?: boolean;
}

export interface Runtime {
  service: RoutingService;
  watcher: ConfigWatcher | null;
  shutdown: () => Promise<void>;
}

function reportValidation(log: ReturnType<typeof createLogger>, validation: ValidationResult): void {
  for (const warning of validation.warnings) {
    log.warn({ path: warning.path }, warning.message);
  }
}

export async function bootstrap(options: BootstrapOptions = {}): Promise<Runtime> {
  const paths = ensureDirectories();
  const configPath = options.configPath ?? paths.config;

  const { config, validation } = await loadConfig({ path: configPath, secrets: options.secrets });
  setDefaultLogLevel(config.logging.level);

  const log = createLogger('relaygate');
  reportValidation(log, validation);

  const service = new RoutingService({
    config,
    adapters: options.adapters ?? createAdapterLookup(),
  });
  service.start();

  let watcher: ConfigWatcher | null = null;
  if (options.watch ?? true) {
    watcher = new ConfigWatcher({ path: configPath, secrets: options.secrets });
    watcher.on('reloaded', (next: RelaygateConfig, nextValidation: ValidationResult) => {
      reportValidation(log, nextValidation);
      try {
        setDefaultLogLevel(next.logging.level);
        service.applyConfig(next);
      } catch (err) {
        log.error({ error: errorMessage(err) }, 'Failed to apply reloaded configuration');
      }
    });
    watcher.on('error', (err: Error) => {
      log.error({ error: err.message }, 'Configuration reload failed, keeping previous configuration');
    });
    watcher.start();
  }

  log.info(
    {
      home: paths.home,
      config: configPath,
      providers: config.providers.map((p) => p.id),
      chain: config.escalationChain,
    },
    'relaygate ready',
  );

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      await watcher?.stop();
      await service.stop();
      log.info('Shutdown complete');
    })();
    return stopping;
  };

  return { service, watcher, shutdown };
}
