/**
 * @relaygate/core - Configuration watcher
 *
 * Watches relaygate.json with chokidar and emits `reloaded` with the newly
 * loaded config whenever the administrative layer rewrites it. A file that
 * fails to load or validate emits `error` and the previous config stays in
 * effect.
 */

import { EventEmitter } from 'node:events';
import { watch, type FSWatcher } from 'chokidar';
import { loadConfig, type SecretResolver } from './loader.js';

export interface ConfigWatcherOptions {
  path: string;
  secrets?: SecretResolver;
  /** Collapse bursts of change events (editors write in several steps). */
  debounceMs?: number;
}

/**
 * Events:
 *   - `reloaded` (config, validation)
 *   - `error` (error: Error)
 */
export class ConfigWatcher extends EventEmitter {
  private watcher: FSWatcher | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly options: ConfigWatcherOptions;

  constructor(options: ConfigWatcherOptions) {
    super();
    this.options = options;
  }

  start(): void {
    if (this.watcher) return;

    this.watcher = watch(this.options.path, {
      persistent: false,
      ignoreInitial: true,
    });

    this.watcher.on('change', () => this.scheduleReload());
    this.watcher.on('error', (err: unknown) => {
      this.emit('error', err instanceof Error ? err : new Error(String(err)));
    });
  }

  async stop(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
    }
  }

  /**
   * Load the file now and emit the result.
   */
  async reload(): Promise<void> {
    try {
      const { config, validation } = await loadConfig({
        path: this.options.path,
        secrets: this.options.secrets,
      });
      this.emit('reloaded', config, validation);
    } catch (err) {
      this.emit('error', err instanceof Error ? err : new Error(String(err)));
    }
  }

  private scheduleReload(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      void this.reload();
    }, this.options.debounceMs ?? 200);
  }
}
