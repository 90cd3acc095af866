/**
 * @relaygate/core - Logger factory
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

let defaultLevel: LevelWithSilent = 'info';

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * Set the level used by loggers created afterwards (from `logging.level`).
 * RELAYGATE_LOG_LEVEL still takes precedence.
 */
export function setDefaultLogLevel(level: string): void {
  if (isLevel(level)) {
    defaultLevel = level;
  }
}

function resolveLevel(): LevelWithSilent {
  const fromEnv = process.env['RELAYGATE_LOG_LEVEL'];
  if (fromEnv && isLevel(fromEnv)) {
    return fromEnv;
  }
  return defaultLevel;
}

/**
 * Create a named pino logger, e.g. `createLogger('relaygate:routing:prober')`.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: resolveLevel() });
}
