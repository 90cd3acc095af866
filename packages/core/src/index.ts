/**
 * @relaygate/core - Core package for relaygate
 *
 * Re-exports types, errors, config, the job supervisor, logging and utilities.
 */

// Types & Schemas
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Configuration
export * from './config/index.js';

// Recurring jobs
export * from './scheduler/index.js';

// Logging
export { createLogger, setDefaultLogLevel, type Logger } from './logger.js';

// Utilities
export {
  linkAbortSignal,
  runWithTimeout,
  TimeoutReason,
  clamp,
  percentile,
  truncate,
  generateId,
  isPlainObject,
  assertNever,
} from './utils/index.js';
