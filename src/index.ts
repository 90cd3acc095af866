/**
 * relaygate - Main entry point
 *
 * Boots the routing service and keeps it running until SIGINT / SIGTERM.
 */

import { createLogger, errorMessage } from '@relaygate/core';
import { bootstrap } from './main.js';

const log = createLogger('relaygate');

async function main(): Promise<void> {
  const runtime = await bootstrap();

  // Probe timers are unref'd; this keeps the process alive until a signal.
  const keepAlive = setInterval(() => {}, 1 << 30);

  const stop = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    clearInterval(keepAlive);
    runtime.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ error: errorMessage(err) }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGTERM', () => stop('SIGTERM'));
  process.on('SIGINT', () => stop('SIGINT'));
}

main().catch((err: unknown) => {
  log.fatal({ error: errorMessage(err) }, 'Fatal error during startup');
  process.exit(1);
});
