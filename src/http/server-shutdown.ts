import type { Server } from 'node:http';

import type { ConversionRunner } from '../pipeline/runner.js';
import { logError, logInfo, logWarn } from '../services/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

export function createShutdownHandler(
  server: Server,
  runner: ConversionRunner,
  graceMs: number
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logInfo('Shutdown already in progress; ignoring signal', { signal });
      return;
    }
    shuttingDown = true;
    logInfo(`${signal} received, shutting down gracefully...`);

    setTimeout(() => {
      logError('Forced shutdown after timeout');
      process.exit(1);
    }, graceMs).unref();

    server.close(() => {
      logInfo('HTTP server closed');
      process.exit(0);
    });
    server.closeIdleConnections();

    await runner.close().catch((error: unknown) => {
      logWarn('Failed to stop conversion workers during shutdown', {
        error: getErrorMessage(error),
      });
    });
  };
}

export function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>
): void {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
