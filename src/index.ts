#!/usr/bin/env node
import { startHttpServer } from './http/server.js';
import { logError } from './services/logger.js';
import { toError } from './utils/error-utils.js';

let isShuttingDown = false;

const shutdownHandlerRef: { current?: (signal: string) => Promise<void> } = {};

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);

  if (!isShuttingDown && shutdownHandlerRef.current) {
    isShuttingDown = true;
    process.stderr.write('Attempting graceful shutdown...\n');
    void shutdownHandlerRef.current('UNCAUGHT_EXCEPTION');
  } else {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  const error = toError(reason);
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

try {
  const { shutdown } = await startHttpServer();
  shutdownHandlerRef.current = shutdown;
} catch (error) {
  logError('Failed to start HTTP server', toError(error));
  process.exitCode = 1;
}
