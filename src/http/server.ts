import type { Server } from 'node:http';

import type { Express } from 'express';

import { config } from '../config/index.js';
import { resolveConversionRunner } from '../pipeline/runner.js';
import { logInfo } from '../services/logger.js';
import { createApp } from './app.js';
import {
  createShutdownHandler,
  registerSignalHandlers,
} from './server-shutdown.js';

function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(server);
    });
  });
}

export async function startHttpServer(): Promise<{
  server: Server;
  shutdown: (signal: string) => Promise<void>;
}> {
  const runner = resolveConversionRunner(config.conversion.workerMode);
  const app = createApp({
    version: config.server.version,
    runner,
    conversion: {
      maxBytes: config.conversion.maxFileBytes,
      timeoutMs: config.conversion.timeoutMs,
      stripBoilerplate: config.conversion.stripBoilerplate,
    },
  });

  const { host, port } = config.server;
  const server = await listen(app, port, host);
  logInfo(`${config.server.name} listening on http://${host}:${port}`, {
    runner: runner.mode,
    maxFileBytes: config.conversion.maxFileBytes,
    timeoutMs: config.conversion.timeoutMs,
  });

  const shutdown = createShutdownHandler(
    server,
    runner,
    config.server.shutdownGraceMs
  );
  registerSignalHandlers(shutdown);
  return { server, shutdown };
}
