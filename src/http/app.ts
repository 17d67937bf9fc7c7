import { fileURLToPath } from 'node:url';

import express, { type Express } from 'express';

import { errorHandler, notFoundHandler } from '../middleware/error-handler.js';
import {
  type ConvertRouteOptions,
  createConvertHandler,
  createUploadMiddleware,
} from './convert-route.js';
import { registerHealthRoute } from './health.js';

export interface AppOptions extends ConvertRouteOptions {
  version: string;
}

const UPLOAD_PAGE_PATH = fileURLToPath(
  new URL('../../public/index.html', import.meta.url)
);

export function createApp(options: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get('/', (_req, res) => {
    res.sendFile(UPLOAD_PAGE_PATH);
  });
  registerHealthRoute(app, options.version);
  app.post(
    '/api/convert',
    createUploadMiddleware(options.conversion.maxBytes),
    createConvertHandler(options)
  );

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
