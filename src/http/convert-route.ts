import { performance } from 'node:perf_hooks';

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';

import {
  InvalidUploadError,
  MissingFileError,
  PayloadTooLargeError,
  toAppError,
} from '../errors/app-error.js';
import {
  type RunConversionOptions,
  runConversion,
} from '../pipeline/run-conversion.js';
import type { ConversionRunner } from '../pipeline/runner.js';
import { logInfo, logWarn } from '../services/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { toTextFilename } from '../utils/filename.js';

export const UPLOAD_FIELD = 'file';

export interface ConvertRouteOptions {
  runner: ConversionRunner;
  conversion: RunConversionOptions;
}

function toUploadError(error: unknown, maxBytes: number): unknown {
  // busboy reports truncated or malformed multipart bodies as plain errors
  if (!(error instanceof multer.MulterError)) {
    return new InvalidUploadError(
      `Malformed upload: ${getErrorMessage(error)}`
    );
  }

  switch (error.code) {
    case 'LIMIT_FILE_SIZE':
      return new PayloadTooLargeError(
        `File too large (limit ${maxBytes} bytes)`
      );
    case 'LIMIT_UNEXPECTED_FILE':
      return new MissingFileError(
        `Expected the upload in the "${UPLOAD_FIELD}" field`
      );
    default:
      return new InvalidUploadError(error.message);
  }
}

/**
 * Buffers the `file` field in memory. Uploads above `maxBytes` are cut off
 * by multer while streaming, before any conversion work.
 */
export function createUploadMiddleware(maxBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
  }).single(UPLOAD_FIELD);

  return (req: Request, res: Response, next: NextFunction): void => {
    upload(req, res, (error?: unknown) => {
      if (error) {
        next(toUploadError(error, maxBytes));
        return;
      }
      next();
    });
  };
}

export function createConvertHandler(
  options: ConvertRouteOptions
): (req: Request, res: Response) => Promise<void> {
  return async (req: Request, res: Response): Promise<void> => {
    const { file } = req;
    if (!file) throw new MissingFileError();

    const startedAt = performance.now();
    const result = await runConversion(
      options.runner,
      file.buffer,
      options.conversion
    );
    const durationMs = Math.round(performance.now() - startedAt);

    if (!result.ok) {
      logWarn('Conversion rejected', {
        file: file.originalname,
        bytes: file.size,
        kind: result.kind,
        stage: result.stage,
        detail: result.detail,
        durationMs,
      });
      throw toAppError(result);
    }

    logInfo('Converted webarchive', {
      file: file.originalname,
      bytes: file.size,
      mimeType: result.mimeType,
      chars: result.text.length,
      runner: options.runner.mode,
      durationMs,
    });

    res.attachment(toTextFilename(file.originalname));
    res.type('text/plain; charset=utf-8');
    res.send(result.text);
  };
}
