import type { NextFunction, Request, Response } from 'express';

import { AppError, NotFoundError } from '../errors/app-error.js';
import { logError, logWarn } from '../services/logger.js';
import { toError } from '../utils/error-utils.js';

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    statusCode: number;
  };
}

function getStatusCode(err: Error): number {
  return err instanceof AppError ? err.statusCode : 500;
}

function getErrorCode(err: Error): string {
  return err instanceof AppError ? err.code : 'INTERNAL_ERROR';
}

function getErrorMessage(err: Error): string {
  return err instanceof AppError ? err.message : 'Internal Server Error';
}

export function buildErrorResponse(err: Error): ErrorResponse {
  return {
    error: {
      message: getErrorMessage(err),
      code: getErrorCode(err),
      statusCode: getStatusCode(err),
    },
  };
}

export function notFoundHandler(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  next(new NotFoundError(`${req.method} ${req.path}`));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const error = toError(err);
  const statusCode = getStatusCode(error);
  const message = `HTTP ${statusCode}: ${error.message} - ${req.method} ${req.path}`;

  if (statusCode >= 500) {
    logError(message, error);
  } else {
    logWarn(message, { code: getErrorCode(error) });
  }

  res.status(statusCode).json(buildErrorResponse(error));
}
