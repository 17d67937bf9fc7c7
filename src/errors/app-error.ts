import type { ConversionFailure } from '../pipeline/types.js';

/**
 * Base application error class with status code support
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

/**
 * Multipart body could not be read (400)
 */
export class InvalidUploadError extends AppError {
  constructor(message: string) {
    super(message, 400, 'INVALID_UPLOAD');
  }
}

/**
 * Upload is not a readable webarchive (400)
 */
export class InvalidWebArchiveError extends AppError {
  constructor(message: string) {
    super(message, 400, 'INVALID_WEBARCHIVE');
  }
}

/**
 * Upload above the configured byte limit (413)
 */
export class PayloadTooLargeError extends AppError {
  constructor(message = 'File too large') {
    super(message, 413, 'PAYLOAD_TOO_LARGE');
  }
}

/**
 * Request carries no `file` field (422)
 */
export class MissingFileError extends AppError {
  constructor(message = 'Missing file in request') {
    super(message, 422, 'MISSING_FILE');
  }
}

/**
 * Conversion failed after the input was accepted (500)
 */
export class ConversionFailedError extends AppError {
  constructor(message: string, code = 'CONVERSION_FAILED') {
    super(message, 500, code);
  }
}

export function toAppError(failure: ConversionFailure): AppError {
  switch (failure.kind) {
    case 'SizeLimitError':
      return new PayloadTooLargeError(failure.detail);
    case 'TimeoutError':
      return new ConversionFailedError('Conversion timed out', 'TIMEOUT');
    case 'FormatError':
      if (failure.stage === 'plist' || failure.stage === 'webarchive') {
        return new InvalidWebArchiveError(failure.detail);
      }
      return new ConversionFailedError(failure.detail);
  }
}
