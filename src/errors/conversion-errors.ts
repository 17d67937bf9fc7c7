export type ConversionErrorKind = 'FormatError' | 'SizeLimitError' | 'TimeoutError';

/** Pipeline step that produced a failure. */
export type ConversionStage = 'plist' | 'webarchive' | 'html' | 'pipeline';

/**
 * Terminal failure of a single conversion. Every kind stems from the input
 * itself, so none of them is retried.
 */
export abstract class ConversionError extends Error {
  abstract readonly kind: ConversionErrorKind;
  readonly stage: ConversionStage;

  constructor(message: string, stage: ConversionStage) {
    super(message);
    this.stage = stage;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class FormatError extends ConversionError {
  readonly kind = 'FormatError';
}

export class SizeLimitError extends ConversionError {
  readonly kind = 'SizeLimitError';
  readonly limitBytes: number;
  readonly actualBytes: number;

  constructor(limitBytes: number, actualBytes: number) {
    super(
      `Input is ${actualBytes} bytes, above the ${limitBytes} byte limit`,
      'pipeline'
    );
    this.limitBytes = limitBytes;
    this.actualBytes = actualBytes;
  }
}

export class TimeoutError extends ConversionError {
  readonly kind = 'TimeoutError';
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Conversion exceeded ${timeoutMs}ms`, 'pipeline');
    this.timeoutMs = timeoutMs;
  }
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
