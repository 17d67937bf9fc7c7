import { performance } from 'node:perf_hooks';

import { SizeLimitError, TimeoutError } from '../errors/conversion-errors.js';
import { createUnrefTimeout } from '../utils/timer-utils.js';
import { toFailure } from './convert.js';
import type { ConversionRunner } from './runner.js';
import type { ConversionOptions, ConversionResult } from './types.js';

export interface RunConversionOptions extends ConversionOptions {
  timeoutMs: number;
}

const TIMED_OUT: unique symbol = Symbol('conversion-timed-out');

/**
 * Runs a conversion under a wall-clock budget. When the budget elapses the
 * runner's signal is aborted and the job's output, if any, is discarded.
 */
export async function runConversion(
  runner: ConversionRunner,
  bytes: Uint8Array,
  options: RunConversionOptions
): Promise<ConversionResult> {
  const { timeoutMs, ...conversionOptions } = options;

  if (bytes.byteLength > conversionOptions.maxBytes) {
    return toFailure(
      new SizeLimitError(conversionOptions.maxBytes, bytes.byteLength)
    );
  }

  const controller = new AbortController();
  const timeout = createUnrefTimeout(timeoutMs, TIMED_OUT);
  const startedAt = performance.now();

  const job = runner
    .run(bytes, conversionOptions, controller.signal)
    .catch((error: unknown): typeof TIMED_OUT => {
      // Rejection caused by our own abort after the race was decided.
      if (controller.signal.aborted) return TIMED_OUT;
      throw error;
    });

  try {
    const outcome = await Promise.race([job, timeout.promise]);
    const elapsedMs = performance.now() - startedAt;
    if (outcome === TIMED_OUT || elapsedMs > timeoutMs) {
      const error = new TimeoutError(timeoutMs);
      controller.abort(error);
      return toFailure(error);
    }
    return outcome;
  } finally {
    timeout.cancel();
  }
}
