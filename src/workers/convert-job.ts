import { convertWebArchive } from '../pipeline/convert.js';
import type { ConversionOptions, ConversionResult } from '../pipeline/types.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { ConversionJobSchema, type WorkerMessage } from './protocol.js';

type Convert = (
  bytes: Uint8Array,
  options: ConversionOptions
) => ConversionResult;

/** Validates one posted job and packages its outcome as a worker reply. */
export function handleConversionJob(
  raw: unknown,
  convert: Convert = convertWebArchive
): WorkerMessage {
  const job = ConversionJobSchema.safeParse(raw);
  if (!job.success) {
    return { type: 'error', message: 'Invalid conversion job payload' };
  }

  try {
    return { type: 'result', result: convert(job.data.bytes, job.data.options) };
  } catch (error) {
    return { type: 'error', message: getErrorMessage(error) };
  }
}
