import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';

import type { WorkerMode } from '../config/env-parsers.js';
import { logDebug, logWarn } from '../services/logger.js';
import { toError } from '../utils/error-utils.js';
import { type ConversionJob, WorkerMessageSchema } from '../workers/protocol.js';
import { convertWebArchive } from './convert.js';
import type {
  ConversionOptions,
  ConversionResult,
  ConversionStages,
} from './types.js';

/**
 * Executes one conversion. Aborting `signal` must stop the job and reject
 * the returned promise.
 */
export interface ConversionRunner {
  readonly mode: WorkerMode;
  run(
    bytes: Uint8Array,
    options: ConversionOptions,
    signal: AbortSignal
  ): Promise<ConversionResult>;
  close(): Promise<void>;
}

export const DEFAULT_WORKER_URL = new URL(
  '../workers/convert.worker.js',
  import.meta.url
);

export function createInlineRunner(stages?: ConversionStages): ConversionRunner {
  return {
    mode: 'inline',
    run: (bytes, options, signal) => {
      if (signal.aborted) return Promise.reject(toError(signal.reason));
      return Promise.resolve().then(() =>
        convertWebArchive(bytes, options, stages)
      );
    },
    close: () => Promise.resolve(),
  };
}

/**
 * Starts a dedicated worker per job. The worker is terminated when the job
 * settles or is aborted, so a runaway parse never outlives its request.
 */
export function createWorkerRunner(workerUrl: URL): ConversionRunner {
  const active = new Set<Worker>();

  const run = (
    bytes: Uint8Array,
    options: ConversionOptions,
    signal: AbortSignal
  ): Promise<ConversionResult> =>
    new Promise<ConversionResult>((resolve, reject) => {
      if (signal.aborted) {
        reject(toError(signal.reason));
        return;
      }

      const worker = new Worker(workerUrl);
      active.add(worker);
      let settled = false;

      const settle = (finish: () => void): void => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        active.delete(worker);
        void worker.terminate();
        finish();
      };

      const onAbort = (): void => {
        logDebug('Terminating conversion worker', { threadId: worker.threadId });
        settle(() => {
          reject(toError(signal.reason));
        });
      };
      signal.addEventListener('abort', onAbort, { once: true });

      worker.once('message', (raw: unknown) => {
        const parsed = WorkerMessageSchema.safeParse(raw);
        settle(() => {
          if (!parsed.success) {
            reject(new Error('Invalid conversion worker response'));
          } else if (parsed.data.type === 'error') {
            reject(new Error(parsed.data.message));
          } else {
            resolve(parsed.data.result);
          }
        });
      });
      worker.once('error', (error: Error) => {
        settle(() => {
          reject(error);
        });
      });
      worker.once('exit', (code: number) => {
        settle(() => {
          reject(new Error(`Conversion worker exited with code ${code}`));
        });
      });

      const job: ConversionJob = { bytes, options };
      worker.postMessage(job);
    });

  return {
    mode: 'thread',
    run,
    close: async () => {
      const workers = [...active];
      active.clear();
      await Promise.allSettled(workers.map((worker) => worker.terminate()));
    },
  };
}

/**
 * Picks the runner for `mode`. Thread mode needs the compiled worker script;
 * when it is missing (running from TypeScript sources) conversions run on the
 * main thread instead.
 */
export function resolveConversionRunner(
  mode: WorkerMode,
  workerUrl: URL = DEFAULT_WORKER_URL
): ConversionRunner {
  if (mode === 'inline') return createInlineRunner();

  const workerPath = fileURLToPath(workerUrl);
  if (existsSync(workerPath)) return createWorkerRunner(workerUrl);

  logWarn('Conversion worker unavailable; using main thread', {
    worker: workerPath,
  });
  return createInlineRunner();
}
