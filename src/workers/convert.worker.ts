import { parentPort } from 'node:worker_threads';

import { handleConversionJob } from './convert-job.js';

if (!parentPort) throw new Error('convert worker started without parentPort');
const port = parentPort;

port.on('message', (raw: unknown) => {
  port.postMessage(handleConversionJob(raw));
});
