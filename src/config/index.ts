import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { SIZE_LIMITS, TIMEOUT } from './constants.js';
import {
  parseBoolean,
  parseInteger,
  parseLogLevel,
  parseOptionalPath,
  parsePort,
  parseWorkerMode,
} from './env-parsers.js';

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
});

function readPackageJson(): z.infer<typeof PackageJsonSchema> {
  const packageUrl = new URL('../../package.json', import.meta.url);
  const raw: unknown = JSON.parse(readFileSync(packageUrl, 'utf8'));
  return PackageJsonSchema.parse(raw);
}

const packageJson = readPackageJson();
const { env } = process;

export const config = {
  server: {
    name: packageJson.name,
    version: packageJson.version,
    host: env.HOST ?? '127.0.0.1',
    port: parsePort(env.PORT),
    shutdownGraceMs: TIMEOUT.SHUTDOWN_GRACE_MS,
  },
  conversion: {
    maxFileBytes: parseInteger(env.MAX_FILE_SIZE, SIZE_LIMITS.FIFTY_MB, 1),
    timeoutMs: parseInteger(
      env.CONVERSION_TIMEOUT_MS,
      TIMEOUT.DEFAULT_CONVERSION_TIMEOUT_MS,
      1
    ),
    workerMode: parseWorkerMode(env.CONVERSION_WORKERS),
    stripBoilerplate: parseBoolean(env.STRIP_BOILERPLATE, false),
  },
  logging: {
    level: parseLogLevel(env.LOG_LEVEL),
    dir: parseOptionalPath(env.LOG_DIR),
    silent: env.NODE_ENV === 'test',
  },
} as const;

export type AppConfig = typeof config;
