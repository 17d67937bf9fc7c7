export const SIZE_LIMITS = {
  FIFTY_MB: 50 * 1024 * 1024,
} as const;

export const TIMEOUT = {
  DEFAULT_CONVERSION_TIMEOUT_MS: 30000,
  SHUTDOWN_GRACE_MS: 10000,
} as const;

export const PLIST_LIMITS = {
  MAX_DEPTH: 512,
} as const;
