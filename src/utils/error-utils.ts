export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
