/**
 * Type guard for plain JSON objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalise a thrown value to an Error for `originalError` chaining
 */
export function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
