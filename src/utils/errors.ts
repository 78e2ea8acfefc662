/**
 * Error helpers for log metadata
 */

/**
 * Human-readable message for any thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrow an unknown value to a plain key/value object (arrays and null excluded)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
