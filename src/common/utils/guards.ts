export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads a loosely typed metadata value: strings pass through trimmed, arrays
 * of strings are joined. Anything else reads as null.
 */
export function readText(value: unknown, separator = ', '): string | null {
  if (typeof value === 'string') {
    const text = value.trim();
    return text || null;
  }
  if (Array.isArray(value)) {
    const parts = value
      .filter((part): part is string => typeof part === 'string')
      .map((part) => part.trim())
      .filter(Boolean);
    return parts.length ? parts.join(separator) : null;
  }
  return null;
}
