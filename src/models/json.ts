/**
 * Helpers for reading loosely-typed upstream JSON.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON string or return array as-is.
 * Gamma returns some fields as JSON strings (e.g., clobTokenIds, outcomePrices)
 */
export function parseJsonArray(value: unknown): unknown[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value)) return value;
  if (typeof value === "string") {
    if (value.trim() === "") return [];
    try {
      const parsed: unknown = JSON.parse(value);
      return Array.isArray(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  }
  return undefined;
}

/**
 * Numeric strings become numbers; everything else is returned untouched
 * so the schema that follows can reject it.
 */
export function coerceNumeric(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : value;
  }
  return value;
}
