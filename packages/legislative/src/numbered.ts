const NUMERIC_KEY = /^\d+$/;

/**
 * Lists arrive as objects keyed "0", "1", ... next to named siblings such as
 * `summary` or `session`. Returns the numbered values ordered by key; named
 * siblings are dropped. A real array passes through unchanged.
 */
export function flattenNumberedEntries(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (typeof value !== 'object' || value === null) return [];

  return Object.entries(value)
    .filter(([key]) => NUMERIC_KEY.test(key))
    .sort(([a], [b]) => Number(a) - Number(b))
    .map(([, entry]) => entry);
}
