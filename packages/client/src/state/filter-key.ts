/**
 * Stable string for a plain filter object: keys sorted, undefined fields
 * dropped, dates as ISO strings. Structurally equal filters share a key.
 */
export function filterKey(filter: object): string {
  return JSON.stringify(normalize(filter));
}

function normalize(value: unknown): unknown {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(normalize);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, field]) => field !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, field]) => [key, normalize(field)])
    );
  }
  return value;
}
