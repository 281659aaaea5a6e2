/**
 * Deterministic JSON for relation data
 */

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function sortKeys(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map((item) => sortKeys(item) ?? null);
  }
  if (typeof value === 'object') {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      const entry = sortKeys(Reflect.get(value, key));
      if (entry !== undefined) {
        sorted[key] = entry;
      }
    }
    return sorted;
  }
  return undefined;
}

/**
 * JSON.stringify with object keys sorted at every depth, so equal values
 * always serialize to the same bytes.
 */
export function toSortedJson(value: unknown): string {
  return JSON.stringify(sortKeys(value) ?? null);
}
