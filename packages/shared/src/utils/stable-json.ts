/**
 * Deterministic JSON serialisation
 * @module @tidewater/shared/utils/stable-json
 */

/**
 * JSON.stringify with object keys sorted at every level, so equal values
 * always produce equal strings. Dates serialise as ISO strings and
 * undefined properties are dropped, as with JSON.stringify.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalise(value)) ?? 'null';
}

function normalise(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : normalise(item)));
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const child: unknown = Reflect.get(value, key);
      if (child !== undefined) {
        sorted[key] = normalise(child);
      }
    }
    return sorted;
  }
  return value;
}
