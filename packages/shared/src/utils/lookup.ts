/**
 * Defaulted Lookups
 *
 * Every per-team table in the engine treats a missing key as "neutral".
 * These helpers make that policy explicit instead of relying on falsy checks:
 * a stored 0 is a real value and is returned as-is.
 */

export function getOrDefault<K, V>(map: ReadonlyMap<K, V>, key: K, fallback: V): V {
    const value = map.get(key);
    return value === undefined ? fallback : value;
}

/**
 * Flatten a string-keyed map into a plain object (JSON/cache form).
 */
export function mapToRecord<V>(map: ReadonlyMap<string, V>): Record<string, V> {
    return Object.fromEntries(map);
}

export function recordToMap<V>(record: Record<string, V>): Map<string, V> {
    return new Map(Object.entries(record));
}
