/**
 * Returns the value stored under `key`, creating and storing it first when the
 * map has no entry for the key.
 *
 * @param map - The map to read from and extend.
 * @param key - Lookup key.
 * @param create - Factory invoked only when the key is absent.
 * @returns The existing or newly created value.
 */
export function getOrCreate<K, V>(map: Map<K, V>, key: K, create: (key: K) => V): V {
  if (map.has(key)) {
    const existing = map.get(key);
    if (existing !== undefined) {
      return existing;
    }
  }

  const created = create(key);
  map.set(key, created);
  return created;
}

/**
 * Adds `amount` to the numeric value stored under `key`, treating a missing entry as zero.
 *
 * @param map - Counter map to update.
 * @param key - Counter key.
 * @param amount - Increment, one when omitted.
 * @returns The updated count.
 */
export function incrementCount<K>(map: Map<K, number>, key: K, amount = 1): number {
  const next = (map.get(key) ?? 0) + amount;
  map.set(key, next);
  return next;
}
