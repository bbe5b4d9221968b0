/**
 * Unbounded write-once cache keyed by case-insensitive name.
 *
 * Entries never expire and are never replaced: a second `set` for a key that
 * is already present keeps the first value. Writers racing on the same key
 * store equal values, so no locking is needed.
 */
export class NameCache<T> {
  private map = new Map<string, T>();

  private static keyOf(name: string): string {
    return name.toLowerCase();
  }

  get(name: string): T | null {
    return this.map.get(NameCache.keyOf(name)) ?? null;
  }

  /**
   * Stores `value` unless the key is already present.
   *
   * @returns the value now held for the key
   */
  set(name: string, value: T): T {
    const key = NameCache.keyOf(name);
    const existing = this.map.get(key);
    if (existing !== undefined) return existing;

    this.map.set(key, value);
    return value;
  }

  get size(): number {
    return this.map.size;
  }
}
