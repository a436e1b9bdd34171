/**
 * lookup-cache.ts
 * In-memory memoization of filesystem lookups.
 *
 * Constraints:
 * - Lives as long as the resolver that owns it (one generation run).
 * - Cache keys must be stable: use purpose + name/path as the key.
 *
 * Usage:
 *   const key = `roles-dirs:${repoRoot}`;
 *   const cached = cache.get<string[]>(key);
 *   if (cached !== undefined) return cached;
 *   const result = scan();
 *   cache.set(key, result);
 *   return result;
 */

export class LookupCache {
  private readonly _store = new Map<string, unknown>();

  /**
   * Retrieve a cached value by key.
   * Returns undefined on cache miss.
   */
  get<T>(key: string): T | undefined {
    return this._store.get(key) as T | undefined;
  }

  set<T>(key: string, value: T): void {
    this._store.set(key, value);
  }

  /** Number of cached entries, reported when a closure finishes. */
  get size(): number {
    return this._store.size;
  }
}
