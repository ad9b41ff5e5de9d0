/**
 * Resolution Cache
 *
 * Single-flight memoization keyed by resolver config. The promise of the
 * first computation for a key is stored before anything is awaited, so every
 * overlapping caller shares that one computation and its result.
 *
 * Entries never expire: hardware identifiers do not change while the process
 * runs. A computation that rejects is evicted so a later call can retry.
 */
export class ResolutionCache<K, V> {
  private readonly entries = new Map<K, Promise<V>>();

  getOrCompute(key: K, compute: () => Promise<V>): Promise<V> {
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    const pending = compute();
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });
    return pending;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
