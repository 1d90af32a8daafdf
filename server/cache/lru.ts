/** Insertion-ordered Map used as an LRU: the first key is the least recently used. */
export class LruMap<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LRU capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /** Reads and marks the key as most recently used. */
  get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  /** Reads without touching recency. */
  peek(key: K): V | undefined {
    return this.entries.get(key);
  }

  /** Stores the value and returns the evicted entry, if any. */
  set(key: K, value: V): [K, V] | null {
    if (this.entries.has(key)) this.entries.delete(key);
    this.entries.set(key, value);
    if (this.entries.size <= this.capacity) return null;
    const oldest = this.entries.keys().next();
    if (oldest.done) return null;
    const evictedKey = oldest.value;
    const evicted = this.entries.get(evictedKey);
    this.entries.delete(evictedKey);
    return evicted === undefined ? null : [evictedKey, evicted];
  }

  values(): IterableIterator<V> {
    return this.entries.values();
  }
}
