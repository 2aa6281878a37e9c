/**
 * tidewatch — src/lib/lruCache.ts
 * WHAT: Generic LRU cache with TTL support.
 * WHY: Guild settings are read on every member/channel update event; a bounded
 *      cache keeps those reads off SQLite without growing with guild count.
 * IMPLEMENTATION NOTES:
 *  - Map insertion order is the LRU order
 *  - Delete-then-reinsert moves an entry to "most recently used"
 *  - TTL is checked lazily on get()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export class LRUCache<K, V> {
  private readonly entries = new Map<K, { value: V; storedAt: number }>();

  /**
   * @throws Error if maxSize or ttlMs are not positive
   */
  constructor(
    private readonly maxSize: number,
    private readonly ttlMs: number
  ) {
    if (maxSize <= 0) {
      throw new Error("LRUCache maxSize must be a positive number");
    }
    if (ttlMs <= 0) {
      throw new Error("LRUCache ttlMs must be a positive number");
    }
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (Date.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);

    if (this.entries.size >= this.maxSize) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
      }
    }

    this.entries.set(key, { value, storedAt: Date.now() });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
