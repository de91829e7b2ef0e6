/**
 * Generic LRU cache over a Map (insertion order doubles as recency order).
 * Values are never `undefined`; a stored `undefined` reads as a miss.
 * `get()` refreshes an entry; `set()` evicts the least recently used entries
 * past capacity. `onEvict` runs for every value that leaves the cache, so
 * owners can release decoded resources.
 */
export class LRUCache<K, V> {
  private map = new Map<K, V>();
  private maxSize: number;
  private readonly onEvict?: (key: K, value: V) => void;

  constructor(maxSize: number, onEvict?: (key: K, value: V) => void) {
    this.maxSize = Math.max(1, Math.floor(maxSize));
    this.onEvict = onEvict;
  }

  get(key: K): V | undefined {
    const value = this.map.get(key);
    if (value === undefined) return undefined;
    this.map.delete(key);
    this.map.set(key, value);
    return value;
  }

  /** Read without touching recency (render-loop hot path). */
  peek(key: K): V | undefined {
    return this.map.get(key);
  }

  set(key: K, value: V): void {
    const previous = this.map.get(key);
    if (previous !== undefined) {
      this.map.delete(key);
      if (previous !== value) {
        this.onEvict?.(key, previous);
      }
    }
    this.map.set(key, value);
    this.trim();
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  delete(key: K): boolean {
    const value = this.map.get(key);
    if (value === undefined) return false;
    this.map.delete(key);
    this.onEvict?.(key, value);
    return true;
  }

  clear(): void {
    const entries = [...this.map];
    this.map.clear();
    if (this.onEvict) {
      for (const [key, value] of entries) {
        this.onEvict(key, value);
      }
    }
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return [...this.map.keys()];
  }

  get size(): number {
    return this.map.size;
  }

  get capacity(): number {
    return this.maxSize;
  }

  setCapacity(newSize: number): void {
    this.maxSize = Math.max(1, Math.floor(newSize));
    this.trim();
  }

  private trim(): void {
    while (this.map.size > this.maxSize) {
      const next = this.map.entries().next();
      if (next.done) return;
      const [oldestKey, oldestValue] = next.value;
      this.map.delete(oldestKey);
      this.onEvict?.(oldestKey, oldestValue);
    }
  }
}
