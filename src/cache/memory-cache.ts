// ---------------------------------------------------------------------------
// In-process LRU store with per-entry expiry.
// ---------------------------------------------------------------------------

interface Slot<T> {
  value: T;
  expiresAt: number;
}

export interface MemoryCacheOptions {
  maxEntries: number;
  /** Lifetime of an entry unless `set` is given another one. */
  defaultTtlMs: number;
}

/**
 * LRU cache on top of `Map` insertion order: reads move a key to the back,
 * writes at capacity drop the key at the front.  Expired entries are removed
 * when they are read.
 */
export class MemoryCache<T> {
  private readonly slots = new Map<string, Slot<T>>();
  private readonly options: MemoryCacheOptions;

  constructor(options: MemoryCacheOptions) {
    if (options.maxEntries < 1) {
      throw new RangeError("maxEntries must be at least 1");
    }
    this.options = options;
  }

  get(key: string): T | null {
    const slot = this.slots.get(key);
    if (!slot) return null;

    this.slots.delete(key);
    if (Date.now() > slot.expiresAt) return null;

    this.slots.set(key, slot);
    return slot.value;
  }

  set(key: string, value: T, ttlMs: number = this.options.defaultTtlMs): void {
    this.slots.delete(key);

    if (this.slots.size >= this.options.maxEntries) {
      for (const oldest of this.slots.keys()) {
        this.slots.delete(oldest);
        break;
      }
    }

    this.slots.set(key, { value, expiresAt: Date.now() + ttlMs });
  }

  delete(key: string): void {
    this.slots.delete(key);
  }

  clear(): void {
    this.slots.clear();
  }

  get size(): number {
    return this.slots.size;
  }
}
