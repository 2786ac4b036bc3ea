export interface DedupCacheOptions {
  windowMs: number;
  maxEntries: number;
  now?: () => number;
}

/**
 * Recently seen event ids. Entries expire after `windowMs`; past `maxEntries`
 * the oldest are evicted first.
 */
export class DedupCache {
  // Insertion order is arrival order, so the first entries are always the oldest
  private readonly seen = new Map<string, number>();
  private readonly now: () => number;

  constructor(private readonly options: DedupCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Records `id` and returns true, or returns false if it was seen within the window. */
  tryAdd(id: string): boolean {
    const now = this.now();
    this.evict(now);
    if (this.seen.has(id)) return false;

    this.seen.set(id, now);
    while (this.seen.size > this.options.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
    return true;
  }

  has(id: string): boolean {
    this.evict(this.now());
    return this.seen.has(id);
  }

  get size(): number {
    return this.seen.size;
  }

  private evict(now: number): void {
    for (const [id, seenAt] of this.seen) {
      if (now - seenAt < this.options.windowMs) break;
      this.seen.delete(id);
    }
  }
}
