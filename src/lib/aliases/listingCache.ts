// src/lib/aliases/listingCache.ts
// ---------- Simple In-Memory Cache (TTL, keyed by search filter) ----------

export type Clock = () => number;

export class ListingCache<T> {
  private readonly entries = new Map<string, { data: T; timestamp: number }>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: Clock = Date.now,
  ) {}

  static keyFor(filter: string | null | undefined): string {
    return (filter ?? '').trim().toLowerCase();
  }

  get(filter: string | null | undefined): T | null {
    const key = ListingCache.keyFor(filter);
    const cached = this.entries.get(key);
    if (!cached) return null;

    if (this.now() - cached.timestamp > this.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return cached.data;
  }

  set(filter: string | null | undefined, data: T): void {
    this.entries.set(ListingCache.keyFor(filter), { data, timestamp: this.now() });
  }

  async getOrLoad(filter: string | null | undefined, load: () => Promise<T>): Promise<T> {
    const hit = this.get(filter);
    if (hit !== null) return hit;
    const data = await load();
    this.set(filter, data);
    return data;
  }

  /** Drop every filter's entry; a mutation can change any listing. */
  invalidate(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
