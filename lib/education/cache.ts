// lib/education/cache.ts

export type Clock = () => number;

type Entry<V> = { value: Promise<V>; expiresAt: number };

/**
 * Promise cache with a fixed time-to-live per entry. Keys are the full input
 * (query text, relation name), so a hit is always for the same input.
 * Rejected loads are evicted so a failure is not replayed for the whole TTL.
 */
export class TtlCache<V> {
  private entries = new Map<string, Entry<V>>();

  constructor(
    readonly ttlMs: number,
    private readonly now: Clock = Date.now
  ) {}

  get size() {
    return this.entries.size;
  }

  has(key: string): boolean {
    const e = this.entries.get(key);
    if (!e) return false;
    if (e.expiresAt <= this.now()) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }

  getOrLoad(key: string, load: () => Promise<V>): Promise<V> {
    if (this.has(key)) {
      const hit = this.entries.get(key);
      if (hit) return hit.value;
    }

    const value = load();
    const entry: Entry<V> = { value, expiresAt: this.now() + this.ttlMs };
    this.entries.set(key, entry);
    void value.catch(() => {
      if (this.entries.get(key) === entry) this.entries.delete(key);
    });
    return value;
  }

  delete(key: string) {
    this.entries.delete(key);
  }

  clear() {
    this.entries.clear();
  }
}
