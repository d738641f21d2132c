/**
 * In-memory TTL cache. Expired entries are dropped on read and swept on write.
 */
export class TtlCache<T> {
  private readonly store = new Map<string, { value: T; expiresAt: number }>();
  private readonly ttlMs: number;
  private readonly clock: () => number;

  public constructor(ttlSeconds: number, clock: () => number = Date.now) {
    this.ttlMs = Math.max(0, ttlSeconds) * 1000;
    this.clock = clock;
  }

  public has(key: string): boolean {
    return this.read(key) !== undefined;
  }

  /** Cached value, or undefined if expired/missing */
  public get(key: string): T | undefined {
    return this.read(key)?.value;
  }

  public set(key: string, value: T): void {
    const now = this.clock();
    this.sweep(now);
    this.store.set(key, {
      value,
      expiresAt: now + this.ttlMs,
    });
  }

  public clear(): void {
    this.store.clear();
  }

  /** Number of entries, including any that expired since the last write */
  public get size(): number {
    return this.store.size;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) {
        this.store.delete(key);
      }
    }
  }

  private read(key: string): { value: T } | undefined {
    const entry = this.store.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this.clock() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }

    return entry;
  }
}
