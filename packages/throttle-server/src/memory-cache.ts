import { CacheError, type Cache } from "./cache.js";

interface CacheEntry {
  value: number;
  expiresAtMs: number;
}

export class MemoryCache implements Cache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<number | undefined> {
    return this.live(key)?.value;
  }

  async set(key: string, value: number, ttlMs: number): Promise<void> {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new CacheError("set", key, `Invalid ttl for ${key}: ${ttlMs}`);
    }
    this.entries.set(key, { value, expiresAtMs: this.now() + ttlMs });
  }

  async expire(key: string): Promise<number | undefined> {
    const entry = this.live(key);
    if (!entry) {
      return undefined;
    }
    return entry.expiresAtMs - this.now();
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  sweep(): number {
    const nowMs = this.now();
    let dropped = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAtMs <= nowMs) {
        this.entries.delete(key);
        dropped += 1;
      }
    }
    return dropped;
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    this.sweep();
    return this.entries.size;
  }

  private live(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
