import type { ThrottleStatus } from "@throttle/contracts";
import type { Cache } from "./cache.js";

/**
 * Fixed-window attempt counter for one identity.
 *
 * The window starts at the first `hit` and is never extended by later hits:
 * each write carries the TTL the entry had left. Reads and writes are separate
 * cache calls, so two concurrent hits on the same key can both read `n` and both write `n + 1`.
 */
export class Throttle {
  constructor(
    readonly identity: string,
    readonly limit: number,
    readonly windowMs: number,
    readonly keyPrefix: string,
  ) {}

  key(): string {
    return `${this.keyPrefix}${this.identity}`;
  }

  async canGo(cache: Cache): Promise<boolean> {
    const count = await this.count(cache);
    return count < this.limit;
  }

  /** Remaining lifetime of the current window, or the full window when none is open. */
  async getExpire(cache: Cache): Promise<number> {
    return (await cache.expire(this.key())) ?? this.windowMs;
  }

  async hit(cache: Cache): Promise<void> {
    const key = this.key();
    const expireMs = await this.getExpire(cache);
    const current = await cache.get(key);
    await cache.set(key, current === undefined ? 1 : current + 1, expireMs);
  }

  async remove(cache: Cache): Promise<void> {
    await cache.remove(this.key());
  }

  async status(cache: Cache): Promise<ThrottleStatus> {
    const key = this.key();
    const count = await this.count(cache);
    const resetInMs = await this.getExpire(cache);
    return {
      identity: this.identity,
      key,
      count,
      limit: this.limit,
      remaining: Math.max(0, this.limit - count),
      allowed: count < this.limit,
      resetInMs,
    };
  }

  private async count(cache: Cache): Promise<number> {
    return (await cache.get(this.key())) ?? 0;
  }
}
