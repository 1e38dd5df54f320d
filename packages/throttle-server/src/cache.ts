export type CacheOperation = "set" | "remove";

export class CacheError extends Error {
  readonly key: string;
  readonly operation: CacheOperation;

  constructor(operation: CacheOperation, key: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CacheError";
    this.key = key;
    this.operation = operation;
  }
}

/**
 * Key-value store with per-key expiry. Counts are integers, TTLs are milliseconds.
 * `set` and `remove` reject with {@link CacheError}; reads resolve to `undefined` for missing keys.
 */
export interface Cache {
  get(key: string): Promise<number | undefined>;
  set(key: string, value: number, ttlMs: number): Promise<void>;
  /** Remaining time-to-live, or `undefined` when the key is missing or has no expiry. */
  expire(key: string): Promise<number | undefined>;
  remove(key: string): Promise<void>;
}
