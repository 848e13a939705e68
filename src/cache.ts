interface ICacheEntry<V> {
  value: V;
  expires_at: number;
}

export interface ITtlCacheOpts {
  /** Lifetime of an entry in milliseconds. Zero or less disables caching. */
  ttl: number;
  /** Clock used for expiry, in milliseconds. Defaults to `Date.now`. */
  now?: () => number;
}

/**
 * A key-value store whose entries expire a fixed time after they were set.
 * Expiry is checked when reading; nothing sweeps in the background.
 *
 * Values are structured-cloned on the way in and on the way out, so a caller
 * holding a cached array or object can never change what other callers read.
 */
export class TtlCache<V> {
  protected entries = new Map<string, ICacheEntry<V>>();
  protected readonly now: () => number;

  constructor(protected readonly opts: ITtlCacheOpts) {
    this.now = opts.now || Date.now;
  }

  get enabled(): boolean {
    return this.opts.ttl > 0;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry || !this.enabled || this.now() >= entry.expires_at) {
      return undefined;
    }
    return structuredClone(entry.value);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: V): void {
    if (!this.enabled) {
      return;
    }
    this.entries.set(key, {
      value: structuredClone(value),
      expires_at: this.now() + this.opts.ttl,
    });
  }

  clear(): void {
    this.entries = new Map();
  }
}
