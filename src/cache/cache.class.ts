import EventEmitter from 'events';
import { cloneDeep } from 'lodash-es';
import { CacheError } from '../errors.js';

export interface CacheConfig {
  /** Entry lifetime in milliseconds; 0 keeps entries forever. */
  ttl?: number;
  now?: () => number;
}

export interface CacheEntry<T = unknown> {
  key: string;
  storedAt: number;
  ttl: number;
  value: T;
}

export interface CacheStats {
  hits: number;
  misses: number;
  expired: number;
  sets: number;
}

/**
 * Key/value cache with a time-to-live. Drivers implement the `_read`,
 * `_write`, `_remove` and `_clear` storage hooks; expiry is decided here.
 */
export abstract class Cache extends EventEmitter {
  ttl: number;
  stats: CacheStats;
  protected _now: () => number;

  constructor(config: CacheConfig = {}) {
    super();
    this.ttl = config.ttl ?? 3600000;
    this._now = config.now ?? Date.now;
    this.stats = { hits: 0, misses: 0, expired: 0, sets: 0 };
  }

  protected abstract _write(entry: CacheEntry): Promise<void>;
  protected abstract _read(key: string): Promise<CacheEntry | null>;
  protected abstract _remove(key: string): Promise<void>;
  protected abstract _clear(): Promise<void>;

  validateKey(key: string): void {
    if (typeof key !== 'string' || !key) {
      throw new CacheError('Invalid cache key', {
        operation: 'validateKey',
        driver: this.constructor.name,
        key,
        suggestion: 'Cache key must be a non-empty string'
      });
    }
  }

  /** Judged by the cache's current ttl, not the one the entry was written with. */
  isExpired(entry: CacheEntry): boolean {
    return this.ttl > 0 && this._now() - entry.storedAt > this.ttl;
  }

  async set<T>(key: string, value: T): Promise<T> {
    this.validateKey(key);
    await this._write({ key, storedAt: this._now(), ttl: this.ttl, value });
    this.stats.sets++;
    this.emit('set', { key });
    return value;
  }

  /** The cached value, or `undefined` when missing or expired. */
  async get(key: string): Promise<unknown> {
    this.validateKey(key);
    const entry = await this._read(key);

    if (!entry) {
      this.stats.misses++;
      this.emit('miss', { key });
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.stats.expired++;
      await this._remove(key);
      this.emit('expired', { key });
      return undefined;
    }

    this.stats.hits++;
    this.emit('hit', { key });
    return entry.value;
  }

  async del(key: string): Promise<void> {
    this.validateKey(key);
    await this._remove(key);
    this.emit('deleted', { key });
  }

  async clear(): Promise<void> {
    await this._clear();
    this.emit('clear');
  }
}

/** Process-local cache; entries live as long as the instance. */
export class MemoryCache extends Cache {
  private _store: Map<string, CacheEntry>;

  constructor(config: CacheConfig = {}) {
    super(config);
    this._store = new Map();
  }

  protected async _write(entry: CacheEntry): Promise<void> {
    this._store.set(entry.key, cloneDeep(entry));
  }

  protected async _read(key: string): Promise<CacheEntry | null> {
    const entry = this._store.get(key);
    return entry ? cloneDeep(entry) : null;
  }

  protected async _remove(key: string): Promise<void> {
    this._store.delete(key);
  }

  protected async _clear(): Promise<void> {
    this._store.clear();
  }
}

export default Cache;
