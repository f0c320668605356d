import type { Runtime } from '../core/runtime.js';
import { type Mode, type Result, type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Options for cache-client */
export interface CacheClientOptions {
  /**
   * Cache time to live in milliseconds.
   * @default 300_000
   */
  ttl?: number;
  /**
   * Upper bound on stored entries; the least recently used entry goes first.
   * @default 500
   */
  maxEntries?: number;
}

interface PendingItem {
  result: unknown;
}

interface CacheItem<T = unknown> {
  key: string;
  data: T;
  expires: number;
}

/**
 * Memoization layer for endpoint operations.
 *
 * Entries expire `ttl` ms after they are stored and at most `maxEntries` are kept.
 * Works for both execution modes through a {@link Runtime}; in `async` mode,
 * callers sharing a key while its request is in flight share that request.
 */
export class CacheClient {
  #ttl: number;
  #maxEntries: number;
  #cache: Map<string, CacheItem> = new Map();
  #pending: Map<string, PendingItem> = new Map();

  /**
   * Creates a cache client with in-memory TTL-based storage.
   *
   * @param opts - Cache configuration; defaults to `ttl: 300_000` and `maxEntries: 500`.
   */
  constructor(opts?: CacheClientOptions) {
    this.#ttl = opts?.ttl ?? 300_000;
    this.#maxEntries = opts?.maxEntries ?? 500;
  }

  /** Number of stored entries, expired ones included until they are swept. */
  get size(): number {
    return this.#cache.size;
  }

  /** Current policy. */
  get options(): Required<CacheClientOptions> {
    return { ttl: this.#ttl, maxEntries: this.#maxEntries };
  }

  /**
   * Updates cache configuration without recreating the client.
   * A changed TTL drops every entry; a lower bound trims the oldest ones.
   */
  public config(opts: CacheClientOptions) {
    if (opts.ttl !== undefined && opts.ttl !== this.#ttl) {
      this.#ttl = opts.ttl;
      this.clear();
    }

    if (opts.maxEntries !== undefined) {
      this.#maxEntries = opts.maxEntries;
      this.#trim();
    }
  }

  /** Drops every entry and forgets in-flight requests. */
  public clear() {
    this.#cache = new Map();
    this.#pending = new Map();
  }

  /**
   * Disposes the cache client by clearing cached entries.
   */
  public dispose() {
    this.clear();
  }

  /**
   * Removes the entry stored under `key`, if any.
   * @returns whether an entry was removed.
   */
  public evict(key: string): boolean {
    this.#pending.delete(key);
    return this.#cache.delete(key);
  }

  /**
   * Add item to cache by provided key, sweeping expired entries first.
   */
  #add<T = unknown>(key: string, data: T) {
    const now = Date.now();
    for (const [k, item] of this.#cache) {
      if (item.expires <= now) {
        this.#cache.delete(k);
      }
    }

    this.#cache.delete(key);
    this.#cache.set(key, { key, data, expires: now + this.#ttl });
    this.#trim();
  }

  #trim() {
    for (const k of this.#cache.keys()) {
      if (this.#cache.size <= this.#maxEntries) {
        break;
      }
      this.#cache.delete(k);
    }
  }

  /**
   * Get item from cache by provided key if exists, marking it recently used.
   */
  #getItem<T>(key: string) {
    const item = this.#cache.get(key);
    if (!item) {
      return null;
    }

    this.#cache.delete(key);
    if (item.expires - Date.now() > 0) {
      this.#cache.set(key, item);
      return item as CacheItem<T>;
    }

    return null;
  }

  /**
   * Pass a request through the cache.
   *
   * A live entry is returned without calling `request`. Otherwise `request` runs,
   * and a successful value is stored under `key`. Failures are returned, never stored.
   *
   * @param runtime - Mode capability matching the result `request` produces.
   * @param key - Cache key, see {@link CacheClient.key}.
   * @param request - The operation to memoize.
   */
  public memoize<M extends Mode, T>(runtime: Runtime<M>, key: string, request: () => Result<M, T>): Result<M, T> {
    const cached = this.#getItem<T>(key);
    if (cached) {
      return runtime.of<T>([null, cached.data]);
    }

    const pending = this.#pending.get(key);
    if (pending !== undefined) {
      return pending.result as Result<M, T>;
    }

    const [errStart, started] = safeWrap(request);
    if (errStart) {
      return runtime.of<T>([new Error('error thrown on cache wrapping request', { cause: errStart }), null]);
    }

    let settled = false;
    let registered = false;
    const entry: PendingItem = { result: undefined };
    const result = runtime.then(started, (outcome): SafeWrap<Error, T> => {
      settled = true;
      // An in-flight entry dropped by clear() or evict() must not be stored.
      const current = !registered || this.#pending.get(key) === entry;
      if (registered && current) {
        this.#pending.delete(key);
      }

      const [err, data] = outcome;
      if (err) {
        return [new Error('error getting cached request', { cause: err }), null];
      }

      if (current) {
        this.#add(key, data);
      }

      return [null, data];
    });

    // Blocking requests have settled already; only in-flight ones are shared.
    if (!settled) {
      entry.result = result;
      registered = true;
      this.#pending.set(key, entry);
    }

    return result;
  }

  /**
   * Constructs a deterministic, unambiguous cache key for an operation call.
   *
   * - Unambiguous: uses JSON.stringify over a structured tuple of `[name, value]` pairs.
   * - Deterministic: arguments are sorted by name; `undefined` values are dropped.
   */
  public key(operation: string, args: Record<string, unknown>): string {
    const entries = Object.entries(args)
      .filter(([, value]) => value !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    return JSON.stringify([operation, entries]);
  }
}
