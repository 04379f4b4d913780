/**
 * TTL cache with size-bounded eviction.
 *
 * Keys are hashed, so structured keys with the same content share an entry.
 */

import { createHash } from 'crypto';
import { createLogger, type Logger } from '@/lib/logger';

interface CacheEntry<T> {
  value: T;
  expires: number;
  hits: number;
  created: number;
  key: string;
}

export interface Cache<T> {
  readonly name: string;
  get(key: unknown): T | undefined;
  set(key: unknown, value: T): string;
  has(key: unknown): boolean;
  delete(key: unknown): boolean;
  clear(): void;
  size(): number;
  getStats(): CacheStats;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
  totalRequests: number;
  avgHitsPerEntry: number;
}

export interface CacheOptions {
  maxSize?: number;
  ttlMs?: number;
  enabled?: boolean;
}

function hashKey(key: unknown): string {
  const keyString = typeof key === 'string' ? key : JSON.stringify(key, sortObjectKeys);

  return createHash('sha256').update(keyString).digest('hex').substring(0, 16);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sortObjectKeys(_key: string, value: unknown): unknown {
  if (isPlainRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const k of Object.keys(value).sort()) {
      sorted[k] = value[k];
    }
    return sorted;
  }
  return value;
}

/**
 * Evict oldest entries to maintain maxSize
 */
function evictIfNeeded<T>(
  store: Map<string, CacheEntry<T>>,
  maxSize: number,
  logger: Logger,
): void {
  while (store.size >= maxSize) {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of store.entries()) {
      if (entry.created < oldestTime) {
        oldestTime = entry.created;
        oldestKey = key;
      }
    }

    if (oldestKey === null) {
      break;
    }

    logger.debug({ key: store.get(oldestKey)?.key }, 'Evicting oldest cache entry');
    store.delete(oldestKey);
  }
}

/**
 * Create a new cache instance
 */
export function createCache<T>(
  name: string,
  options: CacheOptions = {},
  logger?: Logger,
): Cache<T> {
  const config = {
    maxSize: options.maxSize ?? 100,
    ttlMs: options.ttlMs ?? 5 * 60 * 1000,
    enabled: options.enabled ?? true,
  };

  const log = logger ?? createLogger().child({ module: 'cache', name });
  const store = new Map<string, CacheEntry<T>>();
  const stats = { hits: 0, misses: 0 };

  return {
    name,

    set(key: unknown, value: T): string {
      if (!config.enabled) {
        return '';
      }

      const hash = hashKey(key);
      if (!store.has(hash)) {
        evictIfNeeded(store, config.maxSize, log);
      }

      const now = Date.now();
      store.set(hash, {
        value,
        expires: now + config.ttlMs,
        hits: 0,
        created: now,
        key: typeof key === 'string' ? key : JSON.stringify(key),
      });

      return hash;
    },

    get(key: unknown): T | undefined {
      if (!config.enabled) {
        stats.misses++;
        return undefined;
      }

      const hash = hashKey(key);
      const entry = store.get(hash);

      if (!entry) {
        stats.misses++;
        return undefined;
      }

      if (Date.now() > entry.expires) {
        store.delete(hash);
        stats.misses++;
        log.debug({ key: entry.key, age: Date.now() - entry.created }, 'Cache expired');
        return undefined;
      }

      entry.hits++;
      stats.hits++;
      return entry.value;
    },

    has(key: unknown): boolean {
      if (!config.enabled) return false;

      const hash = hashKey(key);
      const entry = store.get(hash);

      if (!entry) return false;
      if (Date.now() > entry.expires) {
        store.delete(hash);
        return false;
      }

      return true;
    },

    delete(key: unknown): boolean {
      return store.delete(hashKey(key));
    },

    clear(): void {
      const size = store.size;
      store.clear();
      stats.hits = 0;
      stats.misses = 0;
      log.debug({ entriesCleared: size }, 'Cache cleared');
    },

    size(): number {
      return store.size;
    },

    getStats(): CacheStats {
      const totalRequests = stats.hits + stats.misses;
      let totalHits = 0;

      for (const entry of store.values()) {
        totalHits += entry.hits;
      }

      return {
        size: store.size,
        hits: stats.hits,
        misses: stats.misses,
        hitRate: totalRequests > 0 ? stats.hits / totalRequests : 0,
        totalRequests,
        avgHitsPerEntry: store.size > 0 ? totalHits / store.size : 0,
      };
    },
  };
}

/**
 * Read-through helper: returns the cached value, or runs `load` once per key
 * while concurrent callers wait on the same promise.
 */
export interface CachedLoader<T> {
  load(key: string, loader: () => Promise<T>): Promise<T>;
  readonly cache: Cache<T>;
}

export function createCachedLoader<T>(cache: Cache<T>): CachedLoader<T> {
  const inflight = new Map<string, Promise<T>>();

  return {
    cache,

    async load(key: string, loader: () => Promise<T>): Promise<T> {
      const cached = cache.get(key);
      if (cached !== undefined) {
        return cached;
      }

      const pending = inflight.get(key);
      if (pending) {
        return pending;
      }

      const request = loader()
        .then((value) => {
          cache.set(key, value);
          return value;
        })
        .finally(() => {
          inflight.delete(key);
        });

      inflight.set(key, request);
      return request;
    },
  };
}
