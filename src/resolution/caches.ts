/**
 * Caches shared by resolver components. Keys are normalized image
 * identities, so one set can back several matcher instances.
 */

import type { Logger } from 'pino';
import { createCache, type Cache } from '@/lib/cache';
import { CACHE_SIZE, CACHE_TTL } from '@/config/constants';
import type { FreshnessEntry } from '@/version/matcher';

export interface ResolutionCaches {
  exists: Cache<boolean>;
  tags: Cache<string[]>;
  freshness: Cache<FreshnessEntry>;
}

export interface ResolutionCacheOptions {
  existsTtlMs?: number;
  existsMaxSize?: number;
  tagTtlMs?: number;
  freshnessTtlMs?: number;
}

export function createResolutionCaches(
  options: ResolutionCacheOptions = {},
  logger?: Logger,
): ResolutionCaches {
  return {
    exists: createCache<boolean>(
      'image-exists',
      {
        ttlMs: options.existsTtlMs ?? CACHE_TTL.EXISTS_MS,
        maxSize: options.existsMaxSize ?? CACHE_SIZE.EXISTS,
      },
      logger,
    ),
    tags: createCache<string[]>(
      'catalog-tags',
      { ttlMs: options.tagTtlMs ?? CACHE_TTL.TAGS_MS, maxSize: CACHE_SIZE.TAGS },
      logger,
    ),
    freshness: createCache<FreshnessEntry>(
      'catalog-freshness',
      { ttlMs: options.freshnessTtlMs ?? CACHE_TTL.FRESHNESS_MS, maxSize: CACHE_SIZE.FRESHNESS },
      logger,
    ),
  };
}
