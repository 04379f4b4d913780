/**
 * Oracle wrappers: one turns thrown errors and slow calls into neutral
 * answers, the other remembers `exists` answers.
 */

import type { Logger } from 'pino';
import { createCache, createCachedLoader, type Cache } from '@/lib/cache';
import { withTimeout } from '@/lib/concurrency';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { CACHE_SIZE, CACHE_TTL, TIMEOUTS } from '@/config/constants';
import type { ExistenceOracle } from './types';

export interface GuardOptions {
  timeoutMs?: number;
  logger: Logger;
}

export function guardOracle(oracle: ExistenceOracle, options: GuardOptions): ExistenceOracle {
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.REGISTRY_REQUEST_MS;
  const logger = options.logger;

  async function guarded<T>(operation: string, target: string, call: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await withTimeout(call(), timeoutMs, ERROR_MESSAGES.TIMEOUT(operation, timeoutMs));
    } catch (error) {
      logger.debug({ operation, target, error: extractErrorMessage(error) }, 'Registry lookup failed');
      return fallback;
    }
  }

  return {
    exists: (reference) => guarded('exists', reference, () => oracle.exists(reference), false),
    listTags: (repository) =>
      guarded('listTags', repository, () => oracle.listTags(repository), []),
    getBuildLabel: (reference, label) =>
      guarded<string | undefined>(
        'getBuildLabel',
        reference,
        () => oracle.getBuildLabel(reference, label),
        undefined,
      ),
  };
}

export interface CachedOracleOptions {
  ttlMs?: number;
  maxSize?: number;
  cache?: Cache<boolean>;
  logger?: Logger;
}

/**
 * Memoize `exists` answers, shared across concurrent lookups for the same
 * reference. Only answers the backend resolved are kept; a thrown lookup is
 * retried on the next call, so wrap the cached oracle in `guardOracle`, not
 * the other way round.
 */
export function createCachedOracle(
  oracle: ExistenceOracle,
  options: CachedOracleOptions = {},
): ExistenceOracle {
  const cache =
    options.cache ??
    createCache<boolean>(
      'image-exists',
      {
        ttlMs: options.ttlMs ?? CACHE_TTL.EXISTS_MS,
        maxSize: options.maxSize ?? CACHE_SIZE.EXISTS,
      },
      options.logger,
    );
  const loader = createCachedLoader(cache);

  return {
    exists: (reference) => loader.load(reference, () => oracle.exists(reference)),
    listTags: (repository) => oracle.listTags(repository),
    getBuildLabel: (reference, label) => oracle.getBuildLabel(reference, label),
  };
}
