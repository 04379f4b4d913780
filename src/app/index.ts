/**
 * Composition root: builds an `ImageMatcher` from configuration and optional
 * injected capabilities.
 */

import { createLogger, type Logger } from '@/lib/logger';
import { createAppConfig, parseAppConfig, type AppConfig } from '@/config/app-config';
import type {
  ExistenceOracle,
  FuzzyMatchCapability,
  RegistryAccessCapability,
} from '@/infra/registry/types';
import { createRegistryOracle } from '@/infra/registry/http-oracle';
import { createCachedOracle, guardOracle } from '@/infra/registry/guarded-oracle';
import { RegistryAccessChecker } from '@/infra/registry/access';
import {
  createCatalogMappingTable,
  loadMappingFile,
  type CatalogMappingTable,
  type MappingEntries,
} from '@/matching/mapping-tables';
import {
  createCatalogTier,
  createFuzzyTier,
  createHeuristicTier,
  createManualTier,
  type TierMatcher,
} from '@/matching/tiers';
import { UpstreamFinder } from '@/upstream/finder';
import { FreshnessChecker, TagDiscovery, VersionMatcher } from '@/version/matcher';
import { ImageMatcher } from '@/resolution/image-matcher';
import { createResolutionCaches, type ResolutionCaches } from '@/resolution/caches';

export interface ImageResolverOptions {
  /** Raw or validated configuration; read from the environment when omitted. */
  config?: unknown;
  logger?: Logger;
  /** Registry backend; the HTTP API v2 client when omitted. */
  oracle?: ExistenceOracle;
  fuzzyMatcher?: FuzzyMatchCapability;
  /** `false` disables the access check, so every source goes through upstream discovery. */
  registryAccess?: RegistryAccessCapability | false;
  /** `false` matches sources as given. */
  upstreamDiscovery?: boolean;
  /** `false` always answers `:latest`. */
  versionMatching?: boolean;
  manualMappings?: MappingEntries;
  upstreamMappings?: MappingEntries;
  catalogMappings?: CatalogMappingTable;
  caches?: ResolutionCaches;
  /** Clock used for build freshness. */
  now?: () => number;
}

function resolveConfig(config: unknown): AppConfig {
  return config === undefined ? createAppConfig() : parseAppConfig(config);
}

/**
 * Build a resolver. Throws `ConfigurationError` when the configuration is invalid.
 */
export function createImageResolver(options: ImageResolverOptions = {}): ImageMatcher {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? createLogger({ level: config.logging.level });
  const caches = options.caches ?? createResolutionCaches(config.cache, logger);
  const catalogRegistry = config.catalog.registry;

  const backend =
    options.oracle ??
    createRegistryOracle({
      logger,
      timeoutMs: config.registries.requestTimeoutMs,
      credentials: config.registries.credentials,
    });
  const oracle = guardOracle(createCachedOracle(backend, { cache: caches.exists }), {
    logger,
    timeoutMs: config.registries.requestTimeoutMs,
  });

  const tierContext = { logger, catalogRegistry };
  const tiers: TierMatcher[] = [
    createManualTier(
      options.manualMappings ??
        loadMappingFile(config.mappings.manualFile, 'manual image mappings', logger),
      tierContext,
    ),
    createCatalogTier(
      options.catalogMappings ??
        createCatalogMappingTable(
          loadMappingFile(config.mappings.catalogFile, 'catalog mappings', logger),
        ),
      tierContext,
    ),
    createHeuristicTier(oracle, tierContext),
  ];
  if (options.fuzzyMatcher) {
    tiers.push(createFuzzyTier(options.fuzzyMatcher, oracle, tierContext));
  }

  const upstreamFinder =
    options.upstreamDiscovery === false
      ? undefined
      : new UpstreamFinder({
          oracle,
          logger,
          mappings:
            options.upstreamMappings ??
            loadMappingFile(config.mappings.upstreamFile, 'upstream mappings', logger),
        });

  const registryAccess =
    options.registryAccess === false
      ? undefined
      : (options.registryAccess ??
        new RegistryAccessChecker({
          logger,
          oracle,
          additionalRegistries: config.registries.additional,
          configFile: config.registries.knownRegistriesFile,
        }));

  const versionMatcher =
    options.versionMatching === false
      ? undefined
      : new VersionMatcher({
          logger,
          tags: new TagDiscovery({ oracle, logger, cache: caches.tags }),
          freshness: new FreshnessChecker({
            oracle,
            logger,
            cache: caches.freshness,
            ...(options.now ? { now: options.now } : {}),
          }),
        });

  return new ImageMatcher({
    tiers,
    oracle,
    logger,
    ...(upstreamFinder ? { upstreamFinder } : {}),
    ...(registryAccess ? { registryAccess } : {}),
    ...(versionMatcher ? { versionMatcher } : {}),
  });
}
