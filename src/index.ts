/**
 * Public API of the image resolver.
 */

export { createImageResolver, type ImageResolverOptions } from './app';
export { ImageMatcher, type BatchOptions } from './resolution/image-matcher';
export { createResolutionCaches, type ResolutionCaches } from './resolution/caches';

export {
  ImageReference,
  hasFipsIndicator,
  isFipsVariant,
  splitReference,
  stripVersionSuffix,
  toCatalogRegistry,
} from './image/reference';

export { generateCandidates, CANDIDATE_STRATEGIES, type CandidateStrategy } from './matching/candidates';
export {
  createCatalogTier,
  createFuzzyTier,
  createHeuristicTier,
  createManualTier,
  type TierMatcher,
} from './matching/tiers';
export { createCatalogMappingTable, loadMappingFile, type CatalogMappingTable } from './matching/mapping-tables';

export { UpstreamFinder, findBaseImageCandidate } from './upstream/finder';
export { SemVer } from './version/semver';
export { FreshnessChecker, TagDiscovery, VersionMatcher } from './version/matcher';

export type {
  ExistenceOracle,
  FuzzyMatchCapability,
  FuzzySuggestion,
  RegistryAccessCapability,
} from './infra/registry/types';
export { createRegistryOracle } from './infra/registry/http-oracle';
export { createCachedOracle, guardOracle } from './infra/registry/guarded-oracle';
export { RegistryAccessChecker } from './infra/registry/access';

export { createAppConfig, type AppConfig } from './config/app-config';
export { MatchOptionsSchema, type MatchOptions, type MatchOptionsInput } from './config/match-options';
export { ConfigurationError, RegistryUnavailableError } from './lib/errors';
export { createLogger, type Logger } from './lib/logger';

export type {
  MatchMethod,
  MatchResult,
  UpstreamMethod,
  UpstreamResult,
  VersionMatchResult,
  Result,
} from './types';
