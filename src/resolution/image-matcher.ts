/**
 * Resolution orchestrator: registry access → upstream discovery → tiers →
 * FIPS preference → version tag.
 */

import type { Logger } from 'pino';
import type { MatchResult, UpstreamResult } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { mapWithConcurrency } from '@/lib/concurrency';
import { createTimer } from '@/lib/logger';
import { ImageReference, isFipsVariant, splitReference, withRepositorySuffix } from '@/image/reference';
import { parseMatchOptions, type MatchOptions, type MatchOptionsInput } from '@/config/match-options';
import { DEFAULT_PREFETCH_CONCURRENCY } from '@/config/constants';
import type { ExistenceOracle, RegistryAccessCapability } from '@/infra/registry/types';
import type { TierMatcher, TierMatchOptions, TierName } from '@/matching/tiers';
import type { UpstreamFinder } from '@/upstream/finder';
import type { VersionMatcher } from '@/version/matcher';

const TIER_ORDER: readonly TierName[] = ['manual', 'catalog', 'heuristic', 'fuzzy'];

export interface ImageMatcherDependencies {
  tiers: readonly TierMatcher[];
  oracle: ExistenceOracle;
  logger: Logger;
  upstreamFinder?: UpstreamFinder;
  registryAccess?: RegistryAccessCapability;
  versionMatcher?: VersionMatcher;
}

export interface BatchOptions extends MatchOptionsInput {
  concurrency?: number;
}

const NO_MATCH: MatchResult = Object.freeze({ targetImage: null, confidence: 0, method: 'none' });

export class ImageMatcher {
  private readonly tiers: readonly TierMatcher[];
  private readonly oracle: ExistenceOracle;
  private readonly logger: Logger;
  private readonly upstreamFinder: UpstreamFinder | undefined;
  private readonly registryAccess: RegistryAccessCapability | undefined;
  private readonly versionMatcher: VersionMatcher | undefined;

  constructor(deps: ImageMatcherDependencies) {
    this.tiers = [...deps.tiers].sort(
      (a, b) => TIER_ORDER.indexOf(a.tier) - TIER_ORDER.indexOf(b.tier),
    );
    this.oracle = deps.oracle;
    this.logger = deps.logger.child({ module: 'image-matcher' });
    this.upstreamFinder = deps.upstreamFinder;
    this.registryAccess = deps.registryAccess;
    this.versionMatcher = deps.versionMatcher;
  }

  /**
   * Resolve `source` to a catalog image. Invalid options throw
   * `ConfigurationError` before any lookup; everything after that degrades
   * to a `none` result instead of throwing.
   */
  async match(source: string, input: MatchOptionsInput = {}): Promise<MatchResult> {
    const options = parseMatchOptions(input);
    const timer = createTimer(this.logger, 'match');

    const upstream = await this.discoverUpstream(source, options);
    const subject = upstream?.image ?? source;

    const tierOptions: TierMatchOptions =
      options.fuzzyConfidence !== undefined ? { fuzzyConfidence: options.fuzzyConfidence } : {};

    for (const tier of this.tiers) {
      const found = await this.runTier(tier, subject, tierOptions);
      if (!found?.targetImage) {
        continue;
      }

      let result: MatchResult = upstream ? { ...found, upstream } : found;
      if (options.preferFips) {
        result = await this.preferFips(result);
      }
      result = await this.applyVersion(result, source, options);

      timer.end({ source, target: result.targetImage, method: result.method });
      return result;
    }

    this.logger.debug({ source, subject }, 'No match found');
    timer.end({ source, method: 'none' });
    return upstream ? { ...NO_MATCH, upstream } : { ...NO_MATCH };
  }

  /**
   * Resolve many sources with bounded concurrency, keeping input order.
   */
  async matchAll(sources: readonly string[], options: BatchOptions = {}): Promise<MatchResult[]> {
    const { concurrency = DEFAULT_PREFETCH_CONCURRENCY, ...matchOptions } = options;
    parseMatchOptions(matchOptions);
    return mapWithConcurrency(sources, concurrency, (source) => this.match(source, matchOptions));
  }

  /**
   * Warm version caches for catalog images that a batch is expected to hit.
   */
  async prefetch(targetImages: readonly string[], concurrency = DEFAULT_PREFETCH_CONCURRENCY): Promise<void> {
    if (!this.versionMatcher) {
      return;
    }
    await this.versionMatcher.prefetch(targetImages, { concurrency });
  }

  private async discoverUpstream(
    source: string,
    options: MatchOptions,
  ): Promise<UpstreamResult | undefined> {
    if (!this.upstreamFinder) {
      return undefined;
    }

    if (ImageReference.parse(source).isCatalogImage()) {
      this.logger.debug({ source }, 'Source is already a catalog image, skipping upstream discovery');
      return undefined;
    }

    if (this.registryAccess) {
      try {
        if (await this.registryAccess.isAccessible(source)) {
          this.logger.debug({ source }, 'Registry accessible, skipping upstream discovery');
          return undefined;
        }
      } catch (error) {
        this.logger.debug({ source, error: extractErrorMessage(error) }, 'Registry access check failed');
      }
    }

    const upstream = await this.upstreamFinder.find(source, options.minConfidence);
    if (upstream.image) {
      this.logger.info(
        { source, upstream: upstream.image, confidence: upstream.confidence, method: upstream.method },
        'Upstream found',
      );
    }
    return upstream;
  }

  private async runTier(
    tier: TierMatcher,
    subject: string,
    options: TierMatchOptions,
  ): Promise<MatchResult | null> {
    try {
      return await tier.match(subject, options);
    } catch (error) {
      this.logger.warn({ tier: tier.tier, subject, error: extractErrorMessage(error) }, 'Tier failed');
      return null;
    }
  }

  private async preferFips(result: MatchResult): Promise<MatchResult> {
    const image = result.targetImage;
    if (!image || isFipsVariant(image)) {
      return result;
    }

    const fipsImage = withRepositorySuffix(image, '-fips');
    if (await this.oracle.exists(fipsImage)) {
      this.logger.info({ image, fipsImage }, 'FIPS variant found');
      return { ...result, targetImage: fipsImage };
    }

    this.logger.debug({ image }, 'No FIPS variant');
    return result;
  }

  private async applyVersion(
    result: MatchResult,
    source: string,
    options: MatchOptions,
  ): Promise<MatchResult> {
    const image = result.targetImage;
    if (!image) {
      return result;
    }

    const { repository, tag, digest } = splitReference(image);

    if (this.versionMatcher && options.resolveVersions) {
      const version = await this.versionMatcher.resolve(source, repository, {
        freshnessThresholdDays: options.freshnessThresholdDays,
      });
      if (version.isEolFallback) {
        this.logger.info(
          { source, target: repository, tag: version.resolvedTag },
          'Source version unavailable or stale in catalog',
        );
      }
      return { ...result, targetImage: `${repository}:${version.resolvedTag}` };
    }

    if (tag === undefined && digest === undefined) {
      return { ...result, targetImage: `${image}:latest` };
    }
    return result;
  }
}
