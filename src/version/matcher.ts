/**
 * Version resolution for catalog images.
 *
 * Picks the newest catalog tag sharing the source's major.minor, falls back
 * to the newest overall when that line is gone, and swaps a stale build for
 * the newest fresh one.
 */

import type { Logger } from 'pino';
import type { VersionMatchResult } from '@/types';
import { createCache, createCachedLoader, type Cache, type CachedLoader } from '@/lib/cache';
import { mapWithConcurrency } from '@/lib/concurrency';
import { ImageReference, splitReference } from '@/image/reference';
import {
  BUILD_CREATED_LABEL,
  CACHE_SIZE,
  CACHE_TTL,
  DEFAULT_FRESHNESS_THRESHOLD_DAYS,
  DEFAULT_PREFETCH_CONCURRENCY,
} from '@/config/constants';
import type { ExistenceOracle } from '@/infra/registry/types';
import { SemVer } from './semver';

const DAY_MS = 24 * 60 * 60 * 1000;
const LATEST = 'latest';

/** A catalog tag together with the version it spells. */
export interface VersionedTag {
  tag: string;
  version: SemVer;
}

/** Cached build time; `null` when the label is missing or unreadable. */
export interface FreshnessEntry {
  createdAt: number | null;
}

/** `org/app` and `docker.io/org/app` share cache entries. */
function normalizeKey(reference: string): string {
  return ImageReference.parse(reference).fullName;
}

/** Tag lists belong to the repository, whatever tag the caller passed. */
function repositoryKey(repository: string): string {
  return ImageReference.parse(repository).withoutVersion().fullName;
}

function tagged(base: string, tag: string): string {
  return ImageReference.parse(base).withTag(tag).fullName;
}

const CANONICAL_VERSION = /^\d+\.\d+\.\d+$/;

/** Which spelling of one version to keep: `1.2.3` over `v1.2.3`, then the shorter one. */
function preferTag(a: string, b: string): string {
  const aCanonical = CANONICAL_VERSION.test(a);
  const bCanonical = CANONICAL_VERSION.test(b);
  if (aCanonical !== bCanonical) return aCanonical ? a : b;
  if (a.length !== b.length) return a.length < b.length ? a : b;
  return a < b ? a : b;
}

/**
 * Parse tags into versions, newest first, one tag per version.
 */
export function toVersionedTags(tags: readonly string[]): VersionedTag[] {
  const byVersion = new Map<string, VersionedTag>();

  for (const tag of tags) {
    const version = SemVer.parse(tag);
    if (!version) continue;

    const key = version.toString();
    const existing = byVersion.get(key);
    byVersion.set(key, existing ? { version, tag: preferTag(existing.tag, tag) } : { version, tag });
  }

  return [...byVersion.values()].sort((a, b) => b.version.compare(a.version));
}

export interface TagDiscoveryOptions {
  oracle: ExistenceOracle;
  logger: Logger;
  cache?: Cache<string[]>;
  ttlMs?: number;
}

export class TagDiscovery {
  private readonly oracle: ExistenceOracle;
  private readonly logger: Logger;
  private readonly loader: CachedLoader<string[]>;

  constructor(options: TagDiscoveryOptions) {
    this.oracle = options.oracle;
    this.logger = options.logger;
    this.loader = createCachedLoader(
      options.cache ??
        createCache<string[]>(
          'catalog-tags',
          { ttlMs: options.ttlMs ?? CACHE_TTL.TAGS_MS, maxSize: CACHE_SIZE.TAGS },
          options.logger,
        ),
    );
  }

  async listTags(repository: string): Promise<string[]> {
    return this.loader.load(repositoryKey(repository), async () => {
      const tags = await this.oracle.listTags(repository);
      this.logger.debug({ repository, count: tags.length }, 'Listed catalog tags');
      return tags;
    });
  }

  async semverTags(repository: string): Promise<VersionedTag[]> {
    return toVersionedTags(await this.listTags(repository));
  }
}

/**
 * Read an RFC 3339 timestamp; values without an offset are taken as UTC.
 */
export function parseCreatedLabel(value: string | undefined): number | null {
  if (!value) return null;
  const text = /T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/.test(value) ? `${value}Z` : value;
  const parsed = Date.parse(text);
  return Number.isNaN(parsed) ? null : parsed;
}

export interface FreshnessCheckerOptions {
  oracle: ExistenceOracle;
  logger: Logger;
  cache?: Cache<FreshnessEntry>;
  ttlMs?: number;
  now?: () => number;
}

export class FreshnessChecker {
  private readonly oracle: ExistenceOracle;
  private readonly logger: Logger;
  private readonly loader: CachedLoader<FreshnessEntry>;
  private readonly now: () => number;

  constructor(options: FreshnessCheckerOptions) {
    this.oracle = options.oracle;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.loader = createCachedLoader(
      options.cache ??
        createCache<FreshnessEntry>(
          'catalog-freshness',
          { ttlMs: options.ttlMs ?? CACHE_TTL.FRESHNESS_MS, maxSize: CACHE_SIZE.FRESHNESS },
          options.logger,
        ),
    );
  }

  /** Build time in epoch milliseconds, or null when unknown. */
  async createdAt(reference: string): Promise<number | null> {
    const entry = await this.loader.load(normalizeKey(reference), async () => {
      const label = await this.oracle.getBuildLabel(reference, BUILD_CREATED_LABEL);
      const createdAt = parseCreatedLabel(label);
      if (label && createdAt === null) {
        this.logger.debug({ reference, label }, 'Unreadable build date');
      }
      return { createdAt };
    });
    return entry.createdAt;
  }

  /** Unknown build dates count as fresh. */
  async isFresh(reference: string, thresholdDays = DEFAULT_FRESHNESS_THRESHOLD_DAYS): Promise<boolean> {
    const createdAt = await this.createdAt(reference);
    if (createdAt === null) {
      return true;
    }

    const ageDays = Math.floor((this.now() - createdAt) / DAY_MS);
    if (ageDays > thresholdDays) {
      this.logger.debug({ reference, ageDays }, 'Image is stale');
      return false;
    }
    return true;
  }
}

export interface VersionMatcherOptions {
  tags: TagDiscovery;
  freshness: FreshnessChecker;
  logger: Logger;
  freshnessThresholdDays?: number;
}

export interface ResolveOptions {
  freshnessThresholdDays?: number;
}

export interface PrefetchOptions {
  concurrency?: number;
}

export class VersionMatcher {
  private readonly tags: TagDiscovery;
  private readonly freshness: FreshnessChecker;
  private readonly logger: Logger;
  private readonly freshnessThresholdDays: number;

  constructor(options: VersionMatcherOptions) {
    this.tags = options.tags;
    this.freshness = options.freshness;
    this.logger = options.logger.child({ module: 'version-matcher' });
    this.freshnessThresholdDays = options.freshnessThresholdDays ?? DEFAULT_FRESHNESS_THRESHOLD_DAYS;
  }

  /**
   * Tag to use on `targetBase` for an image that was `source`.
   */
  async resolve(
    source: string,
    targetBase: string,
    options: ResolveOptions = {},
  ): Promise<VersionMatchResult> {
    const thresholdDays = options.freshnessThresholdDays ?? this.freshnessThresholdDays;
    const { tag: sourceTag, digest } = splitReference(source);
    const base = splitReference(targetBase).repository;

    if (!sourceTag || sourceTag.toLowerCase() === LATEST || digest !== undefined) {
      return { resolvedTag: LATEST, isEolFallback: false };
    }

    const sourceVersion = SemVer.parse(sourceTag);
    if (!sourceVersion) {
      this.logger.debug({ source, tag: sourceTag }, 'Tag is not a version');
      return { resolvedTag: LATEST, isEolFallback: false };
    }

    const available = await this.tags.semverTags(base);
    const newest = available[0];
    if (!newest) {
      this.logger.debug({ base }, 'No versioned tags in catalog');
      return { resolvedTag: LATEST, sourceVersion: sourceVersion.toString(), isEolFallback: false };
    }

    let matched = available.find((candidate) => candidate.version.matchesMinor(sourceVersion));
    let isEolFallback = false;
    if (!matched) {
      this.logger.info(
        { base, line: `${sourceVersion.major}.${sourceVersion.minor}`, fallback: newest.tag },
        'Version line not in catalog, using newest',
      );
      matched = newest;
      isEolFallback = true;
    }

    if (!(await this.freshness.isFresh(tagged(base, matched.tag), thresholdDays))) {
      const fresh = await this.findFresh(base, available, newest, thresholdDays);
      if (fresh.tag !== matched.tag) {
        this.logger.info({ base, stale: matched.tag, fresh: fresh.tag }, 'Matched tag is stale, using fresher build');
        matched = fresh;
        isEolFallback = true;
      }
    }

    return {
      resolvedTag: matched.tag,
      sourceVersion: sourceVersion.toString(),
      matchedVersion: matched.version.toString(),
      isEolFallback,
    };
  }

  /** Newest fresh tag, or the newest tag when every build is stale. */
  private async findFresh(
    base: string,
    available: readonly VersionedTag[],
    newest: VersionedTag,
    thresholdDays: number,
  ): Promise<VersionedTag> {
    for (const candidate of available) {
      if (await this.freshness.isFresh(tagged(base, candidate.tag), thresholdDays)) {
        return candidate;
      }
    }
    return newest;
  }

  /**
   * Warm tag lists and the newest build date for each catalog image.
   */
  async prefetch(targetImages: readonly string[], options: PrefetchOptions = {}): Promise<void> {
    const bases = [...new Set(targetImages.map((image) => splitReference(image).repository))];

    await mapWithConcurrency(bases, options.concurrency ?? DEFAULT_PREFETCH_CONCURRENCY, async (base) => {
      const [newest] = await this.tags.semverTags(base);
      if (newest) {
        await this.freshness.createdAt(tagged(base, newest.tag));
      }
    });

    this.logger.debug({ count: bases.length }, 'Prefetched catalog versions');
  }
}
