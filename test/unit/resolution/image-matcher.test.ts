import { ImageMatcher, type ImageMatcherDependencies } from '@/resolution/image-matcher';
import { createCatalogMappingTable, type MappingEntries } from '@/matching/mapping-tables';
import {
  createCatalogTier,
  createFuzzyTier,
  createHeuristicTier,
  createManualTier,
  type TierMatcher,
} from '@/matching/tiers';
import { UpstreamFinder } from '@/upstream/finder';
import { FreshnessChecker, TagDiscovery, VersionMatcher } from '@/version/matcher';
import { ConfigurationError } from '@/lib/errors';
import type { RegistryAccessCapability } from '@/infra/registry/types';
import { FakeOracle, createTestLogger, type FakeOracleSeed } from '../../__support__/fakes/fake-oracle';

const logger = createTestLogger();
const CATALOG = 'cgr.dev/chainguard-private';

interface Fixture {
  manual?: MappingEntries;
  catalog?: MappingEntries;
  withVersions?: boolean;
  withUpstream?: boolean;
  registryAccess?: RegistryAccessCapability;
  extraTiers?: TierMatcher[];
}

function build(seed: FakeOracleSeed, fixture: Fixture = {}): { oracle: FakeOracle; matcher: ImageMatcher } {
  const oracle = new FakeOracle(seed);
  const context = { logger };
  const deps: ImageMatcherDependencies = {
    oracle,
    logger,
    tiers: [
      ...(fixture.extraTiers ?? []),
      createHeuristicTier(oracle, context),
      createCatalogTier(createCatalogMappingTable(fixture.catalog ?? {}), context),
      createManualTier(fixture.manual ?? {}, context),
    ],
    ...(fixture.withUpstream ? { upstreamFinder: new UpstreamFinder({ oracle, logger }) } : {}),
    ...(fixture.registryAccess ? { registryAccess: fixture.registryAccess } : {}),
    ...(fixture.withVersions
      ? {
          versionMatcher: new VersionMatcher({
            logger,
            tags: new TagDiscovery({ oracle, logger }),
            freshness: new FreshnessChecker({ oracle, logger }),
          }),
        }
      : {}),
  };
  return { oracle, matcher: new ImageMatcher(deps) };
}

const unreachable: RegistryAccessCapability = { isAccessible: async () => false };
const reachable: RegistryAccessCapability = { isAccessible: async () => true };

describe('ImageMatcher', () => {
  describe('tier order', () => {
    const fixture: Fixture = {
      manual: { 'nginx:1.25': 'cgr.dev/chainguard/nginx-custom' },
      catalog: { 'nginx*': 'nginx' },
    };

    test('should let a manual mapping win', async () => {
      const { matcher } = build({ images: [`${CATALOG}/nginx`] }, fixture);

      expect(await matcher.match('nginx:1.25')).toEqual({
        targetImage: `${CATALOG}/nginx-custom:latest`,
        confidence: 1,
        method: 'manual',
      });
    });

    test('should use the catalog table before heuristics', async () => {
      const { matcher, oracle } = build({ images: [`${CATALOG}/nginx`] }, fixture);

      expect(await matcher.match('nginx:1.26')).toEqual({
        targetImage: `${CATALOG}/nginx:latest`,
        confidence: 0.95,
        method: 'catalog',
      });
      expect(oracle.existsCalls).toEqual([]);
    });

    test('should fall through to heuristics', async () => {
      const { matcher } = build(
        {
          images: [`${CATALOG}/redis`],
          tags: { [`${CATALOG}/redis`]: ['7.2.4', '7.4.1'] },
        },
        { withVersions: true },
      );

      expect(await matcher.match('docker.io/bitnami/redis:7.2')).toEqual({
        targetImage: `${CATALOG}/redis:7.2.4`,
        confidence: 0.85,
        method: 'heuristic',
      });
    });

    test('should skip a failing tier', async () => {
      const broken: TierMatcher = {
        tier: 'manual',
        match: async () => {
          throw new Error('table unavailable');
        },
      };
      const { matcher } = build({}, { catalog: { 'nginx*': 'nginx' }, extraTiers: [broken] });

      expect((await matcher.match('nginx:1.25')).method).toBe('catalog');
    });

    test('should report no match', async () => {
      const { matcher } = build({});
      expect(await matcher.match('acme/widget:1')).toEqual({ targetImage: null, confidence: 0, method: 'none' });
    });

    test('should hand out a separate no-match result on every call', async () => {
      const { matcher } = build({});
      const first = await matcher.match('acme/widget:1');
      const second = await matcher.match('acme/gadget:1');

      expect(first).not.toBe(second);
      expect(Object.isFrozen(first)).toBe(false);
      expect(second).toEqual({ targetImage: null, confidence: 0, method: 'none' });
    });
  });

  describe('versions', () => {
    test('should keep latest sources on latest', async () => {
      const { matcher, oracle } = build(
        { tags: { [`${CATALOG}/nginx`]: ['1.27.5'] } },
        { catalog: { 'nginx*': 'nginx' }, withVersions: true },
      );

      expect((await matcher.match('nginx:latest')).targetImage).toBe(`${CATALOG}/nginx:latest`);
      expect(oracle.listTagsCalls).toEqual([]);
    });

    test('should replace a tag carried by the mapping target', async () => {
      const { matcher } = build(
        { tags: { [`${CATALOG}/nginx`]: ['1.25.4', '1.27.5'] } },
        { manual: { 'nginx:1.25.1': 'cgr.dev/chainguard/nginx:1.27' }, withVersions: true },
      );

      expect((await matcher.match('nginx:1.25.1')).targetImage).toBe(`${CATALOG}/nginx:1.25.4`);
    });

    test('should answer latest when version resolution is off', async () => {
      const { matcher, oracle } = build(
        { tags: { [`${CATALOG}/nginx`]: ['1.25.4'] } },
        { catalog: { 'nginx*': 'nginx' }, withVersions: true },
      );

      expect((await matcher.match('nginx:1.25', { resolveVersions: false })).targetImage).toBe(
        `${CATALOG}/nginx:latest`,
      );
      expect(oracle.listTagsCalls).toEqual([]);
    });

    test('should keep a target tag when version resolution is off', async () => {
      const { matcher } = build({}, { manual: { 'nginx:1.25': 'cgr.dev/chainguard/nginx:1.25' } });

      expect((await matcher.match('nginx:1.25', { resolveVersions: false })).targetImage).toBe(
        `${CATALOG}/nginx:1.25`,
      );
    });
  });

  describe('FIPS preference', () => {
    test('should switch to the FIPS variant when it exists', async () => {
      const { matcher } = build(
        { images: [`${CATALOG}/nginx-fips`] },
        { catalog: { 'nginx*': 'nginx' } },
      );

      expect((await matcher.match('nginx:1.25', { preferFips: true })).targetImage).toBe(
        `${CATALOG}/nginx-fips:latest`,
      );
    });

    test('should keep the match when no FIPS variant exists', async () => {
      const { matcher } = build({}, { catalog: { 'nginx*': 'nginx' } });

      expect((await matcher.match('nginx:1.25', { preferFips: true })).targetImage).toBe(
        `${CATALOG}/nginx:latest`,
      );
    });

    test('should not suffix a FIPS variant twice', async () => {
      const { matcher, oracle } = build(
        { images: [`${CATALOG}/nginx-fips-fips`] },
        { catalog: { 'nginx*': 'nginx-fips' } },
      );

      expect((await matcher.match('nginx:1.25', { preferFips: true })).targetImage).toBe(
        `${CATALOG}/nginx-fips:latest`,
      );
      expect(oracle.existsCalls).toEqual([]);
    });
  });

  describe('upstream discovery', () => {
    test('should match the upstream image and record where it came from', async () => {
      const { matcher } = build(
        {
          images: ['docker.io/library/python:3.12', `${CATALOG}/python`],
          tags: { [`${CATALOG}/python`]: ['3.12.7', '3.13.1'] },
        },
        { withUpstream: true, withVersions: true, registryAccess: unreachable },
      );

      expect(await matcher.match('mycompany.io/python:3.12')).toEqual({
        targetImage: `${CATALOG}/python:3.12.7`,
        confidence: 0.85,
        method: 'heuristic',
        upstream: { image: 'python:3.12', confidence: 0.9, method: 'strip-registry' },
      });
    });

    test('should skip discovery for sources already in the catalog', async () => {
      const { matcher, oracle } = build(
        { images: [`${CATALOG}/nginx`] },
        { withUpstream: true, registryAccess: unreachable },
      );

      expect(await matcher.match(`${CATALOG}/nginx:1.25`)).toEqual({
        targetImage: `${CATALOG}/nginx:latest`,
        confidence: 0.85,
        method: 'heuristic',
      });
      expect(oracle.existsCalls).toEqual([`${CATALOG}/chainguard-private-nginx`, `${CATALOG}/nginx`]);
    });

    test('should skip discovery for accessible registries', async () => {
      const { matcher } = build(
        { images: ['docker.io/library/python:3.12'] },
        { withUpstream: true, catalog: { 'python*': 'python' }, registryAccess: reachable },
      );

      const result = await matcher.match('mycompany.io/python:3.12');
      expect(result.upstream).toBeUndefined();
      expect(result.method).toBe('catalog');
    });

    test('should report the upstream even without a match', async () => {
      const { matcher } = build({}, { withUpstream: true, registryAccess: unreachable });

      expect(await matcher.match('registry.example.com/team/app:1.0')).toEqual({
        targetImage: null,
        confidence: 0,
        method: 'none',
        upstream: { image: 'team/app:1.0', confidence: 0.7, method: 'strip-registry' },
      });
    });

    test('should apply the confidence floor to discovery', async () => {
      const { matcher } = build({}, { withUpstream: true, registryAccess: unreachable });

      const result = await matcher.match('registry.example.com/team/app:1.0', { minConfidence: 0.8 });
      expect(result.upstream).toEqual({ image: null, confidence: 0, method: 'none' });
    });
  });

  describe('options', () => {
    test('should reject invalid options before any lookup', async () => {
      const { matcher, oracle } = build({});

      await expect(matcher.match('nginx', { minConfidence: 2 })).rejects.toBeInstanceOf(ConfigurationError);
      expect(oracle.existsCalls).toEqual([]);
    });

    test('should pass the fuzzy threshold to the fuzzy tier', async () => {
      const oracle = new FakeOracle({ images: [`${CATALOG}/nginx`] });
      const fuzzy = createFuzzyTier(
        { confidenceThreshold: 0.9, suggest: async () => ({ image: 'cgr.dev/chainguard/nginx', confidence: 0.8 }) },
        oracle,
        { logger },
      );
      const matcher = new ImageMatcher({ oracle, logger, tiers: [fuzzy] });

      expect((await matcher.match('internal/web:1')).method).toBe('none');
      expect(await matcher.match('internal/web:1', { fuzzyConfidence: 0.75 })).toEqual({
        targetImage: `${CATALOG}/nginx:latest`,
        confidence: 0.8,
        method: 'fuzzy',
      });
    });
  });

  describe('batches', () => {
    test('should keep input order', async () => {
      const { matcher } = build({}, { catalog: { 'nginx*': 'nginx', 'redis*': 'redis' } });

      const results = await matcher.matchAll(['redis:7', 'acme/widget', 'nginx:1.25'], { concurrency: 2 });
      expect(results.map((r) => r.targetImage)).toEqual([`${CATALOG}/redis:latest`, null, `${CATALOG}/nginx:latest`]);
    });

    test('should validate options once up front', async () => {
      const { matcher } = build({});
      await expect(matcher.matchAll(['nginx'], { freshnessThresholdDays: -1 })).rejects.toBeInstanceOf(
        ConfigurationError,
      );
    });

    test('should prefetch catalog versions', async () => {
      const { matcher, oracle } = build(
        { tags: { [`${CATALOG}/nginx`]: ['1.27.5'] } },
        { withVersions: true },
      );

      await matcher.prefetch([`${CATALOG}/nginx:1.27`]);
      expect(oracle.listTagsCalls).toEqual([`${CATALOG}/nginx`]);
      expect(oracle.labelCalls).toEqual([`${CATALOG}/nginx:1.27.5`]);
    });

    test('should treat prefetch as a no-op without version matching', async () => {
      const { matcher, oracle } = build({});
      await matcher.prefetch([`${CATALOG}/nginx`]);
      expect(oracle.listTagsCalls).toEqual([]);
    });
  });
});
