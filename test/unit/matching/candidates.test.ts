import {
  CANDIDATE_STRATEGIES,
  baseOsStrategy,
  generateCandidates,
  knownAliasStrategy,
  normalizeOsName,
  pathFlatteningStrategy,
} from '@/matching/candidates';
import { heuristicCandidates } from '@/matching/tiers';

describe('normalizeOsName', () => {
  test.each([
    ['ubi9-minimal', 'ubi-minimal'],
    ['ubi8', 'ubi'],
    ['debian-12', 'debian'],
    ['al2023', 'amazonlinux'],
    ['distroless-static', 'distroless'],
    ['alpine', 'alpine'],
  ])('%s → %s', (input, expected) => {
    expect(normalizeOsName(input)).toBe(expected);
  });
});

describe('candidate strategies', () => {
  test('should map minimal OS images to the catalog base image', () => {
    expect(baseOsStrategy.generate({ baseName: 'ubi9-minimal', fullReference: 'ubi9-minimal', hasFips: true })).toEqual([
      'chainguard-base-fips',
      'chainguard-base',
    ]);
    expect(baseOsStrategy.generate({ baseName: 'nginx', fullReference: 'nginx', hasFips: false })).toEqual([]);
  });

  test('should skip namespace and registry segments when flattening paths', () => {
    expect(
      pathFlatteningStrategy.generate({
        baseName: 'postgres',
        fullReference: 'docker.io/library/postgres:16',
        hasFips: false,
      }),
    ).toEqual([]);
    expect(
      pathFlatteningStrategy.generate({
        baseName: 'prometheus',
        fullReference: 'quay.io/prometheus',
        hasFips: false,
      }),
    ).toEqual([]);
  });

  test('should ignore prototype keys in the alias table', () => {
    expect(knownAliasStrategy.generate({ baseName: 'constructor', fullReference: 'constructor', hasFips: false })).toEqual(
      [],
    );
  });
});

describe('generateCandidates', () => {
  test('should try the base image before the OS name', () => {
    expect(generateCandidates({ baseName: 'alpine', fullReference: 'alpine:3.19', hasFips: false })).toEqual([
      'chainguard-base',
      'alpine',
    ]);
  });

  test('should prefer hardened variants for vendor bundles', () => {
    expect(
      generateCandidates({ baseName: 'redis', fullReference: 'docker.io/bitnami/redis:7.2', hasFips: false }),
    ).toEqual(['redis-iamguarded', 'redis', 'bitnami-redis']);
  });

  test('should order FIPS variants first for FIPS vendor bundles', () => {
    expect(
      generateCandidates({ baseName: 'redis', fullReference: 'bitnami/redis-fips:7.2', hasFips: true }),
    ).toEqual([
      'redis-iamguarded-fips',
      'redis-fips',
      'redis-bitnami-fips',
      'redis-iamguarded',
      'redis',
      'bitnami-redis-fips',
      'bitnami-redis',
    ]);
  });

  test('should flatten project paths', () => {
    expect(generateCandidates({ baseName: 'node', fullReference: 'calico/node:v3.27', hasFips: false })).toEqual([
      'calico-node',
      'node',
    ]);
  });

  test('should try the image without its build variant', () => {
    expect(
      generateCandidates({ baseName: 'kafka-native', fullReference: 'apache/kafka-native:3.8', hasFips: false }),
    ).toEqual(['apache-kafka-native', 'kafka-native', 'kafka']);
  });

  test('should add known aliases last', () => {
    expect(generateCandidates({ baseName: 'mongo', fullReference: 'mongo:7', hasFips: true })).toEqual([
      'mongo-fips',
      'mongo',
      'mongodb-fips',
      'mongodb',
    ]);
  });

  test('should drop duplicates and keep the first occurrence', () => {
    const repeat = { name: 'direct-match' as const, generate: () => ['a', 'b', 'a'] };
    expect(generateCandidates({ baseName: 'x', fullReference: 'x', hasFips: false }, [repeat, repeat])).toEqual([
      'a',
      'b',
    ]);
  });

  test('should run every strategy by default', () => {
    expect(CANDIDATE_STRATEGIES.map((s) => s.name)).toEqual([
      'base-os',
      'vendor-bundle',
      'path-flattening',
      'direct-match',
      'known-alias',
    ]);
  });
});

describe('heuristicCandidates', () => {
  test('should qualify names with the catalog prefix', () => {
    expect(heuristicCandidates('docker.io/bitnami/redis:7.2', 'cgr.dev/chainguard-private')).toEqual([
      'cgr.dev/chainguard-private/redis-iamguarded',
      'cgr.dev/chainguard-private/redis',
      'cgr.dev/chainguard-private/bitnami-redis',
    ]);
  });

  test('should strip version and FIPS markers from the base name', () => {
    expect(heuristicCandidates('registry.example.com/team/nginx-fips:1.25', 'cgr.dev/c')).toEqual([
      'cgr.dev/c/team-nginx-fips',
      'cgr.dev/c/team-nginx',
      'cgr.dev/c/nginx-fips',
      'cgr.dev/c/nginx',
    ]);
  });
});
