/**
 * Resolution constants: tier confidences, registry lists and cache lifetimes.
 */

export const MATCH_CONFIDENCE = {
  MANUAL: 1.0,
  CATALOG: 0.95,
  HEURISTIC: 0.85,
} as const;

export const DEFAULT_MIN_CONFIDENCE = 0.7;
export const DEFAULT_FRESHNESS_THRESHOLD_DAYS = 7;

export const UPSTREAM_CONFIDENCE = {
  MANUAL: 1.0,
  STRIP_REGISTRY_FULL_PATH: 0.9,
  STRIP_REGISTRY_LAST_SEGMENT: 0.85,
  STRIP_REGISTRY_UNVERIFIED: 0.7,
  COMMON_REGISTRY: 0.8,
  BASE_EXTRACT: 0.7,
} as const;

/** Minimum confidence each upstream strategy must reach, on top of the caller's floor. */
export const UPSTREAM_THRESHOLDS = {
  manual: 0.0,
  'strip-registry': 0.7,
  'common-registry': 0.7,
  'base-extract': 0.85,
} as const;

export const CATALOG_PUBLIC_PREFIX = 'cgr.dev/chainguard';
export const CATALOG_PRIVATE_PREFIX = 'cgr.dev/chainguard-private';
export const CATALOG_REGISTRY_HOST = 'cgr.dev';

export const DOCKER_HUB = 'docker.io';
export const DOCKER_HUB_API_HOST = 'registry-1.docker.io';
export const DEFAULT_ORGANIZATION = 'library';

export const BUILD_CREATED_LABEL = 'org.opencontainers.image.created';

export const TIMEOUTS = {
  REGISTRY_REQUEST_MS: 30_000,
} as const;

export const CACHE_TTL = {
  TAGS_MS: 60 * 60 * 1000,
  FRESHNESS_MS: 24 * 60 * 60 * 1000,
  EXISTS_MS: 60 * 60 * 1000,
  TOKEN_MS: 5 * 60 * 1000,
} as const;

export const CACHE_SIZE = {
  TAGS: 500,
  FRESHNESS: 2000,
  EXISTS: 1000,
  TOKENS: 100,
} as const;

export const DEFAULT_PREFETCH_CONCURRENCY = 2;
export const MAX_TAG_PAGES = 20;

export const DEFAULT_PUBLIC_REGISTRIES: readonly string[] = [
  'docker.io',
  'registry-1.docker.io',
  'index.docker.io',
  'gcr.io',
  'ghcr.io',
  'quay.io',
  'registry.k8s.io',
  'k8s.gcr.io',
  'mcr.microsoft.com',
  'public.ecr.aws',
  'docker.elastic.co',
  'registry.access.redhat.com',
];

/** Registries that need credentials; reachable only when a lookup through them succeeds. */
export const DEFAULT_CREDENTIAL_REGISTRIES: readonly string[] = ['registry1.dso.mil'];

/** Public registries tried, in order, when looking for an upstream image. */
export const UPSTREAM_COMMON_REGISTRIES: readonly string[] = [
  'docker.io/library',
  'docker.io',
  'quay.io',
  'ghcr.io',
  'gcr.io',
];
