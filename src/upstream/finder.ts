/**
 * Upstream discovery: finds a public equivalent for a private or internal
 * image before catalog matching.
 *
 * Strategies run in order and each answer must clear both the caller's
 * floor and the strategy's own threshold. Base extraction's threshold is
 * above the confidence it produces, so it never wins on its own.
 */

import type { Logger } from 'pino';
import { NO_UPSTREAM, type UpstreamMethod, type UpstreamResult } from '@/types';
import { ImageReference } from '@/image/reference';
import {
  DEFAULT_MIN_CONFIDENCE,
  DEFAULT_ORGANIZATION,
  DOCKER_HUB,
  UPSTREAM_COMMON_REGISTRIES,
  UPSTREAM_CONFIDENCE,
  UPSTREAM_THRESHOLDS,
} from '@/config/constants';
import type { ExistenceOracle } from '@/infra/registry/types';
import type { MappingEntries } from '@/matching/mapping-tables';
import { TOOL_SUFFIXES } from '@/matching/rules';

const PRIVATE_REGISTRY_PATTERNS: readonly RegExp[] = [
  /^[a-z0-9.-]+\.(io|com|net|org|dev)\//,
  /^gcr\.io\/[a-z0-9-]+\//,
  /^[a-z0-9-]+\.gcr\.io\//,
  /^[0-9]+\.dkr\.ecr\./,
  /^.*\.azurecr\.io\//,
];

const COMMON_BASE_IMAGES: readonly string[] = [
  'python', 'node', 'nginx', 'postgres', 'postgresql', 'mysql', 'mariadb',
  'redis', 'mongo', 'mongodb', 'golang', 'go', 'java', 'openjdk',
  'ruby', 'php', 'perl', 'alpine', 'ubuntu', 'debian', 'centos',
  'httpd', 'apache', 'tomcat', 'rabbitmq', 'kafka', 'elasticsearch',
];

/** Bases that only count as the whole name or its leading `<base>-` part. */
const AMBIGUOUS_BASES: ReadonlySet<string> = new Set(['node']);

export function isPrivateRegistryReference(reference: string): boolean {
  return PRIVATE_REGISTRY_PATTERNS.some((pattern) => pattern.test(reference));
}

/**
 * Common base images named inside `baseName`, in list order, respecting the
 * tool and ambiguity guards: `internal-python-app` → `python`, `node-exporter` → none.
 */
export function findBaseImageCandidates(baseName: string): string[] {
  const name = baseName.toLowerCase();
  const found: string[] = [];

  for (const base of COMMON_BASE_IMAGES) {
    if (name.startsWith(`${base}-`)) {
      const suffix = name.slice(base.length + 1);
      if (TOOL_SUFFIXES.some((tool) => suffix === tool || suffix.startsWith(`${tool}-`))) {
        continue;
      }
    }

    if (AMBIGUOUS_BASES.has(base) && name !== base && !name.startsWith(`${base}-`)) {
      continue;
    }

    if (name.includes(base)) {
      found.push(base);
    }
  }

  return found;
}

export function findBaseImageCandidate(baseName: string): string | undefined {
  return findBaseImageCandidates(baseName)[0];
}

export interface UpstreamFinderOptions {
  oracle: ExistenceOracle;
  logger: Logger;
  /** Exact-string overrides: source reference → upstream reference. */
  mappings?: MappingEntries;
}

export class UpstreamFinder {
  private readonly oracle: ExistenceOracle;
  private readonly logger: Logger;
  private readonly mappings: MappingEntries;

  constructor(options: UpstreamFinderOptions) {
    this.oracle = options.oracle;
    this.logger = options.logger.child({ module: 'upstream-finder' });
    this.mappings = options.mappings ?? {};
  }

  async find(reference: string, minConfidence = DEFAULT_MIN_CONFIDENCE): Promise<UpstreamResult> {
    const source = reference.trim();

    const manual = this.fromMappings(source);
    if (manual && this.passes(manual, minConfidence)) {
      return manual;
    }

    const stripped = await this.stripRegistry(source);
    if (stripped && this.passes(stripped, minConfidence)) {
      return stripped;
    }

    const common = await this.searchCommonRegistries(source);
    if (common && this.passes(common, minConfidence)) {
      return common;
    }

    const base = await this.extractBaseImage(source);
    if (base && this.passes(base, minConfidence)) {
      return base;
    }

    this.logger.debug({ reference: source }, 'No upstream found');
    return NO_UPSTREAM;
  }

  private passes(result: UpstreamResult, minConfidence: number): boolean {
    if (result.confidence < minConfidence) {
      return false;
    }

    const threshold = result.method === 'none' ? 0 : UPSTREAM_THRESHOLDS[result.method];
    if (result.confidence < threshold) {
      this.logger.debug(
        { method: result.method, confidence: result.confidence, threshold },
        'Upstream result below strategy threshold',
      );
      return false;
    }

    return true;
  }

  private result(image: string, confidence: number, method: UpstreamMethod): UpstreamResult {
    return { image, confidence, method };
  }

  private fromMappings(reference: string): UpstreamResult | undefined {
    const upstream = Object.hasOwn(this.mappings, reference) ? this.mappings[reference] : undefined;
    if (!upstream) return undefined;

    this.logger.debug({ reference, upstream }, 'Manual upstream mapping found');
    return this.result(upstream, UPSTREAM_CONFIDENCE.MANUAL, 'manual');
  }

  /**
   * `mycompany.io/python:3.12` → `python:3.12`,
   * `artifactory.com/jenkins/jenkins:2.426` → `jenkins/jenkins:2.426`.
   */
  private async stripRegistry(reference: string): Promise<UpstreamResult | undefined> {
    if (!isPrivateRegistryReference(reference)) {
      return undefined;
    }

    const parts = reference.split('/');
    if (parts.length < 2) {
      return undefined;
    }

    const stripped = parts.slice(1).join('/');
    const lastSegment = parts[parts.length - 1] ?? stripped;
    const singleSegment = !(stripped.split(':')[0] ?? '').includes('/');

    if (await this.verify(`${DOCKER_HUB}/${stripped}`)) {
      return this.result(stripped, UPSTREAM_CONFIDENCE.STRIP_REGISTRY_FULL_PATH, 'strip-registry');
    }
    if (singleSegment && (await this.verify(`${DOCKER_HUB}/${DEFAULT_ORGANIZATION}/${stripped}`))) {
      return this.result(stripped, UPSTREAM_CONFIDENCE.STRIP_REGISTRY_FULL_PATH, 'strip-registry');
    }

    if (stripped !== lastSegment) {
      if (
        (await this.verify(`${DOCKER_HUB}/${lastSegment}`)) ||
        (await this.verify(`${DOCKER_HUB}/${DEFAULT_ORGANIZATION}/${lastSegment}`))
      ) {
        return this.result(lastSegment, UPSTREAM_CONFIDENCE.STRIP_REGISTRY_LAST_SEGMENT, 'strip-registry');
      }
    }

    this.logger.debug({ reference, upstream: stripped }, 'Registry strip unverified');
    return this.result(stripped, UPSTREAM_CONFIDENCE.STRIP_REGISTRY_UNVERIFIED, 'strip-registry');
  }

  /**
   * Look for `org/name`, then the bare name, in each common public registry.
   */
  private async searchCommonRegistries(reference: string): Promise<UpstreamResult | undefined> {
    const ref = ImageReference.parse(reference);
    const baseName = ref.baseName();
    const fullPath =
      ref.organization && ref.organization !== DEFAULT_ORGANIZATION
        ? `${ref.organization}/${ref.name}`.toLowerCase()
        : ref.name;

    for (const registry of UPSTREAM_COMMON_REGISTRIES) {
      const candidates = fullPath && fullPath !== baseName
        ? [`${registry}/${fullPath}`, `${registry}/${baseName}`]
        : [`${registry}/${baseName}`];

      for (const candidate of candidates) {
        if (await this.verify(candidate)) {
          this.logger.debug({ reference, candidate }, 'Found in common registry');
          return this.result(candidate, UPSTREAM_CONFIDENCE.COMMON_REGISTRY, 'common-registry');
        }
      }
    }

    return undefined;
  }

  /**
   * `internal-python-app:v1` → `python:latest`.
   */
  private async extractBaseImage(reference: string): Promise<UpstreamResult | undefined> {
    for (const base of findBaseImageCandidates(ImageReference.parse(reference).baseName())) {
      if (
        (await this.verify(`${DOCKER_HUB}/${DEFAULT_ORGANIZATION}/${base}:latest`)) ||
        (await this.verify(`${DOCKER_HUB}/${base}:latest`))
      ) {
        return this.result(`${base}:latest`, UPSTREAM_CONFIDENCE.BASE_EXTRACT, 'base-extract');
      }
    }

    return undefined;
  }

  private async verify(candidate: string): Promise<boolean> {
    return this.oracle.exists(candidate);
  }
}
