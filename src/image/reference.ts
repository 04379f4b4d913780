/**
 * Container image reference model.
 *
 * Parsing is purely textual and total: any string yields a reference, and
 * `ImageReference.parse(ref.fullName)` reproduces `ref` field by field.
 */

import {
  CATALOG_PRIVATE_PREFIX,
  CATALOG_PUBLIC_PREFIX,
  CATALOG_REGISTRY_HOST,
  DEFAULT_ORGANIZATION,
  DOCKER_HUB,
} from '@/config/constants';

export interface ReferenceParts {
  /** Everything before the tag and digest, e.g. `ghcr.io/org/app`. */
  repository: string;
  tag?: string;
  digest?: string;
}

export interface BaseNameOptions {
  stripFips?: boolean;
  stripVersion?: boolean;
}

const FIPS_INDICATOR = /(-fips|_fips|:fips|fips-|fips_|\/fips)/i;
const FIPS_SUFFIX = /[-_]fips$/;
const PREFIXED_VERSION_SUFFIX = /v\d+(?:\.\w+)?$/;
const VERSION_SUFFIX = /[-_]?\d+(?:\.\w+)?$/;

/**
 * Split a raw reference into repository, tag and digest.
 * The digest follows the last `@`; the tag follows the last `:` after the last `/`.
 */
export function splitReference(raw: string): ReferenceParts {
  let rest = raw.trim();
  const parts: ReferenceParts = { repository: rest };

  const at = rest.lastIndexOf('@');
  if (at >= 0) {
    parts.digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  const colon = rest.lastIndexOf(':');
  if (colon > rest.lastIndexOf('/')) {
    parts.tag = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
  }

  parts.repository = rest;
  return parts;
}

/** A path segment names a registry when it looks like a host. */
export function isRegistrySegment(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

/**
 * Drop trailing version markers: `redis7`, `solr-9`, `mongodb_8.x`, `airflowv3`.
 */
export function stripVersionSuffix(name: string): string {
  return name.replace(PREFIXED_VERSION_SUFFIX, '').replace(VERSION_SUFFIX, '');
}

export function stripFipsSuffix(name: string): string {
  return name.replace(FIPS_SUFFIX, '');
}

/** Whether the raw string carries any FIPS marker. */
export function hasFipsIndicator(raw: string): boolean {
  return FIPS_INDICATOR.test(raw);
}

/** Whether the repository part of the reference already ends in `-fips`. */
export function isFipsVariant(raw: string): boolean {
  return splitReference(raw).repository.endsWith('-fips');
}

/**
 * Append `suffix` to the repository while keeping the tag and digest,
 * e.g. `host:5000/app:1.2` becomes `host:5000/app-fips:1.2`.
 */
export function withRepositorySuffix(raw: string, suffix: string): string {
  const { repository, tag, digest } = splitReference(raw);
  return `${repository}${suffix}${formatVersion(tag, digest)}`;
}

/**
 * Rewrite the public catalog prefix to the private one.
 */
export function toCatalogRegistry(raw: string, privatePrefix = CATALOG_PRIVATE_PREFIX): string {
  const publicPrefix = `${CATALOG_PUBLIC_PREFIX}/`;
  if (raw.startsWith(publicPrefix)) {
    return `${privatePrefix}/${raw.slice(publicPrefix.length)}`;
  }
  return raw;
}

function formatVersion(tag: string | undefined, digest: string | undefined): string {
  return `${tag !== undefined ? `:${tag}` : ''}${digest !== undefined ? `@${digest}` : ''}`;
}

export class ImageReference {
  private constructor(
    readonly registry: string,
    readonly organization: string | undefined,
    readonly name: string,
    readonly tag: string | undefined,
    readonly digest: string | undefined,
  ) {}

  /**
   * Parse any string into a reference. Never throws.
   *
   * - `nginx` resolves to `docker.io/library/nginx`
   * - `bitnami/redis` resolves to `docker.io/bitnami/redis`
   * - `localhost:5000/app` has a registry and no organization
   * - `gcr.io/proj/team/app` has organization `proj` and name `team/app`
   */
  static parse(raw: string): ImageReference {
    const { repository, tag, digest } = splitReference(raw);
    const segments = repository.split('/');
    const [first = '', second = ''] = segments;

    let registry: string;
    let organization: string | undefined;
    let name: string;

    if (segments.length === 1) {
      registry = DOCKER_HUB;
      organization = DEFAULT_ORGANIZATION;
      name = first;
    } else if (segments.length === 2) {
      if (isRegistrySegment(first)) {
        registry = first;
        organization = undefined;
      } else {
        registry = DOCKER_HUB;
        organization = first;
      }
      name = second;
    } else if (isRegistrySegment(first)) {
      registry = first;
      organization = second;
      name = segments.slice(2).join('/');
    } else {
      registry = DOCKER_HUB;
      organization = first;
      name = segments.slice(1).join('/');
    }

    return new ImageReference(registry, organization, name.toLowerCase(), tag, digest);
  }

  /** `registry/organization/name` without tag or digest. */
  get repository(): string {
    const path = this.organization !== undefined ? `${this.organization}/${this.name}` : this.name;
    return `${this.registry}/${path}`;
  }

  get fullName(): string {
    return `${this.repository}${formatVersion(this.tag, this.digest)}`;
  }

  get nameWithOrg(): string {
    return this.organization ? `${this.organization}/${this.name}` : this.name;
  }

  /** Final path component of the name, optionally without FIPS and version markers. */
  baseName(options: BaseNameOptions = {}): string {
    let name = this.name.slice(this.name.lastIndexOf('/') + 1);

    if (options.stripFips) {
      name = stripFipsSuffix(name);
    }
    if (options.stripVersion) {
      name = stripVersionSuffix(name);
    }

    return name;
  }

  isCatalogImage(): boolean {
    return this.registry === CATALOG_REGISTRY_HOST;
  }

  withTag(tag: string): ImageReference {
    return new ImageReference(this.registry, this.organization, this.name, tag, undefined);
  }

  withoutVersion(): ImageReference {
    return new ImageReference(this.registry, this.organization, this.name, undefined, undefined);
  }

  equals(other: ImageReference): boolean {
    return this.fullName === other.fullName;
  }

  toString(): string {
    return this.fullName;
  }
}
