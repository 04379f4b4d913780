/**
 * Candidate generation for the heuristic tier.
 *
 * Each strategy maps a source image to catalog image names (no registry
 * prefix). Strategies run in a fixed order and their output is concatenated.
 */

import { isRegistrySegment, stripFipsSuffix, stripVersionSuffix } from '@/image/reference';
import {
  BASE_OS_IMAGES,
  BUILD_VARIANT_SUFFIXES,
  CATALOG_BASE_IMAGE,
  KNOWN_ALIASES,
  NAMESPACE_SEGMENTS,
  OS_ALIASES,
  OS_PREFIXES,
  OS_VERSION_PATTERNS,
  VENDOR_BUNDLE_MARKER,
} from './rules';

export type CandidateStrategyName =
  | 'base-os'
  | 'vendor-bundle'
  | 'path-flattening'
  | 'direct-match'
  | 'known-alias';

export interface CandidateInput {
  /** Base name with FIPS and version markers removed. */
  baseName: string;
  /** The raw source reference. */
  fullReference: string;
  hasFips: boolean;
}

export interface CandidateStrategy {
  readonly name: CandidateStrategyName;
  generate(input: CandidateInput): string[];
}

/** `name-fips` first when the source is FIPS, then `name`. */
function withFipsVariant(name: string, hasFips: boolean): string[] {
  return hasFips ? [`${name}-fips`, name] : [name];
}

function isVendorBundle(fullReference: string): boolean {
  return fullReference.toLowerCase().includes(VENDOR_BUNDLE_MARKER);
}

/**
 * Normalize an OS image name: `ubi9-minimal` → `ubi-minimal`,
 * `debian-12` → `debian`, `al2023` → `amazonlinux`.
 */
export function normalizeOsName(baseName: string): string {
  let name = stripVersionSuffix(baseName.toLowerCase());

  if (name.endsWith('-base') && name !== 'base') {
    name = name.replaceAll('-base', '');
  }
  name = stripFipsSuffix(name);

  for (const [pattern, replacement] of OS_VERSION_PATTERNS) {
    name = name.replace(pattern, replacement);
  }

  if (Object.hasOwn(OS_ALIASES, name)) {
    name = OS_ALIASES[name] ?? name;
  }

  const prefix = OS_PREFIXES.find((p) => name.startsWith(p));
  return prefix ?? name;
}

export const baseOsStrategy: CandidateStrategy = {
  name: 'base-os',
  generate({ baseName, hasFips }) {
    const normalized = normalizeOsName(baseName);
    if (!normalized || !BASE_OS_IMAGES.has(normalized)) {
      return [];
    }
    return withFipsVariant(CATALOG_BASE_IMAGE, hasFips);
  },
};

export const vendorBundleStrategy: CandidateStrategy = {
  name: 'vendor-bundle',
  generate({ baseName, fullReference, hasFips }) {
    if (!isVendorBundle(fullReference)) {
      return [];
    }

    const candidates = hasFips
      ? [
          `${baseName}-iamguarded-fips`,
          `${baseName}-fips`,
          `${baseName}-bitnami-fips`,
          `${baseName}-iamguarded`,
        ]
      : [`${baseName}-iamguarded`];

    candidates.push(baseName);
    return candidates;
  },
};

export const pathFlatteningStrategy: CandidateStrategy = {
  name: 'path-flattening',
  generate({ baseName, fullReference, hasFips }) {
    if (!fullReference.includes('/')) {
      return [];
    }

    const parts = fullReference.split('/');
    const lastPart = parts[parts.length - 1] ?? '';
    const last = stripFipsSuffix(lastPart.split('@')[0]?.split(':')[0]?.toLowerCase() ?? '');
    const candidates: string[] = [];

    if (last !== baseName) {
      candidates.push(...withFipsVariant(last, hasFips));
    }

    // calico/node → calico-node, ghcr.io/kyverno/background-controller → kyverno-background-controller
    const secondLast = parts[parts.length - 2]?.toLowerCase();
    if (
      secondLast !== undefined &&
      !NAMESPACE_SEGMENTS.has(secondLast) &&
      !isRegistrySegment(secondLast)
    ) {
      candidates.push(...withFipsVariant(`${secondLast}-${last}`, hasFips));
    }

    return candidates;
  },
};

export const directMatchStrategy: CandidateStrategy = {
  name: 'direct-match',
  generate({ baseName, fullReference, hasFips }) {
    if (isVendorBundle(fullReference)) {
      return [];
    }

    const candidates = withFipsVariant(baseName, hasFips);

    const suffix = BUILD_VARIANT_SUFFIXES.find((s) => baseName.endsWith(s));
    if (suffix) {
      candidates.push(...withFipsVariant(baseName.slice(0, -suffix.length), hasFips));
    }

    return candidates;
  },
};

export const knownAliasStrategy: CandidateStrategy = {
  name: 'known-alias',
  generate({ baseName, hasFips }) {
    const alias = Object.hasOwn(KNOWN_ALIASES, baseName) ? KNOWN_ALIASES[baseName] : undefined;
    return alias ? withFipsVariant(alias, hasFips) : [];
  },
};

export const CANDIDATE_STRATEGIES: readonly CandidateStrategy[] = [
  baseOsStrategy,
  vendorBundleStrategy,
  pathFlatteningStrategy,
  directMatchStrategy,
  knownAliasStrategy,
];

/**
 * Run every strategy in order and drop repeated names, keeping the first.
 */
export function generateCandidates(
  input: CandidateInput,
  strategies: readonly CandidateStrategy[] = CANDIDATE_STRATEGIES,
): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];

  for (const strategy of strategies) {
    for (const candidate of strategy.generate(input)) {
      if (candidate && !seen.has(candidate)) {
        seen.add(candidate);
        ordered.push(candidate);
      }
    }
  }

  return ordered;
}
