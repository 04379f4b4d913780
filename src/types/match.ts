/**
 * Result types produced by the resolution pipeline.
 */

export type MatchMethod = 'manual' | 'catalog' | 'heuristic' | 'fuzzy' | 'interactive' | 'none';

export type UpstreamMethod = 'manual' | 'strip-registry' | 'common-registry' | 'base-extract' | 'none';

/** Outcome of upstream discovery for a (usually private) source image. */
export interface UpstreamResult {
  readonly image: string | null;
  readonly confidence: number;
  readonly method: UpstreamMethod;
}

export interface MatchResult {
  /** Fully qualified catalog reference, or null when nothing matched. */
  readonly targetImage: string | null;
  /** 0.0 - 1.0 */
  readonly confidence: number;
  readonly method: MatchMethod;
  readonly alternatives?: readonly string[];
  readonly upstream?: UpstreamResult;
  readonly rationale?: string;
}

/**
 * `resolvedTag` is the catalog's own spelling of the tag, e.g. `v1.27.5`.
 * `sourceVersion` and `matchedVersion` are the parsed versions in normalized
 * `major.minor.patch` form (`SemVer.toString()`), so `v1.27-alpine` reads `1.27.0`.
 */
export interface VersionMatchResult {
  readonly resolvedTag: string;
  readonly sourceVersion?: string;
  readonly matchedVersion?: string;
  /** True when the tag came from a different major.minor or a freshness fallback. */
  readonly isEolFallback: boolean;
}

export const NO_UPSTREAM: UpstreamResult = Object.freeze({
  image: null,
  confidence: 0,
  method: 'none',
});
