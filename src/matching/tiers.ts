/**
 * Tier matchers. The orchestrator asks each tier in order and keeps the
 * first non-null answer.
 */

import type { Logger } from 'pino';
import type { MatchResult } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { ImageReference, hasFipsIndicator, toCatalogRegistry } from '@/image/reference';
import { CATALOG_PRIVATE_PREFIX, MATCH_CONFIDENCE } from '@/config/constants';
import type {
  ExistenceOracle,
  FuzzyMatchCapability,
  FuzzySuggestion,
} from '@/infra/registry/types';
import { generateCandidates } from './candidates';
import type { CatalogMappingTable, MappingEntries } from './mapping-tables';

export type TierName = 'manual' | 'catalog' | 'heuristic' | 'fuzzy';

export interface TierMatchOptions {
  /** Per-call fuzzy acceptance threshold. */
  fuzzyConfidence?: number;
}

export interface TierMatcher {
  readonly tier: TierName;
  match(reference: string, options?: TierMatchOptions): Promise<MatchResult | null>;
}

export interface TierContext {
  logger: Logger;
  /** Private catalog prefix results are rewritten to. */
  catalogRegistry?: string;
}

export function createManualTier(mappings: MappingEntries, context: TierContext): TierMatcher {
  const catalogRegistry = context.catalogRegistry ?? CATALOG_PRIVATE_PREFIX;

  return {
    tier: 'manual',
    async match(reference) {
      const key = reference.trim();
      const target = Object.hasOwn(mappings, key) ? mappings[key] : undefined;
      if (!target) return null;

      context.logger.debug({ reference, target }, 'Manual mapping found');
      return {
        targetImage: toCatalogRegistry(target, catalogRegistry),
        confidence: MATCH_CONFIDENCE.MANUAL,
        method: 'manual',
      };
    },
  };
}

export function createCatalogTier(table: CatalogMappingTable, context: TierContext): TierMatcher {
  const catalogRegistry = context.catalogRegistry ?? CATALOG_PRIVATE_PREFIX;

  return {
    tier: 'catalog',
    async match(reference) {
      const target = table.matchImage(reference);
      if (!target) return null;

      context.logger.debug({ reference, target }, 'Catalog mapping found');
      return {
        targetImage: toCatalogRegistry(target, catalogRegistry),
        confidence: MATCH_CONFIDENCE.CATALOG,
        method: 'catalog',
      };
    },
  };
}

/**
 * Candidate names for a source reference, qualified with the catalog prefix.
 */
export function heuristicCandidates(reference: string, catalogRegistry: string): string[] {
  const baseName = ImageReference.parse(reference).baseName({ stripFips: true, stripVersion: true });
  const names = generateCandidates({
    baseName,
    fullReference: reference,
    hasFips: hasFipsIndicator(reference),
  });
  return [...new Set(names.map((name) => `${catalogRegistry}/${name}`))];
}

export function createHeuristicTier(oracle: ExistenceOracle, context: TierContext): TierMatcher {
  const catalogRegistry = context.catalogRegistry ?? CATALOG_PRIVATE_PREFIX;

  return {
    tier: 'heuristic',
    async match(reference) {
      const candidates = heuristicCandidates(reference, catalogRegistry);

      for (const candidate of candidates) {
        if (await oracle.exists(candidate)) {
          context.logger.debug({ reference, candidate }, 'Heuristic match found');
          return {
            targetImage: candidate,
            confidence: MATCH_CONFIDENCE.HEURISTIC,
            method: 'heuristic',
          };
        }
      }

      context.logger.debug({ reference, tried: candidates.length }, 'No heuristic candidate exists');
      return null;
    },
  };
}

export interface FuzzyTierOptions {
  /** Overrides the capability's own threshold. */
  confidenceThreshold?: number;
}

export function createFuzzyTier(
  capability: FuzzyMatchCapability,
  oracle: ExistenceOracle,
  context: TierContext,
  options: FuzzyTierOptions = {},
): TierMatcher {
  const catalogRegistry = context.catalogRegistry ?? CATALOG_PRIVATE_PREFIX;
  return {
    tier: 'fuzzy',
    async match(reference, matchOptions = {}) {
      const threshold =
        matchOptions.fuzzyConfidence ?? options.confidenceThreshold ?? capability.confidenceThreshold;

      let suggestion: FuzzySuggestion;
      try {
        suggestion = await capability.suggest(reference);
      } catch (error) {
        context.logger.warn({ reference, error: extractErrorMessage(error) }, 'Fuzzy matcher failed');
        return null;
      }

      if (!suggestion.image) {
        return null;
      }

      if (suggestion.confidence < threshold) {
        context.logger.debug(
          { reference, suggestion: suggestion.image, confidence: suggestion.confidence, threshold },
          'Fuzzy suggestion below threshold',
        );
        return null;
      }

      const target = toCatalogRegistry(suggestion.image, catalogRegistry);
      if (!(await oracle.exists(target))) {
        context.logger.warn({ reference, suggestion: target }, 'Fuzzy suggestion does not exist');
        return null;
      }

      return {
        targetImage: target,
        confidence: suggestion.confidence,
        method: 'fuzzy',
        ...(suggestion.alternatives ? { alternatives: suggestion.alternatives } : {}),
        ...(suggestion.rationale ? { rationale: suggestion.rationale } : {}),
      };
    },
  };
}
