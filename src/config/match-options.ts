/**
 * Per-call options for `ImageMatcher.match`.
 */

import { z } from 'zod';
import { ConfigurationError, ERROR_MESSAGES } from '@/lib/errors';
import { DEFAULT_FRESHNESS_THRESHOLD_DAYS, DEFAULT_MIN_CONFIDENCE } from './constants';

export const MatchOptionsSchema = z.object({
  /** Floor applied to upstream discovery results. */
  minConfidence: z.number().min(0).max(1).default(DEFAULT_MIN_CONFIDENCE),
  preferFips: z.boolean().default(false),
  resolveVersions: z.boolean().default(true),
  freshnessThresholdDays: z.number().int().min(0).default(DEFAULT_FRESHNESS_THRESHOLD_DAYS),
  /** Overrides the fuzzy capability's own acceptance threshold. */
  fuzzyConfidence: z.number().min(0).max(1).optional(),
});

export type MatchOptionsInput = z.input<typeof MatchOptionsSchema>;
export type MatchOptions = z.output<typeof MatchOptionsSchema>;

export function parseMatchOptions(input: MatchOptionsInput = {}): MatchOptions {
  const result = MatchOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(ERROR_MESSAGES.OPTIONS_INVALID(issues));
  }
  return result.data;
}
