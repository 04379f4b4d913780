/**
 * Core type definitions shared across the resolver.
 */

// ===== RESULT TYPE SYSTEM =====

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** Actionable hint for the operator */
  hint?: string;
  /** Specific resolution steps to fix the issue */
  resolution?: string;
  /** Additional context or details */
  details?: Record<string, unknown>;
}

/**
 * Result type for functional error handling.
 *
 * Used for fallible internal steps (file loading, registry calls) whose
 * callers degrade to a neutral value instead of propagating an exception.
 *
 * @example
 * ```typescript
 * const result = parseMappingDocument(yaml.load(text));
 * if (result.ok) {
 *   use(result.value);
 * } else {
 *   logger.warn({ error: result.error }, 'Malformed mapping file');
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};

