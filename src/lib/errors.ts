/**
 * Error handling utilities and message templates
 */

import type { ErrorGuidance } from '@/types';

// ============================================================================
// Error Message Templates
// ============================================================================

export const ERROR_MESSAGES = {
  CONFIG_INVALID: (issues: string) => `Invalid configuration: ${issues}`,
  OPTIONS_INVALID: (issues: string) => `Invalid match options: ${issues}`,
  MAPPING_LOAD_FAILED: (path: string, error: string) =>
    `Failed to load mapping file ${path}: ${error}`,
  REGISTRY_REQUEST_FAILED: (url: string, status: number) =>
    `Registry request to ${url} failed with status ${status}`,
  REGISTRY_AUTH_FAILED: (realm: string, error: string) =>
    `Token request to ${realm} failed: ${error}`,
  TIMEOUT: (operation: string, timeoutMs: number) =>
    `${operation} timed out after ${timeoutMs}ms`,
  OPERATION_FAILED: (operation: string, error: string) => `${operation} failed: ${error}`,
} as const;

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Safely extracts error message from unknown error types.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Raised for invalid configuration or options, before any matching begins.
 */
export class ConfigurationError extends Error {
  readonly guidance: ErrorGuidance;

  constructor(message: string, guidance?: ErrorGuidance) {
    super(message);
    this.name = 'ConfigurationError';
    this.guidance = guidance ?? { message };
  }
}

/**
 * A registry could not give a definitive answer: network failure, time-out,
 * rate limiting or a server error.
 */
export class RegistryUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryUnavailableError';
  }
}
