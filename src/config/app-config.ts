/**
 * Application Configuration
 *
 * Single source of truth for resolver configuration with Zod validation.
 * Values come from environment variables with documented defaults.
 */

import { z } from 'zod';
import { ConfigurationError, ERROR_MESSAGES } from '@/lib/errors';
import {
  CACHE_SIZE,
  CACHE_TTL,
  CATALOG_PRIVATE_PREFIX,
  CATALOG_REGISTRY_HOST,
  TIMEOUTS,
} from './constants';

const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const CredentialSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export type RegistryCredential = z.infer<typeof CredentialSchema>;

export const AppConfigSchema = z.object({
  logging: z
    .object({
      level: LogLevelSchema,
    })
    .default({}),
  catalog: z
    .object({
      /** Private catalog prefix every catalog result is rewritten to. */
      registry: z.string().min(1).default(CATALOG_PRIVATE_PREFIX),
    })
    .default({}),
  mappings: z
    .object({
      manualFile: z.string().min(1).default('config/image-mappings.yaml'),
      upstreamFile: z.string().min(1).default('config/upstream-mappings.yaml'),
      catalogFile: z.string().min(1).default('config/catalog-mappings.yaml'),
    })
    .default({}),
  registries: z
    .object({
      knownRegistriesFile: z.string().min(1).default('config/known-registries.txt'),
      additional: z.array(z.string().min(1)).default([]),
      requestTimeoutMs: z.coerce.number().int().positive().default(TIMEOUTS.REGISTRY_REQUEST_MS),
      credentials: z.record(z.string(), CredentialSchema).default({}),
    })
    .default({}),
  cache: z
    .object({
      tagTtlMs: z.coerce.number().int().positive().default(CACHE_TTL.TAGS_MS),
      freshnessTtlMs: z.coerce.number().int().positive().default(CACHE_TTL.FRESHNESS_MS),
      existsTtlMs: z.coerce.number().int().positive().default(CACHE_TTL.EXISTS_MS),
      existsMaxSize: z.coerce.number().int().positive().default(CACHE_SIZE.EXISTS),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

type Env = Record<string, string | undefined>;

function listFromEnv(value: string | undefined): string[] | undefined {
  return value
    ?.split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function credentialsFromEnv(env: Env): Record<string, RegistryCredential> {
  const username = env.CATALOG_REGISTRY_USERNAME;
  const password = env.CATALOG_REGISTRY_PASSWORD;
  if (!username || !password) {
    return {};
  }
  return { [CATALOG_REGISTRY_HOST]: { username, password } };
}

/**
 * Create configuration from environment variables and validate it.
 * Throws `ConfigurationError` on invalid values.
 */
export function createAppConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    logging: {
      level: env.LOG_LEVEL,
    },
    catalog: {
      registry: env.CATALOG_REGISTRY,
    },
    mappings: {
      manualFile: env.IMAGE_MAPPINGS_FILE,
      upstreamFile: env.UPSTREAM_MAPPINGS_FILE,
      catalogFile: env.CATALOG_MAPPINGS_FILE,
    },
    registries: {
      knownRegistriesFile: env.KNOWN_REGISTRIES_FILE,
      additional: listFromEnv(env.KNOWN_REGISTRIES),
      requestTimeoutMs: env.REGISTRY_TIMEOUT_MS,
      credentials: credentialsFromEnv(env),
    },
    cache: {},
  };

  return parseAppConfig(rawConfig);
}

/**
 * Validate a raw configuration object, filling defaults. Sections may be omitted.
 */
export function parseAppConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(ERROR_MESSAGES.CONFIG_INVALID(issues), {
      message: ERROR_MESSAGES.CONFIG_INVALID(issues),
      hint: 'Check the resolver environment variables',
      details: { issues: result.error.issues },
    });
  }

  return result.data;
}
