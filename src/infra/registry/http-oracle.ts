/**
 * Registry HTTP API v2 client implementing `ExistenceOracle`.
 *
 * Anonymous pulls negotiate a bearer token from the `WWW-Authenticate`
 * challenge; per-registry credentials are sent to the token service (or as
 * basic auth when the registry asks for it). Every request has its own
 * timeout. Refusals and missing images resolve to the neutral answer;
 * transport errors, time-outs, 429 and 5xx throw `RegistryUnavailableError`.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import { createCache, type Cache } from '@/lib/cache';
import { ERROR_MESSAGES, RegistryUnavailableError, extractErrorMessage } from '@/lib/errors';
import { isRegistrySegment, splitReference } from '@/image/reference';
import {
  CACHE_SIZE,
  CACHE_TTL,
  DEFAULT_ORGANIZATION,
  DOCKER_HUB_API_HOST,
  MAX_TAG_PAGES,
  TIMEOUTS,
} from '@/config/constants';
import type { RegistryCredential } from '@/config/app-config';
import type { ExistenceOracle } from './types';

const MANIFEST_ACCEPT = [
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.oci.image.manifest.v1+json',
  'application/vnd.docker.distribution.manifest.v2+json',
].join(', ');

const DOCKER_HUB_ALIASES = new Set(['docker.io', 'index.docker.io', 'registry-1.docker.io']);

const TokenResponseSchema = z.object({
  token: z.string().optional(),
  access_token: z.string().optional(),
});

const TagListSchema = z.object({
  tags: z.array(z.string()).nullish(),
});

const ManifestSchema = z.object({
  mediaType: z.string().optional(),
  config: z.object({ digest: z.string() }).optional(),
  manifests: z
    .array(
      z.object({
        digest: z.string(),
        platform: z
          .object({
            os: z.string().optional(),
            architecture: z.string().optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

const ImageConfigSchema = z.object({
  config: z
    .object({
      Labels: z.record(z.string(), z.string()).nullish(),
    })
    .nullish(),
});

type Manifest = z.infer<typeof ManifestSchema>;

/** Statuses a registry may answer differently on retry. */
function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** Where a reference lives on the wire. */
export interface RegistryLocation {
  /** Host used for API calls, e.g. `registry-1.docker.io`. */
  host: string;
  /** Repository path, e.g. `library/nginx`. */
  path: string;
  /** Tag or digest, `latest` when neither is given. */
  reference: string;
}

/**
 * Map an image reference to its API host and repository path.
 * Docker Hub names go to `registry-1.docker.io` with `library/` for official images.
 */
export function resolveLocation(raw: string): RegistryLocation {
  const { repository, tag, digest } = splitReference(raw);
  const segments = repository.split('/');
  const [first = ''] = segments;

  let host = 'docker.io';
  let path = repository;
  if (segments.length > 1 && isRegistrySegment(first)) {
    host = first;
    path = segments.slice(1).join('/');
  }

  if (DOCKER_HUB_ALIASES.has(host)) {
    host = DOCKER_HUB_API_HOST;
    if (!path.includes('/')) {
      path = `${DEFAULT_ORGANIZATION}/${path}`;
    }
  }

  return { host, path: path.toLowerCase(), reference: digest || tag || 'latest' };
}

interface BearerChallenge {
  scheme: string;
  realm?: string;
  service?: string;
  scope?: string;
}

/**
 * Parse a `WWW-Authenticate` header such as
 * `Bearer realm="https://auth.example.com/token",service="registry",scope="repository:x:pull"`.
 */
export function parseAuthChallenge(header: string): BearerChallenge {
  const trimmed = header.trim();
  const space = trimmed.indexOf(' ');
  const scheme = (space < 0 ? trimmed : trimmed.slice(0, space)).toLowerCase();
  const challenge: BearerChallenge = { scheme };

  const params = space < 0 ? '' : trimmed.slice(space + 1);
  for (const match of params.matchAll(/(\w+)="([^"]*)"/g)) {
    const [, key, value] = match;
    if (value === undefined) continue;
    if (key === 'realm') challenge.realm = value;
    if (key === 'service') challenge.service = value;
    if (key === 'scope') challenge.scope = value;
  }

  return challenge;
}

/** Extract the `rel="next"` target of a `Link` header. */
export function parseNextLink(header: string | null): string | undefined {
  if (!header) return undefined;
  const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(header);
  return match?.[1];
}

export interface RegistryOracleOptions {
  logger: Logger;
  timeoutMs?: number;
  /** Credentials keyed by registry host as written in references, e.g. `cgr.dev`. */
  credentials?: Record<string, RegistryCredential>;
  fetch?: typeof fetch;
  tokenCache?: Cache<string>;
}

interface RequestOptions {
  method?: 'GET' | 'HEAD';
  accept?: string;
}

export function createRegistryOracle(options: RegistryOracleOptions): ExistenceOracle {
  const logger = options.logger.child({ module: 'registry-oracle' });
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.REGISTRY_REQUEST_MS;
  const credentials = options.credentials ?? {};
  const fetchFn = options.fetch ?? fetch;
  const tokens =
    options.tokenCache ??
    createCache<string>('registry-tokens', { ttlMs: CACHE_TTL.TOKEN_MS, maxSize: CACHE_SIZE.TOKENS }, logger);

  function credentialFor(host: string): RegistryCredential | undefined {
    if (credentials[host]) return credentials[host];
    if (host === DOCKER_HUB_API_HOST) return credentials['docker.io'];
    return undefined;
  }

  function basicAuth(credential: RegistryCredential): string {
    return `Basic ${Buffer.from(`${credential.username}:${credential.password}`).toString('base64')}`;
  }

  async function timedFetch(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetchFn(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async function fetchToken(challenge: BearerChallenge, host: string): Promise<Result<string>> {
    if (!challenge.realm) {
      return Failure('Bearer challenge without realm');
    }

    const cacheKey = `${challenge.realm} ${challenge.service ?? ''} ${challenge.scope ?? ''}`;
    const cached = tokens.get(cacheKey);
    if (cached) {
      return Success(cached);
    }

    const headers: Record<string, string> = {};
    const credential = credentialFor(host);
    if (credential) {
      headers.Authorization = basicAuth(credential);
    }

    let url: URL;
    try {
      url = new URL(challenge.realm);
    } catch (error) {
      return Failure(ERROR_MESSAGES.REGISTRY_AUTH_FAILED(challenge.realm, extractErrorMessage(error)));
    }
    if (challenge.service) url.searchParams.set('service', challenge.service);
    if (challenge.scope) url.searchParams.set('scope', challenge.scope);

    let response: Response;
    try {
      response = await timedFetch(url.toString(), { headers });
    } catch (error) {
      throw new RegistryUnavailableError(
        ERROR_MESSAGES.REGISTRY_AUTH_FAILED(challenge.realm, extractErrorMessage(error)),
      );
    }
    if (isTransientStatus(response.status)) {
      throw new RegistryUnavailableError(ERROR_MESSAGES.REGISTRY_REQUEST_FAILED(url.origin, response.status));
    }
    if (!response.ok) {
      return Failure(ERROR_MESSAGES.REGISTRY_REQUEST_FAILED(url.origin, response.status));
    }

    const body = await readJson(response, TokenResponseSchema);
    const token = body.ok ? (body.value.token ?? body.value.access_token) : undefined;
    if (!token) {
      return Failure('Token response carried no token');
    }
    tokens.set(cacheKey, token);
    return Success(token);
  }

  /**
   * Issue a request against `https://<host>/v2/<path>/<suffix>`, answering
   * one auth challenge when the registry sends it. Definitive refusals come
   * back as failures; anything the registry may answer differently later
   * throws `RegistryUnavailableError`.
   */
  async function request(
    location: RegistryLocation,
    url: string,
    { method = 'GET', accept }: RequestOptions = {},
  ): Promise<Result<Response>> {
    const headers: Record<string, string> = {};
    if (accept) headers.Accept = accept;

    const pullScope = `repository:${location.path}:pull`;
    const known = tokens.get(`scope ${location.host} ${pullScope}`);
    if (known) headers.Authorization = `Bearer ${known}`;

    let response: Response;
    try {
      response = await timedFetch(url, { method, headers });

      if (response.status === 401) {
        const challenge = parseAuthChallenge(response.headers.get('www-authenticate') ?? '');
        const credential = credentialFor(location.host);

        if (challenge.scheme === 'bearer') {
          const token = await fetchToken({ ...challenge, scope: challenge.scope ?? pullScope }, location.host);
          if (!token.ok) {
            return Failure(token.error);
          }
          tokens.set(`scope ${location.host} ${pullScope}`, token.value);
          headers.Authorization = `Bearer ${token.value}`;
        } else if (challenge.scheme === 'basic' && credential) {
          headers.Authorization = basicAuth(credential);
        } else {
          return Failure(ERROR_MESSAGES.REGISTRY_REQUEST_FAILED(url, response.status));
        }

        response = await timedFetch(url, { method, headers });
      }
    } catch (error) {
      if (error instanceof RegistryUnavailableError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RegistryUnavailableError(ERROR_MESSAGES.TIMEOUT(`${method} ${url}`, timeoutMs));
      }
      throw new RegistryUnavailableError(
        ERROR_MESSAGES.OPERATION_FAILED(`${method} ${url}`, extractErrorMessage(error)),
      );
    }

    if (isTransientStatus(response.status)) {
      throw new RegistryUnavailableError(ERROR_MESSAGES.REGISTRY_REQUEST_FAILED(url, response.status));
    }
    if (!response.ok) {
      return Failure(ERROR_MESSAGES.REGISTRY_REQUEST_FAILED(url, response.status));
    }
    return Success(response);
  }

  function apiUrl(location: RegistryLocation, suffix: string): string {
    return `https://${location.host}/v2/${location.path}/${suffix}`;
  }

  async function readJson<T>(response: Response, schema: z.ZodType<T>): Promise<Result<T>> {
    try {
      const parsed = schema.safeParse(await response.json());
      return parsed.success ? Success(parsed.data) : Failure(parsed.error.message);
    } catch (error) {
      return Failure(extractErrorMessage(error));
    }
  }

  async function getManifest(location: RegistryLocation, reference: string): Promise<Result<Manifest>> {
    const response = await request(location, apiUrl(location, `manifests/${reference}`), {
      accept: MANIFEST_ACCEPT,
    });
    if (!response.ok) return Failure(response.error);
    return readJson(response.value, ManifestSchema);
  }

  return {
    async exists(reference: string): Promise<boolean> {
      const location = resolveLocation(reference);
      const response = await request(location, apiUrl(location, `manifests/${location.reference}`), {
        method: 'HEAD',
        accept: MANIFEST_ACCEPT,
      });
      if (!response.ok) {
        logger.debug({ reference, error: response.error }, 'Image not found');
        return false;
      }
      return true;
    },

    async listTags(repository: string): Promise<string[]> {
      const location = resolveLocation(repository);
      const tags: string[] = [];
      let url: string | undefined = apiUrl(location, 'tags/list?n=1000');

      for (let page = 0; url && page < MAX_TAG_PAGES; page++) {
        const response = await request(location, url);
        if (!response.ok) {
          logger.debug({ repository, error: response.error }, 'Tag listing failed');
          return tags;
        }

        const body = await readJson(response.value, TagListSchema);
        if (!body.ok) {
          logger.debug({ repository, error: body.error }, 'Unexpected tag list payload');
          return tags;
        }
        tags.push(...(body.value.tags ?? []));

        const next = parseNextLink(response.value.headers.get('link'));
        url = next ? new URL(next, `https://${location.host}`).toString() : undefined;
      }

      return tags;
    },

    async getBuildLabel(reference: string, label: string): Promise<string | undefined> {
      const location = resolveLocation(reference);

      let manifest = await getManifest(location, location.reference);
      if (!manifest.ok) {
        logger.debug({ reference, error: manifest.error }, 'Manifest unavailable');
        return undefined;
      }

      if (manifest.value.manifests) {
        const entries = manifest.value.manifests;
        const selected =
          entries.find((m) => m.platform?.os === 'linux' && m.platform.architecture === 'amd64') ??
          entries[0];
        if (!selected) return undefined;
        manifest = await getManifest(location, selected.digest);
        if (!manifest.ok) return undefined;
      }

      const configDigest = manifest.value.config?.digest;
      if (!configDigest) return undefined;

      const blob = await request(location, apiUrl(location, `blobs/${configDigest}`));
      if (!blob.ok) {
        logger.debug({ reference, error: blob.error }, 'Config blob unavailable');
        return undefined;
      }

      const config = await readJson(blob.value, ImageConfigSchema);
      if (!config.ok) return undefined;
      return config.value.config?.Labels?.[label] ?? undefined;
    },
  };
}
