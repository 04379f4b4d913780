/**
 * Decides whether a source image's registry can be pulled from directly.
 * When it cannot, the orchestrator looks for a public upstream instead.
 */

import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { ImageReference } from '@/image/reference';
import {
  DEFAULT_CREDENTIAL_REGISTRIES,
  DEFAULT_PUBLIC_REGISTRIES,
  DOCKER_HUB,
} from '@/config/constants';
import type { ExistenceOracle, RegistryAccessCapability } from './types';

const RegistryListSchema = z.object({
  registries: z.array(z.unknown()).default([]),
});

function normalizeRegistry(registry: string): string {
  return registry.trim().toLowerCase();
}

/**
 * Read registry names from a `.txt` file (one per line, `#` comments) or a
 * `.yaml`/`.yml` file with a `registries:` list.
 */
export function readKnownRegistries(filePath: string): Result<string[]> {
  try {
    const content = fs.readFileSync(filePath, 'utf8');
    const extension = path.extname(filePath).toLowerCase();

    if (extension === '.yaml' || extension === '.yml') {
      const parsed = RegistryListSchema.safeParse(yaml.load(content) ?? {});
      if (!parsed.success) {
        return Failure(`Expected a 'registries' list in ${filePath}`);
      }
      return Success(
        parsed.data.registries
          .filter((entry): entry is string => typeof entry === 'string')
          .map(normalizeRegistry)
          .filter(Boolean),
      );
    }

    return Success(
      content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line && !line.startsWith('#'))
        .map(normalizeRegistry),
    );
  } catch (error) {
    return Failure(extractErrorMessage(error));
  }
}

export interface RegistryAccessOptions {
  logger: Logger;
  /** Used to check registries that need credentials. */
  oracle?: ExistenceOracle;
  additionalRegistries?: readonly string[];
  configFile?: string;
  credentialRegistries?: readonly string[];
}

export class RegistryAccessChecker implements RegistryAccessCapability {
  private readonly logger: Logger;
  private readonly oracle: ExistenceOracle | undefined;
  private readonly known = new Set<string>();
  private readonly credentialRegistries: ReadonlySet<string>;
  private readonly answers = new Map<string, Promise<boolean>>();

  constructor(options: RegistryAccessOptions) {
    this.logger = options.logger.child({ module: 'registry-access' });
    this.oracle = options.oracle;
    this.credentialRegistries = new Set(
      (options.credentialRegistries ?? DEFAULT_CREDENTIAL_REGISTRIES).map(normalizeRegistry),
    );

    for (const registry of [...DEFAULT_PUBLIC_REGISTRIES, ...(options.additionalRegistries ?? [])]) {
      const normalized = normalizeRegistry(registry);
      if (normalized) this.known.add(normalized);
    }

    if (options.configFile && fs.existsSync(options.configFile)) {
      const loaded = readKnownRegistries(options.configFile);
      if (loaded.ok) {
        loaded.value.forEach((registry) => this.known.add(registry));
        this.logger.debug({ file: options.configFile, count: loaded.value.length }, 'Loaded known registries');
      } else {
        this.logger.warn({ file: options.configFile, error: loaded.error }, 'Failed to load known registries');
      }
    }
  }

  isKnown(registry: string): boolean {
    return this.known.has(normalizeRegistry(registry));
  }

  async isAccessible(reference: string): Promise<boolean> {
    const registry = normalizeRegistry(ImageReference.parse(reference).registry);

    let answer = this.answers.get(registry);
    if (!answer) {
      answer = this.check(registry, reference);
      this.answers.set(registry, answer);
    }
    return answer;
  }

  private async check(registry: string, reference: string): Promise<boolean> {
    if (registry === DOCKER_HUB || this.isKnown(registry)) {
      return true;
    }

    if (this.credentialRegistries.has(registry)) {
      const accessible = this.oracle ? await this.oracle.exists(reference) : false;
      if (accessible) {
        this.logger.info({ registry }, 'Registry accessible with configured credentials');
      } else {
        this.logger.warn(
          { registry },
          'Registry not accessible; configure credentials to use its images directly',
        );
      }
      return accessible;
    }

    this.logger.debug({ registry }, 'Unknown registry, upstream discovery needed');
    return false;
  }
}
