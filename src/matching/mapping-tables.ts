/**
 * Override tables read from YAML: the exact-string manual table, the
 * upstream table, and the glob-keyed catalog table.
 */

import fs from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { ImageReference, isRegistrySegment, splitReference } from '@/image/reference';
import { CATALOG_PUBLIC_PREFIX, DEFAULT_ORGANIZATION } from '@/config/constants';
import { TOOL_SUFFIXES } from './rules';

const FlatMappingSchema = z.record(z.string(), z.string());
const NestedMappingSchema = z.object({ images: FlatMappingSchema });

export type MappingEntries = Readonly<Record<string, string>>;

/**
 * Validate a parsed YAML document as a mapping table. Accepts a flat
 * `source: target` map or the same map nested under `images:`.
 */
export function parseMappingDocument(document: unknown): Result<MappingEntries> {
  if (document === null || document === undefined) {
    return Success({});
  }

  const nested = NestedMappingSchema.safeParse(document);
  if (nested.success) {
    return Success(nested.data.images);
  }

  const flat = FlatMappingSchema.safeParse(document);
  if (!flat.success) {
    return Failure('Expected a map of image names to image names', {
      message: 'Expected a map of image names to image names',
      details: { issues: flat.error.issues },
    });
  }

  return Success(flat.data);
}

/**
 * Read a mapping file. A missing or malformed file yields an empty table.
 */
export function loadMappingFile(filePath: string, description: string, logger: Logger): MappingEntries {
  if (!fs.existsSync(filePath)) {
    logger.debug({ filePath }, `No ${description} file found`);
    return {};
  }

  let document: unknown;
  try {
    document = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    logger.warn(
      { filePath, error: ERROR_MESSAGES.MAPPING_LOAD_FAILED(filePath, extractErrorMessage(error)) },
      `Ignoring unreadable ${description}`,
    );
    return {};
  }

  const result = parseMappingDocument(document);
  if (!result.ok) {
    logger.warn({ filePath, error: result.error }, `Ignoring malformed ${description}`);
    return {};
  }

  logger.debug({ filePath, entries: Object.keys(result.value).length }, `Loaded ${description}`);
  return result.value;
}

export interface CatalogMappingTable {
  /** Catalog reference for the source image, or undefined when no key applies. */
  matchImage(reference: string): string | undefined;
}

interface CompiledPattern {
  key: string;
  pattern: RegExp;
  literalLength: number;
  target: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

/** `python*` → /^python(.*)$/i, one group per wildcard. */
export function globToRegExp(glob: string): RegExp {
  return new RegExp(`^${glob.split('*').map(escapeRegExp).join('(.*)')}$`, 'i');
}

const TOOL_REMAINDER = new RegExp(`^[-_](${TOOL_SUFFIXES.join('|')})([-_].*)?$`, 'i');

/**
 * Whether `pattern` matches `subject` with no wildcard standing for a tool
 * suffix: `postgres*` takes `postgres` but not `postgres-exporter` or `redis_exporter`.
 */
function globMatches(pattern: RegExp, subject: string): boolean {
  const match = pattern.exec(subject);
  if (!match) return false;
  return !match.slice(1).some((wildcard) => TOOL_REMAINDER.test(wildcard));
}

function qualifyTarget(target: string, catalogPrefix: string): string {
  const [first = '', ...rest] = target.split('/');
  if (rest.length > 0 && isRegistrySegment(first)) {
    return target;
  }
  return `${catalogPrefix}/${target}`;
}

/**
 * Forms of a reference a catalog key may be written against. The bare name
 * only counts for official images and images without an organization, so
 * `calico/node` is not taken for `node`.
 */
export function matchSubjects(raw: string): string[] {
  const ref = ImageReference.parse(raw);
  const subjects = [
    splitReference(raw).repository.toLowerCase(),
    ref.repository.toLowerCase(),
    ref.nameWithOrg.toLowerCase(),
  ];
  if (ref.organization === undefined || ref.organization === DEFAULT_ORGANIZATION) {
    subjects.push(ref.name);
  }
  return [...new Set(subjects)];
}

/**
 * Build a catalog table from `key: target` entries. Keys may contain `*`.
 * Exact keys win over globs; among globs the one with the longest literal
 * text wins, then the one declared first.
 */
export function createCatalogMappingTable(
  entries: MappingEntries,
  catalogPrefix: string = CATALOG_PUBLIC_PREFIX,
): CatalogMappingTable {
  const exact = new Map<string, string>();
  const globs: CompiledPattern[] = [];

  for (const [key, target] of Object.entries(entries)) {
    const normalizedKey = key.trim().toLowerCase();
    const qualified = qualifyTarget(target.trim(), catalogPrefix);

    if (normalizedKey.includes('*')) {
      globs.push({
        key: normalizedKey,
        pattern: globToRegExp(normalizedKey),
        literalLength: normalizedKey.replaceAll('*', '').length,
        target: qualified,
      });
    } else if (!exact.has(normalizedKey)) {
      exact.set(normalizedKey, qualified);
    }
  }

  return {
    matchImage(reference: string): string | undefined {
      const subjects = matchSubjects(reference);

      for (const subject of subjects) {
        const target = exact.get(subject);
        if (target) return target;
      }

      let best: CompiledPattern | undefined;
      for (const glob of globs) {
        if (best && glob.literalLength <= best.literalLength) continue;
        if (subjects.some((subject) => globMatches(glob.pattern, subject))) {
          best = glob;
        }
      }
      return best?.target;
    },
  };
}
