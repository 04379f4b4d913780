/**
 * Static rule tables for candidate generation.
 */

/** Minimal OS images that all map to the catalog's base image. */
export const BASE_OS_IMAGES: ReadonlySet<string> = new Set([
  'ubi',
  'ubi-minimal',
  'ubi-micro',
  'ubi-init',
  'alpine',
  'debian',
  'debian-slim',
  'ubuntu',
  'ubuntu-minimal',
  'centos',
  'rockylinux',
  'almalinux',
  'amazonlinux',
  'al2023',
  'distroless',
  'distroless-base',
  'static-debian',
  'base-debian',
  'scratch',
  'busybox',
  'fedora',
  'fedora-minimal',
  'opensuse',
  'leap',
  'tumbleweed',
  'wolfi',
  'wolfi-base',
  'chainguard-base',
  'base',
]);

export const CATALOG_BASE_IMAGE = 'chainguard-base';

/** `<base>-<suffix>` names a tool built around the base, not the base itself. */
export const TOOL_SUFFIXES: readonly string[] = [
  'exporter',
  'operator',
  'controller',
  'agent',
  'proxy',
  'gateway',
  'client',
  'driver',
  'registrar',
];

/** Applied in order after the version suffix is gone: `ubi9` → `ubi`, `debian-12` → `debian`. */
export const OS_VERSION_PATTERNS: ReadonlyArray<readonly [RegExp, string]> = [
  [/^(ubi|alpine|centos|rockylinux|almalinux)\d+/, '$1'],
  [/^(debian|ubuntu)[-_]\d+(?:\.\d+)?/, '$1'],
  [/^fedora[-_]?\d+/, 'fedora'],
];

export const OS_ALIASES: Readonly<Record<string, string>> = {
  al: 'amazonlinux',
  al2: 'amazonlinux',
  al2023: 'amazonlinux',
  al2022: 'amazonlinux',
};

/** Names starting with one of these collapse to it. */
export const OS_PREFIXES: readonly string[] = ['distroless', 'leap', 'tumbleweed'];

export const VENDOR_BUNDLE_MARKER = 'bitnami';

/** Path segments that are namespaces rather than project names. */
export const NAMESPACE_SEGMENTS: ReadonlySet<string> = new Set([
  'library',
  'opensource',
  'ironbank',
  '_',
]);

/** Build variants of the same upstream image, e.g. `kafka-native`. */
export const BUILD_VARIANT_SUFFIXES: readonly string[] = ['-native', '-slim', '-alpine'];

export const KNOWN_ALIASES: Readonly<Record<string, string>> = {
  mongo: 'mongodb',
  postgresql: 'postgres',
  'node-chrome': 'node-chromium',
};
