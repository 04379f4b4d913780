/**
 * Lenient semantic versions for container tags: `1.2.3`, `v1.2`, `8`,
 * `1.27.0-alpine`. Missing components count as zero.
 */

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?$/;
/** Splits off a suffix such as `-alpine` or `_slim`, but not `-1` build counters. */
const SUFFIX_SEPARATOR = /[-_](?![0-9])/;

export class SemVer {
  private constructor(
    readonly major: number,
    readonly minor: number,
    readonly patch: number,
  ) {}

  static parse(tag: string | undefined): SemVer | undefined {
    if (!tag) {
      return undefined;
    }

    const core = tag.replace(/^[vV]+/, '').split(SUFFIX_SEPARATOR)[0] ?? '';
    const match = VERSION_PATTERN.exec(core);
    if (!match) {
      return undefined;
    }

    const [, major = '0', minor = '0', patch = '0'] = match;
    return new SemVer(Number(major), Number(minor), Number(patch));
  }

  /** Negative when this version sorts before `other`. */
  compare(other: SemVer): number {
    return this.major - other.major || this.minor - other.minor || this.patch - other.patch;
  }

  equals(other: SemVer): boolean {
    return this.compare(other) === 0;
  }

  matchesMinor(other: SemVer): boolean {
    return this.major === other.major && this.minor === other.minor;
  }

  toString(): string {
    return `${this.major}.${this.minor}.${this.patch}`;
  }
}
