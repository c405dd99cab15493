/**
 * Version utilities
 *
 * Ordered version values with gem registry semantics. Gem versions are not semver:
 * "1.2", "1.0.0.rc1" and "3.1.4.1" are all valid, any letter makes a version a
 * prerelease, and trailing zero segments do not change ordering.
 */

export const VERSION_PATTERN = "[0-9]+(?:\\.[0-9a-zA-Z]+)*(?:-[0-9A-Za-z-]+(?:\\.[0-9A-Za-z-]+)*)?";

const ANCHORED_VERSION_PATTERN = new RegExp(`^\\s*(?:${VERSION_PATTERN})?\\s*$`);

// Numeric segments are bigint: timestamp-style versions exceed 2^53
type Segment = bigint | string;

export class GemVersion {
  /** Version as published, whitespace trimmed */
  readonly version: string;
  readonly segments: readonly Segment[];

  constructor(version: string) {
    if (!isValidVersion(version)) {
      throw new Error(`Malformed version number string ${version}`);
    }
    const trimmed = version.trim();
    this.version = trimmed === "" ? "0" : trimmed;
    // "1.0-beta" orders like "1.0.pre.beta"
    const normalized = this.version.replace(/-/g, ".pre.");
    this.segments = (normalized.match(/[0-9]+|[a-z]+/gi) ?? []).map((s) => (/^\d+$/.test(s) ? BigInt(s) : s));
  }

  static parse(version: string | GemVersion): GemVersion {
    return version instanceof GemVersion ? version : new GemVersion(version);
  }

  get isPrerelease(): boolean {
    return /[a-zA-Z]/.test(this.version);
  }

  /**
   * The release this prerelease leads up to ("1.0.0.rc1" → "1.0.0").
   */
  release(): GemVersion {
    if (!this.isPrerelease) return this;
    const numeric: bigint[] = [];
    for (const segment of this.segments) {
      if (typeof segment === "string") break;
      numeric.push(segment);
    }
    return new GemVersion(numeric.join("."));
  }

  /**
   * Next version for pessimistic matching: "1.2.3" → "1.3", "1" → "2".
   */
  bump(): GemVersion {
    const numeric: bigint[] = [];
    for (const segment of this.segments) {
      if (typeof segment === "string") break;
      numeric.push(segment);
    }
    if (numeric.length > 1) numeric.pop();
    const last = numeric.length - 1;
    numeric[last] = (numeric[last] ?? 0n) + 1n;
    return new GemVersion(numeric.join("."));
  }

  compare(other: GemVersion): -1 | 0 | 1 {
    const limit = Math.max(this.segments.length, other.segments.length);
    for (let i = 0; i < limit; i++) {
      const lhs = this.segments[i] ?? 0n;
      const rhs = other.segments[i] ?? 0n;
      if (lhs === rhs) continue;
      if (typeof lhs === "string") {
        if (typeof rhs !== "string") return -1;
        return lhs < rhs ? -1 : 1;
      }
      if (typeof rhs === "string") return 1;
      return lhs < rhs ? -1 : 1;
    }
    return 0;
  }

  equals(other: GemVersion): boolean {
    return this.compare(other) === 0;
  }

  toString(): string {
    return this.version;
  }
}

export function isValidVersion(version: string): boolean {
  return ANCHORED_VERSION_PATTERN.test(version);
}

/**
 * Compare two versions.
 * Returns -1 if a < b, 0 if a === b, 1 if a > b.
 * Throws if either version is invalid.
 */
export function compareVersions(a: string | GemVersion, b: string | GemVersion): -1 | 0 | 1 {
  return GemVersion.parse(a).compare(GemVersion.parse(b));
}
