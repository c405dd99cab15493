import { DEFAULT_PLATFORM } from "#/constants";
import { GemVersion, type Dependency } from "#/version";
import type { PackageSpec, SpecFetcher } from "./specIndex.types";

export function isDefaultPlatform(platform: string | null | undefined): boolean {
  return !platform || platform === DEFAULT_PLATFORM;
}

export function fullNameOf(name: string, version: string | GemVersion, platform: string): string {
  const base = `${name}-${version.toString()}`;
  return isDefaultPlatform(platform) ? base : `${base}-${platform}`;
}

interface SpecOrigin {
  source: string;
  sourceUri: string;
}

abstract class BaseSpecification implements PackageSpec {
  readonly name: string;
  readonly version: GemVersion;
  readonly platform: string;
  readonly source: string;
  readonly sourceUri: string;
  abstract readonly dependenciesResolved: boolean;

  constructor(name: string, version: string | GemVersion, platform: string, origin: SpecOrigin) {
    this.name = name;
    this.version = GemVersion.parse(version);
    this.platform = isDefaultPlatform(platform) ? DEFAULT_PLATFORM : platform;
    this.source = origin.source;
    this.sourceUri = origin.sourceUri;
  }

  get fullName(): string {
    return fullNameOf(this.name, this.version, this.platform);
  }

  abstract dependencies(): Promise<Dependency[]>;

  toString(): string {
    return this.fullName;
  }
}

/**
 * Spec whose dependencies came with the registry entry.
 */
export class EndpointSpecification extends BaseSpecification {
  readonly dependenciesResolved = true;
  private readonly knownDependencies: readonly Dependency[];

  constructor(
    name: string,
    version: string | GemVersion,
    platform: string,
    dependencies: Dependency[],
    origin: SpecOrigin
  ) {
    super(name, version, platform, origin);
    this.knownDependencies = dependencies;
  }

  async dependencies(): Promise<Dependency[]> {
    return [...this.knownDependencies];
  }
}

/**
 * Spec whose dependencies are fetched on first use and then kept.
 */
export class RemoteSpecification extends BaseSpecification {
  private readonly fetcher: SpecFetcher;
  private pending?: Promise<Dependency[]>;
  private resolved = false;

  constructor(name: string, version: string | GemVersion, platform: string, fetcher: SpecFetcher, origin: SpecOrigin) {
    super(name, version, platform, origin);
    this.fetcher = fetcher;
  }

  get dependenciesResolved(): boolean {
    return this.resolved;
  }

  dependencies(): Promise<Dependency[]> {
    if (!this.pending) {
      this.pending = this.fetcher
        .fetchSpec({ name: this.name, version: this.version.toString(), platform: this.platform })
        .then((spec) => {
          this.resolved = true;
          return spec.dependencies ?? [];
        })
        .catch((error: unknown) => {
          // a failed fetch is not memoised; the next call tries again
          this.pending = undefined;
          throw error;
        });
    }
    return this.pending;
  }
}
