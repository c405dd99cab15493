import type { Dependency, GemVersion } from "#/version";

// A registry entry before it becomes a spec.
// Entries from the dependency API carry their dependencies; full index entries do not.
export interface RawSpec {
  name: string;
  version: string;
  platform: string;
  dependencies?: Dependency[];
}

// Name, version and platform of one published variant
export type SpecTuple = Pick<RawSpec, "name" | "version" | "platform">;

// Resolves the dependencies of an entry that arrived without them
export interface SpecFetcher {
  fetchSpec(spec: SpecTuple): Promise<RawSpec>;
}

export interface PackageSpec {
  readonly name: string;
  readonly version: GemVersion;
  readonly platform: string;
  /** Name of the configured source the spec came from */
  readonly source: string;
  /** Credential-stripped registry location */
  readonly sourceUri: string;
  /** "name-version", or "name-version-platform" for non-default platforms */
  readonly fullName: string;
  /** Whether dependencies are already known, without fetching them */
  readonly dependenciesResolved: boolean;
  dependencies(): Promise<Dependency[]>;
}

export interface BuildIndexOptions {
  source: string;
  sourceUri: string;
  specFetcher: SpecFetcher;
  /** Entries with exactly this name are left out */
  selfPackageName: string;
}
