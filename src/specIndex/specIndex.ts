import { compareVersions } from "#/version";
import { EndpointSpecification, RemoteSpecification } from "./packageSpec";
import type { BuildIndexOptions, PackageSpec, RawSpec } from "./specIndex.types";

/**
 * Specs keyed by name, each name holding its published variants.
 * A variant is identified by its full name; adding the same variant again
 * replaces the earlier one. Once sealed, the index no longer changes.
 */
export class PackageIndex implements Iterable<PackageSpec> {
  private readonly specs = new Map<string, Map<string, PackageSpec>>();
  private sealed = false;

  add(spec: PackageSpec): this {
    if (this.sealed) {
      throw new Error(`Cannot add ${spec.fullName}: the index is sealed`);
    }
    let variants = this.specs.get(spec.name);
    if (!variants) {
      variants = new Map();
      this.specs.set(spec.name, variants);
    }
    variants.set(spec.fullName, spec);
    return this;
  }

  /**
   * Variants of one package, lowest version first
   */
  search(name: string): PackageSpec[] {
    const variants = this.specs.get(name);
    if (!variants) return [];
    return [...variants.values()].sort(
      (a, b) => compareVersions(a.version, b.version) || a.platform.localeCompare(b.platform)
    );
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  names(): string[] {
    return [...this.specs.keys()].sort();
  }

  get size(): number {
    let count = 0;
    for (const variants of this.specs.values()) count += variants.size;
    return count;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  *[Symbol.iterator](): Iterator<PackageSpec> {
    for (const variants of this.specs.values()) {
      yield* variants.values();
    }
  }
}

/**
 * Build a sealed index from registry entries.
 * Entries with dependencies become endpoint specs; entries without them
 * resolve dependencies on demand through the spec fetcher.
 */
export function buildIndex(entries: Iterable<RawSpec>, options: BuildIndexOptions): PackageIndex {
  const index = new PackageIndex();
  const origin = { source: options.source, sourceUri: options.sourceUri };

  for (const entry of entries) {
    // The package manager's own releases never come from a source index
    if (entry.name === options.selfPackageName) continue;

    const spec = entry.dependencies
      ? new EndpointSpecification(entry.name, entry.version, entry.platform, entry.dependencies, origin)
      : new RemoteSpecification(entry.name, entry.version, entry.platform, options.specFetcher, origin);
    index.add(spec);
  }

  return index.seal();
}
