/**
 * Dependency API fetcher
 *
 * Resolves the transitive dependency closure of a set of names through
 * GET api/v1/dependencies?gems=a,b. Each round queries the names not yet
 * queried; the dependency names it returns form the next round.
 */

import type { Logger } from "#/core";
import type { RedirectFollower } from "#/http";
import { stripCredentials } from "#/registry";
import type { RawSpec } from "#/specIndex";
import { DEPENDENCY_API_PATH } from "#/constants";
import { decodeDependencyApi } from "./decode";
import type { ClosureResult, RetryRunner } from "./fetcher.types";

export interface DependencyApiFetcherOptions {
  follower: RedirectFollower;
  /** Registry root the API is served from, credentials included */
  fetchUri: URL;
  /** Maximum names per request */
  batchSize: number;
  retry: RetryRunner;
  logger: Logger;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

export class DependencyApiFetcher {
  private readonly options: DependencyApiFetcherOptions;

  constructor(options: DependencyApiFetcherOptions) {
    if (options.batchSize < 1) {
      throw new RangeError(`batchSize must be at least 1, got ${options.batchSize}`);
    }
    this.options = options;
  }

  dependencyApiUri(names: readonly string[] = []): URL {
    const uri = new URL(DEPENDENCY_API_PATH, this.options.fetchUri);
    if (names.length > 0) {
      uri.search = `gems=${names.map(encodeURIComponent).join(",")}`;
    }
    return uri;
  }

  /**
   * Request the bare endpoint. Resolves when the registry serves the API.
   */
  async probe(): Promise<void> {
    await this.options.follower.fetch(this.dependencyApiUri());
  }

  /**
   * One request for at most batchSize names.
   */
  async fetchBatch(names: readonly string[]): Promise<RawSpec[]> {
    const uri = this.dependencyApiUri(names);
    const body = await this.options.follower.fetch(uri);
    return decodeDependencyApi(body, stripCredentials(uri).toString());
  }

  async resolveClosure(requestedNames: Iterable<string>): Promise<ClosureResult> {
    const { batchSize, retry, logger } = this.options;
    const fullyQueried = new Set<string>();
    const collected: RawSpec[] = [];
    let requested = new Set(requestedNames);
    let rounds = 0;

    for (;;) {
      const frontier = [...requested].filter((name) => !fullyQueried.has(name));
      logger.debug(`Query List: ${JSON.stringify(frontier)}`);
      if (frontier.length === 0) break;

      rounds++;
      const discovered = new Set<string>();
      logger.debug(`Query dependency API: ${frontier.join(",")}`);

      for (const batch of chunk(frontier, batchSize)) {
        const specs = await retry("dependency api", () => this.fetchBatch(batch));
        for (const spec of specs) {
          collected.push(spec);
          for (const dependency of spec.dependencies ?? []) {
            discovered.add(dependency.name);
          }
        }
      }

      for (const name of frontier) fullyQueried.add(name);
      requested = discovered;
    }

    return { specs: collected, resolvedNames: fullyQueried, rounds };
  }
}
