/**
 * Fetch session
 *
 * One session per configured registry. Owns the connections, the memoised
 * API availability and the choice between the dependency API and the full
 * index. Sessions share no state, so several can run side by side.
 */

import type { FileSystem, HttpTransport, Logger } from "#/core";
import { createNodeFileSystem, silentLogger } from "#/core";
import { ConnectionManager, RedirectFollower, RequestExecutor, UndiciTransport } from "#/http";
import type { RegistryLocation } from "#/registry";
import type { FetcherConfig } from "#/settings";
import { buildIndex, type PackageIndex, type RawSpec, type SpecTuple } from "#/specIndex";
import {
  AUTHENTICATION_FAILURES,
  isAuthenticationFailure,
  isFetchError,
  toFetchResult,
  type FetchFailureKind,
  type FetchResult,
} from "#/errors";
import { attempt } from "#/retry";
import { DependencyApiFetcher } from "./dependency-api";
import { FullIndexFetcher } from "./full-index";
import { SpecFileFetcher } from "./spec-file";
import type { ApiAvailability, FetchSessionOptions } from "./fetcher.types";

const INSPECT = Symbol.for("nodejs.util.inspect.custom");

// A second attempt cannot change these outcomes
const NON_RETRYABLE_FAILURES: readonly FetchFailureKind[] = [
  ...AUTHENTICATION_FAILURES,
  "CertificateFailure",
  "TLSUnavailable",
  "MalformedSpec",
  "FallbackRequired",
];

/**
 * Registry root the dependency API is requested from.
 * A host rewrite moves only the API; everything else stays on the registry.
 */
export function apiFetchUri(location: RegistryLocation, rewrites: Record<string, string>): URL {
  const uri = location.uri;
  const rewritten = rewrites[location.host];
  if (rewritten) {
    uri.hostname = rewritten;
  }
  return uri;
}

export class FetchSession {
  readonly location: RegistryLocation;
  readonly source: string;
  private readonly config: FetcherConfig;
  private readonly logger: Logger;
  private readonly transport: HttpTransport;
  private readonly api: DependencyApiFetcher;
  private readonly fullIndex: FullIndexFetcher;
  private readonly specFiles: SpecFileFetcher;
  private availability: ApiAvailability = "unknown";
  private probing?: Promise<boolean>;

  constructor(options: FetchSessionOptions) {
    const { location, config } = options;
    const fs: FileSystem = options.fs ?? createNodeFileSystem();
    this.location = location;
    this.config = config;
    this.source = options.source ?? location.toString();
    this.logger = options.logger ?? silentLogger;
    this.transport =
      options.transport ??
      new UndiciTransport(new ConnectionManager({ tls: config.tls, timeoutMs: config.timeoutMs, fs }));

    const executor = new RequestExecutor({
      transport: this.transport,
      userAgent: config.userAgent,
      logger: this.logger,
    });
    const follower = new RedirectFollower(executor, {
      redirectLimit: config.redirectLimit,
      logger: this.logger,
      registryHost: location.host,
    });
    const retry = <T>(label: string, operation: () => Promise<T>): Promise<T> => this.retry(label, operation);

    this.api = new DependencyApiFetcher({
      follower,
      fetchUri: apiFetchUri(location, config.apiHostRewrites),
      batchSize: config.apiRequestLimit,
      retry,
      logger: this.logger,
    });
    this.fullIndex = new FullIndexFetcher({ follower, fs, logger: this.logger });
    this.specFiles = new SpecFileFetcher({
      location,
      follower,
      fs,
      cacheDirs: config.specCacheDirs,
      retry,
      logger: this.logger,
    });
  }

  /** Credential-stripped registry location */
  get uri(): string {
    return this.location.toString();
  }

  get apiAvailability(): ApiAvailability {
    return this.availability;
  }

  /**
   * Whether the dependency API is used. Decided once per session:
   * file-scheme registries and disable_endpoint never use it, otherwise a
   * probe request decides. Authentication failures and an unreachable
   * host propagate; any other probe failure means the API is unavailable.
   */
  useApi(): Promise<boolean> {
    if (this.availability !== "unknown") {
      return Promise.resolve(this.availability === "available");
    }
    if (this.location.scheme === "file" || this.config.disableEndpoint) {
      this.availability = "unavailable";
      return Promise.resolve(false);
    }
    if (!this.probing) {
      this.probing = this.probe().finally(() => {
        this.probing = undefined;
      });
    }
    return this.probing;
  }

  /**
   * Specs for the given names and everything they depend on.
   * Without names, every spec the registry publishes.
   */
  async specs(names?: readonly string[], source: string = this.source): Promise<PackageIndex> {
    this.logger.info(`Fetching gem metadata from ${this.uri}`);

    let entries: RawSpec[] | undefined;
    if (names && (await this.useApi())) {
      entries = await this.specsFromApi(names);
    }
    if (!entries) {
      entries = await this.retry("source fetch", () => this.fullIndex.fetchFullIndex(this.location));
    }

    return buildIndex(entries, {
      source,
      sourceUri: this.uri,
      specFetcher: this.specFiles,
      selfPackageName: this.config.selfPackageName,
    });
  }

  fetchSpec(spec: SpecTuple): Promise<RawSpec> {
    return this.specFiles.fetchSpec(spec);
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  toString(): string {
    return `FetchSession <${this.uri}>`;
  }

  [INSPECT](): string {
    return this.toString();
  }

  private async probe(): Promise<boolean> {
    try {
      await this.api.probe();
      this.availability = "available";
    } catch (error) {
      if (!isFetchError(error) || isAuthenticationFailure(error) || isFetchError(error, "NetworkDown")) {
        throw error;
      }
      this.logger.debug(`Dependency API unavailable at ${this.uri}`);
      this.logger.trace(error);
      this.availability = "unavailable";
    }
    return this.availability === "available";
  }

  /**
   * Closure through the dependency API, or undefined once the API has
   * failed and the session has switched to the full index for good.
   */
  private async specsFromApi(names: readonly string[]): Promise<RawSpec[] | undefined> {
    try {
      const closure = await this.api.resolveClosure(names);
      return closure.specs;
    } catch (error) {
      if (!isFetchError(error) || isAuthenticationFailure(error)) {
        throw error;
      }
      if (isFetchError(error, "FallbackRequired")) {
        this.logger.debug(`Dependency API declined the request: ${error.body ?? ""}`);
      }
      this.logger.debug("could not fetch from the dependency API, trying the full index");
      this.logger.trace(error);
      this.availability = "unavailable";
      return undefined;
    }
  }

  private retry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return attempt(operation, {
      abortOn: NON_RETRYABLE_FAILURES,
      maxAttempts: this.config.maxAttempts,
      delayMs: this.config.retryDelayMs,
      label,
      logger: this.logger,
    });
  }
}

/**
 * FetchSession.specs as a result value. Only fetch failures are folded in.
 */
export function safeFetchSpecs(
  session: FetchSession,
  names?: readonly string[],
  source?: string
): Promise<FetchResult<PackageIndex>> {
  return toFetchResult(() => session.specs(names, source));
}
