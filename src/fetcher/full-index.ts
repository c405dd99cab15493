/**
 * Full index fallback
 *
 * Downloads the registry's complete spec list (specs.4.8.gz plus
 * prerelease_specs.4.8.gz) when the dependency API cannot be used.
 * The registry location is a parameter; nothing process-wide changes.
 */

import { fileURLToPath } from "url";
import type { FileSystem, Logger } from "#/core";
import type { RedirectFollower } from "#/http";
import type { RegistryLocation } from "#/registry";
import type { RawSpec } from "#/specIndex";
import {
  authenticationRequired,
  badAuthentication,
  httpError,
  isFetchError,
  specsUnavailable,
  type FetchFailureKind,
} from "#/errors";
import { FULL_INDEX_FILE, PRERELEASE_INDEX_FILE } from "#/constants";
import { decodeFullIndex } from "./decode";

// Failures that already say exactly what went wrong
const PASSTHROUGH_FAILURES: FetchFailureKind[] = [
  "CertificateFailure",
  "TLSUnavailable",
  "NetworkDown",
  "AuthenticationRequired",
  "BadAuthentication",
];

export interface FullIndexFetcherOptions {
  follower: RedirectFollower;
  /** Reads file-scheme registries */
  fs: FileSystem;
  logger: Logger;
}

/**
 * Map a failure of the full index download to what the caller reports.
 * A 403 means bad credentials when some were sent, otherwise missing ones.
 */
export function classifyFullIndexFailure(error: unknown, location: RegistryLocation): unknown {
  if (!isFetchError(error)) return error;
  if (isFetchError(error, ...PASSTHROUGH_FAILURES)) return error;

  switch (error.status) {
    case 401:
      return authenticationRequired(location.host);
    case 403:
      return location.hasCredentials ? badAuthentication(location.toString()) : authenticationRequired(location.host);
    default:
      return specsUnavailable(location.toString(), error);
  }
}

export class FullIndexFetcher {
  private readonly follower: RedirectFollower;
  private readonly fs: FileSystem;
  private readonly logger: Logger;

  constructor(options: FullIndexFetcherOptions) {
    this.follower = options.follower;
    this.fs = options.fs;
    this.logger = options.logger;
  }

  async fetchFullIndex(location: RegistryLocation): Promise<RawSpec[]> {
    try {
      const released = await this.fetchIndexFile(location, FULL_INDEX_FILE);
      const prerelease = await this.fetchIndexFile(location, PRERELEASE_INDEX_FILE).catch((error: unknown) => {
        if (isFetchError(error, "HTTPError") && error.status === 404) {
          this.logger.debug(`No prerelease index at ${location.toString()}`);
          return [];
        }
        throw error;
      });
      return [...released, ...prerelease];
    } catch (error) {
      throw classifyFullIndexFailure(error, location);
    }
  }

  private async fetchIndexFile(location: RegistryLocation, file: string): Promise<RawSpec[]> {
    const uri = location.resolve(file);
    const safe = `${location.toString()}${file}`;
    const body = uri.protocol === "file:" ? this.readLocal(uri, safe) : await this.follower.fetch(uri);
    return decodeFullIndex(body, safe);
  }

  private readLocal(uri: URL, safe: string): Buffer {
    const path = fileURLToPath(uri);
    if (!this.fs.exists(path)) {
      throw httpError(safe, 404, "Not Found", "");
    }
    return this.fs.readFileBinary(path);
  }
}
