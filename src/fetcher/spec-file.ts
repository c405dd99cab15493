/**
 * Spec file fetcher
 *
 * Resolves one spec through quick/Marshal.4.8/<full name>.gemspec.rz for
 * entries that came from the full index without dependencies.
 * Lookup order: file-scheme registries read from disk, then the configured
 * cache directories, then the network.
 */

import { fileURLToPath } from "url";
import type { FileSystem, Logger } from "#/core";
import type { RedirectFollower } from "#/http";
import type { RegistryLocation } from "#/registry";
import { fullNameOf, type RawSpec, type SpecFetcher, type SpecTuple } from "#/specIndex";
import { httpError, malformedSpec } from "#/errors";
import { MARSHAL_SPEC_DIR } from "#/constants";
import { decodeGemspec } from "./decode";
import type { RetryRunner } from "./fetcher.types";

export interface SpecFileFetcherOptions {
  location: RegistryLocation;
  follower: RedirectFollower;
  fs: FileSystem;
  cacheDirs: readonly string[];
  retry: RetryRunner;
  logger: Logger;
}

export function specFileName(spec: SpecTuple): string {
  return `${fullNameOf(spec.name, spec.version, spec.platform)}.gemspec`;
}

export class SpecFileFetcher implements SpecFetcher {
  private readonly options: SpecFileFetcherOptions;

  constructor(options: SpecFileFetcherOptions) {
    this.options = options;
  }

  specUri(spec: SpecTuple): URL {
    return this.options.location.resolve(`${MARSHAL_SPEC_DIR}${specFileName(spec)}.rz`);
  }

  async fetchSpec(spec: SpecTuple): Promise<RawSpec> {
    const uri = this.specUri(spec);
    const safe = `${this.options.location.toString()}${MARSHAL_SPEC_DIR}${specFileName(spec)}.rz`;
    const label = fullNameOf(spec.name, spec.version, spec.platform);
    const body = await this.readSpecFile(spec, uri, safe);

    const fetched = decodeGemspec(body, safe, label);
    if (fetched.name !== spec.name) {
      throw malformedSpec(safe, label, `names ${fetched.name} instead of ${spec.name}`);
    }
    return fetched;
  }

  private async readSpecFile(spec: SpecTuple, uri: URL, safe: string): Promise<Buffer> {
    const { fs, cacheDirs, follower, retry, logger } = this.options;

    if (uri.protocol === "file:") {
      const path = fileURLToPath(uri);
      if (!fs.exists(path)) {
        throw httpError(safe, 404, "Not Found", "");
      }
      return fs.readFileBinary(path);
    }

    const fileName = `${specFileName(spec)}.rz`;
    for (const dir of cacheDirs) {
      const path = `${dir.replace(/\/$/, "")}/${fileName}`;
      if (fs.exists(path)) {
        logger.debug(`Using cached spec ${path}`);
        return fs.readFileBinary(path);
      }
    }

    return retry("spec fetch", () => follower.fetch(uri));
  }
}
