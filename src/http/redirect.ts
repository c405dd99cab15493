/**
 * Redirect follower
 *
 * Bounded redirect following on top of RequestExecutor, plus the mapping of
 * final statuses to fetch failures.
 */

import type { Logger } from "#/core";
import {
  authenticationRequired,
  fallbackRequired,
  httpError,
  tooManyRedirects,
} from "#/errors";
import { stripCredentials } from "#/registry";
import { statusText, type RequestExecutor } from "./request";

export interface RedirectFollowerOptions {
  redirectLimit: number;
  logger: Logger;
  /** Host named in authentication failures; defaults to the requested host */
  registryHost?: string;
}

/**
 * Next URI for a redirect. Credentials follow only to the same host;
 * a cross-host target never carries any.
 */
export function redirectTarget(current: URL, location: string): URL {
  const next = new URL(location, current);
  if (next.hostname === current.hostname) {
    next.username = current.username;
    next.password = current.password;
    return next;
  }
  return stripCredentials(next);
}

export class RedirectFollower {
  private readonly executor: RequestExecutor;
  private readonly redirectLimit: number;
  private readonly logger: Logger;
  private readonly registryHost?: string;

  constructor(executor: RequestExecutor, options: RedirectFollowerOptions) {
    this.executor = executor;
    this.redirectLimit = options.redirectLimit;
    this.logger = options.logger;
    this.registryHost = options.registryHost;
  }

  async fetch(uri: URL, depth = 0): Promise<Buffer> {
    const safe = stripCredentials(uri).toString();
    if (depth >= this.redirectLimit) {
      throw tooManyRedirects(safe, this.redirectLimit);
    }

    const response = await this.executor.execute(uri);
    const { status, body } = response;

    if (status >= 300 && status < 400) {
      const location = response.headers.location;
      if (!location) {
        throw httpError(safe, status, statusText(status), "redirect without a Location header");
      }
      let next: URL;
      try {
        next = redirectTarget(uri, location);
      } catch (error) {
        this.logger.trace(error);
        throw httpError(safe, status, statusText(status), `invalid Location header ${JSON.stringify(location)}`);
      }
      this.logger.debug(`Redirected to ${stripCredentials(next).toString()}`);
      return this.fetch(next, depth + 1);
    }

    if (status >= 200 && status < 300) {
      return body;
    }

    switch (status) {
      case 413:
        throw fallbackRequired(safe, body.toString("utf-8"));
      case 401:
        throw authenticationRequired(this.registryHost ?? uri.hostname);
      default:
        throw httpError(safe, status, statusText(status), body.toString("utf-8"));
    }
  }
}
