/**
 * Request executor
 *
 * Issues a single GET through the transport. Credentials embedded in the
 * URI become a Basic Authorization header; the request line and every log
 * line only ever see the credential-stripped URI.
 */

import { STATUS_CODES } from "http";
import type { HttpTransport, Logger, TransportResponse } from "#/core";
import { TransportFault } from "#/core";
import { classifyTransportFault, isFetchError, networkError } from "#/errors";
import { stripCredentials } from "#/registry";

export interface RequestExecutorOptions {
  transport: HttpTransport;
  userAgent: string;
  logger: Logger;
}

export function basicAuthorization(uri: URL): string | undefined {
  if (!uri.username && !uri.password) return undefined;
  const user = decodeURIComponent(uri.username);
  const password = decodeURIComponent(uri.password);
  return `Basic ${Buffer.from(`${user}:${password}`).toString("base64")}`;
}

export function statusText(status: number): string {
  return STATUS_CODES[status] ?? "Unknown";
}

export class RequestExecutor {
  private readonly transport: HttpTransport;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(options: RequestExecutorOptions) {
    this.transport = options.transport;
    this.userAgent = options.userAgent;
    this.logger = options.logger;
  }

  async execute(uri: URL): Promise<TransportResponse> {
    const url = stripCredentials(uri);
    const safe = url.toString();
    this.logger.debug(`HTTP GET ${safe}`);

    const headers: Record<string, string> = { "user-agent": this.userAgent };
    const authorization = basicAuthorization(uri);
    if (authorization) {
      headers.authorization = authorization;
    }

    let response: TransportResponse;
    try {
      response = await this.transport.request({ url, method: "GET", headers });
    } catch (error) {
      if (isFetchError(error)) throw error;
      this.logger.trace(error);
      if (error instanceof TransportFault) {
        throw classifyTransportFault(error, safe, url.hostname);
      }
      throw networkError(safe, error);
    }

    this.logger.debug(`HTTP ${response.status} ${statusText(response.status)}`);
    return response;
  }
}
