/**
 * Fetch failure taxonomy
 *
 * Every failure that leaves the fetcher is a FetchError with a closed `kind`.
 * Messages name the credential-stripped location and a remediation hint;
 * raw transport text stays in `cause` and only reaches debug traces.
 */

import type { TransportFault } from "#/core";

export type FetchFailureKind =
  | "NetworkDown"
  | "CertificateFailure"
  | "TLSUnavailable"
  | "AuthenticationRequired"
  | "BadAuthentication"
  | "FallbackRequired"
  | "TooManyRedirects"
  | "MalformedSpec"
  | "HTTPError";

/**
 * Failures that further attempts cannot fix: bypass retries and the
 * dependency API → full index fallback.
 */
export const AUTHENTICATION_FAILURES: readonly FetchFailureKind[] = [
  "AuthenticationRequired",
  "BadAuthentication",
];

export class FetchError extends Error {
  readonly kind: FetchFailureKind;
  /** Credential-stripped location the failure relates to */
  readonly location: string;
  readonly status?: number;
  readonly body?: string;

  constructor(
    kind: FetchFailureKind,
    message: string,
    details: { location: string; status?: number; body?: string; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.location = details.location;
    this.status = details.status;
    this.body = details.body;
  }
}

export function isFetchError(error: unknown, ...kinds: FetchFailureKind[]): error is FetchError {
  if (!(error instanceof FetchError)) return false;
  return kinds.length === 0 || kinds.includes(error.kind);
}

export function isAuthenticationFailure(error: unknown): error is FetchError {
  return isFetchError(error, ...AUTHENTICATION_FAILURES);
}

const BODY_SNIPPET_LENGTH = 200;

function snippet(body: string): string {
  const trimmed = body.trim();
  return trimmed.length > BODY_SNIPPET_LENGTH ? `${trimmed.slice(0, BODY_SNIPPET_LENGTH)}...` : trimmed;
}

export function networkDown(host: string, cause?: unknown): FetchError {
  return new FetchError(
    "NetworkDown",
    `Could not reach host ${host}. Check your network connection and try again.`,
    { location: host, cause }
  );
}

export function certificateFailure(location: string, cause?: unknown): FetchError {
  return new FetchError(
    "CertificateFailure",
    `Could not verify the SSL certificate for ${location}.\n` +
      "There is a chance you are experiencing a man-in-the-middle attack, but most likely " +
      "your system doesn't have the CA certificates needed for verification. " +
      "Set ssl_ca_cert to a CA file or directory, or change the source from 'https' to 'http'.",
    { location, cause }
  );
}

export function tlsUnavailable(location: string): FetchError {
  return new FetchError(
    "TLSUnavailable",
    `Could not load TLS support while connecting to ${location}.\n` +
      "Use a Node.js build with OpenSSL, or change the source from 'https' to 'http'.",
    { location }
  );
}

export function authenticationRequired(location: string): FetchError {
  return new FetchError(
    "AuthenticationRequired",
    `Authentication is required for ${location}.\n` +
      "Please supply credentials for this source by setting:\n" +
      `  ${location}: username:password`,
    { location, status: 401 }
  );
}

export function badAuthentication(location: string): FetchError {
  return new FetchError(
    "BadAuthentication",
    `Bad username or password for ${location}.\nPlease double-check your credentials and correct them.`,
    { location, status: 403 }
  );
}

export function fallbackRequired(location: string, body: string): FetchError {
  return new FetchError("FallbackRequired", `Request to ${location} was too large for the dependency API`, {
    location,
    status: 413,
    body,
  });
}

export function tooManyRedirects(location: string, limit: number): FetchError {
  return new FetchError("TooManyRedirects", `Too many redirects (more than ${limit}) while fetching ${location}`, {
    location,
  });
}

export function malformedSpec(location: string, packageLabel: string, reason: string, cause?: unknown): FetchError {
  return new FetchError(
    "MalformedSpec",
    `The gem ${packageLabel} from ${location} has an invalid gemspec: ${reason}.\n` +
      "Please ask the gem author to yank the bad version to fix this issue.",
    { location, cause }
  );
}

export function malformedResponse(location: string, reason: string, cause?: unknown): FetchError {
  return new FetchError("MalformedSpec", `The response from ${location} could not be decoded: ${reason}`, {
    location,
    cause,
  });
}

export function specsUnavailable(location: string, cause?: unknown): FetchError {
  return new FetchError("HTTPError", `Could not fetch specs from ${location}`, {
    location,
    status: cause instanceof FetchError ? cause.status : undefined,
    cause,
  });
}

export function httpError(location: string, status: number, statusText: string, body: string): FetchError {
  const detail = snippet(body);
  return new FetchError(
    "HTTPError",
    `HTTP ${status} ${statusText} while fetching ${location}${detail ? `: ${detail}` : ""}`,
    { location, status, body }
  );
}

export function networkError(location: string, cause?: unknown): FetchError {
  return new FetchError("HTTPError", `Network error while fetching ${location}`, { location, cause });
}

/**
 * Map a transport fault to the failure taxonomy.
 *
 * Decisions are made on the fault's kind, which the transport derives from
 * error codes. Classifying on message text is not done: fault wording differs
 * between transports and Node versions.
 */
export function classifyTransportFault(fault: TransportFault, location: string, host: string): FetchError {
  switch (fault.kind) {
    case "dns":
    case "network-down":
      return networkDown(host, fault);
    case "tls":
      return certificateFailure(location, fault);
    default:
      return networkError(location, fault);
  }
}
