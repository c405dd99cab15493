/**
 * HttpTransport on undici pools
 *
 * Performs exactly one request per call and never follows redirects.
 * Errors that prevent a response are turned into TransportFault, with the
 * kind decided from error codes found on the error or its causes.
 */

import type { HttpTransport, TransportFaultKind, TransportRequest, TransportResponse } from "#/core";
import { TransportFault } from "#/core";
import type { ConnectionManager } from "./connection-manager";

const FAULT_CODES: Record<string, TransportFaultKind> = {
  ENOTFOUND: "dns",
  EAI_AGAIN: "dns",
  EAI_FAIL: "dns",
  EAI_NONAME: "dns",
  ENETDOWN: "network-down",
  ENETUNREACH: "network-down",
  EHOSTDOWN: "network-down",
  EHOSTUNREACH: "network-down",
  ETIMEDOUT: "timeout",
  UND_ERR_CONNECT_TIMEOUT: "timeout",
  UND_ERR_HEADERS_TIMEOUT: "timeout",
  UND_ERR_BODY_TIMEOUT: "timeout",
  ECONNREFUSED: "connection-refused",
  ECONNRESET: "connection-reset",
  EPIPE: "connection-reset",
  UND_ERR_SOCKET: "connection-reset",
  UND_ERR_CLOSED: "connection-reset",
  UND_ERR_RES_CONTENT_LENGTH_MISMATCH: "protocol",
  UND_ERR_INVALID_ARG: "protocol",
  UND_ERR_INFO: "protocol",
};

const TLS_CODE_PATTERN =
  /^(ERR_TLS_|ERR_SSL_|ERR_OSSL_|CERT_|UNABLE_TO_|DEPTH_ZERO_SELF_SIGNED_CERT|SELF_SIGNED_CERT_IN_CHAIN)/;

const MAX_CAUSE_DEPTH = 5;

function codeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function causeOf(error: unknown): unknown {
  if (error instanceof AggregateError) return error.errors[0];
  if (error instanceof Error) return error.cause;
  return undefined;
}

function kindForCode(code: string): TransportFaultKind | undefined {
  const known = FAULT_CODES[code];
  if (known) return known;
  if (TLS_CODE_PATTERN.test(code)) return "tls";
  // llhttp parser errors
  if (code.startsWith("HPE_")) return "protocol";
  return undefined;
}

/**
 * Build a TransportFault from whatever undici or the socket layer threw.
 * The first recognized code along the cause chain decides the kind.
 */
export function toTransportFault(error: unknown): TransportFault {
  if (error instanceof TransportFault) return error;

  let current: unknown = error;
  for (let depth = 0; current !== undefined && depth < MAX_CAUSE_DEPTH; depth++) {
    const code = codeOf(current);
    const kind = code ? kindForCode(code) : undefined;
    if (kind) {
      return new TransportFault(kind, describe(current), { code, cause: error });
    }
    current = causeOf(current);
  }

  return new TransportFault("unknown", describe(error), { code: codeOf(error), cause: error });
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return flat;
}

export class UndiciTransport implements HttpTransport {
  private readonly connections: ConnectionManager;

  constructor(connections: ConnectionManager) {
    this.connections = connections;
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    // TLSUnavailable is already classified; let it through untouched
    const pool = this.connections.connect(req.url);

    try {
      const response = await pool.request({
        path: `${req.url.pathname}${req.url.search}`,
        method: req.method,
        headers: req.headers,
      });
      const body = Buffer.from(await response.body.arrayBuffer());
      return { status: response.statusCode, headers: flattenHeaders(response.headers), body };
    } catch (error) {
      throw toTransportFault(error);
    }
  }

  async close(): Promise<void> {
    await this.connections.close();
  }
}
