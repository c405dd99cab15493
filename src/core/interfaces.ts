/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  exists(path: string): boolean;
  readdir(path: string): string[];
  stat(path: string): { isDirectory: boolean; isFile: boolean; size: number };
}

/**
 * A single HTTP request as seen by the transport.
 * The URL never carries userinfo; credentials travel in `headers`.
 */
export interface TransportRequest {
  url: URL;
  method: "GET" | "HEAD";
  headers: Record<string, string>;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Kinds of transport-level faults, decided by the transport from
 * structured error data (system error codes, undici error codes).
 */
export type TransportFaultKind =
  | "dns"
  | "network-down"
  | "timeout"
  | "connection-refused"
  | "connection-reset"
  | "tls"
  | "protocol"
  | "unknown";

/**
 * Thrown by an HttpTransport when no HTTP response could be obtained.
 */
export class TransportFault extends Error {
  readonly kind: TransportFaultKind;
  readonly code?: string;

  constructor(kind: TransportFaultKind, message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransportFault";
    this.kind = kind;
    this.code = options.code;
  }
}

/**
 * Performs exactly one HTTP request. Never follows redirects.
 */
export interface HttpTransport {
  request(req: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  /** Full error detail; only ever shown in debug output */
  trace(error: unknown): void;
}

/**
 * Read-only key/value configuration view.
 * Keys are given in dotted form ("ssl_verify_mode", "gems.example.com").
 */
export interface SettingsSource {
  get(key: string): string | undefined;
  /** Names of every key that has a value, in dotted lower-case form */
  all(): string[];
}
