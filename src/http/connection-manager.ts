/**
 * Connection manager
 *
 * One keep-alive undici Pool per origin, configured once per session.
 * TLS settings (verify mode, trusted roots, client certificate) are read
 * here and applied to every encrypted connection.
 */

import { rootCertificates } from "tls";
import { Pool } from "undici";
import type { FileSystem } from "#/core";
import type { TlsConfig } from "#/settings";
import { tlsUnavailable } from "#/errors";
import { stripCredentials } from "#/registry";

const CERT_FILE_PATTERN = /\.(pem|crt)$/;

export interface ConnectionManagerOptions {
  tls: TlsConfig;
  /** Read timeout applied to response headers and body */
  timeoutMs: number;
  fs: FileSystem;
  /** Runtime TLS support check; defaults to whether Node was built with OpenSSL */
  tlsAvailable?: () => boolean;
  /** Pool factory, replaced in tests */
  createPool?: (origin: string, options: Pool.Options) => Pool;
}

interface TlsOptions {
  rejectUnauthorized: boolean;
  ca?: string[];
  cert?: string;
  key?: string;
}

export class ConnectionManager {
  private readonly pools = new Map<string, Pool>();
  private readonly options: ConnectionManagerOptions;
  private tlsOptions?: TlsOptions;

  constructor(options: ConnectionManagerOptions) {
    this.options = options;
  }

  /**
   * Whether a connection to `url` must be encrypted.
   * A configured verify mode or client certificate makes TLS mandatory even
   * for http sources.
   */
  requiresTls(url: URL): boolean {
    const { verifyMode, clientCert } = this.options.tls;
    return url.protocol === "https:" || verifyMode !== undefined || clientCert !== undefined;
  }

  /**
   * Pool for the URL's origin. Repeated calls for the same origin return the same pool.
   */
  connect(url: URL): Pool {
    const origin = url.origin;
    const existing = this.pools.get(origin);
    if (existing) return existing;

    if (this.requiresTls(url) && !this.isTlsAvailable()) {
      throw tlsUnavailable(stripCredentials(url).toString());
    }

    const options: Pool.Options = {
      connections: 1,
      pipelining: 1,
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
    };
    if (url.protocol === "https:") {
      options.connect = this.resolveTlsOptions();
    }

    const pool = this.options.createPool ? this.options.createPool(origin, options) : new Pool(origin, options);
    this.pools.set(origin, pool);
    return pool;
  }

  /** Origins with an open pool */
  get origins(): string[] {
    return [...this.pools.keys()];
  }

  async close(): Promise<void> {
    const pools = [...this.pools.values()];
    this.pools.clear();
    await Promise.all(pools.map((pool) => pool.close()));
  }

  private isTlsAvailable(): boolean {
    const check = this.options.tlsAvailable ?? (() => typeof process.versions.openssl === "string");
    return check();
  }

  private resolveTlsOptions(): TlsOptions {
    if (this.tlsOptions) return this.tlsOptions;

    const { tls, fs } = this.options;
    const options: TlsOptions = { rejectUnauthorized: tls.verifyMode !== "none" };

    if (tls.caCert) {
      options.ca = readCertificates(fs, tls.caCert);
    } else if (tls.bundledCertsDir && fs.exists(tls.bundledCertsDir)) {
      options.ca = [...rootCertificates, ...readCertificates(fs, tls.bundledCertsDir)];
    }

    if (tls.clientCert) {
      // The PEM holds both blocks; each option picks out its own
      const pem = fs.readFile(tls.clientCert);
      options.cert = pem;
      options.key = pem;
    }

    this.tlsOptions = options;
    return options;
  }
}

/**
 * Read a CA file, or every .pem/.crt file in a CA directory.
 */
export function readCertificates(fs: FileSystem, path: string): string[] {
  if (!fs.stat(path).isDirectory) {
    return [fs.readFile(path)];
  }
  const dir = path.endsWith("/") ? path.slice(0, -1) : path;
  return fs
    .readdir(dir)
    .filter((entry) => CERT_FILE_PATTERN.test(entry))
    .map((entry) => fs.readFile(`${dir}/${entry}`));
}
