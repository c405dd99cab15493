/**
 * Settings types
 *
 * FetcherConfig is resolved once from settings and passed into each fetch
 * session. Sessions never read settings again, so two sessions configured
 * differently cannot interfere.
 */

export type VerifyMode = "peer" | "none";

export interface TlsConfig {
  /** Set only when ssl_verify_mode is configured; unset verifies peers */
  verifyMode?: VerifyMode;
  /** CA bundle file, or a directory of PEM files, replacing the default roots */
  caCert?: string;
  /** PEM file holding both the client certificate and its private key */
  clientCert?: string;
  /** Directory of supplementary PEM roots added to the default roots */
  bundledCertsDir?: string;
}

export interface FetcherConfig {
  redirectLimit: number;
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  /** Maximum names per dependency API request */
  apiRequestLimit: number;
  /** Skip the dependency API and always use the full index */
  disableEndpoint: boolean;
  tls: TlsConfig;
  /** Directories searched for `<name>-<version>.gemspec.rz` before the network */
  specCacheDirs: string[];
  /** Registry entries with this name are left out of every index */
  selfPackageName: string;
  /** Host → host used for the dependency API only */
  apiHostRewrites: Record<string, string>;
  userAgent: string;
}

export interface UserAgentContext {
  toolName: string;
  toolVersion: string;
  /** Command the fetch runs under, e.g. "install" */
  command?: string;
  /** Names of the settings that are set */
  options: string[];
  /** Extra text from the user_agent setting */
  extra?: string;
  /** Session correlation token; random when omitted */
  sessionToken?: string;
}
