/**
 * Settings
 *
 * Layered, read-only key/value settings. Keys are written dotted
 * ("ssl_verify_mode", "gems.example.com", "mirror.https://rubygems.org/")
 * and stored as BUNDLE_* names, so settings files and environment variables
 * share one namespace.
 */

import { randomBytes } from "crypto";
import type { FileSystem, SettingsSource } from "#/core";
import { safeParseYaml, settingsError, type ParseResult } from "#/friendly-errors";
import { FetcherSettingsSchema, SettingsFileSchema, type SettingsFile } from "#/schemas";
import {
  API_REQUEST_LIMIT,
  DEFAULT_API_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_REDIRECT_LIMIT,
  DEFAULT_RETRY_DELAY_MS,
  SELF_PACKAGE_NAME,
  SETTINGS_PREFIX,
  TOOL_NAME,
  TOOL_VERSION,
} from "#/constants";
import type { FetcherConfig, UserAgentContext, VerifyMode } from "./settings.types";

/**
 * Stored name for a dotted key: "gems.example.com" → "BUNDLE_GEMS__EXAMPLE__COM"
 */
export function settingsKeyFor(key: string): string {
  return `${SETTINGS_PREFIX}${key.replace(/\./g, "__").toUpperCase()}`;
}

/**
 * Dotted name for a stored key: "BUNDLE_SSL_CA_CERT" → "ssl_ca_cert"
 */
export function dottedKeyFor(storedKey: string): string {
  return storedKey.slice(SETTINGS_PREFIX.length).replace(/__/g, ".").toLowerCase();
}

/**
 * Create a settings source from stored-form layers. Earlier layers win.
 */
export function createSettingsSource(...layers: SettingsFile[]): SettingsSource {
  return {
    get(key: string): string | undefined {
      const stored = settingsKeyFor(key);
      for (const layer of layers) {
        const value = layer[stored];
        if (value !== undefined) return value;
      }
      return undefined;
    },

    all(): string[] {
      const names = new Set<string>();
      for (const layer of layers) {
        for (const key of Object.keys(layer)) {
          if (key.startsWith(SETTINGS_PREFIX)) names.add(dottedKeyFor(key));
        }
      }
      return [...names].sort();
    },
  };
}

/**
 * Settings layer from environment variables (BUNDLE_* only).
 */
export function settingsFromEnv(env: Record<string, string | undefined>): SettingsFile {
  const layer: SettingsFile = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(SETTINGS_PREFIX) && value !== undefined) {
      layer[key] = value;
    }
  }
  return layer;
}

/**
 * Load a YAML settings file. A missing file is an empty layer.
 */
export function loadSettingsFile(fs: FileSystem, path: string): ParseResult<SettingsFile> {
  if (!fs.exists(path)) {
    return { success: true, data: {} };
  }
  return safeParseYaml(fs.readFile(path), SettingsFileSchema, path);
}

const SETTINGS_KEYS = [
  "ssl_verify_mode",
  "ssl_client_cert",
  "ssl_ca_cert",
  "disable_endpoint",
  "redirect_limit",
  "timeout",
  "retry",
  "user_agent",
] as const;

export const DEFAULT_FETCHER_CONFIG: FetcherConfig = {
  redirectLimit: DEFAULT_REDIRECT_LIMIT,
  timeoutMs: DEFAULT_API_TIMEOUT_MS,
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  retryDelayMs: DEFAULT_RETRY_DELAY_MS,
  apiRequestLimit: API_REQUEST_LIMIT,
  disableEndpoint: false,
  tls: {},
  specCacheDirs: [],
  selfPackageName: SELF_PACKAGE_NAME,
  apiHostRewrites: {},
  userAgent: `${TOOL_NAME}/${TOOL_VERSION}`,
};

/**
 * Build the identifying client string sent as User-Agent.
 *
 * @example
 * "gem-source-fetcher/0.4.0 node/v20.11.0 (linux-x64) command/install options/retry,timeout 1f2e3d4c5b6a7980"
 */
export function buildUserAgent(context: UserAgentContext): string {
  const parts = [
    `${context.toolName}/${context.toolVersion}`,
    `node/${process.version}`,
    `(${process.platform}-${process.arch})`,
    `command/${context.command ?? "none"}`,
    `options/${context.options.join(",")}`,
    context.sessionToken ?? randomBytes(8).toString("hex"),
  ];
  if (context.extra) {
    parts.push(context.extra);
  }
  return parts.join(" ");
}

function verifyModeFor(setting: number | undefined): VerifyMode | undefined {
  if (setting === undefined) return undefined;
  return setting === 0 ? "none" : "peer";
}

export interface ReadFetcherConfigOptions {
  command?: string;
  sessionToken?: string;
  overrides?: Partial<FetcherConfig>;
}

/**
 * Resolve the FetcherConfig from settings. Invalid values are reported with
 * the setting's name rather than silently replaced by defaults.
 */
export function readFetcherConfig(
  settings: SettingsSource,
  options: ReadFetcherConfigOptions = {}
): ParseResult<FetcherConfig> {
  const raw = Object.fromEntries(
    SETTINGS_KEYS.map((key) => [key, settings.get(key)] as const).filter(([, value]) => value !== undefined)
  );

  const parsed = FetcherSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, error: settingsError("Invalid fetcher settings", parsed.error) };
  }

  const values = parsed.data;
  const userAgent = buildUserAgent({
    toolName: TOOL_NAME,
    toolVersion: TOOL_VERSION,
    command: options.command,
    options: settings.all(),
    extra: values.user_agent,
    sessionToken: options.sessionToken,
  });

  const config: FetcherConfig = {
    ...DEFAULT_FETCHER_CONFIG,
    redirectLimit: values.redirect_limit ?? DEFAULT_FETCHER_CONFIG.redirectLimit,
    timeoutMs: values.timeout !== undefined ? values.timeout * 1000 : DEFAULT_FETCHER_CONFIG.timeoutMs,
    maxAttempts: values.retry !== undefined ? values.retry + 1 : DEFAULT_FETCHER_CONFIG.maxAttempts,
    disableEndpoint: values.disable_endpoint ?? false,
    tls: {
      verifyMode: verifyModeFor(values.ssl_verify_mode),
      caCert: values.ssl_ca_cert,
      clientCert: values.ssl_client_cert,
    },
    userAgent,
    ...options.overrides,
  };

  return { success: true, data: config };
}
