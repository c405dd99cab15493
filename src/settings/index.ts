/**
 * Settings module
 *
 * Layered key/value settings and the FetcherConfig resolved from them.
 */

export * from "./settings.types";
export {
  settingsKeyFor,
  dottedKeyFor,
  createSettingsSource,
  settingsFromEnv,
  loadSettingsFile,
  buildUserAgent,
  readFetcherConfig,
  DEFAULT_FETCHER_CONFIG,
  type ReadFetcherConfigOptions,
} from "./settings";
