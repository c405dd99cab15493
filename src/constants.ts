/**
 * Global constants for the gem source fetcher
 */

export const TOOL_NAME = "gem-source-fetcher";
export const TOOL_VERSION = "0.4.0";

// Name of the package-manager tool as published on gem registries.
// Registry entries with this exact name are never put into an index.
export const SELF_PACKAGE_NAME = "bundler";

export const DEFAULT_REDIRECT_LIMIT = 5;
export const DEFAULT_API_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 250;

// Registry-imposed maximum number of names per dependency API request
export const API_REQUEST_LIMIT = 100;

export const DEPENDENCY_API_PATH = "api/v1/dependencies";
export const MARSHAL_SPEC_DIR = "quick/Marshal.4.8/";
export const FULL_INDEX_FILE = "specs.4.8.gz";
export const PRERELEASE_INDEX_FILE = "prerelease_specs.4.8.gz";

export const DEFAULT_PLATFORM = "ruby";

// Settings keys are stored with this prefix, e.g. BUNDLE_SSL_VERIFY_MODE
export const SETTINGS_PREFIX = "BUNDLE_";
