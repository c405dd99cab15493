/**
 * gem-source-fetcher
 *
 * Remote spec fetching for gem registries: dependency API closure,
 * full index fallback and per-file specs.
 * Portable, testable, dependency-injected.
 */

// Core interfaces
export * from '#/core';

// Constants (wire paths, defaults)
export * from '#/constants';

// Errors (fetch failure taxonomy)
export * from '#/errors';

// Friendly errors (settings parsing)
export * from '#/friendly-errors';

// Schemas (Zod validation)
export * from '#/schemas';

// Settings (layered settings, FetcherConfig)
export * from '#/settings';

// Version (ordering, requirements)
export * from '#/version';

// Marshal (binary decoding)
export * from '#/marshal';

// Registry (locations, mirrors, credentials)
export * from '#/registry';

// HTTP (connections, requests, redirects)
export * from '#/http';

// Retry policy
export * from '#/retry';

// Spec index (package specs, index)
export * from '#/specIndex';

// Fetcher (sessions)
export * from '#/fetcher';
