/**
 * Fetcher module
 *
 * Dependency API closure, full index fallback, per-file specs and the
 * session that chooses between them.
 */

export * from "./fetcher.types";
export { FetchSession, safeFetchSpecs, apiFetchUri } from "./session";
export { DependencyApiFetcher, chunk, type DependencyApiFetcherOptions } from "./dependency-api";
export { FullIndexFetcher, classifyFullIndexFailure, type FullIndexFetcherOptions } from "./full-index";
export { SpecFileFetcher, specFileName, type SpecFileFetcherOptions } from "./spec-file";
export { decodeDependencyApi, decodeFullIndex, decodeGemspec } from "./decode";
