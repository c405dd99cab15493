export * from "./fetch-errors";
export { toFetchResult, type FetchResult } from "./fetch-result";
