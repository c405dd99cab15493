import type { FileSystem, HttpTransport, Logger } from "#/core";
import type { RegistryLocation } from "#/registry";
import type { FetcherConfig } from "#/settings";
import type { RawSpec } from "#/specIndex";

// Whether the dependency API is used for the rest of the session
export type ApiAvailability = "unknown" | "available" | "unavailable";

// Runs an operation under the session's retry policy
export type RetryRunner = <T>(label: string, operation: () => Promise<T>) => Promise<T>;

export interface ClosureResult {
  /** Every entry returned over all rounds */
  specs: RawSpec[];
  /** Names placed into a completed batch */
  resolvedNames: Set<string>;
  /** Query rounds that issued at least one request */
  rounds: number;
}

export interface FetchSessionOptions {
  location: RegistryLocation;
  config: FetcherConfig;
  /** Source name recorded on every spec; defaults to the safe location */
  source?: string;
  transport?: HttpTransport;
  fs?: FileSystem;
  logger?: Logger;
}
