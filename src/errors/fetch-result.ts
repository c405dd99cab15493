import { FetchError } from "./fetch-errors";

/**
 * Result shape handed to callers that prefer not to catch.
 * Only typed fetch failures are folded in; anything else is a bug and rethrows.
 */
export type FetchResult<T> =
  | { success: true; data: T }
  | { success: false; error: FetchError };

export async function toFetchResult<T>(operation: () => Promise<T>): Promise<FetchResult<T>> {
  try {
    return { success: true, data: await operation() };
  } catch (err) {
    if (err instanceof FetchError) {
      return { success: false, error: err };
    }
    throw err;
  }
}
