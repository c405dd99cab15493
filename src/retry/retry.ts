/**
 * Retry policy
 *
 * Bounded attempts with a short constant delay. Failures of an abort kind
 * are rethrown after the first call; further attempts cannot change them.
 */

import pRetry, { AbortError } from "p-retry";
import type { Logger } from "#/core";
import { AUTHENTICATION_FAILURES, isFetchError, type FetchFailureKind } from "#/errors";
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_RETRY_DELAY_MS } from "#/constants";

export interface RetryOptions {
  /** Failure kinds rethrown without another attempt */
  abortOn?: readonly FetchFailureKind[];
  /** Total number of calls, including the first */
  maxAttempts?: number;
  delayMs?: number;
  /** Name of the operation in log lines */
  label?: string;
  logger?: Logger;
}

export async function attempt<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const abortOn = options.abortOn ?? AUTHENTICATION_FAILURES;
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const delayMs = options.delayMs ?? DEFAULT_RETRY_DELAY_MS;
  const label = options.label ?? "request";

  return pRetry(
    async () => {
      try {
        return await operation();
      } catch (error) {
        if (isFetchError(error, ...abortOn)) {
          throw new AbortError(error);
        }
        throw error;
      }
    },
    {
      retries: maxAttempts - 1,
      factor: 1,
      minTimeout: delayMs,
      maxTimeout: delayMs,
      randomize: false,
      onFailedAttempt: (failure) => {
        if (failure.retriesLeft > 0) {
          options.logger?.debug(
            `Retrying ${label} (attempt ${failure.attemptNumber + 1} of ${maxAttempts}): ${failure.message}`
          );
        }
      },
    }
  );
}
