import { errAsync, ResultAsync } from "neverthrow";
import { logger, sleep as defaultSleep, type Sleep } from "@grid-bot/utils";

import type { GatewayError } from "../ports";

export interface RetryOptions {
  /** Label for logging */
  operation: string;
  maxAttempts: number;
  baseDelayMs: number;
  shouldRetry: (error: GatewayError) => boolean;
  sleep?: Sleep;
}

/**
 * Re-run `run` with exponential backoff (base × 2^attempt) while the error is
 * retryable and attempts remain. The last error is returned as-is.
 */
export function withRetry<T>(run: () => ResultAsync<T, GatewayError>, options: RetryOptions): ResultAsync<T, GatewayError> {
  const wait = options.sleep ?? defaultSleep;

  const attempt = (n: number): ResultAsync<T, GatewayError> =>
    run().orElse((error): ResultAsync<T, GatewayError> => {
      if (n + 1 >= options.maxAttempts || !options.shouldRetry(error)) {
        return errAsync(error);
      }
      const delayMs = options.baseDelayMs * 2 ** n;
      logger.warn(`${options.operation} failed, retrying`, {
        attempt: n + 1,
        delayMs,
        errorType: error.type,
        error: error.message,
      });
      return ResultAsync.fromSafePromise(wait(delayMs)).andThen(() => attempt(n + 1));
    });

  return attempt(0);
}
