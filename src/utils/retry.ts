// ============================================================================
// Retry Utility with Exponential Backoff
// ============================================================================

import axios from "axios";
import { logger } from "./logger";
import { errorMessage } from "./errors";

export interface RetryOptions {
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

function abortError(): Error {
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

/**
 * Sleep for specified milliseconds. Rejects with an AbortError as soon as
 * the signal fires.
 */
export const sleep: SleepFn = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(abortError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
};

/**
 * Calculate exponential backoff delay
 */
function getBackoffDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelay);
}

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelay = 1000,
    maxDelay = 10000,
    shouldRetry = () => true,
    signal,
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error)) {
        logger.debug("Error is not retryable, throwing immediately", {
          error: errorMessage(error),
        });
        throw error;
      }

      if (attempt === maxAttempts) {
        logger.warn("Max retry attempts reached", {
          attempts: maxAttempts,
          error: errorMessage(error),
        });
        throw error;
      }

      const delay = getBackoffDelay(attempt, initialDelay, maxDelay);

      logger.warn("Retry attempt failed, backing off", {
        attempt,
        maxAttempts,
        delayMs: delay,
        error: errorMessage(error),
      });

      await sleep(delay, signal);
    }
  }

  throw lastError;
}

/**
 * Determine if an HTTP error is retryable
 */
export function isRetryableHttpError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }

  // Retry on network errors
  if (error.code === "ECONNREFUSED" || error.code === "ETIMEDOUT" || error.code === "ECONNRESET") {
    return true;
  }

  // Retry on 5xx server errors and 429 rate limiting
  if (error.response) {
    const status = error.response.status;
    return status >= 500 || status === 429;
  }

  return false;
}
