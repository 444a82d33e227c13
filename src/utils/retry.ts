import type { Logger } from "./logger.js";
import { getErrorMessage, getHttpStatus } from "./errors.js";

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Patterns that indicate transient/retryable errors
 */
export const TRANSIENT_ERROR_PATTERNS: RegExp[] = [
  /\b5\d{2}\b/, // 5xx server errors
  /\b429\b/, // rate limiting
  /ECONNRESET/i,
  /ETIMEDOUT/i,
  /ECONNREFUSED/i,
  /EPIPE/i,
  /socket hang up/i,
  /network/i,
  /timeout/i,
  /timed out/i,
  /temporarily unavailable/i,
  /service unavailable/i,
];

export function isTransientError(error: unknown): boolean {
  const message = getErrorMessage(error);
  return TRANSIENT_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

/** Retry on a retryable HTTP status when one is present, otherwise on the message. */
export function isRetryableError(error: unknown): boolean {
  const status = getHttpStatus(error);
  if (status !== undefined) return isRetryableStatus(status);
  return isTransientError(error);
}

export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(delay, config.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Total attempts (as configured by OPENAI_RETRY_ATTEMPTS) to a RetryConfig. */
export function retryConfigForAttempts(
  attempts: number,
  base: RetryConfig = DEFAULT_RETRY_CONFIG
): RetryConfig {
  return { ...base, maxRetries: Math.max(0, Math.floor(attempts) - 1) };
}

/**
 * Executes `fn` with exponential backoff.
 *
 * @param shouldRetry - decides whether a failure is worth another attempt
 * @param operationName - used in log lines
 * @throws the last error once retries are exhausted, or the first non-retryable one
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (error: unknown) => boolean = isRetryableError,
  operationName = "operation",
  log?: Logger
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error)) throw error;

      if (attempt < config.maxRetries) {
        const delay = calculateBackoffDelay(attempt, config);
        log?.warn(
          { err: error, attempt: attempt + 1, maxAttempts: config.maxRetries + 1, delay },
          `${operationName} failed, retrying in ${delay}ms`
        );
        await sleep(delay);
      }
    }
  }

  log?.error({ err: lastError }, `${operationName} failed after ${config.maxRetries + 1} attempts`);
  throw lastError;
}
