import OpenAI from "openai";
import type { AppConfig } from "../config/env.js";
import type { Logger } from "../utils/logger.js";
import { SlidingWindowRateLimiter } from "../utils/rate_limiter.js";
import { isRetryableError, retryConfigForAttempts, withRetry, type RetryConfig } from "../utils/retry.js";

const OPENAI_LIMITER_KEY = "openai";

/**
 * Admission and retry rules shared by every outbound model call:
 * wait for a slot in the per-minute window, then retry 429/5xx/connection
 * failures with exponential backoff.
 */
export class OpenAICallPolicy {
  constructor(
    readonly limiter: SlidingWindowRateLimiter,
    readonly retry: RetryConfig,
    private readonly log: Logger
  ) {}

  static fromConfig(config: AppConfig["openai"], log: Logger): OpenAICallPolicy {
    return new OpenAICallPolicy(
      new SlidingWindowRateLimiter({ limit: config.rateLimitRpm, windowMs: 60_000 }),
      retryConfigForAttempts(config.retryAttempts),
      log
    );
  }

  run<T>(operationName: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        await this.limiter.wait(OPENAI_LIMITER_KEY);
        return fn();
      },
      this.retry,
      isRetryableError,
      operationName,
      this.log
    );
  }
}

// The SDK's own retries are disabled; OpenAICallPolicy owns them.
export const createOpenAIClient = (config: AppConfig["openai"]): OpenAI =>
  new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
