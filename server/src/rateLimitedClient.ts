import { ApiClient, type ApiClientOptions } from './apiClient.js';
import { log } from './logging.js';
import { MinIntervalLimiter, type Clock } from './rateLimiter.js';

export interface RateLimitedClientOptions extends ApiClientOptions {
  /** Minimum gap between two requests from this instance. */
  minIntervalMs?: number;
  /** Fixed wait after a 429, regardless of Retry-After. */
  cooldownMs?: number;
  clock?: Clock;
}

export const DEFAULT_MIN_INTERVAL_MS = 1000;
export const DEFAULT_COOLDOWN_MS = 2000;
export const DEFAULT_RATE_LIMIT_RETRIES = 3;

/**
 * Base for catalogs with a hard request-rate policy. Every attempt, retries
 * included, first waits on the instance's limiter.
 */
export abstract class RateLimitedApiClient extends ApiClient {
  readonly limiter: MinIntervalLimiter;
  readonly cooldownMs: number;

  constructor(options: RateLimitedClientOptions) {
    super({ ...options, maxRateLimitRetries: options.maxRateLimitRetries ?? DEFAULT_RATE_LIMIT_RETRIES });
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.limiter = new MinIntervalLimiter({
      intervalMs: options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS,
      clock: options.clock,
      sleep: this.sleep,
    });
  }

  protected override async beforeAttempt(): Promise<void> {
    const before = this.limiter.lastRequestTime;
    await this.limiter.wait();
    if (before !== null) {
      log('debug', `${this.label}: rate limiter released after ${(this.limiter.lastRequestTime ?? before) - before}ms`);
    }
  }

  protected override rateLimitCooldownMs(): number {
    return this.cooldownMs;
  }
}
