/**
 * Refresh and error-delay arithmetic for the policy controller.
 *
 * @module core/backoff
 */

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;

export interface BackoffConfig {
  /** Delay used for the first retry after an error. */
  baseDelayMs: number;
  /** Upper bound for the error delay; also the regular refresh period. */
  maxDelayMs: number;
}

export const DEFAULT_REFRESH_RATE_MS = 3 * HOUR_MS;
export const DEFAULT_ERROR_DELAY_MS = 5 * MINUTE_MS;

/** Share of the refresh rate used to spread refreshes across clients, in percent. */
export const REFRESH_DEVIATION_PERCENT = 10;
export const REFRESH_DEVIATION_MAX_MS = 30 * MINUTE_MS;

/**
 * Doubling error delay. `next()` hands out the current delay and doubles the
 * one after it, up to `maxDelayMs`.
 */
export class ErrorBackoff {
  private current: number;

  constructor(private config: BackoffConfig) {
    this.current = config.baseDelayMs;
  }

  get currentDelayMs(): number {
    return this.current;
  }

  next(): number {
    const delay = this.current;
    this.current = Math.min(this.current * 2, this.config.maxDelayMs);
    return delay;
  }

  /** Jump straight to the maximum delay. */
  saturate(): number {
    this.current = this.config.maxDelayMs;
    return this.current;
  }

  reset(): void {
    this.current = this.config.baseDelayMs;
  }

  setMaxDelay(maxDelayMs: number): void {
    this.config = { ...this.config, maxDelayMs };
    this.current = Math.min(this.current, maxDelayMs);
  }
}

/**
 * Refresh delay with a random deviation subtracted, so clients that were set
 * up together do not refresh in lock-step.
 */
export function computeRefreshDelay(refreshRateMs: number, random: () => number = Math.random): number {
  const deviation = Math.min(
    Math.floor((REFRESH_DEVIATION_PERCENT * refreshRateMs) / 100),
    REFRESH_DEVIATION_MAX_MS
  );
  return refreshRateMs - Math.floor(random() * (deviation + 1));
}
