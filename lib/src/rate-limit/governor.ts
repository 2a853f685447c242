/**
 * Rate Governor
 *
 * Decides how long to wait before each outbound call, from the quota headroom
 * the remote service reports in its response headers, and backs off
 * exponentially (with jitter) on 429 responses.
 */

import { RateLimitExceededError } from '../errors/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';
import {
  CRITICAL_HEADROOM_THRESHOLD,
  HIGH_HEADROOM_THRESHOLD,
  LOW_HEADROOM_THRESHOLD,
  RateGovernorConfigSchema,
  RateLimitHeader,
  createInitialRateLimitState,
  type GovernorClock,
  type RateGovernorConfig,
  type RateGovernorOptions,
  type RateLimitState,
} from './types.js';

export type HeaderBag = Record<string, unknown>;

export interface RateGovernorDeps extends Partial<GovernorClock> {
  logger?: Logger;
}

const defaultClock: GovernorClock = {
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  now: () => Date.now(),
  random: () => Math.random(),
};

export class RateGovernor {
  private readonly config: RateGovernorConfig;
  private readonly clock: GovernorClock;
  private readonly logger: Logger;
  private state: RateLimitState;

  constructor(options?: RateGovernorOptions, deps: RateGovernorDeps = {}) {
    this.config = RateGovernorConfigSchema.parse(options ?? {});
    this.clock = {
      sleep: deps.sleep ?? defaultClock.sleep,
      now: deps.now ?? defaultClock.now,
      random: deps.random ?? defaultClock.random,
    };
    this.logger = deps.logger ?? getComponentLogger('rate-governor');
    this.state = createInitialRateLimitState(this.config);
  }

  /**
   * Record quota headers from a response. Each header is read on its own;
   * missing or unparseable values leave the previous reading in place.
   */
  updateFromHeaders(headers: HeaderBag): void {
    const normalized = normalizeHeaders(headers);

    const remaining = parseIntegerHeader(normalized[RateLimitHeader.REMAINING]);
    if (remaining !== null) {
      this.state.remaining = remaining;
    }

    const limit = parseIntegerHeader(normalized[RateLimitHeader.LIMIT]);
    if (limit !== null) {
      this.state.limit = limit;
    }

    const resetAt = parseIntegerHeader(normalized[RateLimitHeader.RESET]);
    if (resetAt !== null) {
      this.state.resetAt = resetAt;
    }
  }

  /**
   * Share of the quota window still available, or null when unknown
   */
  getHeadroom(): number | null {
    const { remaining, limit } = this.state;
    if (remaining === null || limit === null || limit === 0) {
      return null;
    }
    return remaining / limit;
  }

  /**
   * Interval to wait before the next call
   */
  calculateInterval(): number {
    const adaptive = this.calculateAdaptiveInterval();
    if (this.config.conservative) {
      return Math.max(this.config.defaultIntervalMs, adaptive);
    }
    return adaptive;
  }

  private calculateAdaptiveInterval(): number {
    const headroom = this.getHeadroom();

    if (headroom === null) {
      return this.config.defaultIntervalMs;
    }
    if (headroom > HIGH_HEADROOM_THRESHOLD) {
      return Math.max(this.config.fastIntervalMs, this.config.minIntervalMs);
    }
    if (headroom > LOW_HEADROOM_THRESHOLD) {
      return this.config.defaultIntervalMs;
    }
    if (headroom > CRITICAL_HEADROOM_THRESHOLD) {
      return this.config.cautiousIntervalMs;
    }
    return this.calculateWaitForReset();
  }

  private calculateWaitForReset(): number {
    if (this.state.resetAt === null) {
      return this.config.cautiousIntervalMs;
    }

    const waitMs = this.state.resetAt * 1000 - this.clock.now();
    if (waitMs <= 0) {
      return this.config.cautiousIntervalMs;
    }
    return waitMs + this.config.resetBufferMs;
  }

  /**
   * Sleep for the computed interval. Headers from the previous response, when
   * given, are recorded first.
   */
  async waitBeforeNextCall(headers?: HeaderBag): Promise<number> {
    if (headers) {
      this.updateFromHeaders(headers);
    }

    const intervalMs = this.calculateInterval();
    const headroom = this.getHeadroom();
    if (headroom !== null && headroom <= LOW_HEADROOM_THRESHOLD) {
      this.logger.warn(this.getStatusSummary(), { waitMs: Math.round(intervalMs) });
    }

    await this.clock.sleep(intervalMs);
    this.state.lastRequestAt = this.clock.now();
    return intervalMs;
  }

  /**
   * Register a 429 and return the backoff to sleep before retrying.
   *
   * @throws {RateLimitExceededError} on reaching the consecutive-429 limit
   */
  handleRateLimited(): number {
    this.state.consecutive429s += 1;

    if (this.state.consecutive429s >= this.config.maxConsecutive429s) {
      throw new RateLimitExceededError(this.state.consecutive429s);
    }

    const base = Math.min(this.state.currentBackoffMs, this.config.maxBackoffMs);
    const jitter = this.clock.random() * base * this.config.jitterFactor;

    this.state.currentBackoffMs = Math.min(
      this.state.currentBackoffMs * this.config.backoffMultiplier,
      this.config.maxBackoffMs
    );

    this.logger.warn('Rate limited by remote service, backing off', {
      attempt: this.state.consecutive429s,
      backoffMs: Math.round(base + jitter),
    });

    return base + jitter;
  }

  /**
   * handleRateLimited() followed by the sleep
   */
  async backoff(headers?: HeaderBag): Promise<number> {
    if (headers) {
      this.updateFromHeaders(headers);
    }
    const sleepMs = this.handleRateLimited();
    await this.clock.sleep(sleepMs);
    return sleepMs;
  }

  /**
   * Any non-429 response clears the backoff
   */
  recordResponse(headers?: HeaderBag): void {
    if (headers) {
      this.updateFromHeaders(headers);
    }
    this.state.consecutive429s = 0;
    this.state.currentBackoffMs = this.config.initialBackoffMs;
  }

  getStatusSummary(): string {
    const headroom = this.getHeadroom();
    if (headroom === null) {
      return 'Rate limit status: unknown';
    }

    const quota = `${this.state.remaining ?? 0}/${this.state.limit ?? 0} (${Math.round(headroom * 100)}%)`;
    if (headroom <= CRITICAL_HEADROOM_THRESHOLD) {
      return `Rate limit CRITICAL: ${quota} - waiting for reset`;
    }
    if (headroom <= LOW_HEADROOM_THRESHOLD) {
      return `Rate limit LOW: ${quota} - slowing down`;
    }
    return `Rate limit OK: ${quota}`;
  }

  getState(): Readonly<RateLimitState> {
    return { ...this.state };
  }

  getConfig(): Readonly<RateGovernorConfig> {
    return this.config;
  }

  isConservative(): boolean {
    return this.config.conservative;
  }
}

// ============================================================================
// Header Parsing
// ============================================================================

function normalizeHeaders(headers: HeaderBag): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(headers)) {
    normalized[key.toLowerCase()] = Array.isArray(value) ? value[0] : value;
  }
  return normalized;
}

function parseIntegerHeader(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value !== 'string' || !/^\s*-?\d+\s*$/.test(value)) {
    return null;
  }
  return parseInt(value, 10);
}

/**
 * Governor for an operation type. Destructive operations run conservatively.
 */
export function createRateGovernor(
  destructive: boolean,
  options?: RateGovernorOptions,
  deps?: RateGovernorDeps
): RateGovernor {
  return new RateGovernor({ ...options, conservative: destructive || options?.conservative === true }, deps);
}
