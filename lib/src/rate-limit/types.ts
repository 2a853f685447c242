/**
 * Rate Governor Types
 *
 * Pacing configuration and the process-local view of the remote quota.
 * All durations are in milliseconds.
 */

import { z } from 'zod';

// ============================================================================
// Thresholds
// ============================================================================

/** Above this share of quota left, calls may go slightly faster than default */
export const HIGH_HEADROOM_THRESHOLD = 0.7;

/** At or below this share, use the cautious interval */
export const LOW_HEADROOM_THRESHOLD = 0.2;

/** At or below this share, wait for the quota window to reset */
export const CRITICAL_HEADROOM_THRESHOLD = 0.1;

// ============================================================================
// Configuration
// ============================================================================

export const RateGovernorConfigSchema = z
  .object({
    /** Absolute floor; no computed interval goes below it */
    minIntervalMs: z.number().min(0).default(400),
    /** Interval used with plenty of headroom */
    fastIntervalMs: z.number().min(0).default(400),
    defaultIntervalMs: z.number().min(0).default(500),
    cautiousIntervalMs: z.number().min(0).default(1000),
    /** Added to the time-until-reset when the quota is nearly exhausted */
    resetBufferMs: z.number().min(0).default(500),
    initialBackoffMs: z.number().positive().default(2000),
    backoffMultiplier: z.number().min(1).default(2),
    maxBackoffMs: z.number().positive().default(60000),
    /** Upper bound of the uniform jitter, as a fraction of the backoff */
    jitterFactor: z.number().min(0).max(1).default(0.25),
    maxConsecutive429s: z.number().int().positive().default(5),
    /**
     * Never go faster than the default interval. Used for destructive
     * operations.
     */
    conservative: z.boolean().default(false),
  })
  .refine((c) => c.fastIntervalMs <= c.defaultIntervalMs, {
    message: 'fastIntervalMs must not exceed defaultIntervalMs',
    path: ['fastIntervalMs'],
  })
  .refine((c) => c.defaultIntervalMs <= c.cautiousIntervalMs, {
    message: 'defaultIntervalMs must not exceed cautiousIntervalMs',
    path: ['defaultIntervalMs'],
  })
  .refine((c) => c.initialBackoffMs <= c.maxBackoffMs, {
    message: 'initialBackoffMs must not exceed maxBackoffMs',
    path: ['initialBackoffMs'],
  });

export type RateGovernorConfig = z.infer<typeof RateGovernorConfigSchema>;
export type RateGovernorOptions = z.input<typeof RateGovernorConfigSchema>;

export const DEFAULT_RATE_GOVERNOR_CONFIG: RateGovernorConfig =
  RateGovernorConfigSchema.parse({});

// ============================================================================
// State
// ============================================================================

/**
 * Quota as last reported by the remote service. Never persisted: a resumed
 * run starts optimistic until the first response recalibrates it.
 */
export interface RateLimitState {
  remaining: number | null;
  limit: number | null;
  /** Epoch seconds */
  resetAt: number | null;
  consecutive429s: number;
  currentBackoffMs: number;
  /** Epoch milliseconds */
  lastRequestAt: number | null;
}

export function createInitialRateLimitState(
  config: RateGovernorConfig = DEFAULT_RATE_GOVERNOR_CONFIG
): RateLimitState {
  return {
    remaining: null,
    limit: null,
    resetAt: null,
    consecutive429s: 0,
    currentBackoffMs: config.initialBackoffMs,
    lastRequestAt: null,
  };
}

/**
 * Injectable timing primitives, so tests never really sleep
 */
export interface GovernorClock {
  sleep: (ms: number) => Promise<void>;
  now: () => number;
  /** Uniform in [0, 1) */
  random: () => number;
}

export const RateLimitHeader = {
  LIMIT: 'x-ratelimit-limit',
  REMAINING: 'x-ratelimit-remaining',
  RESET: 'x-ratelimit-reset',
} as const;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Pre-jitter backoff intervals for `count` consecutive 429 responses
 */
export function backoffSchedule(
  count: number,
  config: Pick<RateGovernorConfig, 'initialBackoffMs' | 'backoffMultiplier' | 'maxBackoffMs'> =
    DEFAULT_RATE_GOVERNOR_CONFIG
): number[] {
  const schedule: number[] = [];
  let backoff = config.initialBackoffMs;

  for (let i = 0; i < count; i++) {
    schedule.push(Math.min(backoff, config.maxBackoffMs));
    backoff = Math.min(backoff * config.backoffMultiplier, config.maxBackoffMs);
  }

  return schedule;
}
