/**
 * Engine Configuration
 *
 * Settings for the batch engine, read from environment variables with
 * defaults suited to a single operator running from a working directory.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { LogFormatSchema, LogLevel, parseLogLevel } from '../logging/index.js';
import { RateGovernorConfigSchema, type RateGovernorOptions } from '../rate-limit/index.js';

// ============================================================================
// Schemas
// ============================================================================

export const EnvironmentSchema = z.enum(['dev', 'prod']);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const EngineConfigSchema = z.object({
  /** Directory holding one JSON document per checkpoint */
  checkpointDir: z.string().min(1).default('.checkpoints'),

  /** Fixed batch size; derived from the item count when unset */
  batchSize: z.number().int().positive().optional(),

  logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),

  logFormat: LogFormatSchema.default('pretty'),

  /** Overrides for the rate governor; unset fields keep its defaults */
  rateLimit: z.record(z.number()).default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const ApiConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//.test(value), { message: 'Must be an http(s) URL' }),
  token: z.string().min(1),
  /** Request timeout in milliseconds */
  timeoutMs: z.number().int().positive().default(30000),
});

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

type Env = Record<string, string | undefined>;

/** Environment variable → rate governor option */
const RATE_LIMIT_VARIABLES = {
  USERBATCH_MIN_INTERVAL_MS: 'minIntervalMs',
  USERBATCH_DEFAULT_INTERVAL_MS: 'defaultIntervalMs',
  USERBATCH_CAUTIOUS_INTERVAL_MS: 'cautiousIntervalMs',
  USERBATCH_MAX_BACKOFF_MS: 'maxBackoffMs',
  USERBATCH_MAX_CONSECUTIVE_429S: 'maxConsecutive429s',
} as const;

// ============================================================================
// Loading
// ============================================================================

/**
 * Loads engine configuration from environment variables.
 *
 * Environment variables:
 * - USERBATCH_CHECKPOINT_DIR: checkpoint directory (default: .checkpoints)
 * - USERBATCH_BATCH_SIZE: fixed batch size (default: derived from item count)
 * - USERBATCH_LOG_LEVEL: error | warn | info | debug | trace (default: info)
 * - USERBATCH_LOG_FORMAT: text | json | pretty (default: pretty)
 * - USERBATCH_*_INTERVAL_MS, USERBATCH_MAX_BACKOFF_MS,
 *   USERBATCH_MAX_CONSECUTIVE_429S: rate governor overrides
 *
 * @throws {ConfigurationError} when a value does not parse
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const rateLimit: Record<string, number> = {};
  for (const [variable, option] of Object.entries(RATE_LIMIT_VARIABLES)) {
    const value = readNumber(env, variable);
    if (value !== undefined) {
      rateLimit[option] = value;
    }
  }

  const logFormat = env['USERBATCH_LOG_FORMAT'];
  const parsed = EngineConfigSchema.safeParse({
    checkpointDir: env['USERBATCH_CHECKPOINT_DIR'] || undefined,
    batchSize: readNumber(env, 'USERBATCH_BATCH_SIZE'),
    logLevel: env['USERBATCH_LOG_LEVEL'] ? parseLogLevel(env['USERBATCH_LOG_LEVEL']) : undefined,
    logFormat: logFormat ? logFormat.toLowerCase() : undefined,
    rateLimit,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path[0];
    throw new ConfigurationError(
      `Invalid engine configuration: ${issue?.message ?? 'unknown error'}`,
      typeof field === 'string' ? variableForField(field) : undefined
    );
  }

  const governor = RateGovernorConfigSchema.safeParse(parsed.data.rateLimit);
  if (!governor.success) {
    throw new ConfigurationError(
      `Invalid rate limit configuration: ${governor.error.issues[0]?.message ?? 'unknown error'}`
    );
  }

  return parsed.data;
}

/**
 * Rate governor options from the loaded configuration
 */
export function getRateGovernorOptions(config: EngineConfig): RateGovernorOptions {
  return RateGovernorConfigSchema.parse(config.rateLimit);
}

/**
 * Remote API settings for an environment. The dev environment reads
 * DEV_-prefixed variables first.
 *
 * @throws {ConfigurationError} when the base URL or token is missing or invalid
 */
export function resolveApiConfig(environment: Environment, env: Env = process.env): ApiConfig {
  const read = (name: string): string | undefined => {
    const value = environment === 'dev' ? env[`DEV_${name}`] || env[name] : env[name];
    return value || undefined;
  };

  const baseUrl = read('USERBATCH_API_BASE_URL');
  if (baseUrl === undefined) {
    throw new ConfigurationError(
      `USERBATCH_API_BASE_URL is not set for environment "${environment}"`,
      'USERBATCH_API_BASE_URL'
    );
  }

  const token = read('USERBATCH_API_TOKEN');
  if (token === undefined) {
    throw new ConfigurationError(
      `USERBATCH_API_TOKEN is not set for environment "${environment}"`,
      'USERBATCH_API_TOKEN'
    );
  }

  const parsed = ApiConfigSchema.safeParse({
    baseUrl: baseUrl.replace(/\/+$/, ''),
    token,
    timeoutMs: readNumber(env, 'USERBATCH_API_TIMEOUT_MS'),
  });
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path[0];
    throw new ConfigurationError(
      `Invalid API configuration: ${parsed.error.issues[0]?.message ?? 'unknown error'}`,
      field === 'timeoutMs' ? 'USERBATCH_API_TIMEOUT_MS' : 'USERBATCH_API_BASE_URL'
    );
  }
  return parsed.data;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Batch size scaled to the size of the run
 */
export function getOptimalBatchSize(totalItems: number): number {
  if (totalItems <= 100) {
    return 10;
  }
  if (totalItems <= 1000) {
    return 50;
  }
  return 100;
}

function readNumber(env: Env, variable: string): number | undefined {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${variable} must be a number, got "${raw}"`, variable);
  }
  return value;
}

function variableForField(field: string): string | undefined {
  switch (field) {
    case 'checkpointDir':
      return 'USERBATCH_CHECKPOINT_DIR';
    case 'batchSize':
      return 'USERBATCH_BATCH_SIZE';
    case 'logFormat':
      return 'USERBATCH_LOG_FORMAT';
    case 'logLevel':
      return 'USERBATCH_LOG_LEVEL';
    default:
      return undefined;
  }
}
