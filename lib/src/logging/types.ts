/**
 * Logging Types and Schemas
 *
 * Structured logging primitives shared by the engine, the API client and the
 * command-line scripts.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  /** Failures that stop an operation or lose work */
  ERROR: 0,
  /** Recoverable problems (unreadable checkpoint, skipped backup) */
  WARN: 1,
  /** Batch boundaries, checkpoint lifecycle, summaries */
  INFO: 2,
  /** Per-item outcomes and rate-limit decisions */
  DEBUG: 3,
  /** Everything else */
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

// =============================================================================
// Log Entry
// =============================================================================

export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),
  /** Per-call context merged over the logger's bound fields */
  context: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      code: z.string().optional(),
      stack: z.string().optional(),
    })
    .optional(),
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable single line */
  TEXT: 'text',
  /** One JSON object per line */
  JSON: 'json',
  /** Text with ANSI colours */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'pretty']);

export const LoggerConfigSchema = z.object({
  /**
   * Minimum log level to output
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /**
   * @default 'text'
   */
  format: LogFormatSchema.default('text'),

  /**
   * @default true
   */
  timestamps: z.boolean().default(true),

  /**
   * Only honoured by the pretty format
   * @default true
   */
  colors: z.boolean().default(true),

  source: z.string().optional(),

  /**
   * Fields attached to every entry written by this logger
   */
  bindings: z.record(z.unknown()).default({}),

  /**
   * Custom sink; replaces console output when set
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.unknown())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;
export type LoggerOptions = z.input<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(overrides?: LoggerOptions): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Colours
// =============================================================================

export const LogColors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

// =============================================================================
// Utility Functions
// =============================================================================

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  ERROR: LogLevel.ERROR,
  WARN: LogLevel.WARN,
  WARNING: LogLevel.WARN,
  INFO: LogLevel.INFO,
  DEBUG: LogLevel.DEBUG,
  TRACE: LogLevel.TRACE,
};

/**
 * Parse a log level from its name; unknown names fall back to INFO
 */
export function parseLogLevel(level: string): LogLevel {
  return LEVELS_BY_NAME[level.trim().toUpperCase()] ?? LogLevel.INFO;
}

export function getLogLevelName(level: LogLevel): LogLevelName {
  return LogLevelName[level];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Flatten an error for a log entry. Errors carrying a string `code`
 * (ours and Node's system errors) keep it.
 */
export function formatError(
  error: unknown
): { name: string; message: string; code?: string; stack?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined ? { code } : {}),
      stack: error.stack,
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
