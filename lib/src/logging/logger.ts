/**
 * Logger Implementation
 *
 * Leveled, structured logger. A child logger extends the parent's source
 * (`engine:batch`) and can bind fields such as the operation name or the
 * checkpoint id so that every line it writes carries them.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LoggerOptions,
  type LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  LogLevel as LogLevelEnum,
  LogFormat,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config?: LoggerOptions) {
    this.config = createDefaultLoggerConfig(config);
  }

  /**
   * Create a child logger with a nested source and extra bound fields
   */
  child(source: string, bindings?: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
      bindings: { ...this.config.bindings, ...bindings },
    });
  }

  /**
   * Same source, additional bound fields
   */
  with(bindings: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      bindings: { ...this.config.bindings, ...bindings },
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: unknown, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: unknown,
    context?: Record<string, unknown>
  ): void {
    if (context === undefined && isContextRecord(errorOrContext)) {
      this.log(LogLevelEnum.ERROR, message, errorOrContext);
      return;
    }
    this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const merged = { ...this.config.bindings, ...context };
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(merged).length > 0 ? merged : undefined,
      source: this.config.source,
      error: error !== undefined ? formatError(error) : undefined,
    };

    this.output(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return this.formatJson(entry);
      case LogFormat.PRETTY:
        return this.config.colors ? this.formatPretty(entry) : this.formatText(entry);
      case LogFormat.TEXT:
      default:
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }
    parts.push(LogLevelName[entry.level].padEnd(5));
    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }
    parts.push(entry.message);
    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(`\n  Error: ${entry.error.name}${code}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevelName[entry.level],
      source: entry.source,
      message: entry.message,
      ...entry.context,
      error: entry.error,
    });
  }

  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [];
    const levelColor = LogLevelColors[entry.level];

    if (this.config.timestamps) {
      // HH:MM:SS is enough on a terminal
      parts.push(`${LogColors.gray}${entry.timestamp.toISOString().slice(11, 19)}${LogColors.reset}`);
    }
    parts.push(`${levelColor}${LogLevelName[entry.level].padEnd(5)}${LogColors.reset}`);
    if (entry.source) {
      parts.push(`${LogColors.cyan}[${entry.source}]${LogColors.reset}`);
    }
    parts.push(entry.message);
    if (entry.context) {
      parts.push(`${LogColors.dim}${JSON.stringify(entry.context)}${LogColors.reset}`);
    }
    if (entry.error) {
      parts.push(
        `\n  ${LogColors.red}${entry.error.name}: ${entry.error.message}${LogColors.reset}`
      );
      if (entry.error.stack && this.config.level >= LogLevelEnum.DEBUG) {
        parts.push(`\n  ${LogColors.gray}${entry.error.stack.replace(/\n/g, '\n  ')}${LogColors.reset}`);
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (level === LogLevelEnum.ERROR) {
      console.error(formatted);
    } else if (level === LogLevelEnum.WARN) {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }
}

function isContextRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Error) &&
    !Array.isArray(value)
  );
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      level: LogLevelEnum.INFO,
      format: 'pretty',
    });
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

/**
 * Create a logger with a specific source
 */
export function createLogger(source: string, config?: LoggerOptions): Logger {
  return new Logger({
    ...config,
    source,
  });
}

/**
 * Child of the global logger; used as the default by every engine component
 */
export function getComponentLogger(
  source: string,
  bindings?: Record<string, unknown>
): Logger {
  return getGlobalLogger().child(source, bindings);
}
