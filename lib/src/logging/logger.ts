/**
 * Logger Implementation
 *
 * Structured logger used by the orchestrator, the stores and the scripts.
 * Child loggers extend the `source` path and may bind context fields
 * (run id, slice bounds) that are attached to every entry.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LoggerOptions,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  LogLevel,
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
  child(source: string, fields?: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
      fields: fields ? { ...this.config.fields, ...fields } : this.config.fields,
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: unknown, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: unknown,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error || context !== undefined) {
      this.log(LogLevel.ERROR, message, context, errorOrContext);
      return;
    }
    this.log(LogLevel.ERROR, message, toContext(errorOrContext));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, context);
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

    const merged =
      this.config.fields || context
        ? { ...this.config.fields, ...context }
        : undefined;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: merged,
      source: this.config.source,
      error: error === undefined ? undefined : formatError(error),
    };

    this.output(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return this.formatJson(entry);
      case LogFormat.COMPACT:
        return this.formatCompact(entry);
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

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`);
      }
    }

    return parts.join(' ');
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevelName[entry.level],
      message: entry.message,
      source: entry.source,
      context: entry.context,
      error: entry.error,
    });
  }

  private formatCompact(entry: LogEntry): string {
    const letter = LogLevelName[entry.level].charAt(0);
    const time = entry.timestamp.toISOString().slice(11, 19);
    return `${time} ${letter} ${entry.message}`;
  }

  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [];
    const levelColor = LogLevelColors[entry.level];

    if (this.config.timestamps) {
      parts.push(
        `${LogColors.gray}[${entry.timestamp.toISOString()}]${LogColors.reset}`
      );
    }

    parts.push(`${levelColor}${LogLevelName[entry.level].padEnd(5)}${LogColors.reset}`);

    if (entry.source) {
      parts.push(`${LogColors.cyan}[${entry.source}]${LogColors.reset}`);
    }

    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(`${LogColors.dim}${JSON.stringify(entry.context)}${LogColors.reset}`);
    }

    if (entry.error) {
      parts.push(
        `\n  ${LogColors.red}Error: ${entry.error.name}: ${entry.error.message}${LogColors.reset}`
      );
      if (entry.error.stack) {
        parts.push(
          `\n  ${LogColors.gray}${entry.error.stack.replace(/\n/g, '\n  ')}${LogColors.reset}`
        );
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (!this.config.console) {
      return;
    }

    if (level === LogLevel.ERROR) {
      console.error(formatted);
    } else if (level === LogLevel.WARN) {
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

function toContext(value: unknown): Record<string, unknown> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return { detail: value };
}

// =============================================================================
// Factories
// =============================================================================

export function createLogger(source: string, config?: LoggerOptions): Logger {
  return new Logger({
    ...config,
    source,
  });
}

/**
 * Logger that drops everything. Default for library calls made without one.
 */
export function createSilentLogger(): Logger {
  return new Logger({ console: false });
}
