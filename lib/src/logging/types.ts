/**
 * Logging Types and Schemas
 *
 * Structured logging for retry runs: levels, output formats and
 * logger configuration.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  /** Run-fatal conditions (persistence failures, unreadable ledger) */
  ERROR: 0,
  /** Item failures and other conditions worth a look */
  WARN: 1,
  /** Per-item progress, flushes and run summaries */
  INFO: 2,
  /** Extraction internals */
  DEBUG: 3,
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

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;

  /** Fields bound to the logger merged with per-call context */
  context?: Record<string, unknown>;

  error?: {
    name: string;
    message: string;
    stack?: string;
  };

  /** Source identifier, e.g. `run-batch:orchestrator` */
  source?: string;
}

// =============================================================================
// Logger Configuration
// =============================================================================

/**
 * Output format for log entries
 */
export const LogFormat = {
  /** Human-readable text format */
  TEXT: 'text',
  /** One JSON object per line, for CI log collectors */
  JSON: 'json',
  /** Time, level letter and message only */
  COMPACT: 'compact',
  /** Text with ANSI colors (for terminal) */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

/**
 * Logger configuration options
 */
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

  timestamps: z.boolean().default(true),

  /**
   * Only honoured by the `pretty` format
   * @default true
   */
  colors: z.boolean().default(true),

  source: z.string().optional(),

  /**
   * Context fields attached to every entry from this logger
   */
  fields: z.record(z.unknown()).optional(),

  /**
   * Whether to write to the console when no `output` is given
   * @default true
   */
  console: z.boolean().default(true),

  /**
   * Custom output handler (receives formatted log lines)
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;
export type LoggerOptions = z.input<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(
  overrides?: LoggerOptions
): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Log Formatting
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
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

/**
 * Parse a log level name (case-insensitive). Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'TRACE':
      return LogLevel.TRACE;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Parse a log format name. Unknown names fall back to `fallback`.
 */
export function parseLogFormat(
  format: string | undefined,
  fallback: LogFormat = LogFormat.PRETTY
): LogFormat {
  const result = LogFormatSchema.safeParse(format?.trim().toLowerCase());
  return result.success ? result.data : fallback;
}

/**
 * Check if a log level should be output given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Format an error for logging
 */
export function formatError(
  error: unknown
): { name: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return error.stack === undefined
      ? { name: error.name, message: error.message }
      : { name: error.name, message: error.message, stack: error.stack };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
