/**
 * Logging Module
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  type LogEntry,
  LogFormat,
  LogFormatSchema,
  LoggerConfigSchema,
  type LoggerConfig,
  type LoggerOptions,
  createDefaultLoggerConfig,
  LogColors,
  LogLevelColors,
  parseLogLevel,
  parseLogFormat,
  shouldLog,
  formatError,
} from './types.js';

export { Logger, createLogger, createSilentLogger } from './logger.js';
