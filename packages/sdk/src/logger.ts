/**
 * SDK Logger - Re-exports the core logger
 */

export {
  Logger,
  LogLevel,
  ConsoleAdapter,
  BufferAdapter,
  parseLogLevel,
  logger
} from './core/logger.js';

export type { LogEntry, LogEnvironment, LoggerAdapter, LoggerConfig } from './core/logger.js';
