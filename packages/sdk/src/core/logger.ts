/**
 * Structured logger with pluggable adapters
 *
 * - JSON lines in production, coloured lines in development, silent in test
 * - Child loggers carry a `parent:child` context and inherited metadata
 * - Adapters decide where entries go
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  SILENT = 99
}

export type LogEnvironment = 'development' | 'production' | 'test';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  levelName: string;
  timestamp: string;
  message: string;
  context: string;
  metadata?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

/**
 * Logger adapter interface for pluggable implementations
 */
export interface LoggerAdapter {
  write(entry: LogEntry): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level?: LogLevel;
  context?: string;
  adapter?: LoggerAdapter;
  metadata?: Record<string, unknown>;
}

/**
 * Console adapter that writes structured logs to stdout/stderr
 */
export class ConsoleAdapter implements LoggerAdapter {
  private environment: LogEnvironment;

  constructor(environment: LogEnvironment = 'production') {
    this.environment = environment;
  }

  write(entry: LogEntry): void {
    if (this.environment === 'test') {
      return;
    }

    const output =
      this.environment === 'development'
        ? this.formatDevelopment(entry)
        : this.formatProduction(entry);

    // stderr for warnings and above
    const stream = entry.level >= LogLevel.WARN ? process.stderr : process.stdout;
    stream.write(`${output}\n`);
  }

  private formatProduction(entry: LogEntry): string {
    const logObject: Record<string, unknown> = {
      timestamp: entry.timestamp,
      level: entry.levelName,
      context: entry.context,
      message: entry.message,
      ...entry.metadata
    };

    if (entry.error) {
      logObject.error = entry.error;
    }

    return JSON.stringify(logObject);
  }

  private formatDevelopment(entry: LogEntry): string {
    const time = new Date(entry.timestamp).toLocaleTimeString();
    const levelColor = this.getLevelColor(entry.level);
    const resetColor = '\x1b[0m';

    let output = `${time} ${levelColor}[${entry.levelName}]${resetColor} [${entry.context}] ${entry.message}`;

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      output += `\n  ${JSON.stringify(entry.metadata, null, 2).replace(/\n/g, '\n  ')}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`;
      }
    }

    return output;
  }

  private getLevelColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.TRACE:
        return '\x1b[90m'; // Gray
      case LogLevel.DEBUG:
        return '\x1b[36m'; // Cyan
      case LogLevel.INFO:
        return '\x1b[32m'; // Green
      case LogLevel.WARN:
        return '\x1b[33m'; // Yellow
      case LogLevel.ERROR:
        return '\x1b[31m'; // Red
      case LogLevel.FATAL:
        return '\x1b[35m'; // Magenta
      default:
        return '\x1b[0m';
    }
  }
}

/**
 * In-memory adapter, mostly for tests
 */
export class BufferAdapter implements LoggerAdapter {
  public logs: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.logs.push(entry);
  }

  clear(): void {
    this.logs = [];
  }

  getLogs(level?: LogLevel): LogEntry[] {
    if (level !== undefined) {
      return this.logs.filter(log => log.level === level);
    }
    return this.logs;
  }
}

/**
 * Resolve a level name such as `debug` or `SILENT`
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'FATAL':
      return LogLevel.FATAL;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

function currentEnvironment(): LogEnvironment {
  const env = process.env.NODE_ENV;
  if (env === 'development' || env === 'test') {
    return env;
  }
  return 'production';
}

/**
 * Main Logger class
 */
export class Logger {
  private level: LogLevel;
  private context: string;
  private adapter: LoggerAdapter;
  private metadata: Record<string, unknown>;
  private static globalAdapter: LoggerAdapter | null = null;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? this.getDefaultLevel();
    this.context = config.context ?? 'default';
    this.adapter = config.adapter ?? Logger.getGlobalAdapter();
    this.metadata = config.metadata ?? {};
  }

  /**
   * Set a global adapter for loggers created without one
   */
  static setGlobalAdapter(adapter: LoggerAdapter | null): void {
    Logger.globalAdapter = adapter;
  }

  static getGlobalAdapter(): LoggerAdapter {
    if (!Logger.globalAdapter) {
      Logger.globalAdapter = new ConsoleAdapter(currentEnvironment());
    }
    return Logger.globalAdapter;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string, metadata?: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: `${this.context}:${context}`,
      adapter: this.adapter,
      metadata: { ...this.metadata, ...metadata }
    });
  }

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, { ...metadata, error });
  }

  fatal(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, message, { ...metadata, error });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Add persistent metadata to all logs
   */
  addMetadata(metadata: Record<string, unknown>): void {
    Object.assign(this.metadata, metadata);
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (level < this.level) {
      return;
    }

    const { error, ...rest } = { ...this.metadata, ...metadata };

    const cleaned: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(rest)) {
      if (value !== undefined) {
        cleaned[key] = value;
      }
    }

    const entry: LogEntry = {
      level,
      levelName: LogLevel[level],
      timestamp: new Date().toISOString(),
      message,
      context: this.context
    };

    if (Object.keys(cleaned).length > 0) {
      entry.metadata = cleaned;
    }

    const serialized = this.serializeError(error);
    if (serialized) {
      entry.error = serialized;
    }

    this.adapter.write(entry);
  }

  private serializeError(error: unknown): LogEntry['error'] | undefined {
    if (!error) {
      return undefined;
    }

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        message: error.message,
        stack: error.stack,
        code
      };
    }

    if (typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
      return { message: error.message };
    }

    return {
      message: String(error)
    };
  }

  private getDefaultLevel(): LogLevel {
    const envLevel = parseLogLevel(process.env.LOG_LEVEL);
    if (envLevel !== undefined) {
      return envLevel;
    }

    switch (process.env.NODE_ENV) {
      case 'development':
        return LogLevel.DEBUG;
      case 'test':
        return LogLevel.SILENT;
      default:
        return LogLevel.INFO;
    }
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger({ context: 'tonplace' });
