export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Destination for formatted log lines
 */
export interface LogSink {
  appendLine(line: string): void;
}

/**
 * Writes to stderr so stdout stays free for protocol traffic
 */
export class StderrSink implements LogSink {
  appendLine(line: string): void {
    process.stderr.write(line + '\n');
  }
}

/**
 * Keeps lines in memory
 */
export class MemorySink implements LogSink {
  readonly lines: string[] = [];

  appendLine(line: string): void {
    this.lines.push(line);
  }

  clear(): void {
    this.lines.length = 0;
  }
}

/**
 * Parse a level name such as "warn" (case-insensitive)
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Centralized logging service
 */
export class LoggingService {
  private sink: LogSink;
  private logLevel: LogLevel;

  constructor(logLevel: LogLevel = LogLevel.WARN, sink: LogSink = new StderrSink()) {
    this.logLevel = logLevel;
    this.sink = sink;
  }

  get level(): LogLevel {
    return this.logLevel;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * A logger sharing this sink at a different level
   */
  withLevel(level: LogLevel): LoggingService {
    return new LoggingService(level, this.sink);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      this.log('DEBUG', message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.log('INFO', message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      this.log('WARN', message, ...args);
    }
  }

  error(message: string, error?: Error, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      this.log('ERROR', message, ...args);
      if (error) {
        this.sink.appendLine(`  Stack: ${error.stack ?? error.message}`);
      }
    }
  }

  private log(level: string, message: string, ...args: unknown[]): void {
    const timestamp = new Date().toISOString();
    this.sink.appendLine(`[${timestamp}] [${level}] ${message}`);

    for (const arg of args) {
      if (typeof arg === 'object' && arg !== null) {
        this.sink.appendLine(`  ${JSON.stringify(arg, null, 2)}`);
      } else {
        this.sink.appendLine(`  ${String(arg)}`);
      }
    }
  }
}

// Global logger instance
let globalLogger: LoggingService | undefined;

export function initializeLogger(logLevel?: LogLevel, sink?: LogSink): LoggingService {
  globalLogger = new LoggingService(logLevel, sink);
  return globalLogger;
}

export function getLogger(): LoggingService {
  if (!globalLogger) {
    globalLogger = new LoggingService();
  }
  return globalLogger;
}
