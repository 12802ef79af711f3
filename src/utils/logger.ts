/**
 * Logger abstraction for the breaking change detector
 * Writes to the console unless a sink (such as a language server `connection.console`) is attached
 */

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  VERBOSE = 4
}

/**
 * Destination for log lines. `RemoteConsole` from vscode-languageserver satisfies this.
 */
export interface LogSink {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  log(message: string): void;
}

type LogContext = {
  file?: string;
  operation?: string;
  duration?: number;
  error?: Error | unknown;
  [key: string]: unknown;
};

/**
 * Logger class for consistent logging
 */
export class Logger {
  private sink: LogSink | null = null;
  private level: LogLevel = LogLevel.INFO;
  private verboseLogging: boolean = false;

  /**
   * Route output to a sink
   * @param sink - Destination, e.g. `connection.console`
   * @param level - The log level to use
   * @param verboseLogging - Enable super verbose logging for debugging
   */
  initialize(sink: LogSink, level: LogLevel = LogLevel.INFO, verboseLogging: boolean = false): void {
    this.sink = sink;
    this.level = level;
    this.verboseLogging = verboseLogging;
  }

  /**
   * Detach the sink and fall back to the console
   */
  reset(): void {
    this.sink = null;
    this.level = LogLevel.INFO;
    this.verboseLogging = false;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setVerboseLogging(enabled: boolean): void {
    this.verboseLogging = enabled;
    if (enabled) {
      this.info('Verbose logging enabled - all comparisons will be logged');
    }
  }

  isVerboseLoggingEnabled(): boolean {
    return this.verboseLogging;
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.ERROR) {
      const formatted = this.format(message, args);
      if (this.sink) {
        this.sink.error(formatted);
      } else {
        console.error(formatted);
      }
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.WARN) {
      const formatted = this.format(message, args);
      if (this.sink) {
        this.sink.warn(formatted);
      } else {
        console.warn(formatted);
      }
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      const formatted = this.format(message, args);
      if (this.sink) {
        this.sink.info(formatted);
      } else {
        console.info(formatted);
      }
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.DEBUG) {
      const formatted = this.format(message, args);
      if (this.sink) {
        this.sink.log(formatted);
      } else {
        console.debug(formatted);
      }
    }
  }

  /**
   * Verbose messages are only shown when verbose logging is enabled
   */
  verbose(message: string, ...args: unknown[]): void {
    if (this.isVerbose()) {
      this.writeLog(`[VERBOSE] ${this.format(message, args)}`);
    }
  }

  /**
   * Log a verbose message followed by `key: value` context
   */
  verboseWithContext(message: string, context: LogContext): void {
    if (!this.isVerbose()) {
      return;
    }
    this.writeLog(this.withContext(`[VERBOSE] ${message}`, context));
  }

  debugWithContext(message: string, context: LogContext): void {
    this.debug(this.withContext(message, context));
  }

  errorWithContext(message: string, context: LogContext): void {
    let formatted = this.withContext(message, context);
    if (context.error instanceof Error && context.error.stack) {
      formatted += ` | Stack: ${context.error.stack}`;
    }
    this.error(formatted);
  }

  private isVerbose(): boolean {
    return this.verboseLogging || this.level >= LogLevel.VERBOSE;
  }

  private writeLog(formatted: string): void {
    if (this.sink) {
      this.sink.log(formatted);
    } else {
      console.log(formatted);
    }
  }

  private withContext(message: string, context: LogContext): string {
    const parts: string[] = [message];

    if (context.file) {
      parts.push(`File: ${context.file}`);
    }

    if (context.operation) {
      parts.push(`Operation: ${context.operation}`);
    }

    if (context.duration !== undefined) {
      parts.push(`Duration: ${context.duration}ms`);
    }

    if (context.error) {
      const errorMessage = context.error instanceof Error
        ? context.error.message
        : String(context.error);
      parts.push(`Error: ${errorMessage}`);
    }

    for (const [key, value] of Object.entries(context)) {
      if (!['file', 'operation', 'duration', 'error'].includes(key)) {
        try {
          parts.push(`${key}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
        } catch {
          parts.push(`${key}: [unserializable]`);
        }
      }
    }

    return parts.join(' | ');
  }

  private format(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }
    try {
      return `${message} ${args.map(arg =>
        typeof arg === 'object' ? JSON.stringify(arg) : String(arg)
      ).join(' ')}`;
    } catch {
      return `${message} [Error formatting arguments]`;
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
