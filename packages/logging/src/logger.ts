import { ConsoleTransport } from './transports/console-transport.js';
import { LogEntry, LogLevel, LogTransport, LoggerConfig } from './types.js';

/**
 * Structured logger. Entries are handed to every transport synchronously, in
 * the call that produced them.
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string;
  private readonly transports: readonly LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = Logger.toLogLevel(config.level);
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  /**
   * Logger for a sub-component: same level and transports, component `parent:child`
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, data);
  }

  /**
   * Non-Error causes are dropped; pass details through `data` instead
   */
  error(message: string, cause?: unknown, data?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, data, cause instanceof Error ? cause : undefined);
  }

  setLevel(level: LogLevel | string): void {
    this.level = Logger.toLogLevel(level);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private write(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(data && { data }),
      ...(error && { error }),
    };

    for (const transport of this.transports) {
      try {
        transport.log(entry);
      } catch (err) {
        // A broken transport must not turn a logged failure into a thrown one
        process.stderr.write(`Transport ${transport.name} failed: ${String(err)}\n`);
      }
    }
  }

  private static toLogLevel(level: LogLevel | string): LogLevel {
    return typeof level === 'string' ? Logger.parseLogLevel(level) : level;
  }

  static parseLogLevel(level: string): LogLevel {
    switch (level.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
      case 'WARNING':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        throw new Error(`Invalid log level: ${level}`);
    }
  }
}
