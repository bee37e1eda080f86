import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { MemoryTransport } from './transports/memory-transport.js';
import { LogLevel, type LogFormat, type LogLevelString } from './types.js';

/**
 * Logging settings as they appear in runtime configuration
 */
export interface LoggingSettings {
  level: LogLevel | LogLevelString;
  format?: LogFormat;
  colors?: boolean;
}

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger writing text lines to stderr
   */
  static createConsoleLogger(
    component: string,
    level: LogLevel | LogLevelString = LogLevel.INFO
  ): Logger {
    return new Logger({
      component,
      level,
      transports: [new ConsoleTransport({ format: 'text' })],
    });
  }

  /**
   * Create a logger that keeps every entry in memory. The transport is returned
   * alongside so its entries can be read back.
   */
  static createMemoryLogger(
    component: string,
    level: LogLevel | LogLevelString = LogLevel.DEBUG
  ): { logger: Logger; transport: MemoryTransport } {
    const transport = new MemoryTransport();
    return { logger: new Logger({ component, level, transports: [transport] }), transport };
  }

  static fromConfig(component: string, settings: LoggingSettings): Logger {
    return new Logger({
      component,
      level: settings.level,
      transports: [
        new ConsoleTransport({
          format: settings.format ?? 'text',
          colors: settings.colors ?? false,
        }),
      ],
    });
  }
}
