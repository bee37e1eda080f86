/**
 * Structured logging for filekit packages
 */

export { Logger } from './logger.js';
export { LoggerFactory, type LoggingSettings } from './factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { MemoryTransport } from './transports/memory-transport.js';
export {
  LogLevel,
  LOG_LEVELS,
  type LogLevelString,
  type LogFormat,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportConfig,
} from './types.js';
