import { LogEntry, LogLevel, LogTransport, ConsoleTransportConfig, LogFormat } from '../types.js';

const COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};
const RESET = '\x1b[0m';

/**
 * Console transport. Every level goes to stderr so diagnostics never mix with
 * a program's stdout.
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private readonly format: LogFormat;
  private readonly colors: boolean;
  private readonly stream: NodeJS.WritableStream;

  constructor(config: ConsoleTransportConfig = {}) {
    this.format = config.format ?? 'text';
    this.colors = config.colors ?? false;
    this.stream = config.stream ?? process.stderr;
  }

  log(entry: LogEntry): void {
    const output = this.format === 'json' ? this.formatJson(entry) : this.formatText(entry);
    this.stream.write(`${output}\n`);
  }

  private formatJson(entry: LogEntry): string {
    const logObject = {
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      component: entry.component,
      message: entry.message,
      ...(entry.data && Object.keys(entry.data).length > 0 && { data: entry.data }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    };

    return JSON.stringify(logObject);
  }

  private formatText(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = this.colors
      ? `${COLORS[entry.level]}${LogLevel[entry.level]}${RESET}`
      : LogLevel[entry.level];

    let message = `${timestamp} ${level} [${entry.component}] ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += ` ${JSON.stringify(entry.data)}`;
    }

    if (entry.error) {
      message += `\n${entry.error.stack || entry.error.message}`;
    }

    return message;
  }
}
