import { LogEntry, LogLevel, LogTransport } from '../types.js';

/**
 * Keeps log entries in memory, for callers that want to inspect diagnostics
 * instead of printing them
 */
export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  private readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  getEntries(level?: LogLevel): readonly LogEntry[] {
    return level === undefined ? [...this.entries] : this.entries.filter(e => e.level === level);
  }

  getMessages(level?: LogLevel): string[] {
    return this.getEntries(level).map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
