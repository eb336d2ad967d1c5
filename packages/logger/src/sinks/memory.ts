import type { LogEntry, LogLevel, Sink } from '../logger.js';

/**
 * Keeps every entry in memory. Used by tests to assert on what a component
 * logged without touching the console.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {
    // entries are written synchronously
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
