import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
  /** Entries kept between drains; the oldest are dropped beyond this. Default 1000 */
  maxBuffer?: number | undefined;
  /** Schedules a drain. Default: end of the current synchronous segment */
  schedule?: ((drain: () => void) => void) | undefined;
}

const ANSI_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const ANSI_RESET = '\x1b[0m';

/**
 * Console sink.
 *
 * Entries written during one synchronous segment (the notifications of a
 * batch, say) are queued and reach the console together once the segment
 * ends. Relies on `queueMicrotask` only, so it runs wherever `console` does.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly maxBuffer: number;
  private readonly schedule: (drain: () => void) => void;
  private queue: LogEntry[] = [];
  private pending = false;
  private dropped = 0;

  constructor(options: ConsoleSinkOptions = {}) {
    this.color = options.color ?? false;
    this.maxBuffer = options.maxBuffer ?? 1000;
    this.schedule = options.schedule ?? ((drain) => queueMicrotask(drain));
  }

  write(entry: LogEntry): void {
    if (this.queue.length >= this.maxBuffer) {
      this.queue.shift();
      this.dropped++;
    }
    this.queue.push(entry);

    if (this.pending) return;
    this.pending = true;
    this.schedule(() => this.flush());
  }

  /** Print everything queued now */
  flush(): void {
    const entries = this.queue;
    const dropped = this.dropped;
    this.queue = [];
    this.dropped = 0;
    this.pending = false;

    if (dropped > 0) {
      this.print({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
      });
    }
    entries.forEach((entry) => this.print(entry));
  }

  private print(entry: LogEntry): void {
    const line = formatEntry(entry, this.color);
    switch (entry.level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

export function formatEntry(entry: LogEntry, color = false): string {
  const time = formatTime(entry.timestamp);
  const level = formatLevel(entry.level, color);
  const context = entry.context ? ` ${formatContext(entry.context)}` : '';
  return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
}

function formatTime(timestamp: Date): string {
  const hours = String(timestamp.getHours()).padStart(2, '0');
  const minutes = String(timestamp.getMinutes()).padStart(2, '0');
  const seconds = String(timestamp.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

function formatLevel(level: LogLevel, color: boolean): string {
  const upper = level.toUpperCase().padEnd(5);
  return color ? `${ANSI_COLORS[level]}${upper}${ANSI_RESET}` : upper;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
