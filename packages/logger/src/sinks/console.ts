import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
  /** `pretty` (default) for terminals, `json` for one JSON object per line. */
  format?: 'pretty' | 'json' | undefined;
  /** Queued lines kept before the oldest are discarded. */
  maxPending?: number | undefined;
}

const ANSI_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const DEFAULT_MAX_PENDING = 200;

/**
 * Console sink.
 *
 * Trace, debug and info lines are queued and printed on the next tick. A warn or error
 * line prints at once, after whatever is already queued.
 *
 * Pretty format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly format: 'pretty' | 'json';
  private readonly maxPending: number;
  private pending: LogEntry[] = [];
  private discarded = 0;
  private drainScheduled = false;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
    this.format = options?.format ?? 'pretty';
    this.maxPending = options?.maxPending ?? DEFAULT_MAX_PENDING;
  }

  write(entry: LogEntry): void {
    if (entry.level === 'warn' || entry.level === 'error') {
      this.pending.push(entry);
      this.flush();
      return;
    }

    if (this.pending.length >= this.maxPending) {
      this.pending.shift();
      this.discarded += 1;
    }
    this.pending.push(entry);

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.flush());
    }
  }

  flush(): void {
    const entries = this.pending;
    const discarded = this.discarded;
    this.pending = [];
    this.discarded = 0;
    this.drainScheduled = false;

    if (discarded > 0) {
      this.print({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Discarded ${String(discarded)} queued log entries`,
      });
    }
    for (const entry of entries) {
      this.print(entry);
    }
  }

  private print(entry: LogEntry): void {
    const message = this.format === 'json' ? this.formatJson(entry) : this.formatPretty(entry);

    if (entry.level === 'error') {
      console.error(message);
    } else if (entry.level === 'warn') {
      console.warn(message);
    } else {
      console.log(message);
    }
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
      ...(entry.context ? { context: entry.context } : {}),
    });
  }

  private formatPretty(entry: LogEntry): string {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';
    return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? `${ANSI_COLORS[level]}${upper}\x1b[0m` : upper;
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return `{${pairs.join(', ')}}`;
  }
}
