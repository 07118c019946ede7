export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown> | undefined;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  /** Level chosen at runtime. */
  log(level: LogLevel, msg: string, context?: Record<string, unknown>): void;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
  /**
   * Context keys whose values are replaced with `[REDACTED]` before reaching any sink.
   * Matching is case-insensitive. Defaults to {@link DEFAULT_REDACTED_KEYS}.
   */
  redactKeys?: readonly string[] | undefined;
}

export const DEFAULT_REDACTED_KEYS: readonly string[] = ['authorization', 'token', 'apikey', 'password', 'secret'];

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

interface ResolvedLoggerConfig {
  level: LogLevel;
  sinks: Sink[];
  redactKeys: Set<string>;
}

let globalConfig: ResolvedLoggerConfig = {
  level: 'info',
  sinks: [],
  redactKeys: new Set(DEFAULT_REDACTED_KEYS),
};

const loggerCache = new Map<string, Logger>();

/**
 * Serialize a context object so sinks only ever see plain JSON.
 * Errors become `{ name, message, stack }`, bigint becomes a string, repeated
 * references become `[Circular]` and credential-like keys are redacted.
 */
function serializeContext(obj: Record<string, unknown>, redactKeys: Set<string>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (key: string, value: unknown): unknown => {
    if (key !== '' && redactKeys.has(key.toLowerCase())) {
      return '[REDACTED]';
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const serialized: unknown = JSON.parse(JSON.stringify(obj, replacer));
    return typeof serialized === 'object' && serialized !== null ? (serialized as Record<string, unknown>) : {};
  } catch {
    return { error: '[unserializable]' };
  }
}

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.emit('error', msgOrObj, maybeMsg);
  }

  log(level: LogLevel, msg: string, context?: Record<string, unknown>): void {
    this.emit(level, context ?? msg, context ? msg : undefined);
  }

  private emit(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    // Read the live config so loggers created at module load pick up a later initLogger()
    if (levelOrder[level] < levelOrder[globalConfig.level] || globalConfig.sinks.length === 0) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: msgOrObj }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: maybeMsg ?? '',
            context: serializeContext(msgOrObj, globalConfig.redactKeys),
          };

    for (const sink of globalConfig.sinks) {
      sink.write(entry);
    }
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function initLogger(config: LoggerConfig): void {
  globalConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
    redactKeys: new Set((config.redactKeys ?? DEFAULT_REDACTED_KEYS).map((key) => key.toLowerCase())),
  };
  loggerCache.clear();
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}
