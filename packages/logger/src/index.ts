export {
  DEFAULT_REDACTED_KEYS,
  LOG_LEVELS,
  flushLoggers,
  getLogger,
  initLogger,
  isLogLevel,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerConfig,
  type Sink,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
