/**
 * Observability components for the Aliyun OSS integration.
 */

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  redactSensitive,
  type Logger,
  type LogEntry,
  type ConsoleLoggerOptions,
} from './logging.js';
