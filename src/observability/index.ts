export {
  ConsoleLogger,
  NoopLogger,
  isLogLevel,
  logError,
  type Logger,
  type LogLevel,
  type LogContext,
} from './logging.js';
