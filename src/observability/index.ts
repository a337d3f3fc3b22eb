export { LogLevel, type LogEntry, type Logger } from './types.js';
export {
  NoopLogger,
  ConsoleLogger,
  createLogger,
  type ConsoleLoggerOptions,
} from './logger.js';
