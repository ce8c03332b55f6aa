export { Logger } from './logger';
export type { LogFn, LoggerMethods } from './logger';
export {
  LOG_LEVELS,
  createLogger,
  isLogLevel,
  type CreateLoggerOptions,
  type LogLevel,
} from './create-logger';
