export {
  createConsoleLogger,
  withScope,
  silentLogger,
  type Logger,
  type ConsoleLoggerOptions,
} from './logger.js';
