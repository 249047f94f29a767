export { createLogger, type Logger, type LogData, type LogLevel, type LoggerConfig } from './logger.js';
