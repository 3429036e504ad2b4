export { Logger, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LogStream, LoggerOptions } from './logger.js';
