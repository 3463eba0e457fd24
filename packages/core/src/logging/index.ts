export { Logger, redactSecrets, silentLogger } from './logger.js';
export type { LogFormat, LogLevel, LogSink, LoggerOptions } from './logger.js';
