export type { Logger, ILoggerFactory, LogLevel } from './types.js';

export { PinoLoggerFactory, resolveLogLevel } from './create-logger.js';
