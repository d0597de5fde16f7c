import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's own Logger, no wrapper.
 *
 * Data-first calls:
 *   logger.debug({ formula }, 'Compiled formula');
 *   logger.warn({ err: error }, 'Input could not be read');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger tagged with `component` */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
