import { pino } from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * PHRASE_FORMULA_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (stdout and stderr belong to command output unless debugging)
 */
export function resolveLogLevel(env: Record<string, string | undefined>): LogLevel {
  const level = env['PHRASE_FORMULA_LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}

/**
 * Root logger: JSON lines, synchronous, on stderr so stdout stays clean for
 * command output and piping.
 */
function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger(resolveLogLevel(process.env));
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
