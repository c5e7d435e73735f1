import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { isLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

export const LOG_LEVEL_ENV = 'GRACEFUL_MARKUP_LOG_LEVEL';

/**
 * GRACEFUL_MARKUP_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (the converter writes HTML to stdout; diagnostics are opt-in)
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env[LOG_LEVEL_ENV]?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'silent';
}

/**
 * Root pino logger: sync JSON to stderr (fd 2), ISO timestamps, redaction.
 */
export function createRootLogger(level: LogLevel = resolveLogLevel()): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
