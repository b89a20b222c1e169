import pino from 'pino';

// Lightweight logger wrapper around pino.
// Configure via env:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' | 'silent' (default: 'info')
// - LOG_PRETTY: 'true' to enable the pino-pretty transport (default: on outside production)

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug: (obj: unknown, msg?: string) => void;
  child: (bindings: Record<string, unknown>) => Logger;
}

const LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error', 'silent'];

function resolveLevel(value: string | undefined): string {
  return value && LEVELS.includes(value) ? value : 'info';
}

function createPinoLogger(): pino.Logger {
  const level = resolveLevel(process.env.LOG_LEVEL);
  const pretty = process.env.LOG_PRETTY
    ? process.env.LOG_PRETTY === 'true'
    : process.env.NODE_ENV !== 'production';

  if (pretty) {
    // The transport runs in a worker thread; fall back to plain JSON lines if it cannot start.
    try {
      return pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard' },
        },
      });
    } catch (error) {
      const fallback = pino({ level });
      fallback.warn({ err: error }, 'pino-pretty unavailable, using json output');
      return fallback;
    }
  }

  return pino({ level });
}

const baseLogger = createPinoLogger();

// Children log at every level and are gated by the root level, so setLogLevel
// also applies to loggers created before it was called.
function wrap(target: pino.Logger): Logger {
  return {
    info: (obj, msg) => { if (baseLogger.isLevelEnabled('info')) target.info(obj, msg); },
    warn: (obj, msg) => { if (baseLogger.isLevelEnabled('warn')) target.warn(obj, msg); },
    error: (obj, msg) => { if (baseLogger.isLevelEnabled('error')) target.error(obj, msg); },
    debug: (obj, msg) => { if (baseLogger.isLevelEnabled('debug')) target.debug(obj, msg); },
    child: (bindings) => wrap(target.child(bindings, { level: 'debug' })),
  };
}

const rootLogger = wrap(baseLogger);

/**
 * Change the level of every logger
 */
export function setLogLevel(level: LogLevel): void {
  if (!LEVELS.includes(level)) return;
  baseLogger.level = level;
}

export function getLogger(bindings?: Record<string, unknown>): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return rootLogger.child(bindings);
  }
  return rootLogger;
}
