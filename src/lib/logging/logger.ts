/**
 * Tagged console logger.
 *
 * Writes `[tag] message` lines through console, gated by ENRICH_LOG_LEVEL
 * (debug | info | warn | error | silent, default info). Structured context is
 * passed as the trailing console argument, never interpolated.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type Logger = {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const v = (value ?? '').trim().toLowerCase();
  if (
    v === 'debug' ||
    v === 'info' ||
    v === 'warn' ||
    v === 'error' ||
    v === 'silent'
  ) {
    return v;
  }
  return 'info';
}

export type CreateLoggerOptions = {
  level?: LogLevel;
  /** Defaults to the global console; tests pass a recorder. */
  sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
};

export function createLogger(
  tag: string,
  options: CreateLoggerOptions = {},
): Logger {
  const sink = options.sink ?? console;
  const threshold =
    LEVEL_ORDER[options.level ?? parseLogLevel(process.env.ENRICH_LOG_LEVEL)];

  const emit =
    (level: Exclude<LogLevel, 'silent'>) =>
    (message: string, context?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[level] < threshold) return;
      const line = `[${tag}] ${message}`;
      if (context && Object.keys(context).length > 0) {
        sink[level](line, context);
      } else {
        sink[level](line);
      }
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
