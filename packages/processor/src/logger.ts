export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type Sink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Console-backed logger. Every line is prefixed with its scope, e.g.
 * `[statement-ledger:writer] snapshot overwritten`.
 */
export function createLogger(scope = 'statement-ledger', level: LogLevel = 'info', sink: Sink = console): Logger {
  const threshold = LEVEL_ORDER[level];

  function emit(at: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[at] < threshold) return;
    const line = `[${scope}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      sink[at](line, context);
    } else {
      sink[at](line);
    }
  }

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
    child: (child) => createLogger(`${scope}:${child}`, level, sink),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
