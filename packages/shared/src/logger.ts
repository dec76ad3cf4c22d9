export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogSink = Pick<Console, 'log' | 'info' | 'warn' | 'error'>;

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Console-backed logger that drops messages below `level`. Components put
 * their own `[component]` prefix in the message text.
 */
export function createLogger(options: { level?: LogLevel; sink?: LogSink } = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const sink = options.sink ?? console;

  function write(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[level] < minLevel) {
      return;
    }
    switch (level) {
      case 'debug':
        sink.log(message, ...args);
        return;
      case 'info':
        sink.info(message, ...args);
        return;
      case 'warn':
        sink.warn(message, ...args);
        return;
      case 'error':
        sink.error(message, ...args);
        return;
    }
  }

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  };
}

export const defaultLogger: Logger = createLogger();
