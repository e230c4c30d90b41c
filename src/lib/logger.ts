export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** JSON-per-line console logger. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { scope = 'storefront-guard', level = 'info' } = options;
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_ORDER[entryLevel] < threshold) return;
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: entryLevel,
      scope,
      message,
      ...meta,
    });

    switch (entryLevel) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.info(line);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (childScope) => createLogger({ scope: `${scope}:${childScope}`, level }),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
