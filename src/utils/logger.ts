/**
 * Leveled console logger shared by every service.
 * Level comes from LOG_LEVEL (debug | info | warn | error), default info.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel) {}

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
    switch (level) {
      case 'debug':
        console.debug(line, ...meta);
        break;
      case 'info':
        console.info(line, ...meta);
        break;
      case 'warn':
        console.warn(line, ...meta);
        break;
      case 'error':
        console.error(line, ...meta);
        break;
    }
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }
}

export function createLogger(level: LogLevel = resolveLevel()): Logger {
  return new ConsoleLogger(level);
}

export const logger: Logger = createLogger();

/** Logger that drops everything; handy for tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
