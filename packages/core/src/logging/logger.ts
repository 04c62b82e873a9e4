import type { LogLevel } from '@auditray/shared';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogStream {
  write(chunk: string): unknown;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

let currentLevel: LogLevel = 'info';
let currentStream: LogStream = process.stderr;

/** Set the process-wide level and destination for every logger. */
export function configureLogging(options: { level?: LogLevel; stream?: LogStream }): void {
  if (options.level) currentLevel = options.level;
  if (options.stream) currentStream = options.stream;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Create a logger tagged with `scope`. Lines look like
 * `2026-01-15T14:32:00.000Z INFO [coordinator] check started`.
 */
export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    currentStream.write(
      `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}\n`,
    );
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
