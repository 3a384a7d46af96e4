/**
 * Structured stderr logger
 * stdout is reserved for the MCP stdio transport, so every level writes to stderr
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function currentLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

export function formatLogLine(
  scope: string,
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[${now.toISOString()}] [${scope.toUpperCase()}:${level.toUpperCase()}] ${message}${suffix}`;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel()]) return;
    console.error(formatLogLine(scope, level, message, meta));
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}
