export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string | undefined;
  data?: Record<string, unknown> | undefined;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

/**
 * Set the minimum level written by every logger.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function formatLog(entry: LogEntry): string {
  const scope = entry.scope ? ` [${entry.scope}]` : '';
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}${scope}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  scope: string | undefined,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    scope,
    data,
  };
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function createLogger(scope?: string): Logger {
  return {
    debug(message: string, data?: Record<string, unknown>): void {
      if (enabled('debug')) console.debug(formatLog(createLogEntry('debug', message, scope, data)));
    },

    info(message: string, data?: Record<string, unknown>): void {
      if (enabled('info')) console.info(formatLog(createLogEntry('info', message, scope, data)));
    },

    warn(message: string, data?: Record<string, unknown>): void {
      if (enabled('warn')) console.warn(formatLog(createLogEntry('warn', message, scope, data)));
    },

    error(message: string, data?: Record<string, unknown>): void {
      if (enabled('error')) console.error(formatLog(createLogEntry('error', message, scope, data)));
    },

    child(childScope: string): Logger {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger = createLogger();
