/**
 * Simple console logger for the bootstrap CLI
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

/**
 * Reads LOG_LEVEL on every call so tests and the CLI can change it at runtime
 */
const currentLevel = (): LogLevel => {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
};

// Error instances stringify to {} otherwise
const errorReplacer = (_key: string, value: unknown): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
};

export const formatLog = (
  level: LogLevel,
  context: string,
  message: string,
  data?: unknown
): string => {
  const timestamp = new Date().toISOString();
  let dataString = '';
  if (data !== undefined) {
    try {
      dataString = ` ${JSON.stringify(data, errorReplacer)}`;
    } catch (error) {
      dataString = ` [Error stringifying data: ${error instanceof Error ? error.message : String(error)}]`;
    }
  }
  return `[${timestamp}] [${level.toUpperCase()}] [${context}] ${message}${dataString}`;
};

/**
 * Creates a sub-logger with a specific context name
 * @param context The name of the context/file using the logger
 */
export const createSubLogger = (context: string): Logger => {
  const enabled = (level: LogLevel): boolean =>
    LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];

  return {
    debug: (message, data) => {
      if (enabled('debug')) {
        console.log(formatLog('debug', context, message, data));
      }
    },
    info: (message, data) => {
      if (enabled('info')) {
        console.log(formatLog('info', context, message, data));
      }
    },
    warn: (message, data) => {
      if (enabled('warn')) {
        console.warn(formatLog('warn', context, message, data));
      }
    },
    error: (message, data) => {
      if (enabled('error')) {
        console.error(formatLog('error', context, message, data));
      }
    },
  };
};
