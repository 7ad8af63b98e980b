/**
 * Namespaced logger with automatic sensitive data redaction.
 * Connection strings, passwords and tokens are never written to the log.
 */

/** Fields that should be redacted from logs */
const SENSITIVE_FIELDS = new Set([
  'password',
  'secret',
  'token',
  'authorization',
  'connectionstring',
  'connection_string',
  'database_url',
  'databaseurl',
]);

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Recursively redacts sensitive fields from an object.
 * Creates a deep copy to avoid modifying the original.
 */
export function redactSensitive(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item));
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = redactSensitive(val);
    }
  }

  return result;
}

/** Logger interface */
export interface Logger {
  namespace: string;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
}

/**
 * Formats one log line. Exported for tests.
 */
export function formatLogLine(level: string, namespace: string, message: string, data?: Record<string, unknown>, now: Date = new Date()): string {
  const prefix = `[${now.toISOString()}] [${level}] [${namespace}]`;
  if (data) {
    return `${prefix} ${message} ${JSON.stringify(redactSensitive(data))}`;
  }
  return `${prefix} ${message}`;
}

/**
 * Creates a namespaced logger that automatically redacts sensitive data.
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const enabled = (level: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[level] >= threshold;

  return {
    namespace,
    info(message: string, data?: Record<string, unknown>): void {
      if (enabled('info')) console.info(formatLogLine('INFO', namespace, message, data));
    },
    warn(message: string, data?: Record<string, unknown>): void {
      if (enabled('warn')) console.warn(formatLogLine('WARN', namespace, message, data));
    },
    error(message: string, data?: Record<string, unknown>): void {
      if (enabled('error')) console.error(formatLogLine('ERROR', namespace, message, data));
    },
    debug(message: string, data?: Record<string, unknown>): void {
      if (enabled('debug')) console.debug(formatLogLine('DEBUG', namespace, message, data));
    },
  };
}
