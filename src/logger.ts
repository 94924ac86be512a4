/**
 * Logger interfaces and implementations
 *
 * All diagnostics go to stderr so stdout stays free for `--stdout` payloads.
 *
 * Security: credentials passed with `--header` are redacted when a `headers`
 * context field is logged.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export const SENSITIVE_HEADERS = ['authorization', 'proxy-authorization', 'cookie', 'x-api-key'];

function levelFromEnv(): LogLevel {
  switch (process.env.LOG_LEVEL?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Redact sensitive header values (case-insensitive)
 */
function redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const headers = data.headers;
  if (!headers || typeof headers !== 'object' || Array.isArray(headers)) return data;

  const redactedHeaders: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(headers)) {
    redactedHeaders[key] = SENSITIVE_HEADERS.includes(key.toLowerCase()) ? '[REDACTED]' : value;
  }

  return { ...data, headers: redactedHeaders };
}

abstract class BaseLogger implements Logger {
  protected level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? levelFromEnv();
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error ? { error: error.message, ...context } : context;
      this.write('error', message, errorContext);
    }
  }

  protected abstract write(level: string, message: string, context?: Record<string, unknown>): void;
}

/**
 * Default logger - human-readable lines on stderr, respects LOG_LEVEL env var
 */
export class ConsoleLogger extends BaseLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const ctx = context ? ` ${JSON.stringify(redactSensitive(context))}` : '';
    console.error(`[${timestamp}] ${level.toUpperCase()}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger
 *
 * Why: Machine-readable logs when the watcher runs under a process supervisor.
 */
export class JsonLogger extends BaseLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context ? redactSensitive(context) : {}),
    };
    console.error(JSON.stringify(log));
  }
}

/**
 * Logger selected by LOG_FORMAT (`json` or console)
 */
export function createLogger(format: string | undefined = process.env.LOG_FORMAT): Logger {
  return format === 'json' ? new JsonLogger() : new ConsoleLogger();
}
