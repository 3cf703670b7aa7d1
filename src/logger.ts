/**
 * Structured logger.
 *
 * Pretty single-line output by default, one JSON object per line when
 * `NODE_ENV=production`. The minimum level comes from `M365_DNS_LOG_LEVEL`.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export interface LogContext {
  service?: string;
  domain?: string;
  operation?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
  };
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = LogLevel.WARN
): LogLevel {
  const match = LEVEL_ORDER.find((level) => level === value?.trim().toLowerCase());
  return match ?? fallback;
}

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

export class Logger {
  readonly service: string;
  private minLevel: LogLevel;

  constructor(
    service: string,
    minLevel: LogLevel = parseLogLevel(process.env.M365_DNS_LOG_LEVEL)
  ) {
    this.service = service;
    this.minLevel = minLevel;
  }

  /** A logger for a sub-service sharing this logger's level */
  child(service: string): Logger {
    return new Logger(`${this.service}:${service}`, this.minLevel);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { service: this.service, ...context },
    };
    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
      };
    }

    const write = level === LogLevel.ERROR || level === LogLevel.WARN
      ? console.error
      : console.log;

    if (process.env.NODE_ENV === 'production') {
      write(JSON.stringify(entry));
      return;
    }

    const { service, ...rest } = entry.context;
    const ctx = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
    const err = entry.error ? ` (${entry.error.message})` : '';
    write(`[${level.toUpperCase()}] [${service}] ${message}${ctx}${err}`);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }
}

export const logger = new Logger('m365-dns');
