import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  data?: LogContext;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const parseLevel = (value: string | undefined): LogLevel => {
  const normalized = (value || '').trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized) ?? LogLevel.INFO;
};

/**
 * Structured JSON logger installed as the application logger.
 *
 * Nest's own `Logger` instances (one per service) route through this class,
 * passing their class name as the trailing string argument; that string becomes
 * the entry's `context`. Anything else in that position is treated as data.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private readonly level: LogLevel;
  private readonly isProduction: boolean;
  private context?: string;

  constructor(private readonly config: ConfigService) {
    this.level = parseLevel(this.config.get<string>('LOG_LEVEL'));
    this.isProduction = this.config.get<string>('NODE_ENV') === 'production';
  }

  setContext(context: string): this {
    this.context = context;
    return this;
  }

  debug(message: unknown, data?: LogContext | string): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  info(message: unknown, data?: LogContext | string): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  log(message: unknown, data?: LogContext | string): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  verbose(message: unknown, data?: LogContext | string): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  warn(message: unknown, data?: LogContext | string): void {
    this.writeLog(LogLevel.WARN, message, data);
  }

  error(message: unknown, error?: Error | LogContext | string, context?: string): void {
    if (error instanceof Error) {
      this.writeLog(
        LogLevel.ERROR,
        message,
        { name: error.name, message: error.message, stack: error.stack },
        context,
      );
      return;
    }
    // Nest passes (message, stack, context) for framework errors.
    if (typeof error === 'string' && context !== undefined) {
      this.writeLog(LogLevel.ERROR, message, { stack: error }, context);
      return;
    }
    this.writeLog(LogLevel.ERROR, message, error, context);
  }

  private writeLog(
    level: LogLevel,
    message: unknown,
    dataOrContext?: LogContext | string,
    explicitContext?: string,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const context =
      explicitContext ?? (typeof dataOrContext === 'string' ? dataOrContext : this.context);
    const data = typeof dataOrContext === 'object' ? dataOrContext : undefined;

    const entry: LogEntry = {
      level,
      message: typeof message === 'string' ? message : JSON.stringify(message),
      timestamp: new Date().toISOString(),
      ...(context && { context }),
      ...(data && { data }),
    };

    if (this.isProduction) {
      process.stdout.write(`${JSON.stringify(entry)}\n`);
    } else {
      this.prettyPrint(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private prettyPrint(entry: LogEntry): void {
    const { level, message, timestamp, context, data } = entry;

    const prefix = [
      this.colorizeLevel(level),
      timestamp,
      context && `[${context}]`,
    ]
      .filter(Boolean)
      .join(' ');

    // eslint-disable-next-line no-console
    console.log(prefix, message);

    if (data && Object.keys(data).length > 0) {
      // eslint-disable-next-line no-console
      console.log('  ', JSON.stringify(data, null, 2));
    }
  }

  private colorizeLevel(level: LogLevel): string {
    const colors = {
      [LogLevel.DEBUG]: '\x1b[36m', // cyan
      [LogLevel.INFO]: '\x1b[32m', // green
      [LogLevel.WARN]: '\x1b[33m', // yellow
      [LogLevel.ERROR]: '\x1b[31m', // red
    };
    return `${colors[level]}${level.toUpperCase()}\x1b[0m`;
  }
}
