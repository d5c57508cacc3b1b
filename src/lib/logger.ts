// src/lib/logger.ts
// Централизованное логирование: уровни, контекст в JSON

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface LogContext {
  userId?: number;
  chatId?: number;
  action?: string;
  error?: unknown;
  [key: string]: unknown;
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

// Error в JSON.stringify превращается в {}, поэтому раскладываем вручную
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (typeof value === "bigint") return value.toString();
  return value;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly isDevelopment: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.isDevelopment = env.NODE_ENV !== 'production';
    this.level = Logger.parseLevel(env.LOG_LEVEL, this.isDevelopment);
  }

  static parseLevel(raw: string | undefined, isDevelopment: boolean): LogLevel {
    switch (raw?.toUpperCase()) {
      case 'ERROR': return LogLevel.ERROR;
      case 'WARN': return LogLevel.WARN;
      case 'INFO': return LogLevel.INFO;
      case 'DEBUG': return LogLevel.DEBUG;
      default: return isDevelopment ? LogLevel.DEBUG : LogLevel.INFO;
    }
  }

  format(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context, replacer)}` : '';
    return `[${timestamp}] [${level}] ${message}${contextStr}`;
  }

  shouldLog(level: LogLevel): boolean {
    return level <= this.level;
  }

  error(message: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;
    console.error(this.format('ERROR', message, context));
    if (context?.error instanceof Error && context.error.stack) {
      console.error('Stack trace:', context.error.stack);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    console.warn(this.format('WARN', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    console.log(this.format('INFO', message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    console.log(this.format('DEBUG', message, context));
  }

  dbQuery(query: string, duration?: number, error?: Error): void {
    const short = query.replace(/\s+/g, ' ').trim().substring(0, 100);
    if (error) {
      this.error('Database query failed', { action: 'db_query', query: short, error });
    } else {
      this.debug('Database query executed', {
        action: 'db_query',
        query: short,
        duration: duration !== undefined ? `${duration}ms` : undefined,
      });
    }
  }

  userAction(action: string, userId: number, chatId: number, details?: Record<string, unknown>): void {
    this.info(`User action: ${action}`, { action, userId, chatId, ...details });
  }
}

export const logger = new Logger();
