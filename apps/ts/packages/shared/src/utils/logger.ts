import type { ILogger, LogContext, LogLevel } from './logger-interface.js';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  SILENT: 4,
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  DEBUG: '\x1b[36m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  SILENT: '\x1b[0m',
};

const RESET = '\x1b[0m';

export function isValidLogLevel(level: string): level is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, level);
}

function resolveLogLevel(): LogLevel {
  // Accept both 'debug' and 'DEBUG' from .env
  const logLevel = process.env.LOG_LEVEL?.toUpperCase();

  if (logLevel && isValidLogLevel(logLevel)) {
    return logLevel;
  }

  switch (process.env.NODE_ENV) {
    case 'test':
      return 'SILENT';
    case 'production':
      return 'WARN';
    default:
      return 'INFO';
  }
}

class LoggerImpl implements ILogger {
  /** Unset on children until setLevel is called; they follow their parent */
  private level?: LogLevel;
  private readonly parent?: LoggerImpl;
  private correlationId?: string;
  private component?: string;

  constructor(level?: LogLevel, parent?: LoggerImpl) {
    this.parent = parent;
    this.level = parent ? level : (level ?? resolveLogLevel());
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'INFO';
  }

  private shouldLog(level: LogLevel): boolean {
    return level !== 'SILENT' && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.getLevel()];
  }

  private formatMessage(entry: LogEntry): string {
    const { level, message, timestamp, context } = entry;
    const correlationId = context?.correlationId ?? this.correlationId;
    const component = context?.component ?? this.component;

    if (process.env.NODE_ENV === 'production') {
      return JSON.stringify({
        timestamp,
        level,
        message,
        correlationId,
        component,
        ...context,
      });
    }

    const prefix = [correlationId ? `[${correlationId.slice(0, 8)}]` : '', component ? `(${component})` : '']
      .filter(Boolean)
      .join(' ');

    return `${LEVEL_COLOR[level]}[${level}]${RESET} ${prefix ? `${prefix} ` : ''}${message}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage({
      level,
      message,
      timestamp: new Date().toISOString(),
      context,
    });

    if (level === 'ERROR') {
      console.error(formattedMessage);
    } else if (level === 'WARN') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  child(context: LogContext): LoggerImpl {
    const childLogger = new LoggerImpl(undefined, this);
    childLogger.correlationId = context.correlationId ?? this.correlationId;
    childLogger.component = context.component ?? this.component;
    return childLogger;
  }
}

export type Logger = LoggerImpl;

export const logger = new LoggerImpl();
export default logger;
