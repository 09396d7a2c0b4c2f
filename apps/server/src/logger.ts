export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  timestamp: '\x1b[90m', // Gray
  context: '\x1b[90m', // Gray
};

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  color?: boolean;
  write?: (level: LogLevel, line: string) => void;
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export class Logger {
  private minLevel: LogLevel;
  private useJSON: boolean;
  private supportsColor: boolean;
  private write: (level: LogLevel, line: string) => void;

  constructor(options: LoggerOptions = {}) {
    const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
    this.minLevel = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');

    // JSON lines in production, readable lines in development
    this.useJSON = options.json ?? (process.env.NODE_ENV === 'production' || process.env.LOG_FORMAT === 'json');

    this.supportsColor =
      options.color ??
      (process.stdout.isTTY === true && process.env.NO_COLOR === undefined && process.env.FORCE_COLOR !== '0');
    this.write = options.write ?? writeToConsole;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return levels[level] >= levels[this.minLevel];
  }

  private formatTimestamp(now: Date): string {
    const hours = now.getHours().toString().padStart(2, '0');
    const minutes = now.getMinutes().toString().padStart(2, '0');
    const seconds = now.getSeconds().toString().padStart(2, '0');
    const ms = now.getMilliseconds().toString().padStart(3, '0');
    return `${hours}:${minutes}:${seconds}.${ms}`.padEnd(12);
  }

  /**
   * An `error` entry in the context is lifted out and printed with its stack.
   */
  format(level: LogLevel, message: string, context?: LogContext, now: Date = new Date()): string {
    let error: Error | undefined;
    let rest: LogContext | undefined = context;
    const lifted = context?.error;
    if (context && lifted instanceof Error) {
      error = lifted;
      rest = Object.fromEntries(Object.entries(context).filter(([key]) => key !== 'error'));
    }

    if (this.useJSON) {
      const entry: LogEntry = {
        timestamp: now.toISOString(),
        level,
        message,
      };

      if (rest && Object.keys(rest).length > 0) {
        entry.context = rest;
      }

      if (error) {
        entry.error = {
          message: error.message,
          stack: error.stack,
          name: error.name,
        };
      }

      return JSON.stringify(entry);
    }

    const timestamp = this.formatTimestamp(now);
    const levelColor = this.supportsColor ? colors[level] : '';
    const reset = this.supportsColor ? colors.reset : '';
    const timestampColor = this.supportsColor ? colors.timestamp : '';
    const contextColor = this.supportsColor ? colors.context : '';

    // timestamp (12 chars), space, level padded to 6, message
    const levelUpper = level.toUpperCase().padEnd(6);
    let output = `${timestampColor}${timestamp}${reset} ${levelColor}${levelUpper}${reset}${message}`;

    if (rest && Object.keys(rest).length > 0) {
      const contextPairs = Object.entries(rest)
        .map(([key, value]) => {
          const formattedValue = typeof value === 'string' ? value : JSON.stringify(value);
          return `${key}=${formattedValue}`;
        })
        .join(' ');
      output += ` ${contextColor}${contextPairs}${reset}`;
    }

    if (error) {
      const errorColor = this.supportsColor ? colors.error : '';
      output += `\n${errorColor}  Error: ${error.message}${reset}`;
      if (error.stack) {
        const stackLines = error.stack.split('\n').slice(1, 4);
        output += `\n${timestampColor}  ${stackLines.join(`\n${timestampColor}  `)}${reset}`;
      }
    }

    return output;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (this.shouldLog(level)) {
      this.write(level, this.format(level, message, context));
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export const logger = new Logger();
