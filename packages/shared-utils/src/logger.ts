import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { dayStamp, nowIso } from './date.js';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

export interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

export interface LogSink {
  readonly minLevel: LogLevel;
  write(entry: LogEntry, formatted: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function consoleSink(minLevel: LogLevel = 'INFO'): LogSink {
  return {
    minLevel,
    write(entry, formatted) {
      switch (entry.level) {
        case 'DEBUG':
        case 'INFO':
          console.log(formatted);
          break;
        case 'WARN':
          console.warn(formatted);
          break;
        case 'ERROR':
          console.error(formatted);
          break;
      }
    },
  };
}

/**
 * Appends one line per entry. The directory is created on the first write.
 */
export function fileSink(filePath: string, minLevel: LogLevel = 'DEBUG'): LogSink {
  let ready = false;

  return {
    minLevel,
    write(_entry, formatted) {
      if (!ready) {
        mkdirSync(dirname(filePath), { recursive: true });
        ready = true;
      }
      appendFileSync(filePath, `${formatted}\n`, 'utf8');
    },
  };
}

/**
 * `<dir>/<prefix>_<yyyyLLdd>.log` for the current local day.
 */
export function dailyLogPath(dir: string, prefix: string): string {
  return join(dir, `${prefix}_${dayStamp()}.log`);
}

export class Logger {
  constructor(
    private serviceName: string,
    private sinks: readonly LogSink[] = [consoleSink()],
  ) {}

  child(name: string): Logger {
    return new Logger(`${this.serviceName}.${name}`, this.sinks);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    const formatted = JSON.stringify(entry);

    for (const sink of this.sinks) {
      if (LEVEL_RANK[level] >= LEVEL_RANK[sink.minLevel]) {
        sink.write(entry, formatted);
      }
    }
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    const errorData =
      error instanceof Error ? { message: error.message, stack: error.stack } : error;
    this.log('ERROR', message, errorData);
  }
}

export interface LoggerOptions {
  sinks?: readonly LogSink[];
}

export function createLogger(serviceName: string, options: LoggerOptions = {}): Logger {
  return new Logger(serviceName, options.sinks);
}
