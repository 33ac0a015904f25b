import { nowIso } from './date.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

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

export type LogSink = (level: LogLevel, line: string) => void;

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case 'DEBUG':
    case 'INFO':
      console.log(line);
      break;
    case 'WARN':
      console.warn(line);
      break;
    case 'ERROR':
      console.error(line);
      break;
  }
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toUpperCase();
  if (normalized === 'DEBUG' || normalized === 'WARN' || normalized === 'ERROR') return normalized;
  if (normalized === 'WARNING') return 'WARN';
  return 'INFO';
}

export class Logger {
  constructor(
    private serviceName: string,
    private minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
    private sink: LogSink = consoleSink,
  ) {}

  private log(level: LogLevel, message: string, data?: unknown) {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    this.sink(level, JSON.stringify(entry));
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

export function createLogger(serviceName: string, opts?: { level?: LogLevel; sink?: LogSink }): Logger {
  return new Logger(serviceName, opts?.level, opts?.sink);
}
