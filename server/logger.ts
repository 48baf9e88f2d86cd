export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface Logger {
  debug: (message: string, details?: unknown) => void;
  info: (message: string, details?: unknown) => void;
  warn: (message: string, details?: unknown) => void;
  error: (message: string, details?: unknown) => void;
  child: (scope: string) => Logger;
}

export type LogSink = (level: LogLevel, line: string, details?: unknown) => void;

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error'
    ? normalized
    : 'info';
}

const consoleSink: LogSink = (level, line, details) => {
  const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  if (details === undefined) {
    write(line);
  } else {
    write(line, details);
  }
};

export function formatLogLine(level: LogLevel, scope: string | null, message: string, now = new Date()): string {
  const prefix = scope ? `[${scope}] ` : '';
  return `${now.toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix}${message}`;
}

export function createLogger(options: { level?: LogLevel; scope?: string; sink?: LogSink } = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? parseLogLevel(process.env.LOG_LEVEL)];
  const sink = options.sink ?? consoleSink;
  const scope = options.scope ?? null;

  const emit = (level: LogLevel, message: string, details?: unknown) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    sink(level, formatLogLine(level, scope, message), details);
  };

  return {
    debug: (message, details) => emit('debug', message, details),
    info: (message, details) => emit('info', message, details),
    warn: (message, details) => emit('warn', message, details),
    error: (message, details) => emit('error', message, details),
    child: (childScope) =>
      createLogger({
        level: options.level,
        sink,
        scope: scope ? `${scope}:${childScope}` : childScope
      })
  };
}

export const logger = createLogger();
