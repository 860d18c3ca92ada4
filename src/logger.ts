export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Where formatted lines go. Defaults to stderr so stdout stays free for the run summary. */
  write?: (line: string) => void;
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === 'string' && /[\s"=]/.test(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatLine(level: LogLevel, message: string, context: LogContext, time: Date): string {
  const parts = [time.toISOString(), level.toUpperCase().padEnd(5), message];
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(' ');
}

export function createLogger(options: LoggerOptions = {}, bound: LogContext = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(formatLine(level, message, { ...bound, ...context }, now()));
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (context) => createLogger(options, { ...bound, ...context }),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
