/**
 * Logger
 * Library code logs through this interface; the CLI decides colours and stream.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (level: Exclude<LogLevel, 'silent'>, message: string) => void;

const defaultSink: LogSink = (level, message) => {
  // stdout is reserved for reports
  console.error(level === 'debug' ? `  ${message}` : message);
};

export function createLogger(level: LogLevel = 'info', sink: LogSink = defaultSink): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel) => LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: (message) => {
      if (enabled('debug')) sink('debug', message);
    },
    info: (message) => {
      if (enabled('info')) sink('info', message);
    },
    warn: (message) => {
      if (enabled('warn')) sink('warn', message);
    },
    error: (message) => {
      if (enabled('error')) sink('error', message);
    }
  };
}

export const silentLogger: Logger = createLogger('silent');

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
