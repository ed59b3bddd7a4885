import type { LogLevel } from '../types/config.types.js';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Writes `[microvec] message` lines to stderr for every call at or above `level`.
 */
export function createLogger(level: LogLevel, sink: LogSink = process.stderr, prefix = 'microvec'): Logger {
  const threshold = LEVELS[level];
  const emit = (at: LogLevel, message: string): void => {
    if (LEVELS[at] < threshold) return;
    const tag = at === 'info' ? '' : ` ${at}:`;
    sink.write(`[${prefix}]${tag} ${message}\n`);
  };
  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
