import type { LogLevel } from '../config/constants.js';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type EmittingLevel = Exclude<LogLevel, 'silent'>;

/**
 * Console logger writing one JSON line per event.
 * Events below `level` are dropped.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (eventLevel: EmittingLevel, message: string, fields?: LogFields) => {
    if (LEVEL_RANK[eventLevel] < threshold) {
      return;
    }

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: eventLevel,
      message,
      ...fields,
    });

    if (eventLevel === 'error') {
      console.error(line);
    } else if (eventLevel === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}

export const silentLogger: Logger = createLogger('silent');
