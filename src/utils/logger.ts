/**
 * Leveled console logger.
 * One instance per run, passed through constructors; components derive scoped children.
 */

import type { LogLevel } from '../types.ts';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
  silent: 4,
};

type EmitLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, data?: object): void;
  info(message: string, data?: object): void;
  warning(message: string, data?: object): void;
  error(message: string, data?: object): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Output sink, console by default */
  write?: (level: EmitLevel, line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export function formatMessage(level: EmitLevel, message: string, data?: object, scope?: string): string {
  const timestamp = new Date().toISOString();
  const prefix = scope
    ? `[${timestamp}] [${level.toUpperCase()}] [${scope}]`
    : `[${timestamp}] [${level.toUpperCase()}]`;

  if (data && Object.keys(data).length > 0) {
    return `${prefix} ${message} ${JSON.stringify(data)}`;
  }
  return `${prefix} ${message}`;
}

function consoleWrite(level: EmitLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warning':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const write = options.write ?? consoleWrite;
  const scope = options.scope;

  const emit = (target: EmitLevel, message: string, data?: object): void => {
    if (LOG_LEVELS[target] >= LOG_LEVELS[level]) {
      write(target, formatMessage(target, message, data, scope));
    }
  };

  return {
    level,
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warning: (message, data) => emit('warning', message, data),
    error: (message, data) => emit('error', message, data),
    child: (childScope) =>
      createLogger({ level, write, scope: scope ? `${scope}:${childScope}` : childScope }),
  };
}
