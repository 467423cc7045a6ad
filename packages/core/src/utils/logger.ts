/**
 * Console logger with a coloured scope prefix.
 *
 * Debug lines are only written while the `--debug` startup flag is active;
 * the check happens per call so flags applied after construction still count.
 */

import chalk from 'chalk';

import { getDebugFlag } from '../lib/startupFlags.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogSink {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
  child: (scope: string) => Logger;
}

export interface CreateLoggerOptions {
  sink?: LogSink;
  isDebugEnabled?: () => boolean;
}

const LEVEL_STYLES: Record<LogLevel, (value: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function createLogger(scope: string, options: CreateLoggerOptions = {}): Logger {
  const sink = options.sink ?? console;
  const isDebugEnabled = options.isDebugEnabled ?? getDebugFlag;
  const prefix = (level: LogLevel) => LEVEL_STYLES[level](`[${scope}]`);

  return {
    debug: (message, ...details) => {
      if (!isDebugEnabled()) {
        return;
      }
      sink.log(prefix('debug'), chalk.gray(message), ...details);
    },
    info: (message, ...details) => {
      sink.log(prefix('info'), message, ...details);
    },
    warn: (message, ...details) => {
      sink.warn(prefix('warn'), message, ...details);
    },
    error: (message, ...details) => {
      sink.error(prefix('error'), message, ...details);
    },
    child: (childScope) => createLogger(`${scope}:${childScope}`, options),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
