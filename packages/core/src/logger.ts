import pino from 'pino';
import type { LogLevel } from '@devtasks/shared';

export type Logger = pino.Logger;

const LEVEL_NAMES: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.includes(value);
}

/** Level from DEVTASKS_LOG_LEVEL, read at call time. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env['DEVTASKS_LOG_LEVEL'];
  return level && isLogLevel(level) ? level : 'info';
}

/**
 * Create a named logger. Logs go to stderr so that tool output on stdout
 * reaches the caller untouched.
 */
export function createLogger(name: string, level: LogLevel = resolveLogLevel()): Logger {
  return pino({ name, level }, pino.destination({ dest: 2, sync: true }));
}
