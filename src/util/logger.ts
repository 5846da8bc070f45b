/**
 * Simple logger that writes everything to stderr with a level prefix.
 *
 * Stdout is reserved for the answer printed by the CLI, so log lines never
 * mix with output that may be piped into another program.
 *
 * All log output is redacted to remove API keys and tokens.
 */

import { redactForLogging } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

// Default to 'info' level, can be changed via environment variable or setLogLevel
let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLevel];
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    // Error objects don't serialize well with JSON.stringify
    const errorStr = `${arg.name}: ${arg.message}${arg.stack ? `\n${arg.stack}` : ''}`;
    const cause = arg.cause !== undefined ? `\nCaused by: ${formatArg(arg.cause)}` : '';
    return redactForLogging(errorStr) + cause;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      const jsonStr = JSON.stringify(arg, null, 2);
      return redactForLogging(jsonStr);
    } catch {
      return redactForLogging(String(arg));
    }
  }
  return redactForLogging(String(arg));
}

export function formatMessage(level: Exclude<LogLevel, 'silent'>, message: string, ...args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;

  const safeMessage = redactForLogging(message);

  if (args.length > 0) {
    return `${prefix} ${safeMessage} ${args.map(formatArg).join(' ')}`;
  }
  return `${prefix} ${safeMessage}`;
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
  if (shouldLog(level)) {
    console.error(formatMessage(level, message, ...args));
  }
}

export const logger = {
  debug: (message: string, ...args: unknown[]): void => write('debug', message, args),
  info: (message: string, ...args: unknown[]): void => write('info', message, args),
  warn: (message: string, ...args: unknown[]): void => write('warn', message, args),
  error: (message: string, ...args: unknown[]): void => write('error', message, args),
};
