/**
 * Leveled logger that writes to stderr only.
 *
 * stdout carries the MCP JSON-RPC stream, so nothing may be printed there.
 * Every line passes through redactForLogging before it is written.
 */

import { redactForLogging } from './security.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : 'info';
}

const currentLevel = resolveLogLevel(process.env.LOG_LEVEL);

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLevel];
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return redactForLogging(`${arg.name}: ${arg.message}${arg.stack ? `\n${arg.stack}` : ''}`);
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return redactForLogging(JSON.stringify(arg, null, 2));
    } catch {
      return redactForLogging(String(arg));
    }
  }
  return redactForLogging(String(arg));
}

export function formatLogLine(level: LogLevel, scope: string | undefined, message: string, args: unknown[], now: Date = new Date()): string {
  const prefix = `[${now.toISOString()}] [${level.toUpperCase()}]${scope ? ` [${scope}]` : ''}`;
  const safeMessage = redactForLogging(message);

  if (args.length > 0) {
    return `${prefix} ${safeMessage} ${args.map(formatArg).join(' ')}`;
  }
  return `${prefix} ${safeMessage}`;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger whose lines carry a `[scope]` tag */
  scoped(scope: string): Logger;
}

function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (shouldLog(level)) {
      console.error(formatLogLine(level, scope, message, args));
    }
  };

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
    scoped: (child) => createLogger(scope ? `${scope}:${child}` : child),
  };
}

export const logger: Logger = createLogger();
