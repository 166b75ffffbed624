/**
 * Scoped, level-filtered logging.
 *
 * Lines are written as `[Scope] message` to a console-like sink.
 * The sink is injectable so that headless runs and tests can capture
 * or silence output.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Environment variable read by `resolveLogLevel`. */
export const LOG_LEVEL_ENV = 'GEM_ENGINE_LOG_LEVEL';

const DEFAULT_LEVEL: LogLevel = 'warn';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LogLevelSchema = z.enum(LOG_LEVELS);

/** Minimal console surface the logger writes to. */
export interface LogSink {
  debug(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** A logger with the same sink and level under a nested scope. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level that is written. Defaults to `resolveLogLevel()`. */
  level?: LogLevel;
  /** Where lines go. Defaults to `console`. */
  sink?: LogSink;
}

/**
 * Read the log level from the environment, falling back to `warn`
 * when unset. An unknown value is reported once on the console and
 * ignored.
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  const raw = env[LOG_LEVEL_ENV];
  if (raw === undefined || raw === '') return DEFAULT_LEVEL;

  const parsed = LogLevelSchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    console.warn(
      `[Logger] Ignoring ${LOG_LEVEL_ENV}="${raw}"; expected one of ${LOG_LEVELS.join(', ')}`,
    );
    return DEFAULT_LEVEL;
  }
  return parsed.data;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel();
  const sink = options.sink ?? console;
  const threshold = LEVEL_RANK[level];

  const write = (
    at: Exclude<LogLevel, 'silent'>,
    message: string,
    details: unknown[],
  ): void => {
    if (LEVEL_RANK[at] < threshold) return;
    sink[at](`[${scope}] ${message}`, ...details);
  };

  return {
    scope,
    level,
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
    child: (sub) => createLogger(`${scope}:${sub}`, { level, sink }),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' });
