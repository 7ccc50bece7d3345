/**
 * Scoped console logger
 *
 * All output goes to stderr so that command output on stdout stays parseable.
 * The level is process-wide; TAGGRAPH_LOG_LEVEL sets the initial value.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_NAMES: readonly string[] = LOG_LEVELS;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVEL_NAMES.includes(value);
}

const envLevel = process.env.TAGGRAPH_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function format(scope: string, message: string, meta?: LogMeta): string {
  const line = `[${scope}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) return line;
  return `${line} ${JSON.stringify(meta)}`;
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;
    const line = format(scope, message, meta);
    if (level === 'warn') {
      console.warn(line);
    } else {
      console.error(level === 'error' ? line : `${level}: ${line}`);
    }
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}
