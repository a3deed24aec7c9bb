/**
 * Scoped stderr logger.
 *
 * stdout belongs to the MCP stdio transport, so every level writes to stderr.
 * The minimum level comes from LOG_LEVEL, or DEBUG=true for debug output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let configuredLevel: LogLevel | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_PRIORITY, value);
}

function getMinLevel(): LogLevel {
  if (configuredLevel) return configuredLevel;
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) return envLevel;
  return process.env.DEBUG === 'true' ? 'debug' : 'info';
}

export function setLogLevel(level: LogLevel): void {
  configuredLevel = level;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, context?: Record<string, unknown>) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[getMinLevel()]) return;
  const prefix = level === 'info' ? `[${scope}]` : `[${scope}] ${level.toUpperCase()}`;
  if (context && Object.keys(context).length > 0) {
    console.error(`${prefix} ${message}`, JSON.stringify(context));
  } else {
    console.error(`${prefix} ${message}`);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, context) => write('debug', scope, message, context),
    info: (message, context) => write('info', scope, message, context),
    warn: (message, context) => write('warn', scope, message, context),
    error: (message, context) => write('error', scope, message, context),
  };
}
