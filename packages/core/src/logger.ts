/**
 * Levelled console logging.
 *
 * The threshold is whatever `setLogLevel` was last given, or else
 * STASHLINK_LOG_LEVEL, or "info":
 *   - "verbose" - store hits/commits, grafts, freezes
 *   - "info"    - normal operational messages
 *   - "warn"    - degraded but successful operations
 *   - "error"   - errors only
 *   - "silent"  - nothing
 */

export const LOG_LEVELS = ['verbose', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  verbose: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let configuredLevel: LogLevel | undefined;

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function setLogLevel(level: LogLevel | undefined): void {
  configuredLevel = level;
}

export function getLogLevel(): LogLevel {
  if (configuredLevel) return configuredLevel;
  const fromEnv = process.env['STASHLINK_LOG_LEVEL'];
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLogLevel()];
}

export function logVerbose(tag: string, message: string, ...args: unknown[]): void {
  if (shouldLog('verbose')) {
    console.log(`[${tag}] ${message}`, ...args);
  }
}

export function logInfo(tag: string, message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    console.log(`[${tag}] ${message}`, ...args);
  }
}

export function logWarn(tag: string, message: string, ...args: unknown[]): void {
  if (shouldLog('warn')) {
    console.warn(`[${tag}] ${message}`, ...args);
  }
}

export function logError(tag: string, message: string, ...args: unknown[]): void {
  if (shouldLog('error')) {
    console.error(`[${tag}] ${message}`, ...args);
  }
}
