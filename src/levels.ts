/**
 * Severity scale shared by every logger, sink and configuration rule.
 */

/** Log levels, ordered from most verbose to most severe */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
}

export type LevelName = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

/** Level names in severity order */
export const LEVEL_NAMES: readonly LevelName[] = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"];

const LEVELS_BY_NAME: Record<LevelName, LogLevel> = {
  TRACE: LogLevel.TRACE,
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  FATAL: LogLevel.FATAL,
};

export function getLevelName(level: LogLevel): LevelName {
  return LEVEL_NAMES[level] ?? "INFO";
}

export function isLevelName(value: string): value is LevelName {
  return LEVEL_NAMES.some((name) => name === value);
}

/**
 * Parse a level name, ignoring case and surrounding whitespace.
 * Unknown names resolve to `fallback` (INFO unless given).
 */
export function parseLevel(value: string, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const name = value.trim().toUpperCase();
  return isLevelName(name) ? LEVELS_BY_NAME[name] : fallback;
}
