/**
 * Logging facade with hierarchical level configuration
 *
 * This library provides:
 * - A `Logger` interface with printf-style, lazily evaluated messages
 * - Console, file, debug, event, pino and winston loggers that can be chained
 * - Logback-style `.properties` level rules with automatic reload
 * - Named loggers from a factory, plus a process-wide default
 *
 * @module
 */

export {
  attachLogger,
  detachLogger,
  getConfiguredLoggers,
  getLogger,
  getLoggerFactory,
  INTERNAL_LOGGER_NAME,
  log,
  resetLogging,
  setDefaultLoggerFactory,
} from "./src/logger.ts";
export { type ConfigSearchOptions, type ConfigureOptions, findConfigFile, LoggerFactory } from "./src/logger-factory.ts";
export { BaseLogger, logAtLevel, walkChain } from "./src/base-logger.ts";
export { CompositeLogger, isCompositeMember } from "./src/composite-logger.ts";
export { ConsoleLogger, type ConsoleLoggerOptions } from "./src/sinks/console-logger.ts";
export { FileLogger, type FileLoggerOptions } from "./src/sinks/file-logger.ts";
export { DebugLogger, type DebugLoggerOptions, formatDebugLine } from "./src/sinks/debug-logger.ts";
export { EventLogger, type LogEventListener, type LogEventName } from "./src/sinks/event-logger.ts";
export { NullLogger } from "./src/sinks/null-logger.ts";
export { PinoLogger, type PinoLoggerOptions } from "./src/adapters/pino-logger.ts";
export { DEFAULT_WINSTON_LEVELS, WinstonLogger, type WinstonLoggerOptions } from "./src/adapters/winston-logger.ts";
export {
  type ConfigFileSystem,
  getSpecificity,
  type LevelRule,
  matchesWildcard,
  nodeFileSystem,
  RuleStore,
  type RuleStoreOptions,
} from "./src/rule-store.ts";
export { DEFAULT_SCAN_PERIOD_MS, MIN_SCAN_PERIOD_MS, parsePropertiesLine, parseScanPeriod } from "./src/properties.ts";
export { getLevelName, isLevelName, LEVEL_NAMES, type LevelName, LogLevel, parseLevel } from "./src/levels.ts";
export { ConfigFileNotFoundError, LoggingConfigError } from "./src/errors.ts";
export { formatError, formatMessage, lazyError } from "./src/printf.ts";
export { formatTimestamp } from "./src/format.ts";
export { abbreviateName, truncateName } from "./src/name-formatter.ts";
export { type InternalLogFn, setInternalErrorFn, setInternalWarnFn } from "./src/internal-logger.ts";

export type {
  BaseLoggerOptions,
  ConsoleConfig,
  FileConfig,
  FormatConfig,
  Logger,
  LoggerFactoryOptions,
  LogMethod,
  LogRecord,
  NamedLoggerFactoryFunc,
  TimestampFormat,
} from "./src/types.ts";
