/**
 * Logger interface and configuration types
 */

import type { LogLevel } from "./levels.ts";
import type { RuleStore } from "./rule-store.ts";

/**
 * A leveled log call. Format args follow sprintf-js syntax; function args are
 * evaluated only if the message is rendered.
 */
export interface LogMethod {
  (message: string, ...args: unknown[]): void;
  (error: Error, message: string, ...args: unknown[]): void;
}

export interface Logger {
  readonly name: string;

  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  /** Log an error (or any thrown value) at ERROR, with its stack */
  exception(error: unknown): void;

  isTraceEnabled(): boolean;
  isDebugEnabled(): boolean;
  isInfoEnabled(): boolean;
  isWarnEnabled(): boolean;
  isErrorEnabled(): boolean;
  isFatalEnabled(): boolean;
  isEnabled(level: LogLevel): boolean;

  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;
  getAbbreviatedName(width?: number): string;

  /** Append a logger to the end of this chain; returns it, or undefined when refused */
  addToChain(logger: Logger | undefined): Logger | undefined;
  removeFromChain(logger: Logger): boolean;
  /** Number of loggers in the chain, this one included */
  getChainCount(): number;
  clearChain(): void;
  getNext(): Logger | undefined;
  setNext(logger: Logger | undefined): void;
}

export interface BaseLoggerOptions {
  /** Called at the start of every log call, before any level check */
  beforeLog?: () => void;
  /** Append the stack of an attached error. Default: false */
  includeStackTrace?: boolean;
}

/** One rendered record, as handed to sinks and event listeners */
export interface LogRecord {
  level: LogLevel;
  loggerName: string;
  message: string;
  timestamp: Date;
}

export type TimestampFormat = "ISO" | "UTC" | "LOCAL" | "UNIX" | "SHORT";

export interface FormatConfig {
  levelFormat?: "full" | "short"; // Defaults to "full"
  includeLoggerName?: boolean; // Defaults to true
  nameWidth?: number; // Defaults to 40; longer names are abbreviated
}

export interface ConsoleConfig extends FormatConfig {
  colorized?: boolean; // Defaults to true
  includeTimestamp?: boolean; // Defaults to true
  timestampFormat?: TimestampFormat; // Defaults to ISO
}

export interface FileConfig extends FormatConfig {
  dir?: string; // Defaults to ./logs
  filename?: string; // Defaults to {name}.log, or app.log for the root logger
  mode?: "a" | "w" | "x"; // Defaults to "a" (append)
}

/** Creates the logger for a name; the factory supplies the resolved level */
export type NamedLoggerFactoryFunc = (name: string, level: LogLevel, options: BaseLoggerOptions) => Logger;

export interface LoggerFactoryOptions {
  /** Rules used to resolve levels. Default: a new, empty RuleStore */
  config?: RuleStore;
  /** Level for names no rule matches. Default: INFO */
  defaultLevel?: LogLevel;
  includeStackTrace?: boolean;
  /** Default: a ConsoleLogger per name */
  createLogger?: NamedLoggerFactoryFunc;
}
