/**
 * Base class for every logger: level filtering, message rendering and a
 * chain of further loggers that receive each record after this one.
 *
 * ```typescript
 * const console = new ConsoleLogger("app", LogLevel.DEBUG);
 * console.addToChain(new FileLogger("app", LogLevel.WARN));
 * console.info("started on port %d", 8080); // console only
 * console.error("disk full");               // console and file
 * ```
 *
 * Subclasses implement {@link BaseLogger.emit}; it receives the final text.
 */

import { internalError, internalWarn } from "./internal-logger.ts";
import { LogLevel } from "./levels.ts";
import { abbreviateName, DEFAULT_NAME_WIDTH } from "./name-formatter.ts";
import { formatError, renderCall } from "./printf.ts";
import type { BaseLoggerOptions, Logger } from "./types.ts";

// Loggers currently running a log call; a record reaching one of them again
// came round a cycle made with setNext and is dropped there
const inProgress = new Set<Logger>();

/** Loggers reachable from `head` in order, stopping at the first repeat */
export function walkChain(head: Logger): Logger[] {
  const seen = new Set<Logger>();
  let node: Logger | undefined = head;
  while (node && !seen.has(node)) {
    seen.add(node);
    node = node.getNext();
  }
  return [...seen];
}

/** Call the leveled method of `logger` for `level` */
export function logAtLevel(logger: Logger, level: LogLevel, message: string, ...args: unknown[]): void {
  switch (level) {
    case LogLevel.TRACE:
      logger.trace(message, ...args);
      break;
    case LogLevel.DEBUG:
      logger.debug(message, ...args);
      break;
    case LogLevel.INFO:
      logger.info(message, ...args);
      break;
    case LogLevel.WARN:
      logger.warn(message, ...args);
      break;
    case LogLevel.ERROR:
      logger.error(message, ...args);
      break;
    case LogLevel.FATAL:
      logger.fatal(message, ...args);
      break;
  }
}

function once(render: () => string): () => string {
  let text: string | undefined;
  return () => {
    if (text === undefined) text = render();
    return text;
  };
}

export abstract class BaseLogger implements Logger {
  private level: LogLevel;
  private next: Logger | undefined;
  private readonly beforeLog: (() => void) | undefined;
  protected readonly includeStackTrace: boolean;

  constructor(
    readonly name: string = "",
    level: LogLevel = LogLevel.INFO,
    options: BaseLoggerOptions = {},
  ) {
    this.level = level;
    this.beforeLog = options.beforeLog;
    this.includeStackTrace = options.includeStackTrace ?? false;
  }

  /** Write one record. Only called for levels this logger is enabled for. */
  protected abstract emit(level: LogLevel, message: string): void;

  trace(message: string, ...args: unknown[]): void;
  trace(error: Error, message: string, ...args: unknown[]): void;
  trace(first: string | Error, ...rest: unknown[]): void {
    this.logCall(LogLevel.TRACE, first, rest);
  }

  debug(message: string, ...args: unknown[]): void;
  debug(error: Error, message: string, ...args: unknown[]): void;
  debug(first: string | Error, ...rest: unknown[]): void {
    this.logCall(LogLevel.DEBUG, first, rest);
  }

  info(message: string, ...args: unknown[]): void;
  info(error: Error, message: string, ...args: unknown[]): void;
  info(first: string | Error, ...rest: unknown[]): void {
    this.logCall(LogLevel.INFO, first, rest);
  }

  warn(message: string, ...args: unknown[]): void;
  warn(error: Error, message: string, ...args: unknown[]): void;
  warn(first: string | Error, ...rest: unknown[]): void {
    this.logCall(LogLevel.WARN, first, rest);
  }

  error(message: string, ...args: unknown[]): void;
  error(error: Error, message: string, ...args: unknown[]): void;
  error(first: string | Error, ...rest: unknown[]): void {
    this.logCall(LogLevel.ERROR, first, rest);
  }

  fatal(message: string, ...args: unknown[]): void;
  fatal(error: Error, message: string, ...args: unknown[]): void;
  fatal(first: string | Error, ...rest: unknown[]): void {
    this.logCall(LogLevel.FATAL, first, rest);
  }

  exception(error: unknown): void {
    this.logMessage(LogLevel.ERROR, () => formatError(error));
  }

  isTraceEnabled(): boolean {
    return this.isEnabled(LogLevel.TRACE);
  }

  isDebugEnabled(): boolean {
    return this.isEnabled(LogLevel.DEBUG);
  }

  isInfoEnabled(): boolean {
    return this.isEnabled(LogLevel.INFO);
  }

  isWarnEnabled(): boolean {
    return this.isEnabled(LogLevel.WARN);
  }

  isErrorEnabled(): boolean {
    return this.isEnabled(LogLevel.ERROR);
  }

  isFatalEnabled(): boolean {
    return this.isEnabled(LogLevel.FATAL);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getAbbreviatedName(width: number = DEFAULT_NAME_WIDTH): string {
    return abbreviateName(this.name, width);
  }

  getNext(): Logger | undefined {
    return this.next;
  }

  setNext(logger: Logger | undefined): void {
    this.next = logger;
  }

  addToChain(logger: Logger | undefined): Logger | undefined {
    if (!logger) return undefined;

    const chain = walkChain(this);
    if (chain.includes(logger)) return logger;

    // The new logger may bring its own chain along; none of it may lead back here
    if (walkChain(logger).some((node) => chain.includes(node))) {
      internalWarn(`Cannot chain "${logger.name}" after "${this.name}": it would form a cycle`);
      return undefined;
    }

    chain[chain.length - 1].setNext(logger);
    return logger;
  }

  removeFromChain(logger: Logger): boolean {
    let previous: Logger = this;
    for (const node of walkChain(this).slice(1)) {
      if (node === logger) {
        previous.setNext(node.getNext());
        node.setNext(undefined);
        return true;
      }
      previous = node;
    }
    return false;
  }

  getChainCount(): number {
    return walkChain(this).length;
  }

  clearChain(): void {
    this.next = undefined;
  }

  /**
   * Run one log call through this logger, then hand it to the next logger,
   * which applies its own reload check and level. The text is rendered at
   * most once, by the first logger that emits it.
   */
  protected logMessage(level: LogLevel, render: () => string): void {
    if (inProgress.has(this)) return;
    inProgress.add(this);
    try {
      this.dispatch(level, render);
    }
    finally {
      inProgress.delete(this);
    }
  }

  private dispatch(level: LogLevel, render: () => string): void {
    this.beforeLog?.();

    const message = once(render);
    if (this.isEnabled(level)) {
      try {
        this.emit(level, message());
      }
      catch (error) {
        internalError(`Logger "${this.name}" failed to write a record: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    if (this.next) logAtLevel(this.next, level, "%s", message);
  }

  private logCall(level: LogLevel, first: string | Error, rest: unknown[]): void {
    this.logMessage(level, () => renderCall(first, rest, this.includeStackTrace));
  }
}
