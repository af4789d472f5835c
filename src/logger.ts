/**
 * Process-wide default loggers.
 * The default factory is created on first use and loads the properties file
 * {@link findConfigFile} locates; without one every logger logs INFO and up
 * to the console.
 */

import { LoggerFactory } from "./logger-factory.ts";
import { setInternalErrorFn, setInternalWarnFn } from "./internal-logger.ts";
import type { Logger } from "./types.ts";

/** Logger the library reports its own problems to */
export const INTERNAL_LOGGER_NAME = "logfacade";

let defaultFactory: LoggerFactory | undefined;

function routeInternalLogging(factory: LoggerFactory): void {
  setInternalErrorFn((message) => factory.getLogger(INTERNAL_LOGGER_NAME).error(message));
  setInternalWarnFn((message) => factory.getLogger(INTERNAL_LOGGER_NAME).warn(message));
}

/**
 * Synchronous setup: config discovery, then internal logging routed to the new factory
 */
function setupLoggerSync(): LoggerFactory {
  const factory = new LoggerFactory();
  routeInternalLogging(factory);
  try {
    factory.configure();
  }
  catch (error) {
    factory.getLogger(INTERNAL_LOGGER_NAME).warn(`Logging configuration not loaded, using defaults: ${error instanceof Error ? error.message : String(error)}`);
  }
  return factory;
}

export function getLoggerFactory(): LoggerFactory {
  if (!defaultFactory) {
    defaultFactory = setupLoggerSync();
  }
  return defaultFactory;
}

/** Replace the default factory, e.g. with one configured by the application */
export function setDefaultLoggerFactory(factory: LoggerFactory): void {
  defaultFactory = factory;
  routeInternalLogging(factory);
}

/** Forget the default factory; the next call sets up a new one */
export function resetLogging(): void {
  defaultFactory = undefined;
  setInternalErrorFn(undefined);
  setInternalWarnFn(undefined);
}

/**
 * Get a logger from the default factory
 * @param name Dotted logger name; omit for the root logger
 */
export function getLogger(name?: string): Logger {
  return getLoggerFactory().getLogger(name ?? "");
}

/** The root logger */
export function log(): Logger {
  return getLogger();
}

/**
 * Dynamically attach a logger to the chain of a named logger.
 * Useful for streaming records to an EventLogger or adding a temporary sink.
 * @param loggerName Logger name (or undefined for the root logger)
 */
export function attachLogger(loggerName: string | undefined, logger: Logger): Logger | undefined {
  return getLoggerFactory().attachLogger(loggerName ?? "", logger);
}

/**
 * Dynamically detach a logger from the chain of a named logger
 * @param loggerName Logger name (or undefined for the root logger)
 */
export function detachLogger(loggerName: string | undefined, logger: Logger): boolean {
  return getLoggerFactory().detachLogger(loggerName ?? "", logger);
}

/** Names of all loggers handed out by the default factory */
export function getConfiguredLoggers(): string[] {
  return getLoggerFactory().getConfiguredLoggers();
}
