/**
 * Hands out named loggers whose levels follow a {@link RuleStore}.
 *
 * ```typescript
 * const factory = new LoggerFactory();
 * factory.configure(); // logging.debug.properties, if one is found
 * const log = factory.getLogger("app.db.orders");
 * log.debug("loaded %d rows", rows.length);
 * ```
 *
 * Every logger created here checks the config file for changes on each call
 * (at most once per scan period) and all cached loggers pick up new levels.
 */

import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { isCompositeMember } from "./composite-logger.ts";
import { internalWarn } from "./internal-logger.ts";
import { LogLevel } from "./levels.ts";
import { RuleStore } from "./rule-store.ts";
import { ConsoleLogger, type ConsoleLoggerOptions } from "./sinks/console-logger.ts";
import { NullLogger } from "./sinks/null-logger.ts";
import type { Logger, LoggerFactoryOptions, NamedLoggerFactoryFunc } from "./types.ts";

export interface ConfigSearchOptions {
  /** Default: process.env */
  env?: Record<string, string | undefined>;
  /** Default: process.cwd() */
  cwd?: string;
  /** Path of the running script. Default: process.argv[1] */
  entryScript?: string;
  exists?: (path: string) => boolean;
}

export interface ConfigureOptions extends ConfigSearchOptions {
  /** Load this file instead of searching */
  configFile?: string;
}

const createConsoleLogger: NamedLoggerFactoryFunc = (name, level, options) => new ConsoleLogger(name, level, options);

/**
 * Locate the properties file for this process.
 *
 * `LOGGING_CONFIG` names the file outright. Otherwise `logging.debug.properties`
 * (`logging.properties` when `NODE_ENV=production`) is looked for in the
 * current directory, the entry script's directory and that directory's parent.
 */
export function findConfigFile(options: ConfigSearchOptions = {}): string | undefined {
  const env = options.env ?? process.env;
  const exists = options.exists ?? existsSync;

  const explicit = env.LOGGING_CONFIG?.trim();
  if (explicit) return resolve(explicit);

  const fileName = env.NODE_ENV === "production" ? "logging.properties" : "logging.debug.properties";
  const dirs = [options.cwd ?? process.cwd()];
  const entry = options.entryScript ?? process.argv[1];
  if (entry) {
    const entryDir = dirname(resolve(entry));
    dirs.push(entryDir, dirname(entryDir));
  }

  for (const dir of dirs) {
    const candidate = resolve(join(dir, fileName));
    if (exists(candidate)) return candidate;
  }
  return undefined;
}

export class LoggerFactory {
  readonly config: RuleStore;
  private readonly defaultLevel: LogLevel;
  private readonly includeStackTrace: boolean;
  private readonly defaultCreateLogger: NamedLoggerFactoryFunc;
  private createLogger: NamedLoggerFactoryFunc;
  private fixedLogger: Logger | undefined;
  private readonly loggers = new Map<string, Logger>();
  private reportedReloadError: Error | undefined;

  constructor(options: LoggerFactoryOptions = {}) {
    this.config = options.config ?? new RuleStore();
    this.defaultLevel = options.defaultLevel ?? LogLevel.INFO;
    this.includeStackTrace = options.includeStackTrace ?? false;
    this.defaultCreateLogger = options.createLogger ?? createConsoleLogger;
    this.createLogger = this.defaultCreateLogger;
  }

  /**
   * Get the logger for `name` ("" for the root logger). Names are matched
   * case-insensitively; the first spelling requested is the one displayed.
   */
  getLogger(name: string = ""): Logger {
    if (this.fixedLogger) return this.fixedLogger;

    const key = name.toLowerCase();
    const cached = this.loggers.get(key);
    if (cached) return cached;

    const logger = this.createLogger(name, this.resolveLevel(name), {
      beforeLog: () => this.checkConfigReload(),
      includeStackTrace: this.includeStackTrace,
    });
    this.loggers.set(key, logger);
    return logger;
  }

  /** Create loggers with `fn` from now on; cached loggers are dropped */
  setLoggerFactory(fn: NamedLoggerFactoryFunc): void {
    this.createLogger = fn;
    this.fixedLogger = undefined;
    this.loggers.clear();
  }

  /** Return `logger` for every name. Its level is left alone. */
  setLogger(logger: Logger): void {
    this.fixedLogger = logger;
    this.loggers.clear();
  }

  /** Back to the logger type this factory was constructed with. Rules are kept. */
  reset(): void {
    this.createLogger = this.defaultCreateLogger;
    this.fixedLogger = undefined;
    this.loggers.clear();
  }

  useConsoleLogger(options: ConsoleLoggerOptions = {}): void {
    this.setLoggerFactory((name, level, nodeOptions) => new ConsoleLogger(name, level, { ...options, ...nodeOptions }));
  }

  useNullLogger(): void {
    this.setLoggerFactory((name, level, nodeOptions) => new NullLogger(name, level, nodeOptions));
  }

  /**
   * Load rules from a properties file and apply them to every cached logger.
   * @throws ConfigFileNotFoundError when the file does not exist
   */
  loadConfig(path: string): void {
    this.config.loadFromFile(path);
    this.applyLevels();
  }

  /**
   * Load `options.configFile`, or the file {@link findConfigFile} finds.
   * Returns the path loaded, or undefined when there was nothing to load.
   */
  configure(options: ConfigureOptions = {}): string | undefined {
    const path = options.configFile ?? findConfigFile(options);
    if (path === undefined) return undefined;
    this.loadConfig(path);
    return path;
  }

  setLoggerLevel(name: string, level: LogLevel): void {
    this.config.setLoggerLevel(name, level);
    this.applyLevels();
  }

  /** Reload the config file if it is due and changed, then re-level cached loggers */
  checkConfigReload(): void {
    this.config.checkAndReloadIfNeeded();

    const error = this.config.lastReloadError;
    if (error && error !== this.reportedReloadError) {
      this.reportedReloadError = error;
      internalWarn(`Reloading ${this.config.configFile} failed, keeping previous levels: ${error.message}`);
    }

    if (this.config.wasConfigReloaded()) this.applyLevels();
  }

  /** Add `sink` to the chain of the logger for `name` */
  attachLogger(name: string, sink: Logger): Logger | undefined {
    return this.getLogger(name).addToChain(sink);
  }

  detachLogger(name: string, sink: Logger): boolean {
    const logger = this.fixedLogger ?? this.loggers.get(name.toLowerCase());
    return logger ? logger.removeFromChain(sink) : false;
  }

  /** Names of the loggers created so far */
  getConfiguredLoggers(): string[] {
    return [...this.loggers.values()].map((logger) => logger.name);
  }

  private resolveLevel(name: string): LogLevel {
    return this.config.getLevelForLogger(name, this.defaultLevel);
  }

  // Composite members are left at TRACE; their composite does the filtering
  private applyLevels(): void {
    for (const logger of this.loggers.values()) {
      if (!isCompositeMember(logger)) logger.setLevel(this.resolveLevel(logger.name));
    }
  }
}
