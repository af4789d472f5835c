/**
 * Sends records to a winston logger as `{ level, message, logger }`.
 */

import winston from "winston";
import { BaseLogger } from "../base-logger.ts";
import { LogLevel } from "../levels.ts";
import type { BaseLoggerOptions } from "../types.ts";

/** winston (npm) level for each facade level */
export const DEFAULT_WINSTON_LEVELS: Readonly<Record<LogLevel, string>> = {
  [LogLevel.TRACE]: "silly",
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
  [LogLevel.FATAL]: "error",
};

export interface WinstonLoggerOptions extends BaseLoggerOptions {
  /** Default: a winston logger with one Console transport */
  logger?: winston.Logger;
  levels?: Partial<Record<LogLevel, string>>;
}

export class WinstonLogger extends BaseLogger {
  private readonly target: winston.Logger;
  private readonly levels: Record<LogLevel, string>;

  constructor(name: string = "", level: LogLevel = LogLevel.INFO, options: WinstonLoggerOptions = {}) {
    super(name, level, options);
    this.target = options.logger ?? winston.createLogger({ transports: [new winston.transports.Console()] });
    this.levels = { ...DEFAULT_WINSTON_LEVELS, ...options.levels };
  }

  protected emit(level: LogLevel, message: string): void {
    this.target.log({ level: this.levels[level], message, logger: this.name });
  }
}
