/**
 * Sends records to a pino logger, through a child bound to `{ logger: <name> }`.
 * pino's own level still applies after this logger's.
 */

import pino from "pino";
import { BaseLogger } from "../base-logger.ts";
import { LogLevel } from "../levels.ts";
import type { BaseLoggerOptions } from "../types.ts";

export interface PinoLoggerOptions extends BaseLoggerOptions {
  /** Default: `pino()` writing JSON to stdout */
  logger?: pino.Logger;
}

export class PinoLogger extends BaseLogger {
  private readonly target: pino.Logger;

  constructor(name: string = "", level: LogLevel = LogLevel.INFO, options: PinoLoggerOptions = {}) {
    super(name, level, options);
    this.target = (options.logger ?? pino()).child({ logger: name });
  }

  protected emit(level: LogLevel, message: string): void {
    switch (level) {
      case LogLevel.TRACE:
        this.target.trace(message);
        break;
      case LogLevel.DEBUG:
        this.target.debug(message);
        break;
      case LogLevel.INFO:
        this.target.info(message);
        break;
      case LogLevel.WARN:
        this.target.warn(message);
        break;
      case LogLevel.ERROR:
        this.target.error(message);
        break;
      case LogLevel.FATAL:
        this.target.fatal(message);
        break;
    }
  }
}
