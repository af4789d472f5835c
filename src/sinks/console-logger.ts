/**
 * Writes one line per record to the console:
 * `2024-01-01T10:00:00.000Z [INFO] app.http: listening`.
 * ERROR and FATAL go to console.error, WARN to console.warn, the rest to console.log.
 */

import { BaseLogger } from "../base-logger.ts";
import { formatConsoleLine } from "../format.ts";
import { LogLevel } from "../levels.ts";
import type { BaseLoggerOptions, ConsoleConfig } from "../types.ts";

export type ConsoleLoggerOptions = ConsoleConfig & BaseLoggerOptions;

export class ConsoleLogger extends BaseLogger {
  private readonly config: ConsoleConfig;

  constructor(name: string = "", level: LogLevel = LogLevel.INFO, options: ConsoleLoggerOptions = {}) {
    super(name, level, options);
    this.config = options;
  }

  protected emit(level: LogLevel, message: string): void {
    const line = formatConsoleLine({ level, loggerName: this.name, message, timestamp: new Date() }, this.config);

    if (level >= LogLevel.ERROR) console.error(line);
    else if (level === LogLevel.WARN) console.warn(line);
    else console.log(line);
  }
}
