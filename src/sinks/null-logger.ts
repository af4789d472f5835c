import { BaseLogger } from "../base-logger.ts";
import type { LogLevel } from "../levels.ts";

/** Discards every record. Loggers chained after it still receive them. */
export class NullLogger extends BaseLogger {
  override isEnabled(_level: LogLevel): boolean {
    return false;
  }

  protected emit(_level: LogLevel, _message: string): void {}
}
