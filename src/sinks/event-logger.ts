/**
 * Delivers records as events on a later turn of the event loop; listeners
 * never run inside the log call.
 *
 * ```typescript
 * const events = new EventLogger("ui");
 * events.on("error", (record) => showBanner(record.message));
 * events.on("message", (record) => appendToPanel(record));
 * ```
 *
 * A record fires the event named after its level (`trace` ... `fatal`), or
 * `message` when that event has no listener. Records fire in the order logged.
 */

import { EventEmitter } from "node:events";
import { BaseLogger } from "../base-logger.ts";
import { internalError } from "../internal-logger.ts";
import { getLevelName, LogLevel } from "../levels.ts";
import type { BaseLoggerOptions, LogRecord } from "../types.ts";

export type LogEventName = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "message";

export type LogEventListener = (record: LogRecord) => void;

function eventNameFor(level: LogLevel): LogEventName {
  switch (level) {
    case LogLevel.TRACE:
      return "trace";
    case LogLevel.DEBUG:
      return "debug";
    case LogLevel.INFO:
      return "info";
    case LogLevel.WARN:
      return "warn";
    case LogLevel.ERROR:
      return "error";
    case LogLevel.FATAL:
      return "fatal";
  }
}

export class EventLogger extends BaseLogger {
  private readonly events = new EventEmitter();
  private pending = 0;

  constructor(name: string = "", level: LogLevel = LogLevel.TRACE, options: BaseLoggerOptions = {}) {
    super(name, level, options);
  }

  on(event: LogEventName, listener: LogEventListener): this {
    this.events.on(event, listener);
    return this;
  }

  off(event: LogEventName, listener: LogEventListener): this {
    this.events.off(event, listener);
    return this;
  }

  listenerCount(event: LogEventName): number {
    return this.events.listenerCount(event);
  }

  /** Records queued but not yet delivered */
  get pendingCount(): number {
    return this.pending;
  }

  /** Resolves once every record queued so far has been delivered */
  flush(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
  }

  protected emit(level: LogLevel, message: string): void {
    const record: LogRecord = { level, loggerName: this.name, message, timestamp: new Date() };
    this.pending++;
    setImmediate(() => {
      this.pending--;
      this.deliver(record);
    });
  }

  private deliver(record: LogRecord): void {
    const event = eventNameFor(record.level);
    const target = this.events.listenerCount(event) > 0 ? event : "message";
    try {
      this.events.emit(target, record);
    }
    catch (error) {
      internalError(`Listener for "${target}" on logger "${this.name}" failed (${getLevelName(record.level)}): ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
