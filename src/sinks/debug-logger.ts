/**
 * Writes through `util.debuglog`, so output appears only when `NODE_DEBUG`
 * names the section (`NODE_DEBUG=logfacade node app.js`).
 *
 * Lines read `<ISO timestamp> <LEVEL> [<name>] : <message>`, with the name
 * right-aligned in a 40-column field or cut to 37 characters and `...`.
 */

import { debuglog } from "node:util";
import { BaseLogger } from "../base-logger.ts";
import { formatTimestamp } from "../format.ts";
import { getLevelName, LogLevel } from "../levels.ts";
import { DEFAULT_NAME_WIDTH, truncateName } from "../name-formatter.ts";
import type { BaseLoggerOptions } from "../types.ts";

export interface DebugLoggerOptions extends BaseLoggerOptions {
  /** `NODE_DEBUG` section. Default: "logfacade" */
  section?: string;
  /** Replaces debuglog as the destination */
  write?: (line: string) => void;
}

export class DebugLogger extends BaseLogger {
  private readonly write: (line: string) => void;

  constructor(name: string = "", level: LogLevel = LogLevel.INFO, options: DebugLoggerOptions = {}) {
    super(name, level, options);
    if (options.write) {
      this.write = options.write;
    }
    else {
      const debug = debuglog(options.section ?? "logfacade");
      this.write = (line) => debug("%s", line);
    }
  }

  protected emit(level: LogLevel, message: string): void {
    this.write(formatDebugLine(this.name, level, message, new Date()));
  }
}

export function formatDebugLine(name: string, level: LogLevel, message: string, timestamp: Date): string {
  const prefix = `${formatTimestamp("ISO", timestamp)} ${getLevelName(level).padEnd(5)}`;
  if (name === "") return `${prefix} : ${message}`;

  const column = name.length > DEFAULT_NAME_WIDTH ? truncateName(name, DEFAULT_NAME_WIDTH) : name.padStart(DEFAULT_NAME_WIDTH);
  return `${prefix} [${column}] : ${message}`;
}
