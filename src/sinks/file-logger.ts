/**
 * Appends `<ISO timestamp> [<LEVEL>] <name>: <message>` lines to a file.
 * The file is opened on the first record; every record is written at once.
 */

import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { dirname, join } from "node:path";
import { BaseLogger } from "../base-logger.ts";
import { formatFileLine } from "../format.ts";
import { LogLevel } from "../levels.ts";
import type { BaseLoggerOptions, FileConfig } from "../types.ts";

export type FileLoggerOptions = FileConfig & BaseLoggerOptions;

const OPEN_FLAGS: Record<NonNullable<FileConfig["mode"]>, string> = {
  a: "a",
  w: "w",
  x: "wx",
};

export class FileLogger extends BaseLogger {
  readonly path: string;
  private readonly config: FileConfig;
  private mode: NonNullable<FileConfig["mode"]>;
  private fd: number | undefined;

  constructor(name: string = "", level: LogLevel = LogLevel.INFO, options: FileLoggerOptions = {}) {
    super(name, level, options);
    this.config = options;
    this.mode = options.mode ?? "a";
    this.path = join(options.dir ?? "./logs", options.filename ?? (name ? `${name}.log` : "app.log"));
  }

  /** Close the file; the next record reopens it in append mode */
  close(): void {
    if (this.fd === undefined) return;
    closeSync(this.fd);
    this.fd = undefined;
    this.mode = "a";
  }

  protected emit(level: LogLevel, message: string): void {
    const line = formatFileLine({ level, loggerName: this.name, message, timestamp: new Date() }, this.config);
    writeSync(this.open(), `${line}\n`);
  }

  private open(): number {
    if (this.fd === undefined) {
      mkdirSync(dirname(this.path), { recursive: true });
      this.fd = openSync(this.path, OPEN_FLAGS[this.mode]);
    }
    return this.fd;
  }
}
