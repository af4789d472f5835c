/**
 * Line layout shared by the console and file sinks
 */

import { getLevelName, LogLevel } from "./levels.ts";
import { DEFAULT_NAME_WIDTH, fitName } from "./name-formatter.ts";
import type { ConsoleConfig, FormatConfig, LogRecord, TimestampFormat } from "./types.ts";

export function formatTimestamp(format: TimestampFormat = "ISO", date: Date = new Date()): string {
  switch (format) {
    case "ISO":
      return date.toISOString();
    case "UTC":
      return date.toUTCString();
    case "LOCAL":
      return date.toLocaleString();
    case "UNIX":
      return String(Math.floor(date.getTime() / 1000));
    case "SHORT": {
      const hours = date.getHours().toString().padStart(2, "0");
      const minutes = date.getMinutes().toString().padStart(2, "0");
      const seconds = date.getSeconds().toString().padStart(2, "0");
      return `${hours}:${minutes}:${seconds}`;
    }
    default:
      return date.toISOString();
  }
}

/** `INFO`, or `I` with the short format */
export function formatLevel(level: LogLevel, levelFormat: FormatConfig["levelFormat"] = "full"): string {
  const levelName = getLevelName(level);
  return levelFormat === "short" ? levelName.charAt(0) : levelName;
}

export function getLevelColor(level: LogLevel): string {
  if (level >= LogLevel.FATAL) return "\x1b[35m"; // Magenta
  if (level >= LogLevel.ERROR) return "\x1b[31m"; // Red
  if (level >= LogLevel.WARN) return "\x1b[33m"; // Yellow
  if (level >= LogLevel.INFO) return "\x1b[36m"; // Cyan
  return "\x1b[90m"; // Gray for DEBUG and TRACE
}

export function resetColor(): string {
  return "\x1b[0m";
}

function formatName(record: LogRecord, config: FormatConfig): string {
  if (config.includeLoggerName === false || record.loggerName === "") return "";
  return `${fitName(record.loggerName, config.nameWidth ?? DEFAULT_NAME_WIDTH)}: `;
}

/** `<timestamp> [<LEVEL>] <name>: <message>`, each part but the message optional */
export function formatConsoleLine(record: LogRecord, config: ConsoleConfig = {}): string {
  let output = "";

  if (config.includeTimestamp !== false) {
    output += `${formatTimestamp(config.timestampFormat ?? "ISO", record.timestamp)} `;
  }

  const level = formatLevel(record.level, config.levelFormat);
  if (config.colorized !== false) {
    output += `${getLevelColor(record.level)}[${level}]${resetColor()} `;
  }
  else {
    output += `[${level}] `;
  }

  return output + formatName(record, config) + record.message;
}

/** `<ISO timestamp> [<LEVEL>] <name>: <message>` */
export function formatFileLine(record: LogRecord, config: FormatConfig = {}): string {
  const level = formatLevel(record.level, config.levelFormat);
  return `${formatTimestamp("ISO", record.timestamp)} [${level}] ${formatName(record, config)}${record.message}`;
}
