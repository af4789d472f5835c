/**
 * Tests for the pino and winston adapters
 */

import assert from "node:assert/strict";
import { once } from "node:events";
import { Writable } from "node:stream";
import { test } from "node:test";
import pino from "pino";
import winston from "winston";
import { LogLevel, PinoLogger, WinstonLogger } from "../mod.ts";

function pinoCapture(): { lines: string[]; base: pino.Logger } {
  const lines: string[] = [];
  const base = pino({ level: "trace" }, {
    write(msg: string) {
      lines.push(msg);
    },
  });
  return { lines, base };
}

function winstonCapture() {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  const transport = new winston.transports.Stream({ stream });
  const base = winston.createLogger({ level: "silly", format: winston.format.json(), transports: [transport] });
  return { lines, base, transport };
}

function parseLine(line: string | undefined): Record<string, unknown> {
  assert.ok(line !== undefined);
  const parsed: unknown = JSON.parse(line);
  assert.ok(typeof parsed === "object" && parsed !== null);
  return Object.fromEntries(Object.entries(parsed));
}

test("pino: message and logger name in the JSON record", () => {
  const { lines, base } = pinoCapture();
  const logger = new PinoLogger("app.db", LogLevel.TRACE, { logger: base });

  logger.info("hello %s", "pino");

  assert.equal(lines.length, 1);
  const record = parseLine(lines[0]);
  assert.equal(record.msg, "hello pino");
  assert.equal(record.logger, "app.db");
  assert.equal(record.level, 30);
});

test("pino: every level maps to its pino level", () => {
  const { lines, base } = pinoCapture();
  const logger = new PinoLogger("levels", LogLevel.TRACE, { logger: base });

  logger.trace("t");
  logger.debug("d");
  logger.info("i");
  logger.warn("w");
  logger.error("e");
  logger.fatal("f");

  assert.deepEqual(lines.map((line) => parseLine(line).level), [10, 20, 30, 40, 50, 60]);
});

test("pino: filtered before reaching pino", () => {
  const { lines, base } = pinoCapture();
  const logger = new PinoLogger("quiet", LogLevel.WARN, { logger: base });

  logger.info("dropped");
  logger.warn("kept");

  assert.equal(lines.length, 1);
  assert.equal(parseLine(lines[0]).msg, "kept");
});

test("winston: record carries level, message and logger", async () => {
  const { lines, base, transport } = winstonCapture();
  const logger = new WinstonLogger("app.db", LogLevel.TRACE, { logger: base });

  const logged = once(transport, "logged");
  logger.info("hello %s", "winston");
  await logged;

  assert.deepEqual(parseLine(lines[0]), { level: "info", message: "hello winston", logger: "app.db" });
});

test("winston: TRACE maps to silly and FATAL to error", async () => {
  const { lines, base, transport } = winstonCapture();
  const logger = new WinstonLogger("levels", LogLevel.TRACE, { logger: base });

  const traced = once(transport, "logged");
  logger.trace("t");
  await traced;
  const fatal = once(transport, "logged");
  logger.fatal("f");
  await fatal;

  assert.deepEqual(lines.map((line) => parseLine(line).level), ["silly", "error"]);
});

test("winston: level map can be overridden", async () => {
  const { lines, base, transport } = winstonCapture();
  const logger = new WinstonLogger("custom", LogLevel.TRACE, { logger: base, levels: { [LogLevel.FATAL]: "warn" } });

  const logged = once(transport, "logged");
  logger.fatal("downgraded");
  await logged;

  assert.equal(parseLine(lines[0]).level, "warn");
});
