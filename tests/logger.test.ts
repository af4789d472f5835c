/**
 * Tests for the process-wide default loggers
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  getConfiguredLoggers,
  getLogger,
  getLoggerFactory,
  INTERNAL_LOGGER_NAME,
  log,
  LoggerFactory,
  LogLevel,
  resetLogging,
  setDefaultLoggerFactory,
} from "../mod.ts";
import { MockLogger } from "./support/mock-logger.ts";

function installMockFactory(): LoggerFactory {
  const factory = new LoggerFactory({ createLogger: (name, level, options) => new MockLogger(name, level, options) });
  setDefaultLoggerFactory(factory);
  return factory;
}

test("getLogger returns a logger instance", () => {
  installMockFactory();
  const logger = getLogger();

  for (const method of [logger.trace, logger.debug, logger.info, logger.warn, logger.error, logger.fatal, logger.exception]) {
    assert.equal(typeof method, "function");
  }
});

test("getLogger uses the installed factory", () => {
  const factory = installMockFactory();

  assert.equal(getLoggerFactory(), factory);
  assert.equal(getLogger("test-module"), factory.getLogger("test-module"));
});

test("multiple getLogger calls for the same module share one logger", () => {
  installMockFactory();

  assert.equal(getLogger("same-module"), getLogger("Same-Module"));
});

test("log() is the root logger", () => {
  installMockFactory();

  assert.equal(log(), getLogger());
  assert.equal(log().name, "");
});

test("getConfiguredLoggers lists every logger handed out", () => {
  installMockFactory();
  getLogger("first");
  getLogger("second.module");

  assert.deepEqual(getConfiguredLoggers(), ["first", "second.module"]);
});

test("logger with formatted messages", () => {
  installMockFactory();
  const logger = getLogger("formatted");
  assert.ok(logger instanceof MockLogger);

  logger.info("User %s logged in", "john");
  logger.error("Error code: %d", 404);

  assert.deepEqual(logger.messages, ["User john logged in", "Error code: 404"]);
});

test("library problems are reported to the internal logger", () => {
  const factory = installMockFactory();

  getLogger("app").info("Value: %q", 1);

  const internal = factory.getLogger(INTERNAL_LOGGER_NAME);
  assert.ok(internal instanceof MockLogger);
  assert.equal(internal.messages.length, 1);
  assert.ok(internal.messages[0].startsWith("sprintf failed: "));
  assert.deepEqual(internal.levels, [LogLevel.WARN]);
});

test("resetLogging sends library problems back to the console", (t) => {
  const factory = installMockFactory();
  const warn = t.mock.method(console, "warn", () => {});

  resetLogging();
  new MockLogger("standalone").info("Value: %q", 1);

  assert.equal(warn.mock.callCount(), 1);
  assert.ok(String(warn.mock.calls[0].arguments[0]).startsWith("[logfacade] sprintf failed: "));
  assert.deepEqual(factory.getConfiguredLoggers(), []);
});

test("resetLogging makes the next call set up a new factory", () => {
  const factory = installMockFactory();

  resetLogging();

  assert.notEqual(getLoggerFactory(), factory);
});
