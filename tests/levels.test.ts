/**
 * Tests for severity ordering and level names
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { getLevelName, isLevelName, LEVEL_NAMES, LogLevel, parseLevel } from "../mod.ts";
import { MockLogger } from "./support/mock-logger.ts";

const ALL_LEVELS = [LogLevel.TRACE, LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.FATAL];

test("levels are ordered by declaration", () => {
  assert.deepEqual(LEVEL_NAMES, ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"]);
  for (let i = 0; i < ALL_LEVELS.length; i++) {
    for (let j = 0; j < ALL_LEVELS.length; j++) {
      assert.equal(ALL_LEVELS[i] < ALL_LEVELS[j], i < j);
    }
  }
});

test("isXEnabled is true exactly for levels at or above the minimum", () => {
  for (const min of ALL_LEVELS) {
    const logger = new MockLogger("levels", min);
    assert.equal(logger.isTraceEnabled(), LogLevel.TRACE >= min);
    assert.equal(logger.isDebugEnabled(), LogLevel.DEBUG >= min);
    assert.equal(logger.isInfoEnabled(), LogLevel.INFO >= min);
    assert.equal(logger.isWarnEnabled(), LogLevel.WARN >= min);
    assert.equal(logger.isErrorEnabled(), LogLevel.ERROR >= min);
    assert.equal(logger.isFatalEnabled(), true);
  }
});

test("getLevelName returns the upper-case name", () => {
  assert.equal(getLevelName(LogLevel.TRACE), "TRACE");
  assert.equal(getLevelName(LogLevel.WARN), "WARN");
  assert.equal(getLevelName(LogLevel.FATAL), "FATAL");
});

test("parseLevel ignores case and surrounding whitespace", () => {
  assert.equal(parseLevel("debug"), LogLevel.DEBUG);
  assert.equal(parseLevel("  Warn "), LogLevel.WARN);
  assert.equal(parseLevel("FATAL"), LogLevel.FATAL);
});

test("parseLevel falls back for unknown names", () => {
  assert.equal(parseLevel("verbose"), LogLevel.INFO);
  assert.equal(parseLevel(""), LogLevel.INFO);
  assert.equal(parseLevel("critical", LogLevel.ERROR), LogLevel.ERROR);
});

test("isLevelName only accepts exact upper-case names", () => {
  assert.equal(isLevelName("INFO"), true);
  assert.equal(isLevelName("info"), false);
  assert.equal(isLevelName("WARNING"), false);
});
