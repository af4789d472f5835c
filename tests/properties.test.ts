/**
 * Tests for .properties line and scan period parsing
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { DEFAULT_SCAN_PERIOD_MS, MIN_SCAN_PERIOD_MS, parsePropertiesLine, parseScanPeriod } from "../mod.ts";
import { splitLines } from "../src/properties.ts";

test("parsePropertiesLine splits on the first '=' and trims both sides", () => {
  assert.deepEqual(parsePropertiesLine("  app.db = DEBUG  "), { key: "app.db", value: "DEBUG" });
  assert.deepEqual(parsePropertiesLine("a=b=c"), { key: "a", value: "b=c" });
});

test("parsePropertiesLine skips comments, blanks and incomplete lines", () => {
  assert.equal(parsePropertiesLine(""), undefined);
  assert.equal(parsePropertiesLine("   "), undefined);
  assert.equal(parsePropertiesLine("# root=DEBUG"), undefined);
  assert.equal(parsePropertiesLine("  ! root=DEBUG"), undefined);
  assert.equal(parsePropertiesLine("no equals sign here"), undefined);
  assert.equal(parsePropertiesLine("=DEBUG"), undefined);
  assert.equal(parsePropertiesLine("app.db="), undefined);
});

test("splitLines handles LF, CRLF and CR", () => {
  assert.deepEqual(splitLines("a=1\nb=2\r\nc=3\rd=4"), ["a=1", "b=2", "c=3", "d=4"]);
});

test("parseScanPeriod converts every unit", () => {
  assert.equal(parseScanPeriod("1500 ms"), 1_500);
  assert.equal(parseScanPeriod("2000 milliseconds"), 2_000);
  assert.equal(parseScanPeriod("30 seconds"), 30_000);
  assert.equal(parseScanPeriod("1 second"), 1_000);
  assert.equal(parseScanPeriod("5 s"), 5_000);
  assert.equal(parseScanPeriod("2 m"), 120_000);
  assert.equal(parseScanPeriod("1 minute"), 60_000);
  assert.equal(parseScanPeriod("1 h"), 3_600_000);
  assert.equal(parseScanPeriod("2 hours"), 7_200_000);
  assert.equal(parseScanPeriod("1 d"), 86_400_000);
  assert.equal(parseScanPeriod("1 day"), 86_400_000);
});

test("parseScanPeriod accepts fractions and truncates the result", () => {
  assert.equal(parseScanPeriod("1.5 h"), 5_400_000);
  assert.equal(parseScanPeriod("1.9999 s"), 1_999);
});

test("parseScanPeriod ignores unit case and extra whitespace", () => {
  assert.equal(parseScanPeriod("  10   SECONDS "), 10_000);
});

test("parseScanPeriod falls back to the default for malformed values", () => {
  assert.equal(parseScanPeriod("10"), DEFAULT_SCAN_PERIOD_MS);
  assert.equal(parseScanPeriod("10 fortnights"), DEFAULT_SCAN_PERIOD_MS);
  assert.equal(parseScanPeriod("ten seconds"), DEFAULT_SCAN_PERIOD_MS);
  assert.equal(parseScanPeriod("10 seconds please"), DEFAULT_SCAN_PERIOD_MS);
  assert.equal(parseScanPeriod(""), DEFAULT_SCAN_PERIOD_MS);
});

test("parseScanPeriod never goes below one second", () => {
  assert.equal(parseScanPeriod("500 ms"), MIN_SCAN_PERIOD_MS);
  assert.equal(parseScanPeriod("0 s"), MIN_SCAN_PERIOD_MS);
  assert.equal(parseScanPeriod("-5 minutes"), MIN_SCAN_PERIOD_MS);
});
