/**
 * Tests for fitting logger names into a column
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { abbreviateName, LogLevel, truncateName } from "../mod.ts";
import { fitName } from "../src/name-formatter.ts";
import { MockLogger } from "./support/mock-logger.ts";

const LONG_NAME = "com.example.application.services.OrderProcessingService";

test("package segments are cut to their first letter", () => {
  assert.equal(abbreviateName("App.Database.Repository.Orders", 40), "A.D.R.Orders");
  assert.equal(abbreviateName(LONG_NAME, 40), "c.e.a.s.OrderProcessingService");
});

test("a last segment that still does not fit is cut with an ellipsis", () => {
  assert.equal(abbreviateName("pkg.VeryLongClassNameThatKeepsGoing", 15), "p.VeryLongCl...");
  assert.equal(abbreviateName("a.b.c.Name", 6), "a.b.c....");
});

test("single-segment names are only truncated", () => {
  assert.equal(abbreviateName("Orders", 40), "Orders");
  assert.equal(abbreviateName("SingleSegmentNameThatIsLong", 10), "SingleS...");
  assert.equal(abbreviateName(""), "");
});

test("truncateName keeps width characters including the ellipsis", () => {
  assert.equal(truncateName("x".repeat(45)), `${"x".repeat(37)}...`);
  assert.equal(truncateName("short"), "short");
});

test("fitName only abbreviates names wider than the column", () => {
  assert.equal(fitName("App.Database.Repository.Orders"), "App.Database.Repository.Orders");
  assert.equal(fitName(LONG_NAME), "c.e.a.s.OrderProcessingService");
  assert.equal(fitName("App.Database.Repository.Orders", 20), "A.D.R.Orders");
});

test("getAbbreviatedName abbreviates the logger's own name", () => {
  const logger = new MockLogger("App.Database.Repository.Orders", LogLevel.INFO);
  assert.equal(logger.getAbbreviatedName(), "A.D.R.Orders");
  assert.equal(logger.getAbbreviatedName(10), "A.D.R.O...");
});
