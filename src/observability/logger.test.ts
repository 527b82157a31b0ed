import assert from "node:assert/strict";
import test from "node:test";
import { LogLevel } from "./types";
import { errorMessage, Logger } from "./logger";

function capture(minLevel?: LogLevel) {
  const lines: Array<{ line: string; level: LogLevel }> = [];
  const logger = new Logger({ component: "crawl", runId: "run-1", minLevel }, (line, level) => lines.push({ line, level }));
  return { logger, lines };
}

test("writes one JSON object per line with context and fields", () => {
  const { logger, lines } = capture();

  logger.info("crawl_page_start", { page: 3 });

  assert.equal(lines.length, 1);
  const { ts, ...rest } = JSON.parse(lines[0].line);
  assert.equal(typeof ts, "string");
  assert.deepEqual(rest, { level: "info", msg: "crawl_page_start", component: "crawl", runId: "run-1", page: 3 });
});

test("drops lines below the threshold", () => {
  const { logger, lines } = capture("warn");

  logger.debug("noise");
  logger.info("noise");
  logger.error("boom");

  assert.deepEqual(
    lines.map((entry) => entry.level),
    ["error"],
  );
});

test("child loggers keep the run id and writer", () => {
  const { logger, lines } = capture("debug");

  logger.child("fetcher").debug("fetch_attempt");

  assert.equal(JSON.parse(lines[0].line).component, "fetcher");
  assert.equal(JSON.parse(lines[0].line).runId, "run-1");
});

test("errorMessage handles non-Error values", () => {
  assert.equal(errorMessage(new Error("bad")), "bad");
  assert.equal(errorMessage("plain"), "plain");
});
