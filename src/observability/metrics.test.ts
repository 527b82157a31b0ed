import assert from "node:assert/strict";
import test from "node:test";
import { Logger } from "./logger";
import { StatsRegistry } from "./metrics";
import { createRunId } from "./runId";

test("success rate is rounded to two decimals", () => {
  const stats = new StatsRegistry();
  stats.incrementCounter("requests_total", 3);
  stats.incrementCounter("requests_ok", 2);
  stats.incrementCounter("requests_failed");

  const snapshot = stats.getStats();

  assert.equal(snapshot.totalRequests, 3);
  assert.equal(snapshot.failedRequests, 1);
  assert.equal(snapshot.successRate, 66.67);
});

test("an empty registry reports zeros", () => {
  const snapshot = new StatsRegistry().getStats();

  assert.equal(snapshot.successRate, 0);
  assert.deepEqual(snapshot.transportUsage, { http: 0, browser: 0 });
  assert.deepEqual(snapshot.timers.page_fetch_ms, { count: 0, min: 0, max: 0, avg: 0 });
});

test("transport use, failed URLs and record counts are tracked", () => {
  const stats = new StatsRegistry();
  stats.recordTransportUse("http");
  stats.recordTransportUse("browser");
  stats.recordTransportUse("browser");
  stats.recordFailedUrl("https://putusan.example.test/direktori?page=4", "timeout", new Date("2024-01-01T00:00:00.000Z"));
  stats.setRecordCount(42);
  const stop = stats.startTimer("download_ms");
  stop();

  const snapshot = stats.getStats();

  assert.deepEqual(snapshot.transportUsage, { http: 1, browser: 2 });
  assert.deepEqual(snapshot.failedUrls, [
    { url: "https://putusan.example.test/direktori?page=4", reason: "timeout", timestamp: "2024-01-01T00:00:00.000Z" },
  ]);
  assert.equal(snapshot.recordCount, 42);
  assert.equal(snapshot.timers.download_ms.count, 1);
});

test("printSummary logs one stats line without the failed URL list", () => {
  const lines: string[] = [];
  const logger = new Logger({ component: "test", runId: "run-1" }, (line) => lines.push(line));
  const stats = new StatsRegistry();
  stats.recordFailedUrl("https://putusan.example.test/a", "blocked");

  stats.printSummary(logger);

  assert.equal(lines.length, 1);
  const payload = JSON.parse(lines[0]);
  assert.equal(payload.msg, "stats_summary");
  assert.equal(payload.failedUrlCount, 1);
  assert.equal(payload.failedUrls, undefined);
});

test("run ids carry the command, timestamp and a random suffix", () => {
  assert.equal(
    createRunId("scrape", new Date("2024-01-02T03:04:05.678Z"), () => 0.5),
    "scrape_2024-01-02T03-04-05-678Z_i00000",
  );
});
