import assert from "node:assert/strict";
import test from "node:test";
import { scrapeExitCode } from "./commands";

test("a fault after pages were fetched still exits 0 once the export is written", () => {
  assert.equal(scrapeExitCode({ outcome: "failed", pagesFetched: 2, pagesSkipped: 0 }, 5, "/tmp/putusan.json"), 0);
});

test("a fault before any page was fetched exits 1", () => {
  assert.equal(scrapeExitCode({ outcome: "failed", pagesFetched: 0, pagesSkipped: 0 }, 0, undefined), 1);
});

test("a run that only skipped pages exits 1", () => {
  assert.equal(scrapeExitCode({ outcome: "end_of_data", pagesFetched: 0, pagesSkipped: 3 }, 0, undefined), 1);
});

test("records that could not be exported exit 1", () => {
  assert.equal(scrapeExitCode({ outcome: "end_of_data", pagesFetched: 1, pagesSkipped: 0 }, 3, undefined), 1);
});

test("an empty first page is not a failure", () => {
  assert.equal(scrapeExitCode({ outcome: "end_of_data", pagesFetched: 1, pagesSkipped: 0 }, 0, undefined), 0);
});
