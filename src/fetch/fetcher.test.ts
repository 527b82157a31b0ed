import assert from "node:assert/strict";
import test from "node:test";
import { fetcherOptionsFrom } from "../config";
import { FetchLike } from "../core/fetch";
import { silentLogger, StatsRegistry } from "../observability";
import { FakeTransport, htmlResponse, listingPage, noSleep, testConfig } from "../testing/fixtures";
import { Fetcher } from "./fetcher";
import { FetchError } from "./types";

const URL_1 = "https://putusan.example.test/direktori?page=1";
const PAGE = listingPage([]);

function okTransport(name: "http" | "browser", content = PAGE): FakeTransport {
  return new FakeTransport(name, async () => ({ content, status: 200 }));
}

function failingTransport(name: "http" | "browser", reason: "blocked" | "timeout"): FakeTransport {
  return new FakeTransport(name, async (url) => {
    throw new FetchError(reason, `${reason} for ${url}`);
  });
}

function fetcher(http: FakeTransport, browser: FakeTransport, browserFallback: boolean) {
  const stats = new StatsRegistry();
  const instance = new Fetcher({
    options: fetcherOptionsFrom(testConfig({ browserFallback })),
    logger: silentLogger("fetcher"),
    stats,
    http,
    browser,
  });
  return { instance, stats };
}

test("uses the HTTP transport when it succeeds", async () => {
  const http = okTransport("http");
  const browser = okTransport("browser");
  const { instance, stats } = fetcher(http, browser, true);

  const outcome = await instance.fetch(URL_1);

  assert.deepEqual(outcome, { ok: true, url: URL_1, content: PAGE, status: 200, transport: "http" });
  assert.deepEqual(browser.requested, []);
  assert.equal(stats.getCounter("requests_ok"), 1);
  assert.deepEqual(stats.getStats().transportUsage, { http: 1, browser: 0 });
});

test("falls back to the browser when HTTP fails", async () => {
  const http = failingTransport("http", "blocked");
  const browser = okTransport("browser");
  const { instance, stats } = fetcher(http, browser, true);

  const outcome = await instance.fetch(URL_1);

  assert.equal(outcome.ok, true);
  assert.equal(outcome.ok && outcome.transport, "browser");
  assert.deepEqual(stats.getStats().transportUsage, { http: 1, browser: 1 });
});

test("content that fails validation counts as a failed transport", async () => {
  const http = okTransport("http", "<html><body>Access Denied</body></html>");
  const browser = failingTransport("browser", "timeout");
  const { instance, stats } = fetcher(http, browser, true);

  const outcome = await instance.fetch(URL_1);

  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.equal(outcome.reason, "exhausted_fallbacks");
    assert.deepEqual(
      outcome.attempts.map((attempt) => [attempt.transport, attempt.reason]),
      [
        ["http", "validation_failed"],
        ["browser", "timeout"],
      ],
    );
  }
  assert.equal(stats.getCounter("requests_failed"), 1);
  assert.deepEqual(
    stats.getStats().failedUrls.map((failure) => [failure.url, failure.reason]),
    [[URL_1, "exhausted_fallbacks"]],
  );
});

test("without the fallback a failure keeps the transport's own reason", async () => {
  const http = failingTransport("http", "blocked");
  const browser = okTransport("browser");
  const { instance } = fetcher(http, browser, false);

  const outcome = await instance.fetch(URL_1);

  assert.equal(outcome.ok, false);
  assert.equal(!outcome.ok && outcome.reason, "blocked");
  assert.deepEqual(browser.requested, []);
});

test("a browser hint skips the HTTP transport", async () => {
  const http = okTransport("http");
  const browser = okTransport("browser");
  const { instance } = fetcher(http, browser, false);

  await instance.fetch(URL_1, "browser");

  assert.deepEqual(http.requested, []);
  assert.deepEqual(browser.requested, [URL_1]);
});

test("close shuts down both transports", async () => {
  const http = okTransport("http");
  const browser = okTransport("browser");
  const { instance } = fetcher(http, browser, true);

  await instance.close();

  assert.equal(http.closed, 1);
  assert.equal(browser.closed, 1);
});

test("a Retry-After of two seconds is honoured over HTTP before any fallback", async () => {
  let calls = 0;
  const fetchFn: FetchLike = async () => {
    calls += 1;
    return calls === 1 ? htmlResponse("slow down", 429, { "retry-after": "2" }) : htmlResponse(PAGE);
  };
  const browser = okTransport("browser");
  const stats = new StatsRegistry();
  const instance = new Fetcher({
    options: fetcherOptionsFrom(testConfig({ browserFallback: true, delayRangeMs: [0, 0] })),
    logger: silentLogger("fetcher"),
    stats,
    browser,
    fetchFn,
  });

  const startedAt = Date.now();
  const outcome = await instance.fetch(URL_1);
  const elapsed = Date.now() - startedAt;

  assert.equal(outcome.ok && outcome.transport, "http");
  assert.ok(elapsed >= 1900, `waited only ${elapsed}ms`);
  assert.equal(calls, 2);
  assert.deepEqual(browser.requested, []);
  await instance.close();
});

test("a retryable status is retried through the injected sleep", async () => {
  let calls = 0;
  const fetchFn: FetchLike = async () => {
    calls += 1;
    return calls === 1 ? htmlResponse("busy", 503) : htmlResponse(PAGE);
  };
  const instance = new Fetcher({
    options: fetcherOptionsFrom(testConfig()),
    logger: silentLogger("fetcher"),
    stats: new StatsRegistry(),
    browser: okTransport("browser"),
    fetchFn,
    sleep: noSleep,
  });

  const outcome = await instance.fetch(URL_1);

  assert.equal(outcome.ok, true);
  assert.equal(calls, 2);
});

test("an interrupted fetch skips the fallback and is not counted as failed", async () => {
  const controller = new AbortController();
  const http = new FakeTransport("http", async (url) => {
    controller.abort();
    throw new FetchError("interrupted", `Fetch interrupted for ${url}`);
  });
  const browser = okTransport("browser");
  const { instance, stats } = fetcher(http, browser, true);

  const outcome = await instance.fetch(URL_1, "auto", controller.signal);

  assert.equal(outcome.ok, false);
  assert.equal(!outcome.ok && outcome.reason, "interrupted");
  assert.deepEqual(browser.requested, []);
  assert.equal(stats.getCounter("requests_failed"), 0);
});
