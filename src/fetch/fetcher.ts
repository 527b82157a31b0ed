import fs from "node:fs";
import path from "node:path";
import { FetcherOptions } from "../config";
import { FetchLike } from "../core/fetch";
import { SleepFn } from "../core/timing";
import { errorMessage, Logger, StatsRegistry } from "../observability";
import { BrowserTransport } from "./browserTransport";
import { HttpTransport } from "./httpTransport";
import { FetchError, FetchFailure, FetchOutcome, PageTransport, TransportHint } from "./types";
import { validateContent } from "./validation";

export interface FetcherDeps {
  options: FetcherOptions;
  logger: Logger;
  stats: StatsRegistry;
  http?: PageTransport;
  browser?: PageTransport;
  fetchFn?: FetchLike;
  sleep?: SleepFn;
  random?: () => number;
}

type TransportAttempt = FetchFailure["attempts"][number];

function toAttempt(transport: PageTransport, error: unknown): TransportAttempt {
  if (error instanceof FetchError) {
    return { transport: transport.name, reason: error.reason, detail: error.message };
  }
  return { transport: transport.name, reason: "connection_error", detail: errorMessage(error) };
}

function debugFileName(url: string, transport: string, now: number): string {
  let name = "index";
  try {
    const parsed = new URL(url);
    name = `${parsed.pathname}${parsed.search}`.replace(/[^A-Za-z0-9]+/g, "_").replace(/^_+|_+$/g, "") || "index";
  } catch {
    name = "invalid_url";
  }
  return `${transport}_${name}_${Math.floor(now / 1000)}.html`;
}

/**
 * Retrieves page content through the HTTP transport, falling back to a rendered
 * browser page when allowed. Never throws for network problems: failures come
 * back as a tagged FetchFailure.
 */
export class Fetcher {
  private readonly options: FetcherOptions;
  private readonly logger: Logger;
  private readonly stats: StatsRegistry;
  private readonly http: PageTransport;
  private readonly browser: PageTransport;

  constructor(deps: FetcherDeps) {
    this.options = deps.options;
    this.logger = deps.logger;
    this.stats = deps.stats;
    this.http =
      deps.http ??
      new HttpTransport({
        options: deps.options,
        logger: deps.logger.child("http_transport"),
        fetchFn: deps.fetchFn,
        sleep: deps.sleep,
        random: deps.random,
      });
    this.browser =
      deps.browser ?? new BrowserTransport({ options: deps.options, logger: deps.logger.child("browser_transport") });
  }

  async fetch(url: string, hint: TransportHint = "auto", signal?: AbortSignal): Promise<FetchOutcome> {
    this.stats.incrementCounter("requests_total", 1);
    const stopTimer = this.stats.startTimer("page_fetch_ms");
    const attempts: TransportAttempt[] = [];

    for (const transport of this.transportsFor(hint)) {
      if (signal?.aborted) {
        break;
      }
      this.stats.recordTransportUse(transport.name);
      this.logger.debug("fetch_attempt", { url, transport: transport.name });

      try {
        const page = await transport.fetchPage(url, signal);
        const validation = validateContent(page.content, this.options);
        if (!validation.valid) {
          throw new FetchError("validation_failed", `Invalid content from ${url}: ${validation.reason}`, page.status);
        }

        this.stats.incrementCounter("requests_ok", 1);
        const durationMs = stopTimer();
        this.logger.debug("fetch_ok", { url, transport: transport.name, status: page.status, durationMs });
        await this.saveDebugHtml(url, transport.name, page.content);
        return { ok: true, url, content: page.content, status: page.status, transport: transport.name };
      } catch (error) {
        const attempt = toAttempt(transport, error);
        attempts.push(attempt);
        this.logger.warn("fetch_transport_failed", { url, ...attempt });
      }
    }

    stopTimer();
    if (signal?.aborted) {
      this.logger.info("fetch_interrupted", { url });
      return {
        ok: false,
        url,
        reason: "interrupted",
        detail: `Fetch interrupted for ${url}`,
        attempts,
      };
    }

    this.stats.incrementCounter("requests_failed", 1);
    const last = attempts[attempts.length - 1];
    const reason = attempts.length > 1 ? "exhausted_fallbacks" : last.reason;
    this.stats.recordFailedUrl(url, reason);
    return {
      ok: false,
      url,
      reason,
      detail: attempts.map((attempt) => `${attempt.transport}: ${attempt.detail}`).join("; "),
      attempts,
    };
  }

  async close(): Promise<void> {
    for (const transport of [this.http, this.browser]) {
      try {
        await transport.close();
      } catch (error) {
        this.logger.warn("fetch_transport_close_failed", { transport: transport.name, error: errorMessage(error) });
      }
    }
  }

  private transportsFor(hint: TransportHint): PageTransport[] {
    if (hint === "http") {
      return [this.http];
    }
    if (hint === "browser") {
      return [this.browser];
    }
    return this.options.browserFallback ? [this.http, this.browser] : [this.http];
  }

  private async saveDebugHtml(url: string, transport: string, content: string): Promise<void> {
    if (!this.options.saveDebugHtml) {
      return;
    }

    try {
      const dir = path.resolve(this.options.debugHtmlDir);
      await fs.promises.mkdir(dir, { recursive: true });
      const filePath = path.join(dir, debugFileName(url, transport, Date.now()));
      await fs.promises.writeFile(filePath, content, "utf-8");
      this.logger.debug("fetch_debug_html_saved", { url, filePath });
    } catch (error) {
      this.logger.warn("fetch_debug_html_failed", { url, error: errorMessage(error) });
    }
  }
}
