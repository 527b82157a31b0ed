import { Logger } from "./logger";
import {
  FailedUrl,
  Stats,
  StatsCounterName,
  StatsTimerName,
  TimerSummary,
  TransportName,
} from "./types";

const TRANSPORT_COUNTERS: Record<TransportName, StatsCounterName> = {
  http: "transport_http",
  browser: "transport_browser",
};

export class StatsRegistry {
  private readonly counters = new Map<StatsCounterName, number>();
  private readonly timers = new Map<StatsTimerName, number[]>();
  private readonly failedUrls: FailedUrl[] = [];
  private recordCount = 0;

  incrementCounter(name: StatsCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  recordTransportUse(transport: TransportName): void {
    this.incrementCounter(TRANSPORT_COUNTERS[transport], 1);
  }

  recordFailedUrl(url: string, reason: string, now = new Date()): void {
    this.failedUrls.push({ url, reason, timestamp: now.toISOString() });
  }

  setRecordCount(count: number): void {
    this.recordCount = count;
  }

  startTimer(name: StatsTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounter(name: StatsCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getStats(): Stats {
    const totalRequests = this.getCounter("requests_total");
    const successfulRequests = this.getCounter("requests_ok");
    return {
      totalRequests,
      successfulRequests,
      failedRequests: this.getCounter("requests_failed"),
      transportUsage: {
        http: this.getCounter("transport_http"),
        browser: this.getCounter("transport_browser"),
      },
      downloadsOk: this.getCounter("downloads_ok"),
      downloadsFailed: this.getCounter("downloads_failed"),
      bytesDownloaded: this.getCounter("bytes_downloaded"),
      successRate: Number(((successfulRequests / Math.max(totalRequests, 1)) * 100).toFixed(2)),
      recordCount: this.recordCount,
      failedUrls: [...this.failedUrls],
      timers: {
        page_fetch_ms: this.summarize("page_fetch_ms"),
        download_ms: this.summarize("download_ms"),
      },
    };
  }

  printSummary(logger: Logger): void {
    const { failedUrls, ...summary } = this.getStats();
    logger.info("stats_summary", { ...summary, failedUrlCount: failedUrls.length });
  }

  private summarize(name: StatsTimerName): TimerSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
