export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  page?: number;
  number?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type TransportName = "http" | "browser";

export type StatsCounterName =
  | "requests_total"
  | "requests_ok"
  | "requests_failed"
  | "transport_http"
  | "transport_browser"
  | "downloads_ok"
  | "downloads_failed"
  | "bytes_downloaded";

export type StatsTimerName = "page_fetch_ms" | "download_ms";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface FailedUrl {
  url: string;
  reason: string;
  timestamp: string;
}

export interface Stats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  transportUsage: Record<TransportName, number>;
  downloadsOk: number;
  downloadsFailed: number;
  bytesDownloaded: number;
  successRate: number;
  recordCount: number;
  failedUrls: FailedUrl[];
  timers: Record<StatsTimerName, TimerSummary>;
}
