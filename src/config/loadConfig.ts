import fs from "node:fs";
import path from "node:path";
import { LogLevel } from "../observability/types";
import { RequiredField } from "../types";
import { AppConfig, ConfigOverrides, Range } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://putusan3.mahkamahagung.go.id",
  listingPath: "/direktori",
  pageParam: "page",
  userAgents: [
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
  ],
  userAgentRotationChance: 0.1,
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  maxRetries: 3,
  retryStatusCodes: [500, 502, 503, 504],
  backoffFactorMs: 1_000,
  delayRangeMs: [1_000, 3_000],
  rateLimitBackoffRangeMs: [2_000, 5_000],
  rateLimitAttempts: 3,
  minContentBytes: 500,
  blockMarkers: ["access denied", "captcha", "404 not found", "halaman tidak ditemukan"],
  structuralTokens: ["<html", "<body", "<div", "<table"],
  browserFallback: true,
  browserHeadless: true,
  browserSettleMs: 3_000,
  requiredFields: ["number", "date", "category"],
  checkpointEvery: 10,
  checkpointPath: "data/checkpoints/last_checkpoint.json",
  downloadTimeoutMs: 120_000,
  maxDownloadAttempts: 3,
  minPdfBytes: 1_024,
  saveDebugHtml: false,
  logLevel: "info",
  outputDirs: {
    processed: "data/processed",
    downloads: "data/downloads",
    debugHtml: "logs/html_debug",
  },
};

const REQUIRED_FIELDS: readonly RequiredField[] = ["number", "date", "category"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toRange(minRaw: string | undefined, maxRaw: string | undefined, fallback: Range): Range {
  const min = toInt(minRaw, fallback[0]);
  const max = toInt(maxRaw, fallback[1]);
  return min <= max ? [min, max] : [max, min];
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(/[|,]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function toRequiredFields(value: string | undefined, fallback: RequiredField[]): RequiredField[] {
  if (value === undefined) {
    return fallback;
  }
  return REQUIRED_FIELDS.filter((field) => toList(value, []).includes(field));
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase()) ?? fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    listingPath: env.LISTING_PATH ?? merged.listingPath,
    userAgents: toList(env.USER_AGENTS, merged.userAgents),
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxRetries: toInt(env.MAX_RETRIES, merged.maxRetries),
    delayRangeMs: toRange(env.DELAY_MIN_MS, env.DELAY_MAX_MS, merged.delayRangeMs),
    rateLimitBackoffRangeMs: toRange(
      env.RATE_LIMIT_MIN_MS,
      env.RATE_LIMIT_MAX_MS,
      merged.rateLimitBackoffRangeMs,
    ),
    minContentBytes: toInt(env.MIN_CONTENT_BYTES, merged.minContentBytes),
    browserFallback: toBool(env.BROWSER_FALLBACK, merged.browserFallback),
    browserHeadless: toBool(env.BROWSER_HEADLESS, merged.browserHeadless),
    browserSettleMs: toInt(env.BROWSER_SETTLE_MS, merged.browserSettleMs),
    requiredFields: toRequiredFields(env.REQUIRED_FIELDS, merged.requiredFields),
    checkpointEvery: Math.max(1, toInt(env.CHECKPOINT_EVERY, merged.checkpointEvery)),
    checkpointPath: env.CHECKPOINT_PATH ?? merged.checkpointPath,
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    maxDownloadAttempts: toInt(env.MAX_DOWNLOAD_ATTEMPTS, merged.maxDownloadAttempts),
    minPdfBytes: toInt(env.MIN_PDF_BYTES, merged.minPdfBytes),
    saveDebugHtml: toBool(env.SAVE_DEBUG_HTML, merged.saveDebugHtml),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    outputDirs: {
      processed: env.OUTPUT_DIR ?? merged.outputDirs.processed,
      downloads: env.DOWNLOADS_DIR ?? merged.outputDirs.downloads,
      debugHtml: env.DEBUG_HTML_DIR ?? merged.outputDirs.debugHtml,
    },
  };
}

export function listingPageUrl(config: Pick<AppConfig, "baseUrl" | "listingPath" | "pageParam">, page: number): string {
  const url = new URL(config.listingPath, config.baseUrl.endsWith("/") ? config.baseUrl : `${config.baseUrl}/`);
  url.searchParams.set(config.pageParam, String(page));
  return url.toString();
}

export { DEFAULT_CONFIG };
