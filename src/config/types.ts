import { LogLevel } from "../observability/types";
import { RequiredField } from "../types";

export type Range = [min: number, max: number];

export interface OutputDirs {
  processed: string;
  downloads: string;
  debugHtml: string;
}

export interface AppConfig {
  baseUrl: string;
  listingPath: string;
  pageParam: string;
  userAgents: string[];
  userAgentRotationChance: number;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxRetries: number;
  retryStatusCodes: number[];
  backoffFactorMs: number;
  delayRangeMs: Range;
  rateLimitBackoffRangeMs: Range;
  rateLimitAttempts: number;
  minContentBytes: number;
  blockMarkers: string[];
  structuralTokens: string[];
  browserFallback: boolean;
  browserHeadless: boolean;
  browserSettleMs: number;
  requiredFields: RequiredField[];
  checkpointEvery: number;
  checkpointPath: string;
  downloadTimeoutMs: number;
  maxDownloadAttempts: number;
  minPdfBytes: number;
  saveDebugHtml: boolean;
  logLevel: LogLevel;
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs">> & {
  outputDirs?: Partial<OutputDirs>;
};

export type FetcherOptions = Pick<
  AppConfig,
  | "userAgents"
  | "userAgentRotationChance"
  | "ignoreHttpsErrors"
  | "requestTimeoutMs"
  | "maxRetries"
  | "retryStatusCodes"
  | "backoffFactorMs"
  | "delayRangeMs"
  | "rateLimitBackoffRangeMs"
  | "rateLimitAttempts"
  | "minContentBytes"
  | "blockMarkers"
  | "structuralTokens"
  | "browserFallback"
  | "browserHeadless"
  | "browserSettleMs"
  | "saveDebugHtml"
> & { debugHtmlDir: string };

export type DownloaderOptions = Pick<
  AppConfig,
  | "userAgents"
  | "ignoreHttpsErrors"
  | "downloadTimeoutMs"
  | "maxDownloadAttempts"
  | "minPdfBytes"
  | "backoffFactorMs"
  | "delayRangeMs"
> & { downloadsDir: string };

export interface ExtractorOptions {
  baseUrl: string;
  requiredFields: RequiredField[];
}

export function fetcherOptionsFrom(config: AppConfig): FetcherOptions {
  return {
    userAgents: config.userAgents,
    userAgentRotationChance: config.userAgentRotationChance,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    requestTimeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    retryStatusCodes: config.retryStatusCodes,
    backoffFactorMs: config.backoffFactorMs,
    delayRangeMs: config.delayRangeMs,
    rateLimitBackoffRangeMs: config.rateLimitBackoffRangeMs,
    rateLimitAttempts: config.rateLimitAttempts,
    minContentBytes: config.minContentBytes,
    blockMarkers: config.blockMarkers,
    structuralTokens: config.structuralTokens,
    browserFallback: config.browserFallback,
    browserHeadless: config.browserHeadless,
    browserSettleMs: config.browserSettleMs,
    saveDebugHtml: config.saveDebugHtml,
    debugHtmlDir: config.outputDirs.debugHtml,
  };
}

export function extractorOptionsFrom(config: AppConfig): ExtractorOptions {
  return {
    baseUrl: config.baseUrl,
    requiredFields: config.requiredFields,
  };
}

export function downloaderOptionsFrom(config: AppConfig): DownloaderOptions {
  return {
    userAgents: config.userAgents,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    downloadTimeoutMs: config.downloadTimeoutMs,
    maxDownloadAttempts: config.maxDownloadAttempts,
    minPdfBytes: config.minPdfBytes,
    backoffFactorMs: config.backoffFactorMs,
    delayRangeMs: config.delayRangeMs,
    downloadsDir: config.outputDirs.downloads,
  };
}
