import fs from "node:fs";
import path from "node:path";
import { AppConfig, downloaderOptionsFrom, extractorOptionsFrom, fetcherOptionsFrom, listingPageUrl } from "../config";
import { crawlListingPages, RecordExtractor, ScrapeResult } from "../crawl";
import { ArtifactDownloader } from "../download";
import { Fetcher, PageTransport } from "../fetch";
import { errorMessage, Logger, StatsRegistry } from "../observability";
import { CheckpointRepository } from "../store";
import { createSink, ExportFormat, writeStatsFile } from "../sink";
import { DecisionRecord, isObject, toDecisionRecord } from "../types";
import { FetchLike } from "./fetch";
import { SleepFn } from "./timing";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  stats: StatsRegistry;
  checkpoints: CheckpointRepository;
  signal?: AbortSignal;
  fetchFn?: FetchLike;
  browser?: PageTransport;
  sleep?: SleepFn;
  random?: () => number;
  now?: () => Date;
}

export interface ScrapeCommandOptions {
  pages?: number;
  startPage?: number;
  format: ExportFormat;
  output?: string;
  resume: boolean;
  fresh: boolean;
  download: boolean;
}

export interface DownloadCommandOptions {
  input: string;
  format: ExportFormat;
  output?: string;
}

export interface InterruptHandle {
  signal: AbortSignal;
  dispose(): void;
}

/** Turns the first SIGINT/SIGTERM into an abort; the job then winds down and checkpoints. */
export function createInterruptHandle(logger: Logger): InterruptHandle {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn("interrupt_received", { signal });
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

export function defaultExportName(now: Date): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
  return `putusan_${stamp}`;
}

function createFetcher(ctx: CommandContext, component: string): Fetcher {
  return new Fetcher({
    options: fetcherOptionsFrom(ctx.config),
    logger: ctx.logger.child(component),
    stats: ctx.stats,
    browser: ctx.browser,
    fetchFn: ctx.fetchFn,
    sleep: ctx.sleep,
    random: ctx.random,
  });
}

function createExtractor(ctx: CommandContext): RecordExtractor {
  return new RecordExtractor({
    options: extractorOptionsFrom(ctx.config),
    logger: ctx.logger.child("extractor"),
    now: ctx.now,
  });
}

async function downloadRecords(ctx: CommandContext, records: DecisionRecord[]): Promise<DecisionRecord[]> {
  const fetcher = createFetcher(ctx, "download_fetcher");
  const downloader = new ArtifactDownloader({
    options: downloaderOptionsFrom(ctx.config),
    logger: ctx.logger.child("downloader"),
    stats: ctx.stats,
    pages: fetcher,
    fetchFn: ctx.fetchFn,
    sleep: ctx.sleep,
    random: ctx.random,
  });
  try {
    return await downloader.downloadAll(records, ctx.signal);
  } finally {
    await fetcher.close();
  }
}

async function exportRecords(
  ctx: CommandContext,
  records: readonly DecisionRecord[],
  format: ExportFormat,
  name: string,
): Promise<string | undefined> {
  try {
    return await createSink(format, ctx.logger.child("sink")).save(records, ctx.config.outputDirs.processed, name);
  } catch (error) {
    ctx.logger.error("export_failed", { format, name, error: errorMessage(error) });
    return undefined;
  }
}

export async function runScrape(ctx: CommandContext, options: ScrapeCommandOptions): Promise<number> {
  if (options.fresh) {
    await ctx.checkpoints.clear();
  }

  const startPage = Math.max(options.startPage ?? 1, 1);
  const maxPage = options.pages !== undefined ? startPage + options.pages - 1 : undefined;
  const name = options.output ?? defaultExportName((ctx.now ?? (() => new Date()))());
  ctx.logger.info("scrape_start", { startPage, maxPage, format: options.format, resume: options.resume, name });

  const result = await crawlListingPages(
    {
      config: ctx.config,
      logger: ctx.logger.child("crawl"),
      stats: ctx.stats,
      fetcher: createFetcher(ctx, "fetcher"),
      extractor: createExtractor(ctx),
      checkpoints: ctx.checkpoints,
      sleep: ctx.sleep,
      random: ctx.random,
    },
    { startPage, maxPage, resume: options.resume, signal: ctx.signal },
  );

  let records = result.records;
  if (options.download && records.length > 0 && !ctx.signal?.aborted) {
    records = await downloadRecords(ctx, records);
  }

  let exportPath: string | undefined;
  if (records.length > 0) {
    exportPath = await exportRecords(ctx, records, options.format, name);
  } else {
    ctx.logger.warn("scrape_no_records", { outcome: result.outcome });
  }

  try {
    await writeStatsFile(ctx.config.outputDirs.processed, name, ctx.stats.getStats(), {
      runId: ctx.runId,
      outcome: result.outcome,
      lastCompletedPage: result.lastCompletedPage,
      exportPath,
    });
  } catch (error) {
    ctx.logger.error("stats_file_failed", { name, error: errorMessage(error) });
  }

  ctx.stats.printSummary(ctx.logger);
  ctx.logger.info("scrape_complete", {
    outcome: result.outcome,
    records: records.length,
    pagesFetched: result.pagesFetched,
    pagesSkipped: result.pagesSkipped,
    exportPath,
  });

  return scrapeExitCode(result, records.length, exportPath);
}

/**
 * 1 when no listing page could be fetched, when gathered records could not be
 * exported, or when a fault ended the crawl before any page was fetched.
 * A fault after some pages still exits 0 once the partial data is exported.
 */
export function scrapeExitCode(
  result: Pick<ScrapeResult, "outcome" | "pagesFetched" | "pagesSkipped">,
  recordCount: number,
  exportPath: string | undefined,
): number {
  const nothingFetched = result.pagesFetched === 0 && (result.pagesSkipped > 0 || result.outcome === "failed");
  const exportFailed = recordCount > 0 && exportPath === undefined;
  return nothingFetched || exportFailed ? 1 : 0;
}

export async function runCheck(ctx: CommandContext): Promise<number> {
  const url = listingPageUrl(ctx.config, 1);
  ctx.logger.info("check_start", { url });
  const fetcher = createFetcher(ctx, "fetcher");

  try {
    const outcome = await fetcher.fetch(url, "auto", ctx.signal);
    if (!outcome.ok) {
      ctx.logger.error("check_failed", { url, reason: outcome.reason, detail: outcome.detail });
      return 1;
    }

    const records = createExtractor(ctx).extract(outcome.content, url, 1);
    ctx.logger.info("check_complete", {
      url,
      transport: outcome.transport,
      status: outcome.status,
      bytes: Buffer.byteLength(outcome.content, "utf-8"),
      records: records.length,
      sample: records.slice(0, 3).map((record) => record.number),
    });
    return records.length > 0 ? 0 : 1;
  } finally {
    await fetcher.close();
  }
}

/** Accepts a plain record array, an export file, or a checkpoint file. */
export function readRecordsFile(filePath: string): DecisionRecord[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  const items = Array.isArray(parsed) ? parsed : isObject(parsed) && Array.isArray(parsed.records) ? parsed.records : undefined;
  if (!items) {
    throw new Error(`No records found in ${filePath}`);
  }
  return items.map((item) => toDecisionRecord(item)).filter((record): record is DecisionRecord => record !== undefined);
}

export async function runDownload(ctx: CommandContext, options: DownloadCommandOptions): Promise<number> {
  const records = readRecordsFile(path.resolve(options.input));
  ctx.logger.info("download_command_start", { input: options.input, records: records.length });
  if (records.length === 0) {
    ctx.logger.warn("download_command_no_records", { input: options.input });
    return 1;
  }

  const updated = await downloadRecords(ctx, records);
  const name = options.output ?? `${path.basename(options.input, path.extname(options.input))}_with_files`;
  const exportPath = await exportRecords(ctx, updated, options.format, name);
  ctx.stats.printSummary(ctx.logger);
  ctx.logger.info("download_command_complete", {
    records: updated.length,
    downloadsOk: ctx.stats.getCounter("downloads_ok"),
    downloadsFailed: ctx.stats.getCounter("downloads_failed"),
    exportPath,
  });
  return exportPath === undefined ? 1 : 0;
}

export async function runStatus(ctx: CommandContext): Promise<number> {
  ctx.logger.info("status_start");
  const checkpoint = await ctx.checkpoints.load();
  if (!checkpoint) {
    ctx.logger.info("status_complete", { checkpoint: false, checkpointPath: ctx.config.checkpointPath });
    return 0;
  }

  ctx.logger.info("status_complete", {
    checkpoint: true,
    checkpointPath: ctx.config.checkpointPath,
    lastCompletedPage: checkpoint.lastCompletedPage,
    nextPage: checkpoint.lastCompletedPage + 1,
    targetPages: checkpoint.targetPageCount,
    records: checkpoint.records.length,
    savedAt: checkpoint.savedAt,
  });
  return 0;
}
