import { AppConfig, listingPageUrl } from "../config";
import { randomBetween, sleep, SleepFn } from "../core/timing";
import { FetchOutcome, TransportHint } from "../fetch";
import { errorMessage, Logger, Stats, StatsRegistry } from "../observability";
import { CheckpointRepository, dedupe } from "../store";
import { DecisionRecord } from "../types";

export type ScrapeState =
  | "idle"
  | "resuming"
  | "fetching_page"
  | "extracting_page"
  | "accumulating"
  | "checkpointing"
  | "continuing"
  | "terminating";

export type ScrapeOutcome = "end_of_data" | "max_page_reached" | "interrupted" | "failed";

export interface PageFetcher {
  fetch(url: string, hint?: TransportHint, signal?: AbortSignal): Promise<FetchOutcome>;
  close(): Promise<void>;
}

export interface PageExtractor {
  extract(content: string, pageUrl?: string, page?: number): DecisionRecord[];
}

export interface CrawlDependencies {
  config: Pick<AppConfig, "baseUrl" | "listingPath" | "pageParam" | "delayRangeMs" | "checkpointEvery">;
  logger: Logger;
  stats: StatsRegistry;
  fetcher: PageFetcher;
  extractor: PageExtractor;
  checkpoints: CheckpointRepository;
  sleep?: SleepFn;
  random?: () => number;
}

export interface CrawlOptions {
  startPage?: number;
  /** Last page to fetch, inclusive. Unbounded when omitted. */
  maxPage?: number;
  resume?: boolean;
  signal?: AbortSignal;
}

export interface ScrapeResult {
  records: DecisionRecord[];
  outcome: ScrapeOutcome;
  lastCompletedPage: number;
  pagesFetched: number;
  pagesSkipped: number;
  resumedFrom?: number;
  error?: string;
  stats: Stats;
}

/**
 * Walks listing pages in order until the site runs out of records, the page
 * limit is hit, the signal fires or something unexpected throws.
 *
 * An empty page is read as "no more data". A listing that renders an empty
 * page mid-run for any other reason ends the job early.
 */
export async function crawlListingPages(deps: CrawlDependencies, options: CrawlOptions = {}): Promise<ScrapeResult> {
  const { config, logger, stats, fetcher, extractor, checkpoints } = deps;
  const sleepFn = deps.sleep ?? sleep;
  const random = deps.random ?? Math.random;
  const signal = options.signal;

  let state: ScrapeState = "idle";
  const enter = (next: ScrapeState, page?: number): void => {
    logger.debug("crawl_state", { from: state, to: next, page });
    state = next;
  };

  let records: DecisionRecord[] = [];
  let page = Math.max(options.startPage ?? 1, 1);
  let lastCompletedPage = page - 1;
  let pagesFetched = 0;
  let pagesSkipped = 0;
  let resumedFrom: number | undefined;
  let outcome: ScrapeOutcome = "end_of_data";
  let failure: string | undefined;

  const targetPages = (): number => options.maxPage ?? lastCompletedPage + 100;

  const saveCheckpoint = async (reason: string): Promise<void> => {
    try {
      await checkpoints.save(records, lastCompletedPage, targetPages());
    } catch (error) {
      logger.error("crawl_checkpoint_failed", { page: lastCompletedPage, reason, error: errorMessage(error) });
    }
  };

  const pause = async (): Promise<void> => {
    await sleepFn(randomBetween(config.delayRangeMs, random), signal);
  };

  logger.info("crawl_start", { startPage: page, maxPage: options.maxPage, resume: options.resume === true });

  try {
    if (options.resume) {
      enter("resuming");
      const checkpoint = await checkpoints.load();
      if (checkpoint) {
        records = [...checkpoint.records];
        lastCompletedPage = checkpoint.lastCompletedPage;
        page = lastCompletedPage + 1;
        resumedFrom = page;
        stats.setRecordCount(records.length);
        logger.info("crawl_resumed", { page, records: records.length, savedAt: checkpoint.savedAt });
      } else {
        logger.info("crawl_resume_no_checkpoint", { page });
      }
    }

    for (;;) {
      if (signal?.aborted) {
        outcome = "interrupted";
        break;
      }
      if (options.maxPage !== undefined && page > options.maxPage) {
        outcome = "max_page_reached";
        break;
      }

      enter("fetching_page", page);
      const url = listingPageUrl(config, page);
      logger.info("crawl_page_start", { page, url });
      const fetched = await fetcher.fetch(url, "auto", signal);

      if (!fetched.ok && signal?.aborted) {
        logger.warn("crawl_interrupted", { page, url });
        outcome = "interrupted";
        break;
      }
      if (!fetched.ok) {
        pagesSkipped += 1;
        logger.warn("crawl_page_skipped", { page, url, reason: fetched.reason, detail: fetched.detail });
        enter("continuing", page);
        page += 1;
        await pause();
        continue;
      }
      pagesFetched += 1;

      enter("extracting_page", page);
      const pageRecords = extractor.extract(fetched.content, url, page);
      if (pageRecords.length === 0) {
        logger.info("crawl_end_of_data", { page, url });
        outcome = "end_of_data";
        break;
      }

      enter("accumulating", page);
      records.push(...pageRecords);
      lastCompletedPage = page;
      stats.setRecordCount(records.length);
      logger.info("crawl_page_complete", { page, found: pageRecords.length, total: records.length });

      if (page % config.checkpointEvery === 0) {
        enter("checkpointing", page);
        await saveCheckpoint("periodic");
      }

      enter("continuing", page);
      page += 1;
      await pause();
    }
  } catch (error) {
    outcome = "failed";
    failure = errorMessage(error);
    logger.error("crawl_failed", { page, error: failure });
  } finally {
    enter("terminating", page);
    if ((outcome === "interrupted" || outcome === "failed") && lastCompletedPage > 0) {
      await saveCheckpoint(outcome);
    }
    await fetcher.close();
  }

  const unique = dedupe(records);
  stats.setRecordCount(unique.length);
  logger.info("crawl_finished", {
    outcome,
    lastCompletedPage,
    pagesFetched,
    pagesSkipped,
    records: unique.length,
    duplicates: records.length - unique.length,
  });

  return {
    records: unique,
    outcome,
    lastCompletedPage,
    pagesFetched,
    pagesSkipped,
    resumedFrom,
    error: failure,
    stats: stats.getStats(),
  };
}
