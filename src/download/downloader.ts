import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { DownloaderOptions } from "../config";
import { defaultFetch, FetchLike, getFetchDispatcher } from "../core/fetch";
import { randomBetween, sleep as defaultSleep, SleepFn } from "../core/timing";
import { FetchOutcome, TransportHint } from "../fetch";
import { errorMessage, Logger, StatsRegistry } from "../observability";
import { ArtifactKind, DecisionRecord, FileRef } from "../types";
import { IntegrityResult, verifyArtifact } from "./integrity";
import { ArtifactLink, scanArtifactLinks } from "./linkScanner";

export interface DetailPageFetcher {
  fetch(url: string, hint?: TransportHint, signal?: AbortSignal): Promise<FetchOutcome>;
}

export interface ArtifactDownloaderDeps {
  options: DownloaderOptions;
  logger: Logger;
  stats: StatsRegistry;
  pages: DetailPageFetcher;
  fetchFn?: FetchLike;
  sleep?: SleepFn;
  random?: () => number;
}

interface AttemptResult {
  status: number;
  bytes?: number;
}

export interface DownloadSummary {
  processed: number;
  ok: number;
  failed: number;
  skipped: number;
}

const MAX_BACKOFF_MS = 10_000;

function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function sanitizeFileStem(value: string): string {
  const stem = value.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^[_.]+|[_.]+$/g, "");
  return stem || "decision";
}

/**
 * Fetches a decision's detail page, finds its attachments and streams each
 * one to disk. Files are written through a `.part` sibling and only renamed
 * into place once the body has been fully read.
 */
export class ArtifactDownloader {
  private readonly options: DownloaderOptions;
  private readonly logger: Logger;
  private readonly stats: StatsRegistry;
  private readonly pages: DetailPageFetcher;
  private readonly fetchFn: FetchLike;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly summary: DownloadSummary = { processed: 0, ok: 0, failed: 0, skipped: 0 };

  constructor(deps: ArtifactDownloaderDeps) {
    this.options = deps.options;
    this.logger = deps.logger;
    this.stats = deps.stats;
    this.pages = deps.pages;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  getSummary(): DownloadSummary {
    return { ...this.summary };
  }

  targetPath(number: string, kind: ArtifactKind, ordinal: number): string {
    const suffix = ordinal > 0 ? `_${ordinal}` : "";
    return path.join(this.options.downloadsDir, kind, `${sanitizeFileStem(number)}${suffix}.${kind}`);
  }

  async downloadArtifacts(record: DecisionRecord, signal?: AbortSignal): Promise<DecisionRecord> {
    if (!record.detailLink) {
      this.logger.debug("download_no_detail_link", { number: record.number });
      return record;
    }

    const detail = await this.pages.fetch(record.detailLink, "auto", signal);
    if (!detail.ok) {
      this.logger.warn("download_detail_failed", {
        number: record.number,
        url: record.detailLink,
        reason: detail.reason,
      });
      return record;
    }

    const links = scanArtifactLinks(detail.content, detail.url);
    if (links.length === 0) {
      this.logger.info("download_no_artifacts", { number: record.number, url: detail.url });
      return record;
    }

    const ordinals: Record<ArtifactKind, number> = { pdf: 0, zip: 0 };
    const fetched: FileRef[] = [];
    for (const [index, link] of links.entries()) {
      if (signal?.aborted) {
        break;
      }
      if (index > 0) {
        await this.pause(signal);
      }
      const target = this.targetPath(record.number, link.kind, ordinals[link.kind]);
      ordinals[link.kind] += 1;
      const ref = await this.downloadOne(link, target, record.number);
      if (ref) {
        fetched.push(ref);
      }
    }

    const replaced = new Set(fetched.map((ref) => ref.localPath));
    return {
      ...record,
      downloadedFiles: [...record.downloadedFiles.filter((ref) => !replaced.has(ref.localPath)), ...fetched],
    };
  }

  async downloadAll(records: readonly DecisionRecord[], signal?: AbortSignal): Promise<DecisionRecord[]> {
    const updated: DecisionRecord[] = [];
    for (const [index, record] of records.entries()) {
      if (signal?.aborted) {
        this.logger.warn("download_interrupted", { remaining: records.length - index });
        updated.push(...records.slice(index));
        break;
      }
      if (index > 0) {
        await this.pause(signal);
      }
      this.logger.info("download_record_start", { number: record.number, index: index + 1, total: records.length });
      updated.push(await this.downloadArtifacts(record, signal));
    }
    this.logger.info("download_complete", { ...this.summary });
    return updated;
  }

  private async downloadOne(link: ArtifactLink, target: string, number: string): Promise<FileRef | undefined> {
    this.summary.processed += 1;

    if (fs.existsSync(target)) {
      const sizeBytes = fs.statSync(target).size;
      const integrity = await this.verify(link.kind, target);
      this.summary.skipped += 1;
      this.logger.info("download_skipped_existing", {
        number,
        url: link.url,
        path: target,
        verified: integrity.verified,
        reason: integrity.reason,
      });
      return { kind: link.kind, sourceUrl: link.url, localPath: target, sizeBytes, verified: integrity.verified, skipped: true };
    }

    const maxAttempts = Math.max(this.options.maxDownloadAttempts, 1);
    let lastError = "unknown download failure";

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const stopTimer = this.stats.startTimer("download_ms");
      this.logger.info("download_attempt_start", { number, url: link.url, attempt });

      try {
        const result = await this.attempt(link.url, target);
        const durationMs = stopTimer();

        if (result.bytes === undefined) {
          lastError = `HTTP ${result.status}`;
          if (!isRetriableStatus(result.status) || attempt >= maxAttempts) {
            this.logger.warn("download_failed_http", { number, url: link.url, attempt, durationMs, status: result.status });
            break;
          }
          this.logger.warn("download_retry_http", { number, url: link.url, attempt, durationMs, status: result.status });
          await this.backoff(attempt);
          continue;
        }

        const integrity = await this.verify(link.kind, target);
        if (!integrity.verified) {
          this.logger.warn("download_unverified", { number, url: link.url, path: target, reason: integrity.reason });
        }
        this.stats.incrementCounter("downloads_ok", 1);
        this.stats.incrementCounter("bytes_downloaded", result.bytes);
        this.summary.ok += 1;
        this.logger.info("download_ok", { number, url: link.url, path: target, bytes: result.bytes, attempt, durationMs });
        return {
          kind: link.kind,
          sourceUrl: link.url,
          localPath: target,
          sizeBytes: result.bytes,
          verified: integrity.verified,
        };
      } catch (error) {
        const durationMs = stopTimer();
        lastError = errorMessage(error);
        this.logger.warn("download_error", { number, url: link.url, attempt, durationMs, error: lastError });
        if (attempt >= maxAttempts) {
          break;
        }
        await this.backoff(attempt);
      }
    }

    this.stats.incrementCounter("downloads_failed", 1);
    this.stats.recordFailedUrl(link.url, lastError);
    this.summary.failed += 1;
    return undefined;
  }

  private async attempt(url: string, target: string): Promise<AttemptResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.downloadTimeoutMs);
    const tempPath = `${target}.part`;

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgents[0] ?? "Mozilla/5.0",
          accept: "application/pdf,application/zip,*/*",
        },
        dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });

      if (!response.ok) {
        return { status: response.status };
      }
      if (!response.body) {
        throw new Error(`Empty body from ${url}`);
      }

      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      let bytes = 0;
      const readable = Readable.fromWeb(response.body);
      readable.on("data", (chunk: Buffer) => {
        bytes += chunk.length;
      });

      try {
        await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));
        await fs.promises.rename(tempPath, target);
      } catch (error) {
        await fs.promises.rm(tempPath, { force: true });
        throw error;
      }
      return { status: response.status, bytes };
    } finally {
      clearTimeout(timeout);
    }
  }

  /** A check that cannot run leaves the file in place, unverified. */
  private async verify(kind: ArtifactKind, target: string): Promise<IntegrityResult> {
    try {
      return await verifyArtifact(kind, target, this.options.minPdfBytes);
    } catch (error) {
      return { verified: false, reason: `integrity check failed: ${errorMessage(error)}` };
    }
  }

  private async backoff(attempt: number): Promise<void> {
    await this.sleep(Math.min(this.options.backoffFactorMs * 2 ** (attempt - 1), MAX_BACKOFF_MS));
  }

  private async pause(signal?: AbortSignal): Promise<void> {
    await this.sleep(randomBetween(this.options.delayRangeMs, this.random), signal);
  }
}
