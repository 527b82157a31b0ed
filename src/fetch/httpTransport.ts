import { FetcherOptions } from "../config";
import { closeFetchDispatchers, defaultFetch, FetchLike, getFetchDispatcher } from "../core/fetch";
import { parseRetryAfter, randomBetween, sleep as defaultSleep, SleepFn } from "../core/timing";
import { errorMessage, Logger } from "../observability";
import { FetchError, PageTransport, throwIfInterrupted, TransportPage } from "./types";

export interface HttpTransportDeps {
  options: FetcherOptions;
  logger: Logger;
  fetchFn?: FetchLike;
  sleep?: SleepFn;
  random?: () => number;
}

const BLOCKED_STATUSES = new Set([403, 406]);

interface HttpReply {
  status: number;
  ok: boolean;
  retryAfter: string | null;
  content: string;
}

// A body stream handed over by a custom fetchFn may ignore the request signal.
function rejectOnAbort(signal: AbortSignal, url: string): Promise<never> {
  return new Promise((_, reject) => {
    const fail = (): void => reject(new FetchError("timeout", `Request timeout for ${url}`));
    if (signal.aborted) {
      fail();
      return;
    }
    signal.addEventListener("abort", fail, { once: true });
  });
}

function toNetworkError(error: unknown, url: string): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  const name = error instanceof Error ? error.name : "";
  if (name === "AbortError" || name === "TimeoutError") {
    return new FetchError("timeout", `Request timeout for ${url}`);
  }
  return new FetchError("connection_error", `Connection error for ${url}: ${errorMessage(error)}`);
}

export class HttpTransport implements PageTransport {
  readonly name = "http" as const;
  private readonly options: FetcherOptions;
  private readonly logger: Logger;
  private readonly fetchFn: FetchLike;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private userAgent: string;

  constructor(deps: HttpTransportDeps) {
    if (deps.options.userAgents.length === 0) {
      throw new Error("At least one user agent is required");
    }
    this.options = deps.options;
    this.logger = deps.logger;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.userAgent = this.pickUserAgent();
  }

  get currentUserAgent(): string {
    return this.userAgent;
  }

  rotateUserAgent(): void {
    this.userAgent = this.pickUserAgent(this.userAgent);
  }

  async fetchPage(url: string, signal?: AbortSignal): Promise<TransportPage> {
    const { maxRetries, retryStatusCodes } = this.options;

    for (let attempt = 1; ; attempt += 1) {
      await this.wait(randomBetween(this.options.delayRangeMs, this.random), url, signal);
      if (this.random() < this.options.userAgentRotationChance) {
        this.rotateUserAgent();
      }

      let reply: HttpReply;
      try {
        reply = await this.request(url, signal);
      } catch (error) {
        throwIfInterrupted(signal, url);
        const failure = toNetworkError(error, url);
        if (attempt > maxRetries) {
          throw failure;
        }
        await this.backoff(url, attempt, failure.message, signal);
        continue;
      }

      if (reply.status === 429) {
        reply = await this.handleRateLimit(url, reply, signal);
      }

      if (reply.ok) {
        return { content: reply.content, status: reply.status };
      }

      if (BLOCKED_STATUSES.has(reply.status)) {
        this.logger.warn("fetch_blocked", { url, status: reply.status });
        throw new FetchError("blocked", `Access forbidden (HTTP ${reply.status}) for ${url}`, reply.status);
      }

      if (retryStatusCodes.includes(reply.status) && attempt <= maxRetries) {
        await this.backoff(url, attempt, `HTTP ${reply.status}`, signal);
        continue;
      }

      if (reply.status >= 500) {
        throw new FetchError("server_error", `Server error (HTTP ${reply.status}) for ${url}`, reply.status);
      }
      throw new FetchError("http_error", `Unexpected HTTP ${reply.status} for ${url}`, reply.status);
    }
  }

  async close(): Promise<void> {
    await closeFetchDispatchers();
  }

  private async handleRateLimit(url: string, first: HttpReply, signal?: AbortSignal): Promise<HttpReply> {
    const [minMs, maxMs] = this.options.rateLimitBackoffRangeMs;
    let current = first;

    for (let attempt = 0; attempt < this.options.rateLimitAttempts && current.status === 429; attempt += 1) {
      const retryAfterMs = parseRetryAfter(current.retryAfter);
      const waitMs =
        retryAfterMs ?? randomBetween([minMs * 2 ** attempt, maxMs * 2 ** attempt], this.random);
      this.logger.warn("fetch_rate_limited", {
        url,
        attempt: attempt + 1,
        waitMs,
        retryAfter: retryAfterMs !== undefined,
      });

      await this.wait(waitMs, url, signal);
      this.rotateUserAgent();

      try {
        current = await this.request(url, signal);
      } catch (error) {
        throwIfInterrupted(signal, url);
        this.logger.warn("fetch_rate_limit_retry_failed", { url, attempt: attempt + 1, error: errorMessage(error) });
      }
    }

    if (current.status === 429) {
      throw new FetchError("rate_limited", `Rate limit persisted for ${url}`, 429);
    }
    return current;
  }

  private async backoff(url: string, attempt: number, cause: string, signal?: AbortSignal): Promise<void> {
    const waitMs = this.options.backoffFactorMs * 2 ** (attempt - 1);
    this.logger.warn("fetch_retry", { url, attempt, waitMs, cause });
    await this.wait(waitMs, url, signal);
  }

  private async wait(ms: number, url: string, signal?: AbortSignal): Promise<void> {
    await this.sleep(ms, signal);
    throwIfInterrupted(signal, url);
  }

  /** The timeout covers the whole exchange, body included; `signal` cuts it short. */
  private async request(url: string, signal?: AbortSignal): Promise<HttpReply> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);
    const onInterrupt = (): void => controller.abort();
    signal?.addEventListener("abort", onInterrupt, { once: true });

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.userAgent,
          accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "accept-language": "id-ID,id;q=0.9,en;q=0.8",
        },
        dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });
      const content = response.ok ? await Promise.race([response.text(), rejectOnAbort(controller.signal, url)]) : "";
      return {
        status: response.status,
        ok: response.ok,
        retryAfter: response.headers.get("retry-after"),
        content,
      };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onInterrupt);
    }
  }

  private pickUserAgent(exclude?: string): string {
    const pool = this.options.userAgents;
    const candidates = pool.length > 1 && exclude ? pool.filter((agent) => agent !== exclude) : pool;
    const index = Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1);
    return candidates[index];
  }
}
