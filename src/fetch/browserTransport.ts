import { FetcherOptions } from "../config";
import { errorMessage, Logger } from "../observability";
import { FetchError, PageTransport, throwIfInterrupted, TransportPage } from "./types";

/** The slice of playwright's Page that rendering needs. */
export interface BrowserPageLike {
  goto(url: string, options: { waitUntil: "domcontentloaded"; timeout: number }): Promise<{ status(): number } | null>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  waitForTimeout(ms: number): Promise<void>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserContextLike {
  newPage(): Promise<BrowserPageLike>;
  close(): Promise<void>;
}

export interface BrowserLike {
  newContext(options: { userAgent: string; viewport: { width: number; height: number } }): Promise<BrowserContextLike>;
  close(): Promise<void>;
}

export type BrowserLauncher = (headless: boolean) => Promise<BrowserLike>;

const launchChromium: BrowserLauncher = async (headless) => {
  const { chromium } = await import("playwright-core");
  return chromium.launch({
    headless,
    args: ["--no-sandbox", "--disable-dev-shm-usage", "--disable-blink-features=AutomationControlled"],
  });
};

export interface BrowserTransportDeps {
  options: Pick<FetcherOptions, "browserHeadless" | "browserSettleMs" | "requestTimeoutMs" | "userAgents">;
  logger: Logger;
  launch?: BrowserLauncher;
}

/**
 * Renders pages in headless Chromium. The browser is started on first use and
 * reused until close().
 */
export class BrowserTransport implements PageTransport {
  readonly name = "browser" as const;
  private readonly options: BrowserTransportDeps["options"];
  private readonly logger: Logger;
  private readonly launch: BrowserLauncher;
  private browser?: BrowserLike;
  private context?: BrowserContextLike;

  constructor(deps: BrowserTransportDeps) {
    this.options = deps.options;
    this.logger = deps.logger;
    this.launch = deps.launch ?? launchChromium;
  }

  async fetchPage(url: string, signal?: AbortSignal): Promise<TransportPage> {
    throwIfInterrupted(signal, url);
    const context = await this.ensureContext();
    const page = await context.newPage();
    // closing the page makes a pending goto or wait reject
    const onInterrupt = (): void => {
      page.close().catch((error: unknown) => {
        this.logger.debug("browser_page_close_failed", { url, error: errorMessage(error) });
      });
    };
    signal?.addEventListener("abort", onInterrupt, { once: true });

    try {
      const response = await page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.options.requestTimeoutMs,
      });
      const status = response?.status() ?? 200;
      if (status === 403 || status === 406) {
        throw new FetchError("blocked", `Access forbidden (HTTP ${status}) for ${url}`, status);
      }
      if (status >= 500) {
        throw new FetchError("server_error", `Server error (HTTP ${status}) for ${url}`, status);
      }

      await page.waitForSelector("body", { timeout: this.options.requestTimeoutMs });
      // client-side rendering settles after load
      await page.waitForTimeout(this.options.browserSettleMs);
      return { content: await page.content(), status };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throwIfInterrupted(signal, url);
      const reason = error instanceof Error && error.name === "TimeoutError" ? "timeout" : "connection_error";
      throw new FetchError(reason, `Browser failed for ${url}: ${errorMessage(error)}`);
    } finally {
      signal?.removeEventListener("abort", onInterrupt);
      await page.close().catch((error: unknown) => {
        this.logger.debug("browser_page_close_failed", { url, error: errorMessage(error) });
      });
    }
  }

  async close(): Promise<void> {
    const { browser, context } = this;
    this.context = undefined;
    this.browser = undefined;
    if (context) {
      await context.close();
    }
    if (browser) {
      await browser.close();
      this.logger.info("browser_closed");
    }
  }

  private async ensureContext(): Promise<BrowserContextLike> {
    if (this.context) {
      return this.context;
    }

    let browser: BrowserLike;
    try {
      browser = await this.launch(this.options.browserHeadless);
    } catch (error) {
      throw new FetchError("connection_error", `Browser launch failed: ${errorMessage(error)}`);
    }

    const agents = this.options.userAgents;
    try {
      this.context = await browser.newContext({
        userAgent: agents[Math.floor(Math.random() * agents.length)],
        viewport: { width: 1920, height: 1080 },
      });
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        this.logger.warn("browser_close_failed", { error: errorMessage(closeError) });
      });
      throw new FetchError("connection_error", `Browser context failed: ${errorMessage(error)}`);
    }
    this.browser = browser;
    this.logger.info("browser_started", { headless: this.options.browserHeadless });
    return this.context;
  }
}
