import { load } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { ExtractorOptions } from "../config";
import { errorMessage, Logger, silentLogger } from "../observability";
import { DecisionDate, DecisionRecord, DecisionStatus, RequiredField } from "../types";
import { CONTAINER_STRATEGIES, ContainerStrategy, locateContainers } from "./containerStrategies";
import { DateAnchor, extractAnchoredDates, hasDateCue, textAfterLastDate } from "./dates";

export interface RecordExtractorDeps {
  options: ExtractorOptions;
  logger?: Logger;
  strategies?: readonly ContainerStrategy[];
  now?: () => Date;
}

interface Breadcrumb {
  court?: string;
  category?: string;
  subcategory?: string;
}

interface Parties {
  plaintiff?: string;
  defendant?: string;
}

const TITLE_LINK_SELECTOR = "strong a[href], h2 a[href], h3 a[href], h4 a[href], a[href*='/putusan/']";
const NUMBER_SELECTOR = ".nomor, .number, .no, [data-nomor], [data-number]";
const BREADCRUMB_SELECTORS = [".breadcrumb", ".kategori", ".category", "div.small"];
const ABSTRACT_SELECTOR = ".abstrak, .ringkasan, .abstract, .summary";
const VIEW_ICON_SELECTOR = "i[class*='eye'], span[class*='eye'], img[src*='eye']";
const DOWNLOAD_ICON_SELECTOR = "i[class*='download'], span[class*='download'], img[src*='download']";

const BREADCRUMB_SEPARATOR = /\s*[›»>]\s*/;
const CASE_NUMBER_PATTERN = /\b\d+\s?[A-Z]{0,4}\/[A-Za-z.-]+(?:\/[A-Za-z.-]+)*\/\d{4}\b/;
const TITLE_NUMBER_PATTERN = /\bNomor\s*:?\s*(.+?)(?=\s+Tanggal\b|\s+[—–-]\s|$)/i;
const PARTY_SEPARATOR = /\s+vs\.?\s+/i;
const SEGMENT_BREAK = /\s*[—–|]\s*|\s+-\s+/;

export function cleanText(value: string | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

export function mapBreadcrumb(segments: string[]): Breadcrumb {
  const parts = segments.map((segment) => cleanText(segment)).filter((segment) => segment.length > 0);
  if (parts.length >= 3) {
    const [court, category, subcategory] = parts.slice(-3);
    return { court, category, subcategory };
  }
  if (parts.length === 2) {
    return { category: parts[0], subcategory: parts[1] };
  }
  if (parts.length === 1) {
    return { category: parts[0] };
  }
  return {};
}

export function parseCount(text: string): number | undefined {
  const trimmed = cleanText(text).replace(/^[:\s]+/, "");
  if (!/^\d{1,3}(?:[.,]\d{3})+$|^\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed.replace(/[.,]/g, ""), 10);
}

export function detectStatus(text: string): DecisionStatus {
  const lowered = text.toLowerCase();
  if (/belum\s+berkekuatan|tidak\s+dipublikasi|belum\s+dipublikasi|unpublished/.test(lowered)) {
    return "Unpublished";
  }
  if (/berkekuatan\s+hukum\s+tetap|inkracht/.test(lowered)) {
    return "Final";
  }
  return "Unknown";
}

/**
 * Splits "… Tanggal 3 Maret 2020 — Budi vs Negara" style text into parties.
 * Only text that has both a " vs " separator and a date cue qualifies.
 */
export function parseParties(text: string): Parties | undefined {
  if (!PARTY_SEPARATOR.test(text) || !hasDateCue(text)) {
    return undefined;
  }

  const [leftRaw, ...rest] = text.split(PARTY_SEPARATOR);
  const leftSegments = textAfterLastDate(leftRaw).split(SEGMENT_BREAK);
  const left = cleanText(leftSegments[leftSegments.length - 1]).replace(/^[:,;\s]+/, "");
  const rightRaw = rest.join(" vs ").split(/\b(?:Register|Putus|Upload)\s*:/i)[0];
  const right = cleanText(rightRaw.split(SEGMENT_BREAK)[0]).replace(/[:,;\s]+$/, "");

  if (!left && !right) {
    return undefined;
  }
  return { plaintiff: left || undefined, defendant: right || undefined };
}

function resolveUrl(href: string | undefined, base: string): string | undefined {
  if (!href || href.startsWith("#") || href.toLowerCase().startsWith("javascript:")) {
    return undefined;
  }
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

/**
 * Turns listing markup into decision records. Container location walks an
 * ordered strategy list; each field is then read independently so one broken
 * field never costs the whole record, unless it is a required one.
 */
export class RecordExtractor {
  private readonly options: ExtractorOptions;
  private readonly logger: Logger;
  private readonly strategies: readonly ContainerStrategy[];
  private readonly now: () => Date;

  constructor(deps: RecordExtractorDeps) {
    this.options = deps.options;
    this.logger = deps.logger ?? silentLogger("extractor");
    this.strategies = deps.strategies ?? CONTAINER_STRATEGIES;
    this.now = deps.now ?? (() => new Date());
  }

  extract(content: string, pageUrl?: string, page?: number): DecisionRecord[] {
    let $: CheerioAPI;
    try {
      $ = load(content);
    } catch (error) {
      this.logger.warn("extract_markup_unreadable", { url: pageUrl, error: errorMessage(error) });
      return [];
    }

    const located = locateContainers($, this.strategies);
    if (!located) {
      this.logger.info("extract_no_containers", { url: pageUrl, page });
      return [];
    }

    const scrapedAt = this.now().toISOString();
    const records: DecisionRecord[] = [];
    for (const element of located.containers) {
      try {
        const record = this.parseContainer($, $(element), pageUrl ?? this.options.baseUrl, scrapedAt, page);
        if (record) {
          records.push(record);
        }
      } catch (error) {
        this.logger.debug("extract_container_failed", { url: pageUrl, page, error: errorMessage(error) });
      }
    }

    this.logger.info("extract_page_parsed", {
      url: pageUrl,
      page,
      strategy: located.strategy,
      containers: located.containers.length,
      records: records.length,
    });
    return records;
  }

  private parseContainer(
    $: CheerioAPI,
    $container: Cheerio<Element>,
    pageUrl: string,
    scrapedAt: string,
    page?: number,
  ): DecisionRecord | undefined {
    const text = cleanText($container.text());
    const titleLink = this.field("title", () => this.titleLink($container));
    const title = titleLink?.title ?? "";
    const number = this.field("number", () => this.number($container, title, text)) ?? "";
    const breadcrumb: Breadcrumb = this.field("breadcrumb", () => this.breadcrumb($, $container)) ?? {};
    const dates: Partial<Record<DateAnchor, DecisionDate>> = this.field("dates", () => extractAnchoredDates(text)) ?? {};

    const missing = this.missingRequired(number, breadcrumb.category, dates);
    if (missing.length > 0) {
      this.logger.debug("extract_record_dropped", { url: pageUrl, page, number, missing });
      return undefined;
    }

    const parties: Parties = this.field("parties", () => this.parties($, $container)) ?? {};
    return {
      number,
      title,
      registerDate: dates.registerDate,
      decisionDate: dates.decisionDate,
      uploadDate: dates.uploadDate,
      court: breadcrumb.court,
      category: breadcrumb.category ?? "",
      subcategory: breadcrumb.subcategory,
      detailLink: this.field("detailLink", () => resolveUrl(titleLink?.href, pageUrl)),
      plaintiff: parties.plaintiff,
      defendant: parties.defendant,
      viewCount: this.field("viewCount", () => this.counter($, $container, VIEW_ICON_SELECTOR)),
      downloadCount: this.field("downloadCount", () => this.counter($, $container, DOWNLOAD_ICON_SELECTOR)),
      status: this.field("status", () => detectStatus(text)) ?? "Unknown",
      abstract: this.field("abstract", () => cleanText($container.find(ABSTRACT_SELECTOR).first().text()) || undefined),
      sourcePage: page,
      scrapedAt,
      downloadedFiles: [],
    };
  }

  private missingRequired(
    number: string,
    category: string | undefined,
    dates: Partial<Record<DateAnchor, DecisionDate>>,
  ): RequiredField[] {
    // the natural key is always required, whatever the configuration says
    const required = new Set<RequiredField>(["number", ...this.options.requiredFields]);
    return [...required].filter((field) => {
      if (field === "number") {
        return number.length === 0;
      }
      if (field === "date") {
        return Object.keys(dates).length === 0;
      }
      return !category;
    });
  }

  private field<T>(name: string, read: () => T | undefined): T | undefined {
    try {
      return read();
    } catch (error) {
      this.logger.debug("extract_field_failed", { field: name, error: errorMessage(error) });
      return undefined;
    }
  }

  private titleLink($container: Cheerio<Element>): { title: string; href?: string } | undefined {
    const anchor = $container.find(TITLE_LINK_SELECTOR).first();
    if (anchor.length === 0) {
      return undefined;
    }
    const title = cleanText(anchor.text()) || cleanText(anchor.attr("title"));
    return { title, href: anchor.attr("href") };
  }

  private number($container: Cheerio<Element>, title: string, text: string): string | undefined {
    const keyed = $container.find(NUMBER_SELECTOR).first();
    if (keyed.length > 0) {
      const value = cleanText(keyed.text()) || cleanText(keyed.attr("data-nomor") ?? keyed.attr("data-number"));
      if (value) {
        return value;
      }
    }

    const fromTitle = title.match(TITLE_NUMBER_PATTERN);
    if (fromTitle && cleanText(fromTitle[1])) {
      return cleanText(fromTitle[1]);
    }

    const fromText = text.match(CASE_NUMBER_PATTERN);
    return fromText ? cleanText(fromText[0]) : undefined;
  }

  private breadcrumb($: CheerioAPI, $container: Cheerio<Element>): Breadcrumb | undefined {
    for (const selector of BREADCRUMB_SELECTORS) {
      for (const element of $container.find(selector).toArray()) {
        const $block = $(element);
        const text = cleanText($block.text());
        if (BREADCRUMB_SEPARATOR.test(text)) {
          return mapBreadcrumb(text.split(BREADCRUMB_SEPARATOR));
        }
        const links = $block
          .find("a")
          .toArray()
          .map((link) => cleanText($(link).text()));
        if (links.length >= 2) {
          return mapBreadcrumb(links);
        }
      }
    }
    return undefined;
  }

  private parties($: CheerioAPI, $container: Cheerio<Element>): Parties | undefined {
    const blocks = [$container.get(0), ...$container.find("*").toArray()]
      .filter((element): element is Element => element !== undefined)
      .map((element) => cleanText($(element).text()))
      .filter((text) => PARTY_SEPARATOR.test(text) && hasDateCue(text))
      .sort((a, b) => a.length - b.length);
    return blocks.length > 0 ? parseParties(blocks[0]) : undefined;
  }

  private counter($: CheerioAPI, $container: Cheerio<Element>, selector: string): number | undefined {
    const icon = $container.find(selector).first();
    if (icon.length === 0) {
      return undefined;
    }

    const following = icon.get(0)?.next;
    const candidates = [following ? $(following).text() : "", icon.parent().text()];
    for (const candidate of candidates) {
      const count = parseCount(candidate);
      if (count !== undefined) {
        return count;
      }
    }
    return undefined;
  }
}
