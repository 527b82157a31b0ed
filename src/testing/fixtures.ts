import { AppConfig, DEFAULT_CONFIG } from "../config";
import { HttpResponseLike } from "../core/fetch";
import { SleepFn } from "../core/timing";
import { PageTransport } from "../fetch";
import { CheckpointRepository } from "../store";
import { Checkpoint, DecisionRecord } from "../types";

export interface ListingItem {
  number: string;
  court?: string;
  category?: string;
  subcategory?: string;
  plaintiff?: string;
  defendant?: string;
  register?: string;
  decided?: string;
  uploaded?: string;
  views?: string;
  downloads?: string;
  status?: string;
  href?: string;
}

export const BASE_URL = "https://putusan.example.test";

export function listingItem(item: ListingItem): string {
  const href = item.href ?? `${BASE_URL}/direktori/putusan/${item.number.replace(/\W+/g, "-")}.html`;
  const dates = [
    item.register ? `Register : ${item.register}` : "",
    item.decided ? `Putus : ${item.decided}` : "",
    item.uploaded ? `Upload : ${item.uploaded}` : "",
  ]
    .filter((part) => part.length > 0)
    .join(" — ");
  const crumbs = [item.court, item.category, item.subcategory]
    .filter((crumb): crumb is string => crumb !== undefined)
    .map((crumb) => `<a href="/direktori/index/${crumb.replace(/\W+/g, "-")}">${crumb}</a>`)
    .join(" ");

  return `
  <div class="spost clearfix">
    <div class="entry-c">
      <div class="small">${crumbs}</div>
      <strong><a href="${href}">Putusan Mahkamah Agung Nomor ${item.number} Tanggal 3 Maret 2023 — ${item.plaintiff ?? "Pemohon"} vs ${item.defendant ?? "Termohon"}</a></strong>
      <div>${dates}</div>
      <div class="small"><i class="icon-eye"></i> ${item.views ?? "0"} <i class="icon-download"></i> ${item.downloads ?? "0"}</div>
      ${item.status ? `<div class="status">${item.status}</div>` : ""}
    </div>
  </div>`;
}

export function standardItem(number: string): string {
  return listingItem({
    number,
    court: "Mahkamah Agung",
    category: "Pidana Umum",
    subcategory: "Narkotika",
    register: "10-01-2023",
    decided: "03-03-2023",
    uploaded: "15-03-2023",
  });
}

const PAGE_CHROME = `
  <header><nav><ul><li>Beranda</li><li>Direktori Putusan</li><li>Statistik</li><li>Kontak</li></ul></nav></header>`;

const PAGE_FOOTER = `
  <footer>
    <p>Direktori putusan memuat salinan putusan dan penetapan pengadilan di seluruh Indonesia.</p>
    <p>Informasi pada halaman ini disediakan untuk keperluan umum dan dapat berubah sewaktu-waktu tanpa pemberitahuan.</p>
    <p>Untuk pertanyaan terkait layanan, silakan hubungi kepaniteraan melalui kanal resmi yang tersedia di situs ini.</p>
  </footer>`;

/** A full listing page; with no items it still passes content validation. */
export function listingPage(items: string[]): string {
  return `<!DOCTYPE html>
<html lang="id">
<head><title>Direktori Putusan</title></head>
<body>${PAGE_CHROME}
  <div id="popular-post-list-sidebar">${items.join("\n")}
  </div>${PAGE_FOOTER}
</body>
</html>`;
}

export function pageOfItems(page: number, count: number): string {
  return listingPage(Array.from({ length: count }, (_, index) => standardItem(`${page * 100 + index} K/Pid/2023`)));
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    baseUrl: BASE_URL,
    userAgents: ["test-agent/1.0", "test-agent/2.0"],
    userAgentRotationChance: 0,
    delayRangeMs: [0, 0],
    rateLimitBackoffRangeMs: [0, 0],
    backoffFactorMs: 0,
    browserFallback: false,
    ...overrides,
  };
}

export const noSleep: SleepFn = async () => undefined;

export interface RecordingSleep {
  sleep: SleepFn;
  calls: number[];
}

export function recordingSleep(): RecordingSleep {
  const calls: number[] = [];
  return {
    calls,
    sleep: async (ms) => {
      calls.push(ms);
    },
  };
}

export function htmlResponse(body: string, status = 200, headers: Record<string, string> = {}): HttpResponseLike {
  return new Response(body, { status, headers: { "content-type": "text/html", ...headers } });
}

export function binaryResponse(body: Uint8Array, status = 200): HttpResponseLike {
  return new Response(body, { status, headers: { "content-type": "application/octet-stream" } });
}

export class FakeTransport implements PageTransport {
  readonly requested: string[] = [];
  closed = 0;

  constructor(
    readonly name: "http" | "browser",
    private readonly respond: (url: string) => Promise<{ content: string; status: number }>,
  ) {}

  async fetchPage(url: string): Promise<{ content: string; status: number }> {
    this.requested.push(url);
    return this.respond(url);
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}

export function sampleRecord(number: string, overrides: Partial<DecisionRecord> = {}): DecisionRecord {
  return {
    number,
    title: `Putusan Nomor ${number}`,
    category: "Perdata",
    status: "Unknown",
    scrapedAt: "2024-01-01T00:00:00.000Z",
    downloadedFiles: [],
    ...overrides,
  };
}

export interface SavedCheckpoint {
  lastPage: number;
  targetPages: number;
  recordCount: number;
}

/** In-memory checkpoint repository; `failSaves` makes every save reject. */
export class MemoryCheckpoints implements CheckpointRepository {
  readonly saves: SavedCheckpoint[] = [];
  cleared = 0;

  constructor(
    private checkpoint?: Checkpoint,
    private readonly failSaves = false,
  ) {}

  async save(records: readonly DecisionRecord[], lastPage: number, targetPages: number): Promise<Checkpoint> {
    if (this.failSaves) {
      throw new Error("disk full");
    }
    this.saves.push({ lastPage, targetPages, recordCount: records.length });
    this.checkpoint = {
      lastCompletedPage: lastPage,
      targetPageCount: targetPages,
      records: [...records],
      savedAt: "2024-01-01T00:00:00.000Z",
    };
    return this.checkpoint;
  }

  async load(): Promise<Checkpoint | undefined> {
    return this.checkpoint;
  }

  async clear(): Promise<void> {
    this.cleared += 1;
    this.checkpoint = undefined;
  }
}
