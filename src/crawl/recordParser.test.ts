import assert from "node:assert/strict";
import test from "node:test";
import { BASE_URL, listingItem, listingPage } from "../testing/fixtures";
import { detectStatus, mapBreadcrumb, parseCount, RecordExtractor } from "./recordParser";

const NOW = new Date("2024-05-01T08:00:00.000Z");

function extractor(requiredFields: Array<"number" | "date" | "category"> = ["number", "date", "category"]): RecordExtractor {
  return new RecordExtractor({ options: { baseUrl: BASE_URL, requiredFields }, now: () => NOW });
}

test("extracts every field from a directory entry", () => {
  const html = listingPage([
    listingItem({
      number: "101 K/Pid.Sus/2023",
      court: "Mahkamah Agung",
      category: "Pidana Umum",
      subcategory: "Narkotika",
      plaintiff: "Budi Santoso",
      defendant: "Penuntut Umum",
      register: "10-01-2023",
      decided: "03-03-2023",
      uploaded: "15-03-2023",
      views: "1.234",
      downloads: "56",
      status: "Berkekuatan Hukum Tetap",
    }),
  ]);

  const records = extractor().extract(html, `${BASE_URL}/direktori?page=1`, 1);

  assert.equal(records.length, 1);
  assert.deepEqual(records[0], {
    number: "101 K/Pid.Sus/2023",
    title: "Putusan Mahkamah Agung Nomor 101 K/Pid.Sus/2023 Tanggal 3 Maret 2023 — Budi Santoso vs Penuntut Umum",
    registerDate: { raw: "10-01-2023", parsed: "2023-01-10" },
    decisionDate: { raw: "03-03-2023", parsed: "2023-03-03" },
    uploadDate: { raw: "15-03-2023", parsed: "2023-03-15" },
    court: "Mahkamah Agung",
    category: "Pidana Umum",
    subcategory: "Narkotika",
    detailLink: `${BASE_URL}/direktori/putusan/101-K-Pid-Sus-2023.html`,
    plaintiff: "Budi Santoso",
    defendant: "Penuntut Umum",
    viewCount: 1234,
    downloadCount: 56,
    status: "Final",
    abstract: undefined,
    sourcePage: 1,
    scrapedAt: "2024-05-01T08:00:00.000Z",
    downloadedFiles: [],
  });
});

test("falls back to later container layouts and separator breadcrumbs", () => {
  const html = listingPage([
    `<div class="putusan-item">
      <div class="breadcrumb">Pengadilan Negeri Surabaya › Perdata › Wanprestasi</div>
      <h3><a href="/direktori/putusan/xyz.html">Gugatan wanprestasi</a></h3>
      <span class="nomor">12/Pdt.G/2022/PN Sby</span>
      <p>Register : 2022-02-01 Putus : 5 Juli 2022</p>
      <div class="abstrak">Gugatan dikabulkan sebagian.</div>
    </div>`,
  ]);

  const [record] = extractor().extract(html, `${BASE_URL}/direktori?page=2`, 2);

  assert.equal(record.number, "12/Pdt.G/2022/PN Sby");
  assert.equal(record.title, "Gugatan wanprestasi");
  assert.equal(record.court, "Pengadilan Negeri Surabaya");
  assert.equal(record.category, "Perdata");
  assert.equal(record.subcategory, "Wanprestasi");
  assert.deepEqual(record.registerDate, { raw: "2022-02-01", parsed: "2022-02-01" });
  assert.deepEqual(record.decisionDate, { raw: "5 Juli 2022", parsed: "2022-07-05" });
  assert.equal(record.uploadDate, undefined);
  assert.equal(record.detailLink, `${BASE_URL}/direktori/putusan/xyz.html`);
  assert.equal(record.abstract, "Gugatan dikabulkan sebagian.");
  assert.equal(record.plaintiff, undefined);
  assert.equal(record.viewCount, undefined);
  assert.equal(record.status, "Unknown");
});

test("drops entries missing a required field and keeps the rest", () => {
  const html = listingPage([
    listingItem({ number: "1 K/Pdt/2023", court: "Mahkamah Agung", category: "Perdata", register: "01-02-2023" }),
    listingItem({ number: "2 K/Pdt/2023", court: "Mahkamah Agung", category: "Perdata" }),
  ]);

  const records = extractor().extract(html, `${BASE_URL}/direktori?page=1`, 1);

  assert.deepEqual(
    records.map((record) => record.number),
    ["1 K/Pdt/2023"],
  );
});

test("only the decision number is mandatory when no other field is required", () => {
  const html = listingPage([listingItem({ number: "2 K/Pdt/2023" })]);

  const [record] = extractor(["number"]).extract(html, `${BASE_URL}/direktori?page=1`, 1);

  assert.equal(record.number, "2 K/Pdt/2023");
  assert.equal(record.category, "");
  assert.equal(record.registerDate, undefined);
});

test("keeps the raw text of a date that cannot be parsed", () => {
  const html = listingPage([
    listingItem({ number: "3 K/Pdt/2023", court: "Mahkamah Agung", category: "Perdata", register: "31-02-2023" }),
  ]);

  const [record] = extractor().extract(html, `${BASE_URL}/direktori?page=1`, 1);

  assert.deepEqual(record.registerDate, { raw: "31-02-2023", parsed: undefined });
});

test("a page without any known container yields no records", () => {
  assert.deepEqual(extractor().extract(listingPage([]), `${BASE_URL}/direktori?page=9`, 9), []);
});

test("mapBreadcrumb keeps the last three segments", () => {
  assert.deepEqual(mapBreadcrumb(["Beranda", "Mahkamah Agung", "Perdata", "Waris"]), {
    court: "Mahkamah Agung",
    category: "Perdata",
    subcategory: "Waris",
  });
  assert.deepEqual(mapBreadcrumb(["Pidana", "Korupsi"]), { category: "Pidana", subcategory: "Korupsi" });
  assert.deepEqual(mapBreadcrumb(["  Perdata "]), { category: "Perdata" });
  assert.deepEqual(mapBreadcrumb([" ", ""]), {});
});

test("parseCount reads plain and grouped counters", () => {
  assert.equal(parseCount("1.234"), 1234);
  assert.equal(parseCount("12,500"), 12500);
  assert.equal(parseCount(" : 42"), 42);
  assert.equal(parseCount("dilihat"), undefined);
});

test("detectStatus checks the negative phrasing first", () => {
  assert.equal(detectStatus("Belum Berkekuatan Hukum Tetap"), "Unpublished");
  assert.equal(detectStatus("Status: Berkekuatan Hukum Tetap"), "Final");
  assert.equal(detectStatus("Putusan kasasi"), "Unknown");
});
