import { DecisionDate, DecisionRecord } from "../types";
import { FlatValue } from "./types";

/** Column order for tabular exports. */
export const RECORD_COLUMNS = [
  "number",
  "title",
  "registerDate",
  "registerDateRaw",
  "decisionDate",
  "decisionDateRaw",
  "uploadDate",
  "uploadDateRaw",
  "court",
  "category",
  "subcategory",
  "detailLink",
  "plaintiff",
  "defendant",
  "viewCount",
  "downloadCount",
  "status",
  "abstract",
  "sourcePage",
  "scrapedAt",
  "downloadedFiles",
  "verifiedFiles",
] as const;

export type RecordColumn = (typeof RECORD_COLUMNS)[number];

function datePair(date: DecisionDate | undefined): [string | null, string | null] {
  if (!date) {
    return [null, null];
  }
  return [date.parsed ?? null, date.raw];
}

export function flattenRecord(record: DecisionRecord): Record<RecordColumn, FlatValue> {
  const [registerDate, registerDateRaw] = datePair(record.registerDate);
  const [decisionDate, decisionDateRaw] = datePair(record.decisionDate);
  const [uploadDate, uploadDateRaw] = datePair(record.uploadDate);

  return {
    number: record.number,
    title: record.title,
    registerDate,
    registerDateRaw,
    decisionDate,
    decisionDateRaw,
    uploadDate,
    uploadDateRaw,
    court: record.court ?? null,
    category: record.category,
    subcategory: record.subcategory ?? null,
    detailLink: record.detailLink ?? null,
    plaintiff: record.plaintiff ?? null,
    defendant: record.defendant ?? null,
    viewCount: record.viewCount ?? null,
    downloadCount: record.downloadCount ?? null,
    status: record.status,
    abstract: record.abstract ?? null,
    sourcePage: record.sourcePage ?? null,
    scrapedAt: record.scrapedAt,
    downloadedFiles: record.downloadedFiles.map((file) => file.localPath).join("; "),
    verifiedFiles: record.downloadedFiles.filter((file) => file.verified).length,
  };
}
