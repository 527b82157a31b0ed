import { ArtifactKind, DecisionDate, DecisionRecord, DecisionStatus, FileRef } from "./models";

type UnknownObject = Record<string, unknown>;

export function isObject(value: unknown): value is UnknownObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function optionalString(value: unknown): string | undefined {
  return isString(value) ? value : undefined;
}

function optionalCount(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : undefined;
}

function isStatus(value: unknown): value is DecisionStatus {
  return value === "Final" || value === "Unpublished" || value === "Unknown";
}

function isArtifactKind(value: unknown): value is ArtifactKind {
  return value === "pdf" || value === "zip";
}

function toDecisionDate(value: unknown): DecisionDate | undefined {
  if (!isObject(value) || !isString(value.raw)) {
    return undefined;
  }
  return { raw: value.raw, parsed: optionalString(value.parsed) };
}

export function toFileRef(value: unknown): FileRef | undefined {
  if (!isObject(value) || !isArtifactKind(value.kind) || !isString(value.sourceUrl) || !isString(value.localPath)) {
    return undefined;
  }
  return {
    kind: value.kind,
    sourceUrl: value.sourceUrl,
    localPath: value.localPath,
    sizeBytes: optionalCount(value.sizeBytes) ?? 0,
    verified: value.verified === true,
    skipped: value.skipped === true ? true : undefined,
  };
}

/**
 * Rebuilds a record from untrusted JSON, keeping only known fields.
 * Returns undefined when the natural key or other mandatory fields are missing.
 */
export function toDecisionRecord(value: unknown): DecisionRecord | undefined {
  if (!isObject(value) || !isString(value.number) || typeof value.category !== "string") {
    return undefined;
  }

  const files = Array.isArray(value.downloadedFiles) ? value.downloadedFiles : [];
  return {
    number: value.number,
    title: typeof value.title === "string" ? value.title : "",
    registerDate: toDecisionDate(value.registerDate),
    decisionDate: toDecisionDate(value.decisionDate),
    uploadDate: toDecisionDate(value.uploadDate),
    court: optionalString(value.court),
    category: value.category,
    subcategory: optionalString(value.subcategory),
    detailLink: optionalString(value.detailLink),
    plaintiff: optionalString(value.plaintiff),
    defendant: optionalString(value.defendant),
    viewCount: optionalCount(value.viewCount),
    downloadCount: optionalCount(value.downloadCount),
    status: isStatus(value.status) ? value.status : "Unknown",
    abstract: optionalString(value.abstract),
    sourcePage: optionalCount(value.sourcePage),
    scrapedAt: isString(value.scrapedAt) ? value.scrapedAt : new Date(0).toISOString(),
    downloadedFiles: files.map((file) => toFileRef(file)).filter((file): file is FileRef => file !== undefined),
  };
}
