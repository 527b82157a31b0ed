export type DecisionStatus = "Final" | "Unpublished" | "Unknown";

export type ArtifactKind = "pdf" | "zip";

export interface DecisionDate {
  raw: string;
  parsed?: string;
}

export interface FileRef {
  kind: ArtifactKind;
  sourceUrl: string;
  localPath: string;
  sizeBytes: number;
  verified: boolean;
  skipped?: boolean;
}

export interface DecisionRecord {
  number: string;
  title: string;
  registerDate?: DecisionDate;
  decisionDate?: DecisionDate;
  uploadDate?: DecisionDate;
  court?: string;
  category: string;
  subcategory?: string;
  detailLink?: string;
  plaintiff?: string;
  defendant?: string;
  viewCount?: number;
  downloadCount?: number;
  status: DecisionStatus;
  abstract?: string;
  sourcePage?: number;
  scrapedAt: string;
  downloadedFiles: FileRef[];
}

export interface Checkpoint {
  lastCompletedPage: number;
  targetPageCount: number;
  records: DecisionRecord[];
  savedAt: string;
}

export type RequiredField = "number" | "date" | "category";
