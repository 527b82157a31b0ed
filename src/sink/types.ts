import { DecisionRecord } from "../types";

export type ExportFormat = "json" | "csv" | "xlsx" | "sqlite";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["json", "csv", "xlsx", "sqlite"];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export interface RecordSink {
  readonly format: ExportFormat;
  /** Writes `records` to `<outputDir>/<name>.<ext>` and returns the file path. */
  save(records: readonly DecisionRecord[], outputDir: string, name: string): Promise<string>;
}

export type FlatValue = string | number | null;
