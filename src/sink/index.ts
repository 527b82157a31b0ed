import { Logger } from "../observability";
import { JsonSink } from "./jsonSink";
import { CsvSink, XlsxSink } from "./spreadsheetSink";
import { SqliteSink } from "./sqliteSink";
import { ExportFormat, RecordSink } from "./types";

export function createSink(format: ExportFormat, logger?: Logger): RecordSink {
  switch (format) {
    case "json":
      return new JsonSink(logger);
    case "csv":
      return new CsvSink(logger);
    case "xlsx":
      return new XlsxSink(logger);
    case "sqlite":
      return new SqliteSink(logger);
  }
}

export * from "./types";
export * from "./flatten";
export * from "./baseSink";
export * from "./jsonSink";
export * from "./spreadsheetSink";
export * from "./sqliteSink";
export * from "./statsFile";
