import ExcelJS from "exceljs";
import { DecisionRecord } from "../types";
import { BaseSink } from "./baseSink";
import { flattenRecord, RECORD_COLUMNS } from "./flatten";

function buildWorkbook(records: readonly DecisionRecord[]): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("decisions");
  sheet.columns = RECORD_COLUMNS.map((column) => ({ header: column, key: column }));
  for (const record of records) {
    sheet.addRow(flattenRecord(record));
  }
  return workbook;
}

export class CsvSink extends BaseSink {
  readonly format = "csv" as const;

  protected async writeRecords(records: readonly DecisionRecord[], filePath: string): Promise<void> {
    await buildWorkbook(records).csv.writeFile(filePath);
  }
}

export class XlsxSink extends BaseSink {
  readonly format = "xlsx" as const;

  protected async writeRecords(records: readonly DecisionRecord[], filePath: string): Promise<void> {
    const workbook = buildWorkbook(records);
    const sheet = workbook.getWorksheet("decisions");
    if (sheet) {
      sheet.getRow(1).font = { bold: true };
      sheet.views = [{ state: "frozen", ySplit: 1 }];
    }
    await workbook.xlsx.writeFile(filePath);
  }
}
