import Database from "better-sqlite3";
import { DecisionRecord } from "../types";
import { BaseSink } from "./baseSink";
import { flattenRecord, RECORD_COLUMNS, RecordColumn } from "./flatten";
import { FlatValue } from "./types";

const INTEGER_COLUMNS = new Set<RecordColumn>(["viewCount", "downloadCount", "sourcePage", "verifiedFiles"]);

const COLUMN_DEFINITIONS = RECORD_COLUMNS.map((column) => {
  if (column === "number") {
    return "number TEXT PRIMARY KEY";
  }
  return `${column} ${INTEGER_COLUMNS.has(column) ? "INTEGER" : "TEXT"}`;
});

const UPDATABLE_COLUMNS = [...RECORD_COLUMNS.filter((column) => column !== "number"), "data"];

/**
 * Upserts records into a `decisions` table keyed on the decision number, so
 * repeated exports to the same database keep one row per decision.
 */
export class SqliteSink extends BaseSink {
  readonly format = "sqlite" as const;

  protected async writeRecords(records: readonly DecisionRecord[], filePath: string): Promise<void> {
    const db = new Database(filePath);
    try {
      db.pragma("journal_mode = WAL");
      db.exec(`
        CREATE TABLE IF NOT EXISTS decisions (
          ${[...COLUMN_DEFINITIONS, "data TEXT NOT NULL"].join(",\n          ")}
        );
        CREATE INDEX IF NOT EXISTS idx_decisions_category ON decisions(category);
      `);

      const statement = db.prepare(`
        INSERT INTO decisions (${[...RECORD_COLUMNS, "data"].join(", ")})
        VALUES (${[...RECORD_COLUMNS, "data"].map((column) => `@${column}`).join(", ")})
        ON CONFLICT(number) DO UPDATE SET
          ${UPDATABLE_COLUMNS.map((column) => `${column} = excluded.${column}`).join(",\n          ")}
      `);

      const upsertAll = db.transaction((rows: Array<Record<string, FlatValue>>) => {
        for (const row of rows) {
          statement.run(row);
        }
      });
      upsertAll(records.map((record) => ({ ...flattenRecord(record), data: JSON.stringify(record) })));
    } finally {
      db.close();
    }
  }
}
