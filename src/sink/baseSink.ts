import fs from "node:fs";
import path from "node:path";
import { Logger, silentLogger } from "../observability";
import { PersistenceError } from "../store/types";
import { DecisionRecord } from "../types";
import { ExportFormat, RecordSink } from "./types";

export abstract class BaseSink implements RecordSink {
  abstract readonly format: ExportFormat;
  protected readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? silentLogger("sink");
  }

  protected abstract writeRecords(records: readonly DecisionRecord[], filePath: string): Promise<void>;

  protected get extension(): string {
    return this.format === "sqlite" ? "db" : this.format;
  }

  async save(records: readonly DecisionRecord[], outputDir: string, name: string): Promise<string> {
    const filePath = path.resolve(outputDir, `${name}.${this.extension}`);
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await this.writeRecords(records, filePath);
    } catch (error) {
      throw new PersistenceError("export", filePath, error);
    }
    this.logger.info("export_saved", { format: this.format, filePath, records: records.length });
    return filePath;
  }
}
