import fs from "node:fs";
import { DecisionRecord } from "../types";
import { BaseSink } from "./baseSink";

export class JsonSink extends BaseSink {
  readonly format = "json" as const;

  protected async writeRecords(records: readonly DecisionRecord[], filePath: string): Promise<void> {
    const tempPath = `${filePath}.part`;
    await fs.promises.writeFile(tempPath, `${JSON.stringify(records, null, 2)}\n`, "utf-8");
    await fs.promises.rename(tempPath, filePath);
  }
}
