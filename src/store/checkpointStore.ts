import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, Logger, silentLogger } from "../observability";
import { Checkpoint, DecisionRecord, isObject, toDecisionRecord } from "../types";
import { CheckpointFile, CheckpointFileOps, CheckpointRepository, PersistenceError } from "./types";

const nodeFileOps: CheckpointFileOps = {
  writeFile: (filePath, data) => fs.writeFile(filePath, data, "utf8"),
  rename: (from, to) => fs.rename(from, to),
  readFile: (filePath) => fs.readFile(filePath, "utf8"),
  unlink: (filePath) => fs.unlink(filePath),
  mkdir: async (dirPath) => {
    await fs.mkdir(dirPath, { recursive: true });
  },
};

function isMissingFile(error: unknown): boolean {
  return isObject(error) && error.code === "ENOENT";
}

function toPageNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : undefined;
}

/**
 * A single JSON checkpoint on disk. Writes go to a sibling temp file that is
 * renamed over the target, so a reader sees either the old file or the new
 * one and never a partial write.
 */
export class CheckpointStore implements CheckpointRepository {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly fileOps: CheckpointFileOps;
  private readonly now: () => Date;

  constructor(filePath: string, logger?: Logger, fileOps: CheckpointFileOps = nodeFileOps, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.logger = logger ?? silentLogger("checkpoint");
    this.fileOps = fileOps;
    this.now = now;
  }

  get path(): string {
    return this.filePath;
  }

  async save(records: readonly DecisionRecord[], lastPage: number, targetPages: number): Promise<Checkpoint> {
    const savedAt = this.now().toISOString();
    const payload: CheckpointFile = {
      version: 1,
      lastCompletedPage: lastPage,
      targetPages,
      recordCount: records.length,
      savedAt,
      records: [...records],
    };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      await this.fileOps.mkdir(path.dirname(this.filePath));
      await this.fileOps.writeFile(tempPath, JSON.stringify(payload, null, 2));
      await this.fileOps.rename(tempPath, this.filePath);
    } catch (error) {
      await this.fileOps.unlink(tempPath).catch((unlinkError: unknown) => {
        if (!isMissingFile(unlinkError)) {
          this.logger.warn("checkpoint_temp_cleanup_failed", { path: tempPath, error: errorMessage(unlinkError) });
        }
      });
      throw new PersistenceError("checkpoint_save", this.filePath, error);
    }

    this.logger.info("checkpoint_saved", { path: this.filePath, page: lastPage, records: records.length });
    return { lastCompletedPage: lastPage, targetPageCount: targetPages, records: [...records], savedAt };
  }

  /** Missing or unreadable checkpoints both mean "start fresh". */
  async load(): Promise<Checkpoint | undefined> {
    let raw: string;
    try {
      raw = await this.fileOps.readFile(this.filePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn("checkpoint_unreadable", { path: this.filePath, error: errorMessage(error) });
      }
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("checkpoint_corrupt", { path: this.filePath, error: errorMessage(error) });
      return undefined;
    }

    const lastCompletedPage = isObject(parsed) ? toPageNumber(parsed.lastCompletedPage) : undefined;
    if (!isObject(parsed) || lastCompletedPage === undefined || !Array.isArray(parsed.records)) {
      this.logger.warn("checkpoint_corrupt", { path: this.filePath, error: "unexpected checkpoint shape" });
      return undefined;
    }

    const records = parsed.records
      .map((record) => toDecisionRecord(record))
      .filter((record): record is DecisionRecord => record !== undefined);
    if (records.length < parsed.records.length) {
      this.logger.warn("checkpoint_records_discarded", {
        path: this.filePath,
        discarded: parsed.records.length - records.length,
      });
    }

    return {
      lastCompletedPage,
      targetPageCount: toPageNumber(parsed.targetPages) ?? lastCompletedPage,
      records,
      savedAt: typeof parsed.savedAt === "string" ? parsed.savedAt : "",
    };
  }

  async clear(): Promise<void> {
    try {
      await this.fileOps.unlink(this.filePath);
      this.logger.info("checkpoint_cleared", { path: this.filePath });
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new PersistenceError("checkpoint_clear", this.filePath, error);
      }
    }
  }
}
