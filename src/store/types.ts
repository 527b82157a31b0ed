import { Checkpoint, DecisionRecord } from "../types";

export type PersistenceOperation = "checkpoint_save" | "checkpoint_clear" | "export" | "stats";

export class PersistenceError extends Error {
  readonly operation: PersistenceOperation;
  readonly filePath: string;

  constructor(operation: PersistenceOperation, filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed for ${filePath}: ${detail}`);
    this.name = "PersistenceError";
    this.operation = operation;
    this.filePath = filePath;
  }
}

export interface CheckpointFile {
  version: 1;
  lastCompletedPage: number;
  targetPages: number;
  recordCount: number;
  savedAt: string;
  records: DecisionRecord[];
}

/** The file operations a checkpoint write goes through. */
export interface CheckpointFileOps {
  writeFile(filePath: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  readFile(filePath: string): Promise<string>;
  unlink(filePath: string): Promise<void>;
  mkdir(dirPath: string): Promise<void>;
}

export interface CheckpointRepository {
  save(records: readonly DecisionRecord[], lastPage: number, targetPages: number): Promise<Checkpoint>;
  load(): Promise<Checkpoint | undefined>;
  clear(): Promise<void>;
}
