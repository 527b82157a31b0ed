import { AppConfig } from "../config";
import { Logger } from "../observability";
import { CheckpointStore } from "./checkpointStore";

export function createCheckpointStore(config: AppConfig, logger?: Logger): CheckpointStore {
  return new CheckpointStore(config.checkpointPath, logger);
}

export * from "./types";
export * from "./checkpointStore";
export * from "./dedupe";
