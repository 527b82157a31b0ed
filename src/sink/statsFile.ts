import fs from "node:fs";
import path from "node:path";
import { Stats } from "../observability";
import { PersistenceError } from "../store/types";

export interface StatsFileContext {
  runId: string;
  outcome?: string;
  lastCompletedPage?: number;
  exportPath?: string;
}

/** Writes `<outputDir>/<name>_stats.json` next to the export. */
export async function writeStatsFile(outputDir: string, name: string, stats: Stats, context: StatsFileContext): Promise<string> {
  const filePath = path.resolve(outputDir, `${name}_stats.json`);
  const payload = { ...context, generatedAt: new Date().toISOString(), stats };
  try {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, `${JSON.stringify(payload, null, 2)}\n`, "utf-8");
  } catch (error) {
    throw new PersistenceError("stats", filePath, error);
  }
  return filePath;
}
