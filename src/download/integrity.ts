import fs from "node:fs/promises";
import JSZip from "jszip";
import { ArtifactKind } from "../types";

export interface IntegrityResult {
  verified: boolean;
  reason?: string;
}

const PDF_MAGIC = "%PDF-";

export async function verifyPdf(filePath: string, minBytes: number): Promise<IntegrityResult> {
  const handle = await fs.open(filePath, "r");
  try {
    const { size } = await handle.stat();
    if (size < minBytes) {
      return { verified: false, reason: `file is ${size} bytes, expected at least ${minBytes}` };
    }
    const header = Buffer.alloc(PDF_MAGIC.length);
    await handle.read(header, 0, PDF_MAGIC.length, 0);
    if (header.toString("latin1") !== PDF_MAGIC) {
      return { verified: false, reason: "missing %PDF- header" };
    }
    return { verified: true };
  } finally {
    await handle.close();
  }
}

/** Every entry must decompress with a matching CRC-32. */
export async function verifyZip(filePath: string): Promise<IntegrityResult> {
  const data = await fs.readFile(filePath);
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data, { checkCRC32: true });
  } catch (error) {
    return { verified: false, reason: `unreadable archive: ${error instanceof Error ? error.message : String(error)}` };
  }

  for (const entry of Object.values(zip.files)) {
    if (entry.dir) {
      continue;
    }
    try {
      await entry.async("uint8array");
    } catch (error) {
      return {
        verified: false,
        reason: `entry ${entry.name}: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
  return { verified: true };
}

export async function verifyArtifact(kind: ArtifactKind, filePath: string, minPdfBytes: number): Promise<IntegrityResult> {
  return kind === "zip" ? verifyZip(filePath) : verifyPdf(filePath, minPdfBytes);
}
