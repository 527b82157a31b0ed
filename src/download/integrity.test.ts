import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import JSZip from "jszip";
import { verifyArtifact, verifyPdf, verifyZip } from "./integrity";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "integrity-test-"));

function writeFixture(name: string, data: string | Uint8Array): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, data);
  return filePath;
}

async function zipBuffer(): Promise<Buffer> {
  const zip = new JSZip();
  zip.file("putusan.txt", "isi putusan ".repeat(50));
  return zip.generateAsync({ type: "nodebuffer" });
}

test("a PDF with the magic header and enough bytes verifies", async () => {
  const filePath = writeFixture("ok.pdf", `%PDF-1.7\n${"x".repeat(2_000)}`);

  assert.deepEqual(await verifyPdf(filePath, 1_024), { verified: true });
});

test("a short PDF fails on size before the header is read", async () => {
  const filePath = writeFixture("short.pdf", "%PDF-1.4");

  assert.deepEqual(await verifyPdf(filePath, 1_024), {
    verified: false,
    reason: "file is 8 bytes, expected at least 1024",
  });
});

test("an HTML error page saved as PDF fails on the header", async () => {
  const filePath = writeFixture("error.pdf", `<html>${"x".repeat(2_000)}</html>`);

  assert.deepEqual(await verifyPdf(filePath, 1_024), { verified: false, reason: "missing %PDF- header" });
});

test("an intact archive verifies", async () => {
  const filePath = writeFixture("ok.zip", await zipBuffer());

  assert.deepEqual(await verifyZip(filePath), { verified: true });
});

test("an archive with a damaged entry fails", async () => {
  const data = await zipBuffer();
  data[80] = data[80] ^ 0xff;
  const filePath = writeFixture("damaged.zip", data);

  const result = await verifyZip(filePath);

  assert.equal(result.verified, false);
});

test("a file that is not an archive is reported unreadable", async () => {
  const filePath = writeFixture("fake.zip", "bukan arsip");

  const result = await verifyZip(filePath);

  assert.equal(result.verified, false);
  assert.match(result.reason ?? "", /^unreadable archive: /);
});

test("verifyArtifact picks the check by kind", async () => {
  const pdfPath = writeFixture("dispatch.pdf", `%PDF-1.7\n${"x".repeat(100)}`);

  assert.deepEqual(await verifyArtifact("pdf", pdfPath, 16), { verified: true });
  assert.equal((await verifyArtifact("zip", pdfPath, 16)).verified, false);
});
