import assert from "node:assert/strict";
import test from "node:test";
import { listingPage } from "../testing/fixtures";
import { validateContent, ValidationRules } from "./validation";

const RULES: ValidationRules = {
  minContentBytes: 500,
  blockMarkers: ["access denied", "captcha"],
  structuralTokens: ["<html", "<body", "<div", "<table"],
};

test("accepts a full listing page", () => {
  assert.deepEqual(validateContent(listingPage([]), RULES), { valid: true });
});

test("rejects content below the size floor", () => {
  assert.deepEqual(validateContent("<html><body>ok</body></html>", RULES), {
    valid: false,
    reason: "content too short (28 < 500 bytes)",
  });
});

test("rejects a page carrying a block marker in any case", () => {
  const html = listingPage(["<p>Please solve the CAPTCHA to continue</p>"]);

  assert.deepEqual(validateContent(html, RULES), { valid: false, reason: "block marker found: captcha" });
});

test("rejects long text without any markup", () => {
  assert.deepEqual(validateContent("plain text ".repeat(60), RULES), {
    valid: false,
    reason: "no structural markup found",
  });
});
