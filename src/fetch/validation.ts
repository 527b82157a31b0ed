import { FetcherOptions } from "../config";

export type ValidationRules = Pick<FetcherOptions, "minContentBytes" | "blockMarkers" | "structuralTokens">;

export type ValidationResult = { valid: true } | { valid: false; reason: string };

export function validateContent(content: string, rules: ValidationRules): ValidationResult {
  const bytes = Buffer.byteLength(content, "utf-8");
  if (bytes < rules.minContentBytes) {
    return { valid: false, reason: `content too short (${bytes} < ${rules.minContentBytes} bytes)` };
  }

  const lowered = content.toLowerCase();
  const marker = rules.blockMarkers.find((candidate) => lowered.includes(candidate.toLowerCase()));
  if (marker) {
    return { valid: false, reason: `block marker found: ${marker}` };
  }

  if (rules.structuralTokens.length > 0 && !rules.structuralTokens.some((token) => lowered.includes(token.toLowerCase()))) {
    return { valid: false, reason: "no structural markup found" };
  }

  return { valid: true };
}
