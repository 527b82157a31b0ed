import { DecisionRecord } from "../types";

/**
 * Stable collapse on the decision number: the first occurrence wins and
 * records without a number are dropped.
 */
export function dedupe(records: readonly DecisionRecord[]): DecisionRecord[] {
  const seen = new Set<string>();
  const unique: DecisionRecord[] = [];

  for (const record of records) {
    const key = record.number.trim();
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(record);
  }

  return unique;
}
