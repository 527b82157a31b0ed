import { DecisionDate } from "../types";

const MONTHS: Record<string, number> = {
  januari: 1,
  january: 1,
  jan: 1,
  februari: 2,
  february: 2,
  feb: 2,
  pebruari: 2,
  maret: 3,
  march: 3,
  mar: 3,
  april: 4,
  apr: 4,
  mei: 5,
  may: 5,
  juni: 6,
  june: 6,
  jun: 6,
  juli: 7,
  july: 7,
  jul: 7,
  agustus: 8,
  august: 8,
  agu: 8,
  agt: 8,
  aug: 8,
  september: 9,
  sep: 9,
  sept: 9,
  oktober: 10,
  october: 10,
  okt: 10,
  oct: 10,
  november: 11,
  nopember: 11,
  nov: 11,
  desember: 12,
  december: 12,
  des: 12,
  dec: 12,
};

interface DateParts {
  year: number;
  month: number;
  day: number;
}

interface DateFormat {
  name: string;
  pattern: RegExp;
  toParts(match: RegExpMatchArray): DateParts | undefined;
}

function numericParts(year: string, month: string, day: string): DateParts {
  return {
    year: Number.parseInt(year, 10),
    month: Number.parseInt(month, 10),
    day: Number.parseInt(day, 10),
  };
}

// Preference order matters: the first format that matches wins.
export const DATE_FORMATS: readonly DateFormat[] = [
  {
    name: "DD-MM-YYYY",
    pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/,
    toParts: (m) => numericParts(m[3], m[2], m[1]),
  },
  {
    name: "DD/MM/YYYY",
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    toParts: (m) => numericParts(m[3], m[2], m[1]),
  },
  {
    name: "YYYY-MM-DD",
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    toParts: (m) => numericParts(m[1], m[2], m[3]),
  },
  {
    name: "DD.MM.YYYY",
    pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/,
    toParts: (m) => numericParts(m[3], m[2], m[1]),
  },
  {
    name: "D MONTH YYYY",
    pattern: /^(\d{1,2})\s+([A-Za-z]+)\.?\s+(\d{4})$/,
    toParts: (m) => {
      const month = MONTHS[m[2].toLowerCase()];
      return month === undefined ? undefined : { year: Number.parseInt(m[3], 10), month, day: Number.parseInt(m[1], 10) };
    },
  },
];

/** Any date shape the formats above can read, for locating dates inside free text. */
export const DATE_TOKEN = String.raw`\d{1,2}[-/.]\d{1,2}[-/.]\d{4}|\d{4}-\d{1,2}-\d{1,2}|\d{1,2}\s+[A-Za-z]+\.?\s+\d{4}`;

const DATE_CUE = new RegExp(String.raw`\b(?:tanggal|tgl|register|putus|upload)\b|${DATE_TOKEN}`, "i");

function isValidDate({ year, month, day }: DateParts): boolean {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return false;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/** Returns an ISO calendar date (YYYY-MM-DD) or undefined when no format fits. */
export function parseCalendarDate(raw: string): string | undefined {
  const normalized = raw.replace(/\s+/g, " ").trim();
  for (const format of DATE_FORMATS) {
    const match = normalized.match(format.pattern);
    if (!match) {
      continue;
    }
    const parts = format.toParts(match);
    if (parts && isValidDate(parts)) {
      return `${pad(parts.year, 4)}-${pad(parts.month, 2)}-${pad(parts.day, 2)}`;
    }
  }
  return undefined;
}

export function toDecisionDate(raw: string): DecisionDate {
  const cleaned = raw.replace(/\s+/g, " ").trim();
  return { raw: cleaned, parsed: parseCalendarDate(cleaned) };
}

export type DateAnchor = "registerDate" | "decisionDate" | "uploadDate";

const ANCHORS: ReadonlyArray<[DateAnchor, string]> = [
  ["registerDate", "Register"],
  ["decisionDate", "Putus"],
  ["uploadDate", "Upload"],
];

/**
 * Reads the `Register:`, `Putus:` and `Upload:` dates out of one text block.
 * Each is independent; a missing anchor simply leaves that key out.
 */
export function extractAnchoredDates(text: string): Partial<Record<DateAnchor, DecisionDate>> {
  const result: Partial<Record<DateAnchor, DecisionDate>> = {};
  for (const [key, label] of ANCHORS) {
    const match = text.match(new RegExp(String.raw`\b${label}\s*:\s*(${DATE_TOKEN})`, "i"));
    if (match) {
      result[key] = toDecisionDate(match[1]);
    }
  }
  return result;
}

export function hasDateCue(text: string): boolean {
  return DATE_CUE.test(text);
}

/** Text after the last date found in `text`, or the whole text when it holds none. */
export function textAfterLastDate(text: string): string {
  const pattern = new RegExp(DATE_TOKEN, "gi");
  let end = 0;
  for (const match of text.matchAll(pattern)) {
    end = (match.index ?? 0) + match[0].length;
  }
  return text.slice(end);
}
