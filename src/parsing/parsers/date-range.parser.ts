export interface DateRange {
  start: string;
  end: string;
}

const MONTH = "(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec)[a-z]*\\.?";
const MONTH_YEAR = `${MONTH}\\s+\\d{4}`;

// Numeric ranges such as 01/2020 - 03/2022 are not recognised.
const DATE_RANGE = new RegExp(
  `\\b(${MONTH_YEAR})\\s*(?:[-–—]|to)\\s*(${MONTH_YEAR}|Present|Current|Now)\\b`,
  "i",
);

const DATE_TOKENS: RegExp[] = [
  /\b(?:0?[1-9]|1[0-2])\/(?:0?[1-9]|[12][0-9]|3[01])\/(?:19|20)\d{2}\b/i,
  new RegExp(`\\b${MONTH_YEAR}\\b`, "i"),
  /\b(?:19|20)\d{2}\b/,
];

const RANGE_WORDS = /\b(?:present|current|now|to)\b/gi;
const SEPARATORS = /[-–—|•,()]/g;

export function parseDateRange(text: string): DateRange | null {
  const match = DATE_RANGE.exec(text);
  if (!match) {
    return null;
  }
  return { start: match[1].replace(/\s+/g, " "), end: match[2].replace(/\s+/g, " ") };
}

const EDGE_SEPARATORS = /^[\s|•,–—-]+|[\s|•,–—-]+$/g;

/** The line with its month-year range cut out, e.g. the location beside the dates. */
export function removeDateRange(line: string): string {
  return line.replace(DATE_RANGE, " ").replace(/\s+/g, " ").replace(EDGE_SEPARATORS, "");
}

/** Text left over once every date token and range separator is removed. */
export function stripDates(line: string): string {
  let output = line;
  for (const pattern of DATE_TOKENS) {
    output = output.replace(new RegExp(pattern.source, `${pattern.flags}g`), " ");
  }
  return output.replace(RANGE_WORDS, " ").replace(SEPARATORS, " ").replace(/\s+/g, " ").trim();
}

export function hasDate(line: string): boolean {
  return DATE_TOKENS.some((pattern) => pattern.test(line));
}

export function isPureDateLine(line: string): boolean {
  return hasDate(line) && stripDates(line).length === 0;
}

export function findYear(text: string): string | null {
  const match = /\b(?:19|20)\d{2}\b/.exec(text);
  return match ? match[0] : null;
}
