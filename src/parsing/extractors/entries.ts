const BULLET_PREFIX = /^(?:[•*]|-(?=\s)|–(?=\s))\s*/;
const URL_PATTERN = /\b(?:https?:\/\/|www\.)[^\s,;|()<>]+/i;

export function splitEntries(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function splitLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function isBulletLine(line: string): boolean {
  return BULLET_PREFIX.test(line.trim());
}

export function stripBullet(line: string): string {
  return line.trim().replace(BULLET_PREFIX, "").trim();
}

export function findUrl(text: string): string | null {
  const match = URL_PATTERN.exec(text);
  return match ? match[0].replace(/[.]+$/, "") : null;
}

/** Splits list-like text on bullets, spaced hyphens, newlines, commas, semicolons and pipes. */
export function splitListItems(text: string): string[] {
  return text
    .replace(/(^|\s)[-–](?=\s)/gm, "$1,")
    .split(/[•\n,;|]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
