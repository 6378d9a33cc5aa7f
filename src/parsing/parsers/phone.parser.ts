// Tried in order; the first pattern that matches anywhere wins.
const PHONE_PATTERNS: RegExp[] = [
  /(?<![\d+])\+?1?[-. \t]?\(?\d{3}\)?[-. \t]?\d{3}[-. \t]?\d{4}(?!\d)/,
  /(?<![\d+])\+?\d{1,4}[-. \t]?\d{3,4}[-. \t]?\d{3,4}[-. \t]?\d{3,4}(?!\d)/,
  /\b\d{3}[-. \t]?\d{3}[-. \t]?\d{4}\b/,
];

export function normalizePhone(raw: string): string {
  const trimmed = raw.trim();
  return /^\d{10}$/.test(trimmed) ? `+1${trimmed}` : trimmed;
}

export function findPhone(text: string): string | null {
  for (const pattern of PHONE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return normalizePhone(match[0]);
    }
  }
  return null;
}
