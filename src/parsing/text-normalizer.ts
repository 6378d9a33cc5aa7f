const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;
const BULLET_GLYPHS = /[•·▪▫◦‣⁃●○■□►▸✓✔]/g;
const HORIZONTAL_WHITESPACE = /[^\S\n]+/g;

/** Character confusions OCR commonly makes in section headings. */
const RECOGNITION_FIXES: ReadonlyArray<[RegExp, string]> = [
  [/\bEducat[1l]0n\b|\bEducati0n\b|\bEducat10n\b/gi, "Education"],
  [/\bExper[1l]ence\b|\bExperi3nce\b/gi, "Experience"],
  [/\bSk[1l]{3}s\b|\bSk[1l][1l]ls\b|\bSki[1l]{2}s\b|\bSk111s\b/gi, "Skills"],
  [/\bPr0jects\b/gi, "Projects"],
  [/\bCert[1l]f[1l]cat[1l]ons\b|\bCertificati0ns\b/gi, "Certifications"],
  [/\bSumm[4@]ry\b/gi, "Summary"],
  [/\b0f\b/g, "of"],
];

export function normalizeText(text: string): string {
  let output = text.replace(/\r\n?/g, "\n").replace(CONTROL_CHARS, "");
  output = output.replace(BULLET_GLYPHS, "•").replace(HORIZONTAL_WHITESPACE, " ");
  for (const [pattern, replacement] of RECOGNITION_FIXES) {
    output = output.replace(pattern, replacement);
  }
  return output
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
