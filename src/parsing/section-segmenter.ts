import { SECTION_TYPES, SectionType } from "../shared/types/profile.types";

export type RepeatedSectionPolicy = "first" | "last";

export const SECTION_HEADINGS: Record<SectionType, readonly string[]> = {
  contact: ["contact information", "personal information", "contact details", "contact"],
  summary: [
    "professional summary",
    "career objective",
    "professional profile",
    "about me",
    "summary",
    "profile",
    "objective",
  ],
  experience: [
    "professional experience",
    "work experience",
    "employment history",
    "career history",
    "work history",
    "experience",
    "employment",
  ],
  education: [
    "academic qualifications",
    "educational background",
    "academic background",
    "education",
    "qualifications",
  ],
  skills: ["technical skills", "core competencies", "key skills", "competencies", "technologies", "skills"],
  projects: ["notable projects", "personal projects", "academic projects", "key projects", "projects"],
  certifications: [
    "professional certifications",
    "certifications",
    "certificates",
    "credentials",
    "licenses",
  ],
  languages: ["language skills", "linguistic skills", "languages"],
  achievements: ["accomplishments", "achievements", "recognition", "awards", "honors"],
};

interface HeadingPattern {
  section: SectionType;
  variant: string;
  length: number;
  regex: RegExp;
}

interface Heading {
  section: SectionType;
  lineStart: number;
  contentStart: number;
  inline: boolean;
}

// Inside a projects or skills block these read as field labels, not headings.
const BLOCK_LABELS: ReadonlySet<string> = new Set(["technologies", "languages"]);
const LABELLED_BLOCKS: ReadonlySet<SectionType> = new Set<SectionType>(["projects", "skills"]);

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const HEADING_PATTERNS: HeadingPattern[] = SECTION_TYPES.flatMap((section) =>
  SECTION_HEADINGS[section].map((variant) => ({
    section,
    variant,
    length: variant.length,
    regex: new RegExp(
      `^(?:[•*\\-]|\\d+[.)])?\\s*${variant.split(" ").map(escapeRegex).join("\\s+")}\\b\\s*(:)?\\s*(.*)$`,
      "i",
    ),
  })),
);

function matchHeadingLine(trimmed: string): { pattern: HeadingPattern; match: RegExpExecArray } | null {
  let best: { pattern: HeadingPattern; match: RegExpExecArray } | null = null;
  for (const pattern of HEADING_PATTERNS) {
    const match = pattern.regex.exec(trimmed);
    if (!match || (match[2] && !match[1])) {
      continue;
    }
    if (!best || pattern.length > best.pattern.length) {
      best = { pattern, match };
    }
  }
  return best;
}

export function matchSectionHeading(line: string): SectionType | null {
  return matchHeadingLine(line.trim())?.pattern.section ?? null;
}

function isBlockLabel(open: Heading | undefined, pattern: HeadingPattern): boolean {
  return Boolean(open && !open.inline && LABELLED_BLOCKS.has(open.section) && BLOCK_LABELS.has(pattern.variant));
}

/**
 * Finds heading lines. A heading starts its line; anything after it on the same
 * line only counts when separated by a colon ("Skills: TypeScript, Go"). Under a
 * projects or skills heading of its own line, "Technologies: ..." and
 * "Languages: ..." stay part of that block.
 */
function findHeadings(text: string): Heading[] {
  const headings: Heading[] = [];
  let offset = 0;
  for (const line of text.split("\n")) {
    const lineStart = offset;
    offset += line.length + 1;

    const trimmed = line.trimStart();
    const indent = line.length - trimmed.length;
    const best = matchHeadingLine(trimmed);
    if (!best) {
      continue;
    }

    const remainder = best.match[2] ?? "";
    if (remainder && isBlockLabel(headings[headings.length - 1], best.pattern)) {
      continue;
    }
    const contentStart = remainder
      ? lineStart + indent + trimmed.length - remainder.length
      : Math.min(offset, text.length);
    headings.push({ section: best.pattern.section, lineStart, contentStart, inline: Boolean(remainder) });
  }
  return headings;
}

export function segmentSections(
  text: string,
  policy: RepeatedSectionPolicy = "first",
): Map<SectionType, string> {
  const sections = new Map<SectionType, string>();
  const headings = findHeadings(text);

  headings.forEach((heading, index) => {
    const end = headings[index + 1]?.lineStart ?? text.length;
    const content = text.slice(heading.contentStart, Math.max(heading.contentStart, end)).trim();
    if (!content) {
      return;
    }
    if (policy === "first" && sections.has(heading.section)) {
      return;
    }
    sections.set(heading.section, content);
  });

  return sections;
}
