import { Education } from "../../shared/types/profile.types";
import { findYear, isPureDateLine } from "../parsers/date-range.parser";
import { splitEntries, splitLines, stripBullet } from "./entries";

export const MIN_EDUCATION_ENTRY_LENGTH = 20;

const GPA_PATTERN = /\bGPA[:\s]*(\d+(?:\.\d+)?)/i;
const TRAILING_YEAR = /[\s,(|–-]*(?:19|20)\d{2}\)?$/;

interface EducationHeader {
  degree: string | null;
  fieldOfStudy: string | null;
  institution: string | null;
}

function orNull(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
}

function splitDegree(degreePart: string): Pick<EducationHeader, "degree" | "fieldOfStudy"> {
  const inIndex = degreePart.indexOf(" in ");
  if (inIndex > 0) {
    return { degree: orNull(degreePart.slice(0, inIndex)), fieldOfStudy: orNull(degreePart.slice(inIndex + 4)) };
  }
  return { degree: orNull(degreePart), fieldOfStudy: null };
}

export function parseEducationHeader(header: string): EducationHeader {
  const line = stripBullet(header).replace(TRAILING_YEAR, "").trim();

  const atIndex = line.lastIndexOf(" at ");
  if (atIndex > 0) {
    return { ...splitDegree(line.slice(0, atIndex)), institution: orNull(line.slice(atIndex + 4)) };
  }

  if (line.includes(",")) {
    const [degreePart, institution] = line.split(",");
    return { ...splitDegree(degreePart), institution: orNull(institution) };
  }

  return { degree: null, fieldOfStudy: null, institution: orNull(line) };
}

export function extractEducation(text: string): Education[] {
  const education: Education[] = [];
  for (const entry of splitEntries(text)) {
    if (entry.length < MIN_EDUCATION_ENTRY_LENGTH) {
      continue;
    }
    const [header, ...rest] = splitLines(entry);
    const parsed = parseEducationHeader(header ?? "");
    if (!parsed.institution && !parsed.degree) {
      continue;
    }
    education.push({
      ...parsed,
      graduationYear: findYear(entry),
      gpa: GPA_PATTERN.exec(entry)?.[1] ?? null,
      description: rest.map(stripBullet).filter((line) => line.length > 0 && !isPureDateLine(line)),
    });
  }
  return education;
}
