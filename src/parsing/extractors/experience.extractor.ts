import { WorkExperience } from "../../shared/types/profile.types";
import { isPureDateLine, parseDateRange, removeDateRange } from "../parsers/date-range.parser";
import { findTechnologies } from "../parsers/technology.parser";
import { isBulletLine, splitEntries, splitLines, stripBullet } from "./entries";

export const MIN_EXPERIENCE_ENTRY_LENGTH = 50;
const MAX_LOCATION_LENGTH = 60;

export interface JobHeader {
  company: string | null;
  position: string | null;
}

function orNull(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
}

/** "Position at Company", then "Company - Position", then "Position | Company", else the whole line is the company. */
export function parseJobHeader(header: string): JobHeader {
  const line = removeDateRange(stripBullet(header));

  const atIndex = line.indexOf(" at ");
  if (atIndex > 0) {
    return { position: orNull(line.slice(0, atIndex)), company: orNull(line.slice(atIndex + 4)) };
  }

  const dashIndex = line.indexOf(" - ");
  if (dashIndex > 0) {
    const [company, position] = line.split(" - ");
    return { company: orNull(company), position: orNull(position) };
  }

  if (line.includes("|")) {
    const [position, company] = line.split("|");
    return { position: orNull(position), company: orNull(company) };
  }

  return { company: orNull(line), position: null };
}

function parseEntry(entry: string): WorkExperience | null {
  const [header, ...rest] = splitLines(entry);
  if (!header) {
    return null;
  }

  const { company, position } = parseJobHeader(header);
  if (!company && !position) {
    return null;
  }

  const range = parseDateRange(entry);
  const description: string[] = [];
  let location: string | null = null;

  for (const line of rest) {
    if (isBulletLine(line)) {
      const item = stripBullet(line);
      if (item) {
        description.push(item);
      }
      continue;
    }
    if (parseDateRange(line)) {
      const remainder = removeDateRange(line);
      if (!location && remainder && remainder.length <= MAX_LOCATION_LENGTH) {
        location = remainder;
      }
      continue;
    }
    if (isPureDateLine(line)) {
      continue;
    }
    description.push(line);
  }

  return {
    company,
    position,
    location,
    startDate: range?.start ?? null,
    endDate: range?.end ?? null,
    description,
    technologies: findTechnologies(entry),
  };
}

export function extractWorkExperience(text: string): WorkExperience[] {
  return splitEntries(text)
    .filter((entry) => entry.length >= MIN_EXPERIENCE_ENTRY_LENGTH)
    .map(parseEntry)
    .filter((entry): entry is WorkExperience => entry !== null);
}
