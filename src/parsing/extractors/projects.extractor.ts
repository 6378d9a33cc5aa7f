import { Project } from "../../shared/types/profile.types";
import { dedupeCaseInsensitive, findTechnologies } from "../parsers/technology.parser";
import { findUrl, splitEntries, splitLines, stripBullet } from "./entries";

export const MIN_PROJECT_ENTRY_LENGTH = 30;
const TECHNOLOGIES_LINE = /^(?:technologies|tech stack|stack)\s*:\s*(.*)$/i;

export function extractProjects(text: string): Project[] {
  const projects: Project[] = [];
  for (const entry of splitEntries(text)) {
    if (entry.length < MIN_PROJECT_ENTRY_LENGTH) {
      continue;
    }
    const [header, ...rest] = splitLines(entry);
    const name = stripBullet(header ?? "");
    if (!name) {
      continue;
    }

    const description: string[] = [];
    const listed: string[] = [];
    for (const line of rest) {
      const tech = TECHNOLOGIES_LINE.exec(stripBullet(line));
      if (tech) {
        listed.push(...tech[1].split(",").map((item) => item.trim()).filter((item) => item.length > 0));
        continue;
      }
      description.push(stripBullet(line));
    }

    projects.push({
      name,
      description: description.filter((line) => line.length > 0).join(" "),
      technologies: dedupeCaseInsensitive([...findTechnologies(entry), ...listed]),
      url: findUrl(entry),
    });
  }
  return projects;
}
