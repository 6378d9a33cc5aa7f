import { dedupeCaseInsensitive, findTechnologies } from "../parsers/technology.parser";
import { splitListItems } from "./entries";

const MIN_SKILL_LENGTH = 2;
const MAX_SKILL_LENGTH = 49;
// "Languages: TypeScript, Go" inside a skills block: the label is not a skill.
const CATEGORY_LABEL = /^[^:\n]{1,30}:\s*/gm;

export function extractSkills(sectionText: string | null, fullText: string): string[] {
  if (!sectionText) {
    return findTechnologies(fullText);
  }
  const listed = splitListItems(sectionText.replace(CATEGORY_LABEL, "")).filter(
    (item) => item.length >= MIN_SKILL_LENGTH && item.length <= MAX_SKILL_LENGTH,
  );
  return dedupeCaseInsensitive([...listed, ...findTechnologies(sectionText)]);
}

export function extractLanguages(text: string): string[] {
  return splitListItems(text).filter((item) => item.length > 1);
}
