import { Logger } from "../config/logger";
import { ParsingError } from "../shared/errors";
import { CandidateProfile, SectionType } from "../shared/types/profile.types";
import { extractCertifications } from "./extractors/certifications.extractor";
import { extractContactInfo } from "./extractors/contact.extractor";
import { extractEducation } from "./extractors/education.extractor";
import { extractWorkExperience } from "./extractors/experience.extractor";
import { extractProjects } from "./extractors/projects.extractor";
import { extractLanguages, extractSkills } from "./extractors/skills.extractor";
import { extractAchievements, extractSummary } from "./extractors/summary.extractor";
import { DEFAULT_PARSING_CONFIDENCE, ParsingConfidencePolicy, scoreParsingConfidence } from "./parsing-confidence";
import { RepeatedSectionPolicy, segmentSections } from "./section-segmenter";
import { normalizeText } from "./text-normalizer";

export const MIN_USABLE_TEXT_LENGTH = 20;

export interface ResumeParserOptions {
  sectionPolicy?: RepeatedSectionPolicy;
  confidence?: ParsingConfidencePolicy;
}

/**
 * Turns extracted text into a profile. Deterministic: the same text always
 * yields the same profile.
 *
 * @throws ParsingError when the text is blank, or too short to hold any section.
 */
export function parseResume(text: string, options: ResumeParserOptions = {}): CandidateProfile {
  if (!text.trim()) {
    throw new ParsingError("empty_text", "Extracted text is empty");
  }

  const normalized = normalizeText(text);
  const sections = segmentSections(normalized, options.sectionPolicy ?? "first");
  if (normalized.length < MIN_USABLE_TEXT_LENGTH && sections.size === 0) {
    throw new ParsingError("unusable_text", `Extracted text is too short to parse (${normalized.length} chars)`);
  }

  const section = (type: SectionType): string | null => sections.get(type) ?? null;
  const experienceText = section("experience");
  const educationText = section("education");
  const summaryText = section("summary");
  const projectsText = section("projects");
  const certificationsText = section("certifications");
  const languagesText = section("languages");
  const achievementsText = section("achievements");

  const profile: Omit<CandidateProfile, "parsingConfidence"> = {
    contactInfo: extractContactInfo(section("contact"), normalized),
    summary: summaryText ? extractSummary(summaryText) : "",
    workExperience: experienceText ? extractWorkExperience(experienceText) : [],
    education: educationText ? extractEducation(educationText) : [],
    skills: extractSkills(section("skills"), normalized),
    projects: projectsText ? extractProjects(projectsText) : [],
    certifications: certificationsText ? extractCertifications(certificationsText) : [],
    languages: languagesText ? extractLanguages(languagesText) : [],
    achievements: achievementsText ? extractAchievements(achievementsText) : [],
    sectionsFound: Array.from(sections.keys()),
  };

  return {
    ...profile,
    parsingConfidence: scoreParsingConfidence(profile, options.confidence ?? DEFAULT_PARSING_CONFIDENCE),
  };
}

export class ResumeParserService {
  constructor(
    private readonly logger: Logger,
    private readonly options: ResumeParserOptions = {},
  ) {}

  parse(text: string): CandidateProfile {
    const profile = parseResume(text, this.options);
    this.logger.debug("Resume parsed", {
      sections: profile.sectionsFound.join(","),
      experience_entries: profile.workExperience.length,
      education_entries: profile.education.length,
      skills: profile.skills.length,
      parsing_confidence: profile.parsingConfidence,
    });
    return profile;
  }
}
