import { CandidateProfile, ContactInfo, SECTION_TYPES } from "../shared/types/profile.types";
import { clamp01 } from "../shared/utils/scores";

export interface ParsingConfidencePolicy {
  contactWeight: number;
  sectionsWeight: number;
  richnessWeight: number;
  richness: {
    experience: number;
    education: number;
    skills: number;
    summary: number;
    projectsOrCertifications: number;
  };
}

export const DEFAULT_PARSING_CONFIDENCE: ParsingConfidencePolicy = {
  contactWeight: 0.3,
  sectionsWeight: 0.3,
  richnessWeight: 0.4,
  richness: {
    experience: 0.3,
    education: 0.2,
    skills: 0.2,
    summary: 0.1,
    projectsOrCertifications: 0.2,
  },
};

/** Share of name, email and phone that were found. */
export function contactCompleteness(contact: ContactInfo): number {
  const present = [contact.name, contact.email, contact.phone].filter((value) => Boolean(value)).length;
  return present / 3;
}

export function scoreParsingConfidence(
  profile: Omit<CandidateProfile, "parsingConfidence">,
  policy: ParsingConfidencePolicy = DEFAULT_PARSING_CONFIDENCE,
): number {
  const { richness } = policy;
  let contentRichness = 0;
  if (profile.workExperience.length) contentRichness += richness.experience;
  if (profile.education.length) contentRichness += richness.education;
  if (profile.skills.length) contentRichness += richness.skills;
  if (profile.summary) contentRichness += richness.summary;
  if (profile.projects.length || profile.certifications.length) {
    contentRichness += richness.projectsOrCertifications;
  }

  return clamp01(
    contactCompleteness(profile.contactInfo) * policy.contactWeight +
      (profile.sectionsFound.length / SECTION_TYPES.length) * policy.sectionsWeight +
      contentRichness * policy.richnessWeight,
  );
}
