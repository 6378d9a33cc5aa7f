import { findTechnologies } from "../parsing/parsers/technology.parser";
import { MatchingError } from "../shared/errors";
import { MatchingService, MatchResult } from "../shared/types/collaborators.types";
import { CandidateProfile } from "../shared/types/profile.types";
import { clamp01 } from "../shared/utils/scores";

const SKILL_WEIGHT = 0.4;
const KEYWORD_WEIGHT = 0.3;
// Credited to every profile that made it through parsing.
const BASE_SCORE = 0.3;

export function profileText(profile: CandidateProfile): string {
  const parts: string[] = [profile.summary, ...profile.skills, ...profile.languages, ...profile.achievements];
  for (const entry of profile.workExperience) {
    parts.push(entry.position ?? "", entry.company ?? "", ...entry.description, ...entry.technologies);
  }
  for (const entry of profile.education) {
    parts.push(entry.degree ?? "", entry.fieldOfStudy ?? "", entry.institution ?? "");
  }
  for (const project of profile.projects) {
    parts.push(project.name, project.description, ...project.technologies);
  }
  parts.push(...profile.certifications.map((certification) => certification.name));
  return parts.filter((part) => part.length > 0).join("\n");
}

export function tokenize(text: string): Set<string> {
  const tokens = text
    .toLowerCase()
    .split(/[^a-z0-9+#.]+/)
    .map((token) => token.replace(/^\.+|\.+$/g, ""))
    .filter((token) => token.length > 1);
  return new Set(tokens);
}

export class KeywordMatchingService implements MatchingService {
  async match(profile: CandidateProfile, jobDescription: string): Promise<MatchResult> {
    const jobTokens = tokenize(jobDescription);
    if (!jobTokens.size) {
      throw new MatchingError("Job description contains no usable keywords");
    }
    const resumeText = profileText(profile);
    const jobSkills = findTechnologies(jobDescription);
    const candidateSkills = new Set(
      [...profile.skills, ...findTechnologies(resumeText)].map((skill) => skill.toLowerCase()),
    );

    const matchedSkills = jobSkills.filter((skill) => candidateSkills.has(skill.toLowerCase()));
    const missingSkills = jobSkills.filter((skill) => !candidateSkills.has(skill.toLowerCase()));
    const skillMatch = jobSkills.length ? matchedSkills.length / jobSkills.length : 0;

    const resumeTokens = tokenize(resumeText);
    const shared = Array.from(jobTokens).filter((token) => resumeTokens.has(token)).length;
    const keywordMatch = shared / jobTokens.size;

    return {
      overallMatch: clamp01(skillMatch * SKILL_WEIGHT + keywordMatch * KEYWORD_WEIGHT + BASE_SCORE),
      skillMatch,
      keywordMatch,
      matchedSkills,
      missingSkills,
    };
  }
}
