import { CandidateProfile } from "../../shared/types/profile.types";

export const RESUME_REVIEW_SCHEMA_HINT = [
  "{",
  '  "overallScore": 0.0,',
  '  "strengths": ["string"],',
  '  "weaknesses": ["string"],',
  '  "suggestions": ["string"],',
  '  "atsCompatibility": 0.0,',
  '  "estimatedExperienceLevel": "entry|mid|senior|unknown",',
  '  "suitableRoles": ["string"]',
  "}",
].join("\n");

const MAX_DESCRIPTION_ITEMS = 6;

/** The profile without fields a reviewer does not need, to keep the prompt small. */
function compactProfile(profile: CandidateProfile): Record<string, unknown> {
  return {
    hasEmail: Boolean(profile.contactInfo.email),
    hasPhone: Boolean(profile.contactInfo.phone),
    hasLinkedin: Boolean(profile.contactInfo.linkedin),
    summary: profile.summary,
    workExperience: profile.workExperience.map((entry) => ({
      position: entry.position,
      company: entry.company,
      startDate: entry.startDate,
      endDate: entry.endDate,
      description: entry.description.slice(0, MAX_DESCRIPTION_ITEMS),
    })),
    education: profile.education.map((entry) => ({
      degree: entry.degree,
      fieldOfStudy: entry.fieldOfStudy,
      institution: entry.institution,
      graduationYear: entry.graduationYear,
    })),
    skills: profile.skills,
    projects: profile.projects.map((project) => project.name),
    certifications: profile.certifications.map((certification) => certification.name),
    sectionsFound: profile.sectionsFound,
  };
}

export function buildResumeReviewPrompt(profile: CandidateProfile, targetJobText?: string | null): string {
  const lines = [
    "Task: review the parsed résumé below.",
    "Return STRICT JSON only.",
    "Scores are numbers between 0 and 1.",
    "atsCompatibility estimates how well an applicant tracking system would read the résumé.",
    "",
    "Expected output JSON shape:",
    RESUME_REVIEW_SCHEMA_HINT,
    "",
    "Parsed résumé JSON:",
    JSON.stringify(compactProfile(profile), null, 2),
  ];
  if (targetJobText?.trim()) {
    lines.push("", "Target job description:", targetJobText.trim());
  }
  return lines.join("\n");
}
