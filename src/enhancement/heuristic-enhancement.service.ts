import { EnhancementResult, EnhancementService, ExperienceLevel } from "../shared/types/collaborators.types";
import { CandidateProfile, SECTION_TYPES } from "../shared/types/profile.types";
import { clamp01 } from "../shared/utils/scores";
import skillCategories from "./data/skill-categories.json";

const LEADERSHIP_WORDS = ["led", "managed", "directed", "supervised", "coordinated"];
const OUTDATED_SKILLS = new Set(["flash", "silverlight", "internet explorer", "vb6", "perl", "cobol"]);
const MIN_SUMMARY_LENGTH = 50;
const MAX_ROLES = 5;

const ROLE_RULES: ReadonlyArray<{ role: string; skills: string[] }> = [
  { role: "Software Developer", skills: ["python", "java", "javascript", "typescript", "programming"] },
  { role: "Frontend Developer", skills: ["react", "angular", "vue", "html", "css"] },
  { role: "Backend Developer", skills: ["node.js", "django", "flask", "express", "api"] },
  { role: "Data Scientist", skills: ["machine learning", "data science", "pandas", "tensorflow"] },
  { role: "DevOps Engineer", skills: ["aws", "docker", "kubernetes", "terraform", "devops"] },
];

const CATEGORY_LOOKUP: ReadonlyMap<string, Set<string>> = new Map(
  Object.entries(skillCategories).map(([category, skills]) => [
    category,
    new Set(skills.map((skill) => skill.toLowerCase())),
  ]),
);

function experienceText(profile: CandidateProfile): string {
  return profile.workExperience.map((entry) => entry.description.join(" ")).join(" ").toLowerCase();
}

function mentionsAny(text: string, words: readonly string[]): boolean {
  return words.some((word) => new RegExp(`\\b${word}\\b`).test(text));
}

function yearOf(value: string | null): number | null {
  const match = value ? /\b(?:19|20)\d{2}\b/.exec(value) : null;
  return match ? Number(match[0]) : null;
}

/** Rule-based résumé review; the default when no language model is configured. */
export class HeuristicEnhancementService implements EnhancementService {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async enhance(profile: CandidateProfile): Promise<EnhancementResult> {
    return {
      overallScore: this.scoreProfile(profile),
      strengths: this.strengths(profile),
      weaknesses: this.weaknesses(profile),
      suggestions: this.suggestions(profile),
      atsCompatibility: this.atsCompatibility(profile),
      estimatedExperienceLevel: this.experienceLevel(profile),
      suitableRoles: this.suitableRoles(profile),
      source: "heuristic",
    };
  }

  scoreProfile(profile: CandidateProfile): number {
    const { contactInfo } = profile;
    let contact = 0;
    if (contactInfo.name) contact += 0.3;
    if (contactInfo.email) contact += 0.3;
    if (contactInfo.phone) contact += 0.2;
    if (contactInfo.linkedin) contact += 0.2;
    let score = contact * 0.2;

    if (profile.workExperience.length) {
      let experience = Math.min(profile.workExperience.length * 0.3, 1);
      const averageDescription =
        profile.workExperience.reduce((sum, entry) => sum + entry.description.join(" ").length, 0) /
        profile.workExperience.length;
      if (averageDescription > 100) {
        experience += 0.2;
      }
      score += Math.min(experience, 1) * 0.3;
    }
    if (profile.education.length) {
      score += Math.min(profile.education.length * 0.5, 1) * 0.15;
    }
    if (profile.skills.length) {
      score += Math.min(profile.skills.length * 0.1, 1) * 0.2;
    }
    if (profile.summary.length > MIN_SUMMARY_LENGTH) {
      score += 0.1;
    }

    let extras = 0;
    if (profile.projects.length) extras += 0.02;
    if (profile.certifications.length) extras += 0.02;
    if (profile.achievements.length) extras += 0.01;
    score += Math.min(extras, 0.05);

    return clamp01(score);
  }

  atsCompatibility(profile: CandidateProfile): number {
    let score = 0;
    if (profile.contactInfo.email?.includes("@")) score += 0.15;
    if (profile.contactInfo.phone) score += 0.15;
    score += (profile.sectionsFound.length / SECTION_TYPES.length) * 0.2;
    if (profile.skills.length) score += 0.2;
    if (profile.workExperience.length) {
      const dated = profile.workExperience.filter((entry) => entry.startDate || entry.endDate).length;
      score += (dated / profile.workExperience.length) * 0.2;
    }
    if (profile.education.length) score += 0.1;
    return clamp01(score);
  }

  experienceLevel(profile: CandidateProfile): ExperienceLevel {
    const entries = profile.workExperience;
    if (!entries.length) {
      return "entry";
    }

    const currentYear = this.now().getFullYear();
    let totalYears = 0;
    for (const entry of entries) {
      const start = yearOf(entry.startDate);
      const end = /^(present|current|now)$/i.test(entry.endDate ?? "") ? currentYear : yearOf(entry.endDate);
      if (start !== null && end !== null) {
        totalYears += Math.max(0, end - start);
      }
    }

    if (totalYears === 0) {
      if (entries.length >= 4) return "senior";
      if (entries.length >= 2) return "mid";
      return "entry";
    }
    if (totalYears >= 8) return "senior";
    if (totalYears >= 3) return "mid";
    return "entry";
  }

  private strengths(profile: CandidateProfile): string[] {
    const strengths: string[] = [];
    if (profile.workExperience.length >= 3) {
      strengths.push("Strong work experience with multiple roles");
    }
    if (profile.education.some((entry) => /master|phd|doctor/i.test(entry.degree ?? ""))) {
      strengths.push("Advanced degree");
    }
    if (profile.skills.length >= 10) {
      strengths.push("Comprehensive technical skills");
    }
    if (profile.certifications.length) {
      strengths.push("Professional certifications");
    }
    if (profile.projects.length) {
      strengths.push("Projects that show initiative");
    }
    if (profile.contactInfo.linkedin && profile.contactInfo.github) {
      strengths.push("Strong online professional presence");
    }
    if (mentionsAny(experienceText(profile), LEADERSHIP_WORDS)) {
      strengths.push("Demonstrates leadership experience");
    }
    return strengths;
  }

  private weaknesses(profile: CandidateProfile): string[] {
    const weaknesses: string[] = [];
    if (!profile.contactInfo.email) weaknesses.push("Missing email contact information");
    if (!profile.contactInfo.phone) weaknesses.push("Missing phone contact information");
    if (profile.summary.length < MIN_SUMMARY_LENGTH) weaknesses.push("Missing or insufficient professional summary");
    if (profile.workExperience.length < 2) weaknesses.push("Limited work experience");
    if (!profile.education.length) weaknesses.push("No education information provided");
    if (profile.skills.length < 5) weaknesses.push("Limited technical skills listed");

    const outdated = profile.skills.filter((skill) => OUTDATED_SKILLS.has(skill.toLowerCase()));
    if (outdated.length) {
      weaknesses.push(`Some outdated technologies: ${outdated.join(", ")}`);
    }
    return weaknesses;
  }

  private suggestions(profile: CandidateProfile): string[] {
    const suggestions: string[] = [];
    if (!profile.summary) {
      suggestions.push("Add a professional summary highlighting key achievements");
    }
    if (!profile.contactInfo.linkedin) {
      suggestions.push("Include your LinkedIn profile URL");
    }
    for (const entry of profile.workExperience) {
      if (entry.description.length < 2) {
        suggestions.push(`Add a more detailed description for the ${entry.position ?? entry.company ?? "listed"} role`);
      }
    }
    if (!profile.projects.length) {
      suggestions.push("Consider adding relevant projects");
    }
    if (!profile.certifications.length) {
      suggestions.push("Consider adding professional certifications relevant to your field");
    }
    if (this.skillCategories(profile.skills).size < 3) {
      suggestions.push("Diversify your skill set across technology categories");
    }
    return suggestions;
  }

  private suitableRoles(profile: CandidateProfile): string[] {
    const skills = profile.skills.join(" ").toLowerCase();
    const roles = ROLE_RULES.filter((rule) => rule.skills.some((skill) => skills.includes(skill))).map(
      (rule) => rule.role,
    );
    if (mentionsAny(experienceText(profile), ["managed", "led", "directed", "supervised"])) {
      roles.push("Technical Lead", "Engineering Manager");
    }
    return roles.slice(0, MAX_ROLES);
  }

  private skillCategories(skills: readonly string[]): Set<string> {
    const found = new Set<string>();
    for (const skill of skills) {
      for (const [category, members] of CATEGORY_LOOKUP) {
        if (members.has(skill.toLowerCase())) {
          found.add(category);
        }
      }
    }
    return found;
  }
}
