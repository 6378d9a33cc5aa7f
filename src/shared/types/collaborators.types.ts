import { CandidateProfile } from "./profile.types";

export type ExperienceLevel = "entry" | "mid" | "senior" | "unknown";

export interface EnhancementResult {
  overallScore: number;
  strengths: string[];
  weaknesses: string[];
  suggestions: string[];
  atsCompatibility: number;
  estimatedExperienceLevel: ExperienceLevel;
  suitableRoles: string[];
  source: "heuristic" | "llm";
}

export interface MatchResult {
  overallMatch: number;
  skillMatch: number;
  keywordMatch: number;
  matchedSkills: string[];
  missingSkills: string[];
}

export interface EnhancementService {
  enhance(profile: CandidateProfile, targetJobText?: string | null): Promise<EnhancementResult>;
}

export interface MatchingService {
  match(profile: CandidateProfile, jobDescription: string): Promise<MatchResult>;
}
