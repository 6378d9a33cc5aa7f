import { contactCompleteness } from "../parsing/parsing-confidence";
import { EnhancementResult } from "../shared/types/collaborators.types";
import { CandidateProfile, SECTION_TYPES } from "../shared/types/profile.types";
import { clamp01 } from "../shared/utils/scores";

export interface PipelineScoringPolicy {
  confidence: {
    extraction: number;
    parsing: number;
    enhancement: number;
    /** Added in place of the enhancement term when no enhancement ran. */
    withoutEnhancement: number;
  };
  quality: {
    contact: number;
    experience: number;
    education: number;
    skills: number;
    summary: number;
  };
}

export const DEFAULT_PIPELINE_SCORING: PipelineScoringPolicy = {
  confidence: {
    extraction: 0.3,
    parsing: 0.4,
    enhancement: 0.3,
    withoutEnhancement: 0.2,
  },
  quality: {
    contact: 0.2,
    experience: 0.3,
    education: 0.2,
    skills: 0.2,
    summary: 0.1,
  },
};

export interface PipelineScores {
  confidenceScore: number;
  qualityScore: number;
  completenessScore: number;
}

export function computeConfidenceScore(
  extractionConfidence: number,
  parsingConfidence: number,
  enhancement: EnhancementResult | null,
  policy: PipelineScoringPolicy = DEFAULT_PIPELINE_SCORING,
): number {
  const weights = policy.confidence;
  const enhancementTerm = enhancement
    ? clamp01(enhancement.overallScore) * weights.enhancement
    : weights.withoutEnhancement;
  return clamp01(extractionConfidence * weights.extraction + parsingConfidence * weights.parsing + enhancementTerm);
}

export function computeQualityScore(
  profile: CandidateProfile,
  policy: PipelineScoringPolicy = DEFAULT_PIPELINE_SCORING,
): number {
  const weights = policy.quality;
  let quality = contactCompleteness(profile.contactInfo) * weights.contact;
  if (profile.workExperience.length) quality += weights.experience;
  if (profile.education.length) quality += weights.education;
  if (profile.skills.length) quality += weights.skills;
  if (profile.summary) quality += weights.summary;
  return clamp01(quality);
}

export function computeCompletenessScore(profile: CandidateProfile): number {
  return clamp01(profile.sectionsFound.length / SECTION_TYPES.length);
}

/** Scores for a run; everything is zero until a profile exists. */
export function scorePipeline(
  extractionConfidence: number | null,
  profile: CandidateProfile | null,
  enhancement: EnhancementResult | null,
  policy: PipelineScoringPolicy = DEFAULT_PIPELINE_SCORING,
): PipelineScores {
  if (!profile) {
    return { confidenceScore: 0, qualityScore: 0, completenessScore: 0 };
  }
  return {
    confidenceScore: computeConfidenceScore(extractionConfidence ?? 0, profile.parsingConfidence, enhancement, policy),
    qualityScore: computeQualityScore(profile, policy),
    completenessScore: computeCompletenessScore(profile),
  };
}
