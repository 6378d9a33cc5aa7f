import { Logger } from "../config/logger";
import { EnhancementError } from "../shared/errors";
import { EnhancementResult, EnhancementService, ExperienceLevel } from "../shared/types/collaborators.types";
import { CandidateProfile } from "../shared/types/profile.types";
import { clamp01 } from "../shared/utils/scores";
import { StructuredJsonClient } from "./llm.client";
import { callJsonPromptSafe } from "./llm.safe";
import { buildResumeReviewPrompt, RESUME_REVIEW_SCHEMA_HINT } from "./prompts/resume-review.prompt";

interface ResumeReviewPayload {
  overallScore: number;
  strengths: string[];
  weaknesses: string[];
  suggestions: string[];
  atsCompatibility: number;
  estimatedExperienceLevel: string;
  suitableRoles: string[];
}

const EXPERIENCE_LEVELS: readonly ExperienceLevel[] = ["entry", "mid", "senior", "unknown"];
const MAX_LIST_ITEMS = 8;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isResumeReviewPayload(value: unknown): value is ResumeReviewPayload {
  if (!isRecord(value)) {
    return false;
  }
  const record = value;
  return (
    typeof record.overallScore === "number" &&
    typeof record.atsCompatibility === "number" &&
    typeof record.estimatedExperienceLevel === "string" &&
    isStringArray(record.strengths) &&
    isStringArray(record.weaknesses) &&
    isStringArray(record.suggestions) &&
    isStringArray(record.suitableRoles)
  );
}

function toExperienceLevel(value: string): ExperienceLevel {
  const normalized = value.trim().toLowerCase();
  return EXPERIENCE_LEVELS.find((level) => normalized.startsWith(level)) ?? "unknown";
}

function cleanList(items: string[]): string[] {
  return items
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .slice(0, MAX_LIST_ITEMS);
}

export interface LlmEnhancementOptions {
  timeoutMs?: number;
  maxTokens?: number;
}

export class LlmEnhancementService implements EnhancementService {
  constructor(
    private readonly llmClient: StructuredJsonClient,
    private readonly logger: Logger,
    private readonly options: LlmEnhancementOptions = {},
  ) {}

  async enhance(profile: CandidateProfile, targetJobText?: string | null): Promise<EnhancementResult> {
    const result = await callJsonPromptSafe({
      llmClient: this.llmClient,
      prompt: buildResumeReviewPrompt(profile, targetJobText),
      maxTokens: this.options.maxTokens ?? 900,
      promptName: "resume_review",
      schemaHint: RESUME_REVIEW_SCHEMA_HINT,
      validate: isResumeReviewPayload,
      logger: this.logger,
      timeoutMs: this.options.timeoutMs,
    });

    if (!result.ok) {
      this.logger.warn("Resume review failed", {
        prompt_name: "resume_review",
        error_code: result.error_code,
      });
      throw new EnhancementError(`Resume review failed: ${result.error_code}`);
    }

    const review = result.data;
    return {
      overallScore: clamp01(review.overallScore),
      strengths: cleanList(review.strengths),
      weaknesses: cleanList(review.weaknesses),
      suggestions: cleanList(review.suggestions),
      atsCompatibility: clamp01(review.atsCompatibility),
      estimatedExperienceLevel: toExperienceLevel(review.estimatedExperienceLevel),
      suitableRoles: cleanList(review.suitableRoles),
      source: "llm",
    };
  }
}
