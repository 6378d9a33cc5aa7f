import { EngineId, RawExtraction } from "../shared/types/document.types";
import { clamp01 } from "../shared/utils/scores";

export interface ExtractionScoringPolicy {
  baseWeights: Record<EngineId, number>;
  lengthBonuses: ReadonlyArray<{ minLength: number; bonus: number }>;
  keywords: readonly string[];
  keywordBonus: number;
  keywordBonusCap: number;
  specialCharThreshold: number;
  specialCharPenaltyFactor: number;
}

export const DEFAULT_EXTRACTION_SCORING: ExtractionScoringPolicy = {
  baseWeights: {
    "pdfjs-layout": 0.9,
    "pdfjs-stream": 0.85,
    "pdf-parse": 0.8,
    docx: 0.9,
    "plain-text": 0.85,
    ocr: 0.7,
  },
  lengthBonuses: [
    { minLength: 100, bonus: 0.1 },
    { minLength: 500, bonus: 0.1 },
  ],
  keywords: [
    "experience",
    "education",
    "skills",
    "work",
    "university",
    "degree",
    "phone",
    "email",
    "address",
    "linkedin",
  ],
  keywordBonus: 0.05,
  keywordBonusCap: 0.2,
  specialCharThreshold: 0.2,
  specialCharPenaltyFactor: 2,
};

export interface FallbackPolicy {
  minTextLength: number;
  minConfidence: number;
  maxPageErrorRatio: number;
  maxSpecialCharRatio: number;
}

export const DEFAULT_FALLBACK_POLICY: FallbackPolicy = {
  minTextLength: 50,
  minConfidence: 0.5,
  maxPageErrorRatio: 0.3,
  maxSpecialCharRatio: 0.3,
};

const ORDINARY_CHAR = /[\p{L}\p{N}\s]/u;

/** Share of code points that are neither letters, digits nor whitespace. */
export function specialCharRatio(text: string): number {
  const chars = Array.from(text);
  if (!chars.length) {
    return 0;
  }
  const special = chars.filter((char) => !ORDINARY_CHAR.test(char)).length;
  return special / chars.length;
}

export function scoreExtraction(
  text: string,
  engine: EngineId,
  policy: ExtractionScoringPolicy = DEFAULT_EXTRACTION_SCORING,
): number {
  if (!text.trim()) {
    return 0;
  }

  let score = policy.baseWeights[engine];
  for (const { minLength, bonus } of policy.lengthBonuses) {
    if (text.length > minLength) {
      score += bonus;
    }
  }

  const lower = text.toLowerCase();
  const hits = policy.keywords.filter((keyword) => lower.includes(keyword)).length;
  score += Math.min(hits * policy.keywordBonus, policy.keywordBonusCap);

  const ratio = specialCharRatio(text);
  if (ratio > policy.specialCharThreshold) {
    score -= (ratio - policy.specialCharThreshold) * policy.specialCharPenaltyFactor;
  }

  return clamp01(score);
}

export function needsFallback(
  raw: Pick<RawExtraction, "text" | "errors" | "pagesProcessed">,
  confidence: number,
  policy: FallbackPolicy = DEFAULT_FALLBACK_POLICY,
): boolean {
  if (raw.text.trim().length < policy.minTextLength) {
    return true;
  }
  if (confidence < policy.minConfidence) {
    return true;
  }
  if (raw.errors.length > raw.pagesProcessed * policy.maxPageErrorRatio) {
    return true;
  }
  return specialCharRatio(raw.text) > policy.maxSpecialCharRatio;
}
