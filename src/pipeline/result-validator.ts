import { CandidateProfile } from "../shared/types/profile.types";
import { ExtractionResult } from "../shared/types/document.types";

export interface ValidationOptions {
  minParsingConfidence: number;
}

export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
  minParsingConfidence: 0.3,
};

const MIN_EXTRACTION_CONFIDENCE = 0.5;
const MIN_EXTRACTED_TEXT_LENGTH = 100;

/** Quality warnings for a finished run. An empty list means the result looks sound. */
export function validatePipelineResult(
  result: { extraction: ExtractionResult | null; profile: CandidateProfile | null },
  options: ValidationOptions = DEFAULT_VALIDATION_OPTIONS,
): string[] {
  const warnings: string[] = [];
  const { extraction, profile } = result;

  if (extraction) {
    if (extraction.confidence < MIN_EXTRACTION_CONFIDENCE) {
      warnings.push(`Low extraction confidence: ${extraction.confidence.toFixed(2)}`);
    }
    if (extraction.text.length < MIN_EXTRACTED_TEXT_LENGTH) {
      warnings.push(`Very little text extracted (${extraction.text.length} chars)`);
    }
  }

  if (profile) {
    if (profile.parsingConfidence < options.minParsingConfidence) {
      warnings.push(`Parsing confidence below threshold: ${profile.parsingConfidence.toFixed(2)}`);
    }
    if (!profile.contactInfo.email) {
      warnings.push("No email found in resume");
    }
    if (!profile.workExperience.length) {
      warnings.push("No work experience found");
    }
  }

  return warnings;
}
