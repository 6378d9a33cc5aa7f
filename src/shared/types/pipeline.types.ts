import { EnhancementResult, MatchResult } from "./collaborators.types";
import { EngineId, ExtractionConfig, ExtractionResult } from "./document.types";
import { CandidateProfile } from "./profile.types";

export type StageId = "extraction" | "parsing" | "enhancement" | "matching" | "validation";

export const STAGE_ORDER: readonly StageId[] = [
  "extraction",
  "parsing",
  "enhancement",
  "matching",
  "validation",
];

export const CRITICAL_STAGES: ReadonlySet<StageId> = new Set<StageId>(["extraction", "parsing"]);

export type StageStatus = "pending" | "in_progress" | "completed" | "failed" | "skipped";

export interface StageResult<T = unknown> {
  stage: StageId;
  status: StageStatus;
  startTime: string | null;
  endTime: string | null;
  durationMs: number;
  success: boolean;
  error: string | null;
  warnings: string[];
  payload: T | null;
}

export interface PipelineResult {
  inputRef: string;
  processingId: string;
  processedAt: string;
  stageResults: Record<StageId, StageResult>;
  extraction: ExtractionResult | null;
  profile: CandidateProfile | null;
  enhancement: EnhancementResult | null;
  match: MatchResult | null;
  overallSuccess: boolean;
  confidenceScore: number;
  qualityScore: number;
  completenessScore: number;
  totalDurationMs: number;
  cancelled: boolean;
  errors: string[];
  warnings: string[];
}

export interface PipelineConfig {
  extraction: ExtractionConfig;
  enableEnhancement: boolean;
  enableMatching: boolean;
  enableValidation: boolean;
  targetJobDescription: string | null;
  minParsingConfidence: number;
  stageTimeoutMs: number;
  includeRawText: boolean;
  ocrMaxWorkers: number;
  /** Directory of <lang>.traineddata.gz files; null reads the @tesseract.js-data packages. */
  ocrLangPath: string | null;
  disabledEngines: EngineId[];
}

export interface ProcessOptions {
  jobDescription?: string | null;
  signal?: AbortSignal;
  processingId?: string;
  /** Called with a copy of each stage record as it changes state. */
  onStageChange?: (stage: StageResult) => void;
}
